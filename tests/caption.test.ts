import { describe, it, expect } from "vitest";
import { formatCaption, formatCaptionDate } from "../src/social/caption.js";

describe("formatCaptionDate", () => {
  it("uses the long month and a zero-padded day", () => {
    expect(formatCaptionDate(new Date("2026-10-08T12:00:00Z"))).toBe("October 08, 2026");
  });

  it("formats in UTC", () => {
    expect(formatCaptionDate(new Date("2026-12-31T23:59:59Z"))).toBe("December 31, 2026");
    expect(formatCaptionDate(new Date("2027-01-01T00:00:00Z"))).toBe("January 01, 2027");
  });
});

describe("formatCaption", () => {
  const at = new Date("2026-03-05T09:00:00Z");

  it("substitutes the date placeholder", () => {
    expect(formatCaption("📖 Bible Story - {date}", at)).toBe("📖 Bible Story - March 05, 2026");
  });

  it("substitutes every occurrence", () => {
    expect(formatCaption("{date} / {date}", at)).toBe("March 05, 2026 / March 05, 2026");
  });

  it("leaves templates without a placeholder unchanged", () => {
    expect(formatCaption("Daily story", at)).toBe("Daily story");
  });
});
