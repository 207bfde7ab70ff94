import { describe, it, expect } from "vitest";
import path from "node:path";
import { loadConfig, requireCredentials, statePathFromConfig, imagesDirFromConfig } from "../src/config.js";
import { MissingCredentialsError } from "../src/errors.js";

describe("Config validation", () => {
  it("applies defaults", () => {
    const cfg = loadConfig({});

    expect(cfg.GRAPH_API_VERSION).toBe("v19.0");
    expect(cfg.IMAGES_DIR).toBe("images");
    expect(cfg.STATE_DIR).toBe("data");
    expect(cfg.CAPTION_TEMPLATE).toBe("📖 Bible Story - {date}");
    expect(cfg.POST_TIMEOUT_SECONDS).toBe(300);
    expect(cfg.RUN_MODE).toBe("once");
    expect(cfg.POST_TIME_UTC).toBe("09:00");
    expect(cfg.PORT).toBe(5000);
    expect(cfg.BIND).toBe("0.0.0.0");
    expect(cfg.LOG_LEVEL).toBe("info");
    expect(cfg.FACEBOOK_PAGE_ID).toBeUndefined();
  });

  it("does not require credentials to load", () => {
    expect(() => loadConfig({ RUN_MODE: "daily" })).not.toThrow();
  });

  it("coerces numeric values", () => {
    const cfg = loadConfig({ PORT: "8080", POST_TIMEOUT_SECONDS: "60" });

    expect(cfg.PORT).toBe(8080);
    expect(cfg.POST_TIMEOUT_SECONDS).toBe(60);
  });

  it("rejects a malformed POST_TIME_UTC", () => {
    expect(() => loadConfig({ POST_TIME_UTC: "9am" })).toThrow(/POST_TIME_UTC must be HH:MM/);
  });

  it("rejects an unknown RUN_MODE", () => {
    expect(() => loadConfig({ RUN_MODE: "hourly" })).toThrow(/RUN_MODE/);
  });

  it("rejects a malformed GRAPH_API_VERSION", () => {
    expect(() => loadConfig({ GRAPH_API_VERSION: "19" })).toThrow(/GRAPH_API_VERSION must look like v19.0/);
  });

  it("rejects an out-of-range PORT", () => {
    expect(() => loadConfig({ PORT: "70000" })).toThrow(/PORT/);
  });

  it("resolves paths against the working directory", () => {
    const cfg = loadConfig({ IMAGES_DIR: "pics", STATE_DIR: "state" });

    expect(imagesDirFromConfig(cfg)).toBe(path.resolve(process.cwd(), "pics"));
    expect(statePathFromConfig(cfg)).toBe(path.join(process.cwd(), "state", "last_posted.txt"));
  });
});

describe("requireCredentials", () => {
  it("returns trimmed credentials", () => {
    const cfg = loadConfig({ FACEBOOK_PAGE_ID: " 123 ", FACEBOOK_ACCESS_TOKEN: "test-token" });

    expect(requireCredentials(cfg)).toEqual({ pageId: "123", accessToken: "test-token" });
  });

  it("names every missing variable", () => {
    const cfg = loadConfig({ FACEBOOK_PAGE_ID: "   " });

    const err = (() => {
      try {
        requireCredentials(cfg);
        return null;
      } catch (e) {
        return e;
      }
    })();

    expect(err).toBeInstanceOf(MissingCredentialsError);
    expect(err).toMatchObject({ missing: ["FACEBOOK_PAGE_ID", "FACEBOOK_ACCESS_TOKEN"] });
  });
});
