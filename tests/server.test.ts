import { describe, it, expect, beforeAll, afterAll } from "vitest";
import { startLivenessServer, LIVENESS_BODY, type LivenessServer } from "../src/control/server.js";

let server: LivenessServer;
let base: string;

beforeAll(async () => {
  server = await startLivenessServer({ bind: "127.0.0.1", port: 0 });
  base = `http://127.0.0.1:${server.port}`;
});

afterAll(async () => {
  await server.close();
});

describe("liveness server", () => {
  it("binds an ephemeral port when asked for port 0", () => {
    expect(server.port).toBeGreaterThan(0);
  });

  it("answers GET / with a fixed plaintext body", async () => {
    const res = await fetch(`${base}/`);

    expect(res.status).toBe(200);
    expect(res.headers.get("content-type")).toBe("text/plain; charset=utf-8");
    expect(await res.text()).toBe(LIVENESS_BODY);
  });

  it("answers GET /healthz with JSON", async () => {
    const res = await fetch(`${base}/healthz`);

    expect(res.status).toBe(200);
    expect(await res.json()).toEqual({ ok: true });
  });

  it("ignores query strings", async () => {
    const res = await fetch(`${base}/?ping=1`);

    expect(await res.text()).toBe("Bot is alive!");
  });

  it("returns 404 for unknown paths", async () => {
    const res = await fetch(`${base}/status`);

    expect(res.status).toBe(404);
    expect(await res.text()).toBe("not found");
  });

  it("returns 405 for non-GET methods", async () => {
    const res = await fetch(`${base}/`, { method: "POST" });

    expect(res.status).toBe(405);
    expect(res.headers.get("allow")).toBe("GET, HEAD");
  });
});
