import http from "node:http";
import type { AddressInfo } from "node:net";
import { URL } from "node:url";

import { errorMessage, logger } from "../logger.js";

export const LIVENESS_BODY = "Bot is alive!";

export type LivenessServerOptions = {
  bind: string;
  port: number;
};

export type LivenessServer = {
  /** Port actually bound (differs from the requested one when that was 0). */
  port: number;
  close: () => Promise<void>;
};

function sendJson(res: http.ServerResponse, statusCode: number, body: unknown): void {
  const json = JSON.stringify(body);
  res.statusCode = statusCode;
  res.setHeader("content-type", "application/json; charset=utf-8");
  res.end(json);
}

function sendText(res: http.ServerResponse, statusCode: number, body: string): void {
  res.statusCode = statusCode;
  res.setHeader("content-type", "text/plain; charset=utf-8");
  res.end(body);
}

function handle(req: http.IncomingMessage, res: http.ServerResponse): void {
  const u = new URL(req.url ?? "/", `http://${req.headers.host ?? "localhost"}`);
  const known = u.pathname === "/" || u.pathname === "/healthz";
  if (!known) return sendText(res, 404, "not found");

  if (req.method !== "GET" && req.method !== "HEAD") {
    res.setHeader("allow", "GET, HEAD");
    return sendText(res, 405, "method not allowed");
  }

  if (u.pathname === "/healthz") {
    return sendJson(res, 200, { ok: true });
  }
  return sendText(res, 200, LIVENESS_BODY);
}

/**
 * Liveness endpoint for external uptime monitors. Reads nothing from the
 * scheduler; it only answers while the process is up.
 */
export async function startLivenessServer(opts: LivenessServerOptions): Promise<LivenessServer> {
  const server = http.createServer((req, res) => {
    try {
      handle(req, res);
    } catch (err) {
      logger.warn("liveness request failed", { error: errorMessage(err) });
      sendText(res, 500, "internal error");
    }
  });

  await new Promise<void>((resolve, reject) => {
    server.once("error", reject);
    server.listen(opts.port, opts.bind, () => {
      server.off("error", reject);
      resolve();
    });
  });

  const address = server.address();
  const port = isAddressInfo(address) ? address.port : opts.port;
  logger.info("liveness server listening", { bind: opts.bind, port });

  return {
    port,
    close: async () => {
      await new Promise<void>((resolve, reject) => {
        server.close((err) => (err ? reject(err) : resolve()));
        server.closeIdleConnections();
      });
    }
  };
}

function isAddressInfo(a: string | AddressInfo | null): a is AddressInfo {
  return a !== null && typeof a === "object";
}
