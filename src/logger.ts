export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

let minLevel: LogLevel = "info";

function ts() {
  return new Date().toISOString();
}

export function setLogLevel(level: LogLevel): void {
  minLevel = level;
}

export const logger = {
  debug: (msg: string, meta?: Record<string, unknown>) => log("debug", msg, meta),
  info: (msg: string, meta?: Record<string, unknown>) => log("info", msg, meta),
  warn: (msg: string, meta?: Record<string, unknown>) => log("warn", msg, meta),
  error: (msg: string, meta?: Record<string, unknown>) => log("error", msg, meta)
};

/**
 * Message of an unknown thrown value, for log metadata.
 */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

function log(level: LogLevel, msg: string, meta?: Record<string, unknown>) {
  if (LEVEL_RANK[level] < LEVEL_RANK[minLevel]) return;
  const base = { ts: ts(), level, msg };
  const out = meta ? { ...base, ...meta } : base;
  // JSON line logs; warn and error go to stderr.
  const line = JSON.stringify(out);
  if (level === "warn" || level === "error") console.error(line);
  else console.log(line);
}
