import * as dotenv from "dotenv";
import { existsSync } from "node:fs";
import path from "node:path";
import { z } from "zod";
import { MissingCredentialsError } from "./errors.js";

// Load env from the working directory first, then fall back to the parent (.env) if present.
const localEnvPath = path.join(process.cwd(), ".env");
if (existsSync(localEnvPath)) dotenv.config({ path: localEnvPath });
const parentEnvPath = path.resolve(process.cwd(), "..", ".env");
if (existsSync(parentEnvPath)) dotenv.config({ path: parentEnvPath, override: false });

export const STATE_FILE_NAME = "last_posted.txt";

const RunMode = z.enum(["once", "daily"]);
const LogLevel = z.enum(["debug", "info", "warn", "error"]);

// Blank strings count as unset so `FACEBOOK_PAGE_ID=` in a .env does not pass as a credential.
const OptionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  // Credentials (only the publish path needs them)
  FACEBOOK_PAGE_ID: OptionalSecret,
  FACEBOOK_ACCESS_TOKEN: OptionalSecret,
  GRAPH_API_VERSION: z
    .string()
    .regex(/^v\d+\.\d+$/, "GRAPH_API_VERSION must look like v19.0")
    .default("v19.0"),

  // Content
  IMAGES_DIR: z.string().min(1).default("images"),
  STATE_DIR: z.string().min(1).default("data"),
  CAPTION_TEMPLATE: z.string().min(1).default("📖 Bible Story - {date}"),
  POST_TIMEOUT_SECONDS: z.coerce.number().int().positive().max(3600).default(300),

  // Trigger
  RUN_MODE: RunMode.default("once"),
  POST_TIME_UTC: z
    .string()
    .regex(/^([01]\d|2[0-3]):[0-5]\d$/, "POST_TIME_UTC must be HH:MM (24h, UTC)")
    .default("09:00"),

  // Liveness server
  PORT: z.coerce.number().int().min(0).max(65_535).default(5000),
  BIND: z.string().min(1).default("0.0.0.0"),

  LOG_LEVEL: LogLevel.default("info")
});

export type AppConfig = z.infer<typeof envSchema>;
export type RunModeName = z.infer<typeof RunMode>;

export type Credentials = {
  pageId: string;
  accessToken: string;
};

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const lines = parsed.error.issues.map((i) => `  - ${i.path.join(".")}: ${i.message}`);
    throw new Error(`Config validation errors:\n${lines.join("\n")}`);
  }
  return parsed.data;
}

/**
 * Precondition for the publish path. Runs before any network activity.
 */
export function requireCredentials(cfg: AppConfig): Credentials {
  const missing: string[] = [];
  if (!cfg.FACEBOOK_PAGE_ID) missing.push("FACEBOOK_PAGE_ID");
  if (!cfg.FACEBOOK_ACCESS_TOKEN) missing.push("FACEBOOK_ACCESS_TOKEN");
  if (!cfg.FACEBOOK_PAGE_ID || !cfg.FACEBOOK_ACCESS_TOKEN) {
    throw new MissingCredentialsError(missing);
  }
  return { pageId: cfg.FACEBOOK_PAGE_ID, accessToken: cfg.FACEBOOK_ACCESS_TOKEN };
}

export function imagesDirFromConfig(cfg: AppConfig): string {
  return path.resolve(process.cwd(), cfg.IMAGES_DIR);
}

export function statePathFromConfig(cfg: AppConfig): string {
  return path.join(path.resolve(process.cwd(), cfg.STATE_DIR), STATE_FILE_NAME);
}
