#!/usr/bin/env node
import { loadConfig, type AppConfig, type RunModeName } from "./config.js";
import { errorMessage, logger, setLogLevel } from "./logger.js";
import { startDaily } from "./agent/daily.js";
import { runOnce } from "./agent/run.js";

function resolveMode(cfg: AppConfig, argv: string[]): RunModeName {
  if (argv.includes("--once")) return "once";
  if (argv.includes("--daily")) return "daily";
  return cfg.RUN_MODE;
}

async function runDaily(cfg: AppConfig): Promise<void> {
  const runner = await startDaily(cfg);

  const shutdown = (signal: string) => {
    logger.info("shutting down", { signal });
    runner.stop().catch((err) => logger.error("shutdown failed", { error: errorMessage(err) }));
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  await runner.done;
}

async function main() {
  const cfg = loadConfig();
  setLogLevel(cfg.LOG_LEVEL);
  const mode = resolveMode(cfg, process.argv.slice(2));

  logger.info("daily-photo-poster starting", {
    mode,
    imagesDir: cfg.IMAGES_DIR,
    stateDir: cfg.STATE_DIR,
    postTimeUtc: mode === "daily" ? cfg.POST_TIME_UTC : undefined
  });

  if (mode === "once") {
    const outcome = await runOnce(cfg);
    logger.info("script finished", { outcome: outcome.status });
    return;
  }

  await runDaily(cfg);
}

main().catch((err) => {
  logger.error("fatal", { error: errorMessage(err) });
  process.exitCode = 1;
});
