import type { AppConfig } from "../config.js";
import { logger } from "../logger.js";
import { startLivenessServer } from "../control/server.js";
import type { InterruptibleSleep } from "../utils.js";
import { runOnce } from "./run.js";
import { createDailyScheduler, parseTimeOfDay } from "./schedule.js";

export type DailyDeps = {
  task?: () => Promise<void>;
  now?: () => Date;
  sleep?: (ms: number) => InterruptibleSleep;
};

export type DailyRunner = {
  /** Port the liveness server bound. */
  port: number;
  /** Settles once the scheduler has exited and the server is closed. */
  done: Promise<void>;
  stop(): Promise<void>;
};

/**
 * Daily mode: liveness server plus the scheduler. The server stays up until
 * the scheduler loop exits, including while a run is in flight.
 */
export async function startDaily(cfg: AppConfig, deps: DailyDeps = {}): Promise<DailyRunner> {
  const at = parseTimeOfDay(cfg.POST_TIME_UTC);
  const server = await startLivenessServer({ bind: cfg.BIND, port: cfg.PORT });

  const task =
    deps.task ??
    (async () => {
      const outcome = await runOnce(cfg);
      logger.info("scheduled run finished", { outcome: outcome.status });
    });

  const scheduler = createDailyScheduler({ at, task, now: deps.now, sleep: deps.sleep });

  const done = (async () => {
    try {
      await scheduler.start();
    } finally {
      await server.close();
    }
  })();

  return {
    port: server.port,
    done,
    stop: async () => {
      scheduler.stop();
      await done;
    }
  };
}
