import { errorMessage, logger } from "../logger.js";
import { interruptibleSleep, type InterruptibleSleep } from "../utils.js";

export type TimeOfDay = { hour: number; minute: number };

const DAY_MS = 24 * 60 * 60 * 1000;

export function parseTimeOfDay(raw: string): TimeOfDay {
  const m = /^(\d{2}):(\d{2})$/.exec(raw.trim());
  if (!m) throw new Error(`invalid time of day "${raw}" (expected HH:MM)`);
  const hour = Number(m[1]);
  const minute = Number(m[2]);
  if (hour > 23 || minute > 59) throw new Error(`invalid time of day "${raw}" (expected HH:MM)`);
  return { hour, minute };
}

/**
 * First UTC instant at `at` strictly after `now`.
 */
export function nextDailyRun(now: Date, at: TimeOfDay): Date {
  const today = Date.UTC(now.getUTCFullYear(), now.getUTCMonth(), now.getUTCDate(), at.hour, at.minute);
  return new Date(today > now.getTime() ? today : today + DAY_MS);
}

export type DailySchedulerOptions = {
  at: TimeOfDay;
  task: () => Promise<void>;
  now?: () => Date;
  sleep?: (ms: number) => InterruptibleSleep;
};

export type DailyScheduler = {
  /** Runs until stop() is called. Resolves once the loop has exited. */
  start(): Promise<void>;
  stop(): void;
};

export function createDailyScheduler(opts: DailySchedulerOptions): DailyScheduler {
  const now = opts.now ?? (() => new Date());
  const sleep = opts.sleep ?? interruptibleSleep;

  let stopped = false;
  let current: InterruptibleSleep | null = null;

  async function start(): Promise<void> {
    let lastSlot = 0;
    while (!stopped) {
      const t = now();
      // A timer that fires a little early must not land on the slot it just ran.
      const next = nextDailyRun(new Date(Math.max(t.getTime(), lastSlot)), opts.at);
      lastSlot = next.getTime();
      const delayMs = next.getTime() - t.getTime();
      logger.info("next scheduled post", { at: next.toISOString(), inMinutes: Math.round(delayMs / 60_000) });

      current = sleep(delayMs);
      await current.promise;
      current = null;
      if (stopped) break;

      // Awaited, so a slow run can never overlap the next one.
      try {
        await opts.task();
      } catch (err) {
        logger.error("scheduled run failed", { error: errorMessage(err) });
      }
    }
    logger.info("scheduler stopped");
  }

  function stop(): void {
    stopped = true;
    current?.wake();
  }

  return { start, stop };
}
