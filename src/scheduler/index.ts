import cron from "node-cron";
import type { Logger } from "../logger";
import { ConfigurationError, errorMessage } from "../errors";

const MINUTES_PER_DAY = 24 * 60;

/**
 * Cron expression for "every N minutes". Minute steps reset at the top of each
 * hour, so values that don't divide 60 run slightly more often near the hour.
 */
export function minutesToCron(minutes: number): string {
  if (!Number.isInteger(minutes) || minutes < 1) {
    throw new ConfigurationError(
      `Schedule interval must be a positive whole number of minutes, got ${minutes}`,
    );
  }
  if (minutes < 60) return `*/${minutes} * * * *`;
  if (minutes === MINUTES_PER_DAY) return "0 0 * * *";
  if (minutes % 60 === 0 && minutes < MINUTES_PER_DAY) {
    return `0 */${minutes / 60} * * *`;
  }
  throw new ConfigurationError(
    `Cannot schedule every ${minutes} minutes: use 1-59, a whole number of hours, or 1440`,
  );
}

export interface SchedulerOptions {
  everyMinutes: number;
  run: () => Promise<void>;
  logger: Logger;
  timezone?: string;
}

export interface Scheduler {
  readonly expression: string;
  /** Starts a run now unless one is already in flight. */
  trigger(label: string): Promise<void>;
  /** Stops the schedule and waits for an in-flight run to finish. */
  stop(): Promise<void>;
  /** Settles once `stop()` has completed. */
  readonly done: Promise<void>;
}

export function startScheduler(options: SchedulerOptions): Scheduler {
  const { everyMinutes, run, logger, timezone } = options;
  const expression = minutesToCron(everyMinutes);

  let inFlight: Promise<void> | null = null;
  let stopped = false;
  let resolveDone: () => void = () => {};
  const done = new Promise<void>((resolve) => {
    resolveDone = resolve;
  });

  async function trigger(label: string): Promise<void> {
    if (stopped) return;
    if (inFlight) {
      logger.warn(`[LOCK] Pipeline already running — skipping ${label} run`);
      return;
    }

    logger.info(`[CRON] Starting ${label} run...`);
    inFlight = (async () => {
      try {
        await run();
        logger.info(`[CRON] ${label} run complete`);
      } catch (error) {
        logger.error(`[CRON] ${label} run failed: ${errorMessage(error)}`);
      } finally {
        inFlight = null;
      }
    })();
    await inFlight;
  }

  const task = cron.schedule(expression, () => trigger("scheduled"), {
    timezone,
  });
  logger.info(`Scheduler started: every ${everyMinutes} minute(s) (${expression})`);

  async function stop(): Promise<void> {
    if (stopped) return done;
    stopped = true;
    task.stop();
    if (inFlight) {
      logger.info("Waiting for the current run to finish...");
      await inFlight;
    }
    logger.info("Scheduler stopped");
    resolveDone();
  }

  return { expression, trigger, stop, done };
}
