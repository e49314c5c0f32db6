import { beforeEach, describe, expect, it, vi } from "vitest";
import { ConfigurationError } from "../src/errors";
import { minutesToCron, startScheduler } from "../src/scheduler";
import { logger } from "./helpers";

const cronMock = vi.hoisted(() => {
  const stop = vi.fn();
  const schedule = vi.fn(
    (_expression: string, _task: () => void, _options?: { timezone?: string }) => ({
      stop,
    }),
  );
  return { schedule, stop };
});

vi.mock("node-cron", () => ({ default: { schedule: cronMock.schedule } }));

function deferredRun() {
  let release: () => void = () => {};
  const run = vi.fn(
    () =>
      new Promise<void>((resolve) => {
        release = resolve;
      }),
  );
  return { run, release: () => release() };
}

describe("minutesToCron", () => {
  it("converts supported intervals", () => {
    expect(minutesToCron(5)).toBe("*/5 * * * *");
    expect(minutesToCron(59)).toBe("*/59 * * * *");
    expect(minutesToCron(120)).toBe("0 */2 * * *");
    expect(minutesToCron(1440)).toBe("0 0 * * *");
  });

  it("rejects intervals cron cannot express", () => {
    expect(() => minutesToCron(0)).toThrow(ConfigurationError);
    expect(() => minutesToCron(90)).toThrow(
      "Cannot schedule every 90 minutes: use 1-59, a whole number of hours, or 1440",
    );
  });
});

describe("startScheduler", () => {
  beforeEach(() => {
    cronMock.schedule.mockClear();
    cronMock.stop.mockClear();
  });

  it("registers the cron task and runs it on each tick", async () => {
    const run = vi.fn(async () => {});
    const scheduler = startScheduler({ everyMinutes: 15, run, logger, timezone: "UTC" });

    expect(scheduler.expression).toBe("*/15 * * * *");
    const [expression, task, options] = cronMock.schedule.mock.calls[0];
    expect(expression).toBe("*/15 * * * *");
    expect(options).toEqual({ timezone: "UTC" });

    task();
    await vi.waitFor(() => expect(run).toHaveBeenCalledTimes(1));
    await scheduler.stop();
  });

  it("skips a trigger while a run is in flight", async () => {
    const { run, release } = deferredRun();
    const warn = vi.spyOn(logger, "warn");
    const scheduler = startScheduler({ everyMinutes: 5, run, logger });

    const first = scheduler.trigger("startup");
    await scheduler.trigger("scheduled");

    expect(run).toHaveBeenCalledTimes(1);
    expect(warn).toHaveBeenCalledWith(
      "[LOCK] Pipeline already running — skipping scheduled run",
    );

    release();
    await first;
    const second = scheduler.trigger("scheduled");
    expect(run).toHaveBeenCalledTimes(2);
    release();
    await second;
    await scheduler.stop();
  });

  it("logs a failed run and keeps the schedule", async () => {
    const run = vi.fn(async () => {
      throw new Error("sheet unavailable");
    });
    const error = vi.spyOn(logger, "error");
    const scheduler = startScheduler({ everyMinutes: 5, run, logger });

    await expect(scheduler.trigger("startup")).resolves.toBeUndefined();

    expect(error).toHaveBeenCalledWith("[CRON] startup run failed: sheet unavailable");
    await scheduler.trigger("scheduled");
    expect(run).toHaveBeenCalledTimes(2);
    await scheduler.stop();
  });

  it("waits for the current run before stopping", async () => {
    const { run, release } = deferredRun();
    const info = vi.spyOn(logger, "info");
    const scheduler = startScheduler({ everyMinutes: 5, run, logger });

    const inFlight = scheduler.trigger("startup");
    const stopping = scheduler.stop();

    expect(cronMock.stop).toHaveBeenCalledTimes(1);
    expect(info).toHaveBeenCalledWith("Waiting for the current run to finish...");

    release();
    await inFlight;
    await stopping;
    await expect(scheduler.done).resolves.toBeUndefined();

    await scheduler.trigger("scheduled");
    expect(run).toHaveBeenCalledTimes(1);
  });
});
