import { afterEach, describe, expect, test, vi } from "vitest";
import type { Config, OverlapPolicy } from "../src/config/schema.js";
import { OutputSink } from "../src/runner/output.js";
import type { RunOutcome } from "../src/runner/types.js";
import { Supervisor } from "../src/supervisor/service.js";
import { MemoryLogger, jobConfig } from "./helpers.js";

const DONE: RunOutcome = { status: "success", totalDurationMs: 5, finalExitCode: 0, attemptsMade: 1, terminatedByDeadline: false };

function setup(overlap: OverlapPolicy, run?: () => Promise<RunOutcome>) {
  const logger = new MemoryLogger();
  const pending: Array<(outcome: RunOutcome) => void> = [];
  const config: Config = { schedule: { expr: "* * * * * *", tz: "UTC" }, job: jobConfig("true"), overlap };
  const executor = {
    sink: new OutputSink({ logPath: null, logger }),
    run: run ?? (() => new Promise<RunOutcome>((resolve) => pending.push(resolve))),
  };
  const supervisor = new Supervisor(config, { logger, executor });
  return { supervisor, logger, pending };
}

async function flush(): Promise<void> {
  for (let i = 0; i < 10; i++) await Promise.resolve();
}

afterEach(() => {
  vi.useRealTimers();
});

describe("supervisor", () => {
  test("overlapping firings run side by side by default", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const { supervisor, pending } = setup("allow");

    supervisor.start();
    vi.advanceTimersByTime(2000);
    expect(pending).toHaveLength(2);
    expect(supervisor.activeFirings).toBe(2);

    for (const resolve of pending) resolve(DONE);
    await supervisor.stop();
    expect(supervisor.activeFirings).toBe(0);
  });

  test("skip policy drops a firing while another is in flight", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const { supervisor, pending, logger } = setup("skip");

    supervisor.start();
    vi.advanceTimersByTime(2000);
    expect(pending).toHaveLength(1);
    expect(logger.matching(/^WARN Skipping firing at 2026-01-01T00:00:02\.000Z/)).toHaveLength(1);

    pending[0]?.(DONE);
    await flush();
    vi.advanceTimersByTime(1000);
    expect(pending).toHaveLength(2);

    pending[1]?.(DONE);
    await supervisor.stop();
  });

  test("stop halts the schedule and waits for running firings", async () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date("2026-01-01T00:00:00.000Z"));
    const { supervisor, pending, logger } = setup("allow");

    supervisor.start();
    vi.advanceTimersByTime(1000);
    let stopped = false;
    const stopping = supervisor.stop().then(() => {
      stopped = true;
    });
    vi.advanceTimersByTime(5000);
    await flush();
    expect(pending).toHaveLength(1);
    expect(stopped).toBe(false);

    pending[0]?.(DONE);
    await stopping;
    expect(stopped).toBe(true);
    expect(logger.lines.at(-1)).toBe("INFO Cron runner stopped");
  });

  test("a failing firing is logged and never reaches the scheduler", async () => {
    const { supervisor, logger } = setup("allow", () => Promise.reject(new Error("boom")));

    await expect(supervisor.runOnce()).resolves.toBeNull();
    expect(logger.matching(/^ERROR Firing at \S+ failed: boom$/)).toHaveLength(1);
  });

  test("runOnce returns the firing outcome", async () => {
    const { supervisor } = setup("allow", () => Promise.resolve(DONE));
    await expect(supervisor.runOnce()).resolves.toEqual(DONE);
  });
});
