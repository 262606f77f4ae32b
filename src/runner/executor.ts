import type { JobConfig } from "../config/schema.js";
import type { Logger } from "../utils/logger.js";
import { formatDuration } from "../utils/helpers.js";
import { createDeadline, remainingBudget } from "./deadline.js";
import { OutputSink } from "./output.js";
import { runProcess as defaultRunProcess, type ProcessRunner } from "./process.js";
import { classifyAttempt, decideRetry, type RetryPolicy } from "./retry.js";
import type { ProcessResult, RunAttempt, RunOutcome, RunStatus } from "./types.js";

export interface JobExecutorOptions {
  logger: Logger;
  /** Shared by every firing of the job; built from the job's log settings when omitted. */
  sink?: OutputSink;
  runProcess?: ProcessRunner;
  now?: () => number;
  onAttempt?: (attempt: RunAttempt) => void;
}

const STATUS_BY_KIND: Record<RunAttempt["kind"], RunStatus> = {
  success: "success",
  failure: "failed",
  timeout: "timeout",
};

/**
 * Turns one firing into supervised attempts: the deadline is fixed when the
 * firing starts, each attempt runs to completion before the next, and the
 * retry policy decides whether another one follows.
 */
export class JobExecutor {
  readonly sink: OutputSink;
  private readonly logger: Logger;
  private readonly runProcess: ProcessRunner;
  private readonly now: () => number;
  private readonly policy: RetryPolicy;

  constructor(private readonly job: JobConfig, private readonly options: JobExecutorOptions) {
    this.logger = options.logger;
    this.sink = options.sink ?? new OutputSink({ logPath: job.logPath, mode: job.logFileMode, logger: options.logger });
    this.runProcess = options.runProcess ?? defaultRunProcess;
    this.now = options.now ?? Date.now;
    this.policy = { restartOnFailure: job.restartOnFailure, restartOn: job.restartOn, maxAttempts: job.maxAttempts };
  }

  async run(): Promise<RunOutcome> {
    const argv = this.job.command;
    this.logger.info(`Executing command: ${this.job.commandLine}`);
    if (argv.length === 0) {
      this.logger.info("Empty command, skipping execution");
      return { status: "skipped", totalDurationMs: 0, finalExitCode: null, attemptsMade: 0, terminatedByDeadline: false };
    }

    const start = this.now();
    const deadline = createDeadline(start, this.job.killAfterMs);
    if (deadline) {
      this.logger.info(`Hard kill deadline set for ${new Date(deadline.atMs).toISOString()} (limit: ${formatDuration(deadline.limitMs)})`);
    }

    let last: RunAttempt | null = null;
    let refused = false;
    for (let attemptNumber = 1; ; attemptNumber++) {
      const budget = remainingBudget(deadline, this.now());
      if (budget.kind === "expired") {
        this.logger.warn(`Kill deadline reached; not starting attempt ${attemptNumber}`);
        refused = true;
        break;
      }

      const startedAt = new Date(this.now());
      this.logger.info(`Starting attempt ${attemptNumber}${budget.kind === "remaining" ? ` (budget ${formatDuration(budget.ms)})` : ""}`);
      const output = this.sink.beginAttempt();
      let result: ProcessResult;
      try {
        result = await this.runProcess(argv, output, budget.kind === "remaining" ? budget.ms : null);
      } catch (err) {
        const error = err instanceof Error ? err : new Error(String(err));
        result = { exitCode: -1, killedByTimeout: false, error, durationMs: this.now() - startedAt.getTime() };
      }
      const elapsedMs = this.now() - start;
      output.finish({ exitCode: result.exitCode, durationMs: elapsedMs, attemptDurationMs: result.durationMs, killedByTimeout: result.killedByTimeout });

      last = {
        attemptNumber,
        startedAt,
        exitCode: result.exitCode,
        wasKilledByTimeout: result.killedByTimeout,
        err: result.error,
        durationMs: result.durationMs,
        elapsedMs,
        kind: classifyAttempt(result),
      };
      this.options.onAttempt?.(last);
      this.logAttempt(last);

      if (decideRetry(last.kind, attemptNumber, this.policy) === "stop") break;
      this.logger.info(`RESTART_ON_FAIL is enabled (restart on ${this.job.restartOn}); restarting command as attempt ${attemptNumber + 1}`);
    }

    const outcome: RunOutcome = {
      status: last ? STATUS_BY_KIND[last.kind] : "timeout",
      totalDurationMs: this.now() - start,
      finalExitCode: last ? last.exitCode : null,
      attemptsMade: last ? last.attemptNumber : 0,
      terminatedByDeadline: refused || (last?.wasKilledByTimeout ?? false),
    };
    this.logger.info(
      `Command completed: status=${outcome.status} attempts=${outcome.attemptsMade} exit=${outcome.finalExitCode ?? "none"} ` +
        `duration=${formatDuration(outcome.totalDurationMs)} deadline_exceeded=${outcome.terminatedByDeadline}`,
    );
    return outcome;
  }

  private logAttempt(attempt: RunAttempt): void {
    const detail =
      `attempt=${attempt.attemptNumber} exit=${attempt.exitCode} duration=${formatDuration(attempt.elapsedMs)} ` +
      `attempt_duration=${formatDuration(attempt.durationMs)} killed=${attempt.wasKilledByTimeout}`;
    if (attempt.kind === "success") this.logger.info(`Command exited: ${detail}`);
    else if (attempt.kind === "timeout") this.logger.warn(`Command timed out; hard deadline reached: ${detail}`);
    else if (attempt.err) this.logger.error(`Command failed to start: ${detail} error=${attempt.err.message}`);
    else this.logger.warn(`Command failed: ${detail}`);
  }
}
