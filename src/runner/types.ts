/** Anything the child's bytes can be written to: a process stream, a file tee, a test collector. */
export interface OutputTarget {
  write(chunk: Buffer): unknown;
}

export interface AttemptSummary {
  exitCode: number;
  /** Time since the firing started, so retries show the budget already consumed. */
  durationMs: number;
  attemptDurationMs: number;
  killedByTimeout: boolean;
}

/** Destinations for one attempt, and the hook that closes its log bracket. */
export interface AttemptOutput {
  stdout: OutputTarget;
  stderr: OutputTarget;
  finish(summary: AttemptSummary): void;
}

export interface ProcessResult {
  /** -1 when the process never started or was killed by the deadline. */
  exitCode: number;
  killedByTimeout: boolean;
  /** Set only when the process could not be started. */
  error: Error | null;
  durationMs: number;
}

export type AttemptKind = "success" | "failure" | "timeout";

export interface RunAttempt {
  attemptNumber: number;
  startedAt: Date;
  exitCode: number;
  wasKilledByTimeout: boolean;
  err: Error | null;
  durationMs: number;
  /** Time from the firing start to the end of this attempt. */
  elapsedMs: number;
  kind: AttemptKind;
}

export type RunStatus = "success" | "failed" | "timeout" | "skipped";

export interface RunOutcome {
  status: RunStatus;
  totalDurationMs: number;
  /** null when nothing was executed. */
  finalExitCode: number | null;
  attemptsMade: number;
  terminatedByDeadline: boolean;
}
