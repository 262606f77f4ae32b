import type { RestartOn } from "../config/schema.js";
import type { AttemptKind, ProcessResult } from "./types.js";

export interface RetryPolicy {
  restartOnFailure: boolean;
  restartOn: RestartOn;
  /** 0 means no cap. */
  maxAttempts: number;
}

export type RetryDecision = "continue" | "stop";

export function classifyAttempt(result: Pick<ProcessResult, "exitCode" | "killedByTimeout" | "error">): AttemptKind {
  if (result.killedByTimeout) return "timeout";
  if (result.error || result.exitCode !== 0) return "failure";
  return "success";
}

/**
 * With `restartOn: "failure"` failed attempts are re-run and deadline kills
 * end the firing. `restartOn: "timeout"` inverts that; the re-run is then
 * refused by the deadline gate since the budget is already spent.
 */
export function decideRetry(kind: AttemptKind, attemptNumber: number, policy: RetryPolicy): RetryDecision {
  if (kind === "success" || !policy.restartOnFailure) return "stop";
  if (policy.maxAttempts > 0 && attemptNumber >= policy.maxAttempts) return "stop";
  const wanted: AttemptKind = policy.restartOn === "timeout" ? "timeout" : "failure";
  return kind === wanted ? "continue" : "stop";
}
