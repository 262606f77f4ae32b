export interface Deadline {
  readonly startMs: number;
  readonly limitMs: number;
  readonly atMs: number;
}

export type Budget =
  | { kind: "unbounded" }
  | { kind: "remaining"; ms: number }
  | { kind: "expired" };

/** One per firing. Retries share it; it is never reset. */
export function createDeadline(startMs: number, killAfterMs: number | null): Deadline | null {
  if (killAfterMs === null || killAfterMs <= 0) return null;
  return { startMs, limitMs: killAfterMs, atMs: startMs + killAfterMs };
}

export function remainingBudget(deadline: Deadline | null, nowMs: number): Budget {
  if (!deadline) return { kind: "unbounded" };
  const ms = deadline.atMs - nowMs;
  return ms > 0 ? { kind: "remaining", ms } : { kind: "expired" };
}
