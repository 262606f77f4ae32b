import { describe, expect, test } from "vitest";
import { createDeadline, remainingBudget } from "../src/runner/deadline.js";

describe("timeout gate", () => {
  test("no kill-after means no deadline", () => {
    expect(createDeadline(1000, null)).toBeNull();
    expect(createDeadline(1000, 0)).toBeNull();
    expect(remainingBudget(null, 999_999)).toEqual({ kind: "unbounded" });
  });

  test("deadline is anchored at the firing start", () => {
    expect(createDeadline(1000, 60_000)).toEqual({ startMs: 1000, limitMs: 60_000, atMs: 61_000 });
  });

  test("budget shrinks as time passes and is shared across attempts", () => {
    const deadline = createDeadline(1000, 5000);
    expect(remainingBudget(deadline, 1000)).toEqual({ kind: "remaining", ms: 5000 });
    expect(remainingBudget(deadline, 4500)).toEqual({ kind: "remaining", ms: 1500 });
  });

  test("zero or negative budget is expired", () => {
    const deadline = createDeadline(1000, 5000);
    expect(remainingBudget(deadline, 6000)).toEqual({ kind: "expired" });
    expect(remainingBudget(deadline, 7000)).toEqual({ kind: "expired" });
  });
});
