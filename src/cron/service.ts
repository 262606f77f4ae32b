import parser from "cron-parser";
import type { CronExpression } from "cron-parser";
import type { CronSchedule } from "./types.js";

/** setTimeout overflows past 2^31-1 ms; longer waits are chained. */
const MAX_TIMER_DELAY_MS = 2_147_483_647;

function nowMs(): number { return Date.now(); }

function parse(schedule: CronSchedule, from: number): CronExpression {
  return parser.parseExpression(schedule.expr, { currentDate: new Date(from), tz: schedule.tz });
}

export function validateSchedule(schedule: CronSchedule): void {
  if (schedule.tz) {
    try {
      new Intl.DateTimeFormat("en-US", { timeZone: schedule.tz });
    } catch {
      throw new Error(`unknown timezone '${schedule.tz}'`);
    }
  }
  try {
    parse(schedule, nowMs()).next();
  } catch (err) {
    throw new Error(`invalid cron expression '${schedule.expr}': ${err instanceof Error ? err.message : String(err)}`);
  }
}

/**
 * Fires `onFire` at every instant matching one cron schedule. Firings are not
 * awaited: a slow firing never delays the next one.
 */
export class CronService {
  private timer: NodeJS.Timeout | null = null;
  private running = false;
  private iterator: CronExpression | null = null;
  private nextAtMs: number | null = null;

  constructor(private readonly schedule: CronSchedule, private readonly onFire: (firedAt: Date) => void) {
    validateSchedule(schedule);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.iterator = parse(this.schedule, nowMs());
    this.nextAtMs = this.advance(nowMs());
    this.armTimer();
  }

  stop(): void {
    this.running = false;
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    this.iterator = null;
    this.nextAtMs = null;
  }

  /** Upcoming instants after `from`, without touching the running timer. */
  nextRuns(count: number, from: Date = new Date()): Date[] {
    const it = parse(this.schedule, from.getTime());
    const out: Date[] = [];
    while (out.length < count && it.hasNext()) out.push(it.next().toDate());
    return out;
  }

  status(): { running: boolean; schedule: CronSchedule; nextRunAtMs: number | null } {
    return { running: this.running, schedule: this.schedule, nextRunAtMs: this.nextAtMs };
  }

  /** Next instant strictly after `after`; instants missed while suspended are dropped. */
  private advance(after: number): number | null {
    if (!this.iterator) return null;
    while (this.iterator.hasNext()) {
      const at = this.iterator.next().toDate().getTime();
      if (at > after) return at;
    }
    return null;
  }

  private armTimer(): void {
    if (this.timer) clearTimeout(this.timer);
    this.timer = null;
    if (!this.running || this.nextAtMs === null) return;
    const delay = Math.max(0, this.nextAtMs - nowMs());
    this.timer = setTimeout(() => this.onTimer(), Math.min(delay, MAX_TIMER_DELAY_MS));
  }

  private onTimer(): void {
    if (!this.running || this.nextAtMs === null) return;
    const now = nowMs();
    if (now < this.nextAtMs) {
      this.armTimer();
      return;
    }
    const firedAt = new Date(this.nextAtMs);
    this.nextAtMs = this.advance(now);
    this.armTimer();
    this.onFire(firedAt);
  }
}
