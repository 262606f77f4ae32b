import type { CronSchedule } from "../cron/types.js";

export type RestartOn = "failure" | "timeout";
export type LogFileMode = "per-attempt" | "persistent";
export type OverlapPolicy = "allow" | "skip";

export const RESTART_ON_VALUES: readonly RestartOn[] = ["failure", "timeout"];
export const LOG_FILE_MODES: readonly LogFileMode[] = ["per-attempt", "persistent"];
export const OVERLAP_POLICIES: readonly OverlapPolicy[] = ["allow", "skip"];

/** Everything one firing needs. Built once at startup and shared read-only by every firing. */
export interface JobConfig {
  commandLine: string;
  command: readonly string[];
  killAfterMs: number | null;
  restartOnFailure: boolean;
  restartOn: RestartOn;
  /** 0 means no cap. */
  maxAttempts: number;
  logPath: string | null;
  logFileMode: LogFileMode;
}

export interface Config {
  schedule: CronSchedule;
  job: JobConfig;
  overlap: OverlapPolicy;
}

/**
 * Plain-text settings as they arrive from a JSON config file, the environment
 * or the command line, before validation.
 */
export interface RawSettings {
  schedule?: string;
  command?: string;
  tz?: string;
  killAfterMin?: string | number;
  logFile?: string;
  restartOnFail?: string | boolean;
  restartOn?: string;
  maxAttempts?: string | number;
  logFileMode?: string;
  overlap?: string;
}

export const DEFAULT_SETTINGS = {
  killAfterMin: 0,
  restartOnFail: false,
  restartOn: "failure",
  maxAttempts: 0,
  logFileMode: "per-attempt",
  overlap: "allow",
} as const satisfies RawSettings;

const TRUTHY = new Set(["1", "true", "yes", "y"]);

export function parseFlag(value: string | boolean | undefined): boolean {
  if (typeof value === "boolean") return value;
  if (value === undefined) return false;
  return TRUTHY.has(value.trim().toLowerCase());
}

export function parseChoice<T extends string>(value: string, allowed: readonly T[], name: string): T {
  const normalized = value.trim().toLowerCase();
  const match = allowed.find((candidate) => candidate === normalized);
  if (!match) throw new Error(`Invalid ${name} value '${value}': expected one of ${allowed.join(", ")}`);
  return match;
}

/** Minutes may be fractional. Zero means no deadline. */
export function parseKillAfterMinutes(value: string | number): number | null {
  const minutes = typeof value === "number" ? value : Number(value.trim());
  if (typeof value === "string" && value.trim() === "") return null;
  if (!Number.isFinite(minutes) || minutes < 0) throw new Error(`Invalid CRON_KILL_AFTER_MIN value: '${value}'`);
  return minutes > 0 ? Math.round(minutes * 60_000) : null;
}

export function parseMaxAttempts(value: string | number): number {
  const n = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(n) || n < 0) throw new Error(`Invalid CRON_MAX_ATTEMPTS value: '${value}'`);
  return n;
}
