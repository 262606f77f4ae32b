import fs from "node:fs";
import {
  DEFAULT_SETTINGS,
  LOG_FILE_MODES,
  OVERLAP_POLICIES,
  RESTART_ON_VALUES,
  parseChoice,
  parseFlag,
  parseKillAfterMinutes,
  parseMaxAttempts,
  type Config,
  type RawSettings,
} from "./schema.js";
import { validateSchedule } from "../cron/service.js";
import { decodeBase64, splitCommand } from "../utils/helpers.js";

const STRING_KEYS = ["schedule", "command", "tz", "logFile", "restartOn", "logFileMode", "overlap"] as const;
const NUMERIC_KEYS = ["killAfterMin", "maxAttempts"] as const;

function nonEmpty(value: string | undefined): string | undefined {
  return value !== undefined && value.trim() !== "" ? value : undefined;
}

/** Settings from the environment. CRON_EXPRESSION and CRON_CMD are base64-encoded. */
export function settingsFromEnv(env: NodeJS.ProcessEnv): RawSettings {
  const expr = nonEmpty(env.CRON_EXPRESSION);
  const cmd = nonEmpty(env.CRON_CMD);
  return {
    schedule: expr === undefined ? undefined : decodeBase64(expr, "CRON_EXPRESSION"),
    command: cmd === undefined ? undefined : decodeBase64(cmd, "CRON_CMD"),
    tz: nonEmpty(env.CRON_TZ)?.trim(),
    killAfterMin: nonEmpty(env.CRON_KILL_AFTER_MIN),
    logFile: nonEmpty(env.LOG_FILE),
    restartOnFail: nonEmpty(env.RESTART_ON_FAIL),
    restartOn: nonEmpty(env.RESTART_ON),
    maxAttempts: nonEmpty(env.CRON_MAX_ATTEMPTS),
    logFileMode: nonEmpty(env.LOG_FILE_MODE),
    overlap: nonEmpty(env.CRON_OVERLAP),
  };
}

/** Reads a JSON settings file. Values are plain text, not base64. */
export function readConfigFile(configPath: string): RawSettings {
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(configPath, "utf8"));
  } catch (err) {
    throw new Error(`Failed to load config from ${configPath}: ${String(err)}`);
  }
  if (!parsed || typeof parsed !== "object" || Array.isArray(parsed)) {
    throw new Error(`Failed to load config from ${configPath}: expected a JSON object`);
  }

  const out: RawSettings = {};
  const data = new Map<string, unknown>(Object.entries(parsed));
  for (const key of STRING_KEYS) {
    const value = data.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== "string") throw new Error(`Invalid '${key}' in ${configPath}: expected a string`);
    out[key] = value;
  }
  for (const key of NUMERIC_KEYS) {
    const value = data.get(key);
    if (value === undefined || value === null) continue;
    if (typeof value !== "string" && typeof value !== "number") throw new Error(`Invalid '${key}' in ${configPath}: expected a number`);
    out[key] = value;
  }
  const restart = data.get("restartOnFail");
  if (restart !== undefined && restart !== null) {
    if (typeof restart !== "string" && typeof restart !== "boolean") throw new Error(`Invalid 'restartOnFail' in ${configPath}: expected a boolean`);
    out.restartOnFail = restart;
  }
  return out;
}

/** Later layers win; undefined values never override. */
export function mergeSettings(...layers: RawSettings[]): RawSettings {
  const out: RawSettings = {};
  for (const layer of layers) {
    for (const [key, value] of Object.entries(layer)) {
      if (value !== undefined) Object.assign(out, { [key]: value });
    }
  }
  return out;
}

export function buildConfig(raw: RawSettings): Config {
  const settings = mergeSettings(DEFAULT_SETTINGS, raw);
  if (!settings.schedule?.trim()) throw new Error("CRON_EXPRESSION environment variable is required");
  if (!settings.command) throw new Error("CRON_CMD environment variable is required");

  const schedule = { expr: settings.schedule.trim(), tz: settings.tz?.trim() || undefined };
  validateSchedule(schedule);

  return {
    schedule,
    overlap: parseChoice(String(settings.overlap), OVERLAP_POLICIES, "CRON_OVERLAP"),
    job: {
      commandLine: settings.command,
      command: splitCommand(settings.command),
      killAfterMs: parseKillAfterMinutes(settings.killAfterMin ?? 0),
      restartOnFailure: parseFlag(settings.restartOnFail),
      restartOn: parseChoice(String(settings.restartOn), RESTART_ON_VALUES, "RESTART_ON"),
      maxAttempts: parseMaxAttempts(settings.maxAttempts ?? 0),
      logPath: settings.logFile?.trim() || null,
      logFileMode: parseChoice(String(settings.logFileMode), LOG_FILE_MODES, "LOG_FILE_MODE"),
    },
  };
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  configPath?: string;
  overrides?: RawSettings;
}

/** JSON file, then environment, then command-line overrides. */
export function loadConfig(options: LoadConfigOptions = {}): Config {
  const fromFile = options.configPath ? readConfigFile(options.configPath) : {};
  const fromEnv = settingsFromEnv(options.env ?? process.env);
  return buildConfig(mergeSettings(fromFile, fromEnv, options.overrides ?? {}));
}
