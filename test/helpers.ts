import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import type { JobConfig } from "../src/config/schema.js";
import type { Logger } from "../src/utils/logger.js";
import { splitCommand } from "../src/utils/helpers.js";

export class MemoryLogger implements Logger {
  readonly lines: string[] = [];
  info(message: string): void { this.lines.push(`INFO ${message}`); }
  warn(message: string): void { this.lines.push(`WARN ${message}`); }
  error(message: string): void { this.lines.push(`ERROR ${message}`); }
  matching(pattern: RegExp): string[] { return this.lines.filter((line) => pattern.test(line)); }
}

export class Collector {
  private readonly chunks: Buffer[] = [];
  write(chunk: Buffer): boolean {
    this.chunks.push(Buffer.from(chunk));
    return true;
  }
  text(): string { return Buffer.concat(this.chunks).toString("utf8"); }
}

export function tempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), "cronvisor-"));
}

export function jobConfig(commandLine: string, overrides: Partial<JobConfig> = {}): JobConfig {
  return {
    commandLine,
    command: splitCommand(commandLine),
    killAfterMs: null,
    restartOnFailure: false,
    restartOn: "failure",
    maxAttempts: 0,
    logPath: null,
    logFileMode: "per-attempt",
    ...overrides,
  };
}
