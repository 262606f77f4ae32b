import fs from "node:fs";
import type { LogFileMode } from "../config/schema.js";
import type { Logger } from "../utils/logger.js";
import { errorMessage, formatDuration } from "../utils/helpers.js";
import type { AttemptOutput, AttemptSummary, OutputTarget } from "./types.js";

export interface OutputSinkOptions {
  logPath: string | null;
  mode?: LogFileMode;
  logger: Logger;
  stdout?: OutputTarget;
  stderr?: OutputTarget;
  now?: () => Date;
}

export function startMarker(at: Date): string {
  return `===== RUN START ${at.toISOString()} =====\n`;
}

export function endMarker(at: Date, summary: AttemptSummary): string {
  const killed = summary.killedByTimeout ? " killed=timeout" : "";
  return `===== RUN END ${at.toISOString()} exit=${summary.exitCode} duration=${formatDuration(summary.durationMs)} attempt=${formatDuration(summary.attemptDurationMs)}${killed} =====\n\n`;
}

function writeAll(fd: number, data: Buffer): void {
  let offset = 0;
  while (offset < data.length) offset += fs.writeSync(fd, data, offset, data.length - offset);
}

/**
 * Resolves where an attempt's output goes. With a log path the child's bytes
 * are teed into the file between a RUN START and a RUN END marker; the file
 * is reopened for every attempt unless the mode is "persistent".
 */
export class OutputSink {
  private readonly mode: LogFileMode;
  private readonly stdout: OutputTarget;
  private readonly stderr: OutputTarget;
  private readonly now: () => Date;
  private persistentFd: number | null = null;

  constructor(private readonly options: OutputSinkOptions) {
    this.mode = options.mode ?? "per-attempt";
    this.stdout = options.stdout ?? process.stdout;
    this.stderr = options.stderr ?? process.stderr;
    this.now = options.now ?? (() => new Date());
  }

  beginAttempt(): AttemptOutput {
    const fd = this.openLog();
    if (fd === null) return { stdout: this.stdout, stderr: this.stderr, finish: () => undefined };

    let writable = true;
    const toFile = (data: Buffer) => {
      if (!writable) return;
      try {
        writeAll(fd, data);
      } catch (err) {
        writable = false;
        this.options.logger.warn(`Failed to write LOG_FILE '${this.options.logPath}': ${errorMessage(err)}`);
      }
    };
    const tee = (target: OutputTarget): OutputTarget => ({
      write: (chunk: Buffer) => {
        target.write(chunk);
        toFile(chunk);
      },
    });

    toFile(Buffer.from(startMarker(this.now())));
    let finished = false;
    return {
      stdout: tee(this.stdout),
      stderr: tee(this.stderr),
      finish: (summary) => {
        if (finished) return;
        finished = true;
        toFile(Buffer.from(endMarker(this.now(), summary)));
        if (this.mode === "per-attempt") this.closeFd(fd);
      },
    };
  }

  /** Releases the handle held in persistent mode. */
  close(): void {
    if (this.persistentFd === null) return;
    this.closeFd(this.persistentFd);
    this.persistentFd = null;
  }

  private openLog(): number | null {
    const logPath = this.options.logPath;
    if (!logPath) return null;
    if (this.mode === "persistent" && this.persistentFd !== null) return this.persistentFd;
    try {
      const fd = fs.openSync(logPath, "a", 0o644);
      if (this.mode === "persistent") this.persistentFd = fd;
      return fd;
    } catch (err) {
      this.options.logger.warn(`Failed to open LOG_FILE '${logPath}' for this run: ${errorMessage(err)}`);
      return null;
    }
  }

  private closeFd(fd: number): void {
    try {
      fs.closeSync(fd);
    } catch (err) {
      this.options.logger.warn(`Failed to close LOG_FILE '${this.options.logPath}': ${errorMessage(err)}`);
    }
  }
}
