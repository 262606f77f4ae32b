import { spawn, type ChildProcess } from "node:child_process";
import os from "node:os";
import type { OutputTarget, ProcessResult } from "./types.js";

export interface ProcessOutput {
  stdout: OutputTarget;
  stderr: OutputTarget;
}

export type ProcessRunner = (argv: readonly string[], output: ProcessOutput, budgetMs: number | null) => Promise<ProcessResult>;

const SIGNAL_NUMBERS: Partial<Record<NodeJS.Signals, number>> = os.constants.signals;

function signalExitCode(signal: NodeJS.Signals | null): number {
  const num = signal ? SIGNAL_NUMBERS[signal] : undefined;
  return num === undefined ? -1 : 128 + num;
}

/** SIGKILL to the child's whole process group, so processes it started go too. */
function killGroup(child: ChildProcess): void {
  if (child.pid === undefined) return;
  try {
    process.kill(-child.pid, "SIGKILL");
  } catch {
    // No group (already reaped, or a platform without groups): kill the child alone.
    child.kill("SIGKILL");
  }
}

/**
 * Runs one attempt: `argv[0]` with the remaining tokens as arguments, no shell.
 * The child leads its own process group. Output is forwarded chunk by chunk as
 * it arrives. When `budgetMs` elapses the group gets SIGKILL and the attempt
 * ends as soon as the child is gone, even if a descendant still holds the
 * pipes. Always resolves.
 */
export const runProcess: ProcessRunner = (argv, output, budgetMs) => {
  const started = Date.now();
  return new Promise<ProcessResult>((resolve) => {
    let timer: NodeJS.Timeout | null = null;
    let timedOut = false;
    let settled = false;

    const settle = (result: Omit<ProcessResult, "durationMs">) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      resolve({ ...result, durationMs: Date.now() - started });
    };

    let child: ChildProcess;
    try {
      child = spawn(argv[0] ?? "", argv.slice(1), { stdio: ["ignore", "pipe", "pipe"], detached: true });
    } catch (err) {
      settle({ exitCode: -1, killedByTimeout: false, error: err instanceof Error ? err : new Error(String(err)) });
      return;
    }

    const exitResult = () => ({ exitCode: child.exitCode ?? signalExitCode(child.signalCode), killedByTimeout: false, error: null });
    const release = () => {
      child.stdout?.destroy();
      child.stderr?.destroy();
    };

    child.stdout?.on("data", (chunk: Buffer) => output.stdout.write(chunk));
    child.stderr?.on("data", (chunk: Buffer) => output.stderr.write(chunk));

    child.on("error", (error) => {
      // A child that got a pid is already running; its "exit" still follows.
      if (child.pid === undefined) settle({ exitCode: -1, killedByTimeout: false, error });
    });

    child.on("exit", () => {
      if (!timedOut) return;
      release();
      settle({ exitCode: -1, killedByTimeout: true, error: null });
    });

    child.on("close", () => {
      if (timedOut) settle({ exitCode: -1, killedByTimeout: true, error: null });
      else settle(exitResult());
    });

    if (budgetMs !== null) {
      timer = setTimeout(() => {
        timer = null;
        const exited = child.exitCode !== null || child.signalCode !== null;
        killGroup(child);
        if (exited) {
          // The child finished in time; only descendants were holding the pipes.
          release();
          settle(exitResult());
          return;
        }
        timedOut = true;
      }, Math.max(0, budgetMs));
    }
  });
};
