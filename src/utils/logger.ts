import chalk, { Chalk, type ChalkInstance } from "chalk";

/** Diagnostic channel of the supervisor itself. Job output never goes through it. */
export interface Logger {
  info(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export type LogLevel = "info" | "warn" | "error";

export interface LoggerOptions {
  stream?: { write(text: string): unknown };
  color?: boolean;
  now?: () => Date;
}

const LEVEL_STYLE: Record<LogLevel, (c: ChalkInstance) => ChalkInstance> = {
  info: (c) => c.cyan,
  warn: (c) => c.yellow,
  error: (c) => c.red,
};

/** Lines look like `2026-01-01T00:00:00.000Z INFO  message`, level coloured when the stream supports it. */
export function createLogger(options: LoggerOptions = {}): Logger {
  const stream = options.stream ?? process.stderr;
  const now = options.now ?? (() => new Date());
  const painter = new Chalk({ level: options.color === false ? 0 : chalk.level });

  const write = (level: LogLevel, message: string) => {
    const tag = LEVEL_STYLE[level](painter)(level.toUpperCase().padEnd(5));
    stream.write(`${painter.gray(now().toISOString())} ${tag} ${message}\n`);
  };

  return {
    info: (message) => write("info", message),
    warn: (message) => write("warn", message),
    error: (message) => write("error", message),
  };
}
