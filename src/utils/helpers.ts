const BASE64 = /^[A-Za-z0-9+/]*={0,2}$/;

/** Splits a command line on runs of whitespace. Quotes and shell operators are not interpreted. */
export function splitCommand(commandLine: string): string[] {
  return commandLine.split(/\s+/).filter((part) => part.length > 0);
}

/** Formats milliseconds as `250ms`, `1.5s`, `2m3.25s` or `1h0m5s`. */
export function formatDuration(ms: number): string {
  const total = Math.max(0, Math.round(ms));
  if (total < 1000) return `${total}ms`;
  const hours = Math.floor(total / 3_600_000);
  const minutes = Math.floor((total % 3_600_000) / 60_000);
  const seconds = `${Number(((total % 60_000) / 1000).toFixed(3))}s`;
  if (hours) return `${hours}h${minutes}m${seconds}`;
  if (minutes) return `${minutes}m${seconds}`;
  return seconds;
}

export function decodeBase64(value: string, name: string): string {
  const trimmed = value.trim();
  if (trimmed.length % 4 !== 0 || !BASE64.test(trimmed)) throw new Error(`Failed to decode ${name}: not valid base64`);
  return Buffer.from(trimmed, "base64").toString("utf8");
}

export function encodeBase64(value: string): string {
  return Buffer.from(value, "utf8").toString("base64");
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
