import { describe, expect, test } from "vitest";
import { decodeBase64, encodeBase64, formatDuration, splitCommand } from "../src/utils/helpers.js";
import { createLogger } from "../src/utils/logger.js";
import { exitCodeFor } from "../src/cli/commands.js";

describe("helpers", () => {
  test("splits commands on any whitespace", () => {
    expect(splitCommand("  /usr/bin/backup   --full\t--quiet\n")).toEqual(["/usr/bin/backup", "--full", "--quiet"]);
    expect(splitCommand("sh -c 'a b'")).toEqual(["sh", "-c", "'a", "b'"]);
    expect(splitCommand(" \t ")).toEqual([]);
  });

  test("formats durations", () => {
    expect(formatDuration(0)).toBe("0ms");
    expect(formatDuration(250)).toBe("250ms");
    expect(formatDuration(1500)).toBe("1.5s");
    expect(formatDuration(60_000)).toBe("1m0s");
    expect(formatDuration(123_250)).toBe("2m3.25s");
    expect(formatDuration(3_723_004)).toBe("1h2m3.004s");
    expect(formatDuration(-5)).toBe("0ms");
  });

  test("base64 helpers", () => {
    expect(encodeBase64("0 */5 * * * *")).toBe("MCAqLzUgKiAqICogKg==");
    expect(decodeBase64("MCAqLzUgKiAqICogKg==", "CRON_EXPRESSION")).toBe("0 */5 * * * *");
    expect(() => decodeBase64("abc", "CRON_CMD")).toThrow("Failed to decode CRON_CMD: not valid base64");
  });
});

describe("logger", () => {
  test("writes timestamped level lines without colour", () => {
    const lines: string[] = [];
    const logger = createLogger({ stream: { write: (text: string) => lines.push(text) }, color: false, now: () => new Date("2026-02-03T04:05:06.007Z") });
    logger.info("started");
    logger.warn("careful");
    logger.error("broken");
    expect(lines).toEqual([
      "2026-02-03T04:05:06.007Z INFO  started\n",
      "2026-02-03T04:05:06.007Z WARN  careful\n",
      "2026-02-03T04:05:06.007Z ERROR broken\n",
    ]);
  });
});

describe("once exit codes", () => {
  const base = { totalDurationMs: 1, attemptsMade: 1, terminatedByDeadline: false };

  test("maps outcomes to process exit codes", () => {
    expect(exitCodeFor({ ...base, status: "success", finalExitCode: 0 })).toBe(0);
    expect(exitCodeFor({ ...base, status: "skipped", finalExitCode: null, attemptsMade: 0 })).toBe(0);
    expect(exitCodeFor({ ...base, status: "failed", finalExitCode: 3 })).toBe(3);
    expect(exitCodeFor({ ...base, status: "failed", finalExitCode: -1 })).toBe(1);
    expect(exitCodeFor({ ...base, status: "timeout", finalExitCode: -1, terminatedByDeadline: true })).toBe(1);
    expect(exitCodeFor(null)).toBe(1);
  });
});
