import {
  ANSI,
  type LogEvent,
  type LogLevel,
  type LogSink,
  levelEnabled,
  safeErr,
} from "@pcopy/core";
import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

export type LineWriter = (line: string) => void;

export type StderrLogSinkOptions = Readonly<{
  minLevel?: LogLevel;
  colors?: boolean;
  /** Defaults to `process.stderr.write`. */
  write?: LineWriter;
}>;

function prefixFor(level: LogLevel, colors: boolean): string {
  switch (level) {
    case "warn":
      return colors ? `${ANSI.yellow}Warning:${ANSI.reset} ` : "Warning: ";
    case "error":
      return colors ? `${ANSI.red}Error:${ANSI.reset} ` : "Error: ";
    case "debug":
      return colors ? `${ANSI.dim}debug:${ANSI.reset} ` : "debug: ";
    default:
      return "";
  }
}

export function formatLogLine(event: LogEvent, colors: boolean): string {
  const where = event.path !== undefined && event.level !== "info" ? ` (${event.path})` : "";
  return `${prefixFor(event.level, colors)}${event.message}${where}`;
}

/**
 * Human-facing sink. Every line starts on a fresh row so it never merges
 * with a status line drawn on the bottom row.
 */
export function createStderrLogSink(opts: StderrLogSinkOptions = {}): LogSink {
  const minLevel = opts.minLevel ?? "info";
  const colors = opts.colors ?? false;
  const write: LineWriter =
    opts.write ??
    ((line) => {
      process.stderr.write(line);
    });
  return (event) => {
    if (!levelEnabled(event.level, minLevel)) return;
    write(`\n${formatLogLine(event, colors)}\n`);
  };
}

/**
 * Appends one JSON record per event. A failed append disables the sink for
 * the rest of the process and reports once through `onError`.
 */
export function createNdjsonLogSink(
  path: string,
  opts: Readonly<{ now?: () => Date; onError?: (err: Error) => void }> = {},
): LogSink {
  const now = opts.now ?? (() => new Date());
  let broken = false;
  let dirReady = false;
  return (event) => {
    if (broken) return;
    try {
      if (!dirReady) {
        mkdirSync(dirname(path), { recursive: true });
        dirReady = true;
      }
      const record = { ts: now().toISOString(), ...event };
      appendFileSync(path, `${JSON.stringify(record)}\n`, "utf8");
    } catch (err) {
      broken = true;
      opts.onError?.(safeErr(err));
    }
  };
}

export function teeLogSinks(...sinks: readonly LogSink[]): LogSink {
  return (event) => {
    for (const sink of sinks) sink(event);
  };
}
