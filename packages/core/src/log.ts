export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogEvent = Readonly<{
  level: LogLevel;
  message: string;
  path?: string;
}>;

export type LogSink = (event: LogEvent) => void;

const LEVEL_RANK: Readonly<Record<LogLevel, number>> = Object.freeze({
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
});

export function isLogLevel(value: string): value is LogLevel {
  return value === "debug" || value === "info" || value === "warn" || value === "error";
}

export function levelEnabled(level: LogLevel, minLevel: LogLevel): boolean {
  return LEVEL_RANK[level] >= LEVEL_RANK[minLevel];
}

export const noopLogSink: LogSink = () => {};

export function makeLogSink(log: LogSink | undefined): LogSink {
  if (typeof log === "function") return log;
  return noopLogSink;
}
