/**
 * Environment-driven runtime settings.
 *
 *   PCOPY_LOG_LEVEL=debug|info|warn|error   (default: info)
 *   PCOPY_LOG_FILE=/tmp/pcopy.ndjson        (NDJSON copy of every log event)
 *   PCOPY_BLOCK_SIZE=<bytes>                (default: 32 MiB)
 *   PCOPY_PARALLEL_THRESHOLD=<bytes>        (default: 64 MiB)
 *   PCOPY_BUFFER_SIZE=<bytes>               (default: 16 MiB)
 *   PCOPY_CONFIG_PATH=<file>                (default: ~/.config/pcopy/config.json)
 *   NO_COLOR=1
 */

import {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_PARALLEL_THRESHOLD,
  type LogLevel,
  isLogLevel,
} from "@pcopy/core";
import { homedir } from "node:os";
import { join } from "node:path";

export type Env = Readonly<Record<string, string | undefined>>;

export type RuntimeSettings = Readonly<{
  logLevel: LogLevel;
  logFile: string | null;
  blockSize: number;
  parallelThreshold: number;
  bufferSize: number;
  configPath: string;
  noColor: boolean;
}>;

export function readEnv(env: Env, name: string): string | null {
  const raw = env[name];
  if (typeof raw !== "string") return null;
  const value = raw.trim();
  return value.length > 0 ? value : null;
}

export function envFlag(env: Env, name: string, fallback = false): boolean {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const norm = value.toLowerCase();
  return norm === "1" || norm === "true" || norm === "yes" || norm === "on";
}

export function envPositiveInt(env: Env, name: string, fallback: number): number {
  const value = readEnv(env, name);
  if (value === null) return fallback;
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || !Number.isInteger(parsed) || parsed <= 0) return fallback;
  return parsed;
}

export function defaultConfigPath(home: string = homedir()): string {
  return join(home, ".config", "pcopy", "config.json");
}

export function resolveRuntimeSettings(env: Env = process.env): RuntimeSettings {
  const level = readEnv(env, "PCOPY_LOG_LEVEL")?.toLowerCase() ?? "info";
  return Object.freeze({
    logLevel: isLogLevel(level) ? level : "info",
    logFile: readEnv(env, "PCOPY_LOG_FILE"),
    blockSize: envPositiveInt(env, "PCOPY_BLOCK_SIZE", DEFAULT_BLOCK_SIZE),
    parallelThreshold: envPositiveInt(env, "PCOPY_PARALLEL_THRESHOLD", DEFAULT_PARALLEL_THRESHOLD),
    bufferSize: envPositiveInt(env, "PCOPY_BUFFER_SIZE", DEFAULT_BUFFER_SIZE),
    configPath: readEnv(env, "PCOPY_CONFIG_PATH") ?? defaultConfigPath(),
    // Any non-empty NO_COLOR value disables color.
    noColor: readEnv(env, "NO_COLOR") !== null,
  });
}
