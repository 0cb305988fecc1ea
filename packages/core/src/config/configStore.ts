/**
 * Process-wide tool state (speed samples, benchmark outcome) behind an
 * explicit store object. Read once lazily, written back on every update.
 * Persistence failures degrade to "no learning this run" and are only logged.
 */

import { safeErr } from "../errors.js";
import { type LogSink, makeLogSink } from "../log.js";

export const MAX_SPEED_SAMPLES = 10;

export type PersistedConfig = Readonly<{
  copySpeedsMbps: readonly number[];
  removeSpeedsMbps: readonly number[];
  optimalParallelWorkers: number | null;
  benchmarkDate: string | null;
  /** Average trial seconds keyed by worker count. */
  benchmarkResults: Readonly<Record<string, number>>;
}>;

export type ConfigBackend = Readonly<{
  /** Human-readable location, used in messages. */
  location: string;
  /** Raw persisted value, or `undefined` when nothing was saved yet. May throw. */
  read: () => unknown;
  /** May throw. */
  write: (record: PersistedConfig) => void;
}>;

export const EMPTY_CONFIG: PersistedConfig = Object.freeze({
  copySpeedsMbps: Object.freeze([]),
  removeSpeedsMbps: Object.freeze([]),
  optimalParallelWorkers: null,
  benchmarkDate: null,
  benchmarkResults: Object.freeze({}),
});

function readSamples(value: unknown): readonly number[] {
  if (!Array.isArray(value)) return EMPTY_CONFIG.copySpeedsMbps;
  const out: number[] = [];
  for (const v of value) {
    if (typeof v === "number" && Number.isFinite(v) && v > 0) out.push(v);
  }
  return Object.freeze(out.slice(-MAX_SPEED_SAMPLES));
}

function readPositiveInt(value: unknown): number | null {
  if (typeof value !== "number" || !Number.isInteger(value) || value <= 0) return null;
  return value;
}

function readTimings(value: unknown): Readonly<Record<string, number>> {
  if (typeof value !== "object" || value === null || Array.isArray(value)) {
    return EMPTY_CONFIG.benchmarkResults;
  }
  const out: Record<string, number> = {};
  for (const [key, v] of Object.entries(value)) {
    if (typeof v === "number" && Number.isFinite(v) && v >= 0) out[key] = v;
  }
  return Object.freeze(out);
}

/** Accepts anything; unknown or malformed keys fall back to their defaults. */
export function normalizeConfig(raw: unknown): PersistedConfig {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) return EMPTY_CONFIG;
  const field = (key: keyof PersistedConfig): unknown => Reflect.get(raw, key);
  const date = field("benchmarkDate");
  return Object.freeze({
    copySpeedsMbps: readSamples(field("copySpeedsMbps")),
    removeSpeedsMbps: readSamples(field("removeSpeedsMbps")),
    optimalParallelWorkers: readPositiveInt(field("optimalParallelWorkers")),
    benchmarkDate: typeof date === "string" ? date : null,
    benchmarkResults: readTimings(field("benchmarkResults")),
  });
}

export type ConfigStoreOptions = Readonly<{
  log?: LogSink;
}>;

export class ConfigStore {
  private readonly backend: ConfigBackend;
  private readonly log: LogSink;
  private current: PersistedConfig | null = null;

  constructor(backend: ConfigBackend, opts: ConfigStoreOptions = {}) {
    this.backend = backend;
    this.log = makeLogSink(opts.log);
  }

  get location(): string {
    return this.backend.location;
  }

  load(): PersistedConfig {
    if (this.current !== null) return this.current;
    let raw: unknown;
    try {
      raw = this.backend.read();
    } catch (err) {
      this.log({
        level: "warn",
        message: `could not read settings: ${safeErr(err).message}`,
        path: this.backend.location,
      });
      raw = undefined;
    }
    this.current = normalizeConfig(raw);
    return this.current;
  }

  /**
   * Merge `patch` and persist immediately.
   * Returns false when the write failed; the in-memory value is still updated.
   */
  update(patch: Partial<PersistedConfig>): boolean {
    const next: PersistedConfig = Object.freeze({ ...this.load(), ...patch });
    this.current = next;
    try {
      this.backend.write(next);
      return true;
    } catch (err) {
      this.log({
        level: "warn",
        message: `could not save settings: ${safeErr(err).message}`,
        path: this.backend.location,
      });
      return false;
    }
  }
}

export type MemoryConfigBackend = ConfigBackend &
  Readonly<{
    writes: readonly PersistedConfig[];
  }>;

/** In-process backend; keeps every written record. */
export function createMemoryConfigBackend(initial?: unknown): MemoryConfigBackend {
  const writes: PersistedConfig[] = [];
  return {
    location: "<memory>",
    writes,
    read: () => (writes.length > 0 ? writes[writes.length - 1] : initial),
    write: (record) => {
      writes.push(record);
    },
  };
}
