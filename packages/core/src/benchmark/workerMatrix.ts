/**
 * Timing matrix behind `pcopy benchmark`: run every candidate worker count a
 * fixed number of times, average wall-clock time and keep the fastest.
 * Filesystem work is injected so the selection can run against a fake clock.
 */

import { PcopyError } from "../errors.js";

export const BENCHMARK_WORKER_COUNTS: readonly number[] = Object.freeze([1, 2, 4, 6, 8]);
export const BENCHMARK_TRIALS = 3;

export type BenchmarkTiming = Readonly<{
  workers: number;
  trialSeconds: readonly number[];
  averageSeconds: number;
}>;

export type BenchmarkResult = Readonly<{
  timings: readonly BenchmarkTiming[];
  optimalWorkers: number;
}>;

export type WorkerMatrixOptions = Readonly<{
  candidates?: readonly number[];
  trials?: number;
  /** Untimed setup, e.g. discarding the previous trial's destination. */
  beforeTrial?: (workers: number, trial: number) => Promise<void>;
  runTrial: (workers: number, trial: number) => Promise<void>;
  /** Milliseconds; defaults to `performance.now`. */
  now?: () => number;
  onConfiguration?: (timing: BenchmarkTiming) => void;
}>;

/** First minimum wins, so equal averages resolve to the earlier candidate. */
export function selectOptimalWorkers(timings: readonly BenchmarkTiming[]): number {
  let best: BenchmarkTiming | null = null;
  for (const t of timings) {
    if (best === null || t.averageSeconds < best.averageSeconds) best = t;
  }
  if (best === null) throw new PcopyError("PCOPY_INVALID_ARGUMENT", "no benchmark timings");
  return best.workers;
}

export async function measureWorkerMatrix(opts: WorkerMatrixOptions): Promise<BenchmarkResult> {
  const candidates = opts.candidates ?? BENCHMARK_WORKER_COUNTS;
  const trials = opts.trials ?? BENCHMARK_TRIALS;
  const now = opts.now ?? (() => performance.now());
  if (candidates.length === 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", "benchmark needs at least one worker count");
  }
  if (!Number.isInteger(trials) || trials <= 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `invalid trial count: ${String(trials)}`);
  }

  const timings: BenchmarkTiming[] = [];
  for (const workers of candidates) {
    const trialSeconds: number[] = [];
    for (let trial = 0; trial < trials; trial++) {
      if (opts.beforeTrial) await opts.beforeTrial(workers, trial);
      const start = now();
      await opts.runTrial(workers, trial);
      trialSeconds.push((now() - start) / 1000);
    }
    const sum = trialSeconds.reduce((a, b) => a + b, 0);
    const timing: BenchmarkTiming = Object.freeze({
      workers,
      trialSeconds: Object.freeze(trialSeconds),
      averageSeconds: sum / trialSeconds.length,
    });
    timings.push(timing);
    opts.onConfiguration?.(timing);
  }

  return Object.freeze({
    timings: Object.freeze(timings),
    optimalWorkers: selectOptimalWorkers(timings),
  });
}

/** Persisted form of the timing table: `{ "<workers>": averageSeconds }`. */
export function timingTable(result: BenchmarkResult): Readonly<Record<string, number>> {
  const out: Record<string, number> = {};
  for (const t of result.timings) out[String(t.workers)] = t.averageSeconds;
  return Object.freeze(out);
}

function pad2(n: number): string {
  return String(n).padStart(2, "0");
}

/** Local time as `YYYY-MM-DD HH:MM:SS`. */
export function formatBenchmarkDate(date: Date): string {
  const day = `${String(date.getFullYear())}-${pad2(date.getMonth() + 1)}-${pad2(date.getDate())}`;
  const time = `${pad2(date.getHours())}:${pad2(date.getMinutes())}:${pad2(date.getSeconds())}`;
  return `${day} ${time}`;
}
