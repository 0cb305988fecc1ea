/**
 * `pcopy benchmark`: time the copy engine on a random payload for each
 * candidate worker count and persist the fastest configuration.
 */

import {
  BENCHMARK_TRIALS,
  BENCHMARK_WORKER_COUNTS,
  type BenchmarkResult,
  type BenchmarkTiming,
  type ConfigStore,
  DEFAULT_BLOCK_SIZE,
  type LogSink,
  MIB,
  formatBenchmarkDate,
  formatSize,
  makeLogSink,
  measureWorkerMatrix,
  paint,
  safeErr,
  timingTable,
} from "@pcopy/core";
import { randomBytes } from "node:crypto";
import { copyFile, mkdtemp, open, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { copyLarge } from "../copy/blockCopy.js";
import { copyMetadata } from "../copy/metadata.js";

export const BENCHMARK_PAYLOAD_BYTES = 100 * MIB;
const PAYLOAD_CHUNK_BYTES = 16 * MIB;

export type BenchmarkOptions = Readonly<{
  store: ConfigStore;
  quiet?: boolean;
  colors?: boolean;
  /** Receives each printed line, without a trailing newline. */
  print?: (line: string) => void;
  payloadBytes?: number;
  blockSize?: number;
  candidates?: readonly number[];
  trials?: number;
  /** Parent of the scratch directory; defaults to the OS temp dir. */
  tmpRoot?: string;
  now?: () => number;
  clock?: () => Date;
  log?: LogSink;
}>;

async function writePayload(path: string, size: number): Promise<void> {
  const fh = await open(path, "w");
  try {
    let remaining = size;
    while (remaining > 0) {
      const chunk = randomBytes(Math.min(PAYLOAD_CHUNK_BYTES, remaining));
      await fh.write(chunk);
      remaining -= chunk.byteLength;
    }
  } finally {
    await fh.close();
  }
}

function describeTiming(t: BenchmarkTiming, payloadBytes: number): string {
  const mbps = payloadBytes / MIB / t.averageSeconds;
  const workers = String(t.workers).padStart(2, " ");
  return `  ${workers} workers: ${t.averageSeconds.toFixed(3)}s  (${mbps.toFixed(1)} MB/s)`;
}

export async function runBenchmark(opts: BenchmarkOptions): Promise<BenchmarkResult> {
  const quiet = opts.quiet ?? false;
  const colors = opts.colors ?? false;
  const print =
    opts.print ??
    ((line: string) => {
      process.stdout.write(`${line}\n`);
    });
  const log = makeLogSink(opts.log);
  const payloadBytes = opts.payloadBytes ?? BENCHMARK_PAYLOAD_BYTES;
  const blockSize = opts.blockSize ?? DEFAULT_BLOCK_SIZE;
  const say = (line: string): void => {
    if (!quiet) print(line);
  };

  say(paint(colors, "bold", "🔬 Running benchmark to determine optimal parallel workers..."));
  say("");

  const scratch = await mkdtemp(join(opts.tmpRoot ?? tmpdir(), "pcopy-bench-"));
  try {
    const payload = join(scratch, "benchmark_test.bin");
    say(paint(colors, "cyan", `Creating ${formatSize(payloadBytes)} test file...`));
    await writePayload(payload, payloadBytes);

    say("");
    say(paint(colors, "bold", "Testing different worker counts:"));

    const destFor = (workers: number): string => join(scratch, `test_copy_${String(workers)}.bin`);
    const result = await measureWorkerMatrix({
      candidates: opts.candidates ?? BENCHMARK_WORKER_COUNTS,
      trials: opts.trials ?? BENCHMARK_TRIALS,
      ...(opts.now === undefined ? {} : { now: opts.now }),
      beforeTrial: async (workers) => {
        await rm(destFor(workers), { force: true });
      },
      runTrial: async (workers) => {
        const dest = destFor(workers);
        if (workers === 1) {
          await copyFile(payload, dest);
          await copyMetadata(payload, dest);
          return;
        }
        await copyLarge(payload, dest, { workers, blockSize, log });
      },
      onConfiguration: (timing) => {
        say(describeTiming(timing, payloadBytes));
      },
    });

    const saved = opts.store.update({
      optimalParallelWorkers: result.optimalWorkers,
      benchmarkDate: formatBenchmarkDate((opts.clock ?? (() => new Date()))()),
      benchmarkResults: timingTable(result),
    });

    const optimal = String(result.optimalWorkers);
    if (quiet) {
      print(paint(colors, "green", `✓ Optimal: ${optimal} workers${saved ? " (saved to config)" : ""}`));
    } else {
      say("");
      say(paint(colors, "green", `✓ Optimal configuration: ${optimal} workers`));
      if (saved) say(paint(colors, "dim", `Configuration saved to: ${opts.store.location}`));
      say("");
    }
    return result;
  } finally {
    try {
      await rm(scratch, { recursive: true, force: true });
    } catch (err) {
      log({ level: "warn", message: `could not remove benchmark directory: ${safeErr(err).message}`, path: scratch });
    }
  }
}
