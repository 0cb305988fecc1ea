/**
 * Parallel block copy of one large file.
 *
 * The target is pre-sized, the file is split into a frozen block plan and
 * the blocks are copied by a bounded worker pool. Any failure deletes the
 * target and surfaces the first error.
 */

import {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_PARALLEL_WORKERS,
  PcopyError,
  formatSize,
  planBlocks,
  shouldUseBlocks,
} from "@pcopy/core";
import { open } from "node:fs/promises";
import { copyMetadata } from "./metadata.js";
import { streamIntoTarget } from "./streamCopy.js";
import {
  type CopyOutcome,
  type FileCopyOptions,
  type PreparedTarget,
  type ResolvedCopyContext,
  prepareTarget,
  removePartial,
  resolveCopyContext,
  writeEmptyTarget,
} from "./target.js";
import { runBlockPool } from "./workerPool.js";

export type BlockCopyOptions = FileCopyOptions &
  Readonly<{
    workers?: number;
    blockSize?: number;
    /** Buffer of the streaming fallback for files under two blocks. */
    bufferSize?: number;
    /** Test hook: module URL exporting the worker's `io`. */
    ioShimModule?: string;
  }>;

async function presize(target: string, size: number): Promise<void> {
  const fh = await open(target, "w");
  try {
    await fh.write(new Uint8Array(1), 0, 1, size - 1);
  } finally {
    await fh.close();
  }
}

async function copyBlocks(
  prepared: PreparedTarget,
  ctx: ResolvedCopyContext,
  workers: number,
  blockSize: number,
  ioShimModule: string | undefined,
): Promise<void> {
  const { source, target, label, size } = prepared;
  const blocks = planBlocks(size, blockSize);
  const poolSize = Math.min(workers, blocks.length);
  ctx.log({
    level: "info",
    message: `⚡ Parallel mode: ${String(poolSize)} workers, ${String(blocks.length)} blocks of ${formatSize(blockSize)}`,
    path: source,
  });

  ctx.partials.track(target);
  try {
    ctx.cancellation.throwIfCancelled();
    await presize(target, size);
    await runBlockPool({
      source,
      target,
      blocks,
      workers: poolSize,
      onBlockDone: (bytes) => {
        ctx.progress.update(label, bytes);
      },
      cancellation: ctx.cancellation,
      log: ctx.log,
      ...(ioShimModule === undefined ? {} : { ioShimModule }),
    });
  } catch (err) {
    await removePartial(target, ctx.log);
    ctx.partials.release(target);
    throw err;
  }
  ctx.partials.release(target);
  await copyMetadata(source, target);
}

export async function copyLarge(
  source: string,
  destination: string,
  opts: BlockCopyOptions = {},
): Promise<CopyOutcome> {
  const workers = opts.workers ?? DEFAULT_PARALLEL_WORKERS;
  const blockSize = opts.blockSize ?? DEFAULT_BLOCK_SIZE;
  if (!Number.isInteger(workers) || workers <= 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `invalid worker count: ${String(workers)}`);
  }
  if (!Number.isSafeInteger(blockSize) || blockSize <= 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `invalid block size: ${String(blockSize)}`);
  }

  const ctx = resolveCopyContext(opts);
  const prepared = await prepareTarget(source, destination, ctx);
  if (prepared === null) return "skipped";
  if (prepared.size === 0) {
    await writeEmptyTarget(prepared, ctx);
    return "copied";
  }
  if (!shouldUseBlocks(prepared.size, blockSize)) {
    await streamIntoTarget(prepared, ctx, opts.bufferSize);
    return "copied";
  }
  await copyBlocks(prepared, ctx, workers, blockSize, opts.ioShimModule);
  return "copied";
}
