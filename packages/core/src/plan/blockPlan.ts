import { PcopyError } from "../errors.js";

export type Block = Readonly<{
  offset: number;
  length: number;
  index: number;
}>;

export type BlockPlan = readonly Block[];

function assertByteCount(name: string, value: number, allowZero: boolean): void {
  if (!Number.isSafeInteger(value) || value < 0 || (!allowZero && value === 0)) {
    const expected = allowZero ? "non-negative" : "positive";
    throw new PcopyError(
      "PCOPY_INVALID_ARGUMENT",
      `${name} must be a ${expected} integer, got ${String(value)}`,
    );
  }
}

/**
 * Split `[0, fileSize)` into contiguous blocks of `blockSize` bytes; the last
 * block takes the remainder. The plan is frozen before it is handed out.
 */
export function planBlocks(fileSize: number, blockSize: number): BlockPlan {
  assertByteCount("fileSize", fileSize, true);
  assertByteCount("blockSize", blockSize, false);

  const blocks: Block[] = [];
  let offset = 0;
  while (offset < fileSize) {
    const length = Math.min(blockSize, fileSize - offset);
    blocks.push(Object.freeze({ offset, length, index: blocks.length }));
    offset += length;
  }
  return Object.freeze(blocks);
}

/** Parallelism only pays off once a file spans at least two blocks. */
export function shouldUseBlocks(fileSize: number, blockSize: number): boolean {
  return fileSize >= blockSize * 2;
}
