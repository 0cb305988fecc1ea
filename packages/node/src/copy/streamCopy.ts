import { DEFAULT_BUFFER_SIZE, PcopyError } from "@pcopy/core";
import { type FileHandle, open } from "node:fs/promises";
import { copyMetadata } from "./metadata.js";
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

export type StreamCopyOptions = FileCopyOptions &
  Readonly<{
    bufferSize?: number;
  }>;

async function closeQuietly(handle: FileHandle | null, ctx: ResolvedCopyContext): Promise<void> {
  if (handle === null) return;
  try {
    await handle.close();
  } catch (err) {
    ctx.log({ level: "debug", message: `close failed: ${String(err)}` });
  }
}

/** Sequential chunked copy into an already prepared, non-empty target. */
export async function streamIntoTarget(
  prepared: PreparedTarget,
  ctx: ResolvedCopyContext,
  bufferSize: number = DEFAULT_BUFFER_SIZE,
): Promise<void> {
  if (!Number.isSafeInteger(bufferSize) || bufferSize <= 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `invalid buffer size: ${String(bufferSize)}`);
  }
  const { target, label } = prepared;
  ctx.partials.track(target);
  let src: FileHandle | null = null;
  let dst: FileHandle | null = null;
  try {
    src = await open(prepared.source, "r");
    dst = await open(target, "w");
    const buf = new Uint8Array(Math.min(bufferSize, Math.max(1, prepared.size)));
    for (;;) {
      ctx.cancellation.throwIfCancelled();
      const { bytesRead } = await src.read(buf, 0, buf.byteLength, null);
      if (bytesRead === 0) break;
      await dst.write(buf, 0, bytesRead);
      ctx.progress.update(label, bytesRead);
    }
  } catch (err) {
    await closeQuietly(dst, ctx);
    dst = null;
    await removePartial(target, ctx.log);
    ctx.partials.release(target);
    throw err;
  } finally {
    await closeQuietly(src, ctx);
    await closeQuietly(dst, ctx);
  }
  ctx.partials.release(target);
  await copyMetadata(prepared.source, target);
}

/**
 * Copy one file with a reusable buffer, reporting every chunk to the
 * progress sink. Permissions and timestamps follow the source.
 */
export async function copyFileStreaming(
  source: string,
  destination: string,
  opts: StreamCopyOptions = {},
): Promise<CopyOutcome> {
  const ctx = resolveCopyContext(opts);
  const prepared = await prepareTarget(source, destination, ctx);
  if (prepared === null) return "skipped";
  if (prepared.size === 0) {
    await writeEmptyTarget(prepared, ctx);
    return "copied";
  }
  await streamIntoTarget(prepared, ctx, opts.bufferSize);
  return "copied";
}
