/**
 * Destination handling shared by the streaming and the block copy paths.
 */

import {
  type CancellationToken,
  type LogSink,
  NEVER_CANCELLED,
  NULL_PROGRESS,
  type OverwriteDecider,
  PcopyError,
  type ProgressSink,
  alwaysOverwrite,
  errorCode,
  makeLogSink,
  safeErr,
} from "@pcopy/core";
import type { Stats } from "node:fs";
import { mkdir, rm, stat, writeFile } from "node:fs/promises";
import { basename, dirname, join } from "node:path";
import { copyMetadata } from "./metadata.js";
import { PartialFileRegistry } from "./partials.js";

export type CopyOutcome = "copied" | "skipped";

export type FileCopyOptions = Readonly<{
  progress?: ProgressSink;
  decideOverwrite?: OverwriteDecider;
  cancellation?: CancellationToken;
  partials?: PartialFileRegistry;
  log?: LogSink;
}>;

/** Options with every collaborator filled in. */
export type ResolvedCopyContext = Readonly<{
  progress: ProgressSink;
  decideOverwrite: OverwriteDecider;
  cancellation: CancellationToken;
  partials: PartialFileRegistry;
  log: LogSink;
}>;

export type PreparedTarget = Readonly<{
  source: string;
  target: string;
  /** Name shown on the status line. */
  label: string;
  size: number;
}>;

export function resolveCopyContext(opts: FileCopyOptions): ResolvedCopyContext {
  const log = makeLogSink(opts.log);
  return {
    progress: opts.progress ?? NULL_PROGRESS,
    decideOverwrite: opts.decideOverwrite ?? alwaysOverwrite,
    cancellation: opts.cancellation ?? NEVER_CANCELLED,
    partials: opts.partials ?? new PartialFileRegistry({ log }),
    log,
  };
}

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}

async function statIfExists(path: string): Promise<Stats | null> {
  try {
    return await stat(path);
  } catch (err) {
    if (errorCode(err) === "ENOENT") return null;
    throw err;
  }
}

/** An existing directory destination receives the file under its own name. */
export async function resolveCopyTarget(source: string, destination: string): Promise<string> {
  return (await isDirectory(destination)) ? join(destination, basename(source)) : destination;
}

/**
 * Resolve the target, consult the overwrite decider and create parent
 * directories. Returns null when the file is skipped. A target that is the
 * source itself (same device and inode) is rejected before anyone is asked,
 * since opening it for writing would truncate the source.
 */
export async function prepareTarget(
  source: string,
  destination: string,
  ctx: ResolvedCopyContext,
): Promise<PreparedTarget | null> {
  const st = await stat(source);
  if (st.isDirectory()) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `source is a directory: ${source}`);
  }
  const target = await resolveCopyTarget(source, destination);
  const existing = await statIfExists(target);
  if (existing !== null) {
    if (existing.dev === st.dev && existing.ino === st.ino) {
      throw new PcopyError("PCOPY_INVALID_ARGUMENT", `'${source}' and '${target}' are the same file`);
    }
    const decision = await ctx.decideOverwrite(target);
    if (decision === "skip") {
      ctx.progress.skipItem();
      return null;
    }
    if (decision === "abort") {
      throw new PcopyError("PCOPY_ABORTED", "operation aborted by user");
    }
  }
  ctx.cancellation.throwIfCancelled();
  await mkdir(dirname(target), { recursive: true });
  return { source, target, label: basename(source), size: st.size };
}

export async function writeEmptyTarget(prepared: PreparedTarget, ctx: ResolvedCopyContext): Promise<void> {
  await writeFile(prepared.target, new Uint8Array(0));
  await copyMetadata(prepared.source, prepared.target);
  ctx.progress.update(prepared.label, 0);
}

/** Delete a partially written target. Failures are logged, never thrown. */
export async function removePartial(target: string, log: LogSink): Promise<void> {
  try {
    await rm(target, { force: true });
  } catch (err) {
    log({ level: "warn", message: `could not remove partial file: ${safeErr(err).message}`, path: target });
  }
}
