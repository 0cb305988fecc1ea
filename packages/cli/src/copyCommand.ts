import {
  DEFAULT_PARALLEL_WORKERS,
  ProgressAggregator,
  errorCode,
  formatEstimate,
  formatInterruptNotice,
  formatSize,
  isPcopyError,
  paint,
  safeErr,
} from "@pcopy/core";
import { copyFileStreaming, copyLarge, isPathWithin, isSystemDirectory } from "@pcopy/node";
import { mkdir, stat } from "node:fs/promises";
import { basename, join, relative, resolve } from "node:path";
import type { CopyArgs, ParallelSetting } from "./args.js";
import type { CliContext } from "./context.js";
import { formatDryRun } from "./dryRun.js";
import { collectFiles } from "./enumerate.js";
import { createOverwritePrompter } from "./prompts.js";

/** 0 disables the block engine. */
export function resolveWorkerCount(parallel: ParallelSetting, saved: number | null): number {
  switch (parallel.kind) {
    case "off":
      return 0;
    case "auto":
      return saved ?? DEFAULT_PARALLEL_WORKERS;
    case "workers":
      return parallel.workers;
  }
}

type DestinationKind = "missing" | "directory" | "other";

async function destinationKind(path: string): Promise<DestinationKind> {
  try {
    return (await stat(path)).isDirectory() ? "directory" : "other";
  } catch (err) {
    if (errorCode(err) === "ENOENT") return "missing";
    throw err;
  }
}

/**
 * Where one enumerated file lands: files found under a directory argument
 * keep their path below `destination/<dirname>/`, plain file arguments go
 * straight to the destination.
 */
export function copyDestinationFor(
  file: string,
  roots: readonly string[],
  destination: string,
): string {
  for (const root of roots) {
    if (isPathWithin(root, file)) {
      return join(destination, basename(resolve(root)), relative(root, file));
    }
  }
  return destination;
}

export async function copyCommand(args: CopyArgs, ctx: CliContext): Promise<number> {
  const { io, colors, log, settings } = ctx;
  const println = (line: string): void => {
    io.write(`${line}\n`);
  };
  const destination = args.destination;

  if (isSystemDirectory(resolve(ctx.cwd, destination))) {
    println(paint(colors, "dim", "System directory detected, using /bin/cp..."));
    const cpArgs = [...(args.recursive ? ["-r"] : []), ...args.sources, destination];
    return ctx.runSystemCopy(cpArgs);
  }

  if (args.sources.length > 1) {
    const kind = await destinationKind(destination);
    if (kind === "other") {
      log({ level: "error", message: "Destination must be a directory for multiple sources" });
      return 1;
    }
    if (kind === "missing" && !args.dryRun) await mkdir(destination, { recursive: true });
  }

  const found = await collectFiles(args.sources, { recursive: args.recursive, verb: "copy", log });
  if (found.files.length === 0) {
    log({ level: "error", message: "No files to copy" });
    return 1;
  }

  if (args.dryRun) {
    const lines = formatDryRun(
      {
        kind: "copy",
        files: found.files,
        totalBytes: found.totalBytes,
        estimate: formatEstimate(ctx.speedModel.estimate(found.totalBytes, "copy")),
        destination,
        cwd: ctx.cwd,
      },
      colors,
    );
    for (const line of lines) println(line);
    return 0;
  }

  println(
    paint(
      colors,
      "blue",
      `Copying ${String(found.files.length)} files (${formatSize(found.totalBytes)})...`,
    ),
  );

  const workers = resolveWorkerCount(args.parallel, ctx.store.load().optimalParallelWorkers);
  const progress = new ProgressAggregator({
    kind: "copy",
    totalItems: found.files.length,
    totalBytes: found.totalBytes,
    surface: ctx.surface,
    speedModel: ctx.speedModel,
    log,
    now: ctx.now,
  });
  ctx.active.current = progress;
  const fileOptions = {
    progress,
    decideOverwrite: createOverwritePrompter({ io, surface: ctx.surface, colors }),
    cancellation: ctx.cancellation.token,
    partials: ctx.partials,
    log,
    bufferSize: settings.bufferSize,
  };

  try {
    for (const file of found.files) {
      const target = copyDestinationFor(file.path, found.roots, destination);
      try {
        const outcome =
          workers > 0 && file.size > settings.parallelThreshold
            ? await copyLarge(file.path, target, {
                ...fileOptions,
                workers,
                blockSize: settings.blockSize,
              })
            : await copyFileStreaming(file.path, target, fileOptions);
        if (outcome === "copied") progress.completeItem();
      } catch (err) {
        if (isPcopyError(err, "PCOPY_ABORTED")) {
          progress.dispose();
          println(`\n${formatInterruptNotice(colors)}`);
          return 0;
        }
        if (isPcopyError(err, "PCOPY_CANCELLED")) throw err;
        log({ level: "warn", message: `Could not copy '${file.path}': ${safeErr(err).message}` });
      }
    }
    progress.finish();
    return 0;
  } finally {
    progress.dispose();
    ctx.active.current = null;
  }
}
