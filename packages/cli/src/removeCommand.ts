import {
  ProgressAggregator,
  formatEstimate,
  formatSize,
  paint,
  safeErr,
} from "@pcopy/core";
import { rm, stat, unlink } from "node:fs/promises";
import { basename } from "node:path";
import type { RemoveArgs } from "./args.js";
import type { CliContext } from "./context.js";
import { formatDryRun } from "./dryRun.js";
import { collectFiles } from "./enumerate.js";
import { confirmRemoval } from "./prompts.js";

async function isDirectory(path: string): Promise<boolean> {
  try {
    return (await stat(path)).isDirectory();
  } catch {
    return false;
  }
}

export async function removeCommand(args: RemoveArgs, ctx: CliContext): Promise<number> {
  const { io, colors, log } = ctx;
  const println = (line: string): void => {
    io.write(`${line}\n`);
  };

  const found = await collectFiles(args.targets, { recursive: args.recursive, verb: "delete", log });
  const directories: string[] = [];
  if (args.recursive) {
    for (const target of args.targets) {
      if (await isDirectory(target)) directories.push(target);
    }
  }
  if (found.files.length === 0 && directories.length === 0) {
    log({ level: "error", message: "No files to delete" });
    return 1;
  }

  if (args.dryRun) {
    const lines = formatDryRun(
      {
        kind: "remove",
        files: found.files,
        totalBytes: found.totalBytes,
        estimate: formatEstimate(ctx.speedModel.estimate(found.totalBytes, "remove")),
        directories,
        cwd: ctx.cwd,
      },
      colors,
    );
    for (const line of lines) println(line);
    return 0;
  }

  if (!args.force) {
    const confirmed = await confirmRemoval({
      io,
      colors,
      fileCount: found.files.length,
      totalBytes: found.totalBytes,
    });
    if (!confirmed) {
      println(paint(colors, "dim", "Operation cancelled"));
      return 0;
    }
  }

  println(paint(colors, "blue", `Deleting ${String(found.files.length)} files...`));

  const progress = new ProgressAggregator({
    kind: "remove",
    totalItems: found.files.length,
    totalBytes: found.totalBytes,
    surface: ctx.surface,
    speedModel: ctx.speedModel,
    log,
    now: ctx.now,
  });
  ctx.active.current = progress;
  try {
    for (const file of found.files) {
      ctx.cancellation.token.throwIfCancelled();
      try {
        await unlink(file.path);
        progress.update(basename(file.path), file.size);
        progress.completeItem();
      } catch (err) {
        log({ level: "warn", message: `Could not delete '${file.path}': ${safeErr(err).message}` });
      }
    }
    for (const dir of directories) {
      try {
        await rm(dir, { recursive: true });
      } catch (err) {
        log({ level: "warn", message: `Could not delete directory '${dir}': ${safeErr(err).message}` });
      }
    }
    progress.finish();
    return 0;
  } finally {
    progress.dispose();
    ctx.active.current = null;
  }
}
