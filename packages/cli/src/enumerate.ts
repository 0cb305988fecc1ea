/**
 * Expand command-line paths into the flat file list a job works on.
 * Problems with individual paths are logged and the rest of the list is
 * still returned.
 */

import { type LogSink, errorCode, makeLogSink, safeErr } from "@pcopy/core";
import type { Stats } from "node:fs";
import { lstat, readdir, stat } from "node:fs/promises";
import { join } from "node:path";

export type FileEntry = Readonly<{
  path: string;
  size: number;
}>;

export type Enumeration = Readonly<{
  files: readonly FileEntry[];
  /** Directory arguments that were expanded, in argument order. */
  roots: readonly string[];
  totalBytes: number;
}>;

export type CollectOptions = Readonly<{
  recursive: boolean;
  /** Used in the "is a directory" hint. */
  verb: "copy" | "delete";
  log?: LogSink;
}>;

async function walk(dir: string, out: FileEntry[], log: LogSink): Promise<void> {
  let names: string[];
  try {
    names = await readdir(dir);
  } catch (err) {
    log({ level: "warn", message: `Cannot access: ${safeErr(err).message}`, path: dir });
    return;
  }
  names.sort();
  for (const name of names) {
    const child = join(dir, name);
    let st: Stats;
    try {
      st = await lstat(child);
    } catch (err) {
      log({ level: "warn", message: `Cannot access: ${safeErr(err).message}`, path: child });
      out.push({ path: child, size: 0 });
      continue;
    }
    if (st.isDirectory()) {
      await walk(child, out, log);
    } else {
      out.push({ path: child, size: st.isFile() ? st.size : 0 });
    }
  }
}

export async function collectFiles(
  paths: readonly string[],
  opts: CollectOptions,
): Promise<Enumeration> {
  const log = makeLogSink(opts.log);
  const files: FileEntry[] = [];
  const roots: string[] = [];

  for (const p of paths) {
    let st: Stats;
    try {
      st = await stat(p);
    } catch (err) {
      if (errorCode(err) === "ENOENT") {
        log({ level: "error", message: `'${p}' does not exist` });
      } else {
        log({ level: "warn", message: `Cannot access: ${safeErr(err).message}`, path: p });
      }
      continue;
    }
    if (st.isDirectory()) {
      if (!opts.recursive) {
        log({
          level: "error",
          message: `'${p}' is a directory. Use -r to ${opts.verb} recursively`,
        });
        continue;
      }
      roots.push(p);
      await walk(p, files, log);
      continue;
    }
    files.push({ path: p, size: st.size });
  }

  let totalBytes = 0;
  for (const f of files) totalBytes += f.size;
  return Object.freeze({
    files: Object.freeze(files),
    roots: Object.freeze(roots),
    totalBytes,
  });
}
