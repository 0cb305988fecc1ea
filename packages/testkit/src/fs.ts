import { errorCode } from "@pcopy/core";
import { createHash } from "node:crypto";
import { mkdtemp, readFile, rm, stat, writeFile } from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { deterministicBytes } from "./rng.js";

/** Run `fn` inside a fresh temp directory that is removed afterwards. */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(path.join(os.tmpdir(), "pcopy-test-"));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/** Write `size` seeded pseudo-random bytes to `filePath` and return them. */
export async function writeFixtureFile(
  filePath: string,
  size: number,
  seed = 1,
): Promise<Uint8Array> {
  const bytes = deterministicBytes(size, seed);
  await writeFile(filePath, bytes);
  return bytes;
}

export async function sha256File(filePath: string): Promise<string> {
  const data = await readFile(filePath);
  return createHash("sha256").update(data).digest("hex");
}

export async function pathExists(filePath: string): Promise<boolean> {
  try {
    await stat(filePath);
    return true;
  } catch (err) {
    if (errorCode(err) === "ENOENT") return false;
    throw err;
  }
}
