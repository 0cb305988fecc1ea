/**
 * Worker-thread entrypoint for the parallel copy engine.
 *
 * Each task reads one block of the source with its own descriptor, then
 * writes it at the same offset of the pre-sized target while holding the
 * shared write mutex. Results go back to the pool as `done`/`failed`.
 */

import { PcopyError } from "@pcopy/core";
import { parentPort, workerData } from "node:worker_threads";
import {
  type BlockIo,
  type BlockTask,
  type BlockWorkerData,
  NODE_BLOCK_IO,
  type WorkerToPoolMessage,
  isBlockIo,
  parseBlockWorkerData,
  parsePoolMessage,
  toWireError,
} from "./protocol.js";
import { type SharedMutex, createSharedMutex } from "./sharedMutex.js";

async function loadIo(shim: string | null): Promise<BlockIo> {
  if (shim === null) return NODE_BLOCK_IO;
  const mod: unknown = await import(shim);
  const io = typeof mod === "object" && mod !== null ? Reflect.get(mod, "io") : undefined;
  if (!isBlockIo(io)) throw new Error(`io shim ${shim} does not export a BlockIo named "io"`);
  return io;
}

export function readBlock(io: BlockIo, source: string, task: BlockTask): Uint8Array {
  const buf = new Uint8Array(task.length);
  const fd = io.openSync(source, "r");
  let got = 0;
  try {
    while (got < task.length) {
      const n = io.readSync(fd, buf, got, task.length - got, task.offset + got);
      if (n <= 0) break;
      got += n;
    }
  } finally {
    io.closeSync(fd);
  }
  if (got !== task.length) {
    throw new PcopyError(
      "PCOPY_SHORT_READ",
      `short read in block ${String(task.index)} at offset ${String(task.offset)}: expected ${String(task.length)} bytes, got ${String(got)}`,
    );
  }
  return buf;
}

export function writeBlock(
  io: BlockIo,
  mutex: SharedMutex,
  target: string,
  task: BlockTask,
  data: Uint8Array,
): void {
  mutex.withLock(() => {
    const fd = io.openSync(target, "r+");
    try {
      let put = 0;
      while (put < data.byteLength) {
        put += io.writeSync(fd, data, put, data.byteLength - put, task.offset + put);
      }
    } finally {
      io.closeSync(fd);
    }
  });
}

function copyBlock(io: BlockIo, mutex: SharedMutex, wd: BlockWorkerData, task: BlockTask): number {
  const data = readBlock(io, wd.source, task);
  writeBlock(io, mutex, wd.target, task, data);
  return data.byteLength;
}

const port = parentPort;
if (port !== null) {
  const post = (msg: WorkerToPoolMessage): void => {
    port.postMessage(msg);
  };

  const wd = parseBlockWorkerData(workerData);
  const io = await loadIo(wd.ioShimModule);
  const mutex = createSharedMutex(wd.lock);

  port.on("message", (raw: unknown) => {
    const msg = parsePoolMessage(raw);
    if (msg === null) return;
    try {
      const bytes = copyBlock(io, mutex, wd, msg);
      post({ type: "done", index: msg.index, bytes });
    } catch (err) {
      post({ type: "failed", index: msg.index, error: toWireError(err) });
    }
  });

  post({ type: "ready" });
}
