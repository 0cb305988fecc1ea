/**
 * Messages between the block pool (main thread) and its worker threads.
 * Errors cross the boundary as plain records and are rebuilt on the main
 * thread with their original code and syscall.
 */

import { PcopyError, isPcopyErrorCode } from "@pcopy/core";
import { closeSync, openSync, readSync, writeSync } from "node:fs";

export type BlockTask = Readonly<{
  type: "block";
  index: number;
  offset: number;
  length: number;
}>;

/** Workers are stopped with `terminate()`, so blocks are the only message they receive. */
export type PoolToWorkerMessage = BlockTask;

export type WireError = Readonly<{
  name: string;
  message: string;
  code: string | null;
  syscall: string | null;
}>;

export type WorkerToPoolMessage =
  | Readonly<{ type: "ready" }>
  | Readonly<{ type: "done"; index: number; bytes: number }>
  | Readonly<{ type: "failed"; index: number; error: WireError }>;

export type BlockWorkerData = Readonly<{
  source: string;
  target: string;
  lock: SharedArrayBuffer;
  /** Module URL exporting `io: BlockIo`; tests use it to inject I/O failures. */
  ioShimModule: string | null;
}>;

/** The synchronous file calls a block worker makes. */
export type BlockIo = Readonly<{
  openSync: (path: string, flags: string) => number;
  readSync: (
    fd: number,
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ) => number;
  writeSync: (
    fd: number,
    buffer: Uint8Array,
    offset: number,
    length: number,
    position: number,
  ) => number;
  closeSync: (fd: number) => void;
}>;

export const NODE_BLOCK_IO: BlockIo = Object.freeze({ openSync, readSync, writeSync, closeSync });

export function isBlockIo(v: unknown): v is BlockIo {
  if (typeof v !== "object" || v === null) return false;
  return (["openSync", "readSync", "writeSync", "closeSync"] as const).every(
    (key) => typeof Reflect.get(v, key) === "function",
  );
}

function field(v: object, key: string): unknown {
  return Reflect.get(v, key);
}

function stringOrNull(v: unknown): string | null {
  return typeof v === "string" ? v : null;
}

function nonNegativeInt(v: unknown): number | null {
  return typeof v === "number" && Number.isSafeInteger(v) && v >= 0 ? v : null;
}

export function toWireError(err: unknown): WireError {
  if (err instanceof Error) {
    return {
      name: err.name,
      message: err.message,
      code: stringOrNull(field(err, "code")),
      syscall: stringOrNull(field(err, "syscall")),
    };
  }
  return { name: "Error", message: String(err), code: null, syscall: null };
}

export function fromWireError(wire: WireError): Error {
  if (isPcopyErrorCode(wire.code)) return new PcopyError(wire.code, wire.message);
  const err = new Error(wire.message);
  err.name = wire.name;
  if (wire.code !== null) Object.assign(err, { code: wire.code });
  if (wire.syscall !== null) Object.assign(err, { syscall: wire.syscall });
  return err;
}

function parseWireError(v: unknown): WireError | null {
  if (typeof v !== "object" || v === null) return null;
  const message = field(v, "message");
  if (typeof message !== "string") return null;
  return {
    name: stringOrNull(field(v, "name")) ?? "Error",
    message,
    code: stringOrNull(field(v, "code")),
    syscall: stringOrNull(field(v, "syscall")),
  };
}

export function parseWorkerMessage(v: unknown): WorkerToPoolMessage | null {
  if (typeof v !== "object" || v === null) return null;
  const type = field(v, "type");
  if (type === "ready") return { type };
  const index = nonNegativeInt(field(v, "index"));
  if (index === null) return null;
  if (type === "done") {
    const bytes = nonNegativeInt(field(v, "bytes"));
    return bytes === null ? null : { type, index, bytes };
  }
  if (type === "failed") {
    const error = parseWireError(field(v, "error"));
    return error === null ? null : { type, index, error };
  }
  return null;
}

export function parsePoolMessage(v: unknown): PoolToWorkerMessage | null {
  if (typeof v !== "object" || v === null) return null;
  const type = field(v, "type");
  if (type !== "block") return null;
  const index = nonNegativeInt(field(v, "index"));
  const offset = nonNegativeInt(field(v, "offset"));
  const length = nonNegativeInt(field(v, "length"));
  if (index === null || offset === null || length === null) return null;
  return { type, index, offset, length };
}

export function parseBlockWorkerData(v: unknown): BlockWorkerData {
  if (typeof v !== "object" || v === null) {
    throw new PcopyError("PCOPY_WORKER_FAILED", "block worker started without workerData");
  }
  const source = field(v, "source");
  const target = field(v, "target");
  const lock = field(v, "lock");
  if (typeof source !== "string" || typeof target !== "string") {
    throw new PcopyError("PCOPY_WORKER_FAILED", "block worker needs source and target paths");
  }
  if (!(lock instanceof SharedArrayBuffer)) {
    throw new PcopyError("PCOPY_WORKER_FAILED", "block worker needs a shared lock buffer");
  }
  const shim = stringOrNull(field(v, "ioShimModule"));
  return { source, target, lock, ioShimModule: shim !== null && shim.length > 0 ? shim : null };
}
