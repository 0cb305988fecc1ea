/**
 * Bounded pool of block workers for one file.
 *
 * Blocks are handed out one at a time as workers report back. The first
 * failure (or an observed cancellation) stops dispatch; blocks already in
 * flight are awaited before the pool shuts down and rethrows that failure.
 */

import {
  type Block,
  type CancellationToken,
  type LogSink,
  NEVER_CANCELLED,
  PcopyError,
  makeLogSink,
  safeErr,
} from "@pcopy/core";
import { Worker } from "node:worker_threads";
import { siblingModuleUrl, workerLaunch } from "../moduleUrl.js";
import {
  type BlockTask,
  type BlockWorkerData,
  type PoolToWorkerMessage,
  fromWireError,
  parseWorkerMessage,
} from "./protocol.js";
import { createSharedMutexBuffer } from "./sharedMutex.js";

export type BlockPoolOptions = Readonly<{
  source: string;
  target: string;
  blocks: readonly Block[];
  workers: number;
  onBlockDone: (bytes: number, index: number) => void;
  cancellation?: CancellationToken;
  ioShimModule?: string;
  log?: LogSink;
}>;

type Deferred<T> = Readonly<{
  promise: Promise<T>;
  resolve: (v: T) => void;
  reject: (err: Error) => void;
}>;

function deferred<T>(): Deferred<T> {
  let resolve: ((v: T) => void) | undefined;
  let reject: ((err: Error) => void) | undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  if (resolve === undefined || reject === undefined) {
    throw new Error("deferred: executor did not run");
  }
  return { promise, resolve, reject };
}

type Slot = {
  readonly id: number;
  readonly worker: Worker;
  current: BlockTask | null;
  exited: boolean;
};

export function blockWorkerEntry(): URL {
  return siblingModuleUrl("./blockWorker.js", import.meta.url);
}

export async function runBlockPool(opts: BlockPoolOptions): Promise<void> {
  const total = opts.blocks.length;
  if (!Number.isInteger(opts.workers) || opts.workers <= 0) {
    throw new PcopyError("PCOPY_INVALID_ARGUMENT", `invalid worker count: ${String(opts.workers)}`);
  }
  if (total === 0) return;

  const log = makeLogSink(opts.log);
  const cancellation = opts.cancellation ?? NEVER_CANCELLED;
  const queue: Block[] = [...opts.blocks];
  const poolSize = Math.min(opts.workers, total);
  const workerData: BlockWorkerData = {
    source: opts.source,
    target: opts.target,
    lock: createSharedMutexBuffer(),
    ioShimModule: opts.ioShimModule ?? null,
  };

  const settled = deferred<void>();
  const slots: Slot[] = [];
  const state: { failure: Error | null } = { failure: null };
  let completed = 0;
  let finished = false;

  const inFlight = (): number => slots.filter((s) => s.current !== null).length;

  const settleIfIdle = (): void => {
    if (finished) return;
    const done = completed === total;
    if (!done && (state.failure === null || inFlight() > 0)) return;
    finished = true;
    settled.resolve();
  };

  const fail = (err: Error): void => {
    if (state.failure === null) {
      state.failure = err;
      log({ level: "debug", message: `block pool stopping: ${err.message}`, path: opts.source });
    }
    settleIfIdle();
  };

  const send = (slot: Slot, msg: PoolToWorkerMessage): void => {
    slot.worker.postMessage(msg);
  };

  const dispatch = (slot: Slot): void => {
    if (state.failure === null && cancellation.isCancelled()) {
      state.failure = new PcopyError("PCOPY_CANCELLED", cancellation.reason() ?? "operation cancelled");
    }
    if (state.failure !== null) {
      settleIfIdle();
      return;
    }
    const block = queue.shift();
    if (block === undefined) {
      settleIfIdle();
      return;
    }
    const task: BlockTask = {
      type: "block",
      index: block.index,
      offset: block.offset,
      length: block.length,
    };
    slot.current = task;
    send(slot, task);
  };

  const onMessage = (slot: Slot, raw: unknown): void => {
    const msg = parseWorkerMessage(raw);
    if (msg === null) {
      fail(new PcopyError("PCOPY_WORKER_FAILED", `block worker ${String(slot.id)} sent a malformed message`));
      return;
    }
    if (msg.type === "ready") {
      dispatch(slot);
      return;
    }
    slot.current = null;
    if (msg.type === "failed") {
      fail(fromWireError(msg.error));
      return;
    }
    completed++;
    try {
      opts.onBlockDone(msg.bytes, msg.index);
    } catch (err) {
      fail(safeErr(err));
      return;
    }
    dispatch(slot);
  };

  const onWorkerGone = (slot: Slot, err: Error): void => {
    slot.current = null;
    fail(err);
  };

  const launch = workerLaunch(blockWorkerEntry());
  for (let id = 0; id < poolSize; id++) {
    const worker = new Worker(launch.url, { workerData, argv: [...launch.argv] });
    const slot: Slot = { id, worker, current: null, exited: false };
    slots.push(slot);
    worker.on("message", (raw: unknown) => {
      onMessage(slot, raw);
    });
    worker.on("error", (err) => {
      onWorkerGone(
        slot,
        new PcopyError("PCOPY_WORKER_FAILED", `block worker ${String(id)} crashed: ${safeErr(err).message}`),
      );
    });
    worker.on("exit", (code) => {
      slot.exited = true;
      if (finished) return;
      onWorkerGone(
        slot,
        new PcopyError("PCOPY_WORKER_FAILED", `block worker ${String(id)} exited early with code ${String(code)}`),
      );
    });
  }

  try {
    await settled.promise;
  } finally {
    await shutdown(slots, log);
  }

  if (state.failure !== null) throw state.failure;
}

async function shutdown(slots: readonly Slot[], log: LogSink): Promise<void> {
  await Promise.all(
    slots.map(async (slot) => {
      if (slot.exited) return;
      try {
        await slot.worker.terminate();
      } catch (err) {
        log({ level: "debug", message: `terminate failed: ${safeErr(err).message}` });
      }
    }),
  );
}
