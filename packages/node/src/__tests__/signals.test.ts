import { createCancellation } from "@pcopy/core";
import { assert, describe, pathExists, test, withTempDir } from "@pcopy/testkit";
import { EventEmitter } from "node:events";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PartialFileRegistry } from "../copy/partials.js";
import { INTERRUPT_EXIT_CODE, createInterruptHandler, installSignalHandlers } from "../terminal/signals.js";

function fakeProgress() {
  const calls: string[] = [];
  return {
    calls,
    target: {
      interrupt: () => {
        calls.push("interrupt");
      },
      refresh: () => {
        calls.push("refresh");
      },
    },
  };
}

describe("installSignalHandlers", () => {
  test("SIGINT cancels, sweeps partial files, prints and exits 130", async () => {
    await withTempDir(async (dir) => {
      const partialPath = join(dir, "big.part");
      await writeFile(partialPath, "half");
      const partials = new PartialFileRegistry();
      partials.track(partialPath);
      const cancellation = createCancellation();
      const signals = new EventEmitter();
      const resize = new EventEmitter();
      const exits: number[] = [];
      const progress = fakeProgress();

      installSignalHandlers({
        cancellation,
        partials,
        progress: () => progress.target,
        signals,
        resize,
        exit: (code) => {
          exits.push(code);
        },
      });
      signals.emit("SIGINT");

      assert.equal(cancellation.token.isCancelled(), true);
      assert.equal(cancellation.token.reason(), "interrupted");
      assert.equal(await pathExists(partialPath), false);
      assert.deepEqual(progress.calls, ["interrupt"]);
      assert.deepEqual(exits, [INTERRUPT_EXIT_CODE]);
    });
  });

  test("resizes redraw the progress line", () => {
    const signals = new EventEmitter();
    const resize = new EventEmitter();
    const progress = fakeProgress();
    installSignalHandlers({
      cancellation: createCancellation(),
      partials: new PartialFileRegistry(),
      progress: () => progress.target,
      signals,
      resize,
      exit: () => {},
    });
    signals.emit("SIGWINCH");
    resize.emit("resize");
    assert.deepEqual(progress.calls, ["refresh", "refresh"]);
  });

  test("works before any progress line exists and detaches cleanly", () => {
    const signals = new EventEmitter();
    const resize = new EventEmitter();
    const exits: number[] = [];
    const detach = installSignalHandlers({
      cancellation: createCancellation(),
      partials: new PartialFileRegistry(),
      progress: () => null,
      signals,
      resize,
      exit: (code) => {
        exits.push(code);
      },
    });
    signals.emit("SIGINT");
    assert.deepEqual(exits, [130]);

    detach();
    assert.equal(signals.listenerCount("SIGINT"), 0);
    assert.equal(signals.listenerCount("SIGWINCH"), 0);
    assert.equal(resize.listenerCount("resize"), 0);
  });
});

describe("createInterruptHandler", () => {
  test("runs the full interrupt path without any signal source", async () => {
    await withTempDir(async (dir) => {
      const partialPath = join(dir, "notes.part");
      await writeFile(partialPath, "partial");
      const partials = new PartialFileRegistry();
      partials.track(partialPath);
      const cancellation = createCancellation();
      const exits: number[] = [];
      const progress = fakeProgress();

      const interrupt = createInterruptHandler({
        cancellation,
        partials,
        progress: () => progress.target,
        exit: (code) => {
          exits.push(code);
        },
      });
      interrupt();

      assert.equal(cancellation.token.reason(), "interrupted");
      assert.equal(await pathExists(partialPath), false);
      assert.deepEqual(progress.calls, ["interrupt"]);
      assert.deepEqual(exits, [INTERRUPT_EXIT_CODE]);
    });
  });
});
