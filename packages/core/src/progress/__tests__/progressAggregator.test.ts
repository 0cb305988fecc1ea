import {
  assert,
  createManualClock,
  createRecordingSurface,
  createScreen,
  describe,
  test,
} from "@pcopy/testkit";
import { ConfigStore, createMemoryConfigBackend } from "../../config/configStore.js";
import { SpeedModel } from "../../speed/speedModel.js";
import { MIB } from "../../units.js";
import { ProgressAggregator } from "../progressAggregator.js";
import { ANSI, formatStatusLine } from "../statusLine.js";

function near(actual: number, expected: number): void {
  assert.ok(Math.abs(actual - expected) < 1e-6, `expected ${String(expected)}, got ${String(actual)}`);
}

function setup(totalItems = 4, totalBytes = 4000) {
  const clock = createManualClock(0);
  const surface = createRecordingSurface({ columns: 80, rows: 24 });
  const backend = createMemoryConfigBackend();
  const speedModel = new SpeedModel(new ConfigStore(backend));
  const agg = new ProgressAggregator({
    kind: "copy",
    totalItems,
    totalBytes,
    surface,
    speedModel,
    now: clock.now,
  });
  return { clock, surface, backend, speedModel, agg };
}

describe("ProgressAggregator speed smoothing", () => {
  test("samples at most every 100ms and smooths with 0.7/0.3 weights", () => {
    const { clock, agg } = setup();
    clock.set(50);
    agg.update("a", 100);
    assert.equal(agg.snapshot().smoothedSpeed, 0);

    clock.set(150);
    agg.update("a", 900);
    near(agg.snapshot().smoothedSpeed, 2000);

    clock.set(350);
    agg.update("a", 1000);
    near(agg.snapshot().smoothedSpeed, 2900);
  });

  test("a pause over two seconds resets the speed", () => {
    const { clock, agg } = setup();
    clock.set(150);
    agg.update("a", 900);
    assert.ok(agg.snapshot().smoothedSpeed > 0);
    clock.advance(2500);
    agg.update("a", 10);
    assert.equal(agg.snapshot().smoothedSpeed, 0);
  });

  test("bytes reported between samples still count toward the next one", () => {
    const { clock, agg } = setup();
    clock.set(60);
    agg.update("a", 50);
    clock.set(120);
    agg.update("a", 50);
    near(agg.snapshot().smoothedSpeed, 250);
  });
});

describe("ProgressAggregator counters", () => {
  test("refresh redraws without counting bytes", () => {
    const { agg, surface } = setup();
    agg.update("a.txt", 10);
    agg.refresh();
    assert.equal(agg.snapshot().completedBytes, 10);
    assert.equal(agg.snapshot().currentLabel, "a.txt");
    assert.equal(surface.frames.length, 2);
  });

  test("negative and non-finite deltas are ignored", () => {
    const { agg } = setup();
    agg.update("a", -5);
    agg.update("a", Number.NaN);
    agg.update("a", 7);
    assert.equal(agg.snapshot().completedBytes, 7);
  });

  test("completed items never exceed the total", () => {
    const { agg } = setup(2);
    agg.completeItem();
    agg.completeItem();
    agg.completeItem();
    assert.equal(agg.snapshot().completedItems, 2);
  });

  test("skips are counted separately", () => {
    const { agg } = setup();
    agg.skipItem();
    agg.skipItem();
    assert.equal(agg.snapshot().skippedItems, 2);
    assert.equal(agg.snapshot().completedItems, 0);
  });

  test("concurrent reporters lose no updates", async () => {
    const { agg } = setup(8, 8 * 100 * 64);
    const reporter = async (id: number): Promise<void> => {
      for (let i = 0; i < 100; i++) {
        agg.update(`file-${String(id)}`, 64);
        await Promise.resolve();
      }
      agg.completeItem();
    };
    await Promise.all([0, 1, 2, 3, 4, 5, 6, 7].map(reporter));
    const snap = agg.snapshot();
    assert.equal(snap.completedBytes, 8 * 100 * 64);
    assert.equal(snap.completedItems, 8);
  });
});

describe("ProgressAggregator rendering", () => {
  test("first frame reserves the bottom row and hides the cursor", () => {
    const { agg, surface } = setup();
    agg.update("a.txt", 100);
    const line = formatStatusLine(agg.snapshot(), 80, false);
    assert.deepEqual(surface.frames, [
      `${ANSI.hideCursor}\n\u001b[24;1H${ANSI.clearLine}${line}\u001b[23;1H`,
    ]);
  });

  test("later frames only redraw the status row", () => {
    const { agg, surface } = setup();
    agg.update("a.txt", 100);
    agg.update("b.txt", 100);
    const line = formatStatusLine(agg.snapshot(), 80, false);
    assert.equal(surface.frames[1], `\u001b[24;1H${ANSI.clearLine}${line}\u001b[23;1H`);
  });

  test("frames follow the terminal size", () => {
    const { agg, surface } = setup();
    agg.update("a.txt", 100);
    surface.resize(120, 30);
    agg.refresh();
    const line = formatStatusLine(agg.snapshot(), 120, false);
    assert.equal(surface.frames[1], `\u001b[30;1H${ANSI.clearLine}${line}\u001b[29;1H`);
  });

  test("status line lands on the bottom row of a real terminal", async () => {
    const { agg, surface } = setup(4, 1000);
    const screen = createScreen({ cols: 80, rows: 24 });
    agg.update("a.txt", 500);
    await screen.write(surface.output());
    const snap = screen.snapshot();
    const bottom = snap.lines[23] ?? "";
    assert.ok(bottom.includes("0/4 | 500.0B/1000.0B | 0s @ --- | a.txt"), bottom);
    assert.equal(screen.cursorRow(), 22);
  });

  test("redraw after a resize uses the new bottom row", async () => {
    const { agg, surface } = setup(4, 1000);
    const screen = createScreen({ cols: 80, rows: 24 });
    agg.update("a.txt", 500);
    await screen.write(surface.output());
    surface.resize(80, 12);
    await screen.resize(80, 12);
    agg.update("b.txt", 250);
    await screen.write(surface.frames[1] ?? "");
    const bottom = screen.snapshot().lines[11] ?? "";
    assert.ok(bottom.includes("0/4 | 750.0B/1000.0B | 0s @ --- | b.txt"), bottom);
  });
});

describe("ProgressAggregator.finish", () => {
  test("records throughput and prints the summary", () => {
    const { clock, agg, surface, speedModel, backend } = setup(1, 2 * MIB);
    agg.update("big.bin", 2 * MIB);
    agg.completeItem();
    clock.set(1000);
    const snap = agg.finish();
    assert.equal(snap.completedBytes, 2 * MIB);
    assert.deepEqual(speedModel.samples("copy"), [2]);
    assert.equal(backend.writes.length, 1);
    assert.equal(
      surface.frames[surface.frames.length - 1],
      `\u001b[24;1H${ANSI.clearLine}✅ Copied: 1 files (2.0MB)\n${ANSI.showCursor}`,
    );
  });

  test("very short runs are not recorded", () => {
    const { clock, agg, speedModel } = setup(1, 2 * MIB);
    agg.update("big.bin", 2 * MIB);
    clock.set(50);
    agg.finish();
    assert.deepEqual(speedModel.samples("copy"), []);
  });

  test("is idempotent and stops further frames", () => {
    const { clock, agg, surface, backend } = setup(1, 2 * MIB);
    agg.update("big.bin", 2 * MIB);
    clock.set(1000);
    agg.finish();
    const count = surface.frames.length;
    agg.finish();
    agg.update("late", 1);
    assert.equal(surface.frames.length, count);
    assert.equal(backend.writes.length, 1);
  });
});

describe("ProgressAggregator exit paths", () => {
  test("interrupt writes the notice synchronously", () => {
    const { agg, surface } = setup();
    agg.update("a", 1);
    agg.interrupt();
    assert.deepEqual(surface.syncFrames, [`${ANSI.showCursor}\n⚠ Operation cancelled by user\n`]);
    agg.update("a", 1);
    assert.equal(surface.frames.length, 1);
  });

  test("dispose restores the cursor once", () => {
    const { agg, surface } = setup();
    agg.update("a", 1);
    agg.dispose();
    agg.dispose();
    assert.deepEqual(surface.frames.slice(1), [ANSI.showCursor]);
  });

  test("dispose before any frame writes nothing", () => {
    const { agg, surface } = setup();
    agg.dispose();
    assert.deepEqual(surface.frames, []);
  });
});
