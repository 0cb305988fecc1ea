/**
 * Overall progress of one copy or remove job, shared by every worker that
 * reports into it.
 *
 * Each call runs a synchronous mutation step that returns a frozen snapshot,
 * then draws that snapshot as a separate step. Reports from worker threads
 * arrive as messages on the owning thread, so the mutation step is the only
 * place state changes and terminal output never happens inside it.
 */

import { type LogSink, makeLogSink } from "../log.js";
import type { SpeedModel } from "../speed/speedModel.js";
import type { OperationKind } from "../types.js";
import { MIB } from "../units.js";
import {
  ANSI,
  formatInterruptNotice,
  formatStatusLine,
  formatSummary,
  moveTo,
} from "./statusLine.js";
import type { ProgressSink, ProgressSnapshot, ProgressSurface } from "./types.js";

/** Minimum wall-clock gap between two speed samples. */
export const SPEED_SAMPLE_INTERVAL_MS = 100;
/** A longer gap (e.g. a prompt) resets the speed instead of averaging it in. */
export const SPEED_IDLE_RESET_MS = 2000;
/** Weight kept from the previous smoothed speed. */
export const SPEED_SMOOTHING = 0.7;
/** Runs shorter than this are too noisy to learn from. */
export const MIN_RECORDED_ELAPSED_MS = 100;

export type ProgressAggregatorOptions = Readonly<{
  kind: OperationKind;
  totalItems: number;
  totalBytes: number;
  surface: ProgressSurface;
  speedModel?: SpeedModel;
  /** Monotonic milliseconds. */
  now?: () => number;
  log?: LogSink;
}>;

type MutableState = {
  completedItems: number;
  completedBytes: number;
  skippedItems: number;
  currentLabel: string;
  lastSampleBytes: number;
  lastSampleTime: number;
  smoothedSpeed: number;
};

function sanitizeTotal(n: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  return Math.floor(n);
}

function sanitizeDelta(n: number): number {
  if (!Number.isFinite(n) || n <= 0) return 0;
  return n;
}

export class ProgressAggregator implements ProgressSink {
  readonly kind: OperationKind;
  readonly totalItems: number;
  readonly totalBytes: number;

  private readonly surface: ProgressSurface;
  private readonly speedModel: SpeedModel | undefined;
  private readonly now: () => number;
  private readonly log: LogSink;
  private readonly startedAt: number;
  private readonly state: MutableState;

  private cursorHidden = false;
  private finished = false;

  constructor(opts: ProgressAggregatorOptions) {
    this.kind = opts.kind;
    this.totalItems = sanitizeTotal(opts.totalItems);
    this.totalBytes = sanitizeTotal(opts.totalBytes);
    this.surface = opts.surface;
    this.speedModel = opts.speedModel;
    this.now = opts.now ?? (() => performance.now());
    this.log = makeLogSink(opts.log);
    this.startedAt = this.now();
    this.state = {
      completedItems: 0,
      completedBytes: 0,
      skippedItems: 0,
      currentLabel: "",
      lastSampleBytes: 0,
      lastSampleTime: this.startedAt,
      smoothedSpeed: 0,
    };
  }

  update(label: string, bytesDelta: number): void {
    const snap = this.applyUpdate(label, sanitizeDelta(bytesDelta));
    this.render(snap);
  }

  /** Redraw at the current terminal width without counting anything. */
  refresh(): void {
    this.update(this.state.currentLabel, 0);
  }

  completeItem(): void {
    if (this.state.completedItems < this.totalItems) this.state.completedItems++;
  }

  skipItem(): void {
    this.state.skippedItems++;
  }

  snapshot(): ProgressSnapshot {
    return this.capture(this.now());
  }

  /**
   * Clear the status row, print the summary, restore the cursor and feed the
   * observed throughput back into the speed model.
   */
  finish(): ProgressSnapshot {
    const snap = this.snapshot();
    if (this.finished) return snap;
    this.finished = true;

    this.recordThroughput(snap);

    const { rows } = this.surface.size();
    const summary = formatSummary(snap, this.surface.colors);
    const restore = this.cursorHidden ? ANSI.showCursor : "";
    this.cursorHidden = false;
    this.surface.write(`${moveTo(rows)}${ANSI.clearLine}${summary}\n${restore}`);
    return snap;
  }

  /** Restore the cursor if a frame hid it. Safe to call on every exit path. */
  dispose(): void {
    if (!this.cursorHidden) return;
    this.cursorHidden = false;
    this.surface.write(ANSI.showCursor);
  }

  /**
   * Interrupt path: reads no counters and writes synchronously when the
   * surface can, so it is safe while a frame is being produced.
   */
  interrupt(): void {
    this.finished = true;
    this.cursorHidden = false;
    const write = this.surface.writeSync ?? this.surface.write;
    write(`${ANSI.showCursor}\n${formatInterruptNotice(this.surface.colors)}\n`);
  }

  private applyUpdate(label: string, bytesDelta: number): ProgressSnapshot {
    const s = this.state;
    const t = this.now();
    s.currentLabel = label;
    s.completedBytes += bytesDelta;

    const gapMs = t - s.lastSampleTime;
    if (gapMs > SPEED_IDLE_RESET_MS) {
      s.smoothedSpeed = 0;
      s.lastSampleBytes = s.completedBytes;
      s.lastSampleTime = t;
    } else if (gapMs > SPEED_SAMPLE_INTERVAL_MS) {
      const instant = (s.completedBytes - s.lastSampleBytes) / (gapMs / 1000);
      s.smoothedSpeed = SPEED_SMOOTHING * s.smoothedSpeed + (1 - SPEED_SMOOTHING) * instant;
      s.lastSampleBytes = s.completedBytes;
      s.lastSampleTime = t;
    }

    return this.capture(t);
  }

  private capture(t: number): ProgressSnapshot {
    const s = this.state;
    return Object.freeze({
      kind: this.kind,
      totalItems: this.totalItems,
      totalBytes: this.totalBytes,
      completedItems: s.completedItems,
      completedBytes: s.completedBytes,
      skippedItems: s.skippedItems,
      currentLabel: s.currentLabel,
      smoothedSpeed: s.smoothedSpeed,
      elapsedSeconds: Math.max(0, t - this.startedAt) / 1000,
    });
  }

  private render(snap: ProgressSnapshot): void {
    if (this.finished) return;
    const { columns, rows } = this.surface.size();
    let frame = "";
    if (!this.cursorHidden) {
      this.cursorHidden = true;
      // Reserve the bottom row before the first frame.
      frame += `${ANSI.hideCursor}\n`;
    }
    const line = formatStatusLine(snap, columns, this.surface.colors);
    frame += `${moveTo(rows)}${ANSI.clearLine}${line}${moveTo(Math.max(1, rows - 1))}`;
    this.surface.write(frame);
  }

  private recordThroughput(snap: ProgressSnapshot): void {
    if (this.speedModel === undefined) return;
    if (snap.totalBytes <= 0 || snap.completedBytes <= 0) return;
    const elapsedMs = snap.elapsedSeconds * 1000;
    if (elapsedMs <= MIN_RECORDED_ELAPSED_MS) return;
    const mbps = snap.completedBytes / MIB / snap.elapsedSeconds;
    this.speedModel.record(this.kind, mbps);
    this.log({ level: "debug", message: `recorded ${this.kind} throughput ${mbps.toFixed(1)} MB/s` });
  }
}
