import type { OperationKind } from "../types.js";

export type TerminalSize = Readonly<{
  columns: number;
  rows: number;
}>;

/**
 * Where the status line is drawn. `write` receives one whole frame per call.
 * `writeSync`, when present, must not defer output; it is used on the
 * interrupt path right before the process exits.
 */
export type ProgressSurface = Readonly<{
  colors: boolean;
  size: () => TerminalSize;
  write: (data: string) => void;
  writeSync?: (data: string) => void;
}>;

/** The part of the aggregator that copy engines report into. */
export type ProgressSink = Readonly<{
  update: (label: string, bytesDelta: number) => void;
  skipItem: () => void;
}>;

export const NULL_PROGRESS: ProgressSink = Object.freeze({
  update: () => {},
  skipItem: () => {},
});

export type ProgressSnapshot = Readonly<{
  kind: OperationKind;
  totalItems: number;
  totalBytes: number;
  completedItems: number;
  completedBytes: number;
  skippedItems: number;
  currentLabel: string;
  /** Bytes per second, exponentially smoothed. */
  smoothedSpeed: number;
  elapsedSeconds: number;
}>;
