import type { ProgressSurface, TerminalSize } from "@pcopy/core";

export type RecordingSurface = ProgressSurface &
  Readonly<{
    frames: readonly string[];
    syncFrames: readonly string[];
    output: () => string;
    resize: (columns: number, rows: number) => void;
  }>;

/** In-memory status surface; keeps every write for assertions. */
export function createRecordingSurface(
  opts: Readonly<{ columns?: number; rows?: number; colors?: boolean }> = {},
): RecordingSurface {
  let size: TerminalSize = { columns: opts.columns ?? 80, rows: opts.rows ?? 24 };
  const frames: string[] = [];
  const syncFrames: string[] = [];
  return {
    colors: opts.colors ?? false,
    frames,
    syncFrames,
    size: () => size,
    write: (data) => {
      frames.push(data);
    },
    writeSync: (data) => {
      syncFrames.push(data);
    },
    output: () => frames.join(""),
    resize: (columns, rows) => {
      size = { columns, rows };
    },
  };
}
