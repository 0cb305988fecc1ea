import type { ProgressSurface, TerminalSize } from "@pcopy/core";
import { writeSync } from "node:fs";
import terminalSize from "terminal-size";

const FALLBACK_SIZE: TerminalSize = Object.freeze({ columns: 80, rows: 24 });

/** The parts of a `tty.WriteStream` the status surface reads. */
export type SurfaceStream = Readonly<{
  isTTY?: boolean;
  columns?: number;
  rows?: number;
  fd?: number;
  write: (data: string) => boolean;
}>;

export type TtySurfaceOptions = Readonly<{
  stream?: SurfaceStream;
  /** `NO_COLOR` set: never emit color codes. */
  noColor?: boolean;
  /** Fallback lookup when the stream reports no size. */
  querySize?: () => TerminalSize;
}>;

function toPositiveIntOr(v: unknown, fallback: number): number {
  if (typeof v !== "number" || !Number.isFinite(v) || !Number.isInteger(v) || v <= 0) return fallback;
  return v;
}

function queryTerminalSize(): TerminalSize {
  try {
    const size = terminalSize();
    return {
      columns: toPositiveIntOr(size.columns, FALLBACK_SIZE.columns),
      rows: toPositiveIntOr(size.rows, FALLBACK_SIZE.rows),
    };
  } catch {
    return FALLBACK_SIZE;
  }
}

export function readSurfaceSize(
  stream: SurfaceStream,
  querySize: () => TerminalSize = queryTerminalSize,
): TerminalSize {
  const columns = toPositiveIntOr(stream.columns, 0);
  const rows = toPositiveIntOr(stream.rows, 0);
  if (columns > 0 && rows > 0) return { columns, rows };
  const fallback = querySize();
  return { columns: columns > 0 ? columns : fallback.columns, rows: rows > 0 ? rows : fallback.rows };
}

/**
 * Status surface over stdout. `writeSync` bypasses the stream buffer so the
 * interrupt notice is on screen before the process exits.
 */
export function createTtySurface(opts: TtySurfaceOptions = {}): ProgressSurface {
  const stream: SurfaceStream = opts.stream ?? process.stdout;
  const querySize = opts.querySize ?? queryTerminalSize;
  const fd = stream.fd;
  return Object.freeze({
    colors: stream.isTTY === true && opts.noColor !== true,
    size: () => readSurfaceSize(stream, querySize),
    write: (data: string) => {
      stream.write(data);
    },
    writeSync: (data: string) => {
      if (typeof fd === "number") {
        writeSync(fd, data);
        return;
      }
      stream.write(data);
    },
  });
}
