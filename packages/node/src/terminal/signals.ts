/**
 * Process signal wiring for a running job: SIGINT cancels, sweeps partial
 * targets, prints the interrupt notice and exits 130; terminal resizes
 * trigger a redraw at the new width.
 */

import type { Cancellation } from "@pcopy/core";
import type { PartialFileRegistry } from "../copy/partials.js";

export const INTERRUPT_EXIT_CODE = 130;

/** Event source the handlers attach to; `process` in production. */
export type SignalSource = Readonly<{
  on: (event: "SIGINT" | "SIGWINCH", listener: () => void) => unknown;
  off: (event: "SIGINT" | "SIGWINCH", listener: () => void) => unknown;
}>;

export type ResizeSource = Readonly<{
  on: (event: "resize", listener: () => void) => unknown;
  off: (event: "resize", listener: () => void) => unknown;
}>;

export type InterruptTarget = Readonly<{
  interrupt: () => void;
  refresh: () => void;
}>;

export type InterruptOptions = Readonly<{
  cancellation: Cancellation;
  partials: PartialFileRegistry;
  /** Current progress line, if one is showing. */
  progress: () => InterruptTarget | null;
  exit?: (code: number) => void;
}>;

export type SignalWiringOptions = InterruptOptions &
  Readonly<{
    signals?: SignalSource;
    resize?: ResizeSource;
  }>;

/**
 * The Ctrl+C path shared by the process signal and readline prompts, which
 * swallow the signal while they own the terminal.
 */
export function createInterruptHandler(opts: InterruptOptions): () => void {
  const exit = opts.exit ?? ((code: number) => process.exit(code));
  return () => {
    opts.cancellation.cancel("interrupted");
    opts.partials.sweepSync();
    opts.progress()?.interrupt();
    exit(INTERRUPT_EXIT_CODE);
  };
}

/** Returns a function that detaches every handler. */
export function installSignalHandlers(opts: SignalWiringOptions): () => void {
  const signals: SignalSource = opts.signals ?? process;
  const resize: ResizeSource | null = opts.resize ?? (process.stdout.isTTY ? process.stdout : null);
  const onInterrupt = createInterruptHandler(opts);

  const onResize = (): void => {
    opts.progress()?.refresh();
  };

  signals.on("SIGINT", onInterrupt);
  signals.on("SIGWINCH", onResize);
  resize?.on("resize", onResize);

  return () => {
    signals.off("SIGINT", onInterrupt);
    signals.off("SIGWINCH", onResize);
    resize?.off("resize", onResize);
  };
}
