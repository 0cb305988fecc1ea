/**
 * Interactive questions: the overwrite prompt drawn above the status row and
 * the confirmation before a remove.
 */

import {
  ANSI,
  type OverwriteDecider,
  PcopyError,
  type ProgressSurface,
  formatSize,
  moveTo,
  paint,
} from "@pcopy/core";
import { createInterface } from "node:readline/promises";

export type OverwriteAnswer = "yes" | "no" | "all" | "quit" | "invalid";

export function parseOverwriteAnswer(raw: string): OverwriteAnswer {
  switch (raw.trim().toLowerCase()) {
    case "y":
    case "yes":
      return "yes";
    case "n":
    case "no":
      return "no";
    case "a":
    case "all":
      return "all";
    case "q":
    case "quit":
      return "quit";
    default:
      return "invalid";
  }
}

/** Empty input means no. */
export function parseConfirmAnswer(raw: string): boolean | null {
  switch (raw.trim().toLowerCase()) {
    case "y":
    case "yes":
      return true;
    case "":
    case "n":
    case "no":
      return false;
    default:
      return null;
  }
}

export type PromptIo = Readonly<{
  write: (text: string) => void;
  question: (prompt: string) => Promise<string>;
  delay: (ms: number) => Promise<void>;
}>;

export type ReadlineQuestionOptions = Readonly<{
  input: NodeJS.ReadableStream;
  output: NodeJS.WritableStream;
  /** Defaults to whether `output` is a TTY. */
  terminal?: boolean;
  /** Ctrl+C while the question is open. */
  onInterrupt: () => void;
}>;

/**
 * Readline takes the terminal out of cooked mode, so Ctrl+C arrives as a
 * keypress rather than a process signal. Route it to `onInterrupt`, then
 * fail the question with PCOPY_CANCELLED in case the handler returns.
 */
export function createReadlineQuestion(opts: ReadlineQuestionOptions): (prompt: string) => Promise<string> {
  return async (prompt) => {
    const rl = createInterface({ input: opts.input, output: opts.output, terminal: opts.terminal });
    const abort = new AbortController();
    rl.on("SIGINT", () => {
      opts.onInterrupt();
      abort.abort();
    });
    try {
      return await rl.question(prompt, { signal: abort.signal });
    } catch (err) {
      if (abort.signal.aborted) throw new PcopyError("PCOPY_CANCELLED", "interrupted");
      throw err;
    } finally {
      rl.close();
    }
  };
}

export const INVALID_ANSWER_PAUSE_MS = 1500;

export type OverwritePrompterOptions = Readonly<{
  io: PromptIo;
  /** Terminal the status line is drawn on; the prompt uses the row above it. */
  surface: ProgressSurface;
  colors: boolean;
}>;

export function createOverwritePrompter(opts: OverwritePrompterOptions): OverwriteDecider {
  const { io, surface, colors } = opts;
  let overwriteAll = false;

  return async (target) => {
    if (overwriteAll) return "proceedAll";
    const row = Math.max(1, surface.size().rows - 1);
    const clearRow = `${moveTo(row)}${ANSI.clearLine}`;
    io.write(`${clearRow}${ANSI.showCursor}`);

    for (;;) {
      io.write(clearRow);
      const answer = parseOverwriteAnswer(
        await io.question(paint(colors, "yellow", `Overwrite '${target}'? [y/n/a/q]: `)),
      );
      switch (answer) {
        case "yes":
          io.write(`${clearRow}${ANSI.hideCursor}`);
          return "proceed";
        case "no":
          io.write(`${clearRow}${ANSI.hideCursor}`);
          return "skip";
        case "all":
          overwriteAll = true;
          io.write(`${clearRow}${ANSI.hideCursor}`);
          return "proceedAll";
        case "quit":
          io.write(clearRow);
          return "abort";
        case "invalid":
          io.write(`${clearRow}${paint(colors, "red", "Invalid option. Use: y (yes), n (no), a (all), q (quit)")}`);
          await io.delay(INVALID_ANSWER_PAUSE_MS);
          break;
      }
    }
  };
}

export const CONFIRM_COUNTDOWN_SECONDS = 3;

export type ConfirmRemovalOptions = Readonly<{
  io: PromptIo;
  colors: boolean;
  fileCount: number;
  totalBytes: number;
  countdownSeconds?: number;
}>;

/**
 * Announce the removal, wait out the countdown, then ask until the answer
 * is yes or no.
 */
export async function confirmRemoval(opts: ConfirmRemovalOptions): Promise<boolean> {
  const { io, colors } = opts;
  const countdown = opts.countdownSeconds ?? CONFIRM_COUNTDOWN_SECONDS;
  io.write(
    `${paint(colors, "yellow", `Will delete ${String(opts.fileCount)} files (${formatSize(opts.totalBytes)})`)}\n`,
  );
  for (let i = countdown; i > 0; i--) {
    io.write(`\r${paint(colors, "dim", `Wait ${String(i)}s before confirming...`)}  `);
    await io.delay(1000);
  }
  io.write(`\r${" ".repeat(40)}\r`);

  for (;;) {
    const answer = parseConfirmAnswer(await io.question(paint(colors, "bold", "Continue? [y/N]: ")));
    if (answer !== null) return answer;
    io.write(`${paint(colors, "red", "Invalid option. Use: y (yes) or n (no)")}\n`);
  }
}
