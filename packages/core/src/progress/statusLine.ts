/**
 * Pure layout of the bottom status line and the closing summary.
 *
 * Format:
 *   ICON PCT [BAR] done/total | doneSize/totalSize | elapsed @ speed | name
 *
 * The name field has a fixed width so the bar keeps the same width from one
 * frame to the next; the bar absorbs whatever the terminal width leaves.
 */

import type { OperationKind } from "../types.js";
import { formatDuration, formatSize, formatSpeed } from "../units.js";
import type { ProgressSnapshot } from "./types.js";

export const ANSI = Object.freeze({
  reset: "\u001b[0m",
  bold: "\u001b[1m",
  dim: "\u001b[2m",
  red: "\u001b[31m",
  green: "\u001b[32m",
  yellow: "\u001b[33m",
  blue: "\u001b[34m",
  cyan: "\u001b[36m",
  hideCursor: "\u001b[?25l",
  showCursor: "\u001b[?25h",
  clearLine: "\u001b[2K",
});

export type AnsiStyle = Exclude<
  keyof typeof ANSI,
  "reset" | "hideCursor" | "showCursor" | "clearLine"
>;

export const LABEL_WIDTH = 20;
export const MIN_BAR_WIDTH = 10;
const BAR_PADDING = 5;
const ELLIPSIS = "...";

export function moveTo(row: number, col = 1): string {
  return `\u001b[${String(row)};${String(col)}H`;
}

export function paint(colors: boolean, style: AnsiStyle, text: string): string {
  return colors ? `${ANSI[style]}${text}${ANSI.reset}` : text;
}

/** Keep the tail of long names (`...` + last 17 chars); pad short ones. */
export function fitLabel(label: string, width = LABEL_WIDTH): string {
  if (label.length > width) {
    return `${ELLIPSIS}${label.slice(label.length - (width - ELLIPSIS.length))}`;
  }
  return label.padEnd(width, " ");
}

export function progressFraction(s: ProgressSnapshot): number {
  let fraction: number;
  if (s.totalBytes > 0) {
    fraction = s.completedBytes / s.totalBytes;
  } else {
    fraction = s.totalItems > 0 ? s.completedItems / s.totalItems : 1;
  }
  return Math.min(Math.max(fraction, 0), 1);
}

export function operationIcon(kind: OperationKind): string {
  return kind === "copy" ? "📋" : "🗑️ ";
}

export function formatPercent(fraction: number): string {
  return `${(fraction * 100).toFixed(1).padStart(5, " ")}%`;
}

export function computeBarWidth(columns: number, fixedLength: number): number {
  return Math.max(MIN_BAR_WIDTH, Math.floor(columns) - fixedLength - BAR_PADDING);
}

export function formatStatusLine(s: ProgressSnapshot, columns: number, colors: boolean): string {
  const fraction = progressFraction(s);
  const pct = formatPercent(fraction);
  const items = `${String(s.completedItems)}/${String(s.totalItems)}`;
  const sizes = `${formatSize(s.completedBytes)}/${formatSize(s.totalBytes)}`;
  const speed = s.smoothedSpeed > 0 ? formatSpeed(s.smoothedSpeed) : "---";
  const time = `${formatDuration(s.elapsedSeconds)} @ ${speed}`;
  const name = fitLabel(s.currentLabel);

  // icon, pct, "[", "]", separators and the fixed-width name field
  const fixedLength =
    2 + 1 + 6 + 1 + 2 + 1 + items.length + 3 + sizes.length + 3 + time.length + 3 + LABEL_WIDTH;
  const barWidth = computeBarWidth(columns, fixedLength);
  const filled = Math.floor(barWidth * fraction);
  const empty = barWidth - filled;

  const bar = colors
    ? `${ANSI.green}${"█".repeat(filled)}${ANSI.dim}${"░".repeat(empty)}${ANSI.reset}`
    : `${"█".repeat(filled)}${"░".repeat(empty)}`;

  const head = `${operationIcon(s.kind)} ${paint(colors, "bold", pct)} [${bar}]`;
  return `${head} ${items} | ${sizes} | ${paint(colors, "dim", time)} | ${paint(colors, "cyan", name)}`;
}

export function formatSummary(s: ProgressSnapshot, colors: boolean): string {
  const icon = s.kind === "copy" ? "✅" : "🗑️ ";
  const verb = s.kind === "copy" ? "Copied" : "Deleted";
  const done = `${verb}: ${String(s.completedItems)} files (${formatSize(s.completedBytes)})`;
  let summary = `${icon} ${paint(colors, "green", done)}`;
  if (s.skippedItems > 0) {
    summary += ` ${paint(colors, "yellow", `(Skipped: ${String(s.skippedItems)})`)}`;
  }
  return summary;
}

export function formatInterruptNotice(colors: boolean): string {
  return paint(colors, "yellow", "⚠ Operation cancelled by user");
}
