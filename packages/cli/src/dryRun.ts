import { type OperationKind, formatSize, paint } from "@pcopy/core";
import { relative, resolve } from "node:path";
import type { FileEntry } from "./enumerate.js";

export const DRY_RUN_PREVIEW_COUNT = 10;

export type DryRunReport = Readonly<{
  kind: OperationKind;
  files: readonly FileEntry[];
  totalBytes: number;
  /** Already formatted, e.g. "4s" or "< 1s". */
  estimate: string;
  /** Copy only. */
  destination?: string;
  /** Remove only: directories removed after their files. */
  directories?: readonly string[];
  /** Paths are shown relative to this directory. */
  cwd: string;
}>;

/** Lines printed by `-n`; nothing is touched on disk. */
export function formatDryRun(report: DryRunReport, colors: boolean): string[] {
  const copy = report.kind === "copy";
  const countColor = copy ? "green" : "red";
  const rel = (p: string): string => relative(report.cwd, resolve(report.cwd, p));
  const arrow = paint(colors, "dim", "→");

  const lines = [
    paint(colors, "cyan", `🔍 Dry-run mode - No files will be ${copy ? "copied" : "deleted"}`),
    "",
    paint(colors, "bold", "Summary:"),
    `  Files to ${copy ? "copy" : "delete"}: ${paint(colors, countColor, String(report.files.length))}`,
    `  Total size: ${paint(colors, countColor, formatSize(report.totalBytes))}`,
    `  Estimated time: ${paint(colors, "yellow", `~${report.estimate}`)}`,
  ];
  if (copy && report.destination !== undefined) {
    lines.push(`  Destination: ${paint(colors, "blue", report.destination)}`);
  }
  lines.push("", paint(colors, "bold", `Files (showing first ${String(DRY_RUN_PREVIEW_COUNT)}):`));
  for (const f of report.files.slice(0, DRY_RUN_PREVIEW_COUNT)) {
    lines.push(`  ${arrow} ${rel(f.path)} ${paint(colors, "dim", `(${formatSize(f.size)})`)}`);
  }
  const hidden = report.files.length - DRY_RUN_PREVIEW_COUNT;
  if (hidden > 0) {
    lines.push(`  ${paint(colors, "dim", `... and ${String(hidden)} more files`)}`);
  }

  const dirs = report.directories ?? [];
  if (dirs.length > 0) {
    lines.push("", paint(colors, "bold", "Directories:"));
    for (const d of dirs) lines.push(`  ${arrow} ${rel(d)}/`);
  }
  return lines;
}
