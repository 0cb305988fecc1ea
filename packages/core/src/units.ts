/**
 * Byte/time constants and the human-readable formatters used by the status
 * line, summaries and dry-run previews.
 */

export const KIB = 1024;
export const MIB = 1024 * 1024;

/** Chunk size of the sequential streaming copy. */
export const DEFAULT_BUFFER_SIZE = 16 * MIB;
/** Unit of parallel work. */
export const DEFAULT_BLOCK_SIZE = 32 * MIB;
/** Files strictly larger than this use the block engine when parallel mode is on. */
export const DEFAULT_PARALLEL_THRESHOLD = 64 * MIB;
export const DEFAULT_PARALLEL_WORKERS = 4;

const SIZE_UNITS = ["B", "KB", "MB", "GB", "TB"] as const;
const SPEED_UNITS = ["B/s", "KB/s", "MB/s", "GB/s", "TB/s"] as const;

export function formatSize(bytes: number): string {
  let size = bytes;
  for (const unit of SIZE_UNITS) {
    if (size < 1024) return `${size.toFixed(1)}${unit}`;
    size /= 1024;
  }
  return `${size.toFixed(1)}PB`;
}

export function formatDuration(seconds: number): string {
  if (seconds < 0) return "calculating...";
  if (seconds < 60) return `${Math.floor(seconds)}s`;
  if (seconds < 3600) {
    const mins = Math.floor(seconds / 60);
    const secs = Math.floor(seconds % 60);
    return `${mins}m ${secs}s`;
  }
  const hours = Math.floor(seconds / 3600);
  const mins = Math.floor((seconds % 3600) / 60);
  return `${hours}h ${mins}m`;
}

export function formatSpeed(bytesPerSecond: number): string {
  if (bytesPerSecond < 1024) return `${bytesPerSecond.toFixed(0)}B/s`;
  let value = bytesPerSecond;
  let unitIndex = 0;
  while (value >= 1024 && unitIndex < SPEED_UNITS.length - 1) {
    value /= 1024;
    unitIndex++;
  }
  return `${value.toFixed(1)}${SPEED_UNITS[unitIndex] ?? "TB/s"}`;
}

export function bytesToMiB(bytes: number): number {
  return bytes / MIB;
}
