import type { ProgressSink } from "@pcopy/core";

export type RecordedUpdate = Readonly<{ label: string; bytes: number }>;

export type RecordingProgress = ProgressSink &
  Readonly<{
    updates: readonly RecordedUpdate[];
    skips: () => number;
    totalBytes: () => number;
  }>;

/** Progress sink that keeps every report; `onUpdate` runs after recording. */
export function createRecordingProgress(
  onUpdate?: (update: RecordedUpdate) => void,
): RecordingProgress {
  const updates: RecordedUpdate[] = [];
  let skips = 0;
  return {
    updates,
    skips: () => skips,
    totalBytes: () => updates.reduce((sum, u) => sum + u.bytes, 0),
    update: (label, bytes) => {
      const entry = { label, bytes };
      updates.push(entry);
      onUpdate?.(entry);
    },
    skipItem: () => {
      skips++;
    },
  };
}
