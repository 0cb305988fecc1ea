import { MAX_SPEED_SAMPLES, type ConfigStore, type PersistedConfig } from "../config/configStore.js";
import type { OperationKind } from "../types.js";
import { MIB, formatDuration } from "../units.js";

/** Throughput assumed before any run of that kind was observed. */
export const DEFAULT_SPEED_MBPS: Readonly<Record<OperationKind, number>> = Object.freeze({
  copy: 100,
  remove: 200,
});

export type DurationEstimate =
  | Readonly<{ kind: "underOneSecond" }>
  | Readonly<{ kind: "seconds"; seconds: number }>;

export const UNDER_ONE_SECOND: DurationEstimate = Object.freeze({ kind: "underOneSecond" });

function samplesKey(kind: OperationKind): "copySpeedsMbps" | "removeSpeedsMbps" {
  return kind === "copy" ? "copySpeedsMbps" : "removeSpeedsMbps";
}

function average(values: readonly number[]): number | null {
  if (values.length === 0) return null;
  let sum = 0;
  for (const v of values) sum += v;
  return sum / values.length;
}

export class SpeedModel {
  private readonly store: ConfigStore;

  constructor(store: ConfigStore) {
    this.store = store;
  }

  samples(kind: OperationKind): readonly number[] {
    return this.store.load()[samplesKey(kind)];
  }

  averageMbps(kind: OperationKind): number {
    return average(this.samples(kind)) ?? DEFAULT_SPEED_MBPS[kind];
  }

  estimate(totalBytes: number, kind: OperationKind): DurationEstimate {
    if (totalBytes <= 0) return UNDER_ONE_SECOND;
    const bytesPerSecond = this.averageMbps(kind) * MIB;
    return Object.freeze({ kind: "seconds", seconds: totalBytes / bytesPerSecond });
  }

  /**
   * Append one observation and persist right away.
   * Never throws; a failed save only loses this run's sample.
   */
  record(kind: OperationKind, throughputMbps: number): void {
    if (!Number.isFinite(throughputMbps) || throughputMbps <= 0) return;
    const key = samplesKey(kind);
    const next = [...this.samples(kind), throughputMbps].slice(-MAX_SPEED_SAMPLES);
    const patch: Partial<PersistedConfig> =
      key === "copySpeedsMbps" ? { copySpeedsMbps: next } : { removeSpeedsMbps: next };
    this.store.update(patch);
  }
}

export function formatEstimate(estimate: DurationEstimate): string {
  return estimate.kind === "underOneSecond" ? "< 1s" : formatDuration(estimate.seconds);
}
