/**
 * @pcopy/core
 *
 * Runtime-agnostic TypeScript core for pcopy.
 * This package MUST NOT use Node-specific APIs (Buffer, worker_threads, node:* imports).
 */

// =============================================================================
// Errors, logging, shared types
// =============================================================================

export {
  PCOPY_ERROR_CODES,
  PcopyError,
  type PcopyErrorCode,
  errorCode,
  isPcopyError,
  isPcopyErrorCode,
  safeErr,
} from "./errors.js";
export {
  type LogEvent,
  type LogLevel,
  type LogSink,
  isLogLevel,
  levelEnabled,
  makeLogSink,
  noopLogSink,
} from "./log.js";
export {
  type OperationKind,
  type OverwriteDecider,
  type OverwriteDecision,
  alwaysOverwrite,
} from "./types.js";
export {
  type Cancellation,
  type CancellationToken,
  NEVER_CANCELLED,
  createCancellation,
} from "./cancellation.js";

// =============================================================================
// Units
// =============================================================================

export {
  DEFAULT_BLOCK_SIZE,
  DEFAULT_BUFFER_SIZE,
  DEFAULT_PARALLEL_THRESHOLD,
  DEFAULT_PARALLEL_WORKERS,
  KIB,
  MIB,
  bytesToMiB,
  formatDuration,
  formatSize,
  formatSpeed,
} from "./units.js";

// =============================================================================
// Block plan
// =============================================================================

export { type Block, type BlockPlan, planBlocks, shouldUseBlocks } from "./plan/blockPlan.js";

// =============================================================================
// Persisted settings + speed learning
// =============================================================================

export {
  type ConfigBackend,
  ConfigStore,
  type ConfigStoreOptions,
  EMPTY_CONFIG,
  MAX_SPEED_SAMPLES,
  type MemoryConfigBackend,
  type PersistedConfig,
  createMemoryConfigBackend,
  normalizeConfig,
} from "./config/configStore.js";
export {
  DEFAULT_SPEED_MBPS,
  type DurationEstimate,
  SpeedModel,
  UNDER_ONE_SECOND,
  formatEstimate,
} from "./speed/speedModel.js";

// =============================================================================
// Progress
// =============================================================================

export {
  NULL_PROGRESS,
  type ProgressSink,
  type ProgressSnapshot,
  type ProgressSurface,
  type TerminalSize,
} from "./progress/types.js";
export {
  ANSI,
  type AnsiStyle,
  LABEL_WIDTH,
  MIN_BAR_WIDTH,
  computeBarWidth,
  fitLabel,
  formatInterruptNotice,
  formatPercent,
  formatStatusLine,
  formatSummary,
  moveTo,
  operationIcon,
  paint,
  progressFraction,
} from "./progress/statusLine.js";
export {
  MIN_RECORDED_ELAPSED_MS,
  ProgressAggregator,
  type ProgressAggregatorOptions,
  SPEED_IDLE_RESET_MS,
  SPEED_SAMPLE_INTERVAL_MS,
  SPEED_SMOOTHING,
} from "./progress/progressAggregator.js";

// =============================================================================
// Benchmark
// =============================================================================

export {
  BENCHMARK_TRIALS,
  BENCHMARK_WORKER_COUNTS,
  type BenchmarkResult,
  type BenchmarkTiming,
  type WorkerMatrixOptions,
  formatBenchmarkDate,
  measureWorkerMatrix,
  selectOptimalWorkers,
  timingTable,
} from "./benchmark/workerMatrix.js";
