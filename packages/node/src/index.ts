/**
 * @pcopy/node
 *
 * Node.js backend for pcopy: worker-thread block copy, streaming copy,
 * terminal surface, signal wiring, persisted settings and the benchmark.
 */

export { copyLarge, type BlockCopyOptions } from "./copy/blockCopy.js";
export { copyFileStreaming, type StreamCopyOptions, streamIntoTarget } from "./copy/streamCopy.js";
export {
  type CopyOutcome,
  type FileCopyOptions,
  type PreparedTarget,
  prepareTarget,
  resolveCopyContext,
  resolveCopyTarget,
} from "./copy/target.js";
export { runBlockPool, type BlockPoolOptions } from "./copy/workerPool.js";
export { PartialFileRegistry } from "./copy/partials.js";
export { copyMetadata } from "./copy/metadata.js";
export { type SharedMutex, createSharedMutex, createSharedMutexBuffer } from "./copy/sharedMutex.js";

export { createJsonFileConfigBackend } from "./config/jsonFileConfig.js";
export {
  type Env,
  type RuntimeSettings,
  defaultConfigPath,
  envFlag,
  envPositiveInt,
  readEnv,
  resolveRuntimeSettings,
} from "./settings.js";

export {
  type LineWriter,
  type StderrLogSinkOptions,
  createNdjsonLogSink,
  createStderrLogSink,
  formatLogLine,
  teeLogSinks,
} from "./log/sinks.js";

export {
  type SurfaceStream,
  type TtySurfaceOptions,
  createTtySurface,
  readSurfaceSize,
} from "./terminal/ttySurface.js";
export {
  INTERRUPT_EXIT_CODE,
  type InterruptOptions,
  type InterruptTarget,
  type ResizeSource,
  type SignalSource,
  type SignalWiringOptions,
  createInterruptHandler,
  installSignalHandlers,
} from "./terminal/signals.js";

export { SYSTEM_DIRECTORIES, isPathWithin, isSystemDirectory } from "./paths.js";
export {
  BENCHMARK_PAYLOAD_BYTES,
  type BenchmarkOptions,
  runBenchmark,
} from "./benchmark/runBenchmark.js";
