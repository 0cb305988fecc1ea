/**
 * Everything a command needs from the outside world. `createNodeCliContext`
 * wires the real process; tests build their own from in-memory pieces.
 */

import {
  type Cancellation,
  ConfigStore,
  type LogSink,
  type ProgressAggregator,
  type ProgressSurface,
  SpeedModel,
  createCancellation,
} from "@pcopy/core";
import {
  PartialFileRegistry,
  type RuntimeSettings,
  createJsonFileConfigBackend,
  createInterruptHandler,
  createNdjsonLogSink,
  createStderrLogSink,
  createTtySurface,
  resolveRuntimeSettings,
  teeLogSinks,
} from "@pcopy/node";
import { spawnSync } from "node:child_process";
import { setTimeout as sleep } from "node:timers/promises";
import { type PromptIo, createReadlineQuestion } from "./prompts.js";

export type CliIo = PromptIo &
  Readonly<{
    /** Unstyled access to stderr for usage errors. */
    writeError: (text: string) => void;
  }>;

/** The aggregator currently drawing, read by the signal handlers. */
export type ActiveProgress = { current: ProgressAggregator | null };

export type CliContext = Readonly<{
  io: CliIo;
  cwd: string;
  colors: boolean;
  settings: RuntimeSettings;
  store: ConfigStore;
  speedModel: SpeedModel;
  surface: ProgressSurface;
  log: LogSink;
  cancellation: Cancellation;
  partials: PartialFileRegistry;
  active: ActiveProgress;
  /** Runs `/bin/cp` with the given arguments and returns its exit status. */
  runSystemCopy: (args: readonly string[]) => number;
  now?: () => number;
  /** Parent of the benchmark scratch directory. */
  benchmarkTmpRoot?: string;
}>;

export function createNodeCliContext(): CliContext {
  const settings = resolveRuntimeSettings(process.env);
  const colors = process.stdout.isTTY === true && !settings.noColor;
  const stderrLog = createStderrLogSink({
    minLevel: settings.logLevel,
    colors: process.stderr.isTTY === true && !settings.noColor,
  });
  const logFile = settings.logFile;
  const log: LogSink =
    logFile === null
      ? stderrLog
      : teeLogSinks(
          stderrLog,
          createNdjsonLogSink(logFile, {
            onError: (err) => {
              stderrLog({ level: "warn", message: `log file disabled: ${err.message}`, path: logFile });
            },
          }),
        );
  const store = new ConfigStore(createJsonFileConfigBackend(settings.configPath), { log });
  const cancellation = createCancellation();
  const partials = new PartialFileRegistry({ log });
  const active: ActiveProgress = { current: null };
  const question = createReadlineQuestion({
    input: process.stdin,
    output: process.stdout,
    onInterrupt: createInterruptHandler({ cancellation, partials, progress: () => active.current }),
  });

  return {
    io: {
      write: (text) => {
        process.stdout.write(text);
      },
      writeError: (text) => {
        process.stderr.write(text);
      },
      question,
      delay: async (ms) => {
        await sleep(ms);
      },
    },
    cwd: process.cwd(),
    colors,
    settings,
    store,
    speedModel: new SpeedModel(store),
    surface: createTtySurface({ stream: process.stdout, noColor: settings.noColor }),
    log,
    cancellation,
    partials,
    active,
    runSystemCopy: (args) => {
      const result = spawnSync("/bin/cp", [...args], { stdio: "inherit" });
      return result.status ?? 1;
    },
  };
}
