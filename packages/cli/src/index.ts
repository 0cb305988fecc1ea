/**
 * @pcopy/cli
 *
 * The `pcopy` command: argument parsing, file enumeration, prompts and the
 * copy, remove and benchmark commands.
 */

export {
  type BenchmarkArgs,
  type CliArgs,
  type CommandName,
  type CopyArgs,
  type ParallelSetting,
  type RemoveArgs,
  helpText,
  parseArgs,
} from "./args.js";
export { runCli } from "./cli.js";
export { type ActiveProgress, type CliContext, type CliIo, createNodeCliContext } from "./context.js";
export { copyCommand, copyDestinationFor, resolveWorkerCount } from "./copyCommand.js";
export { removeCommand } from "./removeCommand.js";
export { benchmarkCommand } from "./benchmarkCommand.js";
export { type CollectOptions, type Enumeration, type FileEntry, collectFiles } from "./enumerate.js";
export { DRY_RUN_PREVIEW_COUNT, type DryRunReport, formatDryRun } from "./dryRun.js";
export {
  CONFIRM_COUNTDOWN_SECONDS,
  INVALID_ANSWER_PAUSE_MS,
  type OverwriteAnswer,
  type PromptIo,
  confirmRemoval,
  createOverwritePrompter,
  parseConfirmAnswer,
  parseOverwriteAnswer,
} from "./prompts.js";
