import { isPcopyError, safeErr } from "@pcopy/core";
import { INTERRUPT_EXIT_CODE } from "@pcopy/node";
import { helpText, parseArgs, type CliArgs } from "./args.js";
import { benchmarkCommand } from "./benchmarkCommand.js";
import type { CliContext } from "./context.js";
import { copyCommand } from "./copyCommand.js";
import { removeCommand } from "./removeCommand.js";

/** Exit codes: 0 success, 1 usage or validation error, 130 interrupted. */
export async function runCli(argv: readonly string[], ctx: CliContext): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(argv);
  } catch (err) {
    if (!isPcopyError(err, "PCOPY_USAGE")) throw err;
    ctx.io.writeError(`Error: ${err.message}\nRun 'pcopy --help' for usage.\n`);
    return 1;
  }

  try {
    switch (args.command) {
      case "help":
        ctx.io.write(helpText(args.topic));
        return 0;
      case "copy":
        return await copyCommand(args, ctx);
      case "remove":
        return await removeCommand(args, ctx);
      case "benchmark":
        return await benchmarkCommand(args, ctx);
    }
  } catch (err) {
    if (isPcopyError(err, "PCOPY_CANCELLED")) return INTERRUPT_EXIT_CODE;
    ctx.log({ level: "error", message: safeErr(err).message });
    return 1;
  }
}
