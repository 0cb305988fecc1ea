import { runBenchmark } from "@pcopy/node";
import type { BenchmarkArgs } from "./args.js";
import type { CliContext } from "./context.js";

export async function benchmarkCommand(args: BenchmarkArgs, ctx: CliContext): Promise<number> {
  await runBenchmark({
    store: ctx.store,
    quiet: args.quiet,
    colors: ctx.colors,
    print: (line) => {
      ctx.io.write(`${line}\n`);
    },
    blockSize: ctx.settings.blockSize,
    tmpRoot: ctx.benchmarkTmpRoot,
    log: ctx.log,
  });
  return 0;
}
