import { PcopyError } from "@pcopy/core";

export type ParallelSetting =
  | Readonly<{ kind: "off" }>
  | Readonly<{ kind: "auto" }>
  | Readonly<{ kind: "workers"; workers: number }>;

export type CopyArgs = Readonly<{
  command: "copy";
  sources: readonly string[];
  destination: string;
  recursive: boolean;
  dryRun: boolean;
  parallel: ParallelSetting;
}>;

export type RemoveArgs = Readonly<{
  command: "remove";
  targets: readonly string[];
  recursive: boolean;
  force: boolean;
  dryRun: boolean;
}>;

export type BenchmarkArgs = Readonly<{
  command: "benchmark";
  quiet: boolean;
}>;

export type CommandName = "copy" | "remove" | "benchmark";

export type HelpArgs = Readonly<{
  command: "help";
  topic: CommandName | null;
}>;

export type CliArgs = CopyArgs | RemoveArgs | BenchmarkArgs | HelpArgs;

const COMMAND_ALIASES: Readonly<Record<string, CommandName>> = Object.freeze({
  copy: "copy",
  cp: "copy",
  remove: "remove",
  rm: "remove",
  benchmark: "benchmark",
  bench: "benchmark",
});

function usage(message: string): PcopyError {
  return new PcopyError("PCOPY_USAGE", message);
}

function parseWorkerCount(raw: string, flag: string): number {
  if (!/^\d+$/.test(raw)) throw usage(`invalid worker count for ${flag}: ${raw}`);
  const workers = Number.parseInt(raw, 10);
  if (workers <= 0) throw usage(`worker count for ${flag} must be at least 1`);
  return workers;
}

type Flags = {
  recursive: boolean;
  dryRun: boolean;
  force: boolean;
  quiet: boolean;
  help: boolean;
  parallel: ParallelSetting;
};

type FlagSpec = Readonly<{
  short: readonly string[];
  long: readonly string[];
}>;

const FLAGS_BY_COMMAND: Readonly<Record<CommandName, FlagSpec>> = Object.freeze({
  copy: { short: ["r", "R", "n", "P", "h"], long: ["recursive", "dry-run", "parallel", "help"] },
  remove: { short: ["r", "R", "f", "n", "h"], long: ["recursive", "force", "dry-run", "help"] },
  benchmark: { short: ["q", "h"], long: ["quiet", "help"] },
});

function setShortFlag(flags: Flags, letter: string): void {
  switch (letter) {
    case "r":
    case "R":
      flags.recursive = true;
      return;
    case "n":
      flags.dryRun = true;
      return;
    case "f":
      flags.force = true;
      return;
    case "q":
      flags.quiet = true;
      return;
    case "h":
      flags.help = true;
      return;
    default:
      throw usage(`unknown option: -${letter}`);
  }
}

function setLongFlag(flags: Flags, name: string): void {
  switch (name) {
    case "recursive":
      flags.recursive = true;
      return;
    case "dry-run":
      flags.dryRun = true;
      return;
    case "force":
      flags.force = true;
      return;
    case "quiet":
      flags.quiet = true;
      return;
    case "help":
      flags.help = true;
      return;
    default:
      throw usage(`unknown option: --${name}`);
  }
}

/**
 * Parse `pcopy <command> [options] <paths...>`.
 *
 * Short flags combine (`-rf`). `-P`/`--parallel` takes an optional worker
 * count as `-P8`, `-P=8`, `-P 8` or `--parallel=8`; without one the
 * benchmark result (or the default) is used.
 */
export function parseArgs(argv: readonly string[]): CliArgs {
  const [first, ...rest] = argv;
  if (first === undefined || first === "-h" || first === "--help" || first === "help") {
    const topicName = first === "help" ? rest[0] : undefined;
    const topic = topicName === undefined ? undefined : COMMAND_ALIASES[topicName];
    return { command: "help", topic: topic ?? null };
  }
  const command = COMMAND_ALIASES[first];
  if (command === undefined) throw usage(`unknown command: ${first}`);
  const allowed = FLAGS_BY_COMMAND[command];

  const flags: Flags = {
    recursive: false,
    dryRun: false,
    force: false,
    quiet: false,
    help: false,
    parallel: { kind: "off" },
  };
  const positionals: string[] = [];

  for (let i = 0; i < rest.length; i++) {
    const arg = rest[i] ?? "";
    if (arg === "--") {
      positionals.push(...rest.slice(i + 1));
      break;
    }
    if (arg.startsWith("--")) {
      const [name = "", value] = arg.slice(2).split("=", 2);
      if (!allowed.long.includes(name)) throw usage(`unknown option for ${command}: --${name}`);
      if (name === "parallel") {
        flags.parallel =
          value === undefined
            ? { kind: "auto" }
            : { kind: "workers", workers: parseWorkerCount(value, "--parallel") };
        continue;
      }
      if (value !== undefined) throw usage(`option --${name} takes no value`);
      setLongFlag(flags, name);
      continue;
    }
    if (arg.startsWith("-") && arg.length > 1) {
      const letters = arg.slice(1);
      for (let j = 0; j < letters.length; j++) {
        const letter = letters[j] ?? "";
        if (!allowed.short.includes(letter)) throw usage(`unknown option for ${command}: -${letter}`);
        if (letter !== "P") {
          setShortFlag(flags, letter);
          continue;
        }
        const inline = letters.slice(j + 1).replace(/^=/, "");
        if (inline.length > 0) {
          flags.parallel = { kind: "workers", workers: parseWorkerCount(inline, "-P") };
        } else {
          const next = rest[i + 1];
          if (next !== undefined && /^\d+$/.test(next)) {
            flags.parallel = { kind: "workers", workers: parseWorkerCount(next, "-P") };
            i++;
          } else {
            flags.parallel = { kind: "auto" };
          }
        }
        break;
      }
      continue;
    }
    positionals.push(arg);
  }

  if (flags.help) return { command: "help", topic: command };

  switch (command) {
    case "copy": {
      const destination = positionals[positionals.length - 1];
      const sources = positionals.slice(0, -1);
      if (destination === undefined || sources.length === 0) {
        throw usage("copy needs at least one source and a destination");
      }
      return {
        command,
        sources,
        destination,
        recursive: flags.recursive,
        dryRun: flags.dryRun,
        parallel: flags.parallel,
      };
    }
    case "remove":
      if (positionals.length === 0) throw usage("remove needs at least one target");
      return {
        command,
        targets: positionals,
        recursive: flags.recursive,
        force: flags.force,
        dryRun: flags.dryRun,
      };
    case "benchmark":
      if (positionals.length > 0) throw usage(`unexpected argument: ${positionals[0] ?? ""}`);
      return { command, quiet: flags.quiet };
  }
}

export function helpText(topic: CommandName | null): string {
  switch (topic) {
    case "copy":
      return [
        "Usage: pcopy copy [options] <sources...> <destination>",
        "",
        "Copy files and directories with a progress line.",
        "",
        "Options:",
        "  -r, -R, --recursive     copy directories recursively",
        "  -n, --dry-run           show what would be copied",
        "  -P[N], --parallel[=N]   parallel block copy for files over 64MB",
        "                          (default: benchmark result, else 4 workers)",
        "",
      ].join("\n");
    case "remove":
      return [
        "Usage: pcopy remove [options] <targets...>",
        "",
        "Remove files and directories with a progress line.",
        "",
        "Options:",
        "  -r, -R, --recursive     remove directories and their contents",
        "  -f, --force             no confirmation prompt",
        "  -n, --dry-run           show what would be deleted",
        "",
      ].join("\n");
    case "benchmark":
      return [
        "Usage: pcopy benchmark [-q]",
        "",
        "Time 1, 2, 4, 6 and 8 workers on a 100MB test file and save the fastest",
        "as the default for -P.",
        "",
        "Options:",
        "  -q, --quiet             only print the result",
        "",
      ].join("\n");
    default:
      return [
        "Usage: pcopy <command> [options]",
        "",
        "Commands:",
        "  copy, cp        copy files with a progress line",
        "  remove, rm      remove files with a progress line",
        "  benchmark       find the fastest worker count for -P",
        "",
        "Run 'pcopy help <command>' for command options.",
        "",
      ].join("\n");
  }
}
