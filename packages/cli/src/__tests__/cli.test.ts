import {
  ConfigStore,
  type LogEvent,
  PcopyError,
  SpeedModel,
  createCancellation,
  createMemoryConfigBackend,
} from "@pcopy/core";
import { PartialFileRegistry, resolveRuntimeSettings } from "@pcopy/node";
import {
  assert,
  createRecordingSurface,
  describe,
  pathExists,
  sha256File,
  test,
  withTempDir,
  writeFixtureFile,
} from "@pcopy/testkit";
import { mkdir, readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { helpText } from "../args.js";
import { runCli } from "../cli.js";
import type { CliContext } from "../context.js";

type Harness = Readonly<{
  ctx: CliContext;
  stdout: () => string;
  stderr: () => string;
  events: LogEvent[];
  prompts: string[];
  delays: number[];
  systemCopies: (readonly string[])[];
  screen: () => string;
}>;

function createHarness(
  opts: Readonly<{
    cwd: string;
    /** An Error entry is thrown from the prompt instead of answered. */
    answers?: (string | Error)[];
    env?: Record<string, string>;
    systemCopyStatus?: number;
  }>,
): Harness {
  const out: string[] = [];
  const err: string[] = [];
  const events: LogEvent[] = [];
  const prompts: string[] = [];
  const delays: number[] = [];
  const systemCopies: (readonly string[])[] = [];
  const answers = [...(opts.answers ?? [])];
  const surface = createRecordingSurface({ columns: 100, rows: 24 });
  const store = new ConfigStore(createMemoryConfigBackend());

  const ctx: CliContext = {
    io: {
      write: (text) => {
        out.push(text);
      },
      writeError: (text) => {
        err.push(text);
      },
      question: async (prompt) => {
        prompts.push(prompt);
        const answer = answers.shift();
        if (answer === undefined) throw new Error("no scripted answer left");
        if (answer instanceof Error) throw answer;
        return answer;
      },
      delay: async (ms) => {
        delays.push(ms);
      },
    },
    cwd: opts.cwd,
    colors: false,
    settings: resolveRuntimeSettings({ PCOPY_CONFIG_PATH: "/unused/config.json", ...opts.env }),
    store,
    speedModel: new SpeedModel(store),
    surface,
    log: (e) => {
      events.push(e);
    },
    cancellation: createCancellation(),
    partials: new PartialFileRegistry(),
    active: { current: null },
    runSystemCopy: (args) => {
      systemCopies.push(args);
      return opts.systemCopyStatus ?? 0;
    },
    now: () => 0,
  };

  return {
    ctx,
    stdout: () => out.join(""),
    stderr: () => err.join(""),
    events,
    prompts,
    delays,
    systemCopies,
    screen: () => surface.output(),
  };
}

describe("pcopy copy", () => {
  test("recursive copy keeps the tree under the source directory's name", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "src");
      await mkdir(join(src, "sub"), { recursive: true });
      await writeFile(join(src, "a.txt"), "hello");
      await writeFile(join(src, "sub", "c.txt"), "1234567");
      const top = join(root, "top.txt");
      await writeFile(top, "eleven byte");
      const dest = join(root, "out");
      const h = createHarness({ cwd: root });

      const code = await runCli(["cp", "-r", src, top, dest], h.ctx);

      assert.equal(code, 0);
      assert.equal(await readFile(join(dest, "src", "a.txt"), "utf8"), "hello");
      assert.equal(await readFile(join(dest, "src", "sub", "c.txt"), "utf8"), "1234567");
      assert.equal(await readFile(join(dest, "top.txt"), "utf8"), "eleven byte");
      assert.equal(h.stdout(), "Copying 3 files (23.0B)...\n");
      assert.ok(h.screen().endsWith("\u001b[24;1H\u001b[2K✅ Copied: 3 files (23.0B)\n\u001b[?25h"));
      assert.equal(h.ctx.active.current, null);
    });
  });

  test("large files go through the block engine when -P is given", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "big.bin");
      await writeFixtureFile(src, 20000, 7);
      const dest = join(root, "big.copy");
      const h = createHarness({
        cwd: root,
        env: { PCOPY_PARALLEL_THRESHOLD: "1024", PCOPY_BLOCK_SIZE: "4096" },
      });

      const code = await runCli(["cp", "-P2", src, dest], h.ctx);

      assert.equal(code, 0);
      assert.equal(await sha256File(dest), await sha256File(src));
      assert.ok(
        h.events.some((e) => e.message === "⚡ Parallel mode: 2 workers, 5 blocks of 4.0KB"),
      );
    });
  });

  test("answering no skips an existing target", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "a.txt");
      await writeFile(src, "new!");
      const destDir = join(root, "dest");
      await mkdir(destDir);
      await writeFile(join(destDir, "a.txt"), "old");
      const h = createHarness({ cwd: root, answers: ["n"] });

      const code = await runCli(["cp", src, destDir], h.ctx);

      assert.equal(code, 0);
      assert.deepEqual(h.prompts, [`Overwrite '${join(destDir, "a.txt")}'? [y/n/a/q]: `]);
      assert.equal(await readFile(join(destDir, "a.txt"), "utf8"), "old");
      assert.ok(h.screen().includes("✅ Copied: 0 files (0.0B) (Skipped: 1)"));
    });
  });

  test("quitting at the prompt stops the job with exit code 0", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "a.txt");
      await writeFile(src, "new!");
      const destDir = join(root, "dest");
      await mkdir(destDir);
      await writeFile(join(destDir, "a.txt"), "old");
      const h = createHarness({ cwd: root, answers: ["q"] });

      const code = await runCli(["cp", src, destDir], h.ctx);

      assert.equal(code, 0);
      assert.ok(h.stdout().endsWith("\n⚠ Operation cancelled by user\n"));
      assert.equal(await readFile(join(destDir, "a.txt"), "utf8"), "old");
    });
  });

  test("Ctrl+C at the overwrite prompt exits with 130 and keeps the target", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "a.txt");
      await writeFile(src, "new!");
      const destDir = join(root, "dest");
      await mkdir(destDir);
      await writeFile(join(destDir, "a.txt"), "old");
      const h = createHarness({ cwd: root, answers: [new PcopyError("PCOPY_CANCELLED", "interrupted")] });

      const code = await runCli(["cp", src, destDir], h.ctx);

      assert.equal(code, 130);
      assert.equal(await readFile(join(destDir, "a.txt"), "utf8"), "old");
      assert.equal(h.ctx.active.current, null);
    });
  });

  test("copying a file onto itself warns and keeps the source", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "a.txt");
      await writeFile(src, "precious");
      const h = createHarness({ cwd: root });

      const code = await runCli(["cp", src, root], h.ctx);

      assert.equal(code, 0);
      assert.equal(await readFile(src, "utf8"), "precious");
      const warnings = h.events.filter((e) => e.level === "warn").map((e) => e.message);
      assert.deepEqual(warnings, [`Could not copy '${src}': '${src}' and '${src}' are the same file`]);
    });
  });

  test("dry run prints the plan and creates nothing", async () => {
    await withTempDir(async (root) => {
      await writeFile(join(root, "a.txt"), "hello");
      await writeFile(join(root, "b.txt"), "abc");
      const dest = join(root, "out");
      const h = createHarness({ cwd: root });

      const code = await runCli(["cp", "-n", join(root, "a.txt"), join(root, "b.txt"), dest], h.ctx);

      assert.equal(code, 0);
      assert.equal(await pathExists(dest), false);
      assert.equal(
        h.stdout(),
        [
          "🔍 Dry-run mode - No files will be copied",
          "",
          "Summary:",
          "  Files to copy: 2",
          "  Total size: 8.0B",
          "  Estimated time: ~0s",
          `  Destination: ${dest}`,
          "",
          "Files (showing first 10):",
          "  → a.txt (5.0B)",
          "  → b.txt (3.0B)",
          "",
        ].join("\n"),
      );
    });
  });

  test("system destinations are handed to /bin/cp", async () => {
    const h = createHarness({ cwd: "/tmp", systemCopyStatus: 3 });
    const code = await runCli(["cp", "-r", "a", "b", "/usr/local/share/x"], h.ctx);
    assert.equal(code, 3);
    assert.deepEqual(h.systemCopies, [["-r", "a", "b", "/usr/local/share/x"]]);
    assert.equal(h.stdout(), "System directory detected, using /bin/cp...\n");
  });

  test("several sources need a directory destination", async () => {
    await withTempDir(async (root) => {
      const dest = join(root, "file");
      await writeFile(dest, "x");
      const h = createHarness({ cwd: root });
      const code = await runCli(["cp", join(root, "a"), join(root, "b"), dest], h.ctx);
      assert.equal(code, 1);
      assert.deepEqual(h.events, [
        { level: "error", message: "Destination must be a directory for multiple sources" },
      ]);
    });
  });

  test("nothing to copy is an error", async () => {
    await withTempDir(async (root) => {
      const missing = join(root, "missing");
      const h = createHarness({ cwd: root });
      const code = await runCli(["cp", missing, join(root, "out")], h.ctx);
      assert.equal(code, 1);
      assert.deepEqual(
        h.events.map((e) => e.message),
        [`'${missing}' does not exist`, "No files to copy"],
      );
    });
  });

  test("a cancelled job exits with 130", async () => {
    await withTempDir(async (root) => {
      const src = join(root, "a.txt");
      await writeFile(src, "hello");
      const h = createHarness({ cwd: root });
      h.ctx.cancellation.cancel("interrupted");

      const code = await runCli(["cp", src, join(root, "b.txt")], h.ctx);

      assert.equal(code, 130);
      assert.equal(await pathExists(join(root, "b.txt")), false);
    });
  });
});

describe("pcopy remove", () => {
  test("-rf removes files with progress, then the directory", async () => {
    await withTempDir(async (root) => {
      const dir = join(root, "d");
      await mkdir(join(dir, "sub"), { recursive: true });
      await writeFile(join(dir, "a"), "1234");
      await writeFile(join(dir, "sub", "b"), "5678");
      const h = createHarness({ cwd: root });

      const code = await runCli(["rm", "-rf", dir], h.ctx);

      assert.equal(code, 0);
      assert.equal(await pathExists(dir), false);
      assert.equal(h.stdout(), "Deleting 2 files...\n");
      assert.ok(h.screen().includes("🗑️  Deleted: 2 files (8.0B)"));
      assert.deepEqual(h.prompts, []);
    });
  });

  test("asks after the countdown and keeps files on no", async () => {
    await withTempDir(async (root) => {
      const file = join(root, "keep.txt");
      await writeFile(file, "data");
      const h = createHarness({ cwd: root, answers: ["n"] });

      const code = await runCli(["rm", file], h.ctx);

      assert.equal(code, 0);
      assert.equal(await pathExists(file), true);
      assert.deepEqual(h.delays, [1000, 1000, 1000]);
      assert.deepEqual(h.prompts, ["Continue? [y/N]: "]);
      assert.ok(h.stdout().endsWith("Operation cancelled\n"));
    });
  });

  test("Ctrl+C at the confirmation exits with 130 and deletes nothing", async () => {
    await withTempDir(async (root) => {
      const file = join(root, "keep.txt");
      await writeFile(file, "data");
      const h = createHarness({ cwd: root, answers: [new PcopyError("PCOPY_CANCELLED", "interrupted")] });

      const code = await runCli(["rm", file], h.ctx);

      assert.equal(code, 130);
      assert.equal(await pathExists(file), true);
    });
  });

  test("yes deletes", async () => {
    await withTempDir(async (root) => {
      const file = join(root, "gone.txt");
      await writeFile(file, "data");
      const h = createHarness({ cwd: root, answers: ["y"] });

      assert.equal(await runCli(["rm", file], h.ctx), 0);
      assert.equal(await pathExists(file), false);
    });
  });

  test("dry run lists directories", async () => {
    await withTempDir(async (root) => {
      const dir = join(root, "d");
      await mkdir(dir);
      await writeFile(join(dir, "a"), "1234");
      const h = createHarness({ cwd: root });

      assert.equal(await runCli(["rm", "-rn", dir], h.ctx), 0);
      assert.equal(await pathExists(join(dir, "a")), true);
      assert.ok(h.stdout().endsWith("Directories:\n  → d/\n"));
    });
  });

  test("a directory without -r leaves nothing to delete", async () => {
    await withTempDir(async (root) => {
      const dir = join(root, "d");
      await mkdir(dir);
      const h = createHarness({ cwd: root });

      assert.equal(await runCli(["rm", "-f", dir], h.ctx), 1);
      assert.deepEqual(
        h.events.map((e) => e.message),
        [`'${dir}' is a directory. Use -r to delete recursively`, "No files to delete"],
      );
    });
  });
});

describe("runCli", () => {
  test("usage errors exit with 1", async () => {
    const h = createHarness({ cwd: "/" });
    assert.equal(await runCli(["move", "a"], h.ctx), 1);
    assert.equal(h.stderr(), "Error: unknown command: move\nRun 'pcopy --help' for usage.\n");
  });

  test("help", async () => {
    const h = createHarness({ cwd: "/" });
    assert.equal(await runCli(["help"], h.ctx), 0);
    assert.equal(h.stdout(), helpText(null));
  });
});
