import { createCancellation, isPcopyError } from "@pcopy/core";
import {
  assert,
  createRecordingProgress,
  describe,
  pathExists,
  sha256File,
  test,
  withTempDir,
  writeFixtureFile,
} from "@pcopy/testkit";
import { stat } from "node:fs/promises";
import { join } from "node:path";
import { PartialFileRegistry } from "../partials.js";
import { copyFileStreaming } from "../streamCopy.js";

describe("copyFileStreaming", () => {
  test("copies in buffer-sized chunks", async () => {
    await withTempDir(async (dir) => {
      const src = join(dir, "s.bin");
      const dst = join(dir, "nested", "d.bin");
      await writeFixtureFile(src, 10_000, 11);
      const progress = createRecordingProgress();

      assert.equal(await copyFileStreaming(src, dst, { bufferSize: 4096, progress }), "copied");

      assert.equal(await sha256File(dst), await sha256File(src));
      assert.deepEqual(
        progress.updates.map((u) => u.bytes),
        [4096, 4096, 1808],
      );
    });
  });

  test("cancellation between chunks removes the partial target", async () => {
    await withTempDir(async (dir) => {
      const src = join(dir, "s.bin");
      const dst = join(dir, "d.bin");
      await writeFixtureFile(src, 10_000, 11);
      const { token, cancel } = createCancellation();
      const partials = new PartialFileRegistry();
      const progress = createRecordingProgress(() => {
        assert.deepEqual(partials.pending(), [dst]);
        cancel();
      });

      await assert.rejects(
        copyFileStreaming(src, dst, { bufferSize: 4096, progress, cancellation: token, partials }),
        (err: unknown) => isPcopyError(err, "PCOPY_CANCELLED"),
      );
      assert.equal(await pathExists(dst), false);
      assert.deepEqual(partials.pending(), []);
    });
  });

  test("a missing source fails with ENOENT and creates nothing", async () => {
    await withTempDir(async (dir) => {
      const dst = join(dir, "d.bin");
      await assert.rejects(copyFileStreaming(join(dir, "missing"), dst), { code: "ENOENT" });
      assert.equal(await pathExists(dst), false);
    });
  });

  test("a directory source is rejected", async () => {
    await withTempDir(async (dir) => {
      await assert.rejects(copyFileStreaming(dir, join(dir, "x")), (err: unknown) =>
        isPcopyError(err, "PCOPY_INVALID_ARGUMENT"),
      );
    });
  });

  test("copying a file into its own directory is refused and leaves the source intact", async () => {
    await withTempDir(async (dir) => {
      const src = join(dir, "notes.bin");
      await writeFixtureFile(src, 10_000, 5);
      const before = await sha256File(src);
      const asked: string[] = [];

      await assert.rejects(
        copyFileStreaming(src, dir, {
          decideOverwrite: async (target) => {
            asked.push(target);
            return "proceed";
          },
        }),
        { code: "PCOPY_INVALID_ARGUMENT", message: `'${src}' and '${src}' are the same file` },
      );
      assert.deepEqual(asked, []);
      assert.equal((await stat(src)).size, 10_000);
      assert.equal(await sha256File(src), before);
    });
  });
});
