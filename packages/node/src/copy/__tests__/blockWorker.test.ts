import { isPcopyError } from "@pcopy/core";
import { assert, describe, test, withTempDir, writeFixtureFile } from "@pcopy/testkit";
import { readFile, writeFile } from "node:fs/promises";
import { join } from "node:path";
import { readBlock, writeBlock } from "../blockWorker.js";
import { NODE_BLOCK_IO } from "../protocol.js";
import { createSharedMutex, createSharedMutexBuffer, isLocked } from "../sharedMutex.js";
import { io as shortReadIo } from "../testShims/shortReadIo.js";

describe("block worker I/O", () => {
  test("reads exactly one block and writes it at its offset", async () => {
    await withTempDir(async (dir) => {
      const src = join(dir, "src.bin");
      const dst = join(dir, "dst.bin");
      const bytes = await writeFixtureFile(src, 300, 21);
      await writeFile(dst, new Uint8Array(300));
      const task = { type: "block", index: 1, offset: 100, length: 100 } as const;
      const buffer = createSharedMutexBuffer();

      const block = readBlock(NODE_BLOCK_IO, src, task);
      writeBlock(NODE_BLOCK_IO, createSharedMutex(buffer), dst, task, block);

      const out = new Uint8Array(await readFile(dst));
      assert.deepEqual(out.subarray(100, 200), bytes.subarray(100, 200));
      assert.deepEqual(out.subarray(0, 100), new Uint8Array(100));
      assert.deepEqual(out.subarray(200), new Uint8Array(100));
      assert.equal(isLocked(buffer), false);
    });
  });

  test("a short read is reported with its block", async () => {
    await withTempDir(async (dir) => {
      const src = join(dir, "src.bin");
      await writeFixtureFile(src, 300, 21);
      assert.throws(
        () => readBlock(shortReadIo, src, { type: "block", index: 2, offset: 200, length: 100 }),
        (err: unknown) =>
          isPcopyError(err, "PCOPY_SHORT_READ") &&
          err.message === "short read in block 2 at offset 200: expected 100 bytes, got 16",
      );
    });
  });
});
