import { assert, describe, pathExists, test, withTempDir } from "@pcopy/testkit";
import { writeFile } from "node:fs/promises";
import { join } from "node:path";
import { PartialFileRegistry } from "../partials.js";

describe("PartialFileRegistry", () => {
  test("sweep removes every tracked file and empties the registry", async () => {
    await withTempDir(async (dir) => {
      const a = join(dir, "a.part");
      const b = join(dir, "b.part");
      const kept = join(dir, "kept");
      await writeFile(a, "x");
      await writeFile(b, "y");
      await writeFile(kept, "z");

      const registry = new PartialFileRegistry();
      registry.track(a);
      registry.track(b);
      registry.track(kept);
      registry.release(kept);

      assert.equal(registry.sweepSync(), 2);
      assert.equal(await pathExists(a), false);
      assert.equal(await pathExists(b), false);
      assert.equal(await pathExists(kept), true);
      assert.deepEqual(registry.pending(), []);
    });
  });

  test("tracking the same path twice keeps one entry", () => {
    const registry = new PartialFileRegistry();
    registry.track("/tmp/x");
    registry.track("/tmp/x");
    assert.deepEqual(registry.pending(), ["/tmp/x"]);
  });
});
