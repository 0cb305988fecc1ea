import type { LogSink } from "@pcopy/core";
import { makeLogSink, safeErr } from "@pcopy/core";
import { rmSync } from "node:fs";

/**
 * Destinations that are currently being written. Copy paths register their
 * target before the first byte and release it once the file is complete;
 * an interrupt sweeps whatever is still registered.
 */
export class PartialFileRegistry {
  private readonly paths = new Set<string>();
  private readonly log: LogSink;

  constructor(opts: Readonly<{ log?: LogSink }> = {}) {
    this.log = makeLogSink(opts.log);
  }

  track(path: string): void {
    this.paths.add(path);
  }

  release(path: string): void {
    this.paths.delete(path);
  }

  pending(): readonly string[] {
    return [...this.paths];
  }

  /** Synchronous so it can run from a signal handler right before exit. */
  sweepSync(): number {
    let removed = 0;
    for (const path of this.paths) {
      try {
        rmSync(path, { force: true });
        removed++;
      } catch (err) {
        this.log({
          level: "warn",
          message: `could not remove partial file: ${safeErr(err).message}`,
          path,
        });
      }
    }
    this.paths.clear();
    return removed;
  }
}
