import { extname } from "node:path";
import { fileURLToPath } from "node:url";

/**
 * Resolve a sibling module written with a `.js` specifier using the extension
 * of the calling module, so worker entries and shims resolve both from the
 * TypeScript sources (run through tsx) and from the compiled `dist/` tree.
 */
export function siblingModuleUrl(specifier: string, base: string): URL {
  const ext = base.startsWith("file:") ? extname(fileURLToPath(base)) : ".js";
  const rewritten = specifier.endsWith(".js") ? `${specifier.slice(0, -3)}${ext}` : specifier;
  return new URL(rewritten, base);
}

export const TS_WORKER_BOOTSTRAP: URL = new URL("./tsWorkerBootstrap.mjs", import.meta.url);

export type WorkerLaunch = Readonly<{
  url: URL;
  argv: readonly string[];
}>;

/**
 * How to start a worker for `entry`. Compiled `.js` entries start directly;
 * `.ts` entries start through a bootstrap that registers tsx in the new
 * thread first.
 */
export function workerLaunch(entry: URL): WorkerLaunch {
  if (!entry.pathname.endsWith(".ts")) return { url: entry, argv: [] };
  return { url: TS_WORKER_BOOTSTRAP, argv: [entry.href] };
}
