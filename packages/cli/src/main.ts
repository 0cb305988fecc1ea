#!/usr/bin/env -S node --import tsx
import { installSignalHandlers } from "@pcopy/node";
import { runCli } from "./cli.js";
import { createNodeCliContext } from "./context.js";

const ctx = createNodeCliContext();
const detach = installSignalHandlers({
  cancellation: ctx.cancellation,
  partials: ctx.partials,
  progress: () => ctx.active.current,
});

try {
  process.exitCode = await runCli(process.argv.slice(2), ctx);
} finally {
  detach();
}
