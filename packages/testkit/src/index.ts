export { after, afterEach, assert, before, beforeEach, describe, test } from "./nodeTest.js";
export { createRng, deterministicBytes, type Rng } from "./rng.js";
export { pathExists, sha256File, withTempDir, writeFixtureFile } from "./fs.js";
export { createManualClock, type ManualClock } from "./clock.js";
export { createRecordingSurface, type RecordingSurface } from "./surface.js";
export { createScreen, type Screen, type ScreenSnapshot } from "./screen.js";
export {
  createRecordingProgress,
  type RecordedUpdate,
  type RecordingProgress,
} from "./progress.js";
