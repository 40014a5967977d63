/**
 * Test helpers for TableDB packages
 */

export { createTempDir, removeDir, withTempDatabase, withTempDir } from "./fs.js";
export { manualClock } from "./timers.js";
export type { ManualClock } from "./timers.js";
