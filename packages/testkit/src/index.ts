/**
 * Shared test helpers for jawadb packages
 */

export { createTempDir, removeDir, withTempDir, withTempDocument } from "./fs.js";
export { createTestRegistry } from "./registry.js";
export type { TestRegistry } from "./registry.js";
