/**
 * Test helpers for docfeed packages
 */

export { createTempDir, removeDir, withTempDir, writeFiles, withTempFiles } from "./fs.js";
export { TEST_TYPES, TEST_DEFINITION_FILES, createTestRegistry } from "./registry.js";
