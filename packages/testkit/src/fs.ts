/**
 * File system test utilities
 */

import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "docfeed-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "docfeed-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 * @param path - Path to remove
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a clean temp directory
 * @param fn - Function to execute with temp directory path
 * @returns Result of fn
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Write files into a directory, serializing non-string contents as JSON
 * @param files - File name to contents
 */
export async function writeFiles(dir: string, files: Record<string, unknown>): Promise<void> {
  for (const [name, contents] of Object.entries(files)) {
    const text = typeof contents === "string" ? contents : JSON.stringify(contents, null, 2);
    await writeFile(join(dir, name), text, "utf-8");
  }
}

/**
 * Execute a function with a temp directory holding the given files
 */
export async function withTempFiles<T>(
  files: Record<string, unknown>,
  fn: (dir: string) => Promise<T>
): Promise<T> {
  return withTempDir(async (dir) => {
    await writeFiles(dir, files);
    return fn(dir);
  });
}
