/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { open } from "@jawadb/sdk";
import type { JsonDocument, OpenOptions } from "@jawadb/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "jawadb-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "jawadb-test-"): Promise<string> {
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
export async function withTempDir<T>(fn: (dir: string) => Promise<T> | T): Promise<T> {
  const dir = await createTempDir();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}

/**
 * Execute a function with a document at `<tempdir>/<name>`, closing it and
 * cleaning up after. The document stays out of the process-wide registry
 * unless `options.register` says otherwise.
 * @param fn - Function to execute with the document and its directory
 * @param options - Optional open options
 * @param name - File name inside the temp directory (default: "doc.json")
 * @returns Result of fn
 */
export async function withTempDocument<T>(
  fn: (doc: JsonDocument, dir: string) => Promise<T> | T,
  options?: OpenOptions,
  name = "doc.json"
): Promise<T> {
  const dir = await createTempDir();
  let doc: JsonDocument;
  try {
    doc = open(join(dir, name), { register: false, ...options });
  } catch (err) {
    await removeDir(dir);
    throw err;
  }

  let fnError: unknown;
  try {
    return await fn(doc, dir);
  } catch (err) {
    fnError = err;
    throw err;
  } finally {
    let cleanupError: unknown;
    try {
      doc.close();
    } catch (err) {
      cleanupError = err;
    }
    try {
      await removeDir(dir);
    } catch (err) {
      if (!cleanupError) {
        cleanupError = err;
      }
    }
    if (!fnError && cleanupError) {
      // eslint-disable-next-line no-unsafe-finally
      throw cleanupError;
    }
  }
}
