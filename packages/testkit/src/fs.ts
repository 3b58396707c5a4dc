/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { FileKvStore } from "@subdoc/sdk";
import type { FileKvStoreOptions } from "@subdoc/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "subdoc-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempStoreRoot(prefix = "subdoc-test-"): Promise<string> {
  return await mkdtemp(join(tmpdir(), prefix));
}

/**
 * Remove a directory recursively
 */
export async function removeDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Execute a function with a file-backed store in a fresh directory,
 * removing the directory afterwards
 */
export async function withTempStore<T>(
  fn: (store: FileKvStore, root: string) => Promise<T>,
  options?: Omit<FileKvStoreOptions, "root">
): Promise<T> {
  const root = await createTempStoreRoot();
  try {
    return await fn(new FileKvStore({ ...options, root }), root);
  } finally {
    await removeDir(root);
  }
}

/**
 * Execute a function with a clean temp directory
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await createTempStoreRoot();
  try {
    return await fn(dir);
  } finally {
    await removeDir(dir);
  }
}
