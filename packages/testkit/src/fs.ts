/**
 * File system test utilities
 */

import { mkdtemp, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { openDatabase } from "@tabledb/sdk";
import type { Database, DatabaseOptions } from "@tabledb/sdk";

/**
 * Create a unique temporary directory for testing
 * @param prefix - Prefix for the temp directory (default: "tabledb-test-")
 * @returns Absolute path to temp directory
 */
export async function createTempDir(prefix = "tabledb-test-"): Promise<string> {
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
 * Execute a function with a database file in a temporary directory,
 * closing the database and removing the directory afterwards
 * @param fn - Function to execute with the database and its file path
 * @param options - Optional database options (path will be overridden)
 * @returns Result of fn
 */
export async function withTempDatabase<T>(
  fn: (db: Database, path: string) => Promise<T> | T,
  options?: Omit<DatabaseOptions, "path">
): Promise<T> {
  const dir = await createTempDir();
  const path = join(dir, "db.json");
  const db = openDatabase({ ...options, path });

  let result: T;
  try {
    result = await fn(db, path);
  } catch (err) {
    // The original failure wins over any cleanup failure
    db.close();
    await removeDir(dir);
    throw err;
  }

  const closed = db.close();
  await removeDir(dir);
  if (!closed.ok) {
    throw closed.error;
  }
  return result;
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
