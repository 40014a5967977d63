/**
 * Atomic file I/O for the database file
 *
 * Invariants:
 * - Writes are atomic: readers observe the previous or the new content, never a mix
 * - Temp files always reside in the same directory as the target (same filesystem for rename)
 * - Temp files are removed on failure paths
 * - Reads are UTF-8 only; a missing file reads as null
 *
 * Pattern: write → fsync → rename → fsync directory
 *
 * All calls are synchronous: the engine runs one logical operation at a time
 * and file I/O is its only blocking point.
 */

import { randomUUID } from "node:crypto";
import * as fs from "node:fs";
import { dirname, basename, join } from "node:path";
import { PersistenceError } from "./errors.js";

/**
 * Feature flag to control directory fsync (can be disabled on problematic platforms)
 */
const ENABLE_DIR_FSYNC = true;

function errorCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}

/**
 * Ensure a directory exists, creating it and parent directories as needed
 */
export function ensureDirectory(dirPath: string): void {
  fs.mkdirSync(dirPath, { recursive: true });
}

/**
 * Atomically write content to a file using write-rename-sync pattern
 * @param filePath - Target file path
 * @param content - Content to write (strings are encoded as UTF-8)
 * @throws PersistenceError if any step fails
 */
export function atomicWrite(filePath: string, content: string | Buffer): void {
  const dir = dirname(filePath);
  const tmp = join(dir, `.${basename(filePath)}.${randomUUID()}.tmp`);

  let fd: number | null = null;

  try {
    ensureDirectory(dir);

    fd = fs.openSync(tmp, "w", 0o600);
    fs.writeFileSync(fd, content);

    // Prefer datasync, fall back to full sync where unsupported
    try {
      fs.fdatasyncSync(fd);
    } catch (err) {
      const code = errorCode(err);
      if (code === "ENOTSUP" || code === "ENOSYS" || code === "EINVAL") {
        fs.fsyncSync(fd);
      } else {
        throw err;
      }
    }

    fs.closeSync(fd);
    fd = null;

    // Atomic rename (last-writer-wins)
    fs.renameSync(tmp, filePath);

    if (ENABLE_DIR_FSYNC) {
      syncDirectory(dir);
    }
  } catch (err) {
    if (fd !== null) {
      closeQuietly(fd);
    }
    fs.rmSync(tmp, { force: true });
    throw new PersistenceError("write", filePath, { cause: err });
  }
}

/**
 * Best-effort fsync of a directory so the rename itself is durable
 */
function syncDirectory(dir: string): void {
  let dirFd: number | null = null;
  try {
    dirFd = fs.openSync(dir, "r");
    fs.fsyncSync(dirFd);
  } catch (err) {
    // Directory fsync is unsupported on some platforms (EINVAL, ENOTSUP, EBADF, EISDIR on Windows)
    const code = errorCode(err);
    if (process.env.TABLEDB_DEBUG && code !== "EINVAL" && code !== "ENOTSUP") {
      console.warn(`Directory fsync failed for ${dir}:`, err);
    }
  } finally {
    if (dirFd !== null) {
      closeQuietly(dirFd);
    }
  }
}

function closeQuietly(fd: number): void {
  try {
    fs.closeSync(fd);
  } catch (err) {
    if (process.env.TABLEDB_DEBUG) {
      console.warn(`Failed to close descriptor ${fd}:`, err);
    }
  }
}

/**
 * Read a file as UTF-8
 * @returns File contents, or null if the file does not exist
 * @throws PersistenceError for other read failures
 */
export function readDocument(filePath: string): string | null {
  try {
    return fs.readFileSync(filePath, "utf-8");
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return null;
    }
    throw new PersistenceError("read", filePath, { cause: err });
  }
}

/**
 * Copy a file byte-for-byte, replacing the destination atomically
 * @throws PersistenceError if the source cannot be read or the destination written
 */
export function copyDocument(sourcePath: string, targetPath: string): void {
  let content: Buffer;
  try {
    content = fs.readFileSync(sourcePath);
  } catch (err) {
    throw new PersistenceError("copy", sourcePath, { cause: err });
  }

  try {
    atomicWrite(targetPath, content);
  } catch (err) {
    throw new PersistenceError("copy", targetPath, { cause: err });
  }
}

/**
 * Size of a file in bytes, or undefined if it does not exist
 */
export function fileSize(filePath: string): number | undefined {
  try {
    return fs.statSync(filePath).size;
  } catch (err) {
    if (errorCode(err) === "ENOENT") {
      return undefined;
    }
    throw new PersistenceError("read", filePath, { cause: err });
  }
}
