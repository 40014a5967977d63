/**
 * Persistence layer: whole-state load/save of the database file
 *
 * Invariants:
 * - The file on disk is always a complete previous or complete new state
 * - A skipped or failed save leaves the state dirty; the next save writes it
 * - Throttled saves are skipped while less than `saveIntervalMs` has passed
 *   since the last successful save; forced saves never are
 */

import { PersistenceError } from "./errors.js";
import { decodeDocument, encodeDocument, type DatabaseDocument } from "./file-format.js";
import { atomicWrite, copyDocument, fileSize, readDocument } from "./io.js";
import type { Logger } from "./observability/logs.js";
import { ok, err, type Result } from "./result.js";

export interface PersistenceOptions {
  path: string;
  indent: number;
  saveIntervalMs: number;
  clock: () => number;
  logger: Logger;
}

export interface SaveOptions {
  /** Bypass the throttle (commit, flush, close, vacuum, restore) */
  force?: boolean;
}

/**
 * Owns the backing file and the save throttle
 */
export class Persistence {
  readonly path: string;
  #indent: number;
  #saveIntervalMs: number;
  #clock: () => number;
  #logger: Logger;
  #lastSave: number | null = null;
  #dirty = false;

  constructor(options: PersistenceOptions) {
    this.path = options.path;
    this.#indent = options.indent;
    this.#saveIntervalMs = options.saveIntervalMs;
    this.#clock = options.clock;
    this.#logger = options.logger;
  }

  /**
   * True when in-memory state has changes not yet written
   */
  get dirty(): boolean {
    return this.#dirty;
  }

  markDirty(): void {
    this.#dirty = true;
  }

  /**
   * Load the backing file.
   * A missing, unreadable or invalid file yields null (start empty); the
   * last two are logged.
   */
  load(): DatabaseDocument | null {
    let content: string | null;
    try {
      content = readDocument(this.path);
    } catch (error) {
      this.#logger.error("persist.load.fail", {
        message: error instanceof Error ? error.message : String(error),
        details: { path: this.path },
      });
      return null;
    }

    if (content === null) {
      this.#logger.debug("persist.load.missing", { details: { path: this.path } });
      return null;
    }

    try {
      const doc = decodeDocument(content, this.#now());
      this.#logger.info("persist.load", {
        details: { path: this.path, tables: Object.keys(doc.tables).length },
      });
      return doc;
    } catch (error) {
      this.#logger.error("persist.load.fail", {
        message: `Invalid database file: ${error instanceof Error ? error.message : String(error)}`,
        details: { path: this.path },
      });
      return null;
    }
  }

  /**
   * Write the document produced by `build`, subject to the throttle
   * @returns ok(true) when written, ok(false) when skipped
   */
  save(build: () => DatabaseDocument, options: SaveOptions = {}): Result<boolean, PersistenceError> {
    const now = this.#clock();

    if (!options.force) {
      if (!this.#dirty) {
        return ok(false);
      }
      if (this.#lastSave !== null && now - this.#lastSave < this.#saveIntervalMs) {
        this.#logger.debug("persist.save.throttled", { details: { path: this.path } });
        return ok(false);
      }
    }

    try {
      atomicWrite(this.path, encodeDocument(build(), this.#indent));
    } catch (error) {
      const failure =
        error instanceof PersistenceError
          ? error
          : new PersistenceError("write", this.path, { cause: error });
      this.#logger.error("persist.save.fail", {
        message: failure.message,
        details: { path: this.path },
      });
      return err(failure);
    }

    this.#lastSave = now;
    this.#dirty = false;
    this.#logger.debug("persist.save", { details: { path: this.path } });
    return ok(true);
  }

  /**
   * Forced save of pending changes; no-op when clean and the file exists
   */
  flush(build: () => DatabaseDocument): Result<boolean, PersistenceError> {
    if (!this.#dirty && this.fileSize() !== undefined) {
      return ok(false);
    }
    return this.save(build, { force: true });
  }

  /**
   * Copy the backing file verbatim to `target`
   * @param target - Destination (default: `<file>.backup_YYYYMMDD_HHMMSS`)
   * @returns The destination path
   * @throws PersistenceError if the copy fails
   */
  backup(target?: string): string {
    const destination = target ?? `${this.path}.backup_${backupStamp(new Date(this.#clock()))}`;
    copyDocument(this.path, destination);
    this.#logger.info("persist.backup", { details: { path: destination } });
    return destination;
  }

  /**
   * Parse a backup without touching the live file
   * @throws PersistenceError if it is missing or not a valid document
   */
  readBackup(source: string): DatabaseDocument {
    const content = readDocument(source);
    if (content === null) {
      throw new PersistenceError("read", source);
    }
    try {
      return decodeDocument(content, this.#now());
    } catch (error) {
      throw new PersistenceError("read", source, { cause: error });
    }
  }

  /**
   * Copy a backup over the live file; the caller reloads state from it
   * @throws PersistenceError if the copy fails
   */
  replaceWith(source: string): void {
    copyDocument(source, this.path);
    this.#lastSave = this.#clock();
    this.#dirty = false;
    this.#logger.info("persist.restore", { details: { path: source } });
  }

  /**
   * Size of the backing file in bytes, if it exists
   */
  fileSize(): number | undefined {
    try {
      return fileSize(this.path);
    } catch (error) {
      this.#logger.warn("persist.stat.fail", {
        message: error instanceof Error ? error.message : String(error),
      });
      return undefined;
    }
  }

  #now(): string {
    return new Date(this.#clock()).toISOString();
  }
}

/**
 * Local-time `YYYYMMDD_HHMMSS`
 */
export function backupStamp(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}
