/**
 * Database adapter for CLI commands
 */

import { openDatabase, unwrap, type Database } from "@tabledb/sdk";
import { resolveDatabasePath, resolveLogLevel, resolveMaxRecords } from "./env.js";
import { emitIndexMetrics } from "./telemetry.js";

/**
 * Global options shared by every command
 */
export type GlobalOptions = {
  db?: string;
  verbose?: boolean;
  quiet?: boolean;
};

/**
 * Open the database named by --db / TABLEDB_PATH with environment overrides.
 * Engine logging is enabled by --verbose or TABLEDB_LOG_LEVEL.
 */
export function openCliDatabase(options: GlobalOptions): Database {
  const logLevel = resolveLogLevel();
  return openDatabase({
    path: resolveDatabasePath(options.db),
    logging: Boolean(options.verbose) || logLevel !== undefined,
    logLevel: logLevel ?? (options.verbose ? "debug" : undefined),
    maxRecordsPerTable: resolveMaxRecords(),
  });
}

/**
 * Run `fn` against an open database, closing (and flushing) it afterwards.
 * A failed close is reported only when `fn` itself succeeded.
 * Index metrics are emitted before closing in debug mode.
 */
export async function withDatabase<T>(
  options: GlobalOptions,
  fn: (db: Database) => Promise<T> | T
): Promise<T> {
  const db = openCliDatabase(options);

  let result: T;
  try {
    result = await fn(db);
  } catch (err) {
    db.close();
    throw err;
  }

  emitIndexMetrics(db);
  unwrap(db.close());
  return result;
}
