/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import type { LogLevel } from "@tabledb/sdk";
import { CliError } from "./errors.js";

const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched for now.
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the database file
 * Priority: CLI option > TABLEDB_PATH env var > default "./data/tabledb.json"
 */
export function resolveDatabasePath(cliPath?: string): string {
  const file = cliPath ?? (process.env.TABLEDB_PATH || "./data/tabledb.json");
  return path.resolve(expandTilde(file));
}

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Minimum engine log level from TABLEDB_LOG_LEVEL, if set
 * @throws CliError for an unknown level
 */
export function resolveLogLevel(): LogLevel | undefined {
  const raw = process.env.TABLEDB_LOG_LEVEL?.trim().toLowerCase();
  if (!raw) {
    return undefined;
  }
  if (!isLogLevel(raw)) {
    throw new CliError(`TABLEDB_LOG_LEVEL must be one of ${LOG_LEVELS.join(", ")}`);
  }
  return raw;
}

/**
 * Per-table record limit from TABLEDB_MAX_RECORDS_PER_TABLE, if set
 * @throws CliError unless it is a positive integer
 */
export function resolveMaxRecords(): number | undefined {
  const raw = process.env.TABLEDB_MAX_RECORDS_PER_TABLE?.trim();
  if (!raw) {
    return undefined;
  }
  if (!/^\d+$/.test(raw) || Number(raw) === 0) {
    throw new CliError("TABLEDB_MAX_RECORDS_PER_TABLE must be a positive integer");
  }
  return Number(raw);
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.TABLEDB_CLI_DEBUG === "1";
}
