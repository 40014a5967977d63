/**
 * Error types for TableDB operations
 *
 * Invariants:
 * - Every error has a stable `name`, `code` and `kind` for programmatic handling
 * - `kind` partitions errors into validation / not_found / io / engine
 * - All errors support a `cause` property for wrapping underlying errors
 */

import type { ValidationIssue } from "./types.js";

/**
 * Enumerated error categories surfaced by the facade
 */
export type ErrorKind = "validation" | "not_found" | "io" | "engine";

/**
 * Base class for all TableDB errors
 */
export abstract class TableDBError extends Error {
  abstract readonly code: string;
  abstract readonly kind: ErrorKind;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Thrown when a candidate record fails its table schema
 */
export class ValidationError extends TableDBError {
  readonly code = "E_VALIDATION";
  readonly kind = "validation";

  constructor(
    message: string,
    public readonly issues: ValidationIssue[] = [],
    options?: ErrorOptions
  ) {
    super(message, options);
  }
}

/**
 * Thrown when a table or column name is malformed
 */
export class InvalidNameError extends TableDBError {
  readonly code = "E_NAME";
  readonly kind = "validation";

  constructor(label: string, value: unknown, reason: string, options?: ErrorOptions) {
    super(`Invalid ${label} "${String(value)}": ${reason}`, options);
  }
}

/**
 * Thrown when a condition or pipeline stage cannot be parsed
 */
export class InvalidConditionError extends TableDBError {
  readonly code = "E_CONDITION";
  readonly kind = "validation";

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
  }
}

/**
 * Thrown when the referenced table does not exist
 */
export class TableNotFoundError extends TableDBError {
  readonly code = "E_TABLE_NOT_FOUND";
  readonly kind = "not_found";

  constructor(public readonly table: string, options?: ErrorOptions) {
    super(`Table not found: ${table}`, options);
  }
}

/**
 * Thrown when reading, writing or copying the backing file fails
 */
export class PersistenceError extends TableDBError {
  readonly code = "E_PERSIST";
  readonly kind = "io";

  constructor(
    public readonly operation: "read" | "write" | "copy",
    public readonly filePath: string,
    options?: ErrorOptions
  ) {
    super(`Failed to ${operation} database file: ${filePath}`, options);
  }
}

/**
 * Thrown when `begin` is called while a transaction is already active
 */
export class TransactionActiveError extends TableDBError {
  readonly code = "E_TXN_ACTIVE";
  readonly kind = "engine";

  constructor(options?: ErrorOptions) {
    super("Transaction already active", options);
  }
}

/**
 * Thrown when `commit` or `rollback` is called with no active transaction
 */
export class NoActiveTransactionError extends TableDBError {
  readonly code = "E_TXN_NONE";
  readonly kind = "engine";

  constructor(options?: ErrorOptions) {
    super("No active transaction", options);
  }
}

/**
 * Thrown when update/delete is called without a non-empty condition
 */
export class ConditionRequiredError extends TableDBError {
  readonly code = "E_CONDITION_REQUIRED";
  readonly kind = "engine";

  constructor(operation: "update" | "delete", options?: ErrorOptions) {
    super(`${operation} requires a non-empty condition`, options);
  }
}

/**
 * Thrown when an insert would exceed the per-table record limit
 */
export class RecordLimitError extends TableDBError {
  readonly code = "E_RECORD_LIMIT";
  readonly kind = "engine";

  constructor(table: string, limit: number, options?: ErrorOptions) {
    super(`Table "${table}" reached its record limit (${limit})`, options);
  }
}

/**
 * Thrown by `execute` for statements outside the supported subset
 */
export class UnsupportedStatementError extends TableDBError {
  readonly code = "E_STATEMENT";
  readonly kind = "engine";

  constructor(statement: string, options?: ErrorOptions) {
    super(`Unsupported statement: ${statement}`, options);
  }
}
