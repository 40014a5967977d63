/**
 * Validation utilities for facade inputs
 */

import { InvalidNameError, ValidationError } from "./errors.js";
import type { JsonRecord, JsonValue } from "./types.js";

/**
 * Letters, digits, underscore and dash (any script)
 */
const VALID_TABLE_NAME = /^[\p{L}\p{N}_-]+$/u;

const MAX_TABLE_NAME_LENGTH = 64;

/**
 * Validate a table name
 * @throws InvalidNameError if invalid
 */
export function validateTableName(value: unknown): asserts value is string {
  if (!value || typeof value !== "string") {
    throw new InvalidNameError("table name", value, "must be a non-empty string");
  }

  if (value.length > MAX_TABLE_NAME_LENGTH) {
    throw new InvalidNameError(
      "table name",
      value,
      `must be at most ${MAX_TABLE_NAME_LENGTH} characters`
    );
  }

  if (!VALID_TABLE_NAME.test(value)) {
    throw new InvalidNameError(
      "table name",
      value,
      "only letters, digits, underscore and dash are allowed"
    );
  }
}

/**
 * Validate a column name
 * @throws InvalidNameError if invalid
 */
export function validateColumnName(value: unknown): asserts value is string {
  if (!value || typeof value !== "string") {
    throw new InvalidNameError("column name", value, "must be a non-empty string");
  }
}

/**
 * Check for a plain (non-array, non-null) object
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Check that a value is representable as JSON
 */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;

  switch (typeof value) {
    case "string":
    case "boolean":
      return true;
    case "number":
      return Number.isFinite(value);
    case "object":
      if (Array.isArray(value)) {
        return value.every(isJsonValue);
      }
      return Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/**
 * Validate that an insert/update payload is a JSON object
 * @throws ValidationError if not
 */
export function assertRecord(value: unknown, label = "record"): asserts value is JsonRecord {
  if (!isPlainObject(value)) {
    throw new ValidationError(`${label} must be a JSON object`, [
      { code: "custom", field: "", message: `${label} must be a JSON object` },
    ]);
  }

  for (const [field, fieldValue] of Object.entries(value)) {
    if (!isJsonValue(fieldValue)) {
      throw new ValidationError(`Field '${field}' is not a JSON value`, [
        { code: "custom", field, message: `Field '${field}' is not a JSON value` },
      ]);
    }
  }
}
