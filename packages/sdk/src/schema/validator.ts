/**
 * Schema validator with error normalization
 */

import type { ErrorObject, ValidateFunction } from "ajv";
import { ValidationError } from "../errors.js";
import { ok, err, type Result } from "../result.js";
import type { JsonRecord, TableSchema, ValidationIssue, ValidationIssueCode } from "../types.js";
import type { SchemaRegistry } from "./registry.js";

/**
 * Validates candidate records against the schema registered for their table.
 * Pure: never mutates the registry or the candidate.
 */
export class SchemaValidator {
  #registry: SchemaRegistry;

  constructor(registry: SchemaRegistry) {
    this.#registry = registry;
  }

  /**
   * Validate a full candidate record (existing fields merged with changes)
   */
  validate(table: string, candidate: JsonRecord): Result<void, ValidationError> {
    const validator = this.#registry.getCompiled(table);
    if (!validator) {
      return ok(undefined);
    }
    return this.#run(validator, () => this.#registry.get(table) ?? {}, candidate);
  }

  /**
   * Validate a candidate against an explicit schema
   */
  check(schema: TableSchema, candidate: JsonRecord): Result<void, ValidationError> {
    return this.#run(this.#registry.compile(schema), () => schema, candidate);
  }

  #run(
    validator: ValidateFunction,
    schema: () => TableSchema,
    candidate: JsonRecord
  ): Result<void, ValidationError> {
    if (validator(candidate)) {
      return ok(undefined);
    }

    const issues = normalizeErrors(validator.errors ?? [], schema());
    const first = issues[0];
    return err(new ValidationError(first ? first.message : "Record does not match schema", issues));
  }

  /**
   * Validate, throwing on failure
   * @throws ValidationError
   */
  assertValid(table: string, candidate: JsonRecord): void {
    const result = this.validate(table, candidate);
    if (!result.ok) {
      throw result.error;
    }
  }
}

/**
 * Normalize Ajv errors to ValidationIssue format
 */
function normalizeErrors(ajvErrors: ErrorObject[], schema: TableSchema): ValidationIssue[] {
  const issues: ValidationIssue[] = [];

  for (const error of ajvErrors) {
    const field = fieldOf(error);
    const code = mapErrorCode(error.keyword);
    issues.push({ code, field, message: formatMessage(code, field, error, schema) });
  }

  return issues;
}

/**
 * Field named by an error: the missing property for `required`,
 * otherwise the first segment of the instance path
 */
function fieldOf(error: ErrorObject): string {
  if (error.keyword === "required") {
    const missing: unknown = error.params.missingProperty;
    if (typeof missing === "string") {
      return missing;
    }
  }

  const segment = error.instancePath.split("/")[1] ?? "";
  return segment.replace(/~1/g, "/").replace(/~0/g, "~");
}

function mapErrorCode(keyword: string): ValidationIssueCode {
  switch (keyword) {
    case "required":
      return "required";
    case "type":
      return "type";
    case "maxLength":
      return "max_length";
    default:
      return "custom";
  }
}

function formatMessage(
  code: ValidationIssueCode,
  field: string,
  error: ErrorObject,
  schema: TableSchema
): string {
  switch (code) {
    case "required":
      return `Field '${field}' is required`;
    case "type":
      return `Field '${field}' must be of type ${schema[field]?.type ?? "unknown"}`;
    case "max_length": {
      const limit: unknown = error.params.limit;
      return `Field '${field}' exceeds max length ${String(limit ?? schema[field]?.max_length)}`;
    }
    default:
      return `Field '${field}' ${error.message ?? "is invalid"}`;
  }
}
