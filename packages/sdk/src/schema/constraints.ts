/**
 * Zod schemas for table schema definitions
 */

import { z } from "zod";
import { ValidationError } from "../errors.js";
import type { FieldConstraint, FieldType, JsonValue, TableSchema } from "../types.js";
import { isJsonValue } from "../validation.js";

/**
 * Short type names accepted on input
 */
const TYPE_ALIASES: Record<string, FieldType> = {
  str: "string",
  int: "integer",
  float: "number",
  bool: "boolean",
  dict: "object",
  list: "array",
};

const FIELD_TYPES = ["string", "number", "integer", "boolean", "object", "array", "null"] as const;

export const FieldTypeSchema = z.preprocess(
  (value) => (typeof value === "string" ? (TYPE_ALIASES[value] ?? value) : value),
  z.enum(FIELD_TYPES)
);

export const FieldConstraintSchema = z
  .object({
    type: FieldTypeSchema.optional(),
    required: z.boolean().optional(),
    max_length: z.number().int().nonnegative().optional(),
  })
  .strict();

export const TableSchemaSchema = z.record(z.string().min(1), FieldConstraintSchema);

/**
 * Parse a single field constraint
 * @throws ValidationError if the constraint is malformed
 */
export function parseFieldConstraint(input: unknown, field: string): FieldConstraint {
  const parsed = FieldConstraintSchema.safeParse(input);
  if (!parsed.success) {
    throw toSchemaError(parsed.error, field);
  }
  return parsed.data;
}

/**
 * Parse a table schema
 * @throws ValidationError if the schema is malformed
 */
export function parseTableSchema(input: unknown): TableSchema {
  const parsed = TableSchemaSchema.safeParse(input);
  if (!parsed.success) {
    throw toSchemaError(parsed.error);
  }
  return parsed.data;
}

function toSchemaError(error: z.ZodError, field?: string): ValidationError {
  const issues = error.issues.map((issue) => {
    const path = field !== undefined ? [field, ...issue.path] : issue.path;
    return {
      code: "schema" as const,
      field: String(path[0] ?? ""),
      message: `${path.join(".") || "schema"}: ${issue.message}`,
    };
  });
  const first = issues[0];
  return new ValidationError(`Invalid schema: ${first ? first.message : "unknown error"}`, issues);
}

export const AlterActionSchema = z.discriminatedUnion("kind", [
  z
    .object({
      kind: z.literal("add_column"),
      column: z.string().min(1),
      constraint: FieldConstraintSchema.optional(),
      defaultValue: z.custom<JsonValue>(isJsonValue, "must be a JSON value").optional(),
    })
    .strict(),
  z.object({ kind: z.literal("drop_column"), column: z.string().min(1) }).strict(),
  z
    .object({
      kind: z.literal("modify_column"),
      column: z.string().min(1),
      constraint: FieldConstraintSchema,
    })
    .strict(),
]);
