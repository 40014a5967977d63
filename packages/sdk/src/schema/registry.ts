/**
 * Schema registry: table schemas and their compiled JSON Schema validators
 */

import { createHash } from "node:crypto";
import { Ajv2020 } from "ajv/dist/2020.js";
import type { ValidateFunction } from "ajv";
import { stableStringify } from "../format.js";
import type { FieldConstraint, TableSchema } from "../types.js";

/**
 * Schema metadata with compilation cache
 */
interface SchemaEntry {
  /** Schema as registered */
  schema: TableSchema;
  /** Content digest for cache lookup */
  digest: string;
}

/**
 * Holds `table → TableSchema` and compiles each distinct schema once.
 * Compiled validators are shared between tables with identical schemas.
 */
export class SchemaRegistry {
  #schemas = new Map<string, SchemaEntry>();
  #compiled = new Map<string, ValidateFunction>();
  #ajv: Ajv2020;

  constructor() {
    // Draft 2020-12; types are checked per property, unions are never emitted
    this.#ajv = new Ajv2020({
      strict: true,
      strictTypes: false,
      allErrors: true,
    });
  }

  /**
   * Register (or replace) the schema of a table
   */
  set(table: string, schema: TableSchema): void {
    const copy = structuredClone(schema);
    this.#schemas.set(table, { schema: copy, digest: this.#computeDigest(copy) });
    this.#prune();
  }

  get(table: string): TableSchema | null {
    const entry = this.#schemas.get(table);
    return entry ? structuredClone(entry.schema) : null;
  }

  has(table: string): boolean {
    return this.#schemas.has(table);
  }

  delete(table: string): boolean {
    const deleted = this.#schemas.delete(table);
    this.#prune();
    return deleted;
  }

  rename(from: string, to: string): void {
    const entry = this.#schemas.get(from);
    if (!entry) return;
    this.#schemas.delete(from);
    this.#schemas.set(to, entry);
  }

  /**
   * Plain-object copy of every schema, keyed by table
   */
  toJSON(): Record<string, TableSchema> {
    const out: Record<string, TableSchema> = {};
    for (const [table, entry] of this.#schemas) {
      out[table] = structuredClone(entry.schema);
    }
    return out;
  }

  /**
   * Replace every schema at once
   */
  replaceAll(schemas: Record<string, TableSchema>): void {
    this.#schemas.clear();
    for (const [table, schema] of Object.entries(schemas)) {
      this.set(table, schema);
    }
    this.#prune();
  }

  /**
   * Get the compiled validator for a table's schema
   * @returns null when the table has no schema
   */
  getCompiled(table: string): ValidateFunction | null {
    const entry = this.#schemas.get(table);
    if (!entry) {
      return null;
    }
    return this.#compileCached(entry.schema, entry.digest);
  }

  /**
   * Compile a schema that is not (yet) registered, e.g. a proposed change.
   * Only schemas some table uses stay in the cache.
   */
  compile(schema: TableSchema): ValidateFunction {
    const digest = this.#computeDigest(schema);
    const cached = this.#compiled.get(digest);
    return cached ?? this.#ajv.compile(toJsonSchema(schema));
  }

  #compileCached(schema: TableSchema, digest: string): ValidateFunction {
    const cached = this.#compiled.get(digest);
    if (cached) {
      return cached;
    }

    const compiled = this.#ajv.compile(toJsonSchema(schema));
    this.#compiled.set(digest, compiled);
    return compiled;
  }

  /**
   * Drop compiled validators whose digest no table uses
   */
  #prune(): void {
    const live = new Set(Array.from(this.#schemas.values(), (entry) => entry.digest));
    for (const digest of this.#compiled.keys()) {
      if (!live.has(digest)) {
        this.#compiled.delete(digest);
      }
    }
  }

  /**
   * Compute SHA-256 digest of schema content
   */
  #computeDigest(schema: TableSchema): string {
    return createHash("sha256").update(stableStringify(schema, 0)).digest("hex");
  }
}

/**
 * Translate a table schema into a JSON Schema object
 */
export function toJsonSchema(schema: TableSchema): Record<string, unknown> {
  const properties: Record<string, Record<string, unknown>> = {};
  const required: string[] = [];

  for (const [field, constraint] of Object.entries(schema)) {
    properties[field] = toPropertySchema(constraint);
    if (constraint.required) {
      required.push(field);
    }
  }

  return { type: "object", properties, required };
}

function toPropertySchema(constraint: FieldConstraint): Record<string, unknown> {
  const property: Record<string, unknown> = {};
  if (constraint.type !== undefined) {
    property.type = constraint.type;
  }
  // Length limits only apply to strings
  if (
    constraint.max_length !== undefined &&
    (constraint.type === undefined || constraint.type === "string")
  ) {
    property.maxLength = constraint.max_length;
  }
  return property;
}
