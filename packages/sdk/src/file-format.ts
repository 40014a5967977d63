/**
 * On-disk document format
 *
 * {
 *   "version": "1.0",
 *   "created_at": "<ISO timestamp>",
 *   "tables":  { "<table>": [ { "_id": 1, "_created_at": "...", ... } ] },
 *   "schemas": { "<table>": { "<field>": { "type": "string", "required": true, "max_length": 5 } } },
 *   "indexes": { "<table>": { "<column>": { "<valueKey>": [0, 2] } } }
 * }
 *
 * A document without a `tables` key is a legacy file: the whole document
 * is the table map and schemas/indexes are empty.
 */

import { z } from "zod";
import type { IndexesJSON } from "./indexes.js";
import { TableSchemaSchema } from "./schema/constraints.js";
import type { JsonValue, StoredRecord, TableSchema } from "./types.js";

export const FORMAT_VERSION = "1.0";

export interface DatabaseDocument {
  version: string;
  created_at: string;
  tables: Record<string, StoredRecord[]>;
  schemas: Record<string, TableSchema>;
  indexes: IndexesJSON;
}

const JsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(JsonValueSchema),
    z.record(JsonValueSchema),
  ])
);

const RecordSchema = z.record(JsonValueSchema);

const TablesSchema = z.record(z.array(RecordSchema));

const IndexesSchema = z.record(z.record(z.record(z.array(z.number().int().nonnegative()))));

const DocumentSchema = z.object({
  version: z.string().default(FORMAT_VERSION),
  created_at: z.string().optional(),
  tables: TablesSchema,
  schemas: z.record(TableSchemaSchema).default({}),
  indexes: IndexesSchema.default({}),
});

/**
 * Decode file content into a document
 * @param now - `created_at` for documents that carry none
 * @throws SyntaxError for malformed JSON, ZodError for an invalid shape
 */
export function decodeDocument(content: string, now: string): DatabaseDocument {
  const raw: unknown = JSON.parse(content);

  if (typeof raw === "object" && raw !== null && !Array.isArray(raw) && !("tables" in raw)) {
    return {
      version: FORMAT_VERSION,
      created_at: now,
      tables: TablesSchema.parse(raw),
      schemas: {},
      indexes: {},
    };
  }

  const parsed = DocumentSchema.parse(raw);
  return { ...parsed, created_at: parsed.created_at ?? now };
}

/**
 * Encode a document as indented JSON with a trailing newline
 */
export function encodeDocument(doc: DatabaseDocument, indent: number): string {
  const ordered: DatabaseDocument = {
    version: doc.version,
    created_at: doc.created_at,
    tables: doc.tables,
    schemas: doc.schemas,
    indexes: doc.indexes,
  };
  return JSON.stringify(ordered, null, indent) + "\n";
}
