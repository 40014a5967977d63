/**
 * Table statistics
 */

import { valueKey } from "./format.js";
import type { JsonValue, StoredRecord, TableAnalysis } from "./types.js";

/**
 * JSON type name of a value
 */
export function typeName(value: JsonValue): string {
  if (value === null) return "null";
  if (Array.isArray(value)) return "array";
  if (typeof value === "number") return Number.isInteger(value) ? "integer" : "number";
  return typeof value;
}

/**
 * Per-column statistics. A column's type is taken from the first record
 * that has it; nulls are counted apart and excluded from unique counts.
 */
export function analyzeRecords(records: readonly StoredRecord[]): TableAnalysis {
  const columns: string[] = [];
  const dataTypes: Record<string, string> = {};
  const nullCounts: Record<string, number> = {};
  const unique = new Map<string, Set<string>>();

  for (const record of records) {
    for (const [column, value] of Object.entries(record)) {
      let seen = unique.get(column);
      if (!seen) {
        seen = new Set();
        unique.set(column, seen);
        columns.push(column);
        dataTypes[column] = typeName(value);
        nullCounts[column] = 0;
      }

      if (value === null) {
        nullCounts[column] = (nullCounts[column] ?? 0) + 1;
      } else {
        seen.add(valueKey(value));
      }
    }
  }

  const uniqueCounts: Record<string, number> = {};
  for (const [column, seen] of unique) {
    uniqueCounts[column] = seen.size;
  }

  return { recordCount: records.length, columns, dataTypes, nullCounts, uniqueCounts };
}

/**
 * Table and record totals
 */
export function aggregateSummary(tables: ReadonlyMap<string, readonly StoredRecord[]>): {
  tableCount: number;
  totalRecords: number;
} {
  let totalRecords = 0;
  for (const records of tables.values()) {
    totalRecords += records.length;
  }
  return { tableCount: tables.size, totalRecords };
}
