/**
 * Index manager for equality indexes
 *
 * Each index maps the value key of one column to the positions (0-based
 * array offsets, not `_id`s) of the records holding that value.
 * Format: { "<valueKey>": [0, 3, ...], ... }
 *
 * Invariants:
 * - An index reflects the current position of every record that has its column
 * - Position arrays are ascending
 * - Anything that shifts positions (delete, update, truncate, alter,
 *   optimize) is followed by `rebuildAll`
 */

import { fieldValue, valueKey } from "./format.js";
import type { Logger } from "./observability/logs.js";
import type { MetricsCollector } from "./observability/metrics.js";
import type { JsonRecord, JsonValue } from "./types.js";

/**
 * Index data structure: value key → record positions
 */
export type IndexData = Map<string, number[]>;

/**
 * Persisted shape: table → column → value key → positions
 */
export type IndexesJSON = Record<string, Record<string, Record<string, number[]>>>;

/**
 * Index columns per table, as captured by a transaction snapshot
 */
export type IndexColumns = Record<string, string[]>;

export interface IndexManagerOptions {
  logger: Logger;
  metrics: MetricsCollector;
}

/**
 * Manages in-memory equality indexes for every table
 */
export class IndexManager {
  #indexes = new Map<string, Map<string, IndexData>>();
  #logger: Logger;
  #metrics: MetricsCollector;

  constructor(options: IndexManagerOptions) {
    this.#logger = options.logger;
    this.#metrics = options.metrics;
  }

  /**
   * Build an index for a column from the table's current records
   * @returns false if the index already exists
   */
  createIndex(table: string, column: string, records: readonly JsonRecord[]): boolean {
    let tableIndexes = this.#indexes.get(table);
    if (tableIndexes?.has(column)) {
      return false;
    }
    if (!tableIndexes) {
      tableIndexes = new Map();
      this.#indexes.set(table, tableIndexes);
    }

    tableIndexes.set(column, this.#build(table, column, records));
    this.#logger.info("index.create", { table, column });
    return true;
  }

  /**
   * Remove an index
   * @returns false if it did not exist
   */
  dropIndex(table: string, column: string): boolean {
    const tableIndexes = this.#indexes.get(table);
    if (!tableIndexes?.delete(column)) {
      return false;
    }
    if (tableIndexes.size === 0) {
      this.#indexes.delete(table);
    }
    this.#logger.info("index.drop", { table, column });
    return true;
  }

  hasIndex(table: string, column: string): boolean {
    return this.#indexes.get(table)?.has(column) ?? false;
  }

  /**
   * Indexed columns of a table, in creation order
   */
  listIndexes(table: string): string[] {
    return Array.from(this.#indexes.get(table)?.keys() ?? []);
  }

  /**
   * Total number of indexes across all tables
   */
  count(): number {
    let total = 0;
    for (const tableIndexes of this.#indexes.values()) {
      total += tableIndexes.size;
    }
    return total;
  }

  /**
   * Register a record appended at `position`
   */
  onInsert(table: string, record: JsonRecord, position: number): void {
    const tableIndexes = this.#indexes.get(table);
    if (!tableIndexes) return;

    for (const [column, index] of tableIndexes) {
      const value = fieldValue(record, column);
      if (value === undefined) continue;

      const key = valueKey(value);
      const positions = index.get(key);
      if (positions) {
        positions.push(position);
      } else {
        index.set(key, [position]);
      }
      this.#metrics.updateKeys(table, column, index.size);
    }
  }

  /**
   * Recompute every index of a table from its current records
   */
  rebuildAll(table: string, records: readonly JsonRecord[]): void {
    const tableIndexes = this.#indexes.get(table);
    if (!tableIndexes) return;

    for (const column of tableIndexes.keys()) {
      tableIndexes.set(column, this.#build(table, column, records));
    }
  }

  /**
   * Positions holding `value` in `column`
   * @returns null when the column is not indexed
   */
  lookup(table: string, column: string, value: JsonValue): number[] | null {
    const index = this.#indexes.get(table)?.get(column);
    if (!index) {
      return null;
    }
    return [...(index.get(valueKey(value)) ?? [])];
  }

  dropTable(table: string): void {
    this.#indexes.delete(table);
    this.#metrics.reset(table);
  }

  renameTable(from: string, to: string): void {
    const tableIndexes = this.#indexes.get(from);
    this.#metrics.reset(from);
    if (!tableIndexes) return;
    this.#indexes.delete(from);
    this.#indexes.set(to, tableIndexes);
  }

  /**
   * Empty every index of a table, keeping the indexed columns
   */
  truncateTable(table: string): void {
    this.rebuildAll(table, []);
  }

  /**
   * Drop the index on a removed column, if any
   */
  dropColumn(table: string, column: string): void {
    if (this.hasIndex(table, column)) {
      this.dropIndex(table, column);
    }
  }

  /**
   * Indexed columns per table
   */
  columns(): IndexColumns {
    const out: IndexColumns = {};
    for (const [table, tableIndexes] of this.#indexes) {
      out[table] = Array.from(tableIndexes.keys());
    }
    return out;
  }

  /**
   * Replace all indexes with `columns`, built from `tables`
   */
  restore(columns: IndexColumns, tables: Readonly<Record<string, readonly JsonRecord[]>>): void {
    this.#indexes.clear();
    for (const [table, tableColumns] of Object.entries(columns)) {
      const records = tables[table];
      if (!records) continue;
      const tableIndexes = new Map<string, IndexData>();
      for (const column of tableColumns) {
        tableIndexes.set(column, this.#build(table, column, records));
      }
      if (tableIndexes.size > 0) {
        this.#indexes.set(table, tableIndexes);
      }
    }
  }

  /**
   * Plain-object view in the persisted shape
   */
  toJSON(): IndexesJSON {
    const out: IndexesJSON = {};
    for (const [table, tableIndexes] of this.#indexes) {
      const tableOut: Record<string, Record<string, number[]>> = {};
      for (const [column, index] of tableIndexes) {
        tableOut[column] = Object.fromEntries(
          Array.from(index, ([key, positions]) => [key, [...positions]])
        );
      }
      out[table] = tableOut;
    }
    return out;
  }

  #build(table: string, column: string, records: readonly JsonRecord[]): IndexData {
    const startTime = performance.now();
    const index: IndexData = new Map();

    records.forEach((record, position) => {
      const value = fieldValue(record, column);
      if (value === undefined) return;

      const key = valueKey(value);
      const positions = index.get(key);
      if (positions) {
        positions.push(position);
      } else {
        index.set(key, [position]);
      }
    });

    const duration = performance.now() - startTime;
    this.#metrics.recordRebuild(table, column, duration, index.size);
    this.#logger.debug("index.rebuild", {
      table,
      column,
      details: { durationMs: duration.toFixed(2), records: records.length, keys: index.size },
    });

    return index;
  }
}
