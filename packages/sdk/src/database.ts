/**
 * Database facade
 */

import * as path from "node:path";
import { z } from "zod";
import { aggregateSummary, analyzeRecords } from "./analysis.js";
import { parsePipeline, runPipeline } from "./aggregate.js";
import {
  ConditionRequiredError,
  InvalidConditionError,
  RecordLimitError,
  TableDBError,
  TableNotFoundError,
  TransactionActiveError,
  ValidationError,
} from "./errors.js";
import { FORMAT_VERSION, type DatabaseDocument } from "./file-format.js";
import { IndexManager } from "./indexes.js";
import { Logger } from "./observability/logs.js";
import { MetricsCollector, type IndexMetricsSnapshot } from "./observability/metrics.js";
import { Persistence } from "./persistence.js";
import {
  indexCandidate,
  matches,
  parseCondition,
  selectRecords,
  SelectOptionsSchema,
} from "./query.js";
import { attempt, err, ok, unwrap, type Result } from "./result.js";
import { AlterActionSchema, parseTableSchema } from "./schema/constraints.js";
import { SchemaRegistry } from "./schema/registry.js";
import { SchemaValidator } from "./schema/validator.js";
import { parseStatement } from "./statements.js";
import { TransactionManager, type Snapshot } from "./transaction.js";
import type {
  AggregationStage,
  AlterAction,
  Condition,
  DatabaseInfo,
  DatabaseOptions,
  FieldConstraint,
  ImportMode,
  ImportSummary,
  JsonRecord,
  JsonValue,
  ParsedCondition,
  QueryPlan,
  ResolvedOptions,
  SelectOptions,
  StoredRecord,
  TableAnalysis,
  TableInfo,
  TableSchema,
} from "./types.js";
import { assertRecord, isPlainObject, validateColumnName, validateTableName } from "./validation.js";

export const DEFAULT_OPTIONS: ResolvedOptions = {
  path: "./data/tabledb.json",
  logging: false,
  logLevel: "info",
  maxRecordsPerTable: 100000,
  saveIntervalMs: 1000,
  indent: 2,
  clock: () => Date.now(),
};

const ImportModeSchema = z.enum(["insert", "replace", "update"]);

/**
 * Embeddable single-file document store
 *
 * Every mutation validates its input, changes in-memory state, maintains
 * indexes and then saves (throttled) unless a transaction is active.
 * Every operation returns a `Result`; expected failures never throw.
 *
 * @example
 * ```typescript
 * const db = openDatabase({ path: "./data/app.json" });
 *
 * db.createTable("users", { name: { type: "string", required: true, max_length: 50 } });
 * db.insert("users", { name: "ada", age: 36 });
 *
 * const adults = db.select("users", { age: { $gte: 18 } });
 * if (adults.ok) console.log(adults.value);
 *
 * db.close();
 * ```
 */
export class Database {
  #options: ResolvedOptions;
  #tables = new Map<string, StoredRecord[]>();
  #schemas = new SchemaRegistry();
  #validator = new SchemaValidator(this.#schemas);
  #transactions = new TransactionManager();
  #logger: Logger;
  #metrics = new MetricsCollector();
  #indexes: IndexManager;
  #persistence: Persistence;
  #createdAt: string;

  constructor(options: DatabaseOptions = {}) {
    this.#options = {
      path: path.resolve(options.path ?? DEFAULT_OPTIONS.path),
      logging: options.logging ?? DEFAULT_OPTIONS.logging,
      logLevel: options.logLevel ?? DEFAULT_OPTIONS.logLevel,
      maxRecordsPerTable: options.maxRecordsPerTable ?? DEFAULT_OPTIONS.maxRecordsPerTable,
      saveIntervalMs: options.saveIntervalMs ?? DEFAULT_OPTIONS.saveIntervalMs,
      indent: options.indent ?? DEFAULT_OPTIONS.indent,
      clock: options.clock ?? DEFAULT_OPTIONS.clock,
    };

    this.#logger = new Logger({ enabled: this.#options.logging, level: this.#options.logLevel });
    this.#indexes = new IndexManager({ logger: this.#logger, metrics: this.#metrics });
    this.#persistence = new Persistence({
      path: this.#options.path,
      indent: this.#options.indent,
      saveIntervalMs: this.#options.saveIntervalMs,
      clock: this.#options.clock,
      logger: this.#logger,
    });
    this.#createdAt = this.#now();

    const doc = this.#persistence.load();
    if (doc) {
      this.#apply(doc);
    }
  }

  get options(): Readonly<ResolvedOptions> {
    return this.#options;
  }

  get path(): string {
    return this.#options.path;
  }

  /**
   * True while a transaction is active
   */
  get inTransaction(): boolean {
    return this.#transactions.active;
  }

  // ---------------------------------------------------------------------------
  // Tables
  // ---------------------------------------------------------------------------

  /**
   * Create a table, optionally with a schema
   * @returns ok(false) if the table already exists
   */
  createTable(name: string, schema?: TableSchema): Result<boolean> {
    return attempt(() => {
      validateTableName(name);
      if (this.#tables.has(name)) {
        return false;
      }
      const parsed = schema !== undefined ? parseTableSchema(schema) : undefined;

      this.#tables.set(name, []);
      if (parsed) {
        this.#schemas.set(name, parsed);
      }
      this.#logger.info("table.create", { table: name });
      this.#changed();
      return true;
    });
  }

  /**
   * Drop a table with its schema and indexes
   */
  dropTable(name: string): Result<true> {
    return attempt(() => {
      this.#table(name);
      this.#tables.delete(name);
      this.#schemas.delete(name);
      this.#indexes.dropTable(name);
      this.#logger.info("table.drop", { table: name });
      this.#changed();
      return true as const;
    });
  }

  /**
   * Rename a table, keeping its position in the table list
   * @returns ok(false) if `to` already exists
   */
  renameTable(from: string, to: string): Result<boolean> {
    return attempt(() => {
      this.#table(from);
      validateTableName(to);
      if (this.#tables.has(to)) {
        return false;
      }

      this.#tables = new Map(
        Array.from(this.#tables, ([name, records]): [string, StoredRecord[]] => [
          name === from ? to : name,
          records,
        ])
      );
      this.#schemas.rename(from, to);
      this.#indexes.renameTable(from, to);
      this.#logger.info("table.rename", { table: from, details: { to } });
      this.#changed();
      return true;
    });
  }

  /**
   * Remove every record, keeping the schema and indexed columns
   * @returns Number of records removed
   */
  truncateTable(name: string): Result<number> {
    return attempt(() => {
      const removed = this.#table(name).length;
      this.#tables.set(name, []);
      this.#indexes.truncateTable(name);
      this.#logger.info("table.truncate", { table: name, details: { removed } });
      this.#changed();
      return removed;
    });
  }

  /**
   * Add, drop or modify a column
   */
  alterTable(name: string, action: AlterAction): Result<void> {
    return attempt(() => {
      const records = this.#table(name);
      const parsed = AlterActionSchema.safeParse(action);
      if (!parsed.success) {
        throw new ValidationError(`Invalid alter action: ${parsed.error.issues[0]?.message ?? ""}`);
      }
      const change = parsed.data;
      validateColumnName(change.column);

      switch (change.kind) {
        case "add_column":
          this.#addColumn(name, records, change.column, change.constraint, change.defaultValue);
          break;
        case "drop_column":
          this.#dropColumn(name, records, change.column);
          break;
        case "modify_column":
          this.#modifyColumn(name, records, change.column, change.constraint);
          break;
      }

      this.#indexes.rebuildAll(name, this.#table(name));
      this.#logger.info("table.alter", {
        table: name,
        column: change.column,
        details: { kind: change.kind },
      });
      this.#changed();
    });
  }

  #addColumn(
    table: string,
    records: StoredRecord[],
    column: string,
    constraint: FieldConstraint | undefined,
    defaultValue: JsonValue | undefined
  ): void {
    const next = records.map((record) =>
      defaultValue !== undefined && !Object.hasOwn(record, column)
        ? { ...record, [column]: structuredClone(defaultValue) }
        : record
    );

    if (constraint) {
      const schema = { ...(this.#schemas.get(table) ?? {}), [column]: constraint };
      this.#checkAll(schema, next);
      this.#schemas.set(table, schema);
    }
    this.#tables.set(table, next);
  }

  #dropColumn(table: string, records: StoredRecord[], column: string): void {
    for (const record of records) {
      delete record[column];
    }

    const schema = this.#schemas.get(table);
    if (schema && Object.hasOwn(schema, column)) {
      delete schema[column];
      this.#schemas.set(table, schema);
    }
    this.#indexes.dropColumn(table, column);
  }

  #modifyColumn(
    table: string,
    records: StoredRecord[],
    column: string,
    constraint: FieldConstraint
  ): void {
    const schema = { ...(this.#schemas.get(table) ?? {}), [column]: constraint };
    this.#checkAll(schema, records);
    this.#schemas.set(table, schema);
  }

  /**
   * @throws ValidationError naming the first record that fails `schema`
   */
  #checkAll(schema: TableSchema, records: readonly StoredRecord[]): void {
    records.forEach((record, position) => {
      const result = this.#validator.check(schema, record);
      if (!result.ok) {
        throw new ValidationError(
          `Record at position ${position}: ${result.error.message}`,
          result.error.issues
        );
      }
    });
  }

  getSchema(name: string): Result<TableSchema | null> {
    return attempt(() => {
      this.#table(name);
      return this.#schemas.get(name);
    });
  }

  /**
   * Replace a table's schema. Existing records are not re-checked.
   */
  setSchema(name: string, schema: TableSchema): Result<void> {
    return attempt(() => {
      this.#table(name);
      this.#schemas.set(name, parseTableSchema(schema));
      this.#logger.info("schema.set", { table: name });
      this.#changed();
    });
  }

  listTables(): string[] {
    return Array.from(this.#tables.keys());
  }

  // ---------------------------------------------------------------------------
  // Records
  // ---------------------------------------------------------------------------

  /**
   * Insert a record, assigning `_id` (record count + 1) and `_created_at`
   * @returns Copy of the stored record
   */
  insert(table: string, record: JsonRecord): Result<StoredRecord> {
    return attempt(() => this.#insert(table, record));
  }

  #insert(table: string, record: unknown): StoredRecord {
    const records = this.#table(table);
    assertRecord(record);

    if (records.length >= this.#options.maxRecordsPerTable) {
      throw new RecordLimitError(table, this.#options.maxRecordsPerTable);
    }

    const candidate: StoredRecord = {
      ...structuredClone(record),
      _id: records.length + 1,
      _created_at: this.#now(),
    };
    this.#validator.assertValid(table, candidate);

    records.push(candidate);
    this.#indexes.onInsert(table, candidate, records.length - 1);
    this.#logger.debug("record.insert", { table, details: { _id: candidate._id } });
    this.#changed();
    return structuredClone(candidate);
  }

  /**
   * Select matching records in table order
   * @returns Copies of the matching records after pagination
   */
  select(table: string, condition?: Condition, options: SelectOptions = {}): Result<StoredRecord[]> {
    return attempt(() => {
      const parsedOptions = SelectOptionsSchema.safeParse(options);
      if (!parsedOptions.success) {
        throw new InvalidConditionError(
          `Invalid select options: ${parsedOptions.error.issues[0]?.message ?? ""}`
        );
      }
      return structuredClone(this.#select(table, this.#condition(condition), parsedOptions.data));
    });
  }

  #select(table: string, condition: ParsedCondition, options: SelectOptions = {}): StoredRecord[] {
    const records = this.#table(table);
    const { rows, plan } = selectRecords(
      records,
      condition,
      (column, value) => this.#indexes.lookup(table, column, value),
      options
    );

    if (plan.indexUsed !== null) {
      this.#metrics.recordHit(table, plan.indexUsed);
    } else {
      for (const { field } of condition.fields) {
        if (this.#indexes.hasIndex(table, field)) {
          this.#metrics.recordMiss(table, field);
        }
      }
    }
    return rows;
  }

  /**
   * Apply `changes` to every matching record
   * @returns Number of records updated
   */
  update(table: string, condition: Condition, changes: JsonRecord): Result<number> {
    return attempt(() => {
      const records = this.#table(table);
      if (isEmptyCondition(condition)) {
        throw new ConditionRequiredError("update");
      }
      const parsed = this.#condition(condition);
      assertRecord(changes, "changes");

      const now = this.#now();
      const updates: Array<[number, StoredRecord]> = [];
      records.forEach((record, position) => {
        if (matches(record, parsed)) {
          updates.push([position, { ...record, ...structuredClone(changes), _updated_at: now }]);
        }
      });

      // All candidates must pass before any record changes
      for (const [, candidate] of updates) {
        this.#validator.assertValid(table, candidate);
      }

      for (const [position, candidate] of updates) {
        records[position] = candidate;
      }

      if (updates.length > 0) {
        this.#indexes.rebuildAll(table, records);
        this.#logger.debug("record.update", { table, details: { count: updates.length } });
        this.#changed();
      }
      return updates.length;
    });
  }

  /**
   * Delete every matching record
   * @returns Number of records removed
   */
  delete(table: string, condition: Condition): Result<number> {
    return attempt(() => {
      const records = this.#table(table);
      if (isEmptyCondition(condition)) {
        throw new ConditionRequiredError("delete");
      }
      const parsed = this.#condition(condition);

      const kept = records.filter((record) => !matches(record, parsed));
      const removed = records.length - kept.length;

      if (removed > 0) {
        this.#tables.set(table, kept);
        this.#indexes.rebuildAll(table, kept);
        this.#logger.debug("record.delete", { table, details: { count: removed } });
        this.#changed();
      }
      return removed;
    });
  }

  count(table: string, condition?: Condition): Result<number> {
    return attempt(() => this.#select(table, this.#condition(condition)).length);
  }

  // ---------------------------------------------------------------------------
  // Indexes
  // ---------------------------------------------------------------------------

  /**
   * @returns ok(false) if the column is already indexed
   */
  createIndex(table: string, column: string): Result<boolean> {
    return attempt(() => {
      const records = this.#table(table);
      validateColumnName(column);
      const created = this.#indexes.createIndex(table, column, records);
      if (created) {
        this.#changed();
      }
      return created;
    });
  }

  /**
   * @returns ok(false) if the column was not indexed
   */
  dropIndex(table: string, column: string): Result<boolean> {
    return attempt(() => {
      this.#table(table);
      const dropped = this.#indexes.dropIndex(table, column);
      if (dropped) {
        this.#changed();
      }
      return dropped;
    });
  }

  listIndexes(table: string): Result<string[]> {
    return attempt(() => {
      this.#table(table);
      return this.#indexes.listIndexes(table);
    });
  }

  /**
   * Recompute every index of a table from its records
   */
  rebuildIndexes(table: string): Result<string[]> {
    return attempt(() => {
      this.#indexes.rebuildAll(table, this.#table(table));
      return this.#indexes.listIndexes(table);
    });
  }

  indexMetrics(): Record<string, IndexMetricsSnapshot> {
    return this.#metrics.snapshot();
  }

  // ---------------------------------------------------------------------------
  // Aggregation
  // ---------------------------------------------------------------------------

  /**
   * Run `$match` / `$group` stages in order over a table
   */
  aggregate(table: string, stages: readonly AggregationStage[]): Result<JsonRecord[]> {
    return attempt(() => {
      const records = this.#table(table);
      const pipeline = parsePipeline(stages);
      return structuredClone(runPipeline(records, pipeline, this.#logger));
    });
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /**
   * Run `body` atomically. A TableDBError thrown by the body rolls back and
   * is returned as the error; any other exception rolls back and is re-thrown.
   * Use `unwrap` inside the body to turn failed results into throws.
   */
  transaction<T>(body: (db: this) => T): Result<T> {
    const begun = this.begin();
    if (!begun.ok) {
      return begun;
    }

    let value: T;
    try {
      value = body(this);
    } catch (error) {
      this.#transactions.rollback((snapshot) => this.#restore(snapshot));
      this.#logger.info("transaction.rollback", {
        message: error instanceof Error ? error.message : String(error),
      });
      if (error instanceof TableDBError) {
        return err(error);
      }
      throw error;
    }

    const committed = this.commit();
    if (!committed.ok) {
      return committed;
    }
    return ok(value);
  }

  /**
   * Start a transaction; persistence is suppressed until commit
   */
  begin(): Result<void> {
    return attempt(() => {
      this.#transactions.begin(this.#snapshot());
      this.#logger.debug("transaction.begin");
    });
  }

  /**
   * Commit with one forced save. A failed save keeps the in-memory changes
   * and leaves them pending for the next save.
   */
  commit(): Result<void> {
    return attempt(() => {
      const saved = this.#transactions.commit(() =>
        this.#persistence.save(() => this.#document(), { force: true })
      );
      if (!saved.ok) {
        throw saved.error;
      }
      this.#logger.debug("transaction.commit");
    });
  }

  /**
   * Restore the state captured by `begin`
   */
  rollback(): Result<void> {
    return attempt(() => {
      this.#transactions.rollback((snapshot) => this.#restore(snapshot));
      this.#logger.info("transaction.rollback");
    });
  }

  #snapshot(): Snapshot {
    return {
      tables: Object.fromEntries(this.#tables),
      schemas: this.#schemas.toJSON(),
      indexes: this.#indexes.columns(),
    };
  }

  #restore(snapshot: Snapshot): void {
    this.#tables = new Map(Object.entries(snapshot.tables));
    this.#schemas.replaceAll(snapshot.schemas);
    this.#indexes.restore(snapshot.indexes, snapshot.tables);
  }

  // ---------------------------------------------------------------------------
  // Persistence
  // ---------------------------------------------------------------------------

  /**
   * Throttled save of pending changes
   * @returns ok(true) if the file was written
   */
  save(): Result<boolean> {
    if (this.#transactions.active) {
      return ok(false);
    }
    return this.#persistence.save(() => this.#document());
  }

  /**
   * Write pending changes now
   */
  flush(): Result<boolean> {
    return attempt(() => {
      if (this.#transactions.active) {
        throw new TransactionActiveError();
      }
      const saved = this.#persistence.flush(() => this.#document());
      if (!saved.ok) {
        throw saved.error;
      }
      return saved.value;
    });
  }

  /**
   * Roll back an open transaction, then flush
   */
  close(): Result<void> {
    if (this.#transactions.active) {
      this.#logger.warn("database.close", { message: "rolling back open transaction" });
      this.#transactions.rollback((snapshot) => this.#restore(snapshot));
    }
    const flushed = this.flush();
    if (!flushed.ok) {
      return flushed;
    }
    this.#logger.info("database.close", { details: { path: this.path } });
    return ok(undefined);
  }

  /**
   * Copy the persisted file (after flushing pending changes)
   * @returns Path of the backup
   */
  backup(target?: string): Result<string> {
    return attempt(() => {
      if (!this.#transactions.active) {
        const flushed = this.#persistence.flush(() => this.#document());
        if (!flushed.ok) {
          throw flushed.error;
        }
      }
      return this.#persistence.backup(target);
    });
  }

  /**
   * Replace the live file and all in-memory state with a backup.
   * An invalid backup leaves everything unchanged.
   */
  restore(source: string): Result<void> {
    return attempt(() => {
      if (this.#transactions.active) {
        throw new TransactionActiveError();
      }
      const doc = this.#persistence.readBackup(source);
      this.#persistence.replaceWith(source);
      this.#apply(doc);
    });
  }

  /**
   * Optimize every table, force a save and reload from the file
   */
  vacuum(): Result<void> {
    return attempt(() => {
      if (this.#transactions.active) {
        throw new TransactionActiveError();
      }
      for (const name of this.#tables.keys()) {
        this.#optimize(name);
      }
      this.#persistence.markDirty();
      const saved = this.#persistence.save(() => this.#document(), { force: true });
      if (!saved.ok) {
        throw saved.error;
      }
      const doc = this.#persistence.load();
      if (doc) {
        this.#apply(doc);
      }
      this.#logger.info("database.vacuum");
    });
  }

  // ---------------------------------------------------------------------------
  // Inspection
  // ---------------------------------------------------------------------------

  getTableInfo(name: string): Result<TableInfo> {
    return attempt(() => this.#tableInfo(name));
  }

  #tableInfo(name: string): TableInfo {
    const records = this.#table(name);
    return {
      name,
      recordCount: records.length,
      schema: this.#schemas.get(name) ?? {},
      indexes: this.#indexes.listIndexes(name),
      sizeBytes: Buffer.byteLength(JSON.stringify(records), "utf8"),
    };
  }

  analyzeTable(name: string): Result<TableAnalysis> {
    return attempt(() => analyzeRecords(this.#table(name)));
  }

  /**
   * Rebuild indexes and renumber `_id` to 1..N in table order.
   * External references to old `_id` values become stale.
   */
  optimizeTable(name: string): Result<void> {
    return attempt(() => {
      this.#optimize(name);
      this.#changed();
    });
  }

  #optimize(name: string): void {
    const records = this.#table(name);
    records.forEach((record, i) => {
      record._id = i + 1;
    });
    this.#indexes.rebuildAll(name, records);
    this.#logger.warn("table.optimize", {
      table: name,
      message: "record ids renumbered; references to previous _id values are stale",
      details: { records: records.length },
    });
  }

  /**
   * Report how `select` would answer a condition
   */
  explain(table: string, condition?: Condition): Result<QueryPlan> {
    return attempt(() => {
      const records = this.#table(table);
      const parsed = this.#condition(condition);
      const candidate = indexCandidate(parsed);
      const positions = candidate
        ? this.#indexes.lookup(table, candidate.field, candidate.value)
        : null;

      const plan: QueryPlan = {
        table,
        scanType: "full_scan",
        estimatedRows: records.length,
        indexesUsed: [],
        condition: condition === undefined ? null : structuredClone(condition),
      };
      if (candidate && positions) {
        plan.scanType = "index_scan";
        plan.estimatedRows = positions.length;
        plan.indexesUsed = [candidate.field];
      }
      return plan;
    });
  }

  getDatabaseInfo(): DatabaseInfo {
    const tables: Record<string, TableInfo> = {};
    for (const name of this.#tables.keys()) {
      tables[name] = this.#tableInfo(name);
    }
    return {
      path: this.path,
      ...aggregateSummary(this.#tables),
      totalIndexes: this.#indexes.count(),
      tables,
      fileSizeBytes: this.#persistence.fileSize(),
    };
  }

  // ---------------------------------------------------------------------------
  // Import / export / statements
  // ---------------------------------------------------------------------------

  /**
   * Bulk import in one transaction (inline when one is already active).
   * Per-record failures are counted, not fatal.
   */
  importRecords(table: string, records: unknown[], mode: ImportMode = "insert"): Result<ImportSummary> {
    const run = (): ImportSummary => {
      this.#table(table);
      const parsedMode = ImportModeSchema.safeParse(mode);
      if (!parsedMode.success) {
        throw new ValidationError(`Invalid import mode: ${String(mode)}`);
      }
      const importMode = parsedMode.data;
      if (!Array.isArray(records)) {
        throw new ValidationError("records must be an array");
      }

      const summary: ImportSummary = { imported: 0, skipped: 0, errors: 0 };
      records.forEach((record: unknown, i) => {
        const result = attempt(() => this.#importOne(table, record, importMode));
        if (result.ok) {
          summary[result.value ? "imported" : "skipped"]++;
        } else {
          summary.errors++;
          this.#logger.error("import.record.fail", {
            table,
            message: result.error.message,
            details: { index: i },
          });
        }
      });
      this.#logger.info("import", { table, details: { mode: importMode, ...summary } });
      return summary;
    };

    if (this.#transactions.active) {
      return attempt(run);
    }
    return this.transaction(run);
  }

  /**
   * @returns false when the record was skipped
   */
  #importOne(table: string, record: unknown, mode: ImportMode): boolean {
    if (!isPlainObject(record)) {
      throw new ValidationError("record must be a JSON object");
    }
    assertRecord(record);
    const id = record._id;

    if (mode === "replace" && id !== undefined) {
      unwrap(this.delete(table, { _id: id }));
    }

    if (mode === "update" && id !== undefined) {
      const updated = unwrap(this.update(table, { _id: id }, record));
      if (updated > 0) {
        return true;
      }
    }

    this.#insert(table, record);
    return true;
  }

  /**
   * Matching records as indented JSON
   */
  exportRecords(table: string, condition?: Condition): Result<string> {
    return attempt(() => JSON.stringify(this.#select(table, this.#condition(condition)), null, 2));
  }

  /**
   * Run `SELECT COUNT(*) FROM <table>` or `SHOW TABLES`
   */
  execute(statement: string): Result<number | string[]> {
    return attempt(() => {
      const parsed = parseStatement(statement);
      switch (parsed.kind) {
        case "count":
          return this.#table(parsed.table).length;
        case "show_tables":
          return this.listTables();
      }
    });
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * @throws InvalidNameError for a malformed name, TableNotFoundError if absent
   */
  #table(name: string): StoredRecord[] {
    validateTableName(name);
    const records = this.#tables.get(name);
    if (!records) {
      throw new TableNotFoundError(name);
    }
    return records;
  }

  #condition(condition: unknown): ParsedCondition {
    const parsed = parseCondition(condition);
    if (!parsed.ok) {
      throw parsed.error;
    }
    return parsed.value;
  }

  /**
   * Mark state dirty and save (throttled) outside transactions.
   * A failed save is logged and retried by the next save.
   */
  #changed(): void {
    this.#persistence.markDirty();
    if (!this.#transactions.active) {
      this.#persistence.save(() => this.#document());
    }
  }

  #document(): DatabaseDocument {
    return {
      version: FORMAT_VERSION,
      created_at: this.#createdAt,
      tables: Object.fromEntries(this.#tables),
      schemas: this.#schemas.toJSON(),
      indexes: this.#indexes.toJSON(),
    };
  }

  /**
   * Replace all state with a loaded document; indexes are rebuilt from records
   */
  #apply(doc: DatabaseDocument): void {
    this.#createdAt = doc.created_at;
    this.#tables = new Map(Object.entries(doc.tables));
    this.#schemas.replaceAll(doc.schemas);

    const columns: Record<string, string[]> = {};
    for (const [table, tableIndexes] of Object.entries(doc.indexes)) {
      columns[table] = Object.keys(tableIndexes);
    }
    this.#indexes.restore(columns, doc.tables);
  }

  #now(): string {
    return new Date(this.#options.clock()).toISOString();
  }
}

function isEmptyCondition(condition: unknown): boolean {
  return (
    condition === undefined ||
    condition === null ||
    (isPlainObject(condition) && Object.keys(condition).length === 0)
  );
}

/**
 * Open (or create) a database
 */
export function openDatabase(options: DatabaseOptions = {}): Database {
  return new Database(options);
}
