/**
 * Core types for TableDB
 */

/**
 * JSON-compatible value stored in a record field
 */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/**
 * Plain field/value mapping as supplied by callers
 */
export type JsonRecord = { [field: string]: JsonValue };

/**
 * Record as held in a table. `_id` (number) and `_created_at` are assigned on
 * insert, `_updated_at` on every update. A column drop may remove `_id`.
 */
export type StoredRecord = JsonRecord;

/**
 * Semantic field types accepted in a table schema
 */
export type FieldType = "string" | "number" | "integer" | "boolean" | "object" | "array" | "null";

/**
 * Per-field constraints. `max_length` keeps its file-format spelling.
 */
export interface FieldConstraint {
  type?: FieldType;
  required?: boolean;
  max_length?: number;
}

/**
 * Table schema: field name → constraints
 */
export type TableSchema = Record<string, FieldConstraint>;

/**
 * Validation issue codes
 */
export type ValidationIssueCode = "required" | "type" | "max_length" | "schema" | "custom";

/**
 * Single schema violation
 */
export interface ValidationIssue {
  /** Category of the violation */
  code: ValidationIssueCode;
  /** Offending field ("" for the record itself) */
  field: string;
  /** Human-readable message */
  message: string;
}

/**
 * Range operators accepted in a condition
 */
export interface RangeOperators {
  $gt?: string | number;
  $gte?: string | number;
  $lt?: string | number;
  $lte?: string | number;
}

/**
 * Operator mapping for a single field
 */
export interface FieldOperators extends RangeOperators {
  $like?: string;
}

/**
 * Condition as written by callers: field → literal value or operator mapping
 */
export type Condition = Record<string, JsonValue | FieldOperators>;

/**
 * Parsed predicate applied to one field
 */
export type Predicate =
  | { kind: "equals"; value: JsonValue }
  | { kind: "range"; gt?: string | number; gte?: string | number; lt?: string | number; lte?: string | number }
  | { kind: "like"; pattern: string };

/**
 * All predicates on one field (ANDed)
 */
export interface FieldCondition {
  field: string;
  predicates: Predicate[];
}

/**
 * Condition after parsing: fields are ANDed
 */
export interface ParsedCondition {
  fields: FieldCondition[];
}

/**
 * Pagination applied to select results
 */
export interface SelectOptions {
  limit?: number;
  offset?: number;
}

/**
 * Aggregation stage as written by callers
 */
export interface AggregationStage {
  $match?: Condition;
  $group?: { _id: string } | string;
  [stage: string]: unknown;
}

/**
 * Result row of a `$group` stage
 */
export interface GroupRow {
  _id: JsonValue;
  count: number;
  [key: string]: JsonValue;
}

/**
 * Schema change applied by `alterTable`
 */
export type AlterAction =
  | { kind: "add_column"; column: string; constraint?: FieldConstraint; defaultValue?: JsonValue }
  | { kind: "drop_column"; column: string }
  | { kind: "modify_column"; column: string; constraint: FieldConstraint };

/**
 * Import strategy for `importRecords`
 */
export type ImportMode = "insert" | "replace" | "update";

/**
 * Outcome of `importRecords`
 */
export interface ImportSummary {
  imported: number;
  skipped: number;
  errors: number;
}

/**
 * Summary returned by `getTableInfo`
 */
export interface TableInfo {
  name: string;
  recordCount: number;
  schema: TableSchema;
  indexes: string[];
  sizeBytes: number;
}

/**
 * Column statistics returned by `analyzeTable`
 */
export interface TableAnalysis {
  recordCount: number;
  columns: string[];
  dataTypes: Record<string, string>;
  nullCounts: Record<string, number>;
  uniqueCounts: Record<string, number>;
}

/**
 * Execution plan reported by `explain`
 */
export interface QueryPlan {
  table: string;
  scanType: "index_scan" | "full_scan";
  estimatedRows: number;
  indexesUsed: string[];
  condition: Condition | null;
}

/**
 * Whole-database summary returned by `getDatabaseInfo`
 */
export interface DatabaseInfo {
  path: string;
  tableCount: number;
  totalRecords: number;
  totalIndexes: number;
  tables: Record<string, TableInfo>;
  fileSizeBytes?: number;
}

/**
 * Log levels understood by the engine logger
 */
export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * Configuration options for opening a database
 */
export interface DatabaseOptions {
  /** Backing file (default: ./data/tabledb.json) */
  path?: string;
  /** Enable logging (default: false) */
  logging?: boolean;
  /** Minimum log level when logging is enabled (default: "info") */
  logLevel?: LogLevel;
  /** Maximum records per table (default: 100000) */
  maxRecordsPerTable?: number;
  /** Minimum milliseconds between throttled saves (default: 1000) */
  saveIntervalMs?: number;
  /** Number of spaces for JSON indentation in the file (default: 2) */
  indent?: number;
  /** Time source in epoch milliseconds (default: Date.now) */
  clock?: () => number;
}

/**
 * Options after defaults have been applied
 */
export type ResolvedOptions = Required<DatabaseOptions>;
