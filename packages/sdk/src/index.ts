/**
 * TableDB SDK
 *
 * An embeddable single-file document store with schemas, indexes,
 * condition queries, snapshot transactions and aggregation
 */

// Re-export types
export type {
  JsonValue,
  JsonRecord,
  StoredRecord,
  FieldType,
  FieldConstraint,
  TableSchema,
  ValidationIssue,
  ValidationIssueCode,
  RangeOperators,
  FieldOperators,
  Condition,
  Predicate,
  FieldCondition,
  ParsedCondition,
  SelectOptions,
  AggregationStage,
  GroupRow,
  AlterAction,
  ImportMode,
  ImportSummary,
  TableInfo,
  TableAnalysis,
  QueryPlan,
  DatabaseInfo,
  LogLevel,
  DatabaseOptions,
  ResolvedOptions,
} from "./types.js";

// Database
export { Database, openDatabase, DEFAULT_OPTIONS } from "./database.js";

// Results
export type { Ok, Err, Result } from "./result.js";
export { ok, err, isErr, unwrap, attempt } from "./result.js";

// Query and pipeline utilities
export { parseCondition, matches, selectRecords, paginate, indexCandidate } from "./query.js";
export type { IndexLookup, SelectionPlan } from "./query.js";
export { parsePipeline, runPipeline } from "./aggregate.js";
export type { PipelineStage } from "./aggregate.js";
export { parseStatement } from "./statements.js";
export type { Statement } from "./statements.js";

// Schema components
export { SchemaRegistry, toJsonSchema } from "./schema/registry.js";
export { SchemaValidator } from "./schema/validator.js";
export { parseTableSchema, parseFieldConstraint } from "./schema/constraints.js";

// Utilities
export { stableStringify, valueKey, textOf } from "./format.js";
export { validateTableName, validateColumnName, isJsonValue } from "./validation.js";
export { decodeDocument, encodeDocument, FORMAT_VERSION } from "./file-format.js";
export type { DatabaseDocument } from "./file-format.js";

// Observability
export { Logger, formatEntry } from "./observability/logs.js";
export type { LogEntry, LoggerOptions } from "./observability/logs.js";
export type { IndexMetricsSnapshot } from "./observability/metrics.js";

// Errors
export {
  TableDBError,
  ValidationError,
  InvalidNameError,
  InvalidConditionError,
  TableNotFoundError,
  PersistenceError,
  TransactionActiveError,
  NoActiveTransactionError,
  ConditionRequiredError,
  RecordLimitError,
  UnsupportedStatementError,
} from "./errors.js";
export type { ErrorKind } from "./errors.js";
