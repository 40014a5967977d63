/**
 * Condition parsing and evaluation
 *
 * Conditions are parsed once at query entry into a tagged form
 * (`equals` / `range` / `like` per field) and evaluated against records
 * without re-interpreting the raw mapping.
 */

import { z } from "zod";
import { InvalidConditionError } from "./errors.js";
import { fieldValue, textOf, valueKey } from "./format.js";
import { ok, err, type Result } from "./result.js";
import type {
  FieldCondition,
  JsonRecord,
  JsonValue,
  ParsedCondition,
  Predicate,
  SelectOptions,
} from "./types.js";
import { isJsonValue, isPlainObject } from "./validation.js";

const BoundSchema = z.union([z.number(), z.string()]);

const OperatorsSchema = z
  .object({
    $gt: BoundSchema.optional(),
    $gte: BoundSchema.optional(),
    $lt: BoundSchema.optional(),
    $lte: BoundSchema.optional(),
    $like: z.string().optional(),
  })
  .strict();

export const SelectOptionsSchema = z
  .object({
    limit: z.number().int().nonnegative().optional(),
    offset: z.number().int().nonnegative().optional(),
  })
  .strict();

const EMPTY: ParsedCondition = { fields: [] };

/**
 * True for a non-empty plain object whose keys all start with `$`
 */
function isOperatorMapping(value: unknown): value is Record<string, unknown> {
  if (!isPlainObject(value)) return false;
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((k) => k.startsWith("$"));
}

/**
 * Parse a raw condition into its tagged form.
 * `undefined`, `null` and `{}` parse to the empty condition (matches everything).
 */
export function parseCondition(raw: unknown): Result<ParsedCondition, InvalidConditionError> {
  if (raw === undefined || raw === null) {
    return ok(EMPTY);
  }

  if (!isPlainObject(raw)) {
    return err(new InvalidConditionError("Condition must be an object"));
  }

  const fields: FieldCondition[] = [];

  for (const [field, value] of Object.entries(raw)) {
    if (field.length === 0) {
      return err(new InvalidConditionError("Condition field names must be non-empty"));
    }

    if (isPlainObject(value)) {
      const keys = Object.keys(value);
      const operatorKeys = keys.filter((k) => k.startsWith("$"));
      if (operatorKeys.length > 0 && operatorKeys.length < keys.length) {
        return err(
          new InvalidConditionError(`Field '${field}' mixes operators and plain keys`)
        );
      }
    }

    if (isOperatorMapping(value)) {
      const parsed = OperatorsSchema.safeParse(value);
      if (!parsed.success) {
        const issue = parsed.error.issues[0];
        const detail =
          issue?.code === "unrecognized_keys"
            ? `unknown operator ${issue.keys.join(", ")}`
            : `${issue?.path.join(".") ?? ""}: ${issue?.message ?? "invalid operator"}`;
        return err(new InvalidConditionError(`Invalid condition on '${field}': ${detail}`));
      }
      fields.push({ field, predicates: toPredicates(parsed.data) });
      continue;
    }

    if (!isJsonValue(value)) {
      return err(new InvalidConditionError(`Field '${field}' has a non-JSON value`));
    }

    fields.push({ field, predicates: [{ kind: "equals", value }] });
  }

  return ok({ fields });
}

function toPredicates(ops: z.infer<typeof OperatorsSchema>): Predicate[] {
  const predicates: Predicate[] = [];
  const { $gt, $gte, $lt, $lte, $like } = ops;

  if ($gt !== undefined || $gte !== undefined || $lt !== undefined || $lte !== undefined) {
    predicates.push({ kind: "range", gt: $gt, gte: $gte, lt: $lt, lte: $lte });
  }
  if ($like !== undefined) {
    predicates.push({ kind: "like", pattern: $like });
  }
  return predicates;
}

/**
 * Test one bound against a value of the same primitive kind
 */
function satisfies(
  value: unknown,
  bound: string | number | undefined,
  test: (cmp: number) => boolean
): boolean {
  if (bound === undefined) return true;

  if (typeof value === "number" && typeof bound === "number") {
    return test(value < bound ? -1 : value > bound ? 1 : 0);
  }
  if (typeof value === "string" && typeof bound === "string") {
    return test(value < bound ? -1 : value > bound ? 1 : 0);
  }
  return false;
}

function matchPredicate(record: JsonRecord, field: string, predicate: Predicate): boolean {
  // Every predicate requires the field to be present
  const value = fieldValue(record, field);
  if (value === undefined) {
    return false;
  }

  switch (predicate.kind) {
    case "equals":
      return valueKey(value) === valueKey(predicate.value);
    case "range":
      return (
        satisfies(value, predicate.gt, (c) => c > 0) &&
        satisfies(value, predicate.gte, (c) => c >= 0) &&
        satisfies(value, predicate.lt, (c) => c < 0) &&
        satisfies(value, predicate.lte, (c) => c <= 0)
      );
    case "like":
      return textOf(value).toLowerCase().includes(predicate.pattern.toLowerCase());
  }
}

/**
 * Test if a record matches a parsed condition (fields and predicates ANDed)
 */
export function matches(record: JsonRecord, condition: ParsedCondition): boolean {
  return condition.fields.every(({ field, predicates }) =>
    predicates.every((p) => matchPredicate(record, field, p))
  );
}

/**
 * Index-assisted lookup: positions for `column = value`, or null without an index
 */
export type IndexLookup = (column: string, value: JsonValue) => number[] | null;

/**
 * How a select was answered
 */
export interface SelectionPlan {
  scanType: "index_scan" | "full_scan";
  /** Indexed column consulted, if any */
  indexUsed: string | null;
  /** Records examined before pagination */
  candidates: number;
}

/**
 * The single equality field eligible for an index lookup, if any
 */
export function indexCandidate(
  condition: ParsedCondition
): { field: string; value: JsonValue } | null {
  if (condition.fields.length !== 1) return null;
  const only = condition.fields[0];
  if (!only || only.predicates.length !== 1) return null;
  const predicate = only.predicates[0];
  if (predicate?.kind !== "equals") return null;
  return { field: only.field, value: predicate.value };
}

/**
 * Select matching records in table order, then paginate.
 * Uses the index when the condition is a single equality on an indexed column.
 */
export function selectRecords<T extends JsonRecord>(
  records: readonly T[],
  condition: ParsedCondition,
  lookup: IndexLookup,
  options: SelectOptions = {}
): { rows: T[]; plan: SelectionPlan } {
  const candidate = indexCandidate(condition);
  const positions = candidate ? lookup(candidate.field, candidate.value) : null;

  if (candidate && positions) {
    const rows: T[] = [];
    for (const position of [...positions].sort((a, b) => a - b)) {
      const record = records[position];
      // Positions are re-checked against the record they point to
      if (record && matches(record, condition)) {
        rows.push(record);
      }
    }
    return {
      rows: paginate(rows, options.offset, options.limit),
      plan: { scanType: "index_scan", indexUsed: candidate.field, candidates: positions.length },
    };
  }

  const rows = records.filter((r) => matches(r, condition));
  return {
    rows: paginate(rows, options.offset, options.limit),
    plan: { scanType: "full_scan", indexUsed: null, candidates: records.length },
  };
}

/**
 * Apply pagination to records
 * @param skip - Number to skip (default: 0)
 * @param limit - Maximum to return; 0 or absent means unlimited
 */
export function paginate<T>(items: T[], skip = 0, limit?: number): T[] {
  const end = limit ? skip + limit : undefined;
  return items.slice(skip, end);
}
