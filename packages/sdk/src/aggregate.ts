/**
 * Aggregation pipeline: `$match` and `$group` stages run in order
 */

import { z } from "zod";
import { InvalidConditionError } from "./errors.js";
import { fieldValue, valueKey } from "./format.js";
import type { Logger } from "./observability/logs.js";
import { matches, parseCondition } from "./query.js";
import type { GroupRow, JsonRecord, JsonValue, ParsedCondition } from "./types.js";
import { isPlainObject } from "./validation.js";

/**
 * Stage after parsing
 */
export type PipelineStage =
  | { kind: "match"; condition: ParsedCondition }
  | { kind: "group"; field: string }
  | { kind: "skip"; keys: string[] };

const GroupSpecSchema = z.union([
  z.string().min(1),
  z.object({ _id: z.string().min(1) }).passthrough(),
]);

/**
 * Parse a pipeline. A stage holding both keys runs `$group`;
 * a stage with neither is kept as a skip.
 * @throws InvalidConditionError for malformed stages
 */
export function parsePipeline(stages: unknown): PipelineStage[] {
  if (!Array.isArray(stages)) {
    throw new InvalidConditionError("Pipeline must be an array of stages");
  }

  return stages.map((stage: unknown, i): PipelineStage => {
    if (!isPlainObject(stage)) {
      throw new InvalidConditionError(`Pipeline stage ${i} must be an object`);
    }

    if (Object.hasOwn(stage, "$group")) {
      const spec = GroupSpecSchema.safeParse(stage.$group);
      if (!spec.success) {
        throw new InvalidConditionError(
          `Pipeline stage ${i}: $group expects a field name or { _id: field }`
        );
      }
      return { kind: "group", field: typeof spec.data === "string" ? spec.data : spec.data._id };
    }

    if (Object.hasOwn(stage, "$match")) {
      const condition = parseCondition(stage.$match);
      if (!condition.ok) {
        throw new InvalidConditionError(
          `Pipeline stage ${i}: ${condition.error.message}`,
          { cause: condition.error }
        );
      }
      return { kind: "match", condition: condition.value };
    }

    return { kind: "skip", keys: Object.keys(stage) };
  });
}

/**
 * Run parsed stages over a working set
 */
export function runPipeline(
  records: readonly JsonRecord[],
  stages: readonly PipelineStage[],
  logger?: Logger
): JsonRecord[] {
  let working: JsonRecord[] = [...records];

  for (const stage of stages) {
    switch (stage.kind) {
      case "match":
        working = working.filter((r) => matches(r, stage.condition));
        break;
      case "group":
        working = group(working, stage.field);
        break;
      case "skip":
        logger?.debug("aggregate.stage.skip", { details: { keys: stage.keys } });
        break;
    }
  }

  return working;
}

/**
 * One row per distinct value of `field`, in order of first appearance.
 * A missing field groups under null.
 */
function group(records: readonly JsonRecord[], field: string): GroupRow[] {
  const groups = new Map<string, GroupRow>();

  for (const record of records) {
    const value: JsonValue = fieldValue(record, field) ?? null;
    const key = valueKey(value);
    const row = groups.get(key);
    if (row) {
      row.count++;
    } else {
      groups.set(key, { _id: value, count: 1 });
    }
  }

  return Array.from(groups.values());
}
