/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import { isJsonValue } from "@tabledb/sdk";
import type { AggregationStage, ImportMode, JsonRecord, JsonValue } from "@tabledb/sdk";

export const IMPORT_MODES: readonly ImportMode[] = ["insert", "replace", "update"];

/**
 * Parse a non-negative integer argument
 */
export function parseNonNegativeInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a non-negative integer`);
  }

  return Number.parseInt(trimmed, 10);
}

/**
 * Parse JSON with descriptive error messages
 */
export function parseJson(value: string, source: string): unknown {
  try {
    // Strip BOM if present
    const cleaned = value.charCodeAt(0) === 0xfeff ? value.slice(1) : value;
    return JSON.parse(cleaned);
  } catch (err) {
    if (err instanceof SyntaxError) {
      throw new InvalidArgumentError(`Invalid JSON in ${source}: ${err.message}`);
    }
    throw err;
  }
}

function isJsonObject(value: JsonValue): value is JsonRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Narrow parsed JSON to a single object
 */
export function toRecord(value: unknown, source: string): JsonRecord {
  if (!isJsonValue(value) || !isJsonObject(value)) {
    throw new InvalidArgumentError(`${source} must be a JSON object`);
  }
  return value;
}

/**
 * Narrow parsed JSON to an array of values
 */
export function toArray(value: unknown, source: string): JsonValue[] {
  if (!isJsonValue(value) || !Array.isArray(value)) {
    throw new InvalidArgumentError(`${source} must be a JSON array`);
  }
  return value;
}

/**
 * Parse a `--where` condition (JSON object)
 */
export function parseWhere(value: string): JsonRecord {
  return toRecord(parseJson(value, "--where"), "--where");
}

/**
 * Parse a `--set` change set (JSON object)
 */
export function parseChanges(value: string): JsonRecord {
  return toRecord(parseJson(value, "--set"), "--set");
}

/**
 * Parse a `--pipeline` (JSON array of stage objects); stage contents are
 * validated by the engine
 */
export function parsePipeline(value: string): AggregationStage[] {
  return toArray(parseJson(value, "--pipeline"), "--pipeline").map((item, i) => {
    const source = toRecord(item, `--pipeline stage ${i}`);
    const stage: AggregationStage = {};
    for (const [key, stageValue] of Object.entries(source)) {
      stage[key] = stageValue;
    }
    return stage;
  });
}

export function isImportMode(value: string): value is ImportMode {
  return IMPORT_MODES.some((mode) => mode === value);
}
