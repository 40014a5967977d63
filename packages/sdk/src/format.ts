/**
 * Deterministic JSON formatting and value keys
 */

import type { JsonRecord, JsonValue } from "./types.js";

/**
 * Stable, deterministic JSON stringification with alphabetical key ordering
 * @param value - Value to stringify
 * @param indent - Number of spaces for indentation (default: 2)
 * @returns Formatted JSON string with trailing newline
 */
export function stableStringify(value: unknown, indent = 2): string {
  const seen = new WeakSet<object>();

  const normalize = (input: unknown): unknown => {
    if (input && typeof input === "object") {
      // Detect cycles
      if (seen.has(input)) {
        throw new Error("Circular reference detected in object");
      }
      seen.add(input);

      try {
        // Arrays: preserve order but normalize contents
        if (Array.isArray(input)) {
          return input.map(normalize);
        }

        const entries = Object.entries(input).sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0));
        const out: Record<string, unknown> = {};
        for (const [k, v] of entries) {
          out[k] = normalize(v);
        }
        return out;
      } finally {
        seen.delete(input);
      }
    }
    return input;
  };

  return JSON.stringify(normalize(value), null, indent) + "\n";
}

const TAG_PREFIXES = ["__num__", "__bool__", "__null__", "__obj__", "__str__"];

/**
 * Type-tagged string key for a value
 *
 * Two values share a key iff they are equal for equality conditions: same
 * primitive type and value, or structurally equal objects/arrays regardless
 * of key order. Used both as index bucket key and for equality matching.
 */
export function valueKey(value: JsonValue): string {
  if (typeof value === "string") {
    // Escape strings that look like type prefixes
    return TAG_PREFIXES.some((p) => value.startsWith(p)) ? `__str__:${value}` : value;
  }

  if (typeof value === "number") {
    return `__num__${value}`;
  }

  if (typeof value === "boolean") {
    return `__bool__${value}`;
  }

  if (value === null) {
    return "__null__";
  }

  return `__obj__:${stableStringify(value, 0).trim()}`;
}

/**
 * Textual form of a value for substring matching
 */
export function textOf(value: JsonValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Value of a field the record itself carries; inherited properties count as absent
 */
export function fieldValue(record: JsonRecord, field: string): JsonValue | undefined {
  return Object.hasOwn(record, field) ? record[field] : undefined;
}
