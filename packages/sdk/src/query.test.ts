import { describe, it, expect } from "vitest";
import { indexCandidate, matches, paginate, parseCondition, selectRecords } from "./query.js";
import { InvalidConditionError } from "./errors.js";
import type { JsonRecord, ParsedCondition } from "./types.js";

function parsed(raw: unknown): ParsedCondition {
  const result = parseCondition(raw);
  if (!result.ok) throw result.error;
  return result.value;
}

const staff: JsonRecord[] = [
  { _id: 1, dept: "eng", age: 20, name: "Alice" },
  { _id: 2, dept: "eng", age: 40, name: "bob" },
  { _id: 3, dept: "hr", age: 30, name: "Carol" },
];

describe("parseCondition", () => {
  it("parses literals as equality predicates", () => {
    expect(parsed({ dept: "eng" })).toEqual({
      fields: [{ field: "dept", predicates: [{ kind: "equals", value: "eng" }] }],
    });
  });

  it("parses operator mappings into range and like predicates", () => {
    expect(parsed({ age: { $gte: 30, $lt: 50 }, name: { $like: "ar" } })).toEqual({
      fields: [
        {
          field: "age",
          predicates: [{ kind: "range", gt: undefined, gte: 30, lt: 50, lte: undefined }],
        },
        { field: "name", predicates: [{ kind: "like", pattern: "ar" }] },
      ],
    });
  });

  it("treats undefined, null and {} as the empty condition", () => {
    expect(parsed(undefined)).toEqual({ fields: [] });
    expect(parsed(null)).toEqual({ fields: [] });
    expect(parsed({})).toEqual({ fields: [] });
  });

  it("treats an empty object value as a literal", () => {
    expect(parsed({ meta: {} })).toEqual({
      fields: [{ field: "meta", predicates: [{ kind: "equals", value: {} }] }],
    });
  });

  it("rejects unknown operators", () => {
    const result = parseCondition({ age: { $ne: 3 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(InvalidConditionError);
      expect(result.error.message).toBe("Invalid condition on 'age': unknown operator $ne");
    }
  });

  it("rejects mixed operator and plain keys", () => {
    const result = parseCondition({ age: { $gt: 3, value: 4 } });
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Field 'age' mixes operators and plain keys");
    }
  });

  it("rejects non-string $like patterns", () => {
    const result = parseCondition({ name: { $like: 5 } });
    expect(result.ok).toBe(false);
  });

  it("rejects a condition that is not an object", () => {
    const result = parseCondition(["dept"]);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.message).toBe("Condition must be an object");
    }
  });
});

describe("matches", () => {
  it("ANDs fields", () => {
    const condition = parsed({ dept: "eng", age: 40 });
    expect(staff.filter((r) => matches(r, condition)).map((r) => r._id)).toEqual([2]);
  });

  it("ANDs operators on one field", () => {
    const condition = parsed({ age: { $gt: 20, $lte: 30 } });
    expect(staff.filter((r) => matches(r, condition)).map((r) => r._id)).toEqual([3]);
  });

  it("fails equality on a missing field, even against null", () => {
    expect(matches({ a: 1 }, parsed({ b: null }))).toBe(false);
    expect(matches({ b: null }, parsed({ b: null }))).toBe(true);
  });

  it("fails range and like on a missing field", () => {
    expect(matches({ a: 1 }, parsed({ b: { $gt: 0 } }))).toBe(false);
    expect(matches({ a: 1 }, parsed({ b: { $like: "" } }))).toBe(false);
  });

  it("fails range comparisons across primitive kinds", () => {
    expect(matches({ age: "40" }, parsed({ age: { $gt: 30 } }))).toBe(false);
    expect(matches({ age: 40 }, parsed({ age: { $gt: "30" } }))).toBe(false);
    expect(matches({ code: "b" }, parsed({ code: { $gt: "a" } }))).toBe(true);
  });

  it("matches $like case-insensitively", () => {
    const condition = parsed({ name: { $like: "CAR" } });
    expect(staff.filter((r) => matches(r, condition)).map((r) => r._id)).toEqual([3]);
  });

  it("matches $like against the JSON text of non-string values", () => {
    expect(matches({ tags: ["red", "blue"] }, parsed({ tags: { $like: '"blue"' } }))).toBe(true);
    expect(matches({ n: 1234 }, parsed({ n: { $like: "23" } }))).toBe(true);
  });

  it("compares objects structurally regardless of key order", () => {
    expect(matches({ meta: { a: 1, b: 2 } }, parsed({ meta: { b: 2, a: 1 } }))).toBe(true);
    expect(matches({ meta: { a: 1 } }, parsed({ meta: { a: "1" } }))).toBe(false);
  });

  it("distinguishes numbers from numeric strings", () => {
    expect(matches({ n: 1 }, parsed({ n: "1" }))).toBe(false);
  });

  it("matches everything with the empty condition", () => {
    expect(staff.every((r) => matches(r, parsed({})))).toBe(true);
  });
});

describe("indexCandidate", () => {
  it("selects a single equality field", () => {
    expect(indexCandidate(parsed({ dept: "eng" }))).toEqual({ field: "dept", value: "eng" });
  });

  it("ignores operator conditions and multi-field conditions", () => {
    expect(indexCandidate(parsed({ age: { $gt: 1 } }))).toBeNull();
    expect(indexCandidate(parsed({ dept: "eng", age: 20 }))).toBeNull();
    expect(indexCandidate(parsed({}))).toBeNull();
  });
});

describe("selectRecords", () => {
  const noIndex = () => null;

  it("scans in table order when no index applies", () => {
    const { rows, plan } = selectRecords(staff, parsed({ age: { $gte: 30 } }), noIndex);
    expect(rows.map((r) => r.age)).toEqual([40, 30]);
    expect(plan).toEqual({ scanType: "full_scan", indexUsed: null, candidates: 3 });
  });

  it("uses the index lookup for a single equality", () => {
    const lookup = (column: string) => (column === "dept" ? [1, 0] : null);
    const { rows, plan } = selectRecords(staff, parsed({ dept: "eng" }), lookup);
    expect(rows.map((r) => r._id)).toEqual([1, 2]);
    expect(plan).toEqual({ scanType: "index_scan", indexUsed: "dept", candidates: 2 });
  });

  it("re-checks positions against the records", () => {
    const stale = () => [0, 2, 7];
    const { rows } = selectRecords(staff, parsed({ dept: "eng" }), stale);
    expect(rows.map((r) => r._id)).toEqual([1]);
  });

  it("paginates after filtering on both paths", () => {
    const lookup = () => [0, 1];
    const options = { offset: 1, limit: 1 };
    expect(selectRecords(staff, parsed({ dept: "eng" }), lookup, options).rows).toEqual([staff[1]]);
    expect(selectRecords(staff, parsed({ dept: "eng" }), noIndex, options).rows).toEqual([staff[1]]);
  });
});

describe("paginate", () => {
  it("applies offset and limit", () => {
    expect(paginate([1, 2, 3, 4], 1, 2)).toEqual([2, 3]);
    expect(paginate([1, 2, 3, 4], 3)).toEqual([4]);
  });

  it("treats a zero limit as unlimited", () => {
    expect(paginate([1, 2, 3, 4], 0, 0)).toEqual([1, 2, 3, 4]);
    expect(paginate([1, 2, 3, 4], 2, 0)).toEqual([3, 4]);
  });
});
