import { describe, it, expect } from "vitest";
import { parsePipeline, runPipeline } from "./aggregate.js";
import { InvalidConditionError } from "./errors.js";
import type { JsonRecord } from "./types.js";

const staff: JsonRecord[] = [
  { dept: "eng", age: 20 },
  { dept: "hr", age: 30 },
  { dept: "eng", age: 40 },
  { age: 50 },
];

function run(stages: unknown): JsonRecord[] {
  return runPipeline(staff, parsePipeline(stages));
}

describe("aggregation pipeline", () => {
  it("filters with $match", () => {
    expect(run([{ $match: { age: { $gte: 40 } } }])).toEqual([
      { dept: "eng", age: 40 },
      { age: 50 },
    ]);
  });

  it("groups in order of first appearance with a null key for missing fields", () => {
    expect(run([{ $group: { _id: "dept" } }])).toEqual([
      { _id: "eng", count: 2 },
      { _id: "hr", count: 1 },
      { _id: null, count: 1 },
    ]);
  });

  it("groups inherited property names as missing fields", () => {
    for (const field of ["constructor", "toString", "__proto__"]) {
      expect(run([{ $group: field }])).toEqual([{ _id: null, count: 4 }]);
    }
  });

  it("accepts a bare field name for $group", () => {
    expect(run([{ $group: "dept" }])).toEqual(run([{ $group: { _id: "dept" } }]));
  });

  it("runs stages strictly in order", () => {
    expect(run([{ $match: { dept: "eng" } }, { $group: { _id: "dept" } }])).toEqual([
      { _id: "eng", count: 2 },
    ]);
    // Matching after grouping sees the grouped rows
    expect(run([{ $group: { _id: "dept" } }, { $match: { count: 2 } }])).toEqual([
      { _id: "eng", count: 2 },
    ]);
  });

  it("prefers $group when a stage holds both keys", () => {
    expect(run([{ $match: { dept: "hr" }, $group: { _id: "dept" } }])).toHaveLength(3);
  });

  it("skips unrecognized stages", () => {
    expect(run([{ $sort: { age: 1 } }])).toEqual(staff);
  });

  it("returns an empty result for an empty table", () => {
    expect(runPipeline([], parsePipeline([{ $group: { _id: "dept" } }]))).toEqual([]);
  });

  it("rejects malformed stages", () => {
    expect(() => parsePipeline({ $match: {} })).toThrow(InvalidConditionError);
    expect(() => parsePipeline([42])).toThrow("Pipeline stage 0 must be an object");
    expect(() => parsePipeline([{ $group: { by: "dept" } }])).toThrow(InvalidConditionError);
    expect(() => parsePipeline([{ $match: { age: { $in: [1] } } }])).toThrow(
      "Pipeline stage 0: Invalid condition on 'age': unknown operator $in"
    );
  });
});
