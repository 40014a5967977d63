/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import {
  isImportMode,
  parseChanges,
  parseJson,
  parseNonNegativeInt,
  parsePipeline,
  parseWhere,
  toArray,
  toRecord,
} from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt(" 25 ", "test")).toBe(25);
      expect(parseNonNegativeInt("100000", "test")).toBe(100000);
    });

    it("should reject negative numbers and non-numbers", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("abc", "--limit")).toThrow(
        "--limit must be a non-negative integer"
      );
      expect(() => parseNonNegativeInt("1.5", "--limit")).toThrow(InvalidArgumentError);
    });
  });

  describe("parseJson", () => {
    it("should parse valid JSON", () => {
      expect(parseJson('{"a":1}', "test")).toEqual({ a: 1 });
      expect(parseJson("[1,2,3]", "test")).toEqual([1, 2, 3]);
      expect(parseJson("null", "test")).toBe(null);
    });

    it("should handle BOM", () => {
      expect(parseJson("\uFEFF" + '{"a":1}', "test")).toEqual({ a: 1 });
    });

    it("should include the source in the error message", () => {
      expect(() => parseJson("{", "--data")).toThrow(InvalidArgumentError);
      expect(() => parseJson("{", "--data")).toThrow("Invalid JSON in --data");
    });
  });

  describe("toRecord and toArray", () => {
    it("should accept JSON objects only as records", () => {
      expect(toRecord({ a: [1, { b: null }] }, "record")).toEqual({ a: [1, { b: null }] });
      expect(() => toRecord([1], "record")).toThrow("record must be a JSON object");
      expect(() => toRecord(null, "record")).toThrow("record must be a JSON object");
      expect(() => toRecord("text", "record")).toThrow(InvalidArgumentError);
    });

    it("should accept arrays only as arrays", () => {
      expect(toArray([1, "a"], "file x")).toEqual([1, "a"]);
      expect(() => toArray({ a: 1 }, "file x")).toThrow("file x must be a JSON array");
    });
  });

  describe("option parsers", () => {
    it("should parse --where and --set objects", () => {
      expect(parseWhere('{"age":{"$gte":30}}')).toEqual({ age: { $gte: 30 } });
      expect(parseChanges('{"age":31}')).toEqual({ age: 31 });
      expect(() => parseWhere("[1]")).toThrow("--where must be a JSON object");
      expect(() => parseChanges("{")).toThrow("Invalid JSON in --set");
    });

    it("should parse a pipeline into stage objects", () => {
      expect(parsePipeline('[{"$match":{"dept":"eng"}},{"$group":"dept"}]')).toEqual([
        { $match: { dept: "eng" } },
        { $group: "dept" },
      ]);
      expect(() => parsePipeline('{"$group":"dept"}')).toThrow("--pipeline must be a JSON array");
      expect(() => parsePipeline('["dept"]')).toThrow("--pipeline stage 0 must be a JSON object");
    });
  });

  describe("isImportMode", () => {
    it("should recognize the import modes", () => {
      expect(["insert", "replace", "update"].every(isImportMode)).toBe(true);
      expect(isImportMode("upsert")).toBe(false);
    });
  });
});
