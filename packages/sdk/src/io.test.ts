import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, readdirSync, readFileSync, writeFileSync, mkdirSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { atomicWrite, copyDocument, ensureDirectory, fileSize, readDocument } from "./io.js";
import { PersistenceError } from "./errors.js";

describe("io operations", () => {
  let testDir: string;

  beforeEach(() => {
    // Create a unique temp directory for each test
    testDir = mkdtempSync(join(tmpdir(), "tabledb-io-"));
  });

  afterEach(() => {
    rmSync(testDir, { recursive: true, force: true });
  });

  describe("atomicWrite and readDocument", () => {
    it("should write and read file successfully", () => {
      const filePath = join(testDir, "db.json");
      atomicWrite(filePath, '{"tables": {}}');
      expect(readDocument(filePath)).toBe('{"tables": {}}');
    });

    it("should not leave temp files after successful write", () => {
      const filePath = join(testDir, "db.json");
      atomicWrite(filePath, "content");
      expect(readdirSync(testDir)).toEqual(["db.json"]);
    });

    it("should overwrite existing file", () => {
      const filePath = join(testDir, "db.json");
      atomicWrite(filePath, "first");
      atomicWrite(filePath, "second");
      expect(readDocument(filePath)).toBe("second");
    });

    it("should create missing parent directories", () => {
      const filePath = join(testDir, "nested", "deeper", "db.json");
      atomicWrite(filePath, "x");
      expect(readDocument(filePath)).toBe("x");
    });

    it("should fail with PersistenceError and keep the previous file", () => {
      // The target is a directory, so the final rename fails
      const target = join(testDir, "occupied");
      mkdirSync(join(target, "child"), { recursive: true });

      expect(() => atomicWrite(target, "new")).toThrow(PersistenceError);
      expect(readdirSync(testDir)).toEqual(["occupied"]);
    });

    it("should return null for a missing file", () => {
      expect(readDocument(join(testDir, "absent.json"))).toBeNull();
    });

    it("should handle UTF-8 content", () => {
      const filePath = join(testDir, "utf8.json");
      atomicWrite(filePath, '{"name": "日本語 ✓"}');
      expect(readDocument(filePath)).toBe('{"name": "日本語 ✓"}');
    });
  });

  describe("copyDocument", () => {
    it("should copy bytes verbatim", () => {
      const source = join(testDir, "a.json");
      const target = join(testDir, "b.json");
      writeFileSync(source, "{ \"odd\":   1 }\n");
      copyDocument(source, target);
      expect(readFileSync(target, "utf-8")).toBe("{ \"odd\":   1 }\n");
    });

    it("should fail for a missing source", () => {
      expect(() => copyDocument(join(testDir, "none"), join(testDir, "b"))).toThrow(
        PersistenceError
      );
    });
  });

  describe("fileSize and ensureDirectory", () => {
    it("should report size or undefined", () => {
      const filePath = join(testDir, "s.json");
      expect(fileSize(filePath)).toBeUndefined();
      writeFileSync(filePath, "12345");
      expect(fileSize(filePath)).toBe(5);
    });

    it("should be idempotent", () => {
      const dir = join(testDir, "a", "b");
      ensureDirectory(dir);
      ensureDirectory(dir);
      expect(readdirSync(join(testDir, "a"))).toEqual(["b"]);
    });
  });
});
