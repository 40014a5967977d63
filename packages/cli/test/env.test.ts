/**
 * Unit tests for environment resolution
 */

import { describe, it, expect, afterEach, vi } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import {
  isVerbose,
  resolveDatabasePath,
  resolveLogLevel,
  resolveMaxRecords,
} from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

describe("environment resolution", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  describe("resolveDatabasePath", () => {
    it("should use CLI option when provided", () => {
      vi.stubEnv("TABLEDB_PATH", "/env/db.json");
      expect(resolveDatabasePath("/cli/db.json")).toBe(path.resolve("/cli/db.json"));
    });

    it("should use TABLEDB_PATH when CLI option not provided", () => {
      vi.stubEnv("TABLEDB_PATH", "/env/db.json");
      expect(resolveDatabasePath()).toBe(path.resolve("/env/db.json"));
    });

    it("should default to ./data/tabledb.json", () => {
      vi.stubEnv("TABLEDB_PATH", "");
      expect(resolveDatabasePath()).toBe(path.resolve("./data/tabledb.json"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveDatabasePath("~/dbs/app.json")).toBe(path.join(homedir(), "dbs/app.json"));
    });
  });

  describe("resolveLogLevel", () => {
    it("should be undefined when unset", () => {
      vi.stubEnv("TABLEDB_LOG_LEVEL", "");
      expect(resolveLogLevel()).toBeUndefined();
    });

    it("should accept known levels in any case", () => {
      vi.stubEnv("TABLEDB_LOG_LEVEL", "WARN");
      expect(resolveLogLevel()).toBe("warn");
    });

    it("should reject unknown levels", () => {
      vi.stubEnv("TABLEDB_LOG_LEVEL", "loud");
      expect(() => resolveLogLevel()).toThrow(CliError);
    });
  });

  describe("resolveMaxRecords", () => {
    it("should parse a positive integer", () => {
      vi.stubEnv("TABLEDB_MAX_RECORDS_PER_TABLE", "50");
      expect(resolveMaxRecords()).toBe(50);
    });

    it("should reject zero and non-integers", () => {
      vi.stubEnv("TABLEDB_MAX_RECORDS_PER_TABLE", "0");
      expect(() => resolveMaxRecords()).toThrow("must be a positive integer");
      vi.stubEnv("TABLEDB_MAX_RECORDS_PER_TABLE", "ten");
      expect(() => resolveMaxRecords()).toThrow(CliError);
    });
  });

  describe("isVerbose", () => {
    it("should follow TABLEDB_CLI_DEBUG", () => {
      vi.stubEnv("TABLEDB_CLI_DEBUG", "1");
      expect(isVerbose()).toBe(true);
      vi.stubEnv("TABLEDB_CLI_DEBUG", "0");
      expect(isVerbose()).toBe(false);
    });
  });
});
