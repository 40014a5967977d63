/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import {
  PersistenceError,
  RecordLimitError,
  TableNotFoundError,
  ValidationError,
} from "@tabledb/sdk";
import { CliError, formatCliError, mapErrorToExitCode } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code and cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { exitCode: 3, cause });
      expect(err.exitCode).toBe(3);
      expect(err.cause).toBe(cause);
    });
  });

  describe("mapErrorToExitCode", () => {
    it("should map a missing table to exit code 2", () => {
      expect(mapErrorToExitCode(new TableNotFoundError("users"))).toBe(2);
    });

    it("should map other engine errors to exit code 1", () => {
      expect(mapErrorToExitCode(new ValidationError("bad"))).toBe(1);
      expect(mapErrorToExitCode(new RecordLimitError("users", 10))).toBe(1);
      expect(mapErrorToExitCode(new PersistenceError("write", "/tmp/x.json"))).toBe(1);
    });

    it("should use the exit code of a CliError", () => {
      expect(mapErrorToExitCode(new CliError("x", { exitCode: 4 }))).toBe(4);
    });

    it("should default to 1 for unknown errors", () => {
      expect(mapErrorToExitCode(new Error("boom"))).toBe(1);
      expect(mapErrorToExitCode("string error")).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should append the engine error code", () => {
      expect(formatCliError(new TableNotFoundError("users"))).toBe(
        "Table not found: users [E_TABLE_NOT_FOUND]"
      );
    });

    it("should keep plain messages as they are", () => {
      expect(formatCliError(new CliError("Aborted by user"))).toBe("Aborted by user");
      expect(formatCliError(42)).toBe("42");
    });

    it("should truncate very long messages", () => {
      const message = formatCliError(new Error("x".repeat(2500)));
      expect(message).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include the cause when verbose", () => {
      const err = new CliError("wrapper", { cause: "disk full" });
      const message = formatCliError(err, true);
      expect(message.startsWith("wrapper\n  Cause: disk full\n")).toBe(true);
    });
  });
});
