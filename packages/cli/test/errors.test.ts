/**
 * Unit tests for error handling
 */

import { describe, it, expect } from "vitest";
import { CommanderError, InvalidArgumentError } from "commander";
import {
  DocumentTypeDefinitionError,
  FieldDecodeError,
  JsonSyntaxError,
  StructuralError,
} from "@docfeed/sdk";
import { CliError, exitCodeFor, formatCliError } from "../src/lib/errors.js";

describe("error handling", () => {
  describe("CliError", () => {
    it("should create error with default exit code 1", () => {
      const err = new CliError("test error");
      expect(err.message).toBe("test error");
      expect(err.exitCode).toBe(1);
      expect(err.name).toBe("CliError");
    });

    it("should create error with custom exit code", () => {
      const err = new CliError("rejected", { exitCode: 2 });
      expect(err.exitCode).toBe(2);
    });

    it("should support cause", () => {
      const cause = new Error("underlying error");
      const err = new CliError("wrapper", { cause });
      expect(err.cause).toBe(cause);
    });
  });

  describe("exitCodeFor", () => {
    it("should map decoder errors to exit code 2", () => {
      expect(exitCodeFor(new StructuralError("bad shape"))).toBe(2);
      expect(exitCodeFor(new JsonSyntaxError("oops", 1, 1))).toBe(2);
      expect(exitCodeFor(new FieldDecodeError("id:a:b::c", "f", "int", "nope"))).toBe(2);
    });

    it("should map definition errors to exit code 1", () => {
      expect(exitCodeFor(new DocumentTypeDefinitionError("x.json", "broken"))).toBe(1);
    });

    it("should use the exit code of CLI errors", () => {
      expect(exitCodeFor(new CliError("x", { exitCode: 2 }))).toBe(2);
    });

    it("should map commander errors", () => {
      expect(exitCodeFor(new CommanderError(0, "commander.helpDisplayed", "(outputHelp)"))).toBe(0);
      expect(exitCodeFor(new InvalidArgumentError("bad"))).toBe(1);
    });

    it("should default to exit code 1 for unknown errors", () => {
      expect(exitCodeFor(new Error("unknown"))).toBe(1);
      expect(exitCodeFor("string error")).toBe(1);
      expect(exitCodeFor(null)).toBe(1);
    });
  });

  describe("formatCliError", () => {
    it("should format error message", () => {
      const err = new Error("test error");
      expect(formatCliError(err)).toBe("test error");
    });

    it("should prefix decoder errors with their code", () => {
      expect(formatCliError(new StructuralError("bad shape"))).toBe("[E_STRUCTURE] bad shape");
    });

    it("should truncate long messages", () => {
      const longMessage = "x".repeat(3000);
      const err = new Error(longMessage);
      const formatted = formatCliError(err);
      expect(formatted).toBe("x".repeat(2000) + "... (truncated)");
    });

    it("should include cause in verbose mode", () => {
      const err = new Error("wrapper", { cause: new Error("underlying") });
      const formatted = formatCliError(err, true);
      expect(formatted).toContain("\n  Cause: underlying\n");
    });

    it("should include stack in verbose mode", () => {
      const err = new Error("test");
      const formatted = formatCliError(err, true);
      expect(formatted).toContain("Error: test");
    });

    it("should not include stack in non-verbose mode", () => {
      const err = new Error("test", { cause: new Error("hidden") });
      expect(formatCliError(err, false)).toBe("test");
    });

    it("should handle non-Error values", () => {
      expect(formatCliError("string error")).toBe("string error");
      expect(formatCliError(42)).toBe("42");
      expect(formatCliError(null)).toBe("null");
    });
  });
});
