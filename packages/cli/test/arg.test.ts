/**
 * Unit tests for argument parsing
 */

import { describe, it, expect } from "vitest";
import { InvalidArgumentError } from "commander";
import { parseNonNegativeInt, parseTypeName } from "../src/lib/arg.js";

describe("arg parsing", () => {
  describe("parseNonNegativeInt", () => {
    it("should parse valid non-negative integers", () => {
      expect(parseNonNegativeInt("0", "test")).toBe(0);
      expect(parseNonNegativeInt("1", "test")).toBe(1);
      expect(parseNonNegativeInt(" 250 ", "test")).toBe(250);
    });

    it("should reject negative numbers", () => {
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow(InvalidArgumentError);
      expect(() => parseNonNegativeInt("-1", "--limit")).toThrow("--limit must be a non-negative integer");
    });

    it("should reject non-numeric input", () => {
      expect(() => parseNonNegativeInt("abc", "test")).toThrow("must be a non-negative integer");
      expect(() => parseNonNegativeInt("1.5", "test")).toThrow("must be a non-negative integer");
    });

    it("should reject values beyond the safe integer range", () => {
      expect(() => parseNonNegativeInt("9007199254740993", "test")).toThrow("test is too large");
    });
  });

  describe("parseTypeName", () => {
    it("should accept identifiers", () => {
      expect(parseTypeName("article")).toBe("article");
      expect(parseTypeName("_draft2")).toBe("_draft2");
    });

    it("should reject other names", () => {
      expect(() => parseTypeName("no-such")).toThrow(InvalidArgumentError);
      expect(() => parseTypeName("2fast")).toThrow('Invalid type name "2fast"');
      expect(() => parseTypeName("../etc")).toThrow(InvalidArgumentError);
    });
  });
});
