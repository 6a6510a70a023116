/**
 * Unit tests for environment resolution
 */

import { describe, it, expect } from "vitest";
import * as path from "node:path";
import { homedir } from "node:os";
import { loadEnv, resolveTypesDir } from "../src/lib/env.js";
import { CliError } from "../src/lib/errors.js";

describe("environment resolution", () => {
  describe("loadEnv", () => {
    it("should apply defaults", () => {
      expect(loadEnv({})).toEqual({
        typesDir: undefined,
        debug: false,
        maxInputBytes: 10 * 1024 * 1024,
      });
    });

    it("should read DOCFEED_* variables", () => {
      const env = loadEnv({
        DOCFEED_TYPES: "/srv/types",
        DOCFEED_CLI_DEBUG: "1",
        DOCFEED_MAX_INPUT_MB: "25",
      });
      expect(env).toEqual({
        typesDir: "/srv/types",
        debug: true,
        maxInputBytes: 25 * 1024 * 1024,
      });
    });

    it("should reject invalid values", () => {
      expect(() => loadEnv({ DOCFEED_CLI_DEBUG: "yes" })).toThrow(CliError);
      expect(() => loadEnv({ DOCFEED_MAX_INPUT_MB: "0" })).toThrow(
        "DOCFEED_MAX_INPUT_MB: DOCFEED_MAX_INPUT_MB must be positive"
      );
      expect(() => loadEnv({ DOCFEED_MAX_INPUT_MB: "2.5" })).toThrow(
        "DOCFEED_MAX_INPUT_MB must be an integer"
      );
    });
  });

  describe("resolveTypesDir", () => {
    it("should use CLI option when provided", () => {
      const env = loadEnv({ DOCFEED_TYPES: "/env/types" });
      expect(resolveTypesDir("/cli/types", env)).toBe(path.resolve("/cli/types"));
    });

    it("should use DOCFEED_TYPES when CLI option not provided", () => {
      const env = loadEnv({ DOCFEED_TYPES: "/env/types" });
      expect(resolveTypesDir(undefined, env)).toBe(path.resolve("/env/types"));
    });

    it("should use default ./types when neither provided", () => {
      expect(resolveTypesDir(undefined, loadEnv({}))).toBe(path.resolve("./types"));
    });

    it("should expand a leading tilde", () => {
      expect(resolveTypesDir("~/types", loadEnv({}))).toBe(path.join(homedir(), "types"));
    });
  });
});
