/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { z } from "zod";
import { CliError } from "./errors.js";

const DEFAULT_TYPES_DIR = "./types";
const DEFAULT_MAX_INPUT_MB = 10;

const EnvSchema = z.object({
  DOCFEED_TYPES: z.string().min(1, "DOCFEED_TYPES must be a non-empty path").optional(),
  DOCFEED_CLI_DEBUG: z.enum(["0", "1"]).optional(),
  DOCFEED_MAX_INPUT_MB: z.coerce
    .number()
    .int("DOCFEED_MAX_INPUT_MB must be an integer")
    .positive("DOCFEED_MAX_INPUT_MB must be positive")
    .max(1024, "DOCFEED_MAX_INPUT_MB must be <= 1024")
    .optional(),
});

export interface CliEnv {
  /** Document type directory, when set */
  typesDir?: string;
  debug: boolean;
  maxInputBytes: number;
}

/**
 * Read and validate the DOCFEED_* variables
 * @throws CliError listing every invalid variable
 */
export function loadEnv(env: NodeJS.ProcessEnv = process.env): CliEnv {
  const result = EnvSchema.safeParse({
    DOCFEED_TYPES: env.DOCFEED_TYPES,
    DOCFEED_CLI_DEBUG: env.DOCFEED_CLI_DEBUG,
    DOCFEED_MAX_INPUT_MB: env.DOCFEED_MAX_INPUT_MB,
  });

  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new CliError(`Invalid environment: ${issues.join("; ")}`);
  }

  const parsed = result.data;
  return {
    typesDir: parsed.DOCFEED_TYPES,
    debug: parsed.DOCFEED_CLI_DEBUG === "1",
    maxInputBytes: (parsed.DOCFEED_MAX_INPUT_MB ?? DEFAULT_MAX_INPUT_MB) * 1024 * 1024,
  };
}

/**
 * Expand tilde (~) to home directory
 */
function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // Leave "~user" style references untouched
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the document type directory
 * Priority: CLI option > DOCFEED_TYPES env var > default "./types"
 */
export function resolveTypesDir(cliTypes: string | undefined, env: CliEnv): string {
  const dir = cliTypes ?? env.typesDir ?? DEFAULT_TYPES_DIR;
  return path.resolve(expandTilde(dir));
}
