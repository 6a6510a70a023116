/**
 * CLI error handling and exit code mapping
 */

import { CommanderError } from "commander";
import { DocFeedError, DocumentTypeDefinitionError } from "@docfeed/sdk";

/**
 * Exit codes
 * - 0: success
 * - 1: usage/config/IO/unknown error
 * - 2: feed rejected by the decoder
 */
export const EXIT_OK = 0;
export const EXIT_USAGE = 1;
export const EXIT_REJECTED = 2;

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_USAGE;
  }
}

/**
 * Map errors to CLI exit codes
 */
export function exitCodeFor(error: unknown): number {
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof CommanderError) {
    return error.exitCode === 0 ? EXIT_OK : EXIT_USAGE;
  }

  // A broken type directory is a configuration problem, not a bad feed
  if (error instanceof DocumentTypeDefinitionError) {
    return EXIT_USAGE;
  }

  if (error instanceof DocFeedError) {
    return EXIT_REJECTED;
  }

  return EXIT_USAGE;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (error instanceof DocFeedError) {
      message = `[${error.code}] ${message}`;
    }

    if (verbose && error.cause) {
      const cause = error.cause instanceof Error ? error.cause.message : String(error.cause);
      message += `\n  Cause: ${cause}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
