/**
 * Per-invocation settings shared by the commands
 */

import { Logger, type LogSink } from "@docfeed/sdk";
import { loadEnv, resolveTypesDir, type CliEnv } from "./lib/env.js";
import type { CliIO } from "./lib/io.js";
import type { MetricWriter } from "./lib/telemetry.js";

export type GlobalOptions = {
  types?: string;
  verbose?: boolean;
  quiet?: boolean;
};

export interface CommandContext {
  io: CliIO;
  env: CliEnv;
  typesDir: string;
  verbose: boolean;
  quiet: boolean;
  /** Decoder logs go to stderr; warnings unless quiet, everything with --verbose */
  logger: Logger;
  metricWriter: MetricWriter;
  /** Lines to stdout */
  print(lines: string[]): void;
  /** Status line to stderr, suppressed by --quiet */
  note(line: string): void;
}

export function createContext(io: CliIO, options: GlobalOptions): CommandContext {
  const env = loadEnv(io.env);
  const verbose = options.verbose === true || env.debug;
  const quiet = options.quiet === true;

  const sink: LogSink = (level, line) => {
    // Decode errors are reported once, by the command's error handler
    if (level === "error" && !verbose) return;
    io.stderr(line + "\n");
  };
  const logger = new Logger(sink, verbose);
  logger.setEnabled(!quiet || verbose);

  return {
    io,
    env,
    typesDir: resolveTypesDir(options.types, env),
    verbose,
    quiet,
    logger,
    metricWriter: verbose ? (line) => io.stderr(line) : null,
    print(lines) {
      for (const line of lines) {
        io.stdout(line + "\n");
      }
    },
    note(line) {
      if (!quiet) {
        io.stderr(line + "\n");
      }
    },
  };
}
