/**
 * docfeed command line program
 */

import { readFileSync } from "node:fs";
import { Command, CommanderError } from "commander";
import { z } from "zod";
import {
  FeedReader,
  FeedWriter,
  MetricsCollector,
  type DocumentOperation,
  type JsonInput,
} from "@docfeed/sdk";
import { createTypesCommand } from "./commands/types.js";
import { createContext, type CommandContext, type GlobalOptions } from "./context.js";
import { parseNonNegativeInt } from "./lib/arg.js";
import { EXIT_OK, exitCodeFor, formatCliError } from "./lib/errors.js";
import { processIO, readFeedFile, readFeedStdin, type CliIO } from "./lib/io.js";
import { colorize, formatCounts, formatTypeStats, summarizeOperation } from "./lib/render.js";
import { withTiming } from "./lib/telemetry.js";
import { loadTypesDir } from "./lib/types-dir.js";

interface DecodeOptions {
  json?: boolean;
  raw?: boolean;
  limit?: number;
}

interface CheckOptions {
  stats?: boolean;
}

const PackageJsonSchema = z.object({ version: z.string() });

const packageJson = PackageJsonSchema.parse(
  JSON.parse(readFileSync(new URL("../package.json", import.meta.url), "utf-8"))
);

/**
 * Build the program; output goes through `io`
 */
export function createProgram(io: CliIO): Command {
  const program = new Command();

  // Configure output and keep commander from exiting the process
  program
    .configureOutput({
      writeOut: (str) => io.stdout(str),
      writeErr: (str) => io.stderr(str),
      outputError: (str, write) => write(colorize(str, "red", io.colors)),
    })
    .exitOverride();

  // Global options
  program
    .name("docfeed")
    .description("docfeed - decode and check JSON document feeds against document types")
    .version(packageJson.version)
    .option("--types <dir>", "Document type directory")
    .option("--verbose", "Verbose diagnostics")
    .option("--quiet", "Suppress non-error output");

  const context = (): CommandContext => createContext(io, program.opts<GlobalOptions>());

  // Decode command
  program
    .command("decode [file]")
    .description("Decode a feed and print its operations")
    .option("--json", "Print the decoded feed as normalized feed JSON")
    .option("--raw", "With --json, print compact JSON")
    .option("--limit <n>", "Stop after n operations", (value: string) => parseNonNegativeInt(value, "--limit"))
    .action(async (file: string | undefined, options: DecodeOptions) => {
      const ctx = context();
      await withTiming("cli.decode", ctx.metricWriter, async () => {
        const registry = await loadTypesDir(ctx.typesDir);
        const reader = new FeedReader(registry, await readInput(ctx, file), {
          logger: ctx.logger,
          metrics: new MetricsCollector(),
        });

        const operations: DocumentOperation[] = [];
        while (options.limit === undefined || operations.length < options.limit) {
          const operation = reader.next();
          if (!operation) break;
          operations.push(operation);
        }

        if (options.json) {
          io.stdout(new FeedWriter(registry).writeFeed(operations, options.raw ? 0 : 2));
        } else {
          ctx.print(operations.map(summarizeOperation));
        }
        ctx.note(`Decoded ${operations.length} operation(s)`);
      });
    });

  // Check command
  program
    .command("check [file]")
    .description("Decode a whole feed and report operation counts")
    .option("--stats", "Add per document type statistics")
    .action(async (file: string | undefined, options: CheckOptions) => {
      const ctx = context();
      await withTiming("cli.check", ctx.metricWriter, async () => {
        const registry = await loadTypesDir(ctx.typesDir);
        const metrics = new MetricsCollector();
        const reader = new FeedReader(registry, await readInput(ctx, file), {
          logger: ctx.logger,
          metrics,
        });

        const operations = reader.readAll();
        ctx.print(formatCounts(operations));
        if (options.stats) {
          ctx.print(formatTypeStats(metrics));
        }
        ctx.note(colorize("✓ Feed is valid", "green", io.colors));
      });
    });

  createTypesCommand(program, context);

  return program;
}

/**
 * Run the program
 * @param argv - Arguments after the executable and script name
 * @returns Process exit code
 */
export async function run(argv: string[], io: CliIO = processIO()): Promise<number> {
  const program = createProgram(io);
  try {
    await program.parseAsync(argv, { from: "user" });
    return EXIT_OK;
  } catch (err) {
    // Commander has already written its own message
    if (!(err instanceof CommanderError)) {
      const verbose = program.opts<GlobalOptions>().verbose === true;
      io.stderr(colorize(`Error: ${formatCliError(err, verbose)}`, "red", io.colors) + "\n");
    }
    return exitCodeFor(err);
  }
}

async function readInput(ctx: CommandContext, file: string | undefined): Promise<JsonInput> {
  if (file) {
    return readFeedFile(file, ctx.env.maxInputBytes);
  }
  return readFeedStdin(ctx.io, ctx.env.maxInputBytes);
}
