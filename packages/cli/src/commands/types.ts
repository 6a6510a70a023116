/**
 * Document type inspection commands for CLI
 */

import type { Command } from "commander";
import { parseTypeName } from "../lib/arg.js";
import { CliError } from "../lib/errors.js";
import { formatTypeDetails, formatTypeList, loadTypesDir } from "../lib/types-dir.js";
import { withTiming } from "../lib/telemetry.js";
import type { CommandContext } from "../context.js";

/**
 * Create types command group
 */
export function createTypesCommand(program: Command, context: () => CommandContext): Command {
  const types = program
    .command("types")
    .description("Inspect the loaded document types")
    .addHelpText(
      "after",
      `
Examples:
  $ docfeed --types ./types types list
  $ docfeed types show article`
    );

  types
    .command("list")
    .description("List document types in the type directory")
    .action(async () => {
      const ctx = context();
      await withTiming("cli.types.list", ctx.metricWriter, async () => {
        const registry = await loadTypesDir(ctx.typesDir);
        ctx.print(formatTypeList(registry));
      });
    });

  types
    .command("show")
    .description("Show the fields of a document type")
    .argument("<name>", "Document type name", parseTypeName)
    .action(async (name: string) => {
      const ctx = context();
      await withTiming("cli.types.show", ctx.metricWriter, async () => {
        const registry = await loadTypesDir(ctx.typesDir);
        const type = registry.resolve(name);
        if (!type) {
          throw new CliError(`Document type not found: ${name}`);
        }
        ctx.print(formatTypeDetails(type));
      });
    });

  return types;
}
