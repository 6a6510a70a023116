#!/usr/bin/env node

/**
 * docfeed CLI entry point
 */

import { run } from "./program.js";

async function main(): Promise<void> {
  process.exitCode = await run(process.argv.slice(2));
}

main().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
