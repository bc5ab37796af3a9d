#!/usr/bin/env node

import { program } from "commander";
import { count, type CountCommandOptions } from "./commands/count.js";
import { expand, type ExpandCommandOptions } from "./commands/expand.js";
import { parseNonNegativeInt, parsePositiveInt } from "./commands/options.js";
import { errorMessage, exitCodeFor } from "./errors.js";

// =============================================================================
// CLI Definition
// =============================================================================

program
  .name("textcombo")
  .description("Expand bracketed templates like 'Hello [world|there]' into every combination")
  .version("1.0.0");

program
  .command("expand [template]")
  .description("Write every combination of a template (or of each line of --input)")
  .option("-i, --input <path>", "read templates from a file, one per line")
  .option("--whole-file", "treat the whole --input file as a single template")
  .option("-o, --output <path>", "destination file, or '-' for stdout")
  .option("-a, --append", "append to the destination instead of overwriting it")
  .option("-s, --separator <sep>", "text between combinations (\\n and \\t are decoded)")
  .option("-b, --batch-size <n>", "combinations rendered and written per batch", parsePositiveInt)
  .option("--max-combinations <n>", "refuse templates with more combinations", parsePositiveInt)
  .option("-c, --concurrency <n>", "batches in flight at once", parsePositiveInt)
  .option(
    "--threads <n>",
    "worker threads rendering batches (default: one per batch in flight; 0 renders on the main thread)",
    parseNonNegativeInt
  )
  .option("--collapse-whitespace", "collapse repeated spaces and trim each combination")
  .option("--timing", "print the execution time")
  .option("-v, --verbose", "print progress for every batch")
  .action(async (template: string | undefined, options: ExpandCommandOptions) => {
    try {
      await expand(template, options);
    } catch (error) {
      console.error(`❌ Error: ${errorMessage(error)}`);
      process.exit(exitCodeFor(error));
    }
  });

program
  .command("count [template]")
  .description("Print how many combinations a template expands to")
  .option("-i, --input <path>", "read templates from a file, one per line")
  .option("--whole-file", "treat the whole --input file as a single template")
  .option("--max-combinations <n>", "refuse templates with more combinations", parsePositiveInt)
  .action(async (template: string | undefined, options: CountCommandOptions) => {
    try {
      await count(template, options);
    } catch (error) {
      console.error(`❌ Error: ${errorMessage(error)}`);
      process.exit(exitCodeFor(error));
    }
  });

// =============================================================================
// Run
// =============================================================================

await program.parseAsync();
