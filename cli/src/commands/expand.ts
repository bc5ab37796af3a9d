import { performance } from "perf_hooks";
import { CONFIG, unescapeSeparator } from "../config.js";
import { InvalidConfigurationError } from "../errors.js";
import {
  expandTemplates,
  expandToFile,
  type BatchProgress,
  type ExpandOptions,
  type ExpandSummary,
} from "../expand.js";
import { readTemplateSource } from "../input.js";
import { StreamSink } from "../sink.js";
import { WorkerPool, workerScriptAvailable } from "../worker-pool.js";
import { resolveSource, resolveThreads, type SourceOptions } from "./options.js";

export interface ExpandCommandOptions extends SourceOptions {
  output?: string;
  append?: boolean;
  separator?: string;
  batchSize?: number;
  maxCombinations?: number;
  concurrency?: number;
  threads?: number;
  collapseWhitespace?: boolean;
  timing?: boolean;
  verbose?: boolean;
}

// =============================================================================
// Expand Command
// =============================================================================

export async function expand(
  template: string | undefined,
  options: ExpandCommandOptions
): Promise<void> {
  const source = resolveSource(template, options);
  const output = options.output ?? CONFIG.outputPath;
  const toStdout = output === "-";

  if (toStdout && options.append) {
    throw new InvalidConfigurationError("append", "--append needs a file output");
  }

  // stdout may carry the combinations themselves, so status goes to stderr
  const log = toStdout ? console.error : console.log;
  const separator =
    options.separator !== undefined ? unescapeSeparator(options.separator) : CONFIG.separator;

  const concurrency = options.concurrency ?? CONFIG.concurrency;
  const threads = resolveThreads(options.threads, concurrency, workerScriptAvailable());
  const pool = threads > 0 ? new WorkerPool(threads) : undefined;
  const expandOptions: Partial<ExpandOptions> = {
    append: options.append ?? false,
    separator,
    batchSize: options.batchSize,
    maxCombinations: options.maxCombinations,
    concurrency,
    collapseWhitespace: options.collapseWhitespace ?? false,
    renderer: pool?.render,
    onBatch: options.verbose ? reportProgress : undefined,
  };

  const started = performance.now();
  let summary: ExpandSummary;
  try {
    if (toStdout) {
      const templates = await readTemplateSource(source);
      const sink = new StreamSink(process.stdout, { separator, name: "stdout" });
      summary = await expandTemplates(templates, sink, expandOptions);
    } else {
      summary = await expandToFile(source, output, expandOptions);
    }
  } finally {
    await pool?.close();
  }

  if (toStdout) {
    // Terminate the last rendering so the shell prompt starts on a new line
    process.stdout.write("\n");
  }

  log(
    `✅ ${summary.combinations.toLocaleString("en-US")} combinations from ${summary.templates} template(s) in ${summary.batches} batch(es)`
  );
  if (!toStdout) {
    log(`   ${options.append ? "Appended to" : "Wrote"} ${output}`);
  }
  if (options.timing) {
    log(`⏱️  Execution time: ${((performance.now() - started) / 1000).toFixed(3)} seconds`);
  }
}

function reportProgress(progress: BatchProgress): void {
  console.error(
    `📦 Template ${progress.template + 1}: batch ${progress.batch.index + 1}/${progress.batches} (${progress.written.toLocaleString("en-US")}/${progress.total.toLocaleString("en-US")})`
  );
}
