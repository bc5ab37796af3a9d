import { assertBatchSize, batchCount, iterateBatches, type Batch } from "./batches.js";
import { CONFIG } from "./config.js";
import { InvalidConfigurationError } from "./errors.js";
import { generateBatches, type BatchRenderer } from "./generator.js";
import { readTemplateSource, type TemplateSource } from "./input.js";
import { FileSink, type OutputSink } from "./sink.js";
import { createSpace, type CombinationSpace } from "./space.js";
import { parseTemplate } from "./template.js";

// =============================================================================
// Types
// =============================================================================

export interface ExpandOptions {
  /** Add to the destination instead of truncating it. */
  append: boolean;
  /** Written between consecutive renderings. */
  separator: string;
  /** Maximum indices rendered and written as one unit. */
  batchSize: number;
  /** Per-template ceiling on the number of combinations. */
  maxCombinations: number;
  /** Maximum batches in flight. */
  concurrency: number;
  /** Collapse runs of spaces and trim each rendering. */
  collapseWhitespace: boolean;
  renderer?: BatchRenderer;
  signal?: AbortSignal;
  onBatch?: (progress: BatchProgress) => void;
}

export interface BatchProgress {
  /** Position of the template in the source. */
  template: number;
  batch: Batch;
  batches: number;
  written: number;
  total: number;
}

export interface ExpandSummary {
  templates: number;
  combinations: number;
  batches: number;
}

export interface TemplatePlan {
  template: string;
  space: CombinationSpace;
}

// =============================================================================
// Options
// =============================================================================

export function resolveOptions(options: Partial<ExpandOptions> = {}): ExpandOptions {
  const resolved: ExpandOptions = {
    ...options,
    append: options.append ?? false,
    separator: options.separator ?? CONFIG.separator,
    batchSize: options.batchSize ?? CONFIG.batchSize,
    maxCombinations: options.maxCombinations ?? CONFIG.maxCombinations,
    concurrency: options.concurrency ?? CONFIG.concurrency,
    collapseWhitespace: options.collapseWhitespace ?? false,
  };

  assertBatchSize(resolved.batchSize);
  for (const name of ["maxCombinations", "concurrency"] as const) {
    const value = resolved[name];
    if (!Number.isSafeInteger(value) || value <= 0) {
      throw new InvalidConfigurationError(name, `must be a positive integer (got ${value})`);
    }
  }

  return resolved;
}

// =============================================================================
// Expansion
// =============================================================================

/**
 * Parse every template and size its combination space. Runs before anything
 * is written so template errors never leave partial output behind.
 */
export function planTemplates(
  templates: readonly string[],
  options: ExpandOptions
): TemplatePlan[] {
  return templates.map((template) => ({
    template,
    space: createSpace(parseTemplate(template), {
      maxCombinations: options.maxCombinations,
      collapseWhitespace: options.collapseWhitespace,
    }),
  }));
}

/**
 * Stream every plan's batches into the sink, templates in order and batches
 * in index order.
 */
export async function writePlans(
  plans: readonly TemplatePlan[],
  sink: OutputSink,
  options: ExpandOptions
): Promise<ExpandSummary> {
  let combinations = 0;
  let batches = 0;

  for (const [template, plan] of plans.entries()) {
    const { space } = plan;
    const count = batchCount(space.total, options.batchSize);
    let written = 0;

    const rendered = generateBatches(space, iterateBatches(space.total, options.batchSize), {
      concurrency: options.concurrency,
      renderer: options.renderer,
      signal: options.signal,
    });

    for await (const { batch, lines } of rendered) {
      await sink.writeBatch(lines);
      written += lines.length;
      batches++;
      options.onBatch?.({ template, batch, batches: count, written, total: space.total });
    }

    combinations += space.total;
  }

  return { templates: plans.length, combinations, batches };
}

export async function expandTemplates(
  templates: readonly string[],
  sink: OutputSink,
  options: Partial<ExpandOptions> = {}
): Promise<ExpandSummary> {
  const resolved = resolveOptions(options);
  const plans = planTemplates(templates, resolved);
  return writePlans(plans, sink, resolved);
}

/**
 * Public entry point: read the source, expand it and write the result to a
 * file. The destination is opened (and truncated, unless appending) only
 * once every template has parsed and fits the configured maximum.
 */
export async function expandToFile(
  source: TemplateSource,
  destination: string,
  options: Partial<ExpandOptions> = {}
): Promise<ExpandSummary> {
  const resolved = resolveOptions(options);
  const templates = await readTemplateSource(source);
  const plans = planTemplates(templates, resolved);

  const sink = await FileSink.open(destination, {
    append: resolved.append,
    separator: resolved.separator,
  });
  try {
    return await writePlans(plans, sink, resolved);
  } finally {
    await sink.close();
  }
}

/**
 * Render every combination of one template into memory. Meant for small
 * templates and tests; the streaming entry points keep memory bounded.
 */
export async function collectCombinations(
  template: string,
  options: Partial<ExpandOptions> = {}
): Promise<string[]> {
  const resolved = resolveOptions(options);
  const [plan] = planTemplates([template], resolved);

  const lines: string[] = [];
  const rendered = generateBatches(
    plan.space,
    iterateBatches(plan.space.total, resolved.batchSize),
    { concurrency: resolved.concurrency, renderer: resolved.renderer, signal: resolved.signal }
  );
  for await (const batch of rendered) {
    for (const line of batch.lines) {
      lines.push(line);
    }
  }
  return lines;
}
