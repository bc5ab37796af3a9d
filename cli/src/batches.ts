import { InvalidConfigurationError } from "./errors.js";

// =============================================================================
// Batch Scheduling
// =============================================================================

/** Half-open range [start, end) of combination indices. */
export interface Batch {
  index: number;
  start: number;
  end: number;
}

export function assertBatchSize(batchSize: number): void {
  if (!Number.isSafeInteger(batchSize) || batchSize <= 0) {
    throw new InvalidConfigurationError(
      "batchSize",
      `must be a positive integer (got ${batchSize})`
    );
  }
}

/**
 * Lazily partition [0, total) into contiguous batches of at most batchSize.
 */
export function* iterateBatches(total: number, batchSize: number): Generator<Batch> {
  assertBatchSize(batchSize);

  let index = 0;
  for (let start = 0; start < total; start += batchSize) {
    yield { index: index++, start, end: Math.min(start + batchSize, total) };
  }
}

export function planBatches(total: number, batchSize: number): Batch[] {
  return [...iterateBatches(total, batchSize)];
}

export function batchCount(total: number, batchSize: number): number {
  assertBatchSize(batchSize);
  return Math.ceil(total / batchSize);
}
