import type { Batch } from "./batches.js";
import { CONFIG } from "./config.js";
import { InvalidConfigurationError, WorkerFailureError } from "./errors.js";
import { renderRange, type CombinationSpace } from "./space.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Materializes one batch. Must only read the space; it is shared by every
 * batch in flight.
 */
export type BatchRenderer = (
  space: CombinationSpace,
  batch: Batch,
  signal: AbortSignal
) => Promise<string[]>;

export interface RenderedBatch {
  batch: Batch;
  lines: string[];
}

export interface GeneratorOptions {
  /** Maximum number of batches in flight. */
  concurrency?: number;
  renderer?: BatchRenderer;
  signal?: AbortSignal;
}

type Settled = { ok: true; lines: string[] } | { ok: false; error: unknown };

interface Pending {
  batch: Batch;
  result: Promise<Settled>;
}

// =============================================================================
// Renderers
// =============================================================================

/**
 * Render on the event loop. Yields once first so a window of batches can be
 * submitted without the first one blocking the rest.
 */
export const renderInline: BatchRenderer = async (space, batch, signal) => {
  await new Promise<void>((resolve) => setImmediate(resolve));
  signal.throwIfAborted();
  return renderRange(space, batch.start, batch.end);
};

// =============================================================================
// Ordered Generation
// =============================================================================

/**
 * Render batches with bounded concurrency and yield them in submission
 * order, whatever order they complete in.
 *
 * Results are awaited head first, so the failure reported is always the one
 * of the lowest failing batch, and nothing after it is yielded. On failure
 * (or when the consumer stops early) no further batch is submitted and the
 * running ones are asked to stop through their AbortSignal.
 */
export async function* generateBatches(
  space: CombinationSpace,
  batches: Iterable<Batch>,
  options: GeneratorOptions = {}
): AsyncGenerator<RenderedBatch> {
  const concurrency = options.concurrency ?? CONFIG.concurrency;
  if (!Number.isSafeInteger(concurrency) || concurrency <= 0) {
    throw new InvalidConfigurationError(
      "concurrency",
      `must be a positive integer (got ${concurrency})`
    );
  }
  const renderer = options.renderer ?? renderInline;
  const external = options.signal;

  const controller = new AbortController();
  const forwardAbort = () => controller.abort(external?.reason);
  external?.addEventListener("abort", forwardAbort, { once: true });

  const iterator = batches[Symbol.iterator]();
  const inFlight: Pending[] = [];

  const fill = () => {
    while (inFlight.length < concurrency && !controller.signal.aborted) {
      const next = iterator.next();
      if (next.done) return;

      const batch = next.value;
      const result = Promise.resolve()
        .then(() => renderer(space, batch, controller.signal))
        .then(
          (lines): Settled => ({ ok: true, lines }),
          (error: unknown): Settled => ({ ok: false, error })
        );
      inFlight.push({ batch, result });
    }
  };

  try {
    external?.throwIfAborted();
    fill();

    for (let head = inFlight.shift(); head; head = inFlight.shift()) {
      const settled = await head.result;

      if (!settled.ok) {
        external?.throwIfAborted();
        throw new WorkerFailureError(head.batch.index, settled.error);
      }

      // Keep workers busy while the consumer writes this batch
      fill();
      yield { batch: head.batch, lines: settled.lines };
    }
  } finally {
    controller.abort();
    external?.removeEventListener("abort", forwardAbort);
    await Promise.all(inFlight.map((pending) => pending.result));
  }
}
