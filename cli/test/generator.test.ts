import { setTimeout as delay } from "timers/promises";
import { describe, expect, it } from "vitest";
import { iterateBatches, planBatches } from "../src/batches.js";
import { InvalidConfigurationError, WorkerFailureError } from "../src/errors.js";
import {
  generateBatches,
  renderInline,
  type BatchRenderer,
  type RenderedBatch,
} from "../src/generator.js";
import { createSpace, renderRange } from "../src/space.js";
import { parseTemplate } from "../src/template.js";

const letters = createSpace(parseTemplate("[a|b|c|d|e|f|g|h]"));

async function collect(batches: AsyncIterable<RenderedBatch>): Promise<RenderedBatch[]> {
  const seen: RenderedBatch[] = [];
  for await (const batch of batches) {
    seen.push(batch);
  }
  return seen;
}

async function failureOf(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("expected a failure");
}

describe("renderInline", () => {
  it("renders the batch range", async () => {
    const lines = await renderInline(letters, { index: 1, start: 2, end: 5 }, new AbortController().signal);

    expect(lines).toEqual(["c", "d", "e"]);
  });
});

describe("generateBatches", () => {
  it("yields every batch in index order", async () => {
    const seen = await collect(generateBatches(letters, iterateBatches(8, 3), { concurrency: 2 }));

    expect(seen.map((r) => r.batch.index)).toEqual([0, 1, 2]);
    expect(seen.flatMap((r) => r.lines)).toEqual(["a", "b", "c", "d", "e", "f", "g", "h"]);
  });

  it("keeps order when an early batch finishes last", async () => {
    const completed: number[] = [];
    const renderer: BatchRenderer = async (space, batch) => {
      if (batch.index === 0) await delay(30);
      completed.push(batch.index);
      return renderRange(space, batch.start, batch.end);
    };

    const seen = await collect(
      generateBatches(letters, planBatches(6, 2), { concurrency: 3, renderer })
    );

    expect(completed).toEqual([1, 2, 0]);
    expect(seen.map((r) => r.batch.index)).toEqual([0, 1, 2]);
    expect(seen.flatMap((r) => r.lines)).toEqual(["a", "b", "c", "d", "e", "f"]);
  });

  it("never has more batches in flight than the concurrency", async () => {
    let active = 0;
    let peak = 0;
    const renderer: BatchRenderer = async (space, batch) => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
      return renderRange(space, batch.start, batch.end);
    };

    await collect(generateBatches(letters, planBatches(8, 1), { concurrency: 2, renderer }));

    expect(peak).toBe(2);
  });

  it("reports the lowest failing batch, not the first to fail", async () => {
    const renderer: BatchRenderer = async (space, batch) => {
      if (batch.index === 1) {
        await delay(20);
        throw new Error("slow failure");
      }
      if (batch.index === 2) {
        throw new Error("fast failure");
      }
      return renderRange(space, batch.start, batch.end);
    };

    const seen: number[] = [];
    const error = await failureOf(
      (async () => {
        for await (const rendered of generateBatches(letters, planBatches(8, 2), {
          concurrency: 4,
          renderer,
        })) {
          seen.push(rendered.batch.index);
        }
      })()
    );

    expect(error).toBeInstanceOf(WorkerFailureError);
    expect(error).toMatchObject({ batchIndex: 1, code: "WORKER_FAILURE" });
    expect(error).toHaveProperty("message", "Batch 1 failed: slow failure");
    expect(seen).toEqual([0]);
  });

  it("stops submitting batches after a failure", async () => {
    const started: number[] = [];
    const renderer: BatchRenderer = async (space, batch) => {
      started.push(batch.index);
      if (batch.index === 1) throw new Error("boom");
      return renderRange(space, batch.start, batch.end);
    };

    await failureOf(
      collect(generateBatches(letters, planBatches(5, 1), { concurrency: 1, renderer }))
    );

    expect(started).toEqual([0, 1]);
  });

  it("aborts running batches when an earlier one fails", async () => {
    let aborted = false;
    const renderer: BatchRenderer = (space, batch, signal) => {
      if (batch.index === 0) return Promise.reject(new Error("boom"));
      return new Promise((_, reject) => {
        signal.addEventListener("abort", () => {
          aborted = true;
          reject(new Error("cancelled"));
        });
      });
    };

    const error = await failureOf(
      collect(generateBatches(letters, planBatches(2, 1), { concurrency: 2, renderer }))
    );

    expect(error).toMatchObject({ batchIndex: 0 });
    expect(aborted).toBe(true);
  });

  it("stops rendering when the consumer stops early", async () => {
    let calls = 0;
    const renderer: BatchRenderer = async (space, batch) => {
      calls++;
      return renderRange(space, batch.start, batch.end);
    };

    for await (const rendered of generateBatches(letters, planBatches(8, 1), {
      concurrency: 1,
      renderer,
    })) {
      expect(rendered.lines).toEqual(["a"]);
      break;
    }

    expect(calls).toBe(2);
  });

  it("rejects a non-positive concurrency", async () => {
    const error = await failureOf(
      collect(generateBatches(letters, planBatches(8, 1), { concurrency: 0 }))
    );

    expect(error).toBeInstanceOf(InvalidConfigurationError);
  });

  it("throws the abort reason of an already aborted signal", async () => {
    const controller = new AbortController();
    controller.abort(new Error("stopped by caller"));

    const error = await failureOf(
      collect(generateBatches(letters, planBatches(8, 1), { signal: controller.signal }))
    );

    expect(error).toHaveProperty("message", "stopped by caller");
  });
});
