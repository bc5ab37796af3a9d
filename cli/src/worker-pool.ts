import { existsSync } from "fs";
import { fileURLToPath } from "url";
import { Worker } from "worker_threads";
import type { Batch } from "./batches.js";
import type { BatchRenderer } from "./generator.js";
import type { CombinationSpace } from "./space.js";
import type { WorkerRequest, WorkerResponse } from "./worker-protocol.js";

/** Compiled worker entry next to this module; absent when running from source. */
export const WORKER_SCRIPT = new URL("./batch-worker.js", import.meta.url);

export function workerScriptAvailable(script: URL = WORKER_SCRIPT): boolean {
  return existsSync(fileURLToPath(script));
}

interface Waiter {
  resolve: (worker: Worker) => void;
  reject: (error: Error) => void;
}

// =============================================================================
// Worker Pool
// =============================================================================

/**
 * Fixed-size pool of worker threads rendering batches off the main thread.
 *
 * Every worker carries its own error and exit handlers, so a worker that
 * fails to load or dies while idle is dropped from the pool instead of
 * taking the process down. A worker that crashes after completing work is
 * replaced; one that never completed anything is not, and once no worker is
 * left every render fails with the error that ended the last one.
 */
export class WorkerPool {
  private readonly workers = new Set<Worker>();
  private readonly idle: Worker[] = [];
  private readonly waiting: Waiter[] = [];
  private readonly broken = new WeakSet<Worker>();
  private readonly proven = new WeakSet<Worker>();
  private failure: Error | undefined;
  private closed = false;

  constructor(
    readonly size: number,
    private readonly script: URL = WORKER_SCRIPT
  ) {
    for (let i = 0; i < size; i++) {
      this.idle.push(this.spawn());
    }
  }

  readonly render: BatchRenderer = async (space, batch, signal) => {
    const worker = await this.acquire();
    try {
      signal.throwIfAborted();
      return await this.run(worker, space, batch);
    } finally {
      this.release(worker);
    }
  };

  async close(): Promise<void> {
    this.closed = true;
    const workers = [...this.workers];
    this.workers.clear();
    this.idle.length = 0;
    this.rejectWaiters(new Error("Worker pool is closed"));
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private spawn(): Worker {
    const worker = new Worker(this.script);
    worker.on("error", (error) => {
      this.broken.add(worker);
      this.failure = error;
    });
    worker.on("exit", () => this.retire(worker));
    this.workers.add(worker);
    return worker;
  }

  private retire(worker: Worker): void {
    if (this.closed || !this.workers.has(worker)) return;

    this.broken.add(worker);
    const position = this.idle.indexOf(worker);
    if (position !== -1) {
      // Idle workers are not coming back through release()
      this.idle.splice(position, 1);
      this.workers.delete(worker);
    }
    this.failIfEmpty();
  }

  private failIfEmpty(): void {
    if (this.workers.size > 0) return;
    this.rejectWaiters(this.failure ?? new Error("All pool workers exited"));
  }

  private rejectWaiters(error: Error): void {
    for (const waiter of this.waiting.splice(0)) {
      waiter.reject(error);
    }
  }

  private acquire(): Promise<Worker> {
    if (this.closed) {
      return Promise.reject(new Error("Worker pool is closed"));
    }
    for (let worker = this.idle.pop(); worker; worker = this.idle.pop()) {
      if (!this.broken.has(worker)) return Promise.resolve(worker);
      // Errored but its exit has not been seen yet
      this.workers.delete(worker);
    }
    if (this.workers.size === 0) {
      return Promise.reject(this.failure ?? new Error("All pool workers exited"));
    }
    return new Promise((resolve, reject) => this.waiting.push({ resolve, reject }));
  }

  private release(worker: Worker): void {
    if (this.closed) return;

    let next: Worker | undefined = worker;
    if (this.broken.has(worker)) {
      this.workers.delete(worker);
      next = this.proven.has(worker) ? this.spawn() : undefined;
    }

    if (!next) {
      this.failIfEmpty();
      return;
    }

    const waiter = this.waiting.shift();
    if (waiter) {
      waiter.resolve(next);
    } else {
      this.idle.push(next);
    }
  }

  private run(worker: Worker, space: CombinationSpace, batch: Batch): Promise<string[]> {
    return new Promise((resolve, reject) => {
      const onMessage = (response: WorkerResponse) => {
        cleanup();
        this.proven.add(worker);
        if (response.ok) {
          resolve(response.lines);
        } else {
          reject(new Error(response.message));
        }
      };
      const onError = (error: Error) => {
        cleanup();
        reject(error);
      };
      const onExit = (code: number) => {
        cleanup();
        reject(new Error(`Worker exited with code ${code}`));
      };
      const cleanup = () => {
        worker.off("message", onMessage);
        worker.off("error", onError);
        worker.off("exit", onExit);
      };

      worker.on("message", onMessage);
      worker.on("error", onError);
      worker.on("exit", onExit);

      const request: WorkerRequest = {
        segments: space.segments,
        collapseWhitespace: space.collapseWhitespace,
        total: space.total,
        start: batch.start,
        end: batch.end,
      };
      worker.postMessage(request);
    });
  }
}
