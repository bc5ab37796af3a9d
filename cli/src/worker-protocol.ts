import { errorMessage } from "./errors.js";
import { createSpace, renderRange } from "./space.js";
import type { Segment } from "./template.js";

// =============================================================================
// Messages
// =============================================================================

export interface WorkerRequest {
  segments: readonly Segment[];
  collapseWhitespace: boolean;
  total: number;
  start: number;
  end: number;
}

export type WorkerResponse =
  | { ok: true; lines: string[] }
  | { ok: false; message: string };

/**
 * Render one batch request. Failures become an error response so the
 * worker itself stays alive.
 */
export function handleRequest(request: WorkerRequest): WorkerResponse {
  try {
    // Already bounded by the caller, so the limit is the total itself
    const space = createSpace(request.segments, {
      maxCombinations: request.total,
      collapseWhitespace: request.collapseWhitespace,
    });
    return { ok: true, lines: renderRange(space, request.start, request.end) };
  } catch (error) {
    return { ok: false, message: errorMessage(error) };
  }
}
