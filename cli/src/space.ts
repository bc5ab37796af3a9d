import { CONFIG } from "./config.js";
import { CombinationSpaceTooLargeError, InvalidConfigurationError } from "./errors.js";
import { parseTemplate, templateShape, validateSegments, type Segment } from "./template.js";

// =============================================================================
// Types
// =============================================================================

/**
 * Every rendering of one parsed template, addressed by a combination index
 * in [0, total). Immutable once created, so workers can share it freely.
 */
export interface CombinationSpace {
  readonly segments: readonly Segment[];
  readonly shape: readonly number[];
  readonly total: number;
  readonly collapseWhitespace: boolean;
}

export interface SpaceOptions {
  maxCombinations?: number;
  collapseWhitespace?: boolean;
}

// =============================================================================
// Construction
// =============================================================================

export function createSpace(
  segments: readonly Segment[],
  options: SpaceOptions = {}
): CombinationSpace {
  const maxCombinations = options.maxCombinations ?? CONFIG.maxCombinations;
  if (!Number.isSafeInteger(maxCombinations) || maxCombinations <= 0) {
    throw new InvalidConfigurationError(
      "maxCombinations",
      `must be a positive integer (got ${maxCombinations})`
    );
  }

  validateSegments(segments);
  const shape = templateShape(segments);

  // Checked as the product grows so huge shapes never reach a lossy value
  let total = 1;
  for (const size of shape) {
    total *= size;
    if (total > maxCombinations) {
      throw new CombinationSpaceTooLargeError(maxCombinations);
    }
  }

  return Object.freeze({
    segments: Object.freeze([...segments]),
    shape: Object.freeze(shape),
    total,
    collapseWhitespace: options.collapseWhitespace ?? false,
  });
}

/**
 * Count the combinations of a template string.
 */
export function countCombinations(template: string, options: SpaceOptions = {}): number {
  return createSpace(parseTemplate(template), options).total;
}

// =============================================================================
// Decoding
// =============================================================================

/**
 * Mixed-radix decoding of a combination index into one alternative index per
 * group. The last group is the least significant digit, so consecutive
 * indices advance like an odometer: x[1|2]y[3|4] gives x1y3, x1y4, x2y3, x2y4.
 */
export function decodeIndex(space: CombinationSpace, index: number): number[] {
  if (!Number.isSafeInteger(index) || index < 0 || index >= space.total) {
    throw new RangeError(`Combination index ${index} outside [0, ${space.total})`);
  }

  const choices = new Array<number>(space.shape.length);
  let rest = index;
  for (let j = space.shape.length - 1; j >= 0; j--) {
    const size = space.shape[j];
    choices[j] = rest % size;
    rest = Math.floor(rest / size);
  }
  return choices;
}

export function renderIndex(space: CombinationSpace, index: number): string {
  const choices = decodeIndex(space, index);

  let group = 0;
  let text = "";
  for (const segment of space.segments) {
    if (segment.type === "literal") {
      text += segment.value;
    } else {
      text += segment.alternatives[choices[group]];
      group++;
    }
  }

  return space.collapseWhitespace ? text.replace(/ +/g, " ").trim() : text;
}

/**
 * Render indices start..end-1 in order.
 */
export function renderRange(space: CombinationSpace, start: number, end: number): string[] {
  const lines: string[] = [];
  for (let index = start; index < end; index++) {
    lines.push(renderIndex(space, index));
  }
  return lines;
}
