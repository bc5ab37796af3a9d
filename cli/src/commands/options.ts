import { InvalidArgumentError } from "commander";
import { InvalidConfigurationError } from "../errors.js";
import type { TemplateSource } from "../input.js";

// =============================================================================
// Shared Argument Handling
// =============================================================================

export interface SourceOptions {
  input?: string;
  wholeFile?: boolean;
}

/**
 * Commander argument parser for options that take a positive integer.
 * Accepts digit separators: 10_000.
 */
export function parsePositiveInt(value: string): number {
  const cleaned = value.replace(/_/g, "");
  const parsed = /^\d+$/.test(cleaned) ? Number(cleaned) : NaN;
  if (!Number.isSafeInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

/**
 * Like parsePositiveInt, but also accepts 0.
 */
export function parseNonNegativeInt(value: string): number {
  return value.replace(/_/g, "") === "0" ? 0 : parsePositiveInt(value);
}

/**
 * Number of worker threads to render with; 0 renders on the event loop.
 * Without --threads the pool is used whenever the compiled worker exists.
 */
export function resolveThreads(
  requested: number | undefined,
  concurrency: number,
  scriptAvailable: boolean
): number {
  if (requested === undefined) {
    return scriptAvailable ? concurrency : 0;
  }
  if (requested > 0 && !scriptAvailable) {
    throw new InvalidConfigurationError(
      "threads",
      "worker threads need the built CLI (npm run build), or pass --threads 0"
    );
  }
  return requested;
}

/**
 * Pick the template source from the positional argument or --input.
 * Exactly one of them must be given.
 */
export function resolveSource(
  template: string | undefined,
  options: SourceOptions
): TemplateSource {
  if (template !== undefined && options.input !== undefined) {
    throw new InvalidConfigurationError("input", "pass either a template or --input, not both");
  }
  if (options.input !== undefined) {
    return { kind: "file", path: options.input, perLine: !options.wholeFile };
  }
  if (template === undefined) {
    throw new InvalidConfigurationError("input", "a template or --input <path> is required");
  }
  if (options.wholeFile) {
    throw new InvalidConfigurationError("wholeFile", "--whole-file only applies to --input");
  }
  return { kind: "text", text: template };
}
