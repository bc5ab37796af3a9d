import { config } from "dotenv";
import { availableParallelism } from "os";
import { fileURLToPath } from "url";

// Load .env from project root
config({ path: fileURLToPath(new URL("../../.env", import.meta.url)) });

function optional(name: string, defaultValue: string): string {
  return process.env[name] || defaultValue;
}

function optionalInt(name: string, defaultValue: number): number {
  const raw = optional(name, String(defaultValue)).replace(/_/g, "");
  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value <= 0) {
    throw new Error(`Env var ${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

/**
 * Separator from the environment. An empty value is kept: it joins
 * renderings with nothing between them.
 */
export function separatorFromEnv(value: string | undefined): string {
  return unescapeSeparator(value ?? "\\n");
}

/**
 * Decode the escape sequences a shell makes awkward to type: \n, \t, \r and \\.
 */
export function unescapeSeparator(value: string): string {
  return value.replace(/\\([ntr\\])/g, (_, ch: string) => {
    switch (ch) {
      case "n":
        return "\n";
      case "t":
        return "\t";
      case "r":
        return "\r";
      default:
        return "\\";
    }
  });
}

// =============================================================================
// Defaults
// =============================================================================

export const DEFAULT_BATCH_SIZE = 1000;
export const DEFAULT_MAX_COMBINATIONS = 10_000_000;
export const DEFAULT_SEPARATOR = "\n";

// =============================================================================
// Configuration
// =============================================================================

export const CONFIG = {
  // Output
  outputPath: optional("TEXTCOMBO_OUTPUT", "textcombo_result.txt"),
  separator: separatorFromEnv(process.env.TEXTCOMBO_SEPARATOR),

  // Generation
  batchSize: optionalInt("TEXTCOMBO_BATCH_SIZE", DEFAULT_BATCH_SIZE),
  maxCombinations: optionalInt("TEXTCOMBO_MAX_COMBINATIONS", DEFAULT_MAX_COMBINATIONS),
  concurrency: optionalInt("TEXTCOMBO_CONCURRENCY", availableParallelism()),
} as const;
