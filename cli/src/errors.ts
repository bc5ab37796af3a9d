// =============================================================================
// Error Taxonomy
// =============================================================================

export type ErrorCode =
  | "MALFORMED_TEMPLATE"
  | "EMPTY_CHOICE_GROUP"
  | "COMBINATION_SPACE_TOO_LARGE"
  | "INVALID_CONFIGURATION"
  | "IO_FAILURE"
  | "WORKER_FAILURE";

/**
 * Base class for every failure the engine reports. Callers switch on `code`
 * (or `instanceof` the subclasses) instead of parsing messages.
 */
export class TextcomboError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TextcomboError";
    this.code = code;
  }
}

export class MalformedTemplateError extends TextcomboError {
  readonly position: number;

  constructor(reason: string, position: number) {
    super("MALFORMED_TEMPLATE", `${reason} at position ${position}`);
    this.name = "MalformedTemplateError";
    this.position = position;
  }
}

export class EmptyChoiceGroupError extends TextcomboError {
  readonly position: number;

  constructor(position: number) {
    super("EMPTY_CHOICE_GROUP", `Choice group at position ${position} has no alternatives`);
    this.name = "EmptyChoiceGroupError";
    this.position = position;
  }
}

export class CombinationSpaceTooLargeError extends TextcomboError {
  readonly limit: number;

  constructor(limit: number) {
    super(
      "COMBINATION_SPACE_TOO_LARGE",
      `Template expands to more than ${limit.toLocaleString("en-US")} combinations`
    );
    this.name = "CombinationSpaceTooLargeError";
    this.limit = limit;
  }
}

export class InvalidConfigurationError extends TextcomboError {
  readonly option: string;

  constructor(option: string, message: string) {
    super("INVALID_CONFIGURATION", `Invalid ${option}: ${message}`);
    this.name = "InvalidConfigurationError";
    this.option = option;
  }
}

export class IOFailureError extends TextcomboError {
  readonly path: string;

  constructor(action: string, path: string, cause: unknown) {
    super("IO_FAILURE", `Failed to ${action} ${path}: ${errorMessage(cause)}`, { cause });
    this.name = "IOFailureError";
    this.path = path;
  }
}

export class WorkerFailureError extends TextcomboError {
  readonly batchIndex: number;

  constructor(batchIndex: number, cause: unknown) {
    super("WORKER_FAILURE", `Batch ${batchIndex} failed: ${errorMessage(cause)}`, { cause });
    this.name = "WorkerFailureError";
    this.batchIndex = batchIndex;
  }
}

// =============================================================================
// Helpers
// =============================================================================

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Process exit code for a failure: 2 for template problems, 1 for the rest.
 */
export function exitCodeFor(error: unknown): number {
  if (!(error instanceof TextcomboError)) return 1;

  switch (error.code) {
    case "MALFORMED_TEMPLATE":
    case "EMPTY_CHOICE_GROUP":
    case "COMBINATION_SPACE_TOO_LARGE":
      return 2;
    default:
      return 1;
  }
}
