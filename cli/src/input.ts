import { readFile } from "fs/promises";
import { IOFailureError } from "./errors.js";

// =============================================================================
// Template Sources
// =============================================================================

export type TemplateSource =
  | { kind: "text"; text: string }
  | { kind: "file"; path: string; perLine?: boolean };

/**
 * Resolve a source to the list of templates to expand, in order.
 * Files are read as UTF-8; with perLine (the default) every non-blank line
 * is its own template.
 */
export async function readTemplateSource(source: TemplateSource): Promise<string[]> {
  if (source.kind === "text") {
    return [source.text];
  }

  let content: string;
  try {
    content = await readFile(source.path, "utf8");
  } catch (error) {
    throw new IOFailureError("read", source.path, error);
  }

  if (source.perLine === false) {
    return [stripFinalNewline(content)];
  }
  return splitTemplateLines(content);
}

export function splitTemplateLines(content: string): string[] {
  return content.split(/\r?\n/).filter((line) => line.trim() !== "");
}

function stripFinalNewline(content: string): string {
  return content.replace(/\r?\n$/, "");
}
