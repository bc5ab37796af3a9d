import { readTemplateSource } from "../input.js";
import { countCombinations } from "../space.js";
import { resolveSource, type SourceOptions } from "./options.js";

export interface CountCommandOptions extends SourceOptions {
  maxCombinations?: number;
}

// =============================================================================
// Count Command
// =============================================================================

export async function count(
  template: string | undefined,
  options: CountCommandOptions
): Promise<void> {
  const templates = await readTemplateSource(resolveSource(template, options));

  let total = 0;
  for (const text of templates) {
    const combinations = countCombinations(text, { maxCombinations: options.maxCombinations });
    total += combinations;
    console.log(`🎲 ${combinations.toLocaleString("en-US")}  ${text}`);
  }

  if (templates.length > 1) {
    console.log();
    console.log(`🧮 Total: ${total.toLocaleString("en-US")} combinations across ${templates.length} templates`);
  }
}
