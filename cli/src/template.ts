import { EmptyChoiceGroupError, MalformedTemplateError } from "./errors.js";

// =============================================================================
// Template Parsing
// =============================================================================

export type Segment = LiteralSegment | ChoiceSegment;

export interface LiteralSegment {
  type: "literal";
  value: string;
}

export interface ChoiceSegment {
  type: "choice";
  alternatives: string[];
  /** Offset of the opening bracket in the template text. */
  position: number;
}

const ESCAPABLE = "[]|\\";

/**
 * Parse a template string into literal and choice segments.
 * Syntax: [a|b|c] for choices. Groups are flat: a '[' inside a group is
 * literal text of the current alternative, and the first ']' closes it.
 * Escaping: \[ \] \| \\
 */
export function parseTemplate(template: string): Segment[] {
  const segments: Segment[] = [];
  let pos = 0;
  let literal = "";

  // Inside-group state
  let inGroup = false;
  let groupStart = 0;
  let alternatives: string[] = [];
  let current = "";

  while (pos < template.length) {
    const ch = template[pos];

    // Handle escapes
    if (ch === "\\" && pos + 1 < template.length) {
      const next = template[pos + 1];
      if (ESCAPABLE.includes(next)) {
        if (inGroup) {
          current += next;
        } else {
          literal += next;
        }
        pos += 2;
        continue;
      }
    }

    if (inGroup) {
      if (ch === "|") {
        alternatives.push(current);
        current = "";
      } else if (ch === "]") {
        alternatives.push(current);
        segments.push({ type: "choice", alternatives, position: groupStart });
        inGroup = false;
      } else {
        current += ch;
      }
    } else if (ch === "[") {
      if (literal) {
        segments.push({ type: "literal", value: literal });
        literal = "";
      }
      inGroup = true;
      groupStart = pos;
      alternatives = [];
      current = "";
    } else if (ch === "]") {
      throw new MalformedTemplateError("Unmatched ']'", pos);
    } else {
      literal += ch;
    }
    pos++;
  }

  if (inGroup) {
    throw new MalformedTemplateError("Unclosed '['", groupStart);
  }

  if (literal) {
    segments.push({ type: "literal", value: literal });
  }
  return segments;
}

/**
 * Escape text so that it parses back to a single literal segment.
 */
export function escapeTemplate(text: string): string {
  return text.replace(/[[\]|\\]/g, "\\$&");
}

/**
 * Reject choice segments without alternatives. The parser never produces
 * them, but segment lists can also be built by hand.
 */
export function validateSegments(segments: readonly Segment[]): void {
  for (const segment of segments) {
    if (segment.type === "choice" && segment.alternatives.length === 0) {
      throw new EmptyChoiceGroupError(segment.position);
    }
  }
}

/**
 * Alternative counts of the choice groups, in template order.
 */
export function templateShape(segments: readonly Segment[]): number[] {
  const shape: number[] = [];
  for (const segment of segments) {
    if (segment.type === "choice") {
      shape.push(segment.alternatives.length);
    }
  }
  return shape;
}
