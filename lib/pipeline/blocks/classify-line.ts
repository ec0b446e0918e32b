import type { Line, Span } from "../core/types";
import { passesHeadingGate } from "../headings/detect-heading";
import { isCodeLine, lineIndent } from "./code";
import { detectListItem, type ListMarker } from "./lists";
import { isTableCandidate } from "./tables";

const CALLOUT_RE = /^(Note|Tip|Warning|Caution|Important):/;
const HAS_WORD_CHAR_RE = /[\p{L}\p{N}]/u;

export type LineClass =
  | { kind: "empty" }
  | { kind: "list"; marker: ListMarker; xPosition: number }
  | { kind: "code"; indent: number }
  | { kind: "heading"; fontSize: number }
  | { kind: "table" }
  | { kind: "callout"; label: string }
  | { kind: "noise" }
  | { kind: "paragraph" };

export interface ClassifyOptions {
  codeIndentThreshold: number;
  bodyFontSize: number;
  headingFontDelta: number;
  minHeadingFontSize: number | null;
}

/**
 * Font size covering the most characters. Ties go to the smaller size.
 */
export function dominantFontSize(spans: readonly Span[]): number {
  const weights = new Map<number, number>();
  for (const span of spans) {
    const chars = span.text.replace(/\s/g, "").length;
    if (chars === 0) continue;
    weights.set(span.fontSize, (weights.get(span.fontSize) ?? 0) + chars);
  }
  let best = 0;
  let bestWeight = -1;
  for (const [size, weight] of weights) {
    if (weight > bestWeight || (weight === bestWeight && size < best)) {
      best = size;
      bestWeight = weight;
    }
  }
  return best;
}

function isHeadingSized(fontSize: number, opts: ClassifyOptions): boolean {
  if (fontSize <= 0) return false;
  if (opts.minHeadingFontSize !== null && fontSize >= opts.minHeadingFontSize) return true;
  return fontSize >= opts.bodyFontSize + opts.headingFontDelta;
}

export function classifyLine(line: Line, opts: ClassifyOptions): LineClass {
  const text = line.text.trim();
  if (text === "") return { kind: "empty" };

  const indent = lineIndent(line.spans);
  const marker = detectListItem(text, indent);
  if (marker) {
    return { kind: "list", marker, xPosition: line.bbox[0] };
  }

  if (isCodeLine(line.spans, opts.codeIndentThreshold)) {
    return { kind: "code", indent };
  }

  const fontSize = dominantFontSize(line.spans);
  if (isHeadingSized(fontSize, opts) && passesHeadingGate(text)) {
    return { kind: "heading", fontSize };
  }

  if (isTableCandidate(line)) return { kind: "table" };

  const callout = CALLOUT_RE.exec(text);
  if (callout) return { kind: "callout", label: callout[1] };

  if (!HAS_WORD_CHAR_RE.test(text)) return { kind: "noise" };

  return { kind: "paragraph" };
}
