import type { Span } from "../core/types";

export const MONOSPACE_RATIO = 0.6;

export function leadingSpaces(text: string): number {
  const match = /^ */.exec(text);
  return match ? match[0].length : 0;
}

/** Leading spaces of the first span's raw text. */
export function lineIndent(spans: readonly Span[]): number {
  return spans.length > 0 ? leadingSpaces(spans[0].text.replace(/\t/g, "    ")) : 0;
}

/**
 * Share of non-blank characters in the line that come from monospace spans.
 */
export function monospaceRatio(spans: readonly Span[]): number {
  let total = 0;
  let mono = 0;
  for (const span of spans) {
    const chars = span.text.replace(/\s/g, "").length;
    total += chars;
    if (span.styleFlags.monospace) mono += chars;
  }
  return total === 0 ? 0 : mono / total;
}

export function isCodeLine(spans: readonly Span[], indentThreshold: number): boolean {
  return lineIndent(spans) >= indentThreshold || monospaceRatio(spans) >= MONOSPACE_RATIO;
}

/**
 * Remove the smallest common indentation. Blank lines do not count toward
 * the minimum and come out as "".
 */
export function dedentLines(lines: readonly string[]): string[] {
  const indents = lines.filter((l) => l.trim() !== "").map(leadingSpaces);
  const min = indents.length > 0 ? Math.min(...indents) : 0;
  return lines.map((l) => (l.trim() === "" ? "" : l.slice(min).trimEnd()));
}
