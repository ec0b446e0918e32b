import { centerY, spansBBox } from "../core/geometry";
import type { Line, Span } from "../core/types";
import { repairHyphenation } from "./hyphenation";

const PUNCTUATION_ONLY_RE = /^[^\p{L}\p{N}_\s]+$/u;

export function sortByOrder(spans: readonly Span[]): Span[] {
  return [...spans].sort((a, b) => a.orderIndex - b.orderIndex);
}

/**
 * Group spans into lines in reading order. A new line starts when the
 * vertical centre moves more than `yTolerance` from the previous span,
 * or the page changes.
 */
export function groupLines(spans: readonly Span[], yTolerance: number): Line[] {
  const groups: Span[][] = [];
  let current: Span[] = [];

  for (const span of sortByOrder(spans)) {
    const prev = current.at(-1);
    if (
      prev &&
      (prev.page !== span.page ||
        Math.abs(centerY(span.bbox) - centerY(prev.bbox)) > yTolerance)
    ) {
      groups.push(current);
      current = [];
    }
    current.push(span);
  }
  if (current.length > 0) groups.push(current);

  return groups.map((group) => {
    const sorted = [...group].sort((a, b) => a.bbox[0] - b.bbox[0]);
    return {
      spans: sorted,
      text: joinSpans(sorted),
      bbox: spansBBox(sorted),
      page: sorted[0].page,
    };
  });
}

/**
 * Join span texts left to right. Punctuation-only spans attach without a
 * space; whitespace-only spans are skipped.
 */
export function joinSpans(spans: readonly Span[]): string {
  let out = "";
  for (const span of spans) {
    const text = span.text.trim();
    if (!text) continue;
    if (out === "" || PUNCTUATION_ONLY_RE.test(text)) {
      out += text;
    } else {
      out += ` ${text}`;
    }
  }
  return out;
}

/**
 * Merge spans into text lines with hyphenation repaired. Empty lines are
 * dropped from the output.
 */
export function mergeLines(spans: readonly Span[], yTolerance: number): string[] {
  const texts = groupLines(spans, yTolerance)
    .map((line) => line.text)
    .filter((text) => text !== "");
  return repairHyphenation(texts);
}
