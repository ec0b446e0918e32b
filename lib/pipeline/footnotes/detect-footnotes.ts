import type { Footnote, FootnoteMarker, Span } from "../core/types";

const MARKER_RE = /^\d{1,3}$/;
// "1.1 Results" is a section number, not footnote 1
const LEADING_NUMBER_RE = /^(\d+)(?!\d|\.\d)/;
const NEARBY_X = 50;
const SMALLER_RATIO = 0.8;
const RAISE_MIN = 2;
/** Lines of one footnote sit at most this far apart */
const CONTINUATION_GAP = 15;

export interface FootnoteOptions {
  pageHeight: number;
  /** Top of the footnote band as a fraction of the page height */
  bandRatio: number;
  lineTolerance: number;
  /** Unmarked band text must be set smaller than this to count as a footnote */
  bodyFontSize: number;
}

export interface FootnoteDetection {
  footnotes: Footnote[];
  markers: FootnoteMarker[];
  /** Input spans minus those that became footnote text */
  bodySpans: Span[];
}

// ============================================================================
// Markers
// ============================================================================

function isLikelySuperscript(span: Span, pageSpans: readonly Span[]): boolean {
  const nearby = pageSpans.filter((s) => Math.abs(s.bbox[0] - span.bbox[0]) < NEARBY_X);
  if (nearby.length === 0) return false;
  const avgSize = nearby.reduce((sum, s) => sum + s.fontSize, 0) / nearby.length;
  const avgTop = nearby.reduce((sum, s) => sum + s.bbox[1], 0) / nearby.length;
  return span.fontSize < avgSize * SMALLER_RATIO && span.bbox[1] < avgTop - RAISE_MIN;
}

/**
 * Numeric spans of up to three digits that are flagged superscript, or set
 * smaller than and raised above the text around them.
 */
export function detectFootnoteMarkers(spans: readonly Span[]): FootnoteMarker[] {
  const byPage = groupByPage(spans);
  const markers: FootnoteMarker[] = [];
  for (const span of spans) {
    const text = span.text.trim();
    if (!MARKER_RE.test(text)) continue;
    const raised =
      span.styleFlags.superscript === true ||
      isLikelySuperscript(span, byPage.get(span.page) ?? []);
    if (raised) markers.push({ number: Number(text), span });
  }
  return markers;
}

// ============================================================================
// Footnote text
// ============================================================================

function leadingNumber(span: Span): number | null {
  const match = LEADING_NUMBER_RE.exec(span.text.trim());
  return match ? Number(match[1]) : null;
}

function byReadingOrder(a: Span, b: Span): number {
  return a.bbox[1] - b.bbox[1] || a.bbox[0] - b.bbox[0];
}

/**
 * Split band spans into footnotes: a span with a leading number on a new
 * line opens a footnote; same-line spans and close unnumbered lines continue it.
 */
function groupBandSpans(spans: readonly Span[], lineTolerance: number): Span[][] {
  const sorted = [...spans].sort(byReadingOrder);
  const groups: Span[][] = [];
  let current: Span[] = [];
  for (const span of sorted) {
    const prev = current.at(-1);
    if (!prev) {
      current.push(span);
      continue;
    }
    const yDiff = Math.abs(span.bbox[1] - prev.bbox[1]);
    const sameLine = yDiff <= lineTolerance;
    const opensFootnote = leadingNumber(span) !== null;

    if (sameLine || (yDiff <= CONTINUATION_GAP && !opensFootnote)) {
      current.push(span);
    } else {
      groups.push(current);
      current = [span];
    }
  }
  if (current.length > 0) groups.push(current);
  return groups;
}

function footnoteText(group: readonly Span[]): string {
  return group
    .map((span, i) => {
      const text = span.text.trim();
      return i === 0 ? text.replace(/^\d+\.?\s*/, "") : text;
    })
    .filter((text) => text.length > 0)
    .join(" ");
}

/**
 * Find footnotes in the bottom band of each page and pair them with markers
 * in the body by page and number. A numbered band group is claimed only when
 * a marker on its page carries the same number or its type is smaller than
 * body text; anything else (a page number, a heading near the page foot)
 * stays in the body.
 */
export function detectFootnotes(
  spans: readonly Span[],
  options: FootnoteOptions
): FootnoteDetection {
  const bandTop = options.pageHeight * options.bandRatio;
  const inBand = (span: Span) => span.bbox[1] >= bandTop;

  const markers = detectFootnoteMarkers(spans.filter((s) => !inBand(s)));
  const footnoteSpans = new Set<Span>();
  const footnotes: Footnote[] = [];

  const pages = [...groupByPage(spans.filter(inBand)).entries()].sort((a, b) => a[0] - b[0]);
  for (const [page, bandSpans] of pages) {
    for (const group of groupBandSpans(bandSpans, options.lineTolerance)) {
      const number = leadingNumber(group[0]);
      const text = footnoteText(group);
      if (number === null || !text) continue;

      const marker = markers.find((m) => m.number === number && m.span.page === page) ?? null;
      const largest = Math.max(...group.map((s) => s.fontSize));
      if (!marker && largest >= options.bodyFontSize) continue;

      footnotes.push({
        id: `fn_${String(footnotes.length + 1).padStart(3, "0")}`,
        number,
        text,
        page,
        spans: group,
        marker,
      });
      for (const span of group) footnoteSpans.add(span);
    }
  }

  return {
    footnotes,
    markers,
    bodySpans: spans.filter((s) => !footnoteSpans.has(s)),
  };
}

function groupByPage(spans: readonly Span[]): Map<number, Span[]> {
  const byPage = new Map<number, Span[]>();
  for (const span of spans) {
    const list = byPage.get(span.page);
    if (list) {
      list.push(span);
    } else {
      byPage.set(span.page, [span]);
    }
  }
  return byPage;
}
