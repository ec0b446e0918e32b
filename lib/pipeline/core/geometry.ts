import type { BBox, PageSpan, Span } from "./types";

const EMPTY_BBOX: BBox = [0, 0, 0, 0];

export function centerY(bbox: BBox): number {
  return (bbox[1] + bbox[3]) / 2;
}

export function unionBBox(boxes: readonly BBox[]): BBox {
  if (boxes.length === 0) return EMPTY_BBOX;
  let [x0, y0, x1, y1] = boxes[0];
  for (const [a, b, c, d] of boxes.slice(1)) {
    x0 = Math.min(x0, a);
    y0 = Math.min(y0, b);
    x1 = Math.max(x1, c);
    y1 = Math.max(y1, d);
  }
  return [x0, y0, x1, y1];
}

/**
 * Euclidean distance between the closest edges of two boxes.
 * Overlapping or touching boxes are at distance 0.
 */
export function bboxDistance(a: BBox, b: BBox): number {
  const dx = Math.max(0, a[0] - b[2], b[0] - a[2]);
  const dy = Math.max(0, a[1] - b[3], b[1] - a[3]);
  return Math.hypot(dx, dy);
}

export function pageSpanOf(spans: readonly Span[]): PageSpan {
  if (spans.length === 0) return [0, 0];
  let first = spans[0].page;
  let last = spans[0].page;
  for (const s of spans) {
    first = Math.min(first, s.page);
    last = Math.max(last, s.page);
  }
  return [first, last];
}

export function spansBBox(spans: readonly Span[]): BBox {
  return unionBBox(spans.map((s) => s.bbox));
}
