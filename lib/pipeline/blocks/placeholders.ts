import type {
  Block,
  BoundFigure,
  FigurePlaceholderBlock,
  Footnote,
  FootnotePlaceholderBlock,
} from "../core/types";
import { spansBBox } from "../core/geometry";

export function figurePlaceholder(bound: BoundFigure): FigurePlaceholderBlock {
  const { figure } = bound;
  return {
    kind: "FigurePlaceholder",
    spans: [],
    bbox: figure.bbox,
    pageSpan: [figure.page, figure.page],
    lines: [],
    text: bound.caption ?? "",
    meta: {
      figureId: bound.id,
      filename: bound.filename,
      caption: bound.caption,
      alt: bound.alt,
    },
  };
}

export function footnotePlaceholder(footnote: Footnote): FootnotePlaceholderBlock {
  return {
    kind: "FootnotePlaceholder",
    spans: footnote.spans,
    bbox: spansBBox(footnote.spans),
    pageSpan: [footnote.page, footnote.page],
    lines: [footnote.text],
    text: footnote.text,
    meta: { footnoteId: footnote.id, number: footnote.number },
  };
}

function positionKey(block: Block): [number, number] {
  return [block.pageSpan[0], block.bbox[1]];
}

function comesBefore(a: [number, number], b: [number, number]): boolean {
  return a[0] < b[0] || (a[0] === b[0] && a[1] < b[1]);
}

/**
 * Merge placeholder blocks into an assembled block stream. Each placeholder
 * goes before the first block that starts strictly after it in
 * (page, top y) order; placeholders at the same position keep their order.
 */
export function insertByPosition(
  blocks: readonly Block[],
  placeholders: readonly Block[]
): Block[] {
  const pending = placeholders
    .map((block, index) => ({ block, index, key: positionKey(block) }))
    .sort((a, b) => a.key[0] - b.key[0] || a.key[1] - b.key[1] || a.index - b.index);

  const out: Block[] = [];
  let next = 0;
  for (const block of blocks) {
    const key = positionKey(block);
    while (next < pending.length && comesBefore(pending[next].key, key)) {
      out.push(pending[next].block);
      next++;
    }
    out.push(block);
  }
  for (; next < pending.length; next++) out.push(pending[next].block);
  return out;
}
