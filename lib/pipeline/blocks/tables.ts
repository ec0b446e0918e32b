import type { Line, Span } from "../core/types";

/** Horizontal gap between spans that separates two columns. */
export const COLUMN_GAP = 10;
/** Cell starts within this distance of a reference column are aligned. */
export const ALIGN_TOLERANCE = 5;

const WIDE_SPACE_RE = /\S\s{2,}\S/;
const PIECE_RE = /\S+(?: \S+)*/g;

export interface TableCell {
  text: string;
  x: number;
}

function sortedSpans(line: Line): Span[] {
  return [...line.spans].sort((a, b) => a.bbox[0] - b.bbox[0]);
}

export function hasWideGap(spans: readonly Span[]): boolean {
  const visible = spans.filter((s) => s.text.trim() !== "");
  for (let i = 1; i < visible.length; i++) {
    if (visible[i].bbox[0] - visible[i - 1].bbox[2] > COLUMN_GAP) return true;
  }
  return false;
}

export function isTableCandidate(line: Line): boolean {
  return WIDE_SPACE_RE.test(line.text) || hasWideGap(sortedSpans(line));
}

/**
 * Split a line into cells on span gaps wider than COLUMN_GAP and on runs of
 * two or more spaces inside a span. Cells split out of one span get x
 * positions proportional to their character offset.
 */
export function splitCells(line: Line): TableCell[] {
  const cells: TableCell[] = [];
  let prevRight: number | null = null;

  for (const span of sortedSpans(line)) {
    const raw = span.text.replace(/\t/g, "  ");
    if (raw.trim() === "") continue;
    const width = span.bbox[2] - span.bbox[0];
    const joinsPrevious = prevRight !== null && span.bbox[0] - prevRight <= COLUMN_GAP;

    let first = true;
    for (const match of raw.matchAll(PIECE_RE)) {
      const offset = match.index ?? 0;
      const x = span.bbox[0] + (width * offset) / raw.length;
      const last = cells.at(-1);
      if (first && joinsPrevious && last) {
        last.text = `${last.text} ${match[0]}`;
      } else {
        cells.push({ text: match[0], x });
      }
      first = false;
    }
    prevRight = span.bbox[2];
  }
  return cells;
}

function modalCount(counts: readonly number[]): number {
  const freq = new Map<number, number>();
  for (const c of counts) freq.set(c, (freq.get(c) ?? 0) + 1);
  let best = 0;
  let bestFreq = -1;
  for (const [count, f] of freq) {
    if (f > bestFreq || (f === bestFreq && count > best)) {
      best = count;
      bestFreq = f;
    }
  }
  return best;
}

export interface TableScore {
  confidence: number;
  consistency: number;
  columns: number;
  rows: number;
  alignment: number;
}

/**
 * Confidence that a run of rows is a table: the mean of column-count
 * consistency, column count (saturating at 4), row count (saturating at 5)
 * and how well cell starts line up with a reference row.
 */
export function scoreTable(rows: readonly (readonly TableCell[])[]): TableScore {
  if (rows.length === 0) {
    return { confidence: 0, consistency: 0, columns: 0, rows: 0, alignment: 0 };
  }
  const counts = rows.map((r) => r.length);
  const modal = modalCount(counts);
  const consistency = counts.filter((c) => c === modal).length / rows.length;
  const maxCols = Math.max(...counts);
  const columns = Math.min(maxCols / 4, 1);
  const rowScore = Math.min(rows.length / 5, 1);

  const reference = rows.find((r) => r.length === modal) ?? rows[0];
  let total = 0;
  let aligned = 0;
  for (const row of rows) {
    if (row === reference) continue;
    for (const cell of row) {
      total++;
      if (reference.some((ref) => Math.abs(ref.x - cell.x) <= ALIGN_TOLERANCE)) aligned++;
    }
  }
  const alignment = total === 0 ? 0 : aligned / total;

  return {
    confidence: (consistency + columns + rowScore + alignment) / 4,
    consistency,
    columns,
    rows: rowScore,
    alignment,
  };
}
