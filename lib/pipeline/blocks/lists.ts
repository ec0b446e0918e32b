import type { ListItemEntry, ListMeta, Span } from "../core/types";

const BULLET_RE = /^[•◦▪▫‣⁃●○■□\-*–]\s+/;
const NUMBERED_RE = /^(\d+|[a-zA-Z])[.)]\s+/;

/** First words that make a short numbered line a heading rather than an item. */
const HEADING_WORDS: ReadonlySet<string> = new Set([
  "introduction",
  "background",
  "methodology",
  "methods",
  "results",
  "discussion",
  "conclusion",
  "conclusions",
  "summary",
  "overview",
  "abstract",
  "references",
  "bibliography",
  "appendix",
  "acknowledgements",
  "acknowledgments",
  "preface",
  "scope",
  "purpose",
  "definitions",
  "evaluation",
  "implementation",
  "analysis",
  "related",
  "future",
  "limitations",
]);

export interface ListMarker {
  marker: string;
  body: string;
  ordered: boolean;
}

export function matchListMarker(text: string): ListMarker | null {
  const bullet = BULLET_RE.exec(text);
  if (bullet) {
    return { marker: bullet[0].trim(), body: text.slice(bullet[0].length), ordered: false };
  }
  const numbered = NUMBERED_RE.exec(text);
  if (numbered) {
    return { marker: numbered[0].trim(), body: text.slice(numbered[0].length), ordered: true };
  }
  return null;
}

/**
 * Numbered lines such as "2. Background" read as headings: at most three
 * words after the marker, capitalized, not indented, and the first word is
 * a common section name.
 */
export function looksLikeNumberedHeading(body: string, indent: number): boolean {
  if (indent > 0) return false;
  const words = body.trim().split(/\s+/).filter(Boolean);
  if (words.length === 0 || words.length > 3) return false;
  const first = words[0];
  if (first.charAt(0) !== first.charAt(0).toUpperCase()) return false;
  const key = first.toLowerCase().replace(/[^a-z]/g, "");
  return HEADING_WORDS.has(key);
}

/**
 * Classify a line as a list item, returning the marker when it is one.
 */
export function detectListItem(text: string, indent: number): ListMarker | null {
  const marker = matchListMarker(text);
  if (!marker) return null;
  if (marker.ordered && looksLikeNumberedHeading(marker.body, indent)) return null;
  return marker;
}

/**
 * Assign a 0-based nesting level to each x position. Positions are sorted and
 * merged into clusters within `tolerance` of the cluster's first position;
 * levels follow the order in which each cluster is first seen in the input.
 */
export function assignListLevels(xPositions: readonly number[], tolerance: number): number[] {
  const anchors: number[] = [];
  for (const x of [...xPositions].sort((a, b) => a - b)) {
    const anchor = anchors.at(-1);
    if (anchor === undefined || x - anchor > tolerance) anchors.push(x);
  }

  const clusterOf = (x: number): number => {
    let index = 0;
    for (let i = 0; i < anchors.length; i++) {
      if (x >= anchors[i]) index = i;
    }
    return index;
  };

  const levelByCluster = new Map<number, number>();
  return xPositions.map((x) => {
    const cluster = clusterOf(x);
    let level = levelByCluster.get(cluster);
    if (level === undefined) {
      level = levelByCluster.size;
      levelByCluster.set(cluster, level);
    }
    return level;
  });
}

export interface ListLine {
  text: string;
  marker: string;
  spans: readonly Span[];
  xPosition: number;
}

export function buildListMeta(lines: readonly ListLine[], tolerance: number): ListMeta {
  const levels = assignListLevels(
    lines.map((l) => l.xPosition),
    tolerance
  );
  const items: ListItemEntry[] = lines.map((line, i) => ({
    text: line.text,
    marker: line.marker,
    spans: line.spans,
    xPosition: line.xPosition,
    level: levels[i],
  }));
  return { items, maxLevel: Math.max(0, ...levels) };
}
