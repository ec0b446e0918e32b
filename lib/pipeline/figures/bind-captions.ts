import type { BoundFigure, CaptionCandidate, Figure, Span } from "../core/types";
import { bboxDistance, centerY } from "../core/geometry";
import { FigureFilenameAllocator, figureId } from "./figure-files";

/** "Figure 3:", "Fig. 2.", "Table 1", "Diagram", ... at the start of the text */
export const CAPTION_PATTERN =
  /^\s*(?:fig(?:ure)?\.?\s*\d*|table\s*\d*|diagram\s*\d*)(?:\s*[:.]|\s|$)/i;

const POSITION_SCORE_ABOVE = 0.5;
const PATTERN_SCORE_MISS = 0.3;

export interface CaptionWeights {
  distance: number;
  position: number;
  pattern: number;
}

export interface CaptionOptions {
  /** Candidates further than this from the figure are ignored */
  maxDistance: number;
  weights: CaptionWeights;
  imageFormat: string;
}

// ============================================================================
// Candidates and scoring
// ============================================================================

export function matchesCaptionPattern(text: string): boolean {
  return CAPTION_PATTERN.test(text.trim());
}

/**
 * Weighted caption score, clamped to [0, 1]:
 * distance (1 at contact, 0 at maxDistance), position (below beats above)
 * and the caption text pattern.
 */
export function scoreCaption(
  distance: number,
  isBelow: boolean,
  matchesPattern: boolean,
  options: Pick<CaptionOptions, "maxDistance" | "weights">
): number {
  const { weights } = options;
  const distanceScore = Math.max(0, 1 - distance / options.maxDistance);
  const positionScore = isBelow ? 1 : POSITION_SCORE_ABOVE;
  const patternScore = matchesPattern ? 1 : PATTERN_SCORE_MISS;
  const total =
    weights.distance * distanceScore +
    weights.position * positionScore +
    weights.pattern * patternScore;
  return Math.min(1, Math.max(0, total));
}

/**
 * Same-page spans within maxDistance of the figure, scored.
 */
export function findCaptionCandidates(
  figure: Figure,
  spans: readonly Span[],
  options: Pick<CaptionOptions, "maxDistance" | "weights">
): CaptionCandidate[] {
  const figureCenter = centerY(figure.bbox);
  const candidates: CaptionCandidate[] = [];
  for (const span of spans) {
    if (span.page !== figure.page) continue;
    if (!span.text.trim()) continue;
    const distance = bboxDistance(span.bbox, figure.bbox);
    if (distance > options.maxDistance) continue;

    const isBelow = centerY(span.bbox) > figureCenter;
    const matchesPattern = matchesCaptionPattern(span.text);
    candidates.push({
      text: span.text,
      bbox: span.bbox,
      page: span.page,
      span,
      distance,
      score: scoreCaption(distance, isBelow, matchesPattern, options),
      isBelow,
      matchesPattern,
    });
  }
  return candidates;
}

/**
 * Best first: score, then below, then pattern match, then closer.
 */
export function compareCandidates(a: CaptionCandidate, b: CaptionCandidate): number {
  if (a.score !== b.score) return b.score - a.score;
  if (a.isBelow !== b.isBelow) return a.isBelow ? -1 : 1;
  if (a.matchesPattern !== b.matchesPattern) return a.matchesPattern ? -1 : 1;
  return a.distance - b.distance;
}

export function selectCaption(
  figure: Figure,
  spans: readonly Span[],
  options: Pick<CaptionOptions, "maxDistance" | "weights">
): CaptionCandidate | null {
  const candidates = findCaptionCandidates(figure, spans, options).sort(compareCandidates);
  return candidates[0] ?? null;
}

// ============================================================================
// Binding
// ============================================================================

/**
 * Bind a caption to every figure independently, then assign ids by input
 * order and allocate filenames. A figure without candidates has no caption.
 */
export function bindCaptions(
  figures: readonly Figure[],
  spans: readonly Span[],
  options: CaptionOptions
): BoundFigure[] {
  const filenames = new FigureFilenameAllocator(options.imageFormat);
  return figures.map((figure, index) => {
    const candidate = selectCaption(figure, spans, options);
    const caption = candidate ? candidate.text.trim() : null;
    const id = figureId(index);
    return {
      id,
      filename: filenames.allocate(id, caption),
      figure,
      caption,
      alt: figure.alt ?? null,
      candidate,
    };
  });
}
