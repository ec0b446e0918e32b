import type { Block, HeadingCandidateBlock } from "../core/types";
import { detectHeadingLevel } from "./detect-heading";
import type { NumberingProcessor } from "./numbering";

export interface LeveledHeading {
  block: HeadingCandidateBlock;
  level: number;
}

export function isHeadingBlock(block: Block): block is HeadingCandidateBlock {
  return block.kind === "HeadingCandidate";
}

/**
 * Assign levels to heading candidates in document order and attach their
 * numbering facts. Candidates failing the heading gate keep `level: null`
 * and are treated as content downstream.
 */
export function assignHeadingLevels(
  blocks: readonly Block[],
  numbering: NumberingProcessor
): LeveledHeading[] {
  const headings: LeveledHeading[] = [];

  for (const block of blocks) {
    if (!isHeadingBlock(block) || block.spans.length === 0) continue;

    const level = detectHeadingLevel(block.text);
    block.meta.level = level;
    if (level === null) continue;

    block.meta.numbering = numbering.process({
      text: block.text,
      topY: Math.min(...block.spans.map((s) => s.bbox[1])),
      page: block.pageSpan[0],
    });
    headings.push({ block, level });
  }

  return headings;
}
