/**
 * Document-scoped numbering validation for headings.
 *
 * Consumes headings strictly in document order and keeps:
 * - a global chapter counter, bumped by every "Chapter N"
 * - the set of explicit chapter numbers seen
 * - accepted appendix letters
 * - the highest last segment seen under each dotted-path prefix
 *
 * Anomalies become diagnostics; they never abort unless configured to.
 */

import type { Diagnostics } from "../diagnostics";
import type { NumberingInfo } from "../core/types";
import { APPENDIX_RE, CHAPTER_RE, DOTTED_RE, PART_RE } from "./detect-heading";

/** Appendix headings must start within this distance of the page top. */
export const PAGE_TOP_LIMIT = 20;

export interface NumberingOptions {
  validateGaps: boolean;
  allowChapterResets: boolean;
  maxDepth: number;
  appendixRequiresPageBreak: boolean;
}

export interface HeadingInput {
  text: string;
  /** Smallest y0 of the heading's spans */
  topY: number;
  page: number;
}

export class NumberingProcessor {
  private chapterCounter = 0;
  private readonly seenChapters = new Set<number>();
  private readonly appendixLetters = new Set<string>();
  private lastAppendix: string | null = null;
  private readonly highestByPrefix = new Map<string, number>();

  constructor(
    private readonly options: NumberingOptions,
    private readonly diagnostics: Diagnostics
  ) {}

  process(heading: HeadingInput): NumberingInfo | undefined {
    const text = heading.text.trim();

    const chapter = CHAPTER_RE.exec(text);
    if (chapter) return this.processChapter(Number(chapter[1]));

    const part = PART_RE.exec(text);
    if (part) return { scheme: "part", partLabel: part[1] };

    const appendix = APPENDIX_RE.exec(text);
    if (appendix) return this.processAppendix(appendix[1].toUpperCase(), heading);

    const dotted = DOTTED_RE.exec(text);
    if (dotted) return this.processPath(dotted[1]);

    return undefined;
  }

  private processChapter(explicit: number): NumberingInfo {
    if (this.seenChapters.has(explicit)) {
      this.diagnostics.warn(
        "duplicate_chapter_number",
        `Chapter ${explicit} appears more than once`,
        { explicitNumber: explicit }
      );
    } else {
      this.seenChapters.add(explicit);
    }

    if (!this.options.allowChapterResets && explicit <= this.chapterCounter) {
      this.diagnostics.warn(
        "chapter_number_reset",
        `Chapter ${explicit} does not continue from chapter ${this.chapterCounter}`,
        { explicitNumber: explicit, globalCounter: this.chapterCounter }
      );
    }

    this.chapterCounter++;
    return { scheme: "chapter", chapterNumber: explicit, sequence: this.chapterCounter };
  }

  private processAppendix(letter: string, heading: HeadingInput): NumberingInfo {
    if (this.chapterCounter === 0) {
      this.diagnostics.warn(
        "appendix_before_first_chapter",
        `Appendix ${letter} precedes the first chapter and is ignored`,
        { letter, page: heading.page }
      );
      return { scheme: "appendix", letter, status: "ignored" };
    }

    if (this.options.appendixRequiresPageBreak && heading.topY > PAGE_TOP_LIMIT) {
      this.diagnostics.warn(
        "appendix_missing_page_break",
        `Appendix ${letter} does not start at the top of page ${heading.page}`,
        { letter, page: heading.page, topY: heading.topY }
      );
      return { scheme: "appendix", letter, status: "demoted" };
    }

    if (this.appendixLetters.has(letter)) {
      this.diagnostics.warn(
        "appendix_duplicate_letter",
        `Appendix ${letter} was already used`,
        { letter }
      );
      return { scheme: "appendix", letter, status: "demoted" };
    }

    if (this.lastAppendix !== null) {
      const expected = String.fromCharCode(this.lastAppendix.charCodeAt(0) + 1);
      if (letter !== expected) {
        this.diagnostics.warn(
          "appendix_out_of_order",
          `Appendix ${letter} follows ${this.lastAppendix}; expected ${expected}`,
          { letter, expected, previous: this.lastAppendix }
        );
      }
    }

    this.appendixLetters.add(letter);
    this.lastAppendix = letter;
    this.diagnostics.info("appendix_detected", `Appendix ${letter}`, { letter });
    return { scheme: "appendix", letter, status: "accepted" };
  }

  private processPath(dotted: string): NumberingInfo {
    let segments = dotted.split(".").map(Number);
    let truncated = false;

    if (segments.length > this.options.maxDepth) {
      this.diagnostics.info(
        "section_path_truncated",
        `Section ${dotted} is deeper than ${this.options.maxDepth} levels`,
        { path: segments, maxDepth: this.options.maxDepth }
      );
      segments = segments.slice(0, this.options.maxDepth);
      truncated = true;
    }

    if (this.options.validateGaps && segments.length >= 2) {
      this.checkGap(segments);
    }

    return { scheme: "section", path: segments, truncated };
  }

  private checkGap(segments: readonly number[]): void {
    const prefix = segments.slice(0, -1).join(".");
    const last = segments[segments.length - 1];
    const previous = this.highestByPrefix.get(prefix);

    if (previous !== undefined && last - previous > 1) {
      this.diagnostics.warn(
        "section_gap",
        `Section ${prefix}.${last} follows ${prefix}.${previous}`,
        { prefix, previous, current: last }
      );
    }
    this.highestByPrefix.set(prefix, previous === undefined ? last : Math.max(previous, last));
  }
}
