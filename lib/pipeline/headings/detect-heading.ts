export const MAX_HEADING_LENGTH = 180;
export const MAX_HEADING_LEVEL = 6;

const GATE_RE = /^(part\s+\w+|chapter\s+\d+|appendix\s+[a-zA-Z]|\d+(?:\.\d+){0,3})\b/i;

export const CHAPTER_RE = /^chapter\s+(\d+)/i;
export const PART_RE = /^part\s+(\w+)/i;
export const APPENDIX_RE = /^appendix\s+([a-zA-Z])/i;
export const DOTTED_RE = /^(\d+(?:\.\d+)*)\b/;

function isUpperWord(word: string): boolean {
  return word === word.toUpperCase() && word !== word.toLowerCase();
}

function capsWordRatio(words: readonly string[]): number {
  if (words.length === 0) return 0;
  return words.filter((w) => isUpperWord(w) && w.length > 2).length / words.length;
}

/**
 * Whether text looks like a heading at all: short enough, and either a
 * numbering pattern or mostly all-caps words.
 */
export function passesHeadingGate(text: string): boolean {
  if (text.length > MAX_HEADING_LENGTH) return false;
  const trimmed = text.trim();
  if (GATE_RE.test(trimmed)) return true;
  return capsWordRatio(trimmed.split(/\s+/).filter(Boolean)) >= 0.6;
}

/**
 * Heading level for text, or null when it is not a heading.
 */
export function detectHeadingLevel(text: string): number | null {
  if (!passesHeadingGate(text)) return null;
  const trimmed = text.trim();

  if (CHAPTER_RE.test(trimmed)) return 1;
  if (PART_RE.test(trimmed)) return 1;
  if (APPENDIX_RE.test(trimmed)) return 1;

  const dotted = DOTTED_RE.exec(trimmed);
  if (dotted) {
    const dots = dotted[1].split(".").length - 1;
    return Math.min(dots + 1, MAX_HEADING_LEVEL);
  }

  // all-caps headings and anything else past the gate
  return 1;
}
