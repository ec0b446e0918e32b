/**
 * Core types for the structure-inference pipeline.
 *
 * These types define the data that flows between stages: spans in, lines,
 * blocks, headings, figures and footnotes in between. Section tree nodes
 * live in tree/section-node.ts; manifest rows in core/schemas.ts.
 */

// ============================================================================
// Geometry
// ============================================================================

/** [x0, y0, x1, y1], top-down page coordinates (y grows downward). */
export type BBox = readonly [number, number, number, number];

/** [first, last], 1-based and inclusive. */
export type PageSpan = readonly [number, number];

// ============================================================================
// Span - the positioned text fragment produced by extraction
// ============================================================================

export interface StyleFlags {
  readonly bold: boolean;
  readonly italic: boolean;
  readonly monospace?: boolean;
  readonly superscript?: boolean;
}

export interface Span {
  readonly text: string;
  readonly bbox: BBox;
  readonly fontName: string;
  readonly fontSize: number;
  readonly styleFlags: StyleFlags;
  readonly page: number; // 1-based
  readonly orderIndex: number; // strictly increasing across the document
}

// ============================================================================
// Lines
// ============================================================================

/**
 * A group of spans sharing a vertical band, sorted left to right.
 */
export interface Line {
  readonly spans: readonly Span[];
  readonly text: string;
  readonly bbox: BBox;
  readonly page: number;
}

// ============================================================================
// Blocks - closed tagged union over the block kinds
// ============================================================================

export type BlockKind =
  | "Paragraph"
  | "List"
  | "ListItem"
  | "CodeBlock"
  | "Table"
  | "EmptyLine"
  | "HeadingCandidate"
  | "FigurePlaceholder"
  | "FootnotePlaceholder"
  | "Callout"
  | "RawNoise";

interface BlockBase {
  readonly spans: readonly Span[];
  readonly bbox: BBox;
  readonly pageSpan: PageSpan;
  /** Merged text of each contributing line */
  readonly lines: readonly string[];
  /** Lines joined for display (hyphenation repaired) */
  readonly text: string;
}

export interface ListItemEntry {
  /** Item text with the marker removed */
  readonly text: string;
  readonly marker: string;
  readonly spans: readonly Span[];
  readonly xPosition: number;
  readonly level: number; // 0-based
}

export interface ListMeta {
  readonly items: readonly ListItemEntry[];
  readonly maxLevel: number;
}

export type CodeFormat = "indented" | "fenced_fallback";

export interface CodeMeta {
  readonly language: string | null;
  readonly dedentedLines: readonly string[];
  readonly format: CodeFormat;
  /** Set when a low-confidence table run fell back to code */
  readonly tableConfidence?: number;
}

export interface TableMeta {
  readonly rows: readonly (readonly string[])[];
  readonly confidence: number;
}

export type NumberingInfo =
  | { readonly scheme: "chapter"; readonly chapterNumber: number; readonly sequence: number }
  | { readonly scheme: "part"; readonly partLabel: string }
  | {
      readonly scheme: "appendix";
      readonly letter: string;
      readonly status: "accepted" | "demoted" | "ignored";
    }
  | {
      readonly scheme: "section";
      readonly path: readonly number[];
      readonly truncated: boolean;
    };

/**
 * Heading metadata is the one part of a block written after assembly:
 * the heading stage fills in `level` and `numbering`.
 */
export interface HeadingMeta {
  fontSize: number;
  level: number | null;
  numbering?: NumberingInfo;
}

export interface FigureRefMeta {
  readonly figureId: string;
  readonly filename: string;
  readonly caption: string | null;
  readonly alt: string | null;
}

export interface FootnoteMeta {
  readonly footnoteId: string;
  readonly number: number;
}

export interface CalloutMeta {
  readonly label: string;
}

export interface ParagraphBlock extends BlockBase {
  readonly kind: "Paragraph";
}

export interface ListBlock extends BlockBase {
  readonly kind: "List";
  readonly meta: ListMeta;
}

export interface ListItemBlock extends BlockBase {
  readonly kind: "ListItem";
  readonly meta: ListMeta;
}

export interface CodeBlock extends BlockBase {
  readonly kind: "CodeBlock";
  readonly meta: CodeMeta;
}

export interface TableBlock extends BlockBase {
  readonly kind: "Table";
  readonly meta: TableMeta;
}

export interface EmptyLineBlock extends BlockBase {
  readonly kind: "EmptyLine";
}

export interface HeadingCandidateBlock extends BlockBase {
  readonly kind: "HeadingCandidate";
  readonly meta: HeadingMeta;
}

export interface FigurePlaceholderBlock extends BlockBase {
  readonly kind: "FigurePlaceholder";
  readonly meta: FigureRefMeta;
}

export interface FootnotePlaceholderBlock extends BlockBase {
  readonly kind: "FootnotePlaceholder";
  readonly meta: FootnoteMeta;
}

export interface CalloutBlock extends BlockBase {
  readonly kind: "Callout";
  readonly meta: CalloutMeta;
}

export interface RawNoiseBlock extends BlockBase {
  readonly kind: "RawNoise";
}

export type Block =
  | ParagraphBlock
  | ListBlock
  | ListItemBlock
  | CodeBlock
  | TableBlock
  | EmptyLineBlock
  | HeadingCandidateBlock
  | FigurePlaceholderBlock
  | FootnotePlaceholderBlock
  | CalloutBlock
  | RawNoiseBlock;

// ============================================================================
// Figures and captions
// ============================================================================

export interface Figure {
  readonly imagePath: string;
  readonly caption?: string;
  readonly alt?: string;
  readonly page: number;
  readonly bbox: BBox;
}

export interface CaptionCandidate {
  readonly text: string;
  readonly bbox: BBox;
  readonly page: number;
  readonly span: Span;
  readonly distance: number;
  readonly score: number;
  readonly isBelow: boolean;
  readonly matchesPattern: boolean;
}

export interface BoundFigure {
  readonly id: string; // "fig_000"
  readonly filename: string;
  readonly figure: Figure;
  readonly caption: string | null;
  readonly alt: string | null;
  readonly candidate: CaptionCandidate | null;
}

// ============================================================================
// Footnotes
// ============================================================================

export interface FootnoteMarker {
  readonly number: number;
  readonly span: Span;
}

export interface Footnote {
  readonly id: string; // "fn_001"
  readonly number: number;
  readonly text: string;
  readonly page: number;
  readonly spans: readonly Span[];
  readonly marker: FootnoteMarker | null;
}

// ============================================================================
// Document input
// ============================================================================

export interface DocumentInput {
  spans: Span[];
  figures: Figure[];
  /** Page height used for the footnote band; falls back to config */
  pageHeight?: number;
}
