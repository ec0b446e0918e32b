/**
 * PDF Span Extraction
 *
 * Reads positioned text spans and image regions from a PDF using mupdf's
 * structured text. Coordinates stay in mupdf's top-down page space.
 */

import mupdf, { type Document as MupdfDocument } from "mupdf";
import { z } from "zod/v4";
import { PdfUnreadableError } from "../errors";
import type { BBox, DocumentInput, Figure, Span, StyleFlags } from "../pipeline/core/types";

// ============================================================================
// Types
// ============================================================================

export interface ExtractSpansInput {
  /** PDF file contents */
  pdfBuffer: Buffer | Uint8Array;
  /** Page range to extract (1-indexed, inclusive) */
  startPage?: number;
  endPage?: number;
  /** 1-based pages to leave out entirely */
  excludePages?: readonly number[];
  /** Label used in error messages, usually the file path */
  source?: string;
}

export interface ExtractProgress {
  page: number;
  totalPages: number;
}

// ============================================================================
// Structured text JSON
// ============================================================================

const STEXT_OPTIONS = "preserve-whitespace,preserve-images,preserve-spans";
/** Image regions smaller than this on either side are decoration */
const MIN_FIGURE_SIDE = 20;

// mupdf.js writes bboxes as {x, y, w, h}; some builds emit [x0, y0, x1, y1]
const rectSchema = z.union([
  z.object({ x: z.number(), y: z.number(), w: z.number(), h: z.number() }),
  z.tuple([z.number(), z.number(), z.number(), z.number()]),
]);

const stextLineSchema = z.object({
  bbox: rectSchema,
  text: z.string(),
  font: z.object({
    name: z.string(),
    family: z.string().optional(),
    weight: z.string().optional(),
    style: z.string().optional(),
    size: z.number(),
  }),
});

const stextBlockSchema = z.object({
  type: z.string(),
  bbox: rectSchema,
  lines: z.array(stextLineSchema).optional(),
});

const stextPageSchema = z.object({ blocks: z.array(stextBlockSchema) });

type StextLine = z.infer<typeof stextLineSchema>;

function toBBox(rect: z.infer<typeof rectSchema>): BBox {
  if (Array.isArray(rect)) return [rect[0], rect[1], rect[2], rect[3]];
  return [rect.x, rect.y, rect.x + rect.w, rect.y + rect.h];
}

export function styleFlagsFor(font: StextLine["font"]): StyleFlags {
  return {
    bold: font.weight === "bold" || /Bold|Black|Heavy|Semibold/i.test(font.name),
    italic: font.style === "italic" || /Italic|Oblique/i.test(font.name),
    monospace: font.family === "monospace" || /Courier|Mono|Consol/i.test(font.name),
  };
}

// ============================================================================
// Main extraction function
// ============================================================================

/**
 * Extract spans in reading order plus image regions as uncaptioned figures.
 * Order indices increase strictly across the whole document; excluded pages
 * contribute nothing. The page height is taken from the first page.
 */
export function extractSpans(
  input: ExtractSpansInput,
  onProgress?: (progress: ExtractProgress) => void
): DocumentInput {
  const source = input.source ?? "<buffer>";
  const { doc, totalPagesInPdf } = openPdfFromBuffer(input.pdfBuffer, source);
  const excluded = new Set(input.excludePages ?? []);

  const start = (input.startPage ?? 1) - 1;
  const end = Math.min(input.endPage ?? totalPagesInPdf, totalPagesInPdf);

  const spans: Span[] = [];
  const figures: Figure[] = [];
  let pageHeight: number | undefined;

  for (let i = start; i < end; i++) {
    const pageNumber = i + 1;
    onProgress?.({ page: i - start + 1, totalPages: end - start });
    if (excluded.has(pageNumber)) continue;

    const page = doc.loadPage(i);
    const [, y0, , y1] = page.getBounds();
    pageHeight ??= y1 - y0;

    const parsed = stextPageSchema.safeParse(
      JSON.parse(page.toStructuredText(STEXT_OPTIONS).asJSON())
    );
    if (!parsed.success) {
      throw new PdfUnreadableError(source, `unexpected structured text on page ${pageNumber}`);
    }

    let imageIndex = 0;
    for (const block of parsed.data.blocks) {
      if (block.type === "image") {
        const bbox = toBBox(block.bbox);
        if (bbox[2] - bbox[0] < MIN_FIGURE_SIDE || bbox[3] - bbox[1] < MIN_FIGURE_SIDE) continue;
        figures.push({ imagePath: `p${pageNumber}-img${imageIndex++}`, page: pageNumber, bbox });
        continue;
      }
      for (const line of block.lines ?? []) {
        if (!line.text.trim()) continue;
        spans.push({
          text: line.text,
          bbox: toBBox(line.bbox),
          fontName: line.font.name,
          fontSize: line.font.size,
          styleFlags: styleFlagsFor(line.font),
          page: pageNumber,
          orderIndex: spans.length,
        });
      }
    }
  }

  return { spans, figures, ...(pageHeight !== undefined && { pageHeight }) };
}

// ============================================================================
// Internal helpers
// ============================================================================

function openPdfFromBuffer(
  buffer: Buffer | Uint8Array,
  source: string
): { doc: MupdfDocument; totalPagesInPdf: number } {
  // Suppress mupdf stderr warnings
  const origWrite = process.stderr.write;
  process.stderr.write = () => true;
  try {
    const doc = mupdf.Document.openDocument(buffer, "application/pdf");
    return { doc, totalPagesInPdf: doc.countPages() };
  } catch (err) {
    throw new PdfUnreadableError(source, err instanceof Error ? err.message : String(err));
  } finally {
    process.stderr.write = origWrite;
  }
}
