/**
 * Zod schemas for data crossing the library boundary.
 *
 * These schemas define the contracts for:
 * - Runtime validation of caller-supplied documents (spans and figures)
 * - The manifest written next to the rendered sections
 * - TypeScript type inference for manifest rows
 */

import { z } from "zod/v4";
import { InputValidationError } from "../../errors";
import type { DocumentInput } from "./types";

// ============================================================================
// Document input
// ============================================================================

const bboxSchema = z
  .tuple([z.number(), z.number(), z.number(), z.number()])
  .refine(([x0, y0, x1, y1]) => x0 <= x1 && y0 <= y1, {
    message: "bbox must be [x0, y0, x1, y1] with x0 <= x1 and y0 <= y1",
  });

export const styleFlagsSchema = z.object({
  bold: z.boolean(),
  italic: z.boolean(),
  monospace: z.boolean().optional(),
  superscript: z.boolean().optional(),
});

export const spanSchema = z.object({
  text: z.string(),
  bbox: bboxSchema,
  fontName: z.string(),
  fontSize: z.number().positive(),
  styleFlags: styleFlagsSchema,
  page: z.number().int().min(1),
  orderIndex: z.number().int().min(0),
});

export const figureSchema = z.object({
  imagePath: z.string(),
  caption: z.string().optional(),
  alt: z.string().optional(),
  page: z.number().int().min(1),
  bbox: bboxSchema,
});

export const documentInputSchema = z.object({
  spans: z.array(spanSchema).superRefine((spans, ctx) => {
    for (let i = 1; i < spans.length; i++) {
      if (spans[i].orderIndex <= spans[i - 1].orderIndex) {
        ctx.addIssue({
          code: "custom",
          message: `orderIndex must be strictly increasing (${spans[i - 1].orderIndex} then ${spans[i].orderIndex})`,
          path: [i, "orderIndex"],
        });
      }
    }
  }),
  figures: z.array(figureSchema).default([]),
  pageHeight: z.number().positive().optional(),
});

/**
 * Validate an untrusted document. Throws InputValidationError listing every
 * offending field.
 */
export function parseDocumentInput(raw: unknown): DocumentInput {
  const result = documentInputSchema.safeParse(raw);
  if (!result.success) {
    throw InputValidationError.fromZodError(result.error);
  }
  return result.data;
}

// ============================================================================
// Manifest
// ============================================================================

export const SCHEMA_VERSION = "1.0.0";

export const sectionRowSchema = z.object({
  id: z.string().regex(/^sec_\d{4,}$/),
  slug: z.string(),
  parent_id: z.string().nullable(),
  level: z.number().int().min(1),
  order_index: z.number().int().min(1),
  title: z.string(),
  page_span: z.tuple([z.number().int(), z.number().int()]),
});

export const figureRowSchema = z.object({
  id: z.string().regex(/^fig_\d{3,}$/),
  filename: z.string(),
  caption: z.string(),
  alt: z.string(),
  page: z.number().int().min(1),
  bbox: z.tuple([z.number(), z.number(), z.number(), z.number()]),
});

export const footnoteRowSchema = z.object({
  id: z.string().regex(/^fn_\d{3,}$/),
  number: z.number().int(),
  text: z.string(),
  page: z.number().int().min(1),
});

export const manifestSchema = z.object({
  schema_version: z.literal(SCHEMA_VERSION),
  sections: z.array(sectionRowSchema),
  figures: z.array(figureRowSchema),
  footnotes: z.array(footnoteRowSchema),
  assets: z.array(z.string()),
  cross_references: z.array(z.string()),
  structural_hash: z.string().regex(/^sha256:[0-9a-f]{64}$/),
  generated_with: z.object({ tool: z.string(), version: z.string() }),
});

export type SectionRow = z.infer<typeof sectionRowSchema>;
export type FigureRow = z.infer<typeof figureRowSchema>;
export type FootnoteRow = z.infer<typeof footnoteRowSchema>;
export type Manifest = z.infer<typeof manifestSchema>;
