import crypto from "node:crypto";
import fs from "node:fs";
import path from "node:path";
import type { BoundFigure, Footnote } from "../core/types";
import {
  SCHEMA_VERSION,
  type FigureRow,
  type FootnoteRow,
  type Manifest,
  type SectionRow,
} from "../core/schemas";
import { preorder, type SectionNode } from "../tree/section-node";
import { canonicalJson, type JsonValue } from "./canonical-json";

export const MANIFEST_FILENAME = "manifest.json";

export interface GeneratedWith {
  tool: string;
  version: string;
}

export const DEFAULT_GENERATED_WITH: GeneratedWith = { tool: "docstruct", version: "0.1.0" };

export interface ManifestInput {
  roots: readonly SectionNode[];
  figures?: readonly BoundFigure[];
  footnotes?: readonly Footnote[];
}

// ============================================================================
// Rows
// ============================================================================

export function sectionId(index: number): string {
  return `sec_${String(index).padStart(4, "0")}`;
}

/**
 * Flatten the tree in pre-order. Parents are found by node identity, so two
 * sections with the same title never get each other's children.
 */
export function buildSectionRows(roots: readonly SectionNode[]): SectionRow[] {
  const nodes = preorder(roots);
  const idOf = new Map<SectionNode, string>(nodes.map((node, i) => [node, sectionId(i)]));
  const parentOf = new Map<SectionNode, SectionNode>();
  for (const node of nodes) {
    for (const child of node.children) parentOf.set(child, node);
  }

  return nodes.map((node, i) => {
    const parent = parentOf.get(node);
    return {
      id: sectionId(i),
      slug: node.slug,
      parent_id: parent ? (idOf.get(parent) ?? null) : null,
      level: node.level,
      order_index: i + 1,
      title: node.title,
      page_span: [node.pages[0], node.pages[1]],
    };
  });
}

export function figureRow(bound: BoundFigure): FigureRow {
  const [x0, y0, x1, y1] = bound.figure.bbox;
  return {
    id: bound.id,
    filename: bound.filename,
    caption: bound.caption ?? "",
    alt: bound.alt ?? "",
    page: bound.figure.page,
    bbox: [x0, y0, x1, y1],
  };
}

export function footnoteRow(footnote: Footnote): FootnoteRow {
  return { id: footnote.id, number: footnote.number, text: footnote.text, page: footnote.page };
}

// ============================================================================
// Structural hash
// ============================================================================

function idSuffix(id: string): number {
  return Number(id.slice(id.lastIndexOf("_") + 1));
}

function byIdSuffix<T extends { id: string }>(rows: readonly T[]): T[] {
  return [...rows].sort((a, b) => idSuffix(a.id) - idSuffix(b.id));
}

/**
 * The part of the manifest the hash covers: sections by order_index, figures
 * and footnotes by id. Footnotes only appear when there are some; the
 * generator, assets and cross-references never do.
 */
export function structuralProjection(
  manifest: Pick<Manifest, "sections" | "figures" | "footnotes">
): { [key: string]: JsonValue } {
  const projection: { [key: string]: JsonValue } = {
    sections: [...manifest.sections].sort((a, b) => a.order_index - b.order_index),
    figures: byIdSuffix(manifest.figures),
  };
  if (manifest.footnotes.length > 0) {
    projection.footnotes = byIdSuffix(manifest.footnotes);
  }
  return projection;
}

export function computeStructuralHash(
  manifest: Pick<Manifest, "sections" | "figures" | "footnotes">
): string {
  const digest = crypto
    .createHash("sha256")
    .update(canonicalJson(structuralProjection(manifest)), "utf8")
    .digest("hex");
  return `sha256:${digest}`;
}

// ============================================================================
// Manifest
// ============================================================================

/**
 * Build the manifest with its fixed field order and structural hash.
 */
export function buildManifest(
  input: ManifestInput,
  generatedWith: GeneratedWith = DEFAULT_GENERATED_WITH
): Manifest {
  const sections = buildSectionRows(input.roots);
  const figures = (input.figures ?? []).map(figureRow);
  const footnotes = (input.footnotes ?? []).map(footnoteRow);
  return {
    schema_version: SCHEMA_VERSION,
    sections,
    figures,
    footnotes,
    assets: [],
    cross_references: [],
    structural_hash: computeStructuralHash({ sections, figures, footnotes }),
    generated_with: { tool: generatedWith.tool, version: generatedWith.version },
  };
}

/** Write manifest.json into outputDir and return its path. */
export function writeManifest(manifest: Manifest, outputDir: string): string {
  fs.mkdirSync(outputDir, { recursive: true });
  const manifestPath = path.join(outputDir, MANIFEST_FILENAME);
  fs.writeFileSync(manifestPath, JSON.stringify(manifest, null, 2) + "\n", "utf-8");
  return manifestPath;
}
