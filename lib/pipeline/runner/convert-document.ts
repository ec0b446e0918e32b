/**
 * Document Runner
 *
 * Runs the structure pipeline for one document:
 * 1. Input validation
 * 2. Line merging, footnote detection, block assembly, caption binding
 * 3. Section tree (headings, numbering, slugs, freeze)
 * 4. Manifest with structural hash
 */

import type { Block, BoundFigure, Footnote } from "../core/types";
import type { Manifest } from "../core/schemas";
import { parseDocumentInput } from "../core/schemas";
import type { Diagnostic } from "../diagnostics";
import { createContext, resolveNodeSync } from "../node";
import type { SectionNode } from "../tree/section-node";
import { defaultConfig, type StructureConfig } from "../../config";
import {
  blocksNode,
  captionsNode,
  footnotesNode,
  linesNode,
  manifestNode,
  placedBlocksNode,
  treeNode,
} from "./nodes";
import type { Progress } from "./types";

export interface ConvertOptions {
  config?: StructureConfig;
  progress?: Progress;
  /** Name used in progress output */
  label?: string;
}

export interface ConversionResult {
  roots: SectionNode[];
  /** Assembled blocks, before placeholders are merged in */
  blocks: Block[];
  /** Block stream the tree was built from */
  placedBlocks: Block[];
  lines: string[];
  figures: BoundFigure[];
  footnotes: Footnote[];
  manifest: Manifest;
  diagnostics: readonly Diagnostic[];
}

/**
 * Convert an ordered span stream into a frozen section tree and manifest.
 *
 * The input is validated first; a malformed span or an orderIndex that does
 * not strictly increase throws InputValidationError before any stage runs.
 * Each call gets its own numbering processor and slug allocator.
 */
export function convertDocument(
  input: unknown,
  options: ConvertOptions = {}
): ConversionResult {
  const document = parseDocumentInput(input);
  const ctx = createContext(options.label ?? "document", {
    input: document,
    config: options.config ?? defaultConfig(),
    progress: options.progress,
  });

  const manifest = resolveNodeSync(manifestNode, ctx);
  for (const diagnostic of ctx.diagnostics.all()) {
    ctx.progress.emit({ type: "diagnostic", diagnostic });
  }

  return {
    roots: resolveNodeSync(treeNode, ctx),
    blocks: resolveNodeSync(blocksNode, ctx),
    placedBlocks: resolveNodeSync(placedBlocksNode, ctx),
    lines: resolveNodeSync(linesNode, ctx),
    figures: resolveNodeSync(captionsNode, ctx),
    footnotes: resolveNodeSync(footnotesNode, ctx).footnotes,
    manifest,
    diagnostics: ctx.diagnostics.all(),
  };
}
