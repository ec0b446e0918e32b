/**
 * The structure pipeline as a graph of memoized nodes.
 *
 * spans ─┬─ lines
 *        ├─ footnotes ── blocks ─┐
 *        └─ captions ────────────┴─ placed ── tree ── manifest
 */

import { Observable, combineLatest, defer, map, of, switchMap, throwError } from "rxjs";
import type { Block, BoundFigure, Span } from "../core/types";
import { assembleBlocks } from "../blocks/assemble-blocks";
import { dominantFontSize } from "../blocks/classify-line";
import { figurePlaceholder, footnotePlaceholder, insertByPosition } from "../blocks/placeholders";
import { bindCaptions } from "../figures/bind-captions";
import { detectFootnotes, type FootnoteDetection } from "../footnotes/detect-footnotes";
import { mergeLines } from "../lines/merge-lines";
import { buildManifest } from "../manifest/build-manifest";
import type { Manifest } from "../core/schemas";
import { defineNode, type PipelineContext } from "../node";
import { buildTree } from "../tree/build-tree";
import type { SectionNode } from "../tree/section-node";
import { getCaptionWeights } from "../../config";
import type { StepName } from "./types";

/**
 * Run a synchronous stage with start/complete/error progress events.
 */
function step<T>(
  ctx: PipelineContext,
  name: StepName,
  compute: () => T,
  count?: (value: T) => number
): Observable<T> {
  return defer(() => {
    ctx.progress.emit({ type: "step-start", step: name });
    try {
      const value = compute();
      ctx.progress.emit({
        type: "step-complete",
        step: name,
        ...(count && { count: count(value) }),
      });
      return of(value);
    } catch (err) {
      ctx.progress.emit({
        type: "step-error",
        step: name,
        error: err instanceof Error ? err.message : String(err),
      });
      return throwError(() => err);
    }
  });
}

function isIncluded(ctx: PipelineContext): (page: number) => boolean {
  const excluded = new Set(ctx.config.exclude_pages);
  return (page) => !excluded.has(page);
}

// ============================================================================
// Nodes
// ============================================================================

export const spansNode = defineNode<Span[]>({
  name: "spans",
  resolve: (ctx) => {
    const included = isIncluded(ctx);
    return of(ctx.input.spans.filter((s) => included(s.page)));
  },
});

export const linesNode = defineNode<string[]>({
  name: "lines",
  resolve: (ctx) =>
    spansNode.resolve(ctx).pipe(
      switchMap((spans) =>
        step(ctx, "lines", () => mergeLines(spans, ctx.config.line_merge_y_tolerance), (l) => l.length)
      )
    ),
});

export const footnotesNode = defineNode<FootnoteDetection>({
  name: "footnotes",
  resolve: (ctx) =>
    spansNode.resolve(ctx).pipe(
      switchMap((spans) =>
        step(
          ctx,
          "footnotes",
          () =>
            detectFootnotes(spans, {
              pageHeight: ctx.input.pageHeight ?? ctx.config.page_height,
              bandRatio: ctx.config.footnote_band_ratio,
              lineTolerance: ctx.config.line_merge_y_tolerance,
              bodyFontSize: dominantFontSize(spans),
            }),
          (d) => d.footnotes.length
        )
      )
    ),
});

export const blocksNode = defineNode<Block[]>({
  name: "blocks",
  resolve: (ctx) =>
    footnotesNode.resolve(ctx).pipe(
      switchMap(({ bodySpans }) =>
        step(
          ctx,
          "blocks",
          () =>
            assembleBlocks(bodySpans, {
              lineMergeYTolerance: ctx.config.line_merge_y_tolerance,
              listIndentTolerance: ctx.config.list_indent_tolerance,
              codeMinLines: ctx.config.code_min_lines,
              codeIndentThreshold: ctx.config.code_indent_threshold,
              tableConfidenceMin: ctx.config.table_confidence_min,
              headingFontDelta: ctx.config.heading_font_delta,
              minHeadingFontSize: ctx.config.min_heading_font_size,
            }),
          (b) => b.length
        )
      )
    ),
});

export const captionsNode = defineNode<BoundFigure[]>({
  name: "captions",
  resolve: (ctx) =>
    spansNode.resolve(ctx).pipe(
      switchMap((spans) => {
        const included = isIncluded(ctx);
        const figures = ctx.input.figures.filter((f) => included(f.page));
        return step(
          ctx,
          "captions",
          () =>
            bindCaptions(figures, spans, {
              maxDistance: ctx.config.figure_caption_distance,
              weights: getCaptionWeights(ctx.config),
              imageFormat: ctx.config.image_format,
            }),
          (f) => f.filter((b) => b.caption !== null).length
        );
      })
    ),
});

/** Assembled blocks with figure and footnote placeholders merged in. */
export const placedBlocksNode = defineNode<Block[]>({
  name: "placed-blocks",
  resolve: (ctx) =>
    combineLatest([blocksNode.resolve(ctx), captionsNode.resolve(ctx), footnotesNode.resolve(ctx)]).pipe(
      map(([blocks, figures, detection]) =>
        insertByPosition(blocks, [
          ...figures.map(figurePlaceholder),
          ...detection.footnotes.map(footnotePlaceholder),
        ])
      )
    ),
});

export const treeNode = defineNode<SectionNode[]>({
  name: "tree",
  resolve: (ctx) =>
    placedBlocksNode.resolve(ctx).pipe(
      switchMap((blocks) =>
        step(
          ctx,
          "tree",
          () => buildTree(blocks, { numbering: ctx.numbering, slugs: ctx.slugs }),
          (roots) => roots.length
        )
      )
    ),
});

export const manifestNode = defineNode<Manifest>({
  name: "manifest",
  resolve: (ctx) =>
    combineLatest([treeNode.resolve(ctx), captionsNode.resolve(ctx), footnotesNode.resolve(ctx)]).pipe(
      switchMap(([roots, figures, detection]) =>
        step(ctx, "manifest", () =>
          buildManifest({ roots, figures, footnotes: detection.footnotes })
        )
      )
    ),
});
