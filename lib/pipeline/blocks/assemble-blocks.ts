/**
 * Block assembly: classify merged lines and fold runs of them into typed
 * blocks.
 *
 * Lines are classified one at a time (see classify-line.ts), then runs are
 * resolved:
 * - code runs may contain blank lines; too-short runs become paragraph text
 * - table-candidate runs of two or more lines are scored, and fall back to
 *   a fenced code block below the confidence minimum
 * - list runs get nesting levels from marker x positions
 * - every heading line is its own block
 * - other adjacent lines of the same kind merge
 */

import { pageSpanOf, unionBBox } from "../core/geometry";
import type { Block, Line, Span } from "../core/types";
import { groupLines } from "../lines/merge-lines";
import { repairHyphenation } from "../lines/hyphenation";
import { classifyLine, dominantFontSize, type LineClass } from "./classify-line";
import { dedentLines } from "./code";
import { buildListMeta, type ListLine } from "./lists";
import { scoreTable, splitCells } from "./tables";

export interface AssembleOptions {
  lineMergeYTolerance: number;
  listIndentTolerance: number;
  codeMinLines: number;
  codeIndentThreshold: number;
  tableConfidenceMin: number;
  headingFontDelta: number;
  minHeadingFontSize: number | null;
}

interface ClassifiedLine {
  line: Line;
  cls: LineClass;
}

type MergeableKind = "paragraph" | "empty" | "list" | "callout" | "noise";

type Segment =
  | { kind: MergeableKind; lines: ClassifiedLine[] }
  | { kind: "heading"; lines: ClassifiedLine[]; fontSize: number }
  | { kind: "code"; lines: ClassifiedLine[] }
  | { kind: "table"; lines: ClassifiedLine[] };

export function assembleBlocks(spans: readonly Span[], opts: AssembleOptions): Block[] {
  if (spans.length === 0) return [];

  const lines = groupLines(spans, opts.lineMergeYTolerance);
  const bodyFontSize = dominantFontSize(spans);
  const classified: ClassifiedLine[] = lines.map((line) => ({
    line,
    cls: classifyLine(line, {
      codeIndentThreshold: opts.codeIndentThreshold,
      bodyFontSize,
      headingFontDelta: opts.headingFontDelta,
      minHeadingFontSize: opts.minHeadingFontSize,
    }),
  }));

  return resolveSegments(classified, opts.codeMinLines).map((segment) =>
    toBlock(segment, opts)
  );
}

function resolveSegments(lines: readonly ClassifiedLine[], codeMinLines: number): Segment[] {
  const segments: Segment[] = [];

  const pushMergeable = (kind: MergeableKind, item: ClassifiedLine) => {
    const last = segments.at(-1);
    // Every blank line is its own EmptyLine block
    if (last && last.kind === kind && kind !== "empty") {
      last.lines.push(item);
    } else {
      segments.push({ kind, lines: [item] });
    }
  };

  let i = 0;
  while (i < lines.length) {
    const item = lines[i];
    switch (item.cls.kind) {
      case "code": {
        let end = i;
        let j = i;
        while (j < lines.length && (lines[j].cls.kind === "code" || lines[j].cls.kind === "empty")) {
          if (lines[j].cls.kind === "code") end = j;
          j++;
        }
        const run = lines.slice(i, end + 1);
        const codeCount = run.filter((l) => l.cls.kind === "code").length;
        if (codeCount >= codeMinLines) {
          segments.push({ kind: "code", lines: run });
        } else {
          for (const l of run) pushMergeable(l.cls.kind === "empty" ? "empty" : "paragraph", l);
        }
        i = end + 1;
        break;
      }
      case "table": {
        let j = i;
        while (j < lines.length && lines[j].cls.kind === "table") j++;
        const run = lines.slice(i, j);
        if (run.length >= 2) {
          segments.push({ kind: "table", lines: run });
        } else {
          pushMergeable("paragraph", item);
        }
        i = j;
        break;
      }
      case "heading":
        segments.push({ kind: "heading", lines: [item], fontSize: item.cls.fontSize });
        i++;
        break;
      default:
        pushMergeable(item.cls.kind, item);
        i++;
    }
  }
  return segments;
}

function baseOf(lines: readonly ClassifiedLine[]) {
  const spans = lines.flatMap((l) => l.line.spans);
  return {
    spans,
    bbox: unionBBox(lines.map((l) => l.line.bbox)),
    pageSpan: pageSpanOf(spans),
    lines: lines.map((l) => l.line.text),
  };
}

function paragraphText(lines: readonly ClassifiedLine[]): string {
  return repairHyphenation(lines.map((l) => l.line.text.trim()).filter(Boolean)).join(" ");
}

function rawCodeLine({ line, cls }: ClassifiedLine): string {
  if (cls.kind !== "code") return "";
  return " ".repeat(cls.indent) + line.text;
}

function toBlock(segment: Segment, opts: AssembleOptions): Block {
  const base = baseOf(segment.lines);

  switch (segment.kind) {
    case "paragraph":
      return { kind: "Paragraph", ...base, text: paragraphText(segment.lines) };

    case "empty":
      return { kind: "EmptyLine", ...base, text: "" };

    case "noise":
      return { kind: "RawNoise", ...base, text: base.lines.join(" ") };

    case "callout": {
      const first = segment.lines[0].cls;
      const label = first.kind === "callout" ? first.label : "Note";
      return { kind: "Callout", ...base, text: paragraphText(segment.lines), meta: { label } };
    }

    case "heading":
      return {
        kind: "HeadingCandidate",
        ...base,
        text: segment.lines[0].line.text.trim(),
        meta: { fontSize: segment.fontSize, level: null },
      };

    case "list": {
      const listLines: ListLine[] = [];
      for (const { line, cls } of segment.lines) {
        if (cls.kind !== "list") continue;
        listLines.push({
          text: cls.marker.body,
          marker: cls.marker.marker,
          spans: line.spans,
          xPosition: cls.xPosition,
        });
      }
      const meta = buildListMeta(listLines, opts.listIndentTolerance);
      const text = base.lines.join("\n");
      return listLines.length === 1
        ? { kind: "ListItem", ...base, text, meta }
        : { kind: "List", ...base, text, meta };
    }

    case "code": {
      const dedented = dedentLines(segment.lines.map(rawCodeLine));
      return {
        kind: "CodeBlock",
        ...base,
        text: dedented.join("\n"),
        meta: { language: null, dedentedLines: dedented, format: "indented" },
      };
    }

    case "table": {
      const cells = segment.lines.map((l) => splitCells(l.line));
      const score = scoreTable(cells);
      const rows = cells.map((row) => row.map((c) => c.text));
      if (score.confidence >= opts.tableConfidenceMin) {
        return {
          kind: "Table",
          ...base,
          text: rows.map((r) => r.join(" | ")).join("\n"),
          meta: { rows, confidence: score.confidence },
        };
      }
      const dedented = dedentLines(rows.map((r) => r.join("  ")));
      return {
        kind: "CodeBlock",
        ...base,
        text: dedented.join("\n"),
        meta: {
          language: null,
          dedentedLines: dedented,
          format: "fenced_fallback",
          tableConfidence: score.confidence,
        },
      };
    }
  }
}
