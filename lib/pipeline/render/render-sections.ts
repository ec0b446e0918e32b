import fs from "node:fs";
import path from "node:path";
import type { Block, ListMeta, TableMeta } from "../core/types";
import { formatPrefix, hasNumericPrefix } from "../slug";
import { preorder, type SectionNode } from "../tree/section-node";

export const BOOK_SUBDIR = "book";
export const FIGURES_SUBDIR = "figures";

const ORDERED_MARKER_RE = /^[\dA-Za-z]+[.)]$/;

export interface RenderedSection {
  filename: string;
  content: string;
  node: SectionNode;
}

// ============================================================================
// Blocks
// ============================================================================

function renderList(meta: ListMeta): string {
  return meta.items
    .map((item) => {
      const bullet = ORDERED_MARKER_RE.test(item.marker) ? item.marker : "-";
      return `${"  ".repeat(item.level)}${bullet} ${item.text}`;
    })
    .join("\n");
}

function tableCell(text: string): string {
  return text.replace(/\|/g, "\\|");
}

function renderTable(meta: TableMeta): string {
  const width = Math.max(0, ...meta.rows.map((row) => row.length));
  if (width === 0) return "";
  const line = (cells: readonly string[]) => {
    const padded = Array.from({ length: width }, (_, i) => tableCell(cells[i] ?? ""));
    return `| ${padded.join(" | ")} |`;
  };
  const [header, ...body] = meta.rows;
  return [line(header), line(Array.from({ length: width }, () => "---")), ...body.map(line)].join("\n");
}

/**
 * Markdown for one block, or null for blocks that render to nothing.
 */
export function renderBlock(block: Block): string | null {
  switch (block.kind) {
    case "Paragraph":
    case "HeadingCandidate":
      return block.text;
    case "List":
    case "ListItem":
      return renderList(block.meta);
    case "CodeBlock":
      return ["```" + (block.meta.language ?? ""), ...block.meta.dedentedLines, "```"].join("\n");
    case "Table":
      return renderTable(block.meta);
    case "Callout":
      return block.lines.map((line) => `> ${line}`).join("\n");
    case "FigurePlaceholder": {
      const { filename, caption, alt } = block.meta;
      const image = `![${alt ?? caption ?? ""}](../${FIGURES_SUBDIR}/${filename})`;
      return caption ? `${image}\n\n*${caption}*` : image;
    }
    case "FootnotePlaceholder":
      return `[^${block.meta.number}]: ${block.text}`;
    case "EmptyLine":
    case "RawNoise":
      return null;
    default: {
      const unreachable: never = block;
      throw new Error(`Unhandled block kind: ${JSON.stringify(unreachable)}`);
    }
  }
}

// ============================================================================
// Sections
// ============================================================================

/**
 * `<prefix>_<slug>.md` with a 1-based prefix, or `<slug>.md` when the slug
 * already starts with a number.
 */
export function sectionFilename(node: SectionNode, prefixIndex: number, width: number): string {
  const slug = node.slug || "untitled";
  if (hasNumericPrefix(slug)) return `${slug}.md`;
  return `${formatPrefix(prefixIndex, width)}_${slug}.md`;
}

export function renderSection(node: SectionNode): string {
  const body = node.blocks
    .map(renderBlock)
    .filter((text): text is string => text !== null && text.length > 0);
  if (body.length === 0) return `# ${node.title}\n`;
  return `# ${node.title}\n\n${body.join("\n\n")}\n`;
}

/**
 * Render every section in pre-order without touching the filesystem.
 */
export function planSections(roots: readonly SectionNode[], width: number): RenderedSection[] {
  return preorder(roots).map((node, i) => ({
    filename: sectionFilename(node, i + 1, width),
    content: renderSection(node),
    node,
  }));
}

/**
 * Write one Markdown file per section under `<outputDir>/book`.
 * Returns the written paths in pre-order.
 */
export function renderSections(
  roots: readonly SectionNode[],
  outputDir: string,
  width: number
): string[] {
  const bookDir = path.join(outputDir, BOOK_SUBDIR);
  fs.mkdirSync(bookDir, { recursive: true });
  return planSections(roots, width).map(({ filename, content }) => {
    const filePath = path.join(bookDir, filename);
    fs.writeFileSync(filePath, content, "utf-8");
    return filePath;
  });
}
