#!/usr/bin/env node
/**
 * Structure CLI
 *
 * Convert a PDF (or a JSON span dump) into a section tree, a manifest and
 * one Markdown stub per section.
 *
 * Usage:
 *   npm run convert -- convert <input> --out <dir>   Write manifest.json and book/
 *   npm run convert -- dry-run <input>               Print the outline only
 */

import fs from "node:fs";
import path from "node:path";
import { loadConfig, resolveConfig, type StructureConfig } from "../config";
import { isStructureError } from "../errors";
import { extractSpans } from "../pdf/extract-spans";
import { writeManifest } from "../pipeline/manifest/build-manifest";
import { renderSections } from "../pipeline/render/render-sections";
import {
  convertDocument,
  createConsoleProgress,
  nullProgress,
  type ConversionResult,
  type Progress,
} from "../pipeline/runner";
import { preorder } from "../pipeline/tree/section-node";
import { parseFlags, type ParsedFlags } from "./flags";

const USAGE = `Usage: npm run convert -- <command> <input> [options]

Commands:
  convert <input>     Build the section tree and write output files
  dry-run <input>     Build the section tree and print its outline

<input> is a .pdf file or a .json file holding { spans, figures, pageHeight? }.

Options:
  --out, -o <dir>         Output directory (required for convert)
  --config <file>         YAML or JSON config (default: ./config.yaml)
  --start-page <n>        First PDF page to read
  --end-page <n>          Last PDF page to read
  --exclude-pages <list>  Comma separated 1-based pages to skip
  --json                  dry-run: print the manifest as JSON`;

function buildConfig(flags: ParsedFlags): StructureConfig {
  const base = loadConfig(flags.configPath);
  if (flags.excludePages.length === 0) return base;
  return resolveConfig(
    { exclude_pages: [...new Set([...base.exclude_pages, ...flags.excludePages])] },
    base
  );
}

function readInput(
  inputPath: string,
  flags: ParsedFlags,
  config: StructureConfig,
  progress: Progress
): unknown {
  if (path.extname(inputPath).toLowerCase() === ".json") {
    return JSON.parse(fs.readFileSync(inputPath, "utf-8"));
  }

  progress.emit({ type: "step-start", step: "extract" });
  const document = extractSpans(
    {
      pdfBuffer: fs.readFileSync(inputPath),
      startPage: flags.startPage,
      endPage: flags.endPage,
      excludePages: config.exclude_pages,
      source: inputPath,
    },
    ({ page, totalPages }) => {
      if (page === totalPages || page % 25 === 0) {
        progress.emit({ type: "step-progress", step: "extract", message: "reading pages", page, totalPages });
      }
    }
  );
  progress.emit({ type: "step-complete", step: "extract", count: document.spans.length });
  return document;
}

function printOutline(result: ConversionResult): void {
  for (const node of preorder(result.roots)) {
    const indent = "  ".repeat(node.level - 1);
    const [first, last] = node.pages;
    console.log(`${indent}${node.slug}  "${node.title}"  p.${first}-${last}`);
  }
  console.log();
  console.log(`Sections:  ${result.manifest.sections.length}`);
  console.log(`Figures:   ${result.figures.length}`);
  console.log(`Footnotes: ${result.footnotes.length}`);
  console.log(`Warnings:  ${result.diagnostics.length}`);
  console.log(`Hash:      ${result.manifest.structural_hash}`);
}

async function main() {
  const args = process.argv.slice(2);
  const command = args[0];

  if (!command || command === "--help" || command === "-h") {
    console.log(USAGE);
    process.exit(0);
  }

  const flags = parseFlags(args.slice(1));
  const [inputPath] = flags.positional;

  switch (command) {
    case "convert": {
      if (!inputPath || !flags.outDir) {
        console.error("Usage: npm run convert -- convert <input> --out <dir>");
        process.exit(1);
      }
      if (!fs.existsSync(inputPath)) {
        console.error(`Input not found: ${inputPath}`);
        process.exit(1);
      }

      const config = buildConfig(flags);
      const progress = createConsoleProgress();
      const input = readInput(inputPath, flags, config, progress);
      const result = convertDocument(input, {
        config,
        progress,
        label: path.basename(inputPath),
      });

      progress.emit({ type: "step-start", step: "render" });
      const files = renderSections(result.roots, flags.outDir, config.slug_prefix_width);
      progress.emit({ type: "step-complete", step: "render", count: files.length });
      const manifestPath = writeManifest(result.manifest, flags.outDir);

      console.log(`\nWrote ${files.length} section files and ${manifestPath}`);
      console.log(`Hash: ${result.manifest.structural_hash}`);
      break;
    }

    case "dry-run": {
      if (!inputPath) {
        console.error("Usage: npm run convert -- dry-run <input>");
        process.exit(1);
      }
      if (!fs.existsSync(inputPath)) {
        console.error(`Input not found: ${inputPath}`);
        process.exit(1);
      }

      const config = buildConfig(flags);
      const progress = flags.json ? nullProgress : createConsoleProgress();
      const input = readInput(inputPath, flags, config, progress);
      const result = convertDocument(input, {
        config,
        progress,
        label: path.basename(inputPath),
      });

      if (flags.json) {
        console.log(JSON.stringify(result.manifest, null, 2));
      } else {
        console.log();
        printOutline(result);
      }
      break;
    }

    default:
      console.error(`Unknown command: ${command}\n`);
      console.log(USAGE);
      process.exit(1);
  }
}

main().catch((err: unknown) => {
  if (isStructureError(err)) {
    console.error(`\nConversion failed [${err.code}]: ${err.message}`);
    for (const detail of err.details ?? []) {
      console.error(`  ${detail.field ? `${detail.field}: ` : ""}${detail.message}`);
    }
    process.exit(err.exitCode);
  }
  console.error("\nConversion failed:", err instanceof Error ? err.message : String(err));
  process.exit(1);
});
