import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  buildManifest,
  buildSectionRows,
  computeStructuralHash,
  figureRow,
  structuralProjection,
  writeManifest,
} from "../build-manifest.js";
import { canonicalJson } from "../canonical-json.js";
import { manifestSchema } from "../../core/schemas.js";
import { SectionNode } from "../../tree/section-node.js";
import type { BoundFigure, Footnote } from "../../core/types.js";

function node(title: string, level: number, slug: string): SectionNode {
  return new SectionNode({ title, level, pages: [1, 1], slug });
}

function twoChapters(secondTitle = "Chapter 2 More"): SectionNode[] {
  const first = node("Chapter 1 Intro", 1, "00-chapter-1-intro");
  first.addChild(node("Notes", 2, "01-notes"));
  const second = node(secondTitle, 1, "02-chapter-2-more");
  second.addChild(node("Notes", 2, "03-notes-2"));
  return [first, second];
}

function boundFigure(index: number): BoundFigure {
  const id = `fig_${String(index).padStart(3, "0")}`;
  return {
    id,
    filename: `${id}.png`,
    figure: { imagePath: `img/${index}.png`, page: 1, bbox: [0, 0, 10, 10] },
    caption: null,
    alt: null,
    candidate: null,
  };
}

const FOOTNOTE: Footnote = {
  id: "fn_001",
  number: 1,
  text: "A note.",
  page: 1,
  spans: [],
  marker: null,
};

describe("canonicalJson", () => {
  it("sorts keys at every depth without whitespace", () => {
    expect(canonicalJson({ b: 1, a: { d: [1, "é"], c: null } })).toBe(
      '{"a":{"c":null,"d":[1,"é"]},"b":1}'
    );
  });
});

describe("buildSectionRows", () => {
  it("links parents by identity in pre-order", () => {
    const rows = buildSectionRows(twoChapters());
    expect(rows.map((r) => [r.id, r.parent_id, r.order_index])).toEqual([
      ["sec_0000", null, 1],
      ["sec_0001", "sec_0000", 2],
      ["sec_0002", null, 3],
      ["sec_0003", "sec_0002", 4],
    ]);
  });

  it("projects the section fields", () => {
    const [row] = buildSectionRows([node("SCOPE", 1, "00-scope")]);
    expect(row).toEqual({
      id: "sec_0000",
      slug: "00-scope",
      parent_id: null,
      level: 1,
      order_index: 1,
      title: "SCOPE",
      page_span: [1, 1],
    });
  });
});

describe("figureRow", () => {
  it("writes missing caption and alt as empty strings", () => {
    expect(figureRow(boundFigure(0))).toEqual({
      id: "fig_000",
      filename: "fig_000.png",
      caption: "",
      alt: "",
      page: 1,
      bbox: [0, 0, 10, 10],
    });
  });
});

describe("computeStructuralHash", () => {
  it("hashes the canonical projection", () => {
    const manifest = buildManifest({ roots: [node("SCOPE", 1, "00-scope")] });
    expect(canonicalJson(structuralProjection(manifest))).toBe(
      '{"figures":[],"sections":[{"id":"sec_0000","level":1,"order_index":1,"page_span":[1,1],"parent_id":null,"slug":"00-scope","title":"SCOPE"}]}'
    );
    expect(manifest.structural_hash).toBe(
      "sha256:25b5ae4ba0a6151c9cdef2c8e2d84b9260ba156456df76526f5a6efd0fc7a67a"
    );
  });

  it("is stable across runs and generator versions", () => {
    const a = buildManifest({ roots: twoChapters() }, { tool: "docstruct", version: "0.1.0" });
    const b = buildManifest({ roots: twoChapters() }, { tool: "docstruct", version: "9.9.9" });
    expect(a.structural_hash).toBe(b.structural_hash);
    expect(a.generated_with).not.toEqual(b.generated_with);
  });

  it("ignores the order of figure and footnote rows", () => {
    const manifest = buildManifest({
      roots: twoChapters(),
      figures: [boundFigure(0), boundFigure(1), boundFigure(2)],
    });
    const shuffled = {
      sections: [...manifest.sections].reverse(),
      figures: [...manifest.figures].reverse(),
      footnotes: manifest.footnotes,
    };
    expect(computeStructuralHash(shuffled)).toBe(manifest.structural_hash);
  });

  it("changes when a title changes", () => {
    const a = buildManifest({ roots: twoChapters() });
    const b = buildManifest({ roots: twoChapters("Chapter 2 Renamed") });
    expect(a.structural_hash).not.toBe(b.structural_hash);
  });

  it("leaves footnotes out of the hash only when there are none", () => {
    const without = buildManifest({ roots: twoChapters() });
    const withNote = buildManifest({ roots: twoChapters(), footnotes: [FOOTNOTE] });
    expect(structuralProjection(without)).not.toHaveProperty("footnotes");
    expect(structuralProjection(withNote)).toHaveProperty("footnotes");
    expect(without.structural_hash).not.toBe(withNote.structural_hash);
  });
});

describe("buildManifest", () => {
  it("emits fields in the fixed order and matches the schema", () => {
    const manifest = buildManifest({
      roots: twoChapters(),
      figures: [boundFigure(0)],
      footnotes: [FOOTNOTE],
    });
    expect(Object.keys(manifest)).toEqual([
      "schema_version",
      "sections",
      "figures",
      "footnotes",
      "assets",
      "cross_references",
      "structural_hash",
      "generated_with",
    ]);
    expect(manifestSchema.safeParse(manifest).success).toBe(true);
    expect(manifest.footnotes).toEqual([{ id: "fn_001", number: 1, text: "A note.", page: 1 }]);
  });

  it("handles an empty tree", () => {
    const manifest = buildManifest({ roots: [] });
    expect(manifest.sections).toEqual([]);
    expect(manifestSchema.safeParse(manifest).success).toBe(true);
  });
});

describe("writeManifest", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "manifest-test-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("writes indented JSON that reads back equal", () => {
    const manifest = buildManifest({ roots: twoChapters() });
    const written = writeManifest(manifest, path.join(tmpDir, "out"));
    expect(written).toBe(path.join(tmpDir, "out", "manifest.json"));
    expect(JSON.parse(fs.readFileSync(written, "utf-8"))).toEqual(manifest);
  });
});
