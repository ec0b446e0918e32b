import { describe, it, expect } from "vitest";
import { buildTree } from "../build-tree.js";
import { SectionNode, preorder } from "../section-node.js";
import { NumberingProcessor } from "../../headings/numbering.js";
import { Diagnostics } from "../../diagnostics.js";
import { SlugAllocator } from "../../slug.js";
import { FrozenNodeError } from "../../../errors.js";
import type { Block } from "../../core/types.js";
import { makeHeadingBlock, makeParagraphBlock } from "../../__tests__/make-block.js";

function build(blocks: Block[]) {
  const diagnostics = new Diagnostics();
  return buildTree(blocks, {
    numbering: new NumberingProcessor(
      {
        validateGaps: true,
        allowChapterResets: false,
        maxDepth: 6,
        appendixRequiresPageBreak: true,
      },
      diagnostics
    ),
    slugs: new SlugAllocator(2),
  });
}

describe("buildTree", () => {
  it("nests sections under chapters in pre-order", () => {
    const roots = build([
      makeHeadingBlock("Chapter 1 Introduction"),
      makeHeadingBlock("1.1 Background"),
      makeHeadingBlock("1.2 Methodology"),
      makeHeadingBlock("Chapter 2 Results"),
    ]);

    expect(roots).toHaveLength(2);
    expect(roots[0].children).toHaveLength(2);
    expect(roots[1].children).toHaveLength(0);
    expect(preorder(roots).map((n) => n.title)).toEqual([
      "Chapter 1 Introduction",
      "1.1 Background",
      "1.2 Methodology",
      "Chapter 2 Results",
    ]);
    expect(preorder(roots).map((n) => n.level)).toEqual([1, 2, 2, 1]);
  });

  it("lists parents before children with strictly deeper levels", () => {
    const roots = build([
      makeHeadingBlock("1 Scope"),
      makeHeadingBlock("1.1 Terms"),
      makeHeadingBlock("1.1.1 Symbols"),
      makeHeadingBlock("1.2 Units"),
      makeHeadingBlock("2 Requirements"),
      makeHeadingBlock("2.1.1 Skipped Level"),
      makeHeadingBlock("2.2 Limits"),
    ]);
    const order = preorder(roots);
    const position = new Map(order.map((n, i) => [n, i]));
    for (const node of order) {
      for (const child of node.children) {
        expect(position.get(child)).toBeGreaterThan(position.get(node) ?? Infinity);
        expect(child.level).toBeGreaterThan(node.level);
      }
    }
    expect(roots.map((r) => r.title)).toEqual(["1 Scope", "2 Requirements"]);
    expect(roots[1].children.map((c) => c.title)).toEqual(["2.1.1 Skipped Level", "2.2 Limits"]);
  });

  it("attaches content to the most recent heading and drops front matter", () => {
    const front = makeParagraphBlock("Title page text");
    const intro = makeParagraphBlock("Opening paragraph");
    const detail = makeParagraphBlock("Detail paragraph");
    const roots = build([
      front,
      makeHeadingBlock("Chapter 1 Start"),
      intro,
      makeHeadingBlock("1.1 Detail"),
      detail,
    ]);
    expect(roots[0].blocks).toEqual([intro]);
    expect(roots[0].children[0].blocks).toEqual([detail]);
    expect(preorder(roots).flatMap((n) => n.blocks)).not.toContain(front);
  });

  it("keeps gate-failing candidates as content", () => {
    const stray = makeHeadingBlock("Large but ordinary words");
    const roots = build([makeHeadingBlock("Chapter 1 Start"), stray]);
    expect(roots[0].blocks).toEqual([stray]);
  });

  it("allocates prefixed slugs in heading order", () => {
    const roots = build([
      makeHeadingBlock("GENERAL NOTES"),
      makeHeadingBlock("GENERAL NOTES"),
      makeHeadingBlock("SCOPE"),
    ]);
    expect(preorder(roots).map((n) => n.slug)).toEqual([
      "00-general-notes",
      "01-general-notes-2",
      "02-scope",
    ]);
  });

  it("links same-titled sections by identity", () => {
    const roots = build([
      makeHeadingBlock("Chapter 1 Notes"),
      makeHeadingBlock("1.1 Notes"),
      makeHeadingBlock("Chapter 2 Notes"),
      makeHeadingBlock("2.1 Notes"),
    ]);
    expect(roots[0].children[0]).not.toBe(roots[1].children[0]);
    expect(roots[1].children[0].title).toBe("2.1 Notes");
  });

  it("grows page spans to cover content", () => {
    const roots = build([
      makeHeadingBlock("Chapter 1 Start", { page: 2 }),
      makeParagraphBlock("continues", { page: 4 }),
    ]);
    expect(roots[0].pages).toEqual([2, 4]);
  });

  it("returns no roots without headings", () => {
    expect(build([makeParagraphBlock("only text")])).toEqual([]);
    expect(build([])).toEqual([]);
  });

  it("freezes the whole tree", () => {
    const roots = build([makeHeadingBlock("Chapter 1 Start"), makeHeadingBlock("1.1 Child")]);
    const child = roots[0].children[0];
    expect(roots[0].frozen).toBe(true);
    expect(child.frozen).toBe(true);
    expect(() => child.addBlock(makeParagraphBlock("late"))).toThrow(FrozenNodeError);
    expect(() =>
      roots[0].addChild(new SectionNode({ title: "x", level: 2, pages: [1, 1] }))
    ).toThrow(FrozenNodeError);
  });

  it("freezes the metadata of heading and content blocks", () => {
    const heading = makeHeadingBlock("Chapter 1 Start");
    const plain = makeHeadingBlock("Plain words that fail the gate because this line goes on");
    const roots = build([heading, makeParagraphBlock("body"), plain]);

    expect(roots[0].heading).toBe(heading);
    expect(heading.meta.level).toBe(1);
    expect(Object.isFrozen(heading.meta)).toBe(true);
    expect(() => {
      heading.meta.level = 3;
    }).toThrow(TypeError);
    expect(roots[0].blocks.every((b) => Object.isFrozen(b))).toBe(true);
  });
});

describe("SectionNode", () => {
  it("rejects every mutation after freeze", () => {
    const node = new SectionNode({ title: "Intro", level: 1, pages: [1, 1] });
    node.addBlock(makeParagraphBlock("before"));
    node.freeze();

    expect(() => node.addChild(new SectionNode({ title: "c", level: 2, pages: [1, 1] }))).toThrow(
      FrozenNodeError
    );
    expect(() => node.addBlock(makeParagraphBlock("after"))).toThrow(FrozenNodeError);
    expect(() => node.setMeta({ headingFontSize: 20 })).toThrow(FrozenNodeError);
    expect(() => node.setSlug("other")).toThrow(FrozenNodeError);
    expect(node.blocks).toHaveLength(1);
    expect(Object.isFrozen(node.blocks)).toBe(true);
  });

  it("names the node and operation in the error", () => {
    const node = new SectionNode({ title: "Intro", level: 1, pages: [1, 1] });
    node.freeze();
    expect(() => node.addBlock(makeParagraphBlock("x"))).toThrow(
      'Section "Intro" is frozen; addBlock is not allowed'
    );
  });

  it("freezes descendants recursively", () => {
    const parent = new SectionNode({ title: "P", level: 1, pages: [1, 1] });
    const child = new SectionNode({ title: "C", level: 2, pages: [1, 1] });
    parent.addChild(child);
    parent.freeze();
    expect(child.frozen).toBe(true);
  });

  it("requires a positive level", () => {
    expect(() => new SectionNode({ title: "bad", level: 0, pages: [1, 1] })).toThrow(RangeError);
  });
});
