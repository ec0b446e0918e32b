import { describe, it, expect } from "vitest";
import {
  bindCaptions,
  compareCandidates,
  findCaptionCandidates,
  matchesCaptionPattern,
  scoreCaption,
  selectCaption,
  type CaptionOptions,
} from "../bind-captions.js";
import { FigureFilenameAllocator, figureId } from "../figure-files.js";
import type { Figure } from "../../core/types.js";
import { makeSpan } from "../../__tests__/make-span.js";

const OPTIONS: CaptionOptions = {
  maxDistance: 150,
  weights: { distance: 0.4, position: 0.3, pattern: 0.3 },
  imageFormat: "png",
};

function figure(overrides: Partial<Figure> = {}): Figure {
  return { imagePath: "img/chart.png", page: 1, bbox: [100, 200, 300, 400], ...overrides };
}

describe("matchesCaptionPattern", () => {
  it("accepts figure, table and diagram labels", () => {
    expect(matchesCaptionPattern("Figure 1: Overview")).toBe(true);
    expect(matchesCaptionPattern("Fig. 3 Layout")).toBe(true);
    expect(matchesCaptionPattern("  table 2. Totals")).toBe(true);
    expect(matchesCaptionPattern("Diagram")).toBe(true);
  });

  it("rejects words that only start like a label", () => {
    expect(matchesCaptionPattern("Figures of speech")).toBe(false);
    expect(matchesCaptionPattern("Diagrammatic view")).toBe(false);
    expect(matchesCaptionPattern("Revenue by quarter")).toBe(false);
  });
});

describe("scoreCaption", () => {
  it("gives a perfect score to a touching labelled caption below", () => {
    expect(scoreCaption(0, true, true, OPTIONS)).toBeCloseTo(1);
  });

  it("keeps partial credit for position and pattern at the distance limit", () => {
    expect(scoreCaption(150, false, false, OPTIONS)).toBeCloseTo(0.24);
  });
});

describe("findCaptionCandidates", () => {
  it("only considers nearby spans on the same page", () => {
    const spans = [
      makeSpan("Figure 1: Near", { x: 100, y: 410 }),
      makeSpan("Figure 1: Other page", { x: 100, y: 410, page: 2 }),
      makeSpan("Figure 1: Far away", { x: 100, y: 600 }),
    ];
    const candidates = findCaptionCandidates(figure(), spans, OPTIONS);
    expect(candidates.map((c) => c.text)).toEqual(["Figure 1: Near"]);
    expect(candidates[0].distance).toBe(10);
    expect(candidates[0].isBelow).toBe(true);
  });
});

describe("selectCaption", () => {
  it("prefers a labelled caption over closer plain text", () => {
    const spans = [
      makeSpan("Revenue by quarter", { x: 100, y: 405 }),
      makeSpan("Figure 2: Revenue", { x: 100, y: 420 }),
    ];
    expect(selectCaption(figure(), spans, OPTIONS)?.text).toBe("Figure 2: Revenue");
  });

  it("breaks a score tie in favour of the caption below", () => {
    const flat: CaptionOptions = {
      ...OPTIONS,
      weights: { distance: 0.5, position: 0, pattern: 0.5 },
    };
    const above = makeSpan("Figure 4: Above", { x: 100, y: 180 });
    const below = makeSpan("Figure 4: Below", { x: 100, y: 410 });
    const chosen = selectCaption(figure(), [above, below], flat);
    expect(chosen?.text).toBe("Figure 4: Below");
    expect(chosen?.isBelow).toBe(true);
  });

  it("returns null when nothing is within range", () => {
    expect(selectCaption(figure(), [makeSpan("Figure 9", { y: 700 })], OPTIONS)).toBeNull();
  });
});

describe("compareCandidates", () => {
  it("orders equal scores by position, then pattern, then distance", () => {
    const base = selectCaption(figure(), [makeSpan("Figure 5", { x: 100, y: 410 })], OPTIONS);
    expect(base).not.toBeNull();
    if (!base) return;
    const above = { ...base, isBelow: false };
    const plain = { ...base, matchesPattern: false };
    const farther = { ...base, distance: base.distance + 5 };
    expect(compareCandidates(base, above)).toBeLessThan(0);
    expect(compareCandidates(base, plain)).toBeLessThan(0);
    expect(compareCandidates(base, farther)).toBeLessThan(0);
    expect(compareCandidates(farther, base)).toBeGreaterThan(0);
  });
});

describe("bindCaptions", () => {
  it("assigns ids by input order and names files after captions", () => {
    const figures = [figure(), figure({ page: 2 })];
    const spans = [makeSpan("Figure 1: Sales Chart", { x: 100, y: 410 })];
    const bound = bindCaptions(figures, spans, OPTIONS);

    expect(bound.map((b) => b.id)).toEqual(["fig_000", "fig_001"]);
    expect(bound[0].caption).toBe("Figure 1: Sales Chart");
    expect(bound[0].filename).toBe("fig_000_figure-1-sales-chart.png");
    expect(bound[1].caption).toBeNull();
    expect(bound[1].filename).toBe("fig_001.png");
  });

  it("binds each figure independently", () => {
    const spans = [makeSpan("Figure 1: Shared", { x: 100, y: 410 })];
    const bound = bindCaptions([figure(), figure()], spans, OPTIONS);
    expect(bound.map((b) => b.caption)).toEqual(["Figure 1: Shared", "Figure 1: Shared"]);
  });

  it("carries alt text through", () => {
    const [bound] = bindCaptions([figure({ alt: "bar chart" })], [], OPTIONS);
    expect(bound.alt).toBe("bar chart");
  });
});

describe("FigureFilenameAllocator", () => {
  it("suffixes repeated names before the extension", () => {
    const files = new FigureFilenameAllocator("png");
    expect(files.allocate("fig_000", "Chart")).toBe("fig_000_chart.png");
    expect(files.allocate("fig_000", "Chart")).toBe("fig_000_chart-2.png");
    expect(files.allocate("fig_000", "Chart")).toBe("fig_000_chart-3.png");
  });

  it("falls back to the id when the caption has no slug", () => {
    const files = new FigureFilenameAllocator("jpg");
    expect(files.allocate(figureId(7), "***")).toBe("fig_007.jpg");
    expect(files.allocate(figureId(7), null)).toBe("fig_007-2.jpg");
  });
});
