import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { afterEach, beforeEach, describe, it, expect } from "vitest";
import {
  defaultConfig,
  deepMerge,
  getCaptionWeights,
  loadConfig,
  parseConfig,
  resolveConfig,
} from "../config.js";
import {
  ConfigInvalidValueError,
  ConfigParseError,
  ConfigWeightSumError,
} from "../errors.js";

describe("config", () => {
  let tmpDir: string;

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), "docstruct-config-"));
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  it("fills every key with its default", () => {
    const config = defaultConfig();
    expect(config.line_merge_y_tolerance).toBe(3);
    expect(config.list_indent_tolerance).toBe(6);
    expect(config.code_min_lines).toBe(2);
    expect(config.code_indent_threshold).toBe(4);
    expect(config.table_confidence_min).toBe(0.5);
    expect(config.figure_caption_distance).toBe(150);
    expect(config.slug_prefix_width).toBe(2);
    expect(config.numbering_validate_gaps).toBe(true);
    expect(config.numbering_allow_chapter_resets).toBe(false);
    expect(config.numbering_max_depth).toBe(6);
    expect(config.appendix_requires_page_break).toBe(true);
    expect(config.numbering_fail_on).toEqual([]);
    expect(config.min_heading_font_size).toBeNull();
    expect(config.image_format).toBe("png");
    expect(getCaptionWeights(config)).toEqual({
      distance: 0.4,
      position: 0.3,
      pattern: 0.3,
    });
  });

  it("loads the repository config.yaml", () => {
    const config = loadConfig(path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../../config.yaml"));
    expect(config).toEqual(defaultConfig());
  });

  it("rejects caption weights that do not sum to 1", () => {
    expect(() =>
      parseConfig({
        caption_weight_distance: 0.5,
        caption_weight_position: 0.3,
        caption_weight_pattern: 0.3,
      })
    ).toThrow(ConfigWeightSumError);
  });

  it("accepts weights within the sum tolerance", () => {
    const config = parseConfig({
      caption_weight_distance: 0.2,
      caption_weight_position: 0.1,
      caption_weight_pattern: 0.7,
    });
    expect(config.caption_weight_pattern).toBe(0.7);
  });

  it("rejects a weight outside [0, 1]", () => {
    try {
      parseConfig({
        caption_weight_distance: 1.2,
        caption_weight_position: -0.1,
        caption_weight_pattern: -0.1,
      });
      expect.unreachable("parseConfig should throw");
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigInvalidValueError);
      if (err instanceof ConfigInvalidValueError) {
        expect(err.exitCode).toBe(2);
        const fields = (err.details ?? []).map((d) => d.field);
        expect(fields).toContain("caption_weight_distance");
        expect(fields).toContain("caption_weight_position");
      }
    }
  });

  it("rejects unknown diagnostic categories in numbering_fail_on", () => {
    expect(() => parseConfig({ numbering_fail_on: ["not_a_category"] })).toThrow(
      ConfigInvalidValueError
    );
  });

  it("reads YAML and JSON files", () => {
    const yamlPath = path.join(tmpDir, "custom.yaml");
    fs.writeFileSync(yamlPath, "code_min_lines: 3\nslug_prefix_width: 3\n");
    const fromYaml = loadConfig(yamlPath);
    expect(fromYaml.code_min_lines).toBe(3);
    expect(fromYaml.slug_prefix_width).toBe(3);

    const jsonPath = path.join(tmpDir, "custom.json");
    fs.writeFileSync(jsonPath, JSON.stringify({ table_confidence_min: 0.9 }));
    expect(loadConfig(jsonPath).table_confidence_min).toBe(0.9);
  });

  it("treats an empty file as all defaults", () => {
    const emptyPath = path.join(tmpDir, "empty.yaml");
    fs.writeFileSync(emptyPath, "");
    expect(loadConfig(emptyPath)).toEqual(defaultConfig());
  });

  it("raises ConfigParseError on malformed files", () => {
    const badPath = path.join(tmpDir, "bad.json");
    fs.writeFileSync(badPath, "{ not json");
    expect(() => loadConfig(badPath)).toThrow(ConfigParseError);

    const listPath = path.join(tmpDir, "list.yaml");
    fs.writeFileSync(listPath, "- a\n- b\n");
    expect(() => loadConfig(listPath)).toThrow(ConfigParseError);
  });

  it("raises ConfigParseError for a missing explicit path", () => {
    expect(() => loadConfig(path.join(tmpDir, "missing.yaml"))).toThrow(
      ConfigParseError
    );
  });

  it("resolveConfig layers overrides over a base", () => {
    const base = resolveConfig({ code_min_lines: 4 });
    const config = resolveConfig({ exclude_pages: [2, 3] }, base);
    expect(config.code_min_lines).toBe(4);
    expect(config.exclude_pages).toEqual([2, 3]);
  });
});

describe("deepMerge", () => {
  it("recurses into plain objects and replaces arrays", () => {
    const merged = deepMerge(
      { a: { b: 1, c: 2 }, list: [1, 2] },
      { a: { c: 3 }, list: [9] }
    );
    expect(merged).toEqual({ a: { b: 1, c: 3 }, list: [9] });
  });
});
