import fs from "node:fs";
import path from "node:path";
import yaml from "js-yaml";
import { z } from "zod/v4";
import {
  ConfigInvalidValueError,
  ConfigParseError,
  ConfigWeightSumError,
} from "./errors";
import { DIAGNOSTIC_CATEGORIES } from "./pipeline/diagnostics";

const WEIGHT_SUM_TOLERANCE = 1e-6;

const weight = z.number().min(0).max(1);

const configSchema = z.object({
  // Line merging
  line_merge_y_tolerance: z.number().min(0).default(3.0),

  // Block assembly
  list_indent_tolerance: z.number().min(0).default(6),
  code_min_lines: z.number().int().min(1).default(2),
  code_indent_threshold: z.number().int().min(1).default(4),
  table_confidence_min: z.number().min(0).max(1).default(0.5),
  heading_font_delta: z.number().min(0).default(1.0),
  min_heading_font_size: z.number().positive().nullable().default(null),

  // Caption binding
  figure_caption_distance: z.number().positive().default(150),
  caption_weight_distance: weight.default(0.4),
  caption_weight_position: weight.default(0.3),
  caption_weight_pattern: weight.default(0.3),
  image_format: z.string().min(1).default("png"),

  // Slugs
  slug_prefix_width: z.number().int().min(1).max(8).default(2),

  // Numbering
  numbering_validate_gaps: z.boolean().default(true),
  numbering_allow_chapter_resets: z.boolean().default(false),
  numbering_max_depth: z.number().int().min(1).default(6),
  appendix_requires_page_break: z.boolean().default(true),
  numbering_fail_on: z.array(z.enum(DIAGNOSTIC_CATEGORIES)).default([]),

  // Input filtering and footnotes
  exclude_pages: z.array(z.number().int().min(1)).default([]),
  footnote_band_ratio: z.number().gt(0).lt(1).default(0.85),
  page_height: z.number().positive().default(792),
});

export type StructureConfig = z.infer<typeof configSchema>;
export type ConfigOverrides = z.input<typeof configSchema>;

/**
 * Validate a raw config object. Rejects out-of-range values and caption
 * weights whose sum is not 1.0, before any pipeline stage runs.
 */
export function parseConfig(raw: unknown): StructureConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    throw ConfigInvalidValueError.fromZodError(result.error);
  }
  const cfg = result.data;
  const sum =
    cfg.caption_weight_distance +
    cfg.caption_weight_position +
    cfg.caption_weight_pattern;
  if (Math.abs(sum - 1) > WEIGHT_SUM_TOLERANCE) {
    throw new ConfigWeightSumError(sum);
  }
  return cfg;
}

export function defaultConfig(): StructureConfig {
  return parseConfig({});
}

/**
 * Deep-merge two plain objects. Plain objects recurse;
 * arrays and primitives: override wins.
 */
export function deepMerge<T extends Record<string, unknown>>(
  base: T,
  overrides: Record<string, unknown>
): Record<string, unknown> {
  const result: Record<string, unknown> = { ...base };
  for (const key of Object.keys(overrides)) {
    const baseVal = result[key];
    const overVal = overrides[key];
    if (isPlainObject(baseVal) && isPlainObject(overVal)) {
      result[key] = deepMerge(baseVal, overVal);
    } else {
      result[key] = overVal;
    }
  }
  return result;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return value !== null && typeof value === "object" && !Array.isArray(value);
}

function readConfigFile(filePath: string): Record<string, unknown> {
  let raw: unknown;
  try {
    const text = fs.readFileSync(filePath, "utf-8");
    raw =
      path.extname(filePath).toLowerCase() === ".json"
        ? JSON.parse(text)
        : yaml.load(text);
  } catch (err) {
    throw new ConfigParseError(
      filePath,
      err instanceof Error ? err.message : String(err)
    );
  }
  if (raw === undefined || raw === null) return {};
  if (!isPlainObject(raw)) {
    throw new ConfigParseError(filePath, "top level must be a mapping");
  }
  return raw;
}

/**
 * Load configuration from a YAML or JSON file. Without an explicit path the
 * project's config.yaml is used when present, defaults otherwise.
 */
export function loadConfig(configPath?: string): StructureConfig {
  const resolved = configPath ?? path.resolve(process.cwd(), "config.yaml");
  if (!configPath && !fs.existsSync(resolved)) return defaultConfig();
  return parseConfig(readConfigFile(resolved));
}

/**
 * Apply overrides on top of a base config and re-validate the result.
 */
export function resolveConfig(
  overrides: ConfigOverrides = {},
  base: StructureConfig = defaultConfig()
): StructureConfig {
  return parseConfig(deepMerge(base, overrides));
}

export function getCaptionWeights(cfg: StructureConfig): {
  distance: number;
  position: number;
  pattern: number;
} {
  return {
    distance: cfg.caption_weight_distance,
    position: cfg.caption_weight_position,
    pattern: cfg.caption_weight_pattern,
  };
}
