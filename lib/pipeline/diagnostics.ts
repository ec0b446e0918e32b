/**
 * Structured diagnostics collected during a document run.
 *
 * Numbering anomalies are recorded here rather than logged, so callers can
 * inspect them (and tests can assert on them) as data.
 */

import { NumberingViolationError } from "../errors";

export const DIAGNOSTIC_CATEGORIES = [
  "duplicate_chapter_number",
  "chapter_number_reset",
  "appendix_before_first_chapter",
  "appendix_missing_page_break",
  "appendix_duplicate_letter",
  "appendix_out_of_order",
  "appendix_detected",
  "section_gap",
  "section_path_truncated",
] as const;

export type DiagnosticCategory = (typeof DIAGNOSTIC_CATEGORIES)[number];

export type DiagnosticSeverity = "info" | "warning";

export type DiagnosticValue = string | number | boolean | null | readonly number[];

export interface Diagnostic {
  category: DiagnosticCategory;
  severity: DiagnosticSeverity;
  message: string;
  values: Record<string, DiagnosticValue>;
}

export class Diagnostics {
  private readonly records: Diagnostic[] = [];
  private readonly failOn: ReadonlySet<DiagnosticCategory>;

  constructor(failOn: readonly DiagnosticCategory[] = []) {
    this.failOn = new Set(failOn);
  }

  /**
   * Record a diagnostic. Categories configured as fatal throw
   * NumberingViolationError instead of being recorded.
   */
  report(diagnostic: Diagnostic): void {
    if (this.failOn.has(diagnostic.category)) {
      throw new NumberingViolationError(diagnostic.category, diagnostic.message);
    }
    this.records.push(diagnostic);
  }

  warn(
    category: DiagnosticCategory,
    message: string,
    values: Record<string, DiagnosticValue> = {}
  ): void {
    this.report({ category, severity: "warning", message, values });
  }

  info(
    category: DiagnosticCategory,
    message: string,
    values: Record<string, DiagnosticValue> = {}
  ): void {
    this.report({ category, severity: "info", message, values });
  }

  all(): readonly Diagnostic[] {
    return this.records;
  }

  byCategory(category: DiagnosticCategory): Diagnostic[] {
    return this.records.filter((d) => d.category === category);
  }
}
