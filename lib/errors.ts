/**
 * Error taxonomy for structure inference.
 *
 * Usage:
 *   throw new FrozenNodeError("Introduction", "addChild")
 *   throw new ConfigWeightSumError(1.1)
 *
 * At the CLI edge:
 *   catch (error) {
 *     if (error instanceof StructureError) process.exit(error.exitCode)
 *   }
 */

export type ErrorCategory = "CONFIG" | "IO" | "PARSE";

export type ErrorCode =
  | "config_invalid_value"
  | "config_weight_sum_invalid"
  | "config_parse_error"
  | "input_invalid"
  | "pdf_unreadable"
  | "frozen_node_mutation"
  | "unresolvable_slug_collision"
  | "numbering_strict_violation";

export interface ErrorDetail {
  field?: string;
  message: string;
}

export interface SerializedError {
  category: ErrorCategory;
  code: ErrorCode;
  message: string;
  details?: ErrorDetail[];
}

const EXIT_CODES: Record<ErrorCategory, number> = {
  CONFIG: 2,
  IO: 3,
  PARSE: 4,
};

/**
 * Base class for every error the pipeline raises on purpose.
 */
export class StructureError extends Error {
  public readonly exitCode: number;

  constructor(
    public readonly category: ErrorCategory,
    public readonly code: ErrorCode,
    message: string,
    public readonly details?: ErrorDetail[]
  ) {
    super(message);
    this.name = this.constructor.name;
    this.exitCode = EXIT_CODES[category];
    Object.setPrototypeOf(this, new.target.prototype);
  }

  toJSON(): SerializedError {
    return {
      category: this.category,
      code: this.code,
      message: this.message,
      ...(this.details && { details: this.details }),
    };
  }
}

// ============================================================================
// CONFIG
// ============================================================================

export class ConfigInvalidValueError extends StructureError {
  constructor(message = "Invalid configuration", details?: ErrorDetail[]) {
    super("CONFIG", "config_invalid_value", message, details);
  }

  static fromZodError(error: {
    issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>;
  }): ConfigInvalidValueError {
    const details = error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return new ConfigInvalidValueError("Invalid configuration", details);
  }
}

/**
 * Caption weights must sum to 1.0 within 1e-6.
 */
export class ConfigWeightSumError extends StructureError {
  constructor(public readonly sum: number) {
    super(
      "CONFIG",
      "config_weight_sum_invalid",
      `Caption weights must sum to 1.0 (got ${sum})`
    );
  }
}

export class ConfigParseError extends StructureError {
  constructor(filePath: string, reason: string) {
    super("CONFIG", "config_parse_error", `Cannot parse config ${filePath}: ${reason}`);
  }
}

// ============================================================================
// IO
// ============================================================================

export class InputValidationError extends StructureError {
  constructor(message = "Invalid document input", details?: ErrorDetail[]) {
    super("IO", "input_invalid", message, details);
  }

  static fromZodError(error: {
    issues: ReadonlyArray<{ path: PropertyKey[]; message: string }>;
  }): InputValidationError {
    const details = error.issues.map((issue) => ({
      field: issue.path.map(String).join("."),
      message: issue.message,
    }));
    return new InputValidationError("Invalid document input", details);
  }
}

export class PdfUnreadableError extends StructureError {
  constructor(pdfPath: string, reason: string) {
    super("IO", "pdf_unreadable", `Cannot read PDF ${pdfPath}: ${reason}`);
  }
}

// ============================================================================
// PARSE
// ============================================================================

export class FrozenNodeError extends StructureError {
  constructor(title: string, operation: string) {
    super(
      "PARSE",
      "frozen_node_mutation",
      `Section "${title}" is frozen; ${operation} is not allowed`
    );
  }
}

export class SlugCollisionError extends StructureError {
  constructor(base: string, attempts: number) {
    super(
      "PARSE",
      "unresolvable_slug_collision",
      `No free slug for "${base}" after ${attempts} attempts`
    );
  }
}

export class NumberingViolationError extends StructureError {
  constructor(category: string, message: string) {
    super("PARSE", "numbering_strict_violation", message, [
      { field: category, message },
    ]);
  }
}

export function isStructureError(error: unknown): error is StructureError {
  return error instanceof StructureError;
}
