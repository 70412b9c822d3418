/**
 * Game Catalog — Error Types
 *
 * Every failure the catalog surfaces to a caller is a CatalogError with a
 * category, so hosts can branch on `category` instead of `instanceof`.
 */

import type { ValidationError } from "./validator";

export type ErrorCategory =
  | "INVALID_ARGUMENT"
  | "NOT_FOUND"
  | "VALIDATION_ERROR";

export class CatalogError extends Error {
  public readonly category: ErrorCategory;

  constructor(category: ErrorCategory, message: string) {
    super(message);
    this.name = "CatalogError";
    this.category = category;

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, new.target);
    }
  }
}

/** A query argument is outside the accepted domain (e.g. n <= 0). */
export class InvalidArgumentError extends CatalogError {
  constructor(message: string) {
    super("INVALID_ARGUMENT", message);
    this.name = "InvalidArgumentError";
  }
}

/** A lookup that must yield exactly one game found none. */
export class GameNotFoundError extends CatalogError {
  constructor(message: string) {
    super("NOT_FOUND", message);
    this.name = "GameNotFoundError";
  }
}

/**
 * A source line had the right shape but unusable content.
 * Raised during construction; no catalog is produced.
 */
export class RecordValidationError extends CatalogError {
  public readonly lineNumber: number;
  public readonly errors: ValidationError[];

  constructor(lineNumber: number, errors: ValidationError[]) {
    const detail = errors.map((e) => `${e.path}: ${e.message}`).join("; ");
    super("VALIDATION_ERROR", `Invalid game record on line ${lineNumber}: ${detail}`);
    this.name = "RecordValidationError";
    this.lineNumber = lineNumber;
    this.errors = errors;
  }
}
