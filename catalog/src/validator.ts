/**
 * Game Catalog — Row Validator
 *
 * Validates the raw fields of one catalog line against the JSON Schema in
 * schema.json, then applies the checks a schema cannot express.
 *
 * Two levels of validation:
 * 1. Schema validation (presence, shape, literal patterns) via AJV
 * 2. Semantic validation (known months, integer range)
 *
 * The user review follows Java-style double literals: surrounding control
 * whitespace, NaN, Infinity and an f/d suffix are all accepted, and an
 * exponent past the double range reads as Infinity.
 */

import Ajv, { type ValidateFunction } from "ajv";
import * as fs from "fs";
import * as path from "path";
import { parseReleaseDate } from "./date";
import type { RawGameRow } from "./types";

/** A validation result */
export interface ValidationResult {
  valid: boolean;
  errors: ValidationError[];
}

export interface ValidationError {
  path: string;
  message: string;
  rule: string;
}

const SCHEMA_PATH = path.join(__dirname, "..", "schema.json");

let _validate: ValidateFunction<RawGameRow> | null = null;

function getValidator(): ValidateFunction<RawGameRow> {
  if (_validate) return _validate;

  const schemaContent = fs.readFileSync(SCHEMA_PATH, "utf-8");
  const ajv = new Ajv({ allErrors: true, strict: false });

  _validate = ajv.compile<RawGameRow>(JSON.parse(schemaContent));
  return _validate;
}

/**
 * Validate a raw row against the JSON Schema + semantic rules.
 */
export function validateGameRow(row: RawGameRow): ValidationResult {
  const errors: ValidationError[] = [];

  const validate = getValidator();
  if (!validate(row) && validate.errors) {
    for (const err of validate.errors) {
      errors.push({
        path: err.instancePath || "/",
        message: err.message || "Unknown validation error",
        rule: `schema:${err.keyword}`,
      });
    }
  }

  errors.push(...validateSemanticRules(row, errors));

  return {
    valid: errors.length === 0,
    errors,
  };
}

/**
 * Rules that only run on fields the schema already accepted, so a single
 * bad field reports one error rather than two.
 */
function validateSemanticRules(
  row: RawGameRow,
  schemaErrors: ValidationError[],
): ValidationError[] {
  const errors: ValidationError[] = [];
  const failed = new Set(schemaErrors.map((e) => e.path));

  if (!failed.has("/releaseDate") && parseReleaseDate(row.releaseDate) === null) {
    errors.push({
      path: "/releaseDate",
      message: `"${row.releaseDate}" has an unknown month or a day outside 01-31`,
      rule: "semantic:calendar-date",
    });
  }

  if (!failed.has("/metaScore") && !Number.isSafeInteger(Number(row.metaScore))) {
    errors.push({
      path: "/metaScore",
      message: `"${row.metaScore}" is out of integer range`,
      rule: "semantic:safe-integer",
    });
  }

  return errors;
}
