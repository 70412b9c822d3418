/**
 * Game Catalog — Line Loader
 *
 * Turns one source line into a game record. Lines are split on a literal
 * comma with no quoting, so a summary containing a comma yields too many
 * fields and the line is reported as malformed.
 *
 * Field order:
 *   name, platform, release date (dd-MMM-yyyy), summary, meta score, user review
 */

import { parseReleaseDate } from "./date";
import { createGameRecord } from "./record";
import type { GameRecord, RawGameRow } from "./types";
import { validateGameRow, type ValidationError } from "./validator";

export const FIELD_DELIMITER = ",";
export const FIELD_COUNT = 6;

export type LineOutcome =
  /** A complete record */
  | { kind: "game"; game: GameRecord }
  /** Wrong number of fields; the caller drops the line */
  | { kind: "malformed"; fieldCount: number }
  /** Right shape, unusable content; the caller aborts the load */
  | { kind: "invalid"; errors: ValidationError[] };

/**
 * Read a user review the way a Java double literal reads: control
 * characters and spaces around it are ignored, as is an f/d suffix.
 */
export function parseUserReview(text: string): number {
  const literal = text
    .replace(/^[\u0000-\u0020]+|[\u0000-\u0020]+$/g, "")
    .replace(/(?<=[\d.])[fFdD]$/, "");
  return Number(literal);
}

export function splitFields(line: string): string[] {
  return line.split(FIELD_DELIMITER);
}

export function parseGameLine(line: string): LineOutcome {
  const fields = splitFields(line);
  if (fields.length !== FIELD_COUNT) {
    return { kind: "malformed", fieldCount: fields.length };
  }

  const [name, platform, releaseDate, summary, metaScore, userReview] = fields;
  const row: RawGameRow = { name, platform, releaseDate, summary, metaScore, userReview };

  const result = validateGameRow(row);
  if (!result.valid) {
    return { kind: "invalid", errors: result.errors };
  }

  const date = parseReleaseDate(row.releaseDate);
  if (!date) {
    return {
      kind: "invalid",
      errors: [
        {
          path: "/releaseDate",
          message: `"${row.releaseDate}" is not a calendar date`,
          rule: "semantic:calendar-date",
        },
      ],
    };
  }

  return {
    kind: "game",
    game: createGameRecord({
      name: row.name,
      platform: row.platform,
      releaseDate: date,
      summary: row.summary,
      metaScore: Number(row.metaScore),
      userReview: parseUserReview(row.userReview),
    }),
  };
}
