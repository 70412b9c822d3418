/**
 * Game Catalog — Record Values
 *
 * Records compare by value: two rows with identical fields are the same
 * game, even when they come from different source lines.
 */

import { formatReleaseDate, type CalendarDate } from "./date";
import type { GameRecord } from "./types";

/**
 * Total order over scores: NaN sorts above +Infinity, and -0 below 0.
 */
export function compareScores(a: number, b: number): number {
  if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : 1;
  if (Number.isNaN(b)) return -1;
  if (a !== b) return a < b ? -1 : 1;
  if (Object.is(a, b)) return 0;
  return Object.is(a, -0) ? -1 : 1;
}

export function createGameRecord(fields: {
  name: string;
  platform: string;
  releaseDate: CalendarDate;
  summary: string;
  metaScore: number;
  userReview: number;
}): GameRecord {
  const { year, month, day } = fields.releaseDate;
  return Object.freeze({
    name: fields.name,
    platform: fields.platform,
    releaseDate: Object.freeze({ year, month, day }),
    summary: fields.summary,
    metaScore: fields.metaScore,
    userReview: fields.userReview,
  });
}

export function gamesEqual(a: GameRecord, b: GameRecord): boolean {
  return (
    a.name === b.name &&
    a.platform === b.platform &&
    a.releaseDate.year === b.releaseDate.year &&
    a.releaseDate.month === b.releaseDate.month &&
    a.releaseDate.day === b.releaseDate.day &&
    a.summary === b.summary &&
    a.metaScore === b.metaScore &&
    Object.is(a.userReview, b.userReview)
  );
}

/**
 * Value identity of a record, suitable as a Map/Set key.
 */
export function gameKey(game: GameRecord): string {
  return JSON.stringify([
    game.name,
    game.platform,
    formatReleaseDate(game.releaseDate),
    game.summary,
    game.metaScore,
    Object.is(game.userReview, -0) ? "-0" : String(game.userReview),
  ]);
}
