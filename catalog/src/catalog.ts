/**
 * Game Catalog — Query Engine
 *
 * Holds the records loaded from a line source and answers read-only
 * queries over them. The record list is fixed at construction; every
 * query is a scan over the same frozen array, so a catalog can be shared
 * freely once built.
 *
 * Ties (equal user review scores) are always broken by source order.
 */

import { compareDates, isAfter, type CalendarDate } from "./date";
import { GameNotFoundError, InvalidArgumentError, RecordValidationError } from "./errors";
import { parseGameLine } from "./loader";
import { compareScores, gameKey } from "./record";
import type { GameRecord, IngestionReport, QueryOutcome } from "./types";
import { createLogger, type Logger } from "./utils/logger";

export interface CatalogOptions {
  logger?: Logger;
}

type Keyword = string | null | undefined;

function isBlank(value: Keyword): boolean {
  return value === null || value === undefined || value.trim().length === 0;
}

function byUserReviewDescending(a: GameRecord, b: GameRecord): number {
  return compareScores(b.userReview, a.userReview);
}

export class GameCatalog {
  private readonly games: readonly GameRecord[];
  private readonly logger: Logger;

  /** What happened while reading the source */
  readonly ingestion: Readonly<IngestionReport>;

  /**
   * Load a catalog from raw lines. The first line is a header and is always
   * discarded. Lines with the wrong field count are skipped; a line with bad
   * content throws RecordValidationError and no catalog is built. If the
   * line source itself throws, loading stops and the error is kept in
   * `ingestion.readError`.
   */
  constructor(lines: Iterable<string>, options: CatalogOptions = {}) {
    this.logger = options.logger ?? createLogger();

    const games: GameRecord[] = [];
    const skippedLines: number[] = [];
    let readError: Error | undefined;
    let lineNumber = 0;

    const iterator = lines[Symbol.iterator]();

    for (;;) {
      let next: IteratorResult<string>;
      try {
        next = iterator.next();
      } catch (err: unknown) {
        readError = err instanceof Error ? err : new Error(String(err));
        this.logger.warn(
          { line: lineNumber, err: readError.message },
          "Catalog source failed, keeping records read so far",
        );
        break;
      }
      if (next.done) break;

      lineNumber++;
      if (lineNumber === 1) continue;

      const outcome = parseGameLine(next.value);
      switch (outcome.kind) {
        case "game":
          games.push(outcome.game);
          break;
        case "malformed":
          skippedLines.push(lineNumber);
          this.logger.debug(
            { line: lineNumber, fields: outcome.fieldCount },
            "Skipping line with wrong field count",
          );
          break;
        case "invalid":
          this.logger.error(
            { line: lineNumber, errors: outcome.errors },
            "Invalid game record, aborting catalog load",
          );
          throw new RecordValidationError(lineNumber, outcome.errors);
      }
    }

    this.games = Object.freeze(games);
    this.ingestion = Object.freeze({
      linesRead: lineNumber,
      loaded: games.length,
      skippedLines: Object.freeze(skippedLines),
      ...(readError ? { readError } : {}),
    });

    this.logger.info(
      { loaded: games.length, skipped: skippedLines.length },
      "Catalog loaded",
    );
  }

  get size(): number {
    return this.games.length;
  }

  /**
   * All games in source order. The returned array is frozen.
   */
  getAllGames(): readonly GameRecord[] {
    return this.games;
  }

  /**
   * Distinct platforms, in the order they first appear in the source.
   */
  getPlatforms(): string[] {
    return [...new Set(this.games.map((g) => g.platform))];
  }

  /**
   * Games released strictly after `date`.
   */
  getGamesReleasedAfter(date: CalendarDate): GameRecord[] {
    return this.games.filter((g) => isAfter(g.releaseDate, date));
  }

  /**
   * Up to `n` games by user review, highest first.
   * @throws InvalidArgumentError when n is not a positive integer
   */
  getTopNUserRatedGames(n: number): GameRecord[] {
    if (!Number.isInteger(n) || n <= 0) {
      throw new InvalidArgumentError(`n must be a positive integer, got ${n}`);
    }
    return [...this.games].sort(byUserReviewDescending).slice(0, n);
  }

  /**
   * Distinct release years having at least one game with metaScore >= minimalScore.
   */
  getYearsWithTopScoringGames(minimalScore: number): number[] {
    const years = this.games
      .filter((g) => g.metaScore >= minimalScore)
      .map((g) => g.releaseDate.year);
    return [...new Set(years)];
  }

  /**
   * Names of the games released in `year`, joined by ", ". Empty when none.
   */
  getAllNamesOfGamesReleasedIn(year: number): string {
    return this.games
      .filter((g) => g.releaseDate.year === year)
      .map((g) => g.name)
      .join(", ");
  }

  /**
   * The best user-rated game on `platform`; the earliest-loaded one on a tie.
   * @throws GameNotFoundError when platform is missing or has no games
   */
  getHighestUserRatedGameByPlatform(platform: string | null | undefined): GameRecord {
    if (!platform) {
      throw new GameNotFoundError("Platform must be a non-empty string");
    }

    let best: GameRecord | undefined;
    for (const game of this.games) {
      if (game.platform !== platform) continue;
      if (!best || compareScores(game.userReview, best.userReview) > 0) best = game;
    }

    if (!best) {
      throw new GameNotFoundError(`No games found for platform "${platform}"`);
    }
    return best;
  }

  /**
   * Every platform mapped to its games. Records with identical fields
   * appear once per platform.
   */
  getAllGamesByPlatform(): Map<string, Set<GameRecord>> {
    const seen = new Set<string>();
    const byPlatform = new Map<string, Set<GameRecord>>();

    for (const game of this.games) {
      const key = gameKey(game);
      if (seen.has(key)) continue;
      seen.add(key);

      const group = byPlatform.get(game.platform);
      if (group) {
        group.add(game);
      } else {
        byPlatform.set(game.platform, new Set([game]));
      }
    }

    return byPlatform;
  }

  /**
   * Years between the first and last release on `platform`. A platform
   * whose releases all fall in one year counts as active for 1 year. A
   * blank platform is rejected; an unknown platform has 0 active years.
   */
  measureYearsActive(platform: string | null | undefined): QueryOutcome<number> {
    if (isBlank(platform)) {
      return {
        ok: false,
        error: { category: "INVALID_INPUT", message: "Platform must not be blank" },
      };
    }

    let first: CalendarDate | undefined;
    let last: CalendarDate | undefined;
    for (const game of this.games) {
      if (game.platform !== platform) continue;
      if (!first || compareDates(game.releaseDate, first) < 0) first = game.releaseDate;
      if (!last || compareDates(game.releaseDate, last) > 0) last = game.releaseDate;
    }

    if (!first || !last) return { ok: true, value: 0 };

    const span = last.year - first.year;
    return { ok: true, value: span === 0 ? 1 : span };
  }

  /**
   * Same as measureYearsActive, with 0 standing in for a blank platform.
   */
  getYearsActive(platform: string | null | undefined): number {
    const outcome = this.measureYearsActive(platform);
    return outcome.ok ? outcome.value : 0;
  }

  /**
   * Games whose summary contains every keyword as a case-sensitive
   * substring. Rejects an empty keyword list or any blank keyword.
   */
  findGamesSimilarTo(keywords: readonly Keyword[]): QueryOutcome<GameRecord[]> {
    if (keywords.length === 0) {
      return {
        ok: false,
        error: { category: "INVALID_INPUT", message: "At least one keyword is required" },
      };
    }

    const terms: string[] = [];
    for (const keyword of keywords) {
      if (typeof keyword !== "string" || isBlank(keyword)) {
        return {
          ok: false,
          error: { category: "INVALID_INPUT", message: "Keywords must not be blank" },
        };
      }
      terms.push(keyword);
    }

    return {
      ok: true,
      value: this.games.filter((g) => terms.every((term) => g.summary.includes(term))),
    };
  }

  /**
   * Same as findGamesSimilarTo, returning undefined for rejected keywords.
   */
  getGamesSimilarTo(...keywords: Keyword[]): GameRecord[] | undefined {
    const outcome = this.findGamesSimilarTo(keywords);
    return outcome.ok ? outcome.value : undefined;
  }
}
