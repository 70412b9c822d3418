/**
 * Game Catalog — Type Definitions
 */

import type { CalendarDate } from "./date";

// ─── Records ─────────────────────────────────────────────────────

/** One catalog entry. Instances produced by the loader are frozen. */
export interface GameRecord {
  readonly name: string;
  /** Grouping key for the per-platform queries */
  readonly platform: string;
  readonly releaseDate: CalendarDate;
  /** Free text searched by keyword containment */
  readonly summary: string;
  /** Critic score, nominally 0-100; not clamped */
  readonly metaScore: number;
  /** Audience score; not clamped */
  readonly userReview: number;
}

/** The six comma-separated source fields, before conversion */
export interface RawGameRow {
  name: string;
  platform: string;
  releaseDate: string;
  summary: string;
  metaScore: string;
  userReview: string;
}

// ─── Ingestion ───────────────────────────────────────────────────

export interface IngestionReport {
  /** Lines pulled from the source, header included */
  linesRead: number;
  /** Records that made it into the catalog */
  loaded: number;
  /** 1-based line numbers dropped for having the wrong field count */
  skippedLines: readonly number[];
  /** Set when the source failed before it was exhausted */
  readError?: Error;
}

// ─── Query Outcomes ──────────────────────────────────────────────

export interface QueryError {
  category: "INVALID_INPUT";
  message: string;
}

export type QueryOutcome<T> =
  | { ok: true; value: T }
  | { ok: false; error: QueryError };
