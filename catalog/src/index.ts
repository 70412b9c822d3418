/**
 * Game Catalog — Public API
 *
 * Main entry point for the catalog package.
 */

export { GameCatalog } from "./catalog";
export type { CatalogOptions } from "./catalog";
export {
  loadCatalogFile,
  loadCatalogFromStream,
  readCatalogLines,
  parseCatalogText,
} from "./source";
export type { LineRead } from "./source";
export { parseGameLine, parseUserReview, splitFields, FIELD_COUNT, FIELD_DELIMITER } from "./loader";
export type { LineOutcome } from "./loader";
export { validateGameRow } from "./validator";
export type { ValidationResult, ValidationError } from "./validator";
export { createGameRecord, gamesEqual, gameKey, compareScores } from "./record";
export {
  calendarDate,
  parseReleaseDate,
  formatReleaseDate,
  compareDates,
  isAfter,
  MONTH_ABBREVIATIONS,
} from "./date";
export type { CalendarDate } from "./date";
export {
  CatalogError,
  InvalidArgumentError,
  GameNotFoundError,
  RecordValidationError,
} from "./errors";
export type { ErrorCategory } from "./errors";
export { loadConfig } from "./config";
export type { CatalogConfig } from "./config";
export { createLogger } from "./utils/logger";
export type { Logger, LoggerOptions, LogLevel } from "./utils/logger";
export type {
  GameRecord,
  RawGameRow,
  IngestionReport,
  QueryOutcome,
  QueryError,
} from "./types";
