/**
 * Game Catalog — Structured Logger
 *
 * Wraps pino for structured logging. Silent unless a level is requested,
 * so embedding hosts see nothing on stdout by default. Logs go to stderr
 * through a synchronous destination (no transport worker threads).
 */

import pino from "pino";

export type LogLevel = "silent" | "debug" | "info" | "warn" | "error";

export interface LoggerOptions {
  level: LogLevel;
  /** Human-readable level labels instead of pino's numeric levels */
  pretty: boolean;
}

const DEFAULT_OPTIONS: LoggerOptions = {
  level: "silent",
  pretty: true,
};

export function createLogger(
  options: Partial<LoggerOptions> = {},
): pino.Logger {
  const opts = { ...DEFAULT_OPTIONS, ...options };

  return pino(
    {
      name: "game-catalog",
      level: opts.level,
      formatters: opts.pretty
        ? {
            level(label: string) {
              return { level: label };
            },
          }
        : {},
      timestamp: pino.stdTimeFunctions.isoTime,
    },
    pino.destination({ fd: 2, sync: true }),
  );
}

export type Logger = pino.Logger;
