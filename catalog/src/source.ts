/**
 * Game Catalog — Line Sources
 *
 * Feeds a GameCatalog from files, streams or in-memory text. A source that
 * fails part-way still produces a catalog from the lines read before the
 * failure; the failure is reported on `catalog.ingestion.readError`.
 */

import * as fs from "fs";
import * as readline from "readline";
import type { Readable } from "stream";
import { GameCatalog, type CatalogOptions } from "./catalog";
import { loadConfig } from "./config";
import { createLogger, type Logger } from "./utils/logger";

export interface LineRead {
  lines: string[];
  readError?: Error;
}

/**
 * Split text into lines (LF or CRLF). A trailing newline does not produce
 * an extra empty line.
 */
export function parseCatalogText(text: string): string[] {
  const lines = text.split(/\r?\n/);
  if (lines[lines.length - 1] === "") lines.pop();
  return lines;
}

/**
 * Read every line of a stream. Stops at the first stream error and returns
 * it alongside the lines read so far.
 */
export async function readCatalogLines(input: Readable): Promise<LineRead> {
  const rl = readline.createInterface({ input, crlfDelay: Infinity });
  const lines: string[] = [];

  try {
    for await (const line of rl) {
      lines.push(line);
    }
  } catch (err: unknown) {
    return { lines, readError: err instanceof Error ? err : new Error(String(err)) };
  } finally {
    rl.close();
  }

  return { lines };
}

function* replay(lines: string[], readError?: Error): Generator<string> {
  yield* lines;
  if (readError) throw readError;
}

export async function loadCatalogFromStream(
  input: Readable,
  options: CatalogOptions = {},
): Promise<GameCatalog> {
  const { lines, readError } = await readCatalogLines(input);
  return new GameCatalog(replay(lines, readError), options);
}

/**
 * The environment is only consulted for what the caller left out.
 */
function resolveFileSettings(
  filePath: string | undefined,
  logger: Logger | undefined,
): { filePath: string; logger: Logger } {
  if (filePath !== undefined && logger) return { filePath, logger };

  const config = loadConfig();
  return {
    filePath: filePath ?? config.dataPath,
    logger: logger ?? createLogger({ level: config.logLevel }),
  };
}

/**
 * Load a catalog file. Without a path, GAME_CATALOG_PATH is used; without
 * a logger, one is created at GAME_CATALOG_LOG_LEVEL.
 * Rejects when the file cannot be opened.
 */
export async function loadCatalogFile(
  filePath?: string,
  options: CatalogOptions = {},
): Promise<GameCatalog> {
  const settings = resolveFileSettings(filePath, options.logger);

  const handle = await fs.promises.open(settings.filePath, "r");
  try {
    const stream = handle.createReadStream({ encoding: "utf-8", autoClose: false });
    return await loadCatalogFromStream(stream, { ...options, logger: settings.logger });
  } finally {
    await handle.close();
  }
}
