/**
 * Game Catalog — Configuration
 *
 * Loaded from environment variables with defaults, validated with zod.
 */

import { z } from "zod";
import { CatalogError } from "./errors";

const ConfigSchema = z.object({
  GAME_CATALOG_PATH: z.string().min(1).default("all_games.csv"),
  GAME_CATALOG_LOG_LEVEL: z
    .enum(["silent", "debug", "info", "warn", "error"])
    .default("silent"),
});

export interface CatalogConfig {
  /** Catalog file read when no path is given */
  dataPath: string;
  /** pino log level */
  logLevel: z.infer<typeof ConfigSchema>["GAME_CATALOG_LOG_LEVEL"];
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): CatalogConfig {
  const parsed = ConfigSchema.safeParse({
    GAME_CATALOG_PATH: env.GAME_CATALOG_PATH || undefined,
    GAME_CATALOG_LOG_LEVEL: env.GAME_CATALOG_LOG_LEVEL || undefined,
  });

  if (!parsed.success) {
    const detail = parsed.error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    throw new CatalogError("VALIDATION_ERROR", `Invalid configuration: ${detail}`);
  }

  return {
    dataPath: parsed.data.GAME_CATALOG_PATH,
    logLevel: parsed.data.GAME_CATALOG_LOG_LEVEL,
  };
}
