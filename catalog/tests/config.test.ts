/**
 * Game Catalog — Configuration and Logger Tests
 */

import { describe, it, expect } from "vitest";
import { CatalogError, createLogger, loadConfig } from "../src";

describe("loadConfig", () => {
  it("falls back to defaults", () => {
    expect(loadConfig({})).toEqual({ dataPath: "all_games.csv", logLevel: "silent" });
  });

  it("treats empty variables as unset", () => {
    expect(loadConfig({ GAME_CATALOG_PATH: "", GAME_CATALOG_LOG_LEVEL: "" })).toEqual({
      dataPath: "all_games.csv",
      logLevel: "silent",
    });
  });

  it("reads the environment", () => {
    expect(
      loadConfig({ GAME_CATALOG_PATH: "/data/games.csv", GAME_CATALOG_LOG_LEVEL: "debug" }),
    ).toEqual({ dataPath: "/data/games.csv", logLevel: "debug" });
  });

  it("rejects an unknown log level", () => {
    expect(() => loadConfig({ GAME_CATALOG_LOG_LEVEL: "verbose" })).toThrow(CatalogError);
    expect(() => loadConfig({ GAME_CATALOG_LOG_LEVEL: "verbose" })).toThrow(
      /GAME_CATALOG_LOG_LEVEL/,
    );
  });
});

describe("createLogger", () => {
  it("is silent by default", () => {
    expect(createLogger().level).toBe("silent");
  });

  it("uses the requested level", () => {
    const logger = createLogger({ level: "debug" });
    expect(logger.level).toBe("debug");
    expect(logger.isLevelEnabled("debug")).toBe(true);
    expect(logger.isLevelEnabled("trace")).toBe(false);
  });
});
