import { describe, it, expect } from "vitest";
import { Effect, LogLevel } from "effect";
import { DEFAULT_LAYOUT_CONFIG, DEFAULT_VIEWPORT_CONFIG } from "@kinmap/tree-layout";
import { Config, makeConfigLayer, parseConfig, readEnv } from "./Config";

describe("parseConfig", () => {
  it("falls back to defaults for unset variables", () => {
    expect(parseConfig(readEnv({}))).toEqual({
      dataDir: "./data/pglite",
      logLevel: LogLevel.Info,
      layout: DEFAULT_LAYOUT_CONFIG,
      viewport: DEFAULT_VIEWPORT_CONFIG,
    });
  });

  it("reads overrides from the environment", () => {
    const config = parseConfig(
      readEnv({
        KINMAP_DATA_DIR: "/tmp/kinmap",
        KINMAP_LOG_LEVEL: "debug",
        KINMAP_NODE_WIDTH: "150",
        KINMAP_LEVEL_HEIGHT: "",
        KINMAP_MAX_ZOOM: "8",
      }),
    );

    expect(config.dataDir).toBe("/tmp/kinmap");
    expect(config.logLevel).toBe(LogLevel.Debug);
    expect(config.layout).toEqual({ ...DEFAULT_LAYOUT_CONFIG, nodeWidth: 150 });
    expect(config.viewport).toEqual({ ...DEFAULT_VIEWPORT_CONFIG, maxZoom: 8 });
  });

  it("rejects an unknown log level", () => {
    expect(() => parseConfig(readEnv({ KINMAP_LOG_LEVEL: "loud" }))).toThrow(/Invalid kinmap configuration/);
  });

  it("rejects a level height that does not clear the nodes", () => {
    expect(() => parseConfig(readEnv({ KINMAP_LEVEL_HEIGHT: "50" }))).toThrow(/levelHeight \(50\) must exceed/);
  });
});

describe("makeConfigLayer", () => {
  it("fails with a ConfigurationError", async () => {
    const error = await Effect.runPromise(
      Effect.flip(Config.pipe(Effect.provide(makeConfigLayer({ KINMAP_MIN_ZOOM: "2", KINMAP_MAX_ZOOM: "1" })))),
    );

    expect(error).toMatchObject({ _tag: "ConfigurationError", key: "maxZoom" });
  });
});
