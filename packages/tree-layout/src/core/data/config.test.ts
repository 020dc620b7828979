import { describe, it, expect } from "vitest";
import { minimumSpacing, parseLayoutConfig, parseViewportConfig } from "./config";
import { ConfigurationError } from "../errors";
import { DEFAULT_LAYOUT_CONFIG, DEFAULT_VIEWPORT_CONFIG } from "./types";

describe("parseLayoutConfig", () => {
  it("returns defaults when no overrides are given", () => {
    expect(parseLayoutConfig()).toEqual(DEFAULT_LAYOUT_CONFIG);
  });

  it("applies overrides", () => {
    const config = parseLayoutConfig({ nodeWidth: 200, levelHeight: 300 });

    expect(config.nodeWidth).toBe(200);
    expect(config.levelHeight).toBe(300);
    expect(config.nodeHeight).toBe(DEFAULT_LAYOUT_CONFIG.nodeHeight);
  });

  it("rejects non-positive node sizes", () => {
    expect(() => parseLayoutConfig({ nodeWidth: 0 })).toThrow(ConfigurationError);
  });

  it("rejects non-numeric values", () => {
    expect(() => parseLayoutConfig({ horizontalGap: "wide" })).toThrow(/Invalid layout configuration/);
  });

  it("rejects a level height that does not clear the node height", () => {
    expect(() => parseLayoutConfig({ nodeHeight: 80, levelHeight: 80 })).toThrow(
      "levelHeight (80) must exceed nodeHeight (80)",
    );
  });

  it("rejects non-object input", () => {
    expect(() => parseLayoutConfig(42)).toThrow("Layout configuration must be an object");
  });
});

describe("parseViewportConfig", () => {
  it("returns defaults when no overrides are given", () => {
    expect(parseViewportConfig()).toEqual(DEFAULT_VIEWPORT_CONFIG);
  });

  it("rejects an inverted zoom range", () => {
    expect(() => parseViewportConfig({ minZoom: 2, maxZoom: 1 })).toThrow(ConfigurationError);
  });

  it("clamps the initial zoom into range", () => {
    expect(parseViewportConfig({ minZoom: 0.5, maxZoom: 2, initialZoom: 5 }).initialZoom).toBe(2);
  });
});

describe("minimumSpacing", () => {
  it("uses the narrower of the two gaps", () => {
    expect(minimumSpacing(DEFAULT_LAYOUT_CONFIG)).toBe(140);
    expect(minimumSpacing({ ...DEFAULT_LAYOUT_CONFIG, spouseGap: 50 })).toBe(150);
  });
});
