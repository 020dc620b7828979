import { describe, it, expect } from "vitest";
import {
  centerOn,
  clampZoom,
  createViewport,
  fitToBounds,
  getVisibleBounds,
  modelToScreen,
  pan,
  screenToModel,
  wheelZoomFactor,
  zoomAt,
} from "./viewport";
import type { ViewportConfig, ViewportState } from "../data/types";

const CONFIG: ViewportConfig = { minZoom: 0.1, maxZoom: 4, initialZoom: 1 };

describe("viewport transform", () => {
  it("starts at the origin with the initial zoom", () => {
    expect(createViewport(CONFIG)).toEqual({ dx: 0, dy: 0, zoom: 1 });
    expect(createViewport({ ...CONFIG, initialZoom: 10 }).zoom).toBe(4);
  });

  it("maps model points to screen points", () => {
    const state: ViewportState = { dx: 10, dy: 20, zoom: 2 };

    expect(modelToScreen(state, { x: 5, y: 5 })).toEqual({ x: 20, y: 30 });
    expect(screenToModel(state, { x: 20, y: 30 })).toEqual({ x: 5, y: 5 });
  });

  it("clamps zoom to the configured range", () => {
    expect(clampZoom(0.01, CONFIG)).toBe(0.1);
    expect(clampZoom(10, CONFIG)).toBe(4);
    expect(clampZoom(2, CONFIG)).toBe(2);
  });
});

describe("pan", () => {
  it("adds the screen delta to the offset without touching zoom", () => {
    const state: ViewportState = { dx: 0, dy: 0, zoom: 1.5 };

    expect(pan(state, { x: 15, y: -5 })).toEqual({ dx: 15, dy: -5, zoom: 1.5 });
    expect(state).toEqual({ dx: 0, dy: 0, zoom: 1.5 });
  });

  it("is unbounded", () => {
    expect(pan({ dx: 0, dy: 0, zoom: 1 }, { x: -1e7, y: 1e7 })).toEqual({ dx: -1e7, dy: 1e7, zoom: 1 });
  });
});

describe("zoomAt", () => {
  it("keeps the model point under the cursor fixed", () => {
    const state: ViewportState = { dx: 30, dy: -40, zoom: 1.5 };
    const cursor = { x: 400, y: 300 };
    const anchor = screenToModel(state, cursor);

    const zoomed = zoomAt(state, cursor, 1.1, CONFIG);
    const back = modelToScreen(zoomed, anchor);

    expect(zoomed.zoom).toBeCloseTo(1.65);
    expect(back.x).toBeCloseTo(cursor.x);
    expect(back.y).toBeCloseTo(cursor.y);
  });

  it("keeps the anchor fixed when the zoom is clamped", () => {
    const state: ViewportState = { dx: 5, dy: 5, zoom: 3.9 };
    const cursor = { x: 120, y: 80 };
    const anchor = screenToModel(state, cursor);

    const zoomed = zoomAt(state, cursor, 1.1, CONFIG);
    const back = modelToScreen(zoomed, anchor);

    expect(zoomed.zoom).toBe(4);
    expect(back.x).toBeCloseTo(cursor.x);
    expect(back.y).toBeCloseTo(cursor.y);
  });

  it("returns the same state when already at the limit", () => {
    const state: ViewportState = { dx: 0, dy: 0, zoom: 4 };

    expect(zoomAt(state, { x: 10, y: 10 }, 1.1, CONFIG)).toBe(state);
  });

  it("ignores invalid factors", () => {
    const state: ViewportState = { dx: 1, dy: 2, zoom: 1 };

    expect(zoomAt(state, { x: 0, y: 0 }, 0, CONFIG)).toBe(state);
    expect(zoomAt(state, { x: 0, y: 0 }, -2, CONFIG)).toBe(state);
    expect(zoomAt(state, { x: 0, y: 0 }, Number.NaN, CONFIG)).toBe(state);
  });
});

describe("wheelZoomFactor", () => {
  it("zooms in when scrolling up and out when scrolling down", () => {
    expect(wheelZoomFactor(-120)).toBe(1.1);
    expect(wheelZoomFactor(120)).toBe(0.9);
    expect(wheelZoomFactor(0)).toBe(1);
  });
});

describe("fitToBounds", () => {
  it("centers content that exactly fits", () => {
    const state = fitToBounds({ minX: 0, minY: 0, maxX: 900, maxY: 500 }, 1000, 600, CONFIG);

    expect(state).toEqual({ dx: 50, dy: 50, zoom: 1 });
  });

  it("clamps to the minimum zoom for very large content", () => {
    const state = fitToBounds({ minX: 0, minY: 0, maxX: 100000, maxY: 100000 }, 100, 100, CONFIG);

    expect(state.zoom).toBe(0.1);
    expect(state.dx).toBeCloseTo(-4950);
  });
});

describe("getVisibleBounds", () => {
  it("returns the model rectangle under the screen", () => {
    expect(getVisibleBounds({ dx: -100, dy: -50, zoom: 2 }, 800, 600)).toEqual({
      minX: 50,
      minY: 25,
      maxX: 450,
      maxY: 325,
    });
  });
});

describe("centerOn", () => {
  it("moves a model point to the screen center", () => {
    expect(centerOn({ dx: 0, dy: 0, zoom: 2 }, { x: 100, y: 50 }, 800, 600)).toEqual({
      dx: 200,
      dy: 200,
      zoom: 2,
    });
  });
});
