import {
  DEFAULT_VIEWPORT_CONFIG,
  type Bounds,
  type Point,
  type ViewportConfig,
  type ViewportState,
} from "../data/types";

/** Wheel zoom steps: in when scrolling up, out when scrolling down */
export const ZOOM_IN_FACTOR = 1.1;
export const ZOOM_OUT_FACTOR = 0.9;

export function createViewport(config: ViewportConfig = DEFAULT_VIEWPORT_CONFIG): ViewportState {
  return { dx: 0, dy: 0, zoom: clampZoom(config.initialZoom, config) };
}

export function clampZoom(zoom: number, config: ViewportConfig = DEFAULT_VIEWPORT_CONFIG): number {
  return Math.max(config.minZoom, Math.min(config.maxZoom, zoom));
}

// Model to screen coordinate conversion
export function modelToScreen(state: ViewportState, point: Point): Point {
  return {
    x: point.x * state.zoom + state.dx,
    y: point.y * state.zoom + state.dy,
  };
}

// Screen to model coordinate conversion
export function screenToModel(state: ViewportState, point: Point): Point {
  return {
    x: (point.x - state.dx) / state.zoom,
    y: (point.y - state.dy) / state.zoom,
  };
}

/** Moves the canvas by a screen-space delta. Pan is unbounded. */
export function pan(state: ViewportState, delta: Point): ViewportState {
  return { ...state, dx: state.dx + delta.x, dy: state.dy + delta.y };
}

/**
 * Multiplies the zoom by `factor` while keeping the model point under
 * `screenPoint` fixed on screen. The result is clamped to the configured
 * range; a non-finite or non-positive factor leaves the state unchanged.
 */
export function zoomAt(
  state: ViewportState,
  screenPoint: Point,
  factor: number,
  config: ViewportConfig = DEFAULT_VIEWPORT_CONFIG,
): ViewportState {
  if (!Number.isFinite(factor) || factor <= 0) return state;

  const zoom = clampZoom(state.zoom * factor, config);
  if (zoom === state.zoom) return state;

  const anchor = screenToModel(state, screenPoint);
  return {
    dx: screenPoint.x - anchor.x * zoom,
    dy: screenPoint.y - anchor.y * zoom,
    zoom,
  };
}

export function wheelZoomFactor(deltaY: number): number {
  if (deltaY < 0) return ZOOM_IN_FACTOR;
  if (deltaY > 0) return ZOOM_OUT_FACTOR;
  return 1;
}

/** Model-space rectangle visible in a screen of the given size */
export function getVisibleBounds(state: ViewportState, screenWidth: number, screenHeight: number): Bounds {
  const topLeft = screenToModel(state, { x: 0, y: 0 });
  const bottomRight = screenToModel(state, { x: screenWidth, y: screenHeight });
  return { minX: topLeft.x, minY: topLeft.y, maxX: bottomRight.x, maxY: bottomRight.y };
}

/**
 * Largest zoom (within range) that shows `bounds` plus padding inside the
 * screen, with the content centered.
 */
export function fitToBounds(
  bounds: Bounds,
  screenWidth: number,
  screenHeight: number,
  config: ViewportConfig = DEFAULT_VIEWPORT_CONFIG,
  padding = 50,
): ViewportState {
  const width = bounds.maxX - bounds.minX + padding * 2;
  const height = bounds.maxY - bounds.minY + padding * 2;

  const zoom =
    width <= 0 || height <= 0
      ? clampZoom(config.initialZoom, config)
      : clampZoom(Math.min(screenWidth / width, screenHeight / height), config);

  // Center the content
  const contentCenterX = (bounds.minX + bounds.maxX) / 2;
  const contentCenterY = (bounds.minY + bounds.maxY) / 2;

  return {
    dx: screenWidth / 2 - contentCenterX * zoom,
    dy: screenHeight / 2 - contentCenterY * zoom,
    zoom,
  };
}

/** Pans so that a model point lands in the middle of the screen */
export function centerOn(state: ViewportState, point: Point, screenWidth: number, screenHeight: number): ViewportState {
  return {
    ...state,
    dx: screenWidth / 2 - point.x * state.zoom,
    dy: screenHeight / 2 - point.y * state.zoom,
  };
}
