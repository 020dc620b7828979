// Core types
export type {
  PersonId,
  Person,
  Relationship,
  RelationshipKind,
  FamilyGraph,
  GraphEntry,
  GenerationMap,
  RenderNode,
  RenderEdge,
  Bounds,
  Point,
  ViewportState,
  LayoutConfig,
  ViewportConfig,
  RecordStore,
} from "./core/data/types";
export { DEFAULT_LAYOUT_CONFIG, DEFAULT_VIEWPORT_CONFIG } from "./core/data/types";

// Errors
export {
  DataError,
  LayoutInvariantViolation,
  ConfigurationError,
  LayoutPassError,
  formatDataError,
  type DataErrorReason,
  type LayoutError,
  type LayoutSessionError,
} from "./core/errors";

// Data transformation and configuration
export {
  buildDisplayName,
  transformPerson,
  normalizeRelationshipKind,
  transformRelationship,
  transformSnapshot,
  type RawPerson,
  type RawRelationship,
  type Snapshot,
} from "./core/data/transform";
export { parseLayoutConfig, parseViewportConfig, minimumSpacing } from "./core/data/config";

// Graph and layout
export { buildGraph, compareIds, type GraphBuildResult } from "./core/graph/build-graph";
export { assignGenerations, type GenerationResult } from "./core/layout/assign-generations";
export { computeLayout, groupIntoFamilyUnits, computeBounds, type LayoutResult } from "./core/layout/generation-layout";
export {
  routeEdges,
  computeParentChildPath,
  computeSpousePath,
  computeSiblingPath,
} from "./core/layout/route-edges";

// Render model and hit testing
export { computeRenderModel, getSpatialIndex, hitTest, type RenderModel } from "./core/render-model";
export { SpatialIndex } from "./core/spatial/rtree";

// Viewport
export {
  ZOOM_IN_FACTOR,
  ZOOM_OUT_FACTOR,
  createViewport,
  clampZoom,
  modelToScreen,
  screenToModel,
  pan,
  zoomAt,
  wheelZoomFactor,
  getVisibleBounds,
  fitToBounds,
  centerOn,
} from "./core/viewport/viewport";

// Session and export
export { LayoutSession, type LayoutSessionOptions } from "./core/session/layout-session";
export { renderSvg, type SvgOptions } from "./core/export/svg";
