import { buildGraph } from "./graph/build-graph";
import { assignGenerations } from "./layout/assign-generations";
import { computeLayout, type LayoutResult } from "./layout/generation-layout";
import { SpatialIndex } from "./spatial/rtree";
import { screenToModel } from "./viewport/viewport";
import type { DataError } from "./errors";
import {
  DEFAULT_LAYOUT_CONFIG,
  type LayoutConfig,
  type Person,
  type PersonId,
  type Point,
  type Relationship,
  type ViewportState,
} from "./data/types";

export interface RenderModel extends LayoutResult {
  /** Records excluded or adjusted during this pass */
  issues: DataError[];
}

/**
 * Pure layout pass: snapshot in, render model out.
 *
 * @throws LayoutInvariantViolation when generation assignment is incomplete
 */
export function computeRenderModel(
  persons: readonly Person[],
  relationships: readonly Relationship[],
  config: LayoutConfig = DEFAULT_LAYOUT_CONFIG,
): RenderModel {
  const built = buildGraph(persons, relationships);
  const assigned = assignGenerations(built.graph);
  const layout = computeLayout(built.graph, assigned.generations, config);

  return { ...layout, issues: [...built.issues, ...assigned.issues] };
}

// One index per render model, rebuilt whenever a new model is published
const indexes = new WeakMap<RenderModel, SpatialIndex>();

export function getSpatialIndex(model: RenderModel): SpatialIndex {
  let index = indexes.get(model);
  if (!index) {
    index = new SpatialIndex();
    index.load(model.nodes);
    indexes.set(model, index);
  }
  return index;
}

/** Person under a screen point, or null */
export function hitTest(model: RenderModel, viewport: ViewportState, screenPoint: Point): PersonId | null {
  const point = screenToModel(viewport, screenPoint);
  return getSpatialIndex(model).queryPoint(point.x, point.y);
}
