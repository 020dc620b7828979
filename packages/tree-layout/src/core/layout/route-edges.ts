import { compareIds } from "../graph/build-graph";
import type {
  FamilyGraph,
  LayoutConfig,
  PersonId,
  Point,
  Relationship,
  RenderEdge,
  RenderNode,
} from "../data/types";

/**
 * Routes every accepted relationship: parent edges first, then spouse and
 * sibling connectors, each in acceptance order.
 */
export function routeEdges(
  graph: FamilyGraph,
  nodes: Map<PersonId, RenderNode>,
  config: LayoutConfig,
): RenderEdge[] {
  const edges: RenderEdge[] = [];

  const push = (link: Relationship, route: (a: RenderNode, b: RenderNode) => Point[], arrow: boolean) => {
    const source = nodes.get(link.sourceId);
    const target = nodes.get(link.targetId);
    if (!source || !target) return;
    edges.push({
      id: link.id,
      kind: link.kind,
      sourceId: link.sourceId,
      targetId: link.targetId,
      points: route(source, target),
      arrow,
    });
  };

  for (const link of graph.parentLinks) {
    push(link, (parent, child) => computeParentChildPath(parent, child, config), true);
  }
  for (const link of graph.spouseLinks) {
    push(link, computeSpousePath, false);
  }
  for (const link of graph.siblingLinks) {
    push(link, (a, b) => computeSiblingPath(a, b, config), false);
  }

  return edges;
}

function centerOf(node: RenderNode): Point {
  return { x: node.x, y: node.y };
}

function leftThenRight(a: RenderNode, b: RenderNode): [RenderNode, RenderNode] {
  if (a.x !== b.x) return a.x < b.x ? [a, b] : [b, a];
  return compareIds(a.id, b.id) <= 0 ? [a, b] : [b, a];
}

/**
 * Bottom-center of the parent to top-center of the child. When generations
 * were skipped the path elbows at the child's x half-way through the gap
 * under the parent's row. A child that is not below its parent (cycle) gets
 * a straight center-to-center line.
 */
export function computeParentChildPath(parent: RenderNode, child: RenderNode, config: LayoutConfig): Point[] {
  const rows = child.generation - parent.generation;
  if (rows < 1) {
    return [centerOf(parent), centerOf(child)];
  }

  const parentBottomCenter = { x: parent.x, y: parent.bounds.maxY };
  const childTopCenter = { x: child.x, y: child.bounds.minY };
  if (rows === 1) {
    return [parentBottomCenter, childTopCenter];
  }

  const elbowY = parent.bounds.maxY + (config.levelHeight - config.nodeHeight) / 2;
  return [parentBottomCenter, { x: child.x, y: elbowY }, childTopCenter];
}

export function computeSpousePath(a: RenderNode, b: RenderNode): Point[] {
  if (a.generation !== b.generation) {
    return [centerOf(a), centerOf(b)];
  }

  const [left, right] = leftThenRight(a, b);
  return [
    { x: left.bounds.maxX, y: left.y },
    { x: right.bounds.minX, y: right.y },
  ];
}

export function computeSiblingPath(a: RenderNode, b: RenderNode, config: LayoutConfig): Point[] {
  if (a.generation !== b.generation) {
    return [centerOf(a), centerOf(b)];
  }

  const [left, right] = leftThenRight(a, b);
  const liftY = left.bounds.minY - config.siblingOffset;
  return [
    { x: left.x, y: left.bounds.minY },
    { x: left.x, y: liftY },
    { x: right.x, y: liftY },
    { x: right.x, y: right.bounds.minY },
  ];
}
