import { compareIds } from "../graph/build-graph";
import { routeEdges } from "./route-edges";
import type {
  Bounds,
  FamilyGraph,
  GenerationMap,
  LayoutConfig,
  PersonId,
  RenderEdge,
  RenderNode,
} from "../data/types";

export interface LayoutResult {
  nodes: RenderNode[];
  edges: RenderEdge[];
  bounds: Bounds;
  /** Person ids per generation, left to right */
  generations: Map<number, PersonId[]>;
}

interface FamilyUnit {
  members: PersonId[];
  /** Smallest member id; breaks ties between units */
  anchor: PersonId;
  key: number | undefined;
}

export function computeLayout(
  graph: FamilyGraph,
  generations: GenerationMap,
  config: LayoutConfig,
): LayoutResult {
  if (graph.order.length === 0) {
    return { nodes: [], edges: [], bounds: emptyBounds(), generations: new Map() };
  }

  // Step 1: Group by generation
  const genGroups = groupByGeneration(graph.order, generations);
  const levels = [...genGroups.keys()].sort((a, b) => a - b);
  const minGeneration = levels[0] ?? 0;

  // Step 2: Order and place each level, top to bottom
  const centers = new Map<PersonId, number>();
  const ordered = new Map<number, PersonId[]>();

  for (const generation of levels) {
    const ids = genGroups.get(generation) ?? [];
    const units = groupIntoFamilyUnits(ids, graph).map((members) => ({
      members,
      anchor: [...members].sort(compareIds)[0] ?? "",
      key: barycenter(members, graph, centers),
    }));
    sortUnits(units);

    const row = placeLevel(units, config);
    for (const [id, x] of row) centers.set(id, x);
    ordered.set(generation, [...row.keys()]);
  }

  // Step 3: Build render nodes in level order
  const nodes: RenderNode[] = [];
  for (const generation of levels) {
    const y = config.originY + (generation - minGeneration) * config.levelHeight;
    for (const id of ordered.get(generation) ?? []) {
      const person = graph.persons.get(id);
      const x = centers.get(id);
      if (!person || x === undefined) continue;
      nodes.push(createNode(id, person, x, y, generation, config));
    }
  }

  // Step 4: Route edges
  const edges = routeEdges(graph, new Map(nodes.map((node) => [node.id, node])), config);

  return { nodes, edges, bounds: computeBounds(nodes), generations: ordered };
}

function groupByGeneration(order: PersonId[], generations: GenerationMap): Map<number, PersonId[]> {
  const groups = new Map<number, PersonId[]>();

  // order is ascending, so each group comes out sorted by id
  for (const id of order) {
    const gen = generations.get(id) ?? 0;
    const group = groups.get(gen);
    if (group) {
      group.push(id);
    } else {
      groups.set(gen, [id]);
    }
  }

  return groups;
}

/**
 * Groups a level into spouse-connected units. Each unit is walked depth-first
 * from a chain end (a member with at most one spouse on the level, smallest
 * id first), so a person with two spouses sits between them.
 */
export function groupIntoFamilyUnits(nodeIds: PersonId[], graph: FamilyGraph): PersonId[][] {
  const onLevel = new Set(nodeIds);
  const levelSpouses = (id: PersonId) =>
    (graph.entries.get(id)?.spouseIds ?? []).filter((spouseId) => onLevel.has(spouseId));

  const assigned = new Set<PersonId>();
  const units: PersonId[][] = [];

  for (const id of nodeIds) {
    if (assigned.has(id)) continue;

    const component = collectSpouses(id, levelSpouses);
    for (const member of component) assigned.add(member);

    const start = component.find((member) => levelSpouses(member).length <= 1) ?? id;
    units.push(walkSpouses(start, levelSpouses));
  }

  return units;
}

/** Every member reachable through spouse links, ascending by id */
function collectSpouses(id: PersonId, levelSpouses: (id: PersonId) => PersonId[]): PersonId[] {
  const seen = new Set<PersonId>([id]);
  const queue = [id];
  for (let i = 0; i < queue.length; i++) {
    for (const spouseId of levelSpouses(queue[i])) {
      if (seen.has(spouseId)) continue;
      seen.add(spouseId);
      queue.push(spouseId);
    }
  }
  return [...seen].sort(compareIds);
}

function walkSpouses(start: PersonId, levelSpouses: (id: PersonId) => PersonId[]): PersonId[] {
  const visited = new Set<PersonId>();
  const unit: PersonId[] = [];
  const stack = [start];

  while (stack.length > 0) {
    const current = stack.pop();
    if (current === undefined || visited.has(current)) continue;
    visited.add(current);
    unit.push(current);

    const spouses = levelSpouses(current);
    for (let i = spouses.length - 1; i >= 0; i--) {
      if (!visited.has(spouses[i])) stack.push(spouses[i]);
    }
  }

  return unit;
}

/** Mean x of the already-placed parents of a unit's members */
function barycenter(
  members: PersonId[],
  graph: FamilyGraph,
  centers: Map<PersonId, number>,
): number | undefined {
  const parentXPositions: number[] = [];
  for (const id of members) {
    for (const parentId of graph.entries.get(id)?.parentIds ?? []) {
      const x = centers.get(parentId);
      if (x !== undefined) parentXPositions.push(x);
    }
  }

  if (parentXPositions.length === 0) return undefined;
  return parentXPositions.reduce((a, b) => a + b, 0) / parentXPositions.length;
}

function sortUnits(units: FamilyUnit[]): void {
  units.sort((a, b) => {
    if (a.key !== undefined && b.key !== undefined && a.key !== b.key) return a.key - b.key;
    if (a.key !== undefined && b.key === undefined) return -1;
    if (a.key === undefined && b.key !== undefined) return 1;
    return compareIds(a.anchor, b.anchor);
  });
}

/** Assigns slot centers left to right, then centers the row on originX */
function placeLevel(units: FamilyUnit[], config: LayoutConfig): Map<PersonId, number> {
  const lefts = new Map<PersonId, number>();
  let cursor = 0;

  units.forEach((unit, unitIndex) => {
    if (unitIndex > 0) cursor += config.horizontalGap;
    unit.members.forEach((id, memberIndex) => {
      if (memberIndex > 0) cursor += config.spouseGap;
      lefts.set(id, cursor);
      cursor += config.nodeWidth;
    });
  });

  const offset = config.originX - cursor / 2;
  const centers = new Map<PersonId, number>();
  for (const [id, left] of lefts) {
    centers.set(id, offset + left + config.nodeWidth / 2);
  }
  return centers;
}

function createNode(
  id: PersonId,
  person: RenderNode["person"],
  x: number,
  y: number,
  generation: number,
  config: LayoutConfig,
): RenderNode {
  const halfWidth = config.nodeWidth / 2;
  const halfHeight = config.nodeHeight / 2;
  return {
    id,
    person,
    x,
    y,
    width: config.nodeWidth,
    height: config.nodeHeight,
    bounds: { minX: x - halfWidth, minY: y - halfHeight, maxX: x + halfWidth, maxY: y + halfHeight },
    generation,
  };
}

function emptyBounds(): Bounds {
  return { minX: 0, minY: 0, maxX: 0, maxY: 0 };
}

export function computeBounds(nodes: RenderNode[]): Bounds {
  if (nodes.length === 0) {
    return emptyBounds();
  }

  let minX = Infinity;
  let minY = Infinity;
  let maxX = -Infinity;
  let maxY = -Infinity;

  for (const node of nodes) {
    minX = Math.min(minX, node.bounds.minX);
    minY = Math.min(minY, node.bounds.minY);
    maxX = Math.max(maxX, node.bounds.maxX);
    maxY = Math.max(maxY, node.bounds.maxY);
  }

  return { minX, minY, maxX, maxY };
}
