import { DataError, LayoutInvariantViolation } from "../errors";
import { compareIds } from "../graph/build-graph";
import type { FamilyGraph, GenerationMap, PersonId } from "../data/types";

export interface GenerationResult {
  generations: GenerationMap;
  /** Parent relationships that close a cycle; rendered but not propagated */
  backEdgeIds: string[];
  issues: DataError[];
}

const ON_STACK = 1;
const DONE = 2;

function edgeKey(parentId: PersonId, childId: PersonId): string {
  return `${parentId}->${childId}`;
}

/**
 * Seed order: persons with no parents first, then the fewest parent edges,
 * ties by id. Roots therefore always seed before any fallback start.
 */
function seedOrder(graph: FamilyGraph): PersonId[] {
  const parentCount = (id: PersonId) => graph.entries.get(id)?.parentIds.length ?? 0;
  return [...graph.order].sort((a, b) => parentCount(a) - parentCount(b) || compareIds(a, b));
}

/**
 * Iterative depth-first walk that classifies parent edges pointing at a person
 * still on the walk stack as back edges.
 */
function findBackEdges(graph: FamilyGraph, order: PersonId[]): { seeds: PersonId[]; backEdges: Set<string> } {
  const state = new Map<PersonId, number>();
  const backEdges = new Set<string>();
  const seeds: PersonId[] = [];

  for (const seed of order) {
    if (state.has(seed)) continue;
    seeds.push(seed);

    const stack: Array<{ id: PersonId; next: number }> = [{ id: seed, next: 0 }];
    state.set(seed, ON_STACK);

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const children = graph.entries.get(frame.id)?.childIds ?? [];

      if (frame.next >= children.length) {
        state.set(frame.id, DONE);
        stack.pop();
        continue;
      }

      const childId = children[frame.next];
      frame.next += 1;
      const childState = state.get(childId);

      if (childState === ON_STACK) {
        backEdges.add(edgeKey(frame.id, childId));
      } else if (childState === undefined) {
        state.set(childId, ON_STACK);
        stack.push({ id: childId, next: 0 });
      }
    }
  }

  return { seeds, backEdges };
}

function isDescendant(
  forwardChildren: Map<PersonId, PersonId[]>,
  ancestorId: PersonId,
  personId: PersonId,
): boolean {
  const queue = [ancestorId];
  const visited = new Set<PersonId>(queue);

  for (let head = 0; head < queue.length; head++) {
    for (const childId of forwardChildren.get(queue[head]) ?? []) {
      if (childId === personId) return true;
      if (!visited.has(childId)) {
        visited.add(childId);
        queue.push(childId);
      }
    }
  }

  return false;
}

/**
 * Assigns an integer generation to every person.
 *
 * Generations propagate along parent edges with a frontier queue: a child is
 * re-expanded only when its generation strictly increases, and every value is
 * capped at `personCount - 1`, so the pass terminates on any input. Children
 * take the maximum over their parents. Spouses are pinned to the higher of
 * their two generations, repeated until a sweep changes nothing.
 *
 * @throws LayoutInvariantViolation if a person ends without a generation
 */
export function assignGenerations(graph: FamilyGraph): GenerationResult {
  const generations: GenerationMap = new Map();
  const issues: DataError[] = [];

  if (graph.order.length === 0) {
    return { generations, backEdgeIds: [], issues };
  }

  const cap = graph.order.length - 1;
  const { seeds, backEdges } = findBackEdges(graph, seedOrder(graph));

  const backEdgeIds: string[] = [];
  for (const link of graph.parentLinks) {
    if (!backEdges.has(edgeKey(link.sourceId, link.targetId))) continue;
    backEdgeIds.push(link.id);
    issues.push(
      new DataError({
        reason: "parent-cycle",
        message: `${link.sourceId} is both ancestor and descendant of ${link.targetId}`,
        relationshipId: link.id,
        personIds: [link.sourceId, link.targetId],
      }),
    );
  }

  const forwardChildren = new Map<PersonId, PersonId[]>();
  for (const id of graph.order) {
    const childIds = graph.entries.get(id)?.childIds ?? [];
    forwardChildren.set(
      id,
      childIds.filter((childId) => !backEdges.has(edgeKey(id, childId))),
    );
  }

  const propagate = (start: PersonId[]) => {
    const queue = [...start];
    for (let head = 0; head < queue.length; head++) {
      const id = queue[head];
      const generation = generations.get(id);
      if (generation === undefined) continue;

      const candidate = generation + 1;
      if (candidate > cap) continue;

      for (const childId of forwardChildren.get(id) ?? []) {
        const current = generations.get(childId);
        if (current !== undefined && candidate <= current) continue;
        generations.set(childId, candidate);
        queue.push(childId);
      }
    }
  };

  // Each seed is unreachable from the seeds before it
  for (const seed of seeds) {
    if (generations.has(seed)) continue;
    generations.set(seed, 0);
    propagate([seed]);
  }

  // Spouse pinning
  const spousePairs: Array<[PersonId, PersonId]> = [];
  for (const link of graph.spouseLinks) {
    const [a, b] =
      compareIds(link.sourceId, link.targetId) <= 0
        ? [link.sourceId, link.targetId]
        : [link.targetId, link.sourceId];

    if (isDescendant(forwardChildren, a, b) || isDescendant(forwardChildren, b, a)) {
      issues.push(
        new DataError({
          reason: "spouse-lineage",
          message: `spouses ${a} and ${b} are in a direct line of descent`,
          relationshipId: link.id,
          personIds: [a, b],
        }),
      );
      continue;
    }
    spousePairs.push([a, b]);
  }
  spousePairs.sort((x, y) => compareIds(x[0], y[0]) || compareIds(x[1], y[1]));

  let changed = true;
  while (changed) {
    changed = false;
    for (const [a, b] of spousePairs) {
      const genA = generations.get(a);
      const genB = generations.get(b);
      if (genA === undefined || genB === undefined || genA === genB) continue;

      const [lower, target] = genA < genB ? [a, genB] : [b, genA];
      generations.set(lower, target);
      propagate([lower]);
      changed = true;
    }
  }

  const missing = graph.order.filter((id) => !Number.isInteger(generations.get(id)));
  if (missing.length > 0) {
    throw new LayoutInvariantViolation({
      message: `No generation assigned to ${missing.length} person(s)`,
      personIds: missing,
    });
  }

  return { generations, backEdgeIds, issues };
}
