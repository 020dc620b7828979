import { DataError } from "../errors";
import type { FamilyGraph, GraphEntry, Person, PersonId, Relationship } from "../data/types";

export interface GraphBuildResult {
  graph: FamilyGraph;
  issues: DataError[];
}

/** Code-unit string order; locale collation would make layout host-dependent */
export function compareIds(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function pairKey(relationship: Relationship): string {
  const { kind, sourceId, targetId } = relationship;
  if (kind === "parent") return `parent:${sourceId}->${targetId}`;
  const [a, b] = compareIds(sourceId, targetId) <= 0 ? [sourceId, targetId] : [targetId, sourceId];
  return `${kind}:${a}<=>${b}`;
}

function sortedUnique(ids: PersonId[]): PersonId[] {
  return [...new Set(ids)].sort(compareIds);
}

/**
 * Builds parent/child adjacency plus spouse and sibling lists from a flat
 * snapshot. Bad records are reported and skipped; the build never fails.
 */
export function buildGraph(
  persons: readonly Person[],
  relationships: readonly Relationship[],
): GraphBuildResult {
  const personMap = new Map<PersonId, Person>();
  const entries = new Map<PersonId, GraphEntry>();
  const issues: DataError[] = [];

  // First pass: one entry per person, first record wins on duplicate ids
  for (const person of persons) {
    if (personMap.has(person.id)) continue;
    personMap.set(person.id, person);
    entries.set(person.id, {
      id: person.id,
      parentIds: [],
      childIds: [],
      spouseIds: [],
      siblingIds: [],
    });
  }

  const seen = new Set<string>();
  const parentLinks: Relationship[] = [];
  const spouseLinks: Relationship[] = [];
  const siblingLinks: Relationship[] = [];

  // Second pass: accepted relationships
  for (const relationship of relationships) {
    const { id, sourceId, targetId } = relationship;

    if (sourceId === targetId) {
      issues.push(
        new DataError({
          reason: "self-relationship",
          message: `person ${sourceId} cannot be related to themselves`,
          relationshipId: id,
          personIds: [sourceId],
        }),
      );
      continue;
    }

    const source = entries.get(sourceId);
    const target = entries.get(targetId);
    if (!source || !target) {
      const missing = [sourceId, targetId].filter((personId) => !entries.has(personId));
      issues.push(
        new DataError({
          reason: "unknown-person",
          message: `unknown person id ${missing.join(", ")}`,
          relationshipId: id,
          personIds: missing,
        }),
      );
      continue;
    }

    const key = pairKey(relationship);
    if (seen.has(key)) continue;
    seen.add(key);

    switch (relationship.kind) {
      case "parent":
        source.childIds.push(targetId);
        target.parentIds.push(sourceId);
        parentLinks.push(relationship);
        break;
      case "spouse":
        source.spouseIds.push(targetId);
        target.spouseIds.push(sourceId);
        spouseLinks.push(relationship);
        break;
      case "sibling":
        source.siblingIds.push(targetId);
        target.siblingIds.push(sourceId);
        siblingLinks.push(relationship);
        break;
    }
  }

  for (const entry of entries.values()) {
    entry.parentIds = sortedUnique(entry.parentIds);
    entry.childIds = sortedUnique(entry.childIds);
    entry.spouseIds = sortedUnique(entry.spouseIds);
    entry.siblingIds = sortedUnique(entry.siblingIds);
  }

  return {
    graph: {
      persons: personMap,
      entries,
      order: [...entries.keys()].sort(compareIds),
      parentLinks,
      spouseLinks,
      siblingLinks,
    },
    issues,
  };
}
