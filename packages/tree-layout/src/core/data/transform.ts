import { DataError } from "../errors";
import type { Person, Relationship, RelationshipKind } from "./types";

/** A person row as the record store keeps it */
export interface RawPerson {
  id: number | string;
  firstName?: string | null;
  middleName?: string | null;
  lastName?: string | null;
  maidenName?: string | null;
  birthDate?: string | null;
  deathDate?: string | null;
  burialPlace?: string | null;
  links?: string | null;
  notes?: string | null;
}

/**
 * A relationship row as the record store keeps it: `memberId` is
 * `relationshipType` of `relativeId` ("parent" = member is parent of relative).
 */
export interface RawRelationship {
  id: number | string;
  memberId: number | string;
  relativeId: number | string;
  relationshipType: string | null;
}

export interface NormalizedKind {
  kind: RelationshipKind;
  /** Endpoints must be swapped so that sourceId is the parent */
  reversed: boolean;
}

const KIND_ALIASES: Record<string, NormalizedKind> = {
  parent: { kind: "parent", reversed: false },
  father: { kind: "parent", reversed: false },
  mother: { kind: "parent", reversed: false },
  child: { kind: "parent", reversed: true },
  son: { kind: "parent", reversed: true },
  daughter: { kind: "parent", reversed: true },
  spouse: { kind: "spouse", reversed: false },
  husband: { kind: "spouse", reversed: false },
  wife: { kind: "spouse", reversed: false },
  partner: { kind: "spouse", reversed: false },
  sibling: { kind: "sibling", reversed: false },
  brother: { kind: "sibling", reversed: false },
  sister: { kind: "sibling", reversed: false },
};

function optional(value: string | null | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function buildDisplayName(raw: RawPerson): string {
  const parts = [raw.firstName, raw.middleName, raw.lastName]
    .map((part) => part?.trim())
    .filter((part): part is string => Boolean(part));
  return parts.length > 0 ? parts.join(" ") : String(raw.id);
}

export function transformPerson(raw: RawPerson): Person {
  return {
    id: String(raw.id),
    name: buildDisplayName(raw),
    firstName: optional(raw.firstName),
    middleName: optional(raw.middleName),
    lastName: optional(raw.lastName),
    maidenName: optional(raw.maidenName),
    birthDate: optional(raw.birthDate),
    deathDate: optional(raw.deathDate),
    burialPlace: optional(raw.burialPlace),
    links: optional(raw.links),
    notes: optional(raw.notes),
  };
}

export function normalizeRelationshipKind(type: string | null | undefined): NormalizedKind | null {
  if (!type) return null;
  return KIND_ALIASES[type.trim().toLowerCase()] ?? null;
}

export function transformRelationship(raw: RawRelationship): Relationship | DataError {
  const id = String(raw.id);
  const memberId = String(raw.memberId);
  const relativeId = String(raw.relativeId);
  const normalized = normalizeRelationshipKind(raw.relationshipType);

  if (!normalized) {
    return new DataError({
      reason: "unsupported-kind",
      message: `unsupported relationship type '${raw.relationshipType ?? ""}'`,
      relationshipId: id,
      personIds: [memberId, relativeId],
    });
  }

  const [sourceId, targetId] = normalized.reversed ? [relativeId, memberId] : [memberId, relativeId];
  return { id, kind: normalized.kind, sourceId, targetId };
}

export interface Snapshot {
  persons: Person[];
  relationships: Relationship[];
  issues: DataError[];
}

export function transformSnapshot(
  rawPersons: readonly RawPerson[],
  rawRelationships: readonly RawRelationship[],
): Snapshot {
  const relationships: Relationship[] = [];
  const issues: DataError[] = [];

  for (const raw of rawRelationships) {
    const result = transformRelationship(raw);
    if (result instanceof DataError) {
      issues.push(result);
    } else {
      relationships.push(result);
    }
  }

  return { persons: rawPersons.map(transformPerson), relationships, issues };
}
