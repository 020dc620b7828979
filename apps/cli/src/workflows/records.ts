import { Effect } from "effect";
import { readFile } from "fs/promises";
import type { PersonRow } from "@kinmap/db";
import { Records } from "../services";
import { FileError, ImportFormatError, UsageError } from "../domain/errors";
import { familyFileSchema, type FamilyFile } from "../domain/family-file";

// ============================================================================
// Types
// ============================================================================

export interface StatusResult {
  totalPersons: number;
  totalRelationships: number;
  unsupportedRelationships: number;
}

export interface ImportResult {
  personCount: number;
  relationshipCount: number;
  /** Person key in the file -> stored person id */
  ids: Map<string, number>;
}

/** Editable person fields with the labels shown by `show` */
export const PERSON_FIELDS = {
  firstName: "First Name",
  middleName: "Middle Name",
  lastName: "Last Name",
  maidenName: "Maiden Name",
  birthDate: "Birth Date",
  deathDate: "Death Date",
  burialPlace: "Burial Place",
  links: "Links",
  notes: "Notes",
} as const;

export type PersonField = keyof typeof PERSON_FIELDS;

const isPersonField = (name: string): name is PersonField => Object.hasOwn(PERSON_FIELDS, name);

// ============================================================================
// Status
// ============================================================================

export const status = Effect.gen(function* () {
  const records = yield* Records;
  const counts = yield* records.counts();
  const snapshot = yield* records.snapshot();

  return {
    totalPersons: counts.persons,
    totalRelationships: counts.relationships,
    unsupportedRelationships: snapshot.issues.length,
  } satisfies StatusResult;
});

// ============================================================================
// Single Records
// ============================================================================

export const addPerson = (firstName: string, lastName: string) =>
  Effect.gen(function* () {
    const records = yield* Records;
    const row = yield* records.addPerson({ firstName, lastName });
    yield* Effect.log(`Added person ${row.id}: ${row.firstName} ${row.lastName}`);
    return row;
  });

export const relate = (memberId: string, relativeId: string, relationshipType: string) =>
  Effect.gen(function* () {
    const records = yield* Records;
    const row = yield* records.addRelationship(memberId, relativeId, relationshipType);
    yield* Effect.log(`Recorded ${row.memberId} as ${row.relationshipType} of ${row.relativeId}`);
    return row;
  });

export const removePerson = (id: string) =>
  Effect.gen(function* () {
    const records = yield* Records;
    const person = yield* records.getPerson(id);
    yield* records.deletePerson(person.id);
    yield* Effect.log(`Removed person ${person.id}: ${person.firstName} ${person.lastName}`);
    return person;
  });

export const showPerson = (id: string) =>
  Effect.gen(function* () {
    const records = yield* Records;
    return yield* records.getPerson(id);
  });

/** Label and value of every person field, empty for unset fields */
export function personDetails(person: PersonRow): Array<[label: string, value: string]> {
  return Object.keys(PERSON_FIELDS)
    .filter(isPersonField)
    .map((field) => [PERSON_FIELDS[field], person[field] ?? ""]);
}

/** Parses `field=value` arguments; an empty value clears an optional field */
export const parseFieldAssignments = (assignments: readonly string[]) =>
  Effect.gen(function* () {
    if (assignments.length === 0) {
      return yield* Effect.fail(new UsageError({ message: "Nothing to update, pass field=value pairs" }));
    }

    const fields: Partial<Record<PersonField, string>> = {};
    for (const assignment of assignments) {
      const separator = assignment.indexOf("=");
      const name = assignment.slice(0, Math.max(separator, 0));
      if (separator === -1 || !isPersonField(name)) {
        return yield* Effect.fail(
          new UsageError({
            message: `Expected field=value with field one of ${Object.keys(PERSON_FIELDS).join(", ")}, got '${assignment}'`,
          }),
        );
      }
      fields[name] = assignment.slice(separator + 1);
    }
    return fields;
  });

export const updatePerson = (id: string, assignments: readonly string[]) =>
  Effect.gen(function* () {
    const records = yield* Records;
    const fields = yield* parseFieldAssignments(assignments);
    const row = yield* records.updatePerson(id, fields);
    yield* Effect.log(`Updated person ${row.id}: ${Object.keys(fields).join(", ")}`);
    return row;
  });

// ============================================================================
// Import
// ============================================================================

export const readFamilyFile = (path: string) =>
  Effect.gen(function* () {
    const text = yield* Effect.tryPromise({
      try: () => readFile(path, "utf8"),
      catch: (error) => new FileError({ path, message: `Failed to read ${path}: ${error}`, cause: error }),
    });

    const json = yield* Effect.try({
      try: (): unknown => JSON.parse(text),
      catch: (error) => new ImportFormatError({ path, message: `${path} is not valid JSON`, issues: [String(error)] }),
    });

    const result = familyFileSchema.safeParse(json);
    if (!result.success) {
      const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
      return yield* Effect.fail(
        new ImportFormatError({ path, message: `${path} is not a family file: ${issues.join("; ")}`, issues }),
      );
    }

    return result.data;
  });

/** Adds every person, then every relationship, of a family file */
export const importFamily = (path: string) =>
  Effect.gen(function* () {
    const records = yield* Records;
    const file: FamilyFile = yield* readFamilyFile(path);

    yield* Effect.log(`Importing ${file.persons.length} persons from ${path}`);

    const ids = new Map<string, number>();
    for (const { key, ...fields } of file.persons) {
      const row = yield* records.addPerson(fields);
      ids.set(key, row.id);
    }

    for (const relationship of file.relationships) {
      const memberId = ids.get(relationship.member);
      const relativeId = ids.get(relationship.relative);
      if (memberId === undefined || relativeId === undefined) {
        return yield* Effect.fail(
          new ImportFormatError({
            path,
            message: `unknown person key in relationship ${relationship.member} -> ${relationship.relative}`,
            issues: [],
          }),
        );
      }
      yield* records.addRelationship(memberId, relativeId, relationship.type);
    }

    yield* Effect.log(`Imported ${ids.size} persons and ${file.relationships.length} relationships`);

    return {
      personCount: ids.size,
      relationshipCount: file.relationships.length,
      ids,
    } satisfies ImportResult;
  });
