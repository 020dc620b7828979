import { Context, Effect, Layer } from "effect";
import {
  createRecordStore,
  DatabaseQueryError,
  RecordNotFoundError,
  RecordValidationError,
  type FamilyRecordStore,
  type PersonRow,
  type RecordStoreError,
  type RelationshipRow,
  type StoreCounts,
} from "@kinmap/db";
import type { Snapshot } from "@kinmap/tree-layout";
import { Database } from "./Database";

// ============================================================================
// Types
// ============================================================================

export interface RecordsService {
  readonly snapshot: () => Effect.Effect<Snapshot, RecordStoreError>;
  readonly counts: () => Effect.Effect<StoreCounts, RecordStoreError>;

  readonly addPerson: (input: unknown) => Effect.Effect<PersonRow, RecordStoreError>;
  readonly updatePerson: (id: unknown, input: unknown) => Effect.Effect<PersonRow, RecordStoreError>;
  readonly deletePerson: (id: unknown) => Effect.Effect<void, RecordStoreError>;
  readonly getPerson: (id: unknown) => Effect.Effect<PersonRow, RecordStoreError>;

  readonly addRelationship: (
    memberId: unknown,
    relativeId: unknown,
    relationshipType: unknown,
  ) => Effect.Effect<RelationshipRow, RecordStoreError>;
}

// ============================================================================
// Service Tag
// ============================================================================

export class Records extends Context.Tag("Records")<Records, RecordsService>() {}

// ============================================================================
// Implementation Helpers
// ============================================================================

const withStoreError =
  (operation: string) =>
  (error: unknown): RecordStoreError =>
    error instanceof RecordNotFoundError ||
    error instanceof RecordValidationError ||
    error instanceof DatabaseQueryError
      ? error
      : new DatabaseQueryError({
          message: `Records ${operation} failed: ${error}`,
          operation,
          cause: error,
        });

const fromStore = <A>(operation: string, run: () => Promise<A>) =>
  Effect.tryPromise({ try: run, catch: withStoreError(operation) });

export const makeRecords = (store: FamilyRecordStore): RecordsService => ({
  snapshot: () => fromStore("snapshot", () => store.readSnapshot()),
  counts: () => fromStore("counts", () => store.counts()),
  addPerson: (input) => fromStore("addPerson", () => store.addPerson(input)),
  updatePerson: (id, input) => fromStore("updatePerson", () => store.updatePerson(id, input)),
  deletePerson: (id) => fromStore("deletePerson", () => store.deletePerson(id)),
  getPerson: (id) => fromStore("getPerson", () => store.getPerson(id)),
  addRelationship: (memberId, relativeId, relationshipType) =>
    fromStore("addRelationship", () => store.addRelationship(memberId, relativeId, relationshipType)),
});

// ============================================================================
// Layer Implementation
// ============================================================================

export const RecordsLive = Layer.effect(
  Records,
  Effect.gen(function* () {
    const { db } = yield* Database;
    return makeRecords(createRecordStore(db));
  }),
);
