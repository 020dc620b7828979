import { and, asc, eq, sql } from "drizzle-orm";
import {
  transformPerson,
  transformSnapshot,
  type Person,
  type RecordStore,
  type Relationship,
  type Snapshot,
} from "@kinmap/tree-layout";

import { persons, relationships, type PersonRow, type RelationshipRow } from "./schema";
import { notFound, withDatabaseErrorHandling } from "./errors";
import {
  personInputSchema,
  personUpdateSchema,
  recordIdSchema,
  relationshipInputSchema,
  validate,
} from "./validation";
import type { PGLiteDatabase } from "./pglite";

export interface StoreCounts {
  persons: number;
  relationships: number;
}

/**
 * Person and relationship records in PGLite. Every successful write signals
 * the subscribed listeners once.
 */
export class FamilyRecordStore implements RecordStore {
  private readonly listeners = new Set<() => void>();

  constructor(private readonly db: PGLiteDatabase) {}

  // --------------------------------------------------------------------------
  // Snapshot reads
  // --------------------------------------------------------------------------

  async listPersons(): Promise<Person[]> {
    return (await this.listPersonRows()).map(transformPerson);
  }

  /** Relationships usable for layout; rows of unknown type are left out */
  async listRelationships(): Promise<Relationship[]> {
    return (await this.readSnapshot()).relationships;
  }

  /** Layout input plus the rows that could not be normalized */
  async readSnapshot(): Promise<Snapshot> {
    const [personRows, relationshipRows] = await Promise.all([
      this.listPersonRows(),
      this.listRelationshipRows(),
    ]);
    return transformSnapshot(personRows, relationshipRows);
  }

  listPersonRows(): Promise<PersonRow[]> {
    return withDatabaseErrorHandling("listPersons", () =>
      this.db.select().from(persons).orderBy(asc(persons.id)),
    );
  }

  listRelationshipRows(): Promise<RelationshipRow[]> {
    return withDatabaseErrorHandling("listRelationships", () =>
      this.db.select().from(relationships).orderBy(asc(relationships.id)),
    );
  }

  counts(): Promise<StoreCounts> {
    return withDatabaseErrorHandling("counts", async () => {
      const [personCount, relationshipCount] = await Promise.all([
        this.db.select({ count: sql<number>`count(*)::int` }).from(persons),
        this.db.select({ count: sql<number>`count(*)::int` }).from(relationships),
      ]);
      return {
        persons: personCount[0]?.count ?? 0,
        relationships: relationshipCount[0]?.count ?? 0,
      };
    });
  }

  subscribe(listener: () => void): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  // --------------------------------------------------------------------------
  // Persons
  // --------------------------------------------------------------------------

  async getPerson(id: unknown): Promise<PersonRow> {
    const personId = validate(recordIdSchema, id, "person id");
    return withDatabaseErrorHandling("getPerson", async () => {
      const [row] = await this.db.select().from(persons).where(eq(persons.id, personId)).limit(1);
      if (!row) throw notFound("person", String(personId));
      return row;
    });
  }

  async addPerson(input: unknown): Promise<PersonRow> {
    const fields = validate(personInputSchema, input, "person");
    const row = await withDatabaseErrorHandling("addPerson", async () => {
      const [inserted] = await this.db.insert(persons).values(fields).returning();
      if (!inserted) throw new Error("insert returned no row");
      return inserted;
    });
    this.notify();
    return row;
  }

  async updatePerson(id: unknown, input: unknown): Promise<PersonRow> {
    const personId = validate(recordIdSchema, id, "person id");
    const fields = validate(personUpdateSchema, input, "person");
    const row = await withDatabaseErrorHandling("updatePerson", async () => {
      const [updated] = await this.db
        .update(persons)
        .set({ ...fields, updatedAt: new Date() })
        .where(eq(persons.id, personId))
        .returning();
      if (!updated) throw notFound("person", String(personId));
      return updated;
    });
    this.notify();
    return row;
  }

  /** Deletes a person together with every relationship naming them */
  async deletePerson(id: unknown): Promise<void> {
    const personId = validate(recordIdSchema, id, "person id");
    await withDatabaseErrorHandling("deletePerson", async () => {
      const deleted = await this.db
        .delete(persons)
        .where(eq(persons.id, personId))
        .returning({ id: persons.id });
      if (deleted.length === 0) throw notFound("person", String(personId));
    });
    this.notify();
  }

  // --------------------------------------------------------------------------
  // Relationships
  // --------------------------------------------------------------------------

  /** Records that `memberId` is the `relationshipType` of `relativeId` */
  async addRelationship(memberId: unknown, relativeId: unknown, relationshipType: unknown): Promise<RelationshipRow> {
    const input = validate(relationshipInputSchema, { memberId, relativeId, relationshipType }, "relationship");
    const row = await withDatabaseErrorHandling("addRelationship", async () => {
      for (const personId of [input.memberId, input.relativeId]) {
        const [exists] = await this.db
          .select({ id: persons.id })
          .from(persons)
          .where(eq(persons.id, personId))
          .limit(1);
        if (!exists) throw notFound("person", String(personId));
      }

      const [inserted] = await this.db
        .insert(relationships)
        .values(input)
        .onConflictDoNothing()
        .returning();
      if (inserted) return inserted;

      // Already recorded: return the existing row
      const [existing] = await this.db
        .select()
        .from(relationships)
        .where(
          and(
            eq(relationships.memberId, input.memberId),
            eq(relationships.relativeId, input.relativeId),
            eq(relationships.relationshipType, input.relationshipType),
          ),
        )
        .limit(1);
      if (!existing) throw new Error("conflicting relationship row not found");
      return existing;
    });
    this.notify();
    return row;
  }

  async deleteRelationship(id: unknown): Promise<void> {
    const relationshipId = validate(recordIdSchema, id, "relationship id");
    await withDatabaseErrorHandling("deleteRelationship", async () => {
      const deleted = await this.db
        .delete(relationships)
        .where(eq(relationships.id, relationshipId))
        .returning({ id: relationships.id });
      if (deleted.length === 0) throw notFound("relationship", String(relationshipId));
    });
    this.notify();
  }

  private notify(): void {
    for (const listener of [...this.listeners]) listener();
  }
}

export function createRecordStore(db: PGLiteDatabase): FamilyRecordStore {
  return new FamilyRecordStore(db);
}
