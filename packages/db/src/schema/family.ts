import { pgTable, text, integer, timestamp, index, unique } from "drizzle-orm/pg-core";

// Family members as entered by the user
export const persons = pgTable(
  "persons",
  {
    id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
    firstName: text("first_name").notNull(),
    middleName: text("middle_name"),
    lastName: text("last_name").notNull(),
    maidenName: text("maiden_name"),
    birthDate: text("birth_date"), // Keep as text for partial dates like "1750"
    deathDate: text("death_date"),
    burialPlace: text("burial_place"),
    links: text("links"),
    notes: text("notes"),
    createdAt: timestamp("created_at").defaultNow(),
    updatedAt: timestamp("updated_at").defaultNow(),
  },
  (table) => [index("idx_persons_last_name").on(table.lastName)],
);

// Free-text relationship from member to relative ('parent' means member is the relative's parent)
export const relationships = pgTable(
  "relationships",
  {
    id: integer("id").primaryKey().generatedAlwaysAsIdentity(),
    memberId: integer("member_id")
      .notNull()
      .references(() => persons.id, { onDelete: "cascade" }),
    relativeId: integer("relative_id")
      .notNull()
      .references(() => persons.id, { onDelete: "cascade" }),
    relationshipType: text("relationship_type").notNull(),
    createdAt: timestamp("created_at").defaultNow(),
  },
  (table) => [
    index("idx_relationships_member").on(table.memberId),
    index("idx_relationships_relative").on(table.relativeId),
    unique("unique_relationship").on(table.memberId, table.relativeId, table.relationshipType),
  ],
);

export type PersonRow = typeof persons.$inferSelect;
export type NewPersonRow = typeof persons.$inferInsert;
export type RelationshipRow = typeof relationships.$inferSelect;
