export { createPGLiteDb, migratePGLiteDb, schema, type PGLiteDatabase } from "./pglite";
export { FamilyRecordStore, createRecordStore, type StoreCounts } from "./store";
export {
  RecordNotFoundError,
  RecordValidationError,
  DatabaseQueryError,
  type RecordStoreError,
} from "./errors";
export {
  personInputSchema,
  personUpdateSchema,
  relationshipInputSchema,
  relationshipTypeSchema,
  SELF_RELATIONSHIP_MESSAGE,
  type PersonFields,
  type PersonInput,
  type PersonUpdate,
  type RelationshipInput,
} from "./validation";
export type { PersonRow, NewPersonRow, RelationshipRow } from "./schema";
