import { PGlite } from "@electric-sql/pglite";
import { drizzle } from "drizzle-orm/pglite";
import { pushSchema } from "drizzle-kit/api";

import * as schema from "./schema";

export type PGLiteDatabase = ReturnType<typeof createPGLiteDb>;

/**
 * Create a PGLite database instance.
 *
 * @param dataDir - Path to the data directory for persistence, or "memory://" for in-memory
 *
 * @example
 * // File-based persistence
 * const db = createPGLiteDb("./data/pglite");
 *
 * @example
 * // In-memory (testing)
 * const db = createPGLiteDb("memory://");
 */
export function createPGLiteDb(dataDir: string = "./data/pglite") {
  const client = new PGlite(dataDir);
  return drizzle(client, { schema });
}

export { schema };

/**
 * Bring the tables and indexes in line with the drizzle schema. Running it on
 * an up-to-date database changes nothing; changes that would drop data are
 * refused.
 *
 * @returns the statements that were applied
 */
export async function migratePGLiteDb(db: PGLiteDatabase): Promise<string[]> {
  const { hasDataLoss, warnings, statementsToExecute, apply } = await pushSchema(schema, db);
  if (hasDataLoss) {
    throw new Error(`Schema change would lose data: ${warnings.join("; ")}`);
  }
  await apply();
  return statementsToExecute;
}
