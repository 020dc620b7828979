import { Context, Effect, Layer } from "effect";
import { createPGLiteDb, migratePGLiteDb, type PGLiteDatabase } from "@kinmap/db";
import { mkdir, readdir, access } from "fs/promises";
import { Config } from "./Config";
import { DatabaseConnectionError, DatabaseMigrationError } from "../domain/errors";

// ============================================================================
// Database Types
// ============================================================================

export type DrizzleDb = PGLiteDatabase;

export interface DatabaseService {
  readonly db: DrizzleDb;
}

// ============================================================================
// Database Service Tag
// ============================================================================

export class Database extends Context.Tag("Database")<Database, DatabaseService>() {}

// ============================================================================
// Directory Validation
// ============================================================================

// Check if a path exists (file or directory)
const pathExists = (path: string) =>
  Effect.tryPromise({
    try: () => access(path).then(() => true),
    catch: () => new Error("not found"),
  }).pipe(Effect.catchAll(() => Effect.succeed(false)));

const ensureDataDir = (dataDir: string) =>
  Effect.gen(function* () {
    if (dataDir.startsWith("memory://")) return;

    const exists = yield* pathExists(dataDir);

    if (!exists) {
      yield* Effect.log(`Creating data directory: ${dataDir}`);
      yield* Effect.tryPromise({
        try: () => mkdir(dataDir, { recursive: true }),
        catch: (error) =>
          new DatabaseConnectionError({
            message: `Failed to create data directory: ${dataDir}`,
            cause: error,
          }),
      });
      return;
    }

    const files = yield* Effect.tryPromise({
      try: () => readdir(dataDir),
      catch: () => new Error("read failed"),
    }).pipe(Effect.catchAll(() => Effect.succeed<string[]>([])));

    const isPGLiteDir = files.some((f) => f.startsWith("pg_") || f === "PG_VERSION" || f === "base");

    if (isPGLiteDir) {
      yield* Effect.logDebug("Using existing database");
    } else if (files.length > 0) {
      yield* Effect.logWarning(
        `Directory ${dataDir} exists but doesn't appear to be a PGLite database. ` +
          `Contents: [${files.slice(0, 5).join(", ")}${files.length > 5 ? "..." : ""}]`,
      );
    }
  });

// ============================================================================
// Layer Implementations
// ============================================================================

// Opens the database, creates missing tables and closes the client when the scope ends
const openDatabase = (dataDir: string) =>
  Effect.gen(function* () {
    yield* Effect.logDebug(`Initializing database at: ${dataDir}`);
    yield* ensureDataDir(dataDir);

    const db = yield* Effect.try({
      try: () => createPGLiteDb(dataDir),
      catch: (error) =>
        new DatabaseConnectionError({
          message: `Failed to connect to database at ${dataDir}`,
          cause: error,
        }),
    });

    // Closing also flushes the data directory (prevents corruption on Ctrl+C)
    yield* Effect.addFinalizer(() =>
      Effect.gen(function* () {
        yield* Effect.logDebug("Closing database connection...");
        yield* Effect.tryPromise({
          try: () => db.$client.close(),
          catch: (error) => new Error(`Close failed: ${error}`),
        }).pipe(Effect.ignore);
      }),
    );

    yield* Effect.tryPromise({
      try: () => migratePGLiteDb(db),
      catch: (error) =>
        new DatabaseMigrationError({
          message: "Failed to create database tables",
          cause: error,
        }),
    });

    return { db };
  });

// Live database at the configured data directory
export const DatabaseLive = Layer.scoped(
  Database,
  Effect.gen(function* () {
    const config = yield* Config;
    return yield* openDatabase(config.dataDir);
  }),
);

// In-memory database for testing
export const DatabaseTest = Layer.scoped(Database, openDatabase("memory://"));
