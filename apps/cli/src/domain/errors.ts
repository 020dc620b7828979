import { Data } from "effect";
import type {
  ConfigurationError,
  LayoutInvariantViolation,
} from "@kinmap/tree-layout";
import type { RecordStoreError } from "@kinmap/db";

// ============================================================================
// Database Errors
// ============================================================================

export class DatabaseConnectionError extends Data.TaggedError("DatabaseConnectionError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class DatabaseMigrationError extends Data.TaggedError("DatabaseMigrationError")<{
  readonly message: string;
  readonly cause?: unknown;
}> {}

// ============================================================================
// File Errors
// ============================================================================

export class FileError extends Data.TaggedError("FileError")<{
  readonly path: string;
  readonly message: string;
  readonly cause?: unknown;
}> {}

export class ImportFormatError extends Data.TaggedError("ImportFormatError")<{
  readonly path: string;
  readonly message: string;
  readonly issues: readonly string[];
}> {}

// ============================================================================
// Usage Errors
// ============================================================================

export class UsageError extends Data.TaggedError("UsageError")<{
  readonly message: string;
}> {}

// ============================================================================
// Type Unions for Error Handling
// ============================================================================

export type DbError = DatabaseConnectionError | DatabaseMigrationError | RecordStoreError;

export type CliError =
  | DbError
  | FileError
  | ImportFormatError
  | UsageError
  | ConfigurationError
  | LayoutInvariantViolation;
