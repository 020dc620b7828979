import { Data } from "effect";

// ============================================================================
// Record Store Errors
// ============================================================================

export class RecordNotFoundError extends Data.TaggedError("RecordNotFoundError")<{
  readonly entity: "person" | "relationship";
  readonly id: string;
  readonly message: string;
}> {}

export class RecordValidationError extends Data.TaggedError("RecordValidationError")<{
  readonly message: string;
  /** One entry per failed field, "field: reason" */
  readonly issues: readonly string[];
}> {}

export class DatabaseQueryError extends Data.TaggedError("DatabaseQueryError")<{
  readonly message: string;
  readonly operation: string;
  readonly cause?: unknown;
}> {}

export type RecordStoreError = RecordNotFoundError | RecordValidationError | DatabaseQueryError;

/**
 * Resource not found error.
 * Use when a requested person or relationship doesn't exist.
 */
export function notFound(entity: RecordNotFoundError["entity"], id: string) {
  return new RecordNotFoundError({ entity, id, message: `${entity} '${id}' not found` });
}

/**
 * Helper to execute database operations with error handling. Store errors
 * raised inside `fn` pass through unchanged.
 */
export async function withDatabaseErrorHandling<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof RecordNotFoundError || error instanceof RecordValidationError) {
      throw error;
    }
    throw new DatabaseQueryError({
      message: `Database operation failed: ${operation}`,
      operation,
      cause: error,
    });
  }
}
