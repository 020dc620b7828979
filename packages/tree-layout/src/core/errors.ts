import { Data } from "effect";
import type { PersonId } from "./data/types";

// ============================================================================
// Data Errors (per record, never fatal)
// ============================================================================

export type DataErrorReason =
  | "self-relationship"
  | "unknown-person"
  | "unsupported-kind"
  | "parent-cycle"
  | "spouse-lineage";

export class DataError extends Data.TaggedError("DataError")<{
  readonly reason: DataErrorReason;
  readonly message: string;
  readonly relationshipId?: string;
  readonly personIds: readonly PersonId[];
}> {}

// ============================================================================
// Layout Errors (fatal to one pass)
// ============================================================================

export class LayoutInvariantViolation extends Data.TaggedError("LayoutInvariantViolation")<{
  readonly message: string;
  readonly personIds: readonly PersonId[];
}> {}

// ============================================================================
// Configuration Errors
// ============================================================================

export class ConfigurationError extends Data.TaggedError("ConfigurationError")<{
  readonly message: string;
  readonly key?: string;
}> {}

// ============================================================================
// Type Unions for Error Handling
// ============================================================================

export type LayoutError = LayoutInvariantViolation | ConfigurationError;

export function formatDataError(error: DataError): string {
  const subject = error.relationshipId ? `relationship ${error.relationshipId}` : "record";
  return `[${error.reason}] ${subject}: ${error.message}`;
}

/**
 * A layout pass that failed. Before publishing the previous model stays
 * current; a `publish` failure comes from the onModel listener.
 */
export class LayoutPassError extends Data.TaggedError("LayoutPassError")<{
  readonly stage: "read" | "layout" | "publish";
  readonly message: string;
  readonly cause: unknown;
}> {}

export type LayoutSessionError = LayoutInvariantViolation | LayoutPassError;
