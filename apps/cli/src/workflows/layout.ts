import { Effect } from "effect";
import {
  LayoutInvariantViolation,
  clampZoom,
  computeRenderModel,
  formatDataError,
  hitTest,
  type PersonId,
  type RenderModel,
  type ViewportState,
} from "@kinmap/tree-layout";
import type { PersonRow } from "@kinmap/db";
import { Config, Records } from "../services";

// ============================================================================
// Types
// ============================================================================

export interface LayoutRow {
  generation: number;
  persons: Array<{ id: PersonId; name: string; x: number }>;
}

export interface HitResult {
  viewport: ViewportState;
  personId: PersonId | null;
  name: string | null;
  /** Stored record of the person hit */
  person: PersonRow | null;
}

// ============================================================================
// Layout Pass
// ============================================================================

/**
 * Reads a snapshot and runs one layout pass. Every excluded or adjusted
 * record is logged as a warning.
 */
export const computeModel = Effect.gen(function* () {
  const config = yield* Config;
  const records = yield* Records;

  const snapshot = yield* records.snapshot();
  const model = yield* Effect.try({
    try: () => computeRenderModel(snapshot.persons, snapshot.relationships, config.layout),
    catch: (error) =>
      error instanceof LayoutInvariantViolation
        ? error
        : new LayoutInvariantViolation({ message: `Layout pass failed: ${error}`, personIds: [] }),
  });

  const issues = [...snapshot.issues, ...model.issues];
  for (const issue of issues) {
    yield* Effect.logWarning(formatDataError(issue));
  }

  yield* Effect.logDebug(`Laid out ${model.nodes.length} persons and ${model.edges.length} edges`);

  return { ...model, issues };
});

/** Persons per generation, top to bottom, in on-screen order */
export function layoutRows(model: RenderModel): LayoutRow[] {
  const byId = new Map(model.nodes.map((node) => [node.id, node]));
  return [...model.generations.entries()]
    .sort(([a], [b]) => a - b)
    .map(([generation, ids]) => ({
      generation,
      persons: ids.flatMap((id) => {
        const node = byId.get(id);
        return node ? [{ id, name: node.person.name, x: node.x }] : [];
      }),
    }));
}

// ============================================================================
// Hit Testing
// ============================================================================

/** Person under a screen point for an unpanned viewport at `zoom` */
export const hit = (screenX: number, screenY: number, zoom?: number) =>
  Effect.gen(function* () {
    const config = yield* Config;
    const model = yield* computeModel;

    const viewport: ViewportState = {
      dx: 0,
      dy: 0,
      zoom: clampZoom(zoom ?? config.viewport.initialZoom, config.viewport),
    };
    const personId = hitTest(model, viewport, { x: screenX, y: screenY });
    if (personId === null) {
      return { viewport, personId, name: null, person: null } satisfies HitResult;
    }

    const records = yield* Records;
    const person = yield* records.getPerson(personId);
    const node = model.nodes.find((n) => n.id === personId);

    return { viewport, personId, name: node?.person.name ?? null, person } satisfies HitResult;
  });
