import { Effect } from "effect";
import { writeFile, mkdir } from "fs/promises";
import { dirname } from "path";
import { formatDataError, renderSvg, type RenderModel } from "@kinmap/tree-layout";
import { computeModel } from "./layout";
import { FileError } from "../domain/errors";

// ============================================================================
// Types
// ============================================================================

export interface ExportResult {
  personCount: number;
  edgeCount: number;
  sizeBytes: number;
  outputPath: string;
}

export const DEFAULT_JSON_OUTPUT = "./kinmap-layout.json";
export const DEFAULT_SVG_OUTPUT = "./kinmap.svg";

// ============================================================================
// Serialization
// ============================================================================

/** Plain-JSON form of a render model; generation rows become an ordered list */
export function serializeModel(model: RenderModel) {
  return {
    bounds: model.bounds,
    generations: [...model.generations.entries()]
      .sort(([a], [b]) => a - b)
      .map(([generation, personIds]) => ({ generation, personIds })),
    nodes: model.nodes,
    edges: model.edges,
    issues: model.issues.map(formatDataError),
  };
}

// ============================================================================
// File Output
// ============================================================================

const writeOutput = (outputPath: string, contents: string) =>
  Effect.gen(function* () {
    // Ensure output directory exists
    yield* Effect.tryPromise({
      try: () => mkdir(dirname(outputPath), { recursive: true }),
      catch: (error) => new FileError({ path: outputPath, message: "Failed to create output directory", cause: error }),
    });

    yield* Effect.tryPromise({
      try: () => writeFile(outputPath, contents, "utf8"),
      catch: (error) => new FileError({ path: outputPath, message: `Failed to write output file: ${error}`, cause: error }),
    });

    return Buffer.byteLength(contents, "utf8");
  });

const exportWith = (outputPath: string, render: (model: RenderModel) => string) =>
  Effect.gen(function* () {
    const model = yield* computeModel;

    yield* Effect.log(`Exporting layout to: ${outputPath}`);
    const sizeBytes = yield* writeOutput(outputPath, render(model));
    yield* Effect.log(`Layout saved: ${(sizeBytes / 1024).toFixed(1)} KB`);

    return {
      personCount: model.nodes.length,
      edgeCount: model.edges.length,
      sizeBytes,
      outputPath,
    } satisfies ExportResult;
  });

export const exportJson = (outputPath: string = DEFAULT_JSON_OUTPUT) =>
  exportWith(outputPath, (model) => `${JSON.stringify(serializeModel(model), null, 2)}\n`);

export const exportSvg = (outputPath: string = DEFAULT_SVG_OUTPUT) =>
  exportWith(outputPath, (model) => `${renderSvg(model)}\n`);
