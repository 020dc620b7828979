import "dotenv/config";
import { Cause, Effect, Logger, LogLevel } from "effect";
import { AppLayer } from "./layers";
import { Config, Records } from "./services";
import { UsageError, type CliError } from "./domain/errors";
import type { PersonRow } from "@kinmap/db";
import {
  addPerson,
  importFamily,
  personDetails,
  relate,
  removePerson,
  showPerson,
  status,
  updatePerson,
} from "./workflows/records";
import { computeModel, hit, layoutRows } from "./workflows/layout";
import { exportJson, exportSvg } from "./workflows/export";

// ============================================================================
// CLI Header
// ============================================================================

const printHeader = Effect.sync(() => {
  console.log("============================================================");
  console.log("KINMAP - Family Tree Layout");
  console.log("============================================================");
  console.log();
});

// ============================================================================
// Argument Helpers
// ============================================================================

const requireArg = (args: string[], index: number, name: string) => {
  const value = args[index];
  return value === undefined || value === ""
    ? Effect.fail(new UsageError({ message: `Missing argument <${name}>` }))
    : Effect.succeed(value);
};

const numberArg = (value: string, name: string) => {
  const parsed = Number(value);
  return Number.isFinite(parsed)
    ? Effect.succeed(parsed)
    : Effect.fail(new UsageError({ message: `<${name}> must be a number, got '${value}'` }));
};

// ============================================================================
// Command Handlers
// ============================================================================

const handleStatus = Effect.gen(function* () {
  const result = yield* status;

  console.log("Database Status:");
  console.log(`  Total persons: ${result.totalPersons}`);
  console.log(`  Total relationships: ${result.totalRelationships}`);
  console.log(`  Unsupported relationship types: ${result.unsupportedRelationships}`);
});

const handleImport = (args: string[]) =>
  Effect.gen(function* () {
    const path = yield* requireArg(args, 1, "file.json");
    const result = yield* importFamily(path);
    console.log(`Imported ${result.personCount} persons and ${result.relationshipCount} relationships.`);
  });

const handleAddPerson = (args: string[]) =>
  Effect.gen(function* () {
    const firstName = yield* requireArg(args, 1, "first");
    const lastName = yield* requireArg(args, 2, "last");
    const row = yield* addPerson(firstName, lastName);
    console.log(`Person id: ${row.id}`);
  });

const handleRelate = (args: string[]) =>
  Effect.gen(function* () {
    const memberId = yield* requireArg(args, 1, "memberId");
    const relativeId = yield* requireArg(args, 2, "relativeId");
    const type = yield* requireArg(args, 3, "type");
    const row = yield* relate(memberId, relativeId, type);
    console.log(`Relationship id: ${row.id}`);
  });

const printPerson = (person: PersonRow) =>
  Effect.sync(() => {
    console.log(`Person ${person.id}:`);
    for (const [label, value] of personDetails(person)) {
      console.log(`  ${label}: ${value}`);
    }
  });

const handleShow = (args: string[]) =>
  Effect.gen(function* () {
    const id = yield* requireArg(args, 1, "id");
    yield* printPerson(yield* showPerson(id));
  });

const handleUpdatePerson = (args: string[]) =>
  Effect.gen(function* () {
    const id = yield* requireArg(args, 1, "id");
    const row = yield* updatePerson(id, args.slice(2));
    yield* printPerson(row);
  });

const handleRemovePerson = (args: string[]) =>
  Effect.gen(function* () {
    const id = yield* requireArg(args, 1, "id");
    yield* removePerson(id);
  });

const handleLayout = Effect.gen(function* () {
  const model = yield* computeModel;

  if (model.nodes.length === 0) {
    console.log("No persons recorded.");
    return;
  }

  for (const row of layoutRows(model)) {
    console.log(`Generation ${row.generation}:`);
    for (const person of row.persons) {
      console.log(`  [${person.id}] ${person.name} @ x=${person.x}`);
    }
  }
  console.log();
  console.log(`Bounds: ${model.bounds.minX},${model.bounds.minY} - ${model.bounds.maxX},${model.bounds.maxY}`);
  console.log(`Issues: ${model.issues.length}`);
});

const handleExport = (args: string[]) =>
  Effect.gen(function* () {
    const result = yield* exportJson(args[1]);
    console.log(`Wrote ${result.personCount} nodes and ${result.edgeCount} edges to ${result.outputPath}`);
  });

const handleSvg = (args: string[]) =>
  Effect.gen(function* () {
    const result = yield* exportSvg(args[1]);
    console.log(`Wrote ${result.personCount} nodes and ${result.edgeCount} edges to ${result.outputPath}`);
  });

const handleHit = (args: string[]) =>
  Effect.gen(function* () {
    const x = yield* numberArg(yield* requireArg(args, 1, "screenX"), "screenX");
    const y = yield* numberArg(yield* requireArg(args, 2, "screenY"), "screenY");
    const zoom = args[3] === undefined ? undefined : yield* numberArg(args[3], "zoom");

    const result = yield* hit(x, y, zoom);
    if (result.person === null) {
      console.log(`Nothing at (${x}, ${y}) at zoom ${result.viewport.zoom}`);
      return;
    }

    console.log(`[${result.personId}] ${result.name ?? ""} at (${x}, ${y}) at zoom ${result.viewport.zoom}`);
    yield* printPerson(result.person);
  });

const printUsage = Effect.sync(() => {
  console.log("Usage:");
  console.log("  kinmap status                         - Show database status");
  console.log("  kinmap import <file.json>             - Import persons and relationships");
  console.log("  kinmap add-person <first> <last>      - Add a person");
  console.log("  kinmap relate <member> <relative> <type> - Record that member is <type> of relative");
  console.log("  kinmap show <id>                      - Show every field of a person");
  console.log("  kinmap update-person <id> <field=value>... - Update fields of a person");
  console.log("  kinmap remove-person <id>             - Remove a person and their relationships");
  console.log("  kinmap layout                         - Print the layout by generation");
  console.log("  kinmap export [output.json]           - Write the render model as JSON");
  console.log("  kinmap svg [output.svg]               - Write the layout as SVG");
  console.log("  kinmap hit <screenX> <screenY> [zoom] - Find the person under a screen point");
});

// ============================================================================
// Main Program
// ============================================================================

const failWith = (cause: Cause.Cause<unknown>) =>
  Effect.sync(() => {
    console.error("\nError:");
    console.error(Cause.pretty(cause));
    process.exitCode = 1;
  });

// Helper to run a command with the app layer, logging at the configured level
const runCommand = <A, E>(effect: Effect.Effect<A, E, Config | Records>) =>
  Effect.gen(function* () {
    const config = yield* Config;
    return yield* effect.pipe(Logger.withMinimumLogLevel(config.logLevel));
  }).pipe(Effect.provide(AppLayer), Effect.provide(Logger.pretty), Effect.catchAllCause(failWith));

type CommandHandler = (args: string[]) => Effect.Effect<void, CliError, Config | Records>;

const commands: Record<string, CommandHandler | undefined> = {
  status: () => handleStatus,
  import: handleImport,
  "add-person": handleAddPerson,
  relate: handleRelate,
  show: handleShow,
  "update-person": handleUpdatePerson,
  "remove-person": handleRemovePerson,
  layout: () => handleLayout,
  export: handleExport,
  svg: handleSvg,
  hit: handleHit,
};

const main = Effect.gen(function* () {
  yield* printHeader;

  const args = process.argv.slice(2);
  const command = args[0] ?? "status";
  const handler = commands[command];

  if (!handler) {
    yield* printUsage;
    return;
  }

  yield* runCommand(handler(args).pipe(Effect.tap(() => Effect.sync(() => console.log("\nDone.")))));
});

// ============================================================================
// Runtime
// ============================================================================

const program = main.pipe(
  Logger.withMinimumLogLevel(LogLevel.Info),
  Effect.provide(Logger.pretty),
  Effect.catchAllCause(failWith),
);

Effect.runFork(program);
