import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { mkdtemp, writeFile } from "fs/promises";
import { tmpdir } from "os";
import { join } from "path";
import {
  addPerson,
  importFamily,
  personDetails,
  relate,
  removePerson,
  showPerson,
  status,
  updatePerson,
} from "./records";
import { FAMILY_FIXTURE, runTest } from "../test/helpers";

describe("importFamily", () => {
  it("stores persons and relationships from a family file", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const imported = yield* importFamily(FAMILY_FIXTURE);
        const counts = yield* status;
        return { imported, counts };
      }),
    );

    expect(result.imported.personCount).toBe(4);
    expect(result.imported.relationshipCount).toBe(6);
    expect([...result.imported.ids.entries()]).toEqual([
      ["ada", 1],
      ["bo", 2],
      ["cleo", 3],
      ["dag", 4],
    ]);
    expect(result.counts).toEqual({ totalPersons: 4, totalRelationships: 6, unsupportedRelationships: 1 });
  });

  it("fails on a missing file", async () => {
    const error = await runTest(Effect.flip(importFamily("./does-not-exist.json")));

    expect(error._tag).toBe("FileError");
  });

  it("rejects relationships to unknown keys before writing anything", async () => {
    const dir = await mkdtemp(join(tmpdir(), "kinmap-import-"));
    const path = join(dir, "broken.json");
    await writeFile(
      path,
      JSON.stringify({
        persons: [{ key: "ada", firstName: "Ada", lastName: "Lund" }],
        relationships: [{ member: "ada", relative: "zed", type: "mother" }],
      }),
    );

    const result = await runTest(
      Effect.gen(function* () {
        const error = yield* Effect.flip(importFamily(path));
        const counts = yield* status;
        return { error, counts };
      }),
    );

    expect(result.error).toMatchObject({
      _tag: "ImportFormatError",
      issues: ["relationships.0.relative: unknown person key 'zed'"],
    });
    expect(result.counts.totalPersons).toBe(0);
  });

  it("writes nothing when a later relationship is invalid", async () => {
    const dir = await mkdtemp(join(tmpdir(), "kinmap-import-"));
    const path = join(dir, "self.json");
    await writeFile(
      path,
      JSON.stringify({
        persons: [
          { key: "ada", firstName: "Ada", lastName: "Lund" },
          { key: "cleo", firstName: "Cleo", lastName: "Lund" },
        ],
        relationships: [
          { member: "ada", relative: "cleo", type: "mother" },
          { member: "cleo", relative: "cleo", type: "sister" },
        ],
      }),
    );

    const result = await runTest(
      Effect.gen(function* () {
        const error = yield* Effect.flip(importFamily(path));
        const counts = yield* status;
        return { error, counts };
      }),
    );

    expect(result.error).toMatchObject({
      _tag: "ImportFormatError",
      issues: ["relationships.1.relative: a member cannot be related to themselves"],
    });
    expect(result.counts).toEqual({ totalPersons: 0, totalRelationships: 0, unsupportedRelationships: 0 });
  });

  it("rejects malformed JSON", async () => {
    const dir = await mkdtemp(join(tmpdir(), "kinmap-import-"));
    const path = join(dir, "broken.json");
    await writeFile(path, "{ persons: ");

    const error = await runTest(Effect.flip(importFamily(path)));

    expect(error._tag).toBe("ImportFormatError");
  });
});

describe("single record commands", () => {
  it("adds and relates persons", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        const ada = yield* addPerson("Ada", "Lund");
        const cleo = yield* addPerson("Cleo", "Lund");
        const relationship = yield* relate(String(ada.id), String(cleo.id), "mother");
        return { ada, cleo, relationship };
      }),
    );

    expect(result.relationship).toMatchObject({ memberId: 1, relativeId: 2, relationshipType: "mother" });
  });

  it("surfaces validation errors from the store", async () => {
    const error = await runTest(Effect.flip(addPerson("Ada", "  ")));

    expect(error).toMatchObject({
      _tag: "RecordValidationError",
      issues: ["lastName: last name is required"],
    });
  });

  it("removes a person with their relationships", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        yield* importFamily(FAMILY_FIXTURE);
        const removed = yield* removePerson("2");
        const counts = yield* status;
        return { removed, counts };
      }),
    );

    expect(result.removed.firstName).toBe("Bo");
    expect(result.counts).toEqual({ totalPersons: 3, totalRelationships: 3, unsupportedRelationships: 1 });
  });

  it("reports unknown persons", async () => {
    const error = await runTest(Effect.flip(removePerson("9")));

    expect(error).toMatchObject({ _tag: "RecordNotFoundError", id: "9" });
  });
});

describe("person details", () => {
  it("shows every stored field with its label", async () => {
    const person = await runTest(
      Effect.gen(function* () {
        yield* importFamily(FAMILY_FIXTURE);
        return yield* showPerson("3");
      }),
    );

    expect(personDetails(person)).toEqual([
      ["First Name", "Cleo"],
      ["Middle Name", ""],
      ["Last Name", "Lund"],
      ["Maiden Name", ""],
      ["Birth Date", "1990"],
      ["Death Date", ""],
      ["Burial Place", ""],
      ["Links", ""],
      ["Notes", ""],
    ]);
  });

  it("updates the named fields and clears empty ones", async () => {
    const result = await runTest(
      Effect.gen(function* () {
        yield* importFamily(FAMILY_FIXTURE);
        const updated = yield* updatePerson("3", ["notes=Moved north", "birthDate=", "middleName=Ester"]);
        const stored = yield* showPerson("3");
        return { updated, stored };
      }),
    );

    expect(result.updated).toMatchObject({
      id: 3,
      firstName: "Cleo",
      middleName: "Ester",
      birthDate: null,
      notes: "Moved north",
    });
    expect(result.stored).toMatchObject({ middleName: "Ester", birthDate: null, notes: "Moved north" });
  });

  it("rejects unknown fields before touching the store", async () => {
    const error = await runTest(Effect.flip(updatePerson("1", ["nickname=Addy"])));

    expect(error._tag).toBe("UsageError");
    expect(error.message).toContain("got 'nickname=Addy'");
  });

  it("requires at least one assignment", async () => {
    const error = await runTest(Effect.flip(updatePerson("1", [])));

    expect(error).toMatchObject({ _tag: "UsageError", message: "Nothing to update, pass field=value pairs" });
  });

  it("keeps required names required", async () => {
    const error = await runTest(
      Effect.gen(function* () {
        yield* importFamily(FAMILY_FIXTURE);
        return yield* Effect.flip(updatePerson("1", ["lastName= "]));
      }),
    );

    expect(error).toMatchObject({
      _tag: "RecordValidationError",
      issues: ["lastName: last name is required"],
    });
  });

  it("reports unknown persons", async () => {
    const error = await runTest(Effect.flip(showPerson("9")));

    expect(error).toMatchObject({ _tag: "RecordNotFoundError", id: "9" });
  });
});
