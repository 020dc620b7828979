import { describe, it, expect } from "vitest";
import { Effect } from "effect";
import { computeModel, hit, layoutRows } from "./layout";
import { importFamily } from "./records";
import { FAMILY_FIXTURE, runTest } from "../test/helpers";

const withFamily = <A, E, R>(effect: Effect.Effect<A, E, R>) =>
  Effect.gen(function* () {
    yield* importFamily(FAMILY_FIXTURE);
    return yield* effect;
  });

describe("computeModel", () => {
  it("lays out the stored family by generation", async () => {
    const model = await runTest(withFamily(computeModel));

    expect(layoutRows(model)).toEqual([
      {
        generation: 0,
        persons: [
          { id: "1", name: "Ada Lund", x: 930 },
          { id: "2", name: "Bo Lund", x: 1070 },
        ],
      },
      {
        generation: 1,
        persons: [
          { id: "3", name: "Cleo Lund", x: 925 },
          { id: "4", name: "Dag Lund", x: 1075 },
        ],
      },
    ]);
    expect(model.edges.map((edge) => [edge.id, edge.kind])).toEqual([
      ["2", "parent"],
      ["3", "parent"],
      ["4", "parent"],
      ["1", "spouse"],
      ["5", "sibling"],
    ]);
  });

  it("carries store issues into the model", async () => {
    const model = await runTest(withFamily(computeModel));

    expect(model.issues.map((issue) => [issue.reason, issue.relationshipId])).toEqual([
      ["unsupported-kind", "6"],
    ]);
  });

  it("handles an empty store", async () => {
    const model = await runTest(computeModel);

    expect(model.nodes).toEqual([]);
    expect(layoutRows(model)).toEqual([]);
  });
});

describe("hit", () => {
  it("finds the person under a screen point", async () => {
    const result = await runTest(withFamily(hit(925, 300)));

    expect(result).toMatchObject({ viewport: { dx: 0, dy: 0, zoom: 1 }, personId: "3", name: "Cleo Lund" });
    expect(result.person).toMatchObject({ id: 3, firstName: "Cleo", birthDate: "1990", notes: null });
  });

  it("maps the screen point through the zoom", async () => {
    const result = await runTest(withFamily(hit(537.5, 150, 0.5)));

    expect(result.personId).toBe("4");
  });

  it("returns nothing between nodes and clamps the zoom", async () => {
    const result = await runTest(withFamily(hit(1000, 100, 100)));

    expect(result.viewport.zoom).toBe(4);
    expect(result.personId).toBeNull();
    expect(result.person).toBeNull();
  });
});
