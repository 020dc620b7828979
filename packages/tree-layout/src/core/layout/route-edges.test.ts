import { describe, it, expect } from "vitest";
import { computeParentChildPath, computeSiblingPath, computeSpousePath } from "./route-edges";
import { DEFAULT_LAYOUT_CONFIG, type RenderNode } from "../data/types";

function node(id: string, x: number, y: number, generation: number): RenderNode {
  return {
    id,
    person: { id, name: id },
    x,
    y,
    width: 120,
    height: 80,
    bounds: { minX: x - 60, minY: y - 40, maxX: x + 60, maxY: y + 40 },
    generation,
  };
}

describe("computeParentChildPath", () => {
  it("connects adjacent rows bottom to top", () => {
    expect(computeParentChildPath(node("P", 1000, 100, 0), node("C", 900, 300, 1), DEFAULT_LAYOUT_CONFIG)).toEqual([
      { x: 1000, y: 140 },
      { x: 900, y: 260 },
    ]);
  });

  it("elbows under the parent row when generations are skipped", () => {
    expect(computeParentChildPath(node("P", 1000, 100, 0), node("C", 900, 500, 2), DEFAULT_LAYOUT_CONFIG)).toEqual([
      { x: 1000, y: 140 },
      { x: 900, y: 200 },
      { x: 900, y: 460 },
    ]);
  });

  it("draws center to center when the child is not below the parent", () => {
    expect(computeParentChildPath(node("P", 1000, 300, 1), node("C", 900, 100, 0), DEFAULT_LAYOUT_CONFIG)).toEqual([
      { x: 1000, y: 300 },
      { x: 900, y: 100 },
    ]);
  });
});

describe("computeSpousePath", () => {
  it("joins the facing sides whatever the argument order", () => {
    const left = node("A", 930, 100, 0);
    const right = node("B", 1070, 100, 0);
    const expected = [
      { x: 990, y: 100 },
      { x: 1010, y: 100 },
    ];

    expect(computeSpousePath(left, right)).toEqual(expected);
    expect(computeSpousePath(right, left)).toEqual(expected);
  });

  it("falls back to centers across generations", () => {
    expect(computeSpousePath(node("A", 930, 100, 0), node("B", 1070, 300, 1))).toEqual([
      { x: 930, y: 100 },
      { x: 1070, y: 300 },
    ]);
  });
});

describe("computeSiblingPath", () => {
  it("brackets above the row", () => {
    const a = node("A", 930, 300, 1);
    const b = node("B", 1070, 300, 1);
    const expected = [
      { x: 930, y: 260 },
      { x: 930, y: 240 },
      { x: 1070, y: 240 },
      { x: 1070, y: 260 },
    ];

    expect(computeSiblingPath(a, b, DEFAULT_LAYOUT_CONFIG)).toEqual(expected);
    expect(computeSiblingPath(b, a, DEFAULT_LAYOUT_CONFIG)).toEqual(expected);
  });
});
