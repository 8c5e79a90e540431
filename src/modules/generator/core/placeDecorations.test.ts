import { describe, expect, it } from "vitest";

import { Classification } from "../../../core/Classification";
import { createSeededRandom } from "../../../core/random";
import { parseGrid } from "../../world/utils/gridText";
import type { Decoration } from "../types/TerrainState";
import { decorationState, placeDecorations } from "./placeDecorations";

describe("placeDecorations", () => {
  const grid = parseGrid(["fLH", "gff"]);

  it("puts exactly one centred house on each house cell", () => {
    const houses = placeDecorations(grid, createSeededRandom("deco")).filter((d) => d.kind === "house");
    expect(houses).toEqual([{ kind: "house", gridX: 2, gridY: 0, offsetX: 0, offsetY: 0 }]);
  });

  it("tufts field cells on the even checkerboard only", () => {
    for (const seed of ["a", "b", "c", "d"]) {
      const grass = placeDecorations(grid, createSeededRandom(seed)).filter((d) => d.kind === "fieldGrass");
      const at = (x: number, y: number) => grass.filter((d) => d.gridX === x && d.gridY === y).length;

      expect(at(0, 0)).toBeGreaterThanOrEqual(1);
      expect(at(0, 0)).toBeLessThanOrEqual(2);
      expect(at(1, 1)).toBeGreaterThanOrEqual(1);
      expect(at(1, 1)).toBeLessThanOrEqual(2);
      expect(at(2, 1)).toBe(0);
      expect(at(0, 0) + at(1, 1)).toBe(grass.length);
      for (const tuft of grass) {
        expect(Math.abs(tuft.offsetX)).toBeLessThanOrEqual(0.4);
        expect(Math.abs(tuft.offsetY)).toBeLessThanOrEqual(0.4);
      }
    }
  });

  it("places at most one tree, only on light forest", () => {
    for (const seed of ["a", "b", "c", "d"]) {
      const trees = placeDecorations(grid, createSeededRandom(seed)).filter((d) => d.kind === "tree");
      expect(trees.length).toBeLessThanOrEqual(1);
      for (const tree of trees) {
        expect([tree.gridX, tree.gridY]).toEqual([1, 0]);
        expect(Math.abs(tree.offsetX)).toBeLessThanOrEqual(0.3);
        expect(Math.abs(tree.offsetY)).toBeLessThanOrEqual(0.3);
      }
    }
  });

  it("is deterministic for a seed", () => {
    expect(placeDecorations(grid, createSeededRandom("same"))).toEqual(
      placeDecorations(grid, createSeededRandom("same"))
    );
  });
});

describe("decorationState", () => {
  const at = (kind: Decoration["kind"]): Decoration => ({ kind, gridX: 0, gridY: 0, offsetX: 0, offsetY: 0 });

  function stateOn(cell: Classification, kind: Decoration["kind"]) {
    const grid = parseGrid(["g"]);
    grid.paint(0, 0, cell);
    return decorationState(at(kind), grid);
  }

  it("follows its cell through a burn", () => {
    expect(stateOn(Classification.LightForest, "tree")).toBe("normal");
    expect(stateOn(Classification.Fire, "tree")).toBe("burning");
    expect(stateOn(Classification.ControlledBurn, "tree")).toBe("normal");
    expect(stateOn(Classification.Burnt, "tree")).toBe("burnt");

    expect(stateOn(Classification.House, "house")).toBe("normal");
    expect(stateOn(Classification.Fire, "house")).toBe("burnt");
    expect(stateOn(Classification.ControlledBurn, "house")).toBe("burnt");

    expect(stateOn(Classification.Field, "fieldGrass")).toBe("normal");
    expect(stateOn(Classification.ControlledBurn, "fieldGrass")).toBe("normal");
    expect(stateOn(Classification.Fire, "fieldGrass")).toBe("hidden");
    expect(stateOn(Classification.Burnt, "fieldGrass")).toBe("hidden");
  });
});
