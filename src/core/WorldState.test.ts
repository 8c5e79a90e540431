import { describe, expect, it } from "vitest";

import { Classification } from "./Classification";
import { InvariantError } from "./errors";
import { NO_ASH_SHADE, WorldGrid } from "./WorldState";

describe("WorldGrid", () => {
  it("rejects non-positive dimensions", () => {
    expect(() => new WorldGrid(0, 4)).toThrow(RangeError);
    expect(() => new WorldGrid(3, 2.5)).toThrow(RangeError);
  });

  it("reports its dimensions and fills every cell", () => {
    const grid = new WorldGrid(4, 3, Classification.Grassland);
    expect(grid.dimensions()).toEqual([4, 3]);
    expect(grid.count((kind) => kind === Classification.Grassland)).toBe(12);
  });

  it("clips neighbours at the corners", () => {
    const grid = new WorldGrid(5, 4);
    expect(grid.neighbors(0, 0)).toEqual([1, 5, 6]);
    expect(grid.neighbors(2, 1)).toHaveLength(8);
    expect(grid.neighbors(4, 3)).toEqual([13, 14, 18]);
  });

  it("treats fractional and out-of-range coordinates as off the grid", () => {
    const grid = new WorldGrid(3, 3);
    expect(grid.inBounds(1, 1)).toBe(true);
    expect(grid.inBounds(1.5, 1)).toBe(false);
    expect(grid.inBounds(-1, 0)).toBe(false);
    expect(grid.inBounds(0, 3)).toBe(false);
  });

  it("iterates lazily in row-major order", () => {
    const grid = new WorldGrid(2, 2);
    grid.paint(1, 0, Classification.Water);
    const iterator = grid.iterate();
    expect(iterator.next().value).toEqual({ x: 0, y: 0, kind: Classification.DenseForest });
    expect(iterator.next().value).toEqual({ x: 1, y: 0, kind: Classification.Water });
    expect([...iterator]).toHaveLength(2);
  });

  it("ignores paints outside the grid", () => {
    const grid = new WorldGrid(2, 2);
    grid.paint(5, 5, Classification.Water);
    expect(grid.count((kind) => kind === Classification.Water)).toBe(0);
  });

  it("resets the ash age when a cell ignites and fixes the shade when it burns out", () => {
    const grid = new WorldGrid(2, 1, Classification.Grassland);
    grid.transition(0, Classification.Fire);
    expect(grid.ageCell(0, 30)).toBe(30);
    expect(grid.ashAge(0, 0)).toBe(30);

    grid.transition(0, Classification.Burnt, 61);
    expect(grid.ashAge(0, 0)).toBe(0);
    expect(grid.ashShade(0, 0)).toBe(61);
    expect(grid.ashShade(1, 0)).toBe(NO_ASH_SHADE);
  });

  it("throws on illegal transitions when debug assertions are on", () => {
    const grid = new WorldGrid(1, 1, Classification.Water);
    grid.debugAssertions = true;
    expect(() => grid.transition(0, Classification.Fire)).toThrow(InvariantError);
  });

  it("lets illegal transitions through when debug assertions are off", () => {
    const grid = new WorldGrid(1, 1, Classification.Water);
    grid.transition(0, Classification.Fire);
    expect(grid.classification(0, 0)).toBe(Classification.Fire);
  });

  it("refuses to age a cell that is not on fire under assertions", () => {
    const grid = new WorldGrid(1, 1, Classification.Field);
    grid.debugAssertions = true;
    expect(() => grid.ageCell(0, 1)).toThrow(InvariantError);
  });

  it("rejects reads outside the grid instead of wrapping rows", () => {
    const grid = new WorldGrid(3, 2, Classification.Field);
    expect(() => grid.classification(3, 0)).toThrow("Cell (3, 0) is outside a 3x2 grid");
    expect(() => grid.classification(0, -1)).toThrow(RangeError);
    expect(() => grid.ashAge(-1, 1)).toThrow(RangeError);
    expect(() => grid.ashShade(0, 2)).toThrow(RangeError);
  });

  it("flags negative or non-finite ash ages when verified under assertions", () => {
    const negative = new WorldGrid(1, 1, Classification.Fire);
    negative.debugAssertions = true;
    negative.ageCell(0, -60);
    expect(() => negative.verify()).toThrow("Cell 0 has invalid ash age -60");

    const unset = new WorldGrid(1, 1, Classification.Fire);
    unset.debugAssertions = true;
    unset.ageCell(0, Number.NaN);
    expect(() => unset.verify()).toThrow(InvariantError);
  });

  it("clones into an independent grid", () => {
    const grid = new WorldGrid(2, 2, Classification.Field);
    const copy = grid.clone();
    copy.paint(0, 0, Classification.Water);
    expect(grid.classification(0, 0)).toBe(Classification.Field);
    expect(copy.classification(0, 0)).toBe(Classification.Water);
  });

  it("exports raw classification bytes", () => {
    const grid = new WorldGrid(3, 1, Classification.House);
    grid.paint(2, 0, Classification.Water);
    expect([...grid.toBytes()]).toEqual([4, 4, 5]);
  });
});
