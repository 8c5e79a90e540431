import { describe, expect, it } from "vitest";

import {
  CLASSIFICATIONS,
  Classification,
  blocksControlledBurn,
  blocksIgnition,
  canTransition,
  flammability,
  isUnburnt,
} from "./Classification";

describe("flammability", () => {
  it("is zero for water and burnt cells", () => {
    expect(flammability(Classification.Water)).toBe(0);
    expect(flammability(Classification.Burnt)).toBe(0);
  });

  it("treats burning cells as fully flammable", () => {
    expect(flammability(Classification.Fire)).toBe(1);
    expect(flammability(Classification.ControlledBurn)).toBe(1);
  });

  it("keeps every weight within [0, 1]", () => {
    for (const kind of CLASSIFICATIONS) {
      expect(flammability(kind)).toBeGreaterThanOrEqual(0);
      expect(flammability(kind)).toBeLessThanOrEqual(1);
    }
  });
});

describe("transition graph", () => {
  it("never lets water or ash catch fire", () => {
    expect(canTransition(Classification.Water, Classification.Fire)).toBe(false);
    expect(canTransition(Classification.Burnt, Classification.Fire)).toBe(false);
    expect(canTransition(Classification.Water, Classification.ControlledBurn)).toBe(false);
    expect(canTransition(Classification.Burnt, Classification.ControlledBurn)).toBe(false);
  });

  it("lets houses burn but not be counter-burned", () => {
    expect(canTransition(Classification.House, Classification.Fire)).toBe(true);
    expect(canTransition(Classification.House, Classification.ControlledBurn)).toBe(false);
  });

  it("only turns burning cells to ash", () => {
    expect(canTransition(Classification.Fire, Classification.Burnt)).toBe(true);
    expect(canTransition(Classification.ControlledBurn, Classification.Burnt)).toBe(true);
    expect(canTransition(Classification.Grassland, Classification.Burnt)).toBe(false);
  });

  it("has no way back to vegetation", () => {
    expect(canTransition(Classification.Fire, Classification.DenseForest)).toBe(false);
    expect(canTransition(Classification.Burnt, Classification.Grassland)).toBe(false);
  });
});

describe("exclusion sets", () => {
  it("blocks ignition on burning, burnt and water cells", () => {
    const blocked = CLASSIFICATIONS.filter(blocksIgnition);
    expect(blocked).toEqual([
      Classification.Water,
      Classification.Burnt,
      Classification.Fire,
      Classification.ControlledBurn,
    ]);
  });

  it("additionally protects houses from counter-burns", () => {
    expect(blocksControlledBurn(Classification.House)).toBe(true);
    expect(blocksControlledBurn(Classification.Field)).toBe(false);
  });

  it("counts houses and vegetation as unburnt", () => {
    expect(isUnburnt(Classification.House)).toBe(true);
    expect(isUnburnt(Classification.LightForest)).toBe(true);
    expect(isUnburnt(Classification.ControlledBurn)).toBe(false);
  });
});
