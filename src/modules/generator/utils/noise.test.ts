import { describe, expect, it } from "vitest";

import { createSeededNoise, fractal } from "./noise";

describe("fractal", () => {
  it("normalises by the amplitude sum", () => {
    const flat = () => 1;
    expect(fractal(flat, 0, 0, { octaves: 4, persistence: 0.5, lacunarity: 2 })).toBe(1);
  });

  it("scales each octave's frequency by the lacunarity", () => {
    const seen: number[] = [];
    const probe = (x: number) => {
      seen.push(x);
      return 0;
    };
    fractal(probe, 1, 0, { octaves: 3, persistence: 0.5, lacunarity: 2 });
    expect(seen).toEqual([1, 2, 4]);
  });

  it("returns zero for no octaves", () => {
    expect(fractal(() => 1, 3, 3, { octaves: 0, persistence: 0.5, lacunarity: 2 })).toBe(0);
  });
});

describe("createSeededNoise", () => {
  it("is a pure function of seed and coordinate", () => {
    const a = createSeededNoise("noise");
    const b = createSeededNoise("noise");
    expect(a(0.3, 1.7)).toBe(b(0.3, 1.7));
    expect(a(0.3, 1.7)).toBeGreaterThanOrEqual(-1);
    expect(a(0.3, 1.7)).toBeLessThanOrEqual(1);
  });
});
