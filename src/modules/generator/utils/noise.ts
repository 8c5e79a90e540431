import { createNoise2D } from "simplex-noise";
import type { NoiseFn } from "../types/TerrainState";
import { createSeededRandom } from "../../../core/random";

export function createSeededNoise(seed: string): NoiseFn {
  const rng = createSeededRandom(seed);
  const noise2D = createNoise2D(rng);
  return noise2D;
}

export interface OctaveOptions {
  octaves: number;
  persistence: number;
  lacunarity: number;
}

/**
 * Sums `octaves` layers of `noise`, each `lacunarity` times finer and
 * `persistence` times weaker than the last, normalised back into [-1, 1].
 */
export function fractal(
  noise: NoiseFn,
  x: number,
  y: number,
  { octaves, persistence, lacunarity }: OctaveOptions
): number {
  let total = 0;
  let frequency = 1;
  let amplitude = 1;
  let maxValue = 0;
  for (let i = 0; i < octaves; i++) {
    total += noise(x * frequency, y * frequency) * amplitude;
    maxValue += amplitude;
    amplitude *= persistence;
    frequency *= lacunarity;
  }
  return maxValue > 0 ? total / maxValue : 0;
}

/** Independent noise layers derived from one world seed. */
export interface NoiseField {
  broad: NoiseFn;
  detail: NoiseFn;
  elevation: NoiseFn;
}

export function createNoiseField(seed: string): NoiseField {
  return {
    broad: createSeededNoise(seed + "_broad"),
    detail: createSeededNoise(seed + "_detail"),
    elevation: createSeededNoise(seed + "_elevation"),
  };
}
