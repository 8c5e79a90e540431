import Alea from "alea";

/** Uniform sampler in [0, 1). Every core operation takes one explicitly. */
export type Random = () => number;

export function createSeededRandom(seed: string): Random {
  return Alea(seed);
}

// Inclusive on both ends
export function randomInt(random: Random, min: number, max: number): number {
  return min + Math.floor(random() * (max - min + 1));
}

export function randomRange(random: Random, min: number, max: number): number {
  return min + random() * (max - min);
}

export function chance(random: Random, probability: number): boolean {
  return random() < probability;
}

export function pick<T>(random: Random, items: readonly T[]): T {
  if (items.length === 0) {
    throw new RangeError("pick() needs at least one item");
  }
  return items[Math.floor(random() * items.length)];
}
