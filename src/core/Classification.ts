/**
 * Cell kinds of the island grid. Values are stable small integers so the grid
 * can live in a Uint8Array and be dumped straight to disk.
 */
export enum Classification {
  DenseForest = 0,
  LightForest = 1,
  Grassland = 2,
  Field = 3,
  House = 4,
  Water = 5,
  Burnt = 6,
  Fire = 7,
  ControlledBurn = 8,
}

export const CLASSIFICATIONS: readonly Classification[] = [
  Classification.DenseForest,
  Classification.LightForest,
  Classification.Grassland,
  Classification.Field,
  Classification.House,
  Classification.Water,
  Classification.Burnt,
  Classification.Fire,
  Classification.ControlledBurn,
];

export const FLAMMABILITY: Readonly<Record<Classification, number>> = {
  [Classification.DenseForest]: 0.8,
  [Classification.LightForest]: 0.6,
  [Classification.Grassland]: 0.4,
  [Classification.Field]: 0.3,
  [Classification.House]: 0.9,
  [Classification.Water]: 0,
  [Classification.Burnt]: 0,
  [Classification.Fire]: 1,
  [Classification.ControlledBurn]: 1,
};

export function flammability(kind: Classification): number {
  return FLAMMABILITY[kind];
}

export function isClassification(value: number): value is Classification {
  return Number.isInteger(value) && value >= 0 && value <= Classification.ControlledBurn;
}

// Cells a spreading fire can never enter
export function blocksIgnition(kind: Classification): boolean {
  return (
    kind === Classification.Fire ||
    kind === Classification.Burnt ||
    kind === Classification.ControlledBurn ||
    kind === Classification.Water
  );
}

// Counter-burns additionally leave houses alone
export function blocksControlledBurn(kind: Classification): boolean {
  return blocksIgnition(kind) || kind === Classification.House;
}

/** Still standing: counts toward forest saved and against defeat. */
export function isUnburnt(kind: Classification): boolean {
  return !blocksIgnition(kind);
}

/** Allowed runtime transitions; carving during generation is exempt. */
export function canTransition(from: Classification, to: Classification): boolean {
  switch (to) {
    case Classification.Fire:
      return !blocksIgnition(from);
    case Classification.ControlledBurn:
      return !blocksControlledBurn(from);
    case Classification.Burnt:
      return from === Classification.Fire || from === Classification.ControlledBurn;
    default:
      return false;
  }
}
