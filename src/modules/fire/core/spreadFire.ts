import { Classification, blocksIgnition, flammability, isUnburnt } from "../../../core/Classification";
import type { WorldGrid } from "../../../core/WorldState";
import type { FireTuning } from "../../../core/config";
import type { Logger } from "../../../core/logger";
import { chance, createSeededRandom, randomInt, type Random } from "../../../core/random";
import type { AgingResult, EpisodeTotals, SpreadResult, TrialRoller } from "../types/FireState";

const ASH_SHADE_MIN = 50;
const ASH_SHADE_MAX = 70;

/**
 * One nonce per spread step, then every (source, target) trial gets its own
 * stream. A trial's outcome depends only on the pair, not on when the scan
 * reaches it.
 */
export function createTrialRoller(random: Random): TrialRoller {
  const nonce = Math.floor(random() * 0x100000000).toString(36);
  return (source, target) => createSeededRandom(`${nonce}:${source}:${target}`)();
}

/**
 * Ignition candidates for one step. Reads `grid` only, so it acts as the
 * pre-step snapshot; the caller commits the result afterwards.
 */
export function collectIgnitions(
  grid: WorldGrid,
  sources: Iterable<number>,
  roll: TrialRoller,
  spreadFactor: number
): number[] {
  const pending = new Set<number>();

  for (const source of sources) {
    if (grid.kindAt(source) !== Classification.Fire) continue;
    const { x, y } = grid.point(source);
    for (const target of grid.neighbors(x, y)) {
      const kind = grid.kindAt(target);
      if (blocksIgnition(kind)) continue;
      if (roll(source, target) < flammability(kind) * spreadFactor) {
        pending.add(target);
      }
    }
  }

  return [...pending].sort((a, b) => a - b);
}

export function spreadFire(grid: WorldGrid, random: Random, tuning: FireTuning): SpreadResult {
  const sources = grid.indicesOf(Classification.Fire);
  const ignited = collectIgnitions(grid, sources, createTrialRoller(random), tuning.spreadFactor);
  for (const idx of ignited) {
    grid.transition(idx, Classification.Fire);
  }
  return { ignited };
}

/** Advances every fire cell's ash age; cells reaching the limit burn out. */
export function ageFire(grid: WorldGrid, frames: number, random: Random, tuning: FireTuning): AgingResult {
  const burntOut: number[] = [];
  for (const idx of grid.indicesOf(Classification.Fire)) {
    if (grid.ageCell(idx, frames) >= tuning.maxAshTimer) {
      grid.transition(idx, Classification.Burnt, randomInt(random, ASH_SHADE_MIN, ASH_SHADE_MAX));
      burntOut.push(idx);
    }
  }
  return { burntOut };
}

/** Counter-burns die down on their own, independent of the spread gate. */
export function ageControlledBurns(
  grid: WorldGrid,
  frames: number,
  random: Random,
  tuning: FireTuning
): AgingResult {
  const burntOut: number[] = [];
  const probability = Math.min(1, tuning.controlledBurnAgingRate * frames);
  for (const idx of grid.indicesOf(Classification.ControlledBurn)) {
    if (chance(random, probability)) {
      grid.transition(idx, Classification.Burnt, randomInt(random, ASH_SHADE_MIN, ASH_SHADE_MAX));
      burntOut.push(idx);
    }
  }
  return { burntOut };
}

export function hasFire(grid: WorldGrid): boolean {
  return grid.indicesOf(Classification.Fire).length > 0;
}

/** Whether any fire cell still borders something it could ignite. */
export function canSpread(grid: WorldGrid): boolean {
  for (const idx of grid.indicesOf(Classification.Fire)) {
    const { x, y } = grid.point(idx);
    for (const n of grid.neighbors(x, y)) {
      const kind = grid.kindAt(n);
      if (!blocksIgnition(kind) && flammability(kind) > 0) return true;
    }
  }
  return false;
}

export function isVictory(grid: WorldGrid): boolean {
  return !hasFire(grid);
}

export function isDefeat(grid: WorldGrid, totals: EpisodeTotals, threshold: number): boolean {
  return grid.count(isUnburnt) < totals.totalBurnable * threshold;
}

export function captureTotals(grid: WorldGrid): EpisodeTotals {
  return {
    totalBurnable: grid.count((kind) => kind !== Classification.Water),
    housesTotal: grid.count((kind) => kind === Classification.House),
  };
}

function randomBorderCell(grid: WorldGrid, random: Random): [number, number] {
  const { width, height } = grid;
  switch (randomInt(random, 0, 3)) {
    case 0:
      return [randomInt(random, 0, width - 1), 0];
    case 1:
      return [width - 1, randomInt(random, 0, height - 1)];
    case 2:
      return [randomInt(random, 0, width - 1), height - 1];
    default:
      return [0, randomInt(random, 0, height - 1)];
  }
}

/**
 * Lights `tuning.initialFires` fires on flammable border cells, each with a
 * small splash into its neighbours. Returns how many fires were started.
 */
export function igniteInitialFires(
  grid: WorldGrid,
  random: Random,
  tuning: FireTuning,
  logger: Logger
): number {
  let started = 0;

  for (let f = 0; f < tuning.initialFires; f++) {
    let found = false;
    for (let attempt = 0; attempt < tuning.fireStartAttempts && !found; attempt++) {
      const [sx, sy] = randomBorderCell(grid, random);
      const kind = grid.classification(sx, sy);
      if (blocksIgnition(kind) || flammability(kind) <= 0) continue;

      grid.transition(grid.index(sx, sy), Classification.Fire);
      const splash = randomInt(random, 1, 3);
      for (let s = 0; s < splash; s++) {
        const fx = Math.max(0, Math.min(grid.width - 1, sx + randomInt(random, -1, 1)));
        const fy = Math.max(0, Math.min(grid.height - 1, sy + randomInt(random, -1, 1)));
        const near = grid.classification(fx, fy);
        if (!blocksIgnition(near) && flammability(near) > 0) {
          grid.transition(grid.index(fx, fy), Classification.Fire);
        }
      }
      found = true;
    }

    if (found) {
      started++;
    } else {
      logger.warn(`Could not find a fire start location for fire ${f + 1} after ${tuning.fireStartAttempts} attempts`);
    }
  }

  return started;
}
