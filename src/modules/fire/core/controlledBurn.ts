import { Classification, blocksControlledBurn, flammability } from "../../../core/Classification";
import type { WorldGrid } from "../../../core/WorldState";
import type { FireTuning } from "../../../core/config";
import { chance, randomInt, type Random } from "../../../core/random";
import type { ControlledBurnResult } from "../types/FireState";

/**
 * Starts a counter-burn at (x, y): a breadth-first flood limited by a random
 * ember budget, so each firebreak comes out a different ragged shape.
 * Coordinates off the grid or on an ineligible cell are ignored, since the
 * input layer's pick can legitimately miss.
 */
export function triggerControlledBurn(
  grid: WorldGrid,
  x: number,
  y: number,
  random: Random,
  tuning: FireTuning
): ControlledBurnResult {
  if (!grid.inBounds(x, y) || blocksControlledBurn(grid.classification(x, y))) {
    return { ignited: false, cells: [] };
  }

  const origin = grid.index(x, y);
  grid.transition(origin, Classification.ControlledBurn);
  const cells = [{ x, y }];

  const [minBudget, maxBudget] = tuning.controlledBurnBudget;
  let budget = randomInt(random, minBudget, maxBudget);
  const queue = [origin];
  let head = 0;

  while (head < queue.length && budget > 0) {
    const current = grid.point(queue[head++]);
    for (const n of grid.neighbors(current.x, current.y)) {
      if (budget <= 0) break;
      const kind = grid.kindAt(n);
      if (blocksControlledBurn(kind)) continue;
      if (chance(random, flammability(kind) * tuning.controlledBurnFactor)) {
        grid.transition(n, Classification.ControlledBurn);
        cells.push(grid.point(n));
        queue.push(n);
        budget--;
      }
    }
  }

  return { ignited: true, cells };
}
