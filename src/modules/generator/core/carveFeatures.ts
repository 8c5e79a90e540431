import { Classification } from "../../../core/Classification";
import type { WorldGrid } from "../../../core/WorldState";
import type { Logger } from "../../../core/logger";
import { chance, pick, randomInt, randomRange, type Random } from "../../../core/random";
import type { FeatureReport } from "../types/TerrainState";

const SITE_ATTEMPTS = 50;

// Helper: clamp value into [min, max]
function clamp(v: number, min: number, max: number): number {
  if (v < min) return min;
  if (v > max) return max;
  return v;
}

// Random coordinate at least `margin` cells from the edge, shrinking the
// margin on grids too small to honour it.
function interiorCoord(random: Random, extent: number, margin: number): number {
  const lo = Math.min(margin, extent - 1);
  const hi = Math.max(lo, Math.min(extent - margin, extent - 1));
  return randomInt(random, lo, hi);
}

// ============================================================
// Rivers: biased random walks from the left or top edge
// ============================================================
export function carveRivers(grid: WorldGrid, random: Random, logger: Logger): FeatureReport {
  const { width, height } = grid;
  const count = randomInt(random, 1, 3);

  for (let r = 0; r < count; r++) {
    // true: walk east from the left edge, false: walk south from the top edge
    const eastward = chance(random, 0.5);
    let x = eastward ? 0 : randomInt(random, Math.floor(width / 4), Math.floor((3 * width) / 4));
    let y = eastward ? randomInt(random, Math.floor(height / 4), Math.floor((3 * height) / 4)) : 0;
    let drift = 1;
    const length = randomInt(random, 30, 80);

    for (let step = 0; step < length; step++) {
      grid.paint(x, y, Classification.Water);

      // Splash: fatten the bed, nearer neighbours more likely
      for (let dx = -1; dx <= 1; dx++) {
        for (let dy = -1; dy <= 1; dy++) {
          if (dx === 0 && dy === 0) continue;
          const probability = 0.6 / (Math.abs(dx) + Math.abs(dy) + 0.5);
          if (chance(random, probability)) {
            grid.paint(x + dx, y + dy, Classification.Water);
          }
        }
      }

      if (chance(random, 0.3)) drift = pick(random, [-1, 0, 1]);
      if (eastward) {
        x += 1;
        y += drift;
      } else {
        y += 1;
        x += drift;
      }
      x = clamp(x, 0, width - 1);
      y = clamp(y, 0, height - 1);
    }
  }

  logger.debug(`Carved ${count} river(s)`);
  return { requested: count, placed: count };
}

// ============================================================
// Lakes: jittered discs around a dry centre, houses protected
// ============================================================
export function carveLakes(grid: WorldGrid, random: Random, logger: Logger): FeatureReport {
  const count = randomInt(random, 1, 3);
  let placed = 0;

  for (let l = 0; l < count; l++) {
    let found = false;
    for (let attempt = 0; attempt < SITE_ATTEMPTS && !found; attempt++) {
      const cx = interiorCoord(random, grid.width, 5);
      const cy = interiorCoord(random, grid.height, 5);
      if (grid.classification(cx, cy) === Classification.Water) continue;

      const radius = randomInt(random, 4, 8);
      for (let oy = -radius; oy <= radius; oy++) {
        for (let ox = -radius; ox <= radius; ox++) {
          const dist = Math.sqrt(ox * ox + oy * oy);
          if (dist > radius + randomRange(random, -1, 1)) continue;
          const lx = cx + ox;
          const ly = cy + oy;
          if (!grid.inBounds(lx, ly)) continue;
          if (grid.classification(lx, ly) !== Classification.House) {
            grid.paint(lx, ly, Classification.Water);
          }
        }
      }
      found = true;
    }

    if (found) {
      placed++;
    } else {
      logger.warn(`No dry site for lake ${l + 1}/${count} after ${SITE_ATTEMPTS} attempts, skipping`);
    }
  }

  return { requested: count, placed };
}

// ============================================================
// Houses: small clusters on open land
// ============================================================
export function placeHouses(grid: WorldGrid, random: Random, logger: Logger): FeatureReport {
  const count = randomInt(random, 3, 7);
  let placed = 0;

  for (let c = 0; c < count; c++) {
    let found = false;
    for (let attempt = 0; attempt < SITE_ATTEMPTS && !found; attempt++) {
      const cx = interiorCoord(random, grid.width, 5);
      const cy = interiorCoord(random, grid.height, 5);
      const centre = grid.classification(cx, cy);
      if (centre !== Classification.Grassland && centre !== Classification.Field) continue;

      const houses = randomInt(random, 2, 6);
      for (let h = 0; h < houses; h++) {
        const hx = cx + randomInt(random, -3, 3);
        const hy = cy + randomInt(random, -3, 3);
        if (!grid.inBounds(hx, hy)) continue;
        const kind = grid.classification(hx, hy);
        if (kind === Classification.Water || kind === Classification.House) continue;
        grid.paint(hx, hy, Classification.House);
      }
      found = true;
    }

    if (found) {
      placed++;
    } else {
      logger.warn(`No open land for house cluster ${c + 1}/${count}, skipping`);
    }
  }

  return { requested: count, placed };
}

// ============================================================
// Clearings: ragged grassland patches inside dense forest
// ============================================================
export function carveClearings(grid: WorldGrid, random: Random, logger: Logger): FeatureReport {
  const count = randomInt(random, 5, 10);
  let placed = 0;

  for (let c = 0; c < count; c++) {
    const cx = interiorCoord(random, grid.width, 3);
    const cy = interiorCoord(random, grid.height, 3);
    if (grid.classification(cx, cy) !== Classification.DenseForest) continue;

    const half = Math.floor(randomInt(random, 2, 5) / 2);
    for (let dx = -half; dx <= half; dx++) {
      for (let dy = -half; dy <= half; dy++) {
        const x = cx + dx;
        const y = cy + dy;
        if (!grid.inBounds(x, y) || !chance(random, 0.6)) continue;
        const kind = grid.classification(x, y);
        if (kind === Classification.Water || kind === Classification.House) continue;
        grid.paint(x, y, Classification.Grassland);
      }
    }
    placed++;
  }

  if (placed < count) {
    logger.debug(`${count - placed} of ${count} clearing site(s) were not dense forest`);
  }
  return { requested: count, placed };
}
