import { Classification } from "../../../core/Classification";
import { WorldGrid } from "../../../core/WorldState";
import { silentLogger } from "../../../core/logger";
import { createSeededRandom } from "../../../core/random";
import type { GeneratedTerrain, TerrainOptions } from "../types/TerrainState";
import { createNoiseField, fractal, type NoiseField } from "../utils/noise";
import { carveClearings, carveLakes, carveRivers, placeHouses } from "./carveFeatures";

const JITTER = 0.05;

// Upper bounds of each band on the compressed noise value
const WATER_LEVEL = -0.4;
const FIELD_LEVEL = -0.15;
const GRASS_LEVEL = 0.05;
const LIGHT_FOREST_LEVEL = 0.25;

export function classifyValue(value: number): Classification {
  if (value < WATER_LEVEL) return Classification.Water;
  if (value < FIELD_LEVEL) return Classification.Field;
  if (value < GRASS_LEVEL) return Classification.Grassland;
  if (value < LIGHT_FOREST_LEVEL) return Classification.LightForest;
  return Classification.DenseForest;
}

/**
 * Composite terrain signal at normalised coordinates: a broad continental
 * layer blended with fine detail, plus a low-frequency elevation term,
 * squashed through tanh.
 */
export function sampleTerrain(field: NoiseField, nx: number, ny: number): number {
  const broad = fractal(field.broad, nx * 3, ny * 3, { octaves: 4, persistence: 0.5, lacunarity: 2 });
  const detail = fractal(field.detail, nx * 10, ny * 10, { octaves: 1, persistence: 0.4, lacunarity: 2.5 });
  const combined = broad * 0.85 + detail * 0.15;
  const elevation = fractal(field.elevation, nx + 50, ny + 50, { octaves: 2, persistence: 0.5, lacunarity: 2 });
  return Math.tanh((combined + 0.3 * elevation) * 1.2);
}

export function generateTerrain(seed: string, options: TerrainOptions): GeneratedTerrain {
  const { width, height } = options;
  const logger = options.logger ?? silentLogger;
  const grid = new WorldGrid(width, height);

  const field = createNoiseField(seed);
  const jitterRng = createSeededRandom(seed + "_jitter");
  const featureRng = createSeededRandom(seed + "_features");

  // ============================================================
  // Step 1: classify every cell from jittered noise
  // ============================================================
  for (let y = 0; y < height; y++) {
    for (let x = 0; x < width; x++) {
      const jx = jitterRng() * JITTER;
      const jy = jitterRng() * JITTER;
      const value = sampleTerrain(field, x / width + jx, y / height + jy);
      grid.paint(x, y, classifyValue(value));
    }
  }

  // ============================================================
  // Step 2: carve features. Water first so houses never land in it.
  // ============================================================
  const river = carveRivers(grid, featureRng, logger);
  const lake = carveLakes(grid, featureRng, logger);
  const houseCluster = placeHouses(grid, featureRng, logger);
  const clearing = carveClearings(grid, featureRng, logger);

  const housesTotal = grid.count((kind) => kind === Classification.House);
  logger.info(
    `Generated ${width}x${height} island "${seed}": ${river.placed} river(s), ${lake.placed} lake(s), ` +
      `${houseCluster.placed} house cluster(s) with ${housesTotal} house(s), ${clearing.placed} clearing(s)`
  );

  return {
    grid,
    report: {
      seed,
      features: { river, lake, houseCluster, clearing },
      housesTotal,
    },
  };
}
