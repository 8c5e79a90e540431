export {
  Classification,
  CLASSIFICATIONS,
  FLAMMABILITY,
  flammability,
  blocksIgnition,
  blocksControlledBurn,
  canTransition,
} from "./core/Classification";
export { WorldGrid, NO_ASH_SHADE, type GridCell, type GridPoint } from "./core/WorldState";
export {
  loadConfig,
  DEFAULT_TUNING,
  SPREAD_DELAY,
  FRAME_RATE,
  type Difficulty,
  type FireTuning,
  type SimulationConfig,
  type SimulationConfigInput,
} from "./core/config";
export { ConfigError, InvariantError } from "./core/errors";
export { createLogger, silentLogger, type Logger, type LogLevel } from "./core/logger";
export { createSeededRandom, type Random } from "./core/random";
export {
  FireSimulation,
  createEpisode,
  restartEpisode,
  type Episode,
  type SimulationOptions,
} from "./core/Simulation";

export { SimulationClock } from "./modules/clock/SimulationClock";
export { triggerControlledBurn } from "./modules/fire/core/controlledBurn";
export { evaluateScore } from "./modules/fire/core/evaluateScore";
export {
  spreadFire,
  collectIgnitions,
  ageFire,
  ageControlledBurns,
  canSpread,
  isVictory,
  isDefeat,
} from "./modules/fire/core/spreadFire";
export type {
  ControlledBurnResult,
  EpisodeTotals,
  Outcome,
  SimulationStats,
} from "./modules/fire/types/FireState";
export { generateTerrain } from "./modules/generator/core/generateTerrain";
export { placeDecorations, decorationState } from "./modules/generator/core/placeDecorations";
export type {
  Decoration,
  DecorationState,
  GeneratedTerrain,
  TerrainReport,
} from "./modules/generator/types/TerrainState";
export { createNoiseField } from "./modules/generator/utils/noise";
export { parseGrid, formatGrid } from "./modules/world/utils/gridText";
