import type { WorldGrid } from "./WorldState";
import {
  DEFAULT_TUNING,
  loadConfig,
  type Difficulty,
  type FireTuning,
  type SimulationConfig,
  type SimulationConfigInput,
} from "./config";
import { createLogger, silentLogger, type Logger } from "./logger";
import { createSeededRandom, type Random } from "./random";
import { SimulationClock } from "../modules/clock/SimulationClock";
import { triggerControlledBurn } from "../modules/fire/core/controlledBurn";
import { evaluateScore } from "../modules/fire/core/evaluateScore";
import {
  ageControlledBurns,
  ageFire,
  captureTotals,
  igniteInitialFires,
  isDefeat,
  isVictory,
  spreadFire,
} from "../modules/fire/core/spreadFire";
import type { ControlledBurnResult, EpisodeTotals, Outcome, SimulationStats } from "../modules/fire/types/FireState";
import { generateTerrain } from "../modules/generator/core/generateTerrain";
import { placeDecorations } from "../modules/generator/core/placeDecorations";
import type { Decoration, TerrainReport } from "../modules/generator/types/TerrainState";

export interface SimulationOptions {
  difficulty?: Difficulty;
  random: Random;
  tuning?: FireTuning;
  logger?: Logger;
  debugAssertions?: boolean;
}

/**
 * Single owner of one episode's WorldGrid. Hosts read the grid through
 * `grid`, advance time with `tick` and relay operator clicks to `trigger`.
 */
export class FireSimulation {
  readonly grid: WorldGrid;
  readonly totals: EpisodeTotals;
  readonly difficulty: Difficulty;

  private readonly random: Random;
  private readonly tuning: FireTuning;
  private readonly logger: Logger;
  private readonly clock: SimulationClock;

  private state: Outcome = "ongoing";
  private paused = false;
  private controlledBurnsUsed = 0;

  /** Starts an episode on `grid` as-is; no fire is lit. */
  constructor(grid: WorldGrid, options: SimulationOptions) {
    this.grid = grid;
    this.difficulty = options.difficulty ?? "normal";
    this.random = options.random;
    this.tuning = options.tuning ?? DEFAULT_TUNING;
    this.logger = options.logger ?? silentLogger;
    this.clock = new SimulationClock(this.difficulty);
    this.grid.debugAssertions = options.debugAssertions ?? false;
    this.totals = captureTotals(grid);
  }

  /** Starts an episode and lights the initial border fires. */
  static setup(grid: WorldGrid, options: SimulationOptions): FireSimulation {
    const simulation = new FireSimulation(grid, options);
    const started = igniteInitialFires(grid, simulation.random, simulation.tuning, simulation.logger);
    simulation.logger.debug(`Lit ${started} initial fire(s) on ${simulation.difficulty} difficulty`);
    return simulation;
  }

  tick(dt: number): void {
    if (this.paused || this.state !== "ongoing") return;
    if (!SimulationClock.isValidDelta(dt)) return;

    const frames = SimulationClock.frames(dt);
    const dueSteps = this.clock.advance(dt);
    ageFire(this.grid, frames, this.random, this.tuning);

    for (let step = 0; step < dueSteps && this.state === "ongoing"; step++) {
      spreadFire(this.grid, this.random, this.tuning);
      if (isDefeat(this.grid, this.totals, this.tuning.defeatThreshold)) {
        this.finish("defeat");
      }
    }

    if (this.state === "ongoing") {
      ageControlledBurns(this.grid, frames, this.random, this.tuning);
      if (isVictory(this.grid)) this.finish("victory");
    }

    this.grid.verify();
  }

  /** Operator counter-burn. Ignored while paused, after the end, or off-grid. */
  trigger(x: number, y: number): ControlledBurnResult {
    if (this.paused || this.state !== "ongoing") return { ignited: false, cells: [] };
    const result = triggerControlledBurn(this.grid, x, y, this.random, this.tuning);
    if (result.ignited) {
      this.controlledBurnsUsed++;
      this.logger.debug(`Controlled burn at (${x}, ${y}) took ${result.cells.length} cell(s)`);
    }
    return result;
  }

  pause(): void {
    this.paused = true;
  }

  resume(): void {
    this.paused = false;
  }

  isPaused(): boolean {
    return this.paused;
  }

  isVictory(): boolean {
    return this.state === "victory";
  }

  isDefeat(): boolean {
    return this.state === "defeat";
  }

  isOver(): boolean {
    return this.state !== "ongoing";
  }

  outcome(): Outcome {
    return this.state;
  }

  /** Frame units of simulated time so far. */
  elapsedFrames(): number {
    return this.clock.elapsedFrames();
  }

  stats(): SimulationStats {
    return evaluateScore(this.grid, this.totals, {
      controlledBurnsUsed: this.controlledBurnsUsed,
      outcome: this.state,
    });
  }

  private finish(outcome: Exclude<Outcome, "ongoing">): void {
    this.state = outcome;
    const { housesSaved, housesTotal, forestSavedPercentage, score } = this.stats();
    this.logger.info(
      `${outcome === "victory" ? "Fire contained" : "Fire spread out of control"}: ` +
        `houses ${housesSaved}/${housesTotal}, forest ${forestSavedPercentage.toFixed(1)}%, score ${score}`
    );
  }
}

export interface Episode {
  seed: string;
  config: SimulationConfig;
  simulation: FireSimulation;
  terrain: TerrainReport;
  decorations: Decoration[];
}

/** Generates a fresh island from the config's seed and lights it. */
export function createEpisode(input: SimulationConfigInput = {}): Episode {
  const config = loadConfig(input);
  const logger = createLogger(config.logLevel, "episode");
  const { grid, report } = generateTerrain(config.seed, {
    width: config.width,
    height: config.height,
    logger,
  });
  const decorations = placeDecorations(grid, createSeededRandom(config.seed + "_decorations"));
  const simulation = FireSimulation.setup(grid, {
    difficulty: config.difficulty,
    random: createSeededRandom(config.seed + "_fire"),
    tuning: config.tuning,
    logger,
    debugAssertions: config.debugAssertions,
  });
  return { seed: config.seed, config, simulation, terrain: report, decorations };
}

/**
 * Throws the old episode away and starts another with a new seed. Settings
 * not given in `input` carry over from the previous episode; a `tuning`
 * block replaces the previous one as a whole.
 */
export function restartEpisode(previous: Episode, input: SimulationConfigInput & { seed: string }): Episode {
  const { config } = previous;
  return createEpisode({
    seed: input.seed,
    width: input.width ?? config.width,
    height: input.height ?? config.height,
    difficulty: input.difficulty ?? config.difficulty,
    debugAssertions: input.debugAssertions ?? config.debugAssertions,
    logLevel: input.logLevel ?? config.logLevel,
    tuning: input.tuning ?? config.tuning,
  });
}
