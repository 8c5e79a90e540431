import { ConfigError } from "../core/errors";
import { isDifficulty, type SimulationConfigInput } from "../core/config";
import { createEpisode } from "../core/Simulation";
import { createLogger } from "../core/logger";
import { createSeededRandom, randomInt } from "../core/random";
import { formatGrid } from "../modules/world/utils/gridText";

// usage: run-episode [seed] [easy|normal|hard] [burns-per-minute]
// Plays one episode headless at 60 updates/s with a scripted operator that
// drops counter-burns at random cells, then prints the final map and score.
const [cliSeed, cliDifficulty, cliBurns] = process.argv.slice(2);
const logger = createLogger("info", "run");

const input: SimulationConfigInput = { seed: cliSeed, logLevel: "info" };
if (cliDifficulty !== undefined) {
  if (!isDifficulty(cliDifficulty)) {
    logger.warn(`Unknown difficulty "${cliDifficulty}", using normal`);
  } else {
    input.difficulty = cliDifficulty;
  }
}
const burnsPerMinute = cliBurns === undefined ? 6 : Number(cliBurns);

const DT = 1 / 60;
const MAX_SECONDS = 30 * 60;

function run(): void {
  const episode = createEpisode(input);
  const { simulation } = episode;
  const operator = createSeededRandom(episode.seed + "_operator");
  const burnEvery = burnsPerMinute > 0 ? Math.round((60 / burnsPerMinute) / DT) : Infinity;

  let updates = 0;
  while (!simulation.isOver() && updates * DT < MAX_SECONDS) {
    simulation.tick(DT);
    updates++;
    if (updates % burnEvery === 0) {
      const [width, height] = simulation.grid.dimensions();
      simulation.trigger(randomInt(operator, 0, width - 1), randomInt(operator, 0, height - 1));
    }
  }

  console.log(formatGrid(simulation.grid).join("\n"));
  const stats = simulation.stats();
  console.log(
    `${stats.outcome.toUpperCase()} after ${(updates * DT).toFixed(1)}s | ` +
      `Burns: ${stats.controlledBurnsUsed} | Houses: ${stats.housesSaved}/${stats.housesTotal} | ` +
      `Forest: ${stats.forestSavedPercentage.toFixed(1)}% | Score: ${stats.score}`
  );
}

try {
  run();
} catch (err) {
  if (err instanceof ConfigError) {
    console.error(err.message);
    process.exitCode = 1;
  } else {
    throw err;
  }
}
