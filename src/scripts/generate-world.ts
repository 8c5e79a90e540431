import { mkdirSync, writeFileSync } from "fs";
import { CLASSIFICATIONS, Classification } from "../core/Classification";
import { ConfigError } from "../core/errors";
import { loadConfig, type SimulationConfig } from "../core/config";
import { createLogger } from "../core/logger";
import { generateTerrain } from "../modules/generator/core/generateTerrain";
import { formatGrid } from "../modules/world/utils/gridText";

// usage: generate-world [seed] [width] [height]
const [cliSeed, cliWidth, cliHeight] = process.argv.slice(2);
const randomSeed =
  Date.now().toString(36) + "_" + Math.random().toString(36).slice(2, 8);

function readConfig(): SimulationConfig {
  try {
    return loadConfig({
      seed: cliSeed ?? randomSeed,
      width: cliWidth === undefined ? undefined : Number(cliWidth),
      height: cliHeight === undefined ? undefined : Number(cliHeight),
    });
  } catch (err) {
    if (err instanceof ConfigError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }
}

const config = readConfig();

const logger = createLogger(config.logLevel, "generate");
const { grid, report } = generateTerrain(config.seed, {
  width: config.width,
  height: config.height,
  logger,
});

mkdirSync("data", { recursive: true });

// One byte per cell, row-major, Classification values
writeFileSync("data/classification.bin", Buffer.from(grid.toBytes().buffer));
writeFileSync("data/map.txt", formatGrid(grid).join("\n") + "\n", "utf8");
writeFileSync("data/report.json", JSON.stringify(report, null, 2), "utf8");
writeFileSync("data/seed.txt", config.seed, "utf8");

for (const kind of CLASSIFICATIONS) {
  const cells = grid.count((k) => k === kind);
  if (cells > 0) console.log(`${Classification[kind].padEnd(14)} ${cells}`);
}
console.log("World generated with seed:", config.seed);
