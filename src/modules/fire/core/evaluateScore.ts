import { Classification, isUnburnt } from "../../../core/Classification";
import type { WorldGrid } from "../../../core/WorldState";
import type { EpisodeTotals, Outcome, SimulationStats } from "../types/FireState";

export interface ScoreContext {
  controlledBurnsUsed?: number;
  outcome?: Outcome;
}

export function evaluateScore(
  grid: WorldGrid,
  totals: EpisodeTotals,
  context: ScoreContext = {}
): SimulationStats {
  let housesSaved = 0;
  let standing = 0;
  let fireCells = 0;

  for (let i = 0; i < grid.size; i++) {
    const kind = grid.kindAt(i);
    if (kind === Classification.House) housesSaved++;
    if (kind === Classification.Fire) fireCells++;
    if (isUnburnt(kind)) standing++;
  }

  const forestSavedPercentage =
    totals.totalBurnable > 0 ? (standing / totals.totalBurnable) * 100 : 0;

  return {
    housesSaved,
    housesTotal: totals.housesTotal,
    forestSavedPercentage,
    score: Math.trunc(housesSaved * 100 + forestSavedPercentage * 10),
    fireCells,
    controlledBurnsUsed: context.controlledBurnsUsed ?? 0,
    outcome: context.outcome ?? "ongoing",
  };
}
