import type { GridPoint } from "../../../core/WorldState";

export type Outcome = "ongoing" | "victory" | "defeat";

/** Captured once when an episode starts. */
export interface EpisodeTotals {
  totalBurnable: number; // cells not water
  housesTotal: number;
}

export interface SimulationStats {
  housesSaved: number;
  housesTotal: number;
  forestSavedPercentage: number; // 0..100
  score: number;
  fireCells: number;
  controlledBurnsUsed: number;
  outcome: Outcome;
}

/** Draws the Bernoulli sample for one (source, target) ignition trial. */
export type TrialRoller = (source: number, target: number) => number;

export interface SpreadResult {
  ignited: number[]; // cell indices committed to fire this step
}

export interface AgingResult {
  burntOut: number[];
}

export interface ControlledBurnResult {
  ignited: boolean;
  cells: GridPoint[];
}
