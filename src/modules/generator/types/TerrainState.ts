import type { WorldGrid } from "../../../core/WorldState";
import type { Logger } from "../../../core/logger";

export type NoiseFn = (x: number, y: number) => number; // -1..1

export interface TerrainOptions {
  width: number;
  height: number;
  logger?: Logger;
}

export type FeatureKind = "river" | "lake" | "houseCluster" | "clearing";

export interface FeatureReport {
  requested: number; // instances rolled
  placed: number;    // instances that found a valid site
}

export interface TerrainReport {
  seed: string;
  features: Record<FeatureKind, FeatureReport>;
  housesTotal: number;
}

export interface GeneratedTerrain {
  grid: WorldGrid;
  report: TerrainReport;
}

export type DecorationKind = "tree" | "fieldGrass" | "house";

export interface Decoration {
  kind: DecorationKind;
  gridX: number;
  gridY: number;
  offsetX: number; // in cell units, around the cell centre
  offsetY: number;
}

export type DecorationState = "normal" | "burning" | "burnt" | "hidden";
