import { Classification } from "../../../core/Classification";
import type { WorldGrid } from "../../../core/WorldState";
import { chance, randomInt, randomRange, type Random } from "../../../core/random";
import type { Decoration, DecorationState } from "../types/TerrainState";

/**
 * Billboard placements for the renderer, derived once from a freshly
 * generated grid. Purely visual; the simulation never reads them.
 */
export function placeDecorations(grid: WorldGrid, random: Random): Decoration[] {
  const decorations: Decoration[] = [];

  for (const { x, y, kind } of grid.iterate()) {
    if (kind === Classification.LightForest) {
      // not every light forest cell gets a tree
      if (chance(random, 0.75)) {
        decorations.push({
          kind: "tree",
          gridX: x,
          gridY: y,
          offsetX: randomRange(random, -0.3, 0.3),
          offsetY: randomRange(random, -0.3, 0.3),
        });
      }
    } else if (kind === Classification.Field && (x + y) % 2 === 0) {
      const tufts = randomInt(random, 1, 2);
      for (let i = 0; i < tufts; i++) {
        decorations.push({
          kind: "fieldGrass",
          gridX: x,
          gridY: y,
          offsetX: randomRange(random, -0.4, 0.4),
          offsetY: randomRange(random, -0.4, 0.4),
        });
      }
    } else if (kind === Classification.House) {
      decorations.push({ kind: "house", gridX: x, gridY: y, offsetX: 0, offsetY: 0 });
    }
  }

  return decorations;
}

/** Visual state of a decoration given the current state of its cell. */
export function decorationState(decoration: Decoration, grid: WorldGrid): DecorationState {
  const cell = grid.classification(decoration.gridX, decoration.gridY);
  const burnt = cell === Classification.Burnt;

  switch (decoration.kind) {
    case "tree":
      // counter-burns leave the tree standing until the cell is ash
      if (burnt) return "burnt";
      return cell === Classification.Fire ? "burning" : "normal";
    case "house":
      return cell === Classification.Fire || cell === Classification.ControlledBurn || burnt ? "burnt" : "normal";
    case "fieldGrass":
      return cell === Classification.Fire || burnt ? "hidden" : "normal";
  }
}
