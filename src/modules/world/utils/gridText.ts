import { CLASSIFICATIONS, Classification } from "../../../core/Classification";
import { WorldGrid } from "../../../core/WorldState";

/** One character per cell for ASCII dumps and hand-written test maps. */
export const GRID_GLYPHS: Readonly<Record<Classification, string>> = {
  [Classification.DenseForest]: "D",
  [Classification.LightForest]: "L",
  [Classification.Grassland]: "g",
  [Classification.Field]: "f",
  [Classification.House]: "H",
  [Classification.Water]: "~",
  [Classification.Burnt]: ".",
  [Classification.Fire]: "*",
  [Classification.ControlledBurn]: "c",
};

const KIND_BY_GLYPH = new Map<string, Classification>(
  CLASSIFICATIONS.map((kind) => [GRID_GLYPHS[kind], kind])
);

/**
 * Builds a grid from equal-length rows. Cells are painted directly, so fire
 * and ash can be placed anywhere; ash ages start at zero.
 */
export function parseGrid(rows: readonly string[]): WorldGrid {
  const height = rows.length;
  const width = rows[0]?.length ?? 0;
  const grid = new WorldGrid(width, height);

  rows.forEach((row, y) => {
    if (row.length !== width) {
      throw new RangeError(`Row ${y} has ${row.length} cells, expected ${width}`);
    }
    for (let x = 0; x < width; x++) {
      const glyph = row.charAt(x);
      const kind = KIND_BY_GLYPH.get(glyph);
      if (kind === undefined) {
        throw new RangeError(`Unknown cell glyph "${glyph}" at (${x}, ${y})`);
      }
      grid.paint(x, y, kind);
    }
  });

  return grid;
}

export function formatGrid(grid: WorldGrid): string[] {
  const rows: string[] = [];
  for (let y = 0; y < grid.height; y++) {
    let row = "";
    for (let x = 0; x < grid.width; x++) {
      row += GRID_GLYPHS[grid.classification(x, y)];
    }
    rows.push(row);
  }
  return rows;
}
