import {
  Classification,
  canTransition,
  isClassification,
} from "./Classification";
import { assertInvariant } from "./errors";

export interface GridPoint {
  x: number;
  y: number;
}

export interface GridCell extends GridPoint {
  kind: Classification;
}

/** Marks a cell that has not been turned to ash yet. */
export const NO_ASH_SHADE = 0;

// 8-neighbourhood, row-major
const NEIGHBOR_OFFSETS: readonly (readonly [number, number])[] = [
  [-1, -1], [0, -1], [1, -1],
  [-1, 0],           [1, 0],
  [-1, 1],  [0, 1],  [1, 1],
];

/**
 * Canonical simulation state: one classification per cell, an ash-age counter
 * (frame units since ignition) and an ash shade fixed when the cell burns out.
 * Dimensions never change after construction.
 */
export class WorldGrid {
  readonly width: number;
  readonly height: number;
  readonly size: number;

  /** Enables transition and ash-age assertions for every runtime mutation. */
  debugAssertions = false;

  private readonly cells: Uint8Array;
  private readonly ashAges: Float64Array;
  private readonly ashShades: Uint8Array;

  constructor(width: number, height: number, fill: Classification = Classification.DenseForest) {
    if (!Number.isInteger(width) || !Number.isInteger(height) || width <= 0 || height <= 0) {
      throw new RangeError(`Grid dimensions must be positive integers, got ${width}x${height}`);
    }
    this.width = width;
    this.height = height;
    this.size = width * height;
    this.cells = new Uint8Array(this.size).fill(fill);
    this.ashAges = new Float64Array(this.size);
    this.ashShades = new Uint8Array(this.size);
  }

  dimensions(): [width: number, height: number] {
    return [this.width, this.height];
  }

  inBounds(x: number, y: number): boolean {
    return (
      Number.isInteger(x) &&
      Number.isInteger(y) &&
      x >= 0 &&
      x < this.width &&
      y >= 0 &&
      y < this.height
    );
  }

  index(x: number, y: number): number {
    return y * this.width + x;
  }

  point(idx: number): GridPoint {
    return { x: idx % this.width, y: (idx / this.width) | 0 };
  }

  classification(x: number, y: number): Classification {
    return this.kindAt(this.checkedIndex(x, y));
  }

  kindAt(idx: number): Classification {
    const value = this.cells[idx];
    if (value === undefined || !isClassification(value)) {
      throw new RangeError(`Cell index ${idx} is outside a ${this.width}x${this.height} grid`);
    }
    return value;
  }

  ashAge(x: number, y: number): number {
    return this.ashAges[this.checkedIndex(x, y)] ?? 0;
  }

  /** Grey level in [50, 70] once burnt, NO_ASH_SHADE before. */
  ashShade(x: number, y: number): number {
    return this.ashShades[this.checkedIndex(x, y)] ?? NO_ASH_SHADE;
  }

  private checkedIndex(x: number, y: number): number {
    if (!this.inBounds(x, y)) {
      throw new RangeError(`Cell (${x}, ${y}) is outside a ${this.width}x${this.height} grid`);
    }
    return this.index(x, y);
  }

  /** Neighbour indices clipped to the grid. */
  neighbors(x: number, y: number): number[] {
    const result: number[] = [];
    for (const [dx, dy] of NEIGHBOR_OFFSETS) {
      const nx = x + dx;
      const ny = y + dy;
      if (nx < 0 || nx >= this.width || ny < 0 || ny >= this.height) continue;
      result.push(ny * this.width + nx);
    }
    return result;
  }

  *iterate(): IterableIterator<GridCell> {
    for (let y = 0; y < this.height; y++) {
      for (let x = 0; x < this.width; x++) {
        yield { x, y, kind: this.kindAt(y * this.width + x) };
      }
    }
  }

  count(predicate: (kind: Classification) => boolean): number {
    let total = 0;
    for (let i = 0; i < this.size; i++) {
      if (predicate(this.kindAt(i))) total++;
    }
    return total;
  }

  indicesOf(kind: Classification): number[] {
    const result: number[] = [];
    for (let i = 0; i < this.size; i++) {
      if (this.cells[i] === kind) result.push(i);
    }
    return result;
  }

  /** Unchecked write used while carving terrain, before an episode starts. */
  paint(x: number, y: number, kind: Classification): void {
    if (!this.inBounds(x, y)) return;
    this.cells[this.index(x, y)] = kind;
  }

  /**
   * Runtime state change along the fire graph. Newly ignited cells restart
   * their ash age; cells turning to ash receive `shade`.
   */
  transition(idx: number, to: Classification, shade: number = NO_ASH_SHADE): void {
    const from = this.kindAt(idx);
    assertInvariant(
      this.debugAssertions,
      canTransition(from, to),
      () => `Illegal transition ${Classification[from]} -> ${Classification[to]} at ${idx}`
    );
    this.cells[idx] = to;
    if (to === Classification.Fire) {
      this.ashAges[idx] = 0;
    } else if (to === Classification.Burnt) {
      this.ashAges[idx] = 0;
      this.ashShades[idx] = shade;
    }
  }

  /** Adds to a burning cell's ash age and returns the new value. */
  ageCell(idx: number, amount: number): number {
    assertInvariant(
      this.debugAssertions,
      this.cells[idx] === Classification.Fire,
      () => `Only fire cells age, cell ${idx} is ${Classification[this.kindAt(idx)]}`
    );
    const next = (this.ashAges[idx] ?? 0) + amount;
    this.ashAges[idx] = next;
    return next;
  }

  /** Checks the ash-age invariants over the whole grid. */
  verify(): void {
    for (let i = 0; i < this.size; i++) {
      const age = this.ashAges[i] ?? 0;
      assertInvariant(
        this.debugAssertions,
        Number.isFinite(age) && age >= 0,
        () => `Cell ${i} has invalid ash age ${age}`
      );
      assertInvariant(
        this.debugAssertions,
        age === 0 || this.cells[i] === Classification.Fire,
        () => `Cell ${i} is ${Classification[this.kindAt(i)]} but carries ash age ${age}`
      );
    }
  }

  clone(): WorldGrid {
    const copy = new WorldGrid(this.width, this.height);
    copy.cells.set(this.cells);
    copy.ashAges.set(this.ashAges);
    copy.ashShades.set(this.ashShades);
    copy.debugAssertions = this.debugAssertions;
    return copy;
  }

  /** Raw classification bytes, row-major. */
  toBytes(): Uint8Array {
    return this.cells.slice();
  }
}
