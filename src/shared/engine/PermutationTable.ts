import { Position, positionToIndex } from './geometry';

/**
 * Read-only view of a substitution table. Diagnostics and substitution only
 * need this much, which lets them run against tables built elsewhere.
 */
export interface TableView {
  readonly sideLength: number;
  read(position: Position): number;
  flatten(): number[];
  toRows(): number[][];
  /** Flattened inverse: entry `v` holds the row-major index of value `v`. */
  inverse(): number[];
}

/**
 * Invert a row-major value list. Values outside `[0, length)` are skipped,
 * and a value that never appears leaves its slot undefined.
 */
export function invertCells(values: readonly number[]): number[] {
  const inverted = new Array<number>(values.length);
  values.forEach((value, index) => {
    if (Number.isInteger(value) && value >= 0 && value < values.length) {
      inverted[value] = index;
    }
  });
  return inverted;
}

/**
 * N×N grid holding a permutation of `0..N²-1`.
 *
 * Starts as the row-major identity (`cell(row, col) = row * N + col`) and is
 * only ever changed by pairwise swaps, so every state is a permutation.
 * Callers pass wrapped, in-range positions; nothing is bounds-checked here.
 */
export class PermutationTable implements TableView {
  readonly sideLength: number;
  private readonly cells: number[];

  constructor(sideLength: number) {
    this.sideLength = sideLength;
    this.cells = Array.from({ length: sideLength * sideLength }, (_, index) => index);
  }

  /** Number of cells (`N²`). */
  get size(): number {
    return this.cells.length;
  }

  read(position: Position): number {
    return this.cells[positionToIndex(position, this.sideLength)];
  }

  /**
   * Exchange the values at `a` and `b`. Swapping a cell with itself leaves
   * the table unchanged.
   */
  swap(a: Position, b: Position): void {
    const i = positionToIndex(a, this.sideLength);
    const j = positionToIndex(b, this.sideLength);
    const held = this.cells[i];
    this.cells[i] = this.cells[j];
    this.cells[j] = held;
  }

  /** Row-major copy of every value. */
  flatten(): number[] {
    return this.cells.slice();
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let row = 0; row < this.sideLength; row++) {
      const start = row * this.sideLength;
      rows.push(this.cells.slice(start, start + this.sideLength));
    }
    return rows;
  }

  /**
   * Flattened inverse permutation: `inverse()[read(p)]` is the row-major
   * index of `p`.
   */
  inverse(): number[] {
    return invertCells(this.cells);
  }
}
