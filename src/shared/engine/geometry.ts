/**
 * Toroidal board geometry for the S-box walk.
 *
 * The board is an N×N grid whose edges wrap: stepping off one side lands on
 * the opposite side. Coordinates are always reduced with true mathematical
 * modulo so negative offsets wrap instead of truncating.
 *
 * These helpers are pure and browser-safe.
 */

/**
 * A cell on the board. `row` indexes the table's rows, `col` its columns.
 */
export interface Position {
  row: number;
  col: number;
}

/**
 * A step in board-local coordinates.
 */
export interface Direction {
  dRow: number;
  dCol: number;
}

/**
 * Smallest board the walk engine accepts. King and knight move sets on
 * smaller boards collapse onto a handful of cells.
 */
export const MIN_SIDE_LENGTH = 3;

/**
 * Reduce `value` into `[0, sideLength)`.
 */
export function wrap(value: number, sideLength: number): number {
  return ((value % sideLength) + sideLength) % sideLength;
}

export function wrapPosition(row: number, col: number, sideLength: number): Position {
  return { row: wrap(row, sideLength), col: wrap(col, sideLength) };
}

/**
 * Offset `position` by `direction` and wrap the result.
 */
export function stepPosition(
  position: Position,
  direction: Direction,
  sideLength: number
): Position {
  return wrapPosition(position.row + direction.dRow, position.col + direction.dCol, sideLength);
}

export function positionToString(position: Position): string {
  return `${position.row},${position.col}`;
}

export function isValidSideLength(sideLength: number): boolean {
  return Number.isInteger(sideLength) && sideLength >= MIN_SIDE_LENGTH;
}

/**
 * Row-major index of `position` (`row * N + col`).
 */
export function positionToIndex(position: Position, sideLength: number): number {
  return position.row * sideLength + position.col;
}

export function indexToPosition(index: number, sideLength: number): Position {
  return { row: Math.floor(index / sideLength), col: index % sideLength };
}
