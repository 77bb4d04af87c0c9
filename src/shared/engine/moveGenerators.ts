import { Direction, Position, stepPosition } from './geometry';

/**
 * Move generation for the three walking pieces.
 *
 * Every generator returns the raw, ordered move list for a piece standing on
 * `position`. Lists are never deduplicated: on small boards several offsets
 * wrap onto the same cell, and those repeats weight the random draw made by
 * the walk engine. Order matters as well, since a seeded walk picks moves by
 * index.
 */

export type PieceKind = 'knight' | 'king' | 'bishop';

export type MoveGenerator = (position: Position, sideLength: number) => Position[];

/**
 * Order in which pieces move within one walk iteration.
 */
export const WALK_ORDER: readonly PieceKind[] = ['knight', 'king', 'bishop'];

export const KNIGHT_OFFSETS: readonly Direction[] = [
  { dRow: 2, dCol: 1 },
  { dRow: 2, dCol: -1 },
  { dRow: -2, dCol: 1 },
  { dRow: -2, dCol: -1 },
  { dRow: 1, dCol: 2 },
  { dRow: 1, dCol: -2 },
  { dRow: -1, dCol: 2 },
  { dRow: -1, dCol: -2 },
];

/**
 * Moore neighbourhood, row offset outer and column offset inner.
 */
export const KING_OFFSETS: readonly Direction[] = (() => {
  const offsets: Direction[] = [];
  for (const dRow of [-1, 0, 1]) {
    for (const dCol of [-1, 0, 1]) {
      if (dRow === 0 && dCol === 0) continue;
      offsets.push({ dRow, dCol });
    }
  }
  return offsets;
})();

export const BISHOP_DIRECTIONS: readonly Direction[] = [
  { dRow: 1, dCol: 1 },
  { dRow: 1, dCol: -1 },
  { dRow: -1, dCol: 1 },
  { dRow: -1, dCol: -1 },
];

export function getKnightMoves(position: Position, sideLength: number): Position[] {
  return KNIGHT_OFFSETS.map((offset) => stepPosition(position, offset, sideLength));
}

export function getKingMoves(position: Position, sideLength: number): Position[] {
  return KING_OFFSETS.map((offset) => stepPosition(position, offset, sideLength));
}

/**
 * Slide `sideLength` steps along each diagonal. Each step is taken from the
 * previous wrapped cell, so a full ray returns to (or cycles past) the start.
 */
export function getBishopMoves(position: Position, sideLength: number): Position[] {
  const moves: Position[] = [];
  for (const direction of BISHOP_DIRECTIONS) {
    let current = position;
    for (let step = 0; step < sideLength; step++) {
      current = stepPosition(current, direction, sideLength);
      moves.push(current);
    }
  }
  return moves;
}

export const MOVE_GENERATORS: Readonly<Record<PieceKind, MoveGenerator>> = {
  knight: getKnightMoves,
  king: getKingMoves,
  bishop: getBishopMoves,
};
