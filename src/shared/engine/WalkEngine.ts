import { EngineErrorCode, InvalidArgument } from './errors';
import {
  MIN_SIDE_LENGTH,
  Position,
  isValidSideLength,
  positionToString,
} from './geometry';
import { MOVE_GENERATORS, PieceKind, WALK_ORDER } from './moveGenerators';
import { PermutationTable, TableView } from './PermutationTable';
import { RandomSource, assertRandomIndex } from '../utils/rng';
import { debugLog, isWalkTraceEnabled } from '../utils/envFlags';

export type WalkStatus = 'constructed' | 'generating' | 'finished';

export type PieceCursors = Record<PieceKind, Position>;

export interface WalkEngineOptions {
  sideLength: number;
  rng: RandomSource;
}

/**
 * Drives the three pieces over the board and permutes the table.
 *
 * Each iteration moves the knight, then the king, then the bishop. A piece
 * picks one entry of its raw move list uniformly at random, swaps the table
 * cells under its cursor and under the destination, and moves there.
 *
 * The engine owns its table and cursors exclusively. Calling `run` again
 * continues from the current state; nothing is reset.
 */
export class WalkEngine {
  readonly sideLength: number;
  private readonly rng: RandomSource;
  private readonly permutation: PermutationTable;
  private readonly positions: PieceCursors;
  private currentStatus: WalkStatus = 'constructed';
  private completed = 0;

  constructor(options: WalkEngineOptions) {
    const { sideLength, rng } = options;
    if (!isValidSideLength(sideLength)) {
      throw new InvalidArgument(
        EngineErrorCode.ARG_INVALID_SIDE_LENGTH,
        `Board side length must be an integer >= ${MIN_SIDE_LENGTH}, received ${sideLength}`,
        { sideLength, minimum: MIN_SIDE_LENGTH },
        'WalkEngine'
      );
    }

    this.sideLength = sideLength;
    this.rng = rng;
    this.permutation = new PermutationTable(sideLength);

    const center = Math.floor(sideLength / 2);
    this.positions = {
      king: { row: 0, col: 0 },
      knight: { row: center, col: center },
      bishop: { row: sideLength - 1, col: sideLength - 1 },
    };
  }

  get status(): WalkStatus {
    return this.currentStatus;
  }

  /** Total iterations performed across every `run` call. */
  get iterationsCompleted(): number {
    return this.completed;
  }

  get table(): TableView {
    return this.permutation;
  }

  /** Snapshot of the piece positions. */
  get cursors(): PieceCursors {
    return {
      knight: { ...this.positions.knight },
      king: { ...this.positions.king },
      bishop: { ...this.positions.bishop },
    };
  }

  run(iterations: number): void {
    if (!Number.isInteger(iterations) || iterations < 0) {
      throw new InvalidArgument(
        EngineErrorCode.ARG_INVALID_ITERATION_COUNT,
        `Iteration count must be a non-negative integer, received ${iterations}`,
        { iterations },
        'WalkEngine'
      );
    }

    this.currentStatus = 'generating';
    const trace = isWalkTraceEnabled();

    for (let i = 0; i < iterations; i++) {
      for (const piece of WALK_ORDER) {
        this.advance(piece, trace);
      }
      this.completed++;
    }

    this.currentStatus = 'finished';
  }

  private advance(piece: PieceKind, trace: boolean): void {
    const from = this.positions[piece];
    const moves = MOVE_GENERATORS[piece](from, this.sideLength);
    const index = this.rng.nextIndex(moves.length);
    assertRandomIndex(index, moves.length);
    const to = moves[index];

    this.permutation.swap(from, to);
    this.positions[piece] = to;

    debugLog(
      trace,
      `[WalkEngine] iter=${this.completed} ${piece} ${positionToString(from)} -> ${positionToString(to)}`
    );
  }
}
