// =============================================================================
// CHESS-WALK S-BOX ENGINE - PUBLIC API
// =============================================================================
// Hosts (the CLI, library consumers) should only import from this file.
// Everything exported here is pure and browser-safe.
// =============================================================================

// =============================================================================
// BOARD GEOMETRY
// =============================================================================

export type { Position, Direction } from './geometry';
export {
  MIN_SIDE_LENGTH,
  wrap,
  wrapPosition,
  stepPosition,
  positionToString,
  isValidSideLength,
  positionToIndex,
  indexToPosition,
} from './geometry';

// =============================================================================
// MOVE GENERATION
// =============================================================================

export type { PieceKind, MoveGenerator } from './moveGenerators';
export {
  WALK_ORDER,
  KNIGHT_OFFSETS,
  KING_OFFSETS,
  BISHOP_DIRECTIONS,
  MOVE_GENERATORS,
  getKnightMoves,
  getKingMoves,
  getBishopMoves,
} from './moveGenerators';

// =============================================================================
// TABLE, WALK AND SUBSTITUTION
// =============================================================================

export type { TableView } from './PermutationTable';
export { PermutationTable } from './PermutationTable';

export type { WalkStatus, PieceCursors, WalkEngineOptions } from './WalkEngine';
export { WalkEngine } from './WalkEngine';

export type { SBoxDiagnostics } from './substitution';
export { substitute, inverseSubstitute, computeDiagnostics, assertBijective } from './substitution';

export type { SBoxGeneratorOptions } from './SBoxGenerator';
export { SBoxGenerator } from './SBoxGenerator';

// =============================================================================
// RANDOMNESS
// =============================================================================

export type { RandomSource } from '../utils/rng';
export { SeededRNG, createRandomSource, generateSeed } from '../utils/rng';

// =============================================================================
// ERRORS
// =============================================================================

export type { EngineErrorJSON } from './errors';
export {
  EngineError,
  EngineErrorCode,
  InvalidArgument,
  OutOfRange,
  BijectivityViolation,
  isEngineError,
  isInvalidArgument,
  isOutOfRange,
  isBijectivityViolation,
  wrapEngineError,
} from './errors';
