/**
 * Engine Domain Errors - Structured error types for the S-box engine
 *
 * Error Categories:
 * - **InvalidArgument**: Degenerate board size, iteration count or RNG bound
 * - **OutOfRange**: Substitution input outside the table's domain
 * - **BijectivityViolation**: The table is no longer a permutation (a bug)
 *
 * Usage:
 * ```typescript
 * import { OutOfRange, EngineErrorCode } from './errors';
 *
 * throw new OutOfRange(
 *   EngineErrorCode.RANGE_SUBSTITUTION_INPUT,
 *   'Input 256 is outside [0, 256)',
 *   { value: 256, size: 256 }
 * );
 * ```
 *
 * @module EngineErrors
 */

// =============================================================================
// ERROR CODES
// =============================================================================

/**
 * Enumeration of all engine domain error codes.
 *
 * Error codes are prefixed by category:
 * - ARG_*: Caller supplied an unusable argument
 * - RANGE_*: Value outside the table's domain
 * - INTERNAL_*: Invariant failures, should never happen in correct code
 */
export enum EngineErrorCode {
  /** Board side length is not an integer >= the minimum */
  ARG_INVALID_SIDE_LENGTH = 'ARG_INVALID_SIDE_LENGTH',
  /** Iteration count is negative or not an integer */
  ARG_INVALID_ITERATION_COUNT = 'ARG_INVALID_ITERATION_COUNT',
  /** Random draw requested with an empty or non-integer range */
  ARG_INVALID_RANDOM_BOUND = 'ARG_INVALID_RANDOM_BOUND',
  /** Random source returned an index outside the requested range */
  ARG_INVALID_RANDOM_INDEX = 'ARG_INVALID_RANDOM_INDEX',
  /** Generator options failed schema validation */
  ARG_INVALID_OPTIONS = 'ARG_INVALID_OPTIONS',

  /** Substitution input outside [0, N²) */
  RANGE_SUBSTITUTION_INPUT = 'RANGE_SUBSTITUTION_INPUT',

  /** Table values are not a permutation of 0..N²-1 */
  INTERNAL_BIJECTIVITY_VIOLATION = 'INTERNAL_BIJECTIVITY_VIOLATION',
  /** Assertion failed - indicates a bug */
  INTERNAL_ASSERTION_FAILED = 'INTERNAL_ASSERTION_FAILED',
}

/**
 * Maps error code prefixes to human-readable category descriptions.
 */
export const ERROR_CATEGORY_DESCRIPTIONS: Record<string, string> = {
  ARG_: 'Invalid argument',
  RANGE_: 'Value outside the substitution domain',
  INTERNAL_: 'Internal engine error (bug)',
};

// =============================================================================
// BASE ERROR CLASS
// =============================================================================

/**
 * Base class for all engine domain errors.
 */
export class EngineError extends Error {
  /** Error code for programmatic handling */
  readonly code: EngineErrorCode;

  /** Additional context for debugging */
  readonly context: Record<string, unknown>;

  /** Component that raised the error (e.g. 'WalkEngine', 'Substitution') */
  readonly domain: string;

  readonly timestamp: Date;

  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Engine'
  ) {
    super(message);
    this.name = 'EngineError';
    this.code = code;
    this.context = context;
    this.domain = domain;
    this.timestamp = new Date();

    Object.setPrototypeOf(this, EngineError.prototype);
  }

  /** Get error category from code prefix */
  get category(): string {
    const prefix = this.code.split('_')[0] + '_';
    return ERROR_CATEGORY_DESCRIPTIONS[prefix] ?? 'Unknown error category';
  }

  /** Serialize to a JSON-safe object for logging */
  toJSON(): EngineErrorJSON {
    return {
      error: true,
      type: this.name,
      code: this.code,
      message: this.message,
      domain: this.domain,
      context: this.context,
      category: this.category,
      timestamp: this.timestamp.toISOString(),
    };
  }
}

/**
 * JSON representation of an EngineError.
 */
export interface EngineErrorJSON {
  error: true;
  type: string;
  code: string;
  message: string;
  domain: string;
  context: Record<string, unknown>;
  category: string;
  timestamp: string;
}

// =============================================================================
// SPECIFIC ERROR CLASSES
// =============================================================================

/**
 * Thrown when a caller passes a degenerate board size, a negative or
 * fractional iteration count, or an empty random range.
 */
export class InvalidArgument extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Arguments'
  ) {
    super(code, message, context, domain);
    this.name = 'InvalidArgument';
    Object.setPrototypeOf(this, InvalidArgument.prototype);
  }
}

/**
 * Thrown when a substitution input lies outside `[0, N²)`.
 */
export class OutOfRange extends EngineError {
  constructor(
    code: EngineErrorCode,
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Substitution'
  ) {
    super(code, message, context, domain);
    this.name = 'OutOfRange';
    Object.setPrototypeOf(this, OutOfRange.prototype);
  }
}

/**
 * Thrown when a table is found not to be a permutation of `0..N²-1`.
 *
 * Tables only change through pairwise swaps, so this always points at a
 * defect in the engine or at a mutation from outside it.
 */
export class BijectivityViolation extends EngineError {
  constructor(
    message: string,
    context: Record<string, unknown> = {},
    domain: string = 'Diagnostics'
  ) {
    super(EngineErrorCode.INTERNAL_BIJECTIVITY_VIOLATION, message, context, domain);
    this.name = 'BijectivityViolation';
    Object.setPrototypeOf(this, BijectivityViolation.prototype);
  }
}

// =============================================================================
// TYPE GUARDS
// =============================================================================

export function isEngineError(error: unknown): error is EngineError {
  return error instanceof EngineError;
}

export function isInvalidArgument(error: unknown): error is InvalidArgument {
  return error instanceof InvalidArgument;
}

export function isOutOfRange(error: unknown): error is OutOfRange {
  return error instanceof OutOfRange;
}

export function isBijectivityViolation(error: unknown): error is BijectivityViolation {
  return error instanceof BijectivityViolation;
}

// =============================================================================
// UTILITIES
// =============================================================================

/**
 * Wrap an unknown error in an EngineError.
 *
 * Used at the CLI boundary so every failure is reported with a code.
 */
export function wrapEngineError(
  error: unknown,
  domain: string = 'Engine',
  context: Record<string, unknown> = {}
): EngineError {
  if (isEngineError(error)) {
    return error;
  }

  const message = error instanceof Error ? error.message : String(error);
  const stack = error instanceof Error ? error.stack : undefined;

  return new EngineError(
    EngineErrorCode.INTERNAL_ASSERTION_FAILED,
    message,
    {
      ...context,
      originalStack: stack,
    },
    domain
  );
}
