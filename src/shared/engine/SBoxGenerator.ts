import { EngineErrorCode, InvalidArgument } from './errors';
import { TableView } from './PermutationTable';
import { PieceCursors, WalkEngine, WalkStatus } from './WalkEngine';
import {
  SBoxDiagnostics,
  assertBijective,
  computeDiagnostics,
  inverseSubstitute,
  substitute,
} from './substitution';
import { RandomSource, createRandomSource } from '../utils/rng';
import { SBoxOptionsInput, SBoxOptionsSchema, formatIssues } from '../validation/schemas';

export interface SBoxGeneratorOptions extends SBoxOptionsInput {
  /**
   * Random source to draw moves from. Takes precedence over `seed`; when
   * neither is given a fresh seed is generated.
   */
  rng?: RandomSource;
}

/**
 * Chess-walk S-box generator.
 *
 * Thin host around a single WalkEngine: validates options, runs the walk,
 * and exposes substitution and diagnostics over the finished table.
 *
 * ```typescript
 * const sbox = new SBoxGenerator({ sideLength: 16, seed: 42 });
 * sbox.generate(1000);
 * sbox.substitute(123);
 * ```
 */
export class SBoxGenerator {
  readonly sideLength: number;
  /** Seed behind the random source, or undefined for a caller-supplied one. */
  readonly seed: number | undefined;
  private readonly engine: WalkEngine;

  constructor(options: SBoxGeneratorOptions = {}) {
    const parsed = SBoxOptionsSchema.safeParse({
      sideLength: options.sideLength,
      seed: options.seed,
    });
    if (!parsed.success) {
      throw new InvalidArgument(
        EngineErrorCode.ARG_INVALID_OPTIONS,
        'Invalid S-box generator options',
        { issues: formatIssues(parsed.error) },
        'SBoxGenerator'
      );
    }

    let rng = options.rng;
    let seed: number | undefined;
    if (!rng) {
      const source = createRandomSource(parsed.data.seed);
      rng = source.rng;
      seed = source.seed;
    }

    this.sideLength = parsed.data.sideLength;
    this.seed = seed;
    this.engine = new WalkEngine({ sideLength: this.sideLength, rng });
  }

  get table(): TableView {
    return this.engine.table;
  }

  get status(): WalkStatus {
    return this.engine.status;
  }

  get iterationsCompleted(): number {
    return this.engine.iterationsCompleted;
  }

  get cursors(): PieceCursors {
    return this.engine.cursors;
  }

  /**
   * Run `iterations` more walk iterations and return the table.
   */
  generate(iterations: number): TableView {
    this.engine.run(iterations);
    return this.engine.table;
  }

  substitute(value: number): number {
    return substitute(this.engine.table, value);
  }

  inverseSubstitute(value: number): number {
    return inverseSubstitute(this.engine.table, value);
  }

  /**
   * Statistics over the current table. A table that is not a permutation
   * throws instead of producing a report.
   */
  diagnostics(): SBoxDiagnostics {
    assertBijective(this.engine.table);
    return computeDiagnostics(this.engine.table);
  }
}
