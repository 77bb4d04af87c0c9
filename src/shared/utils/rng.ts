import { EngineErrorCode, InvalidArgument } from '../engine/errors';

/**
 * Uniform integer source consumed by the walk engine.
 *
 * The engine never calls Math.random directly; every draw goes through an
 * injected RandomSource so a seed fully determines the generated table.
 */
export interface RandomSource {
  /** Uniform integer in `[0, upperBound)`. */
  nextIndex(upperBound: number): number;
}

/**
 * Deterministic PRNG (mulberry32) with a 32-bit state.
 *
 * For a fixed seed the sequence is identical across Node and browser
 * runtimes.
 */
export class SeededRNG implements RandomSource {
  private state: number;

  constructor(seed: number) {
    this.state = seed >>> 0;
  }

  /** Float in `[0, 1)`. */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  nextIndex(upperBound: number): number {
    assertRandomBound(upperBound);
    return Math.floor(this.next() * upperBound);
  }
}

export function assertRandomBound(upperBound: number): void {
  if (!Number.isInteger(upperBound) || upperBound <= 0) {
    throw new InvalidArgument(
      EngineErrorCode.ARG_INVALID_RANDOM_BOUND,
      `Random upper bound must be a positive integer, received ${upperBound}`,
      { upperBound },
      'RandomSource'
    );
  }
}

/**
 * Check a draw returned by an injected source against the bound it was given.
 */
export function assertRandomIndex(index: number, upperBound: number): void {
  if (!Number.isInteger(index) || index < 0 || index >= upperBound) {
    throw new InvalidArgument(
      EngineErrorCode.ARG_INVALID_RANDOM_INDEX,
      `Random source returned ${index}, expected an integer in [0, ${upperBound})`,
      { index, upperBound },
      'RandomSource'
    );
  }
}

/**
 * Fresh unsigned 32-bit seed for runs where the caller did not pin one.
 */
export function generateSeed(): number {
  return Math.floor(Math.random() * 0x100000000) >>> 0;
}

/**
 * Build the engine's random source. Unseeded runs still go through
 * SeededRNG so the seed can be logged and replayed.
 */
export function createRandomSource(seed?: number): { rng: SeededRNG; seed: number } {
  const effectiveSeed = seed === undefined ? generateSeed() : seed >>> 0;
  return { rng: new SeededRNG(effectiveSeed), seed: effectiveSeed };
}
