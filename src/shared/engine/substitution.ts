import { BijectivityViolation, EngineErrorCode, OutOfRange } from './errors';
import { indexToPosition } from './geometry';
import { TableView } from './PermutationTable';

/**
 * Statistical summary of a table, computed over its row-major flattening.
 */
export interface SBoxDiagnostics {
  isBijective: boolean;
  min: number;
  max: number;
  mean: number;
  /** Population standard deviation. */
  stdDev: number;
  /** Cells whose value equals their own row-major index. */
  fixedPoints: number;
}

function assertInDomain(table: TableView, value: number): void {
  const size = table.sideLength * table.sideLength;
  if (!Number.isInteger(value) || value < 0 || value >= size) {
    throw new OutOfRange(
      EngineErrorCode.RANGE_SUBSTITUTION_INPUT,
      `Substitution input ${value} is outside [0, ${size})`,
      { value, size }
    );
  }
}

/**
 * Look `value` up in the table: row `value / N`, column `value % N`.
 */
export function substitute(table: TableView, value: number): number {
  assertInDomain(table, value);
  return table.read(indexToPosition(value, table.sideLength));
}

/**
 * The input that `substitute` maps onto `value`. Only meaningful for a
 * bijective table; a violation is reported rather than answered.
 */
export function inverseSubstitute(table: TableView, value: number): number {
  assertInDomain(table, value);
  const index = table.inverse()[value];
  if (index === undefined) {
    throw new BijectivityViolation(`Value ${value} does not appear in the table`, { value });
  }
  return index;
}

export function computeDiagnostics(table: TableView): SBoxDiagnostics {
  const values = table.flatten();
  const size = table.sideLength * table.sideLength;

  const distinct = new Set(values);
  const inDomain = values.every((value) => Number.isInteger(value) && value >= 0 && value < size);
  const isBijective = values.length === size && distinct.size === size && inDomain;

  let min = Infinity;
  let max = -Infinity;
  let sum = 0;
  let fixedPoints = 0;
  values.forEach((value, index) => {
    if (value < min) min = value;
    if (value > max) max = value;
    sum += value;
    if (value === index) fixedPoints++;
  });

  const mean = sum / values.length;
  const variance = values.reduce((acc, value) => acc + (value - mean) ** 2, 0) / values.length;

  return {
    isBijective,
    min,
    max,
    mean,
    stdDev: Math.sqrt(variance),
    fixedPoints,
  };
}

/**
 * Throw a BijectivityViolation unless the table is a permutation of
 * `0..N²-1`.
 */
export function assertBijective(table: TableView): void {
  const values = table.flatten();
  const size = table.sideLength * table.sideLength;
  const seen = new Set<number>();
  const duplicates: number[] = [];
  const outOfDomain: number[] = [];

  for (const value of values) {
    if (!Number.isInteger(value) || value < 0 || value >= size) {
      outOfDomain.push(value);
    } else if (seen.has(value)) {
      duplicates.push(value);
    }
    seen.add(value);
  }

  if (values.length !== size || duplicates.length > 0 || outOfDomain.length > 0) {
    throw new BijectivityViolation('Table is not a permutation of its index space', {
      sideLength: table.sideLength,
      cellCount: values.length,
      duplicates,
      outOfDomain,
    });
  }
}
