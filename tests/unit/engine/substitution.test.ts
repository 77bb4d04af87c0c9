import {
  PermutationTable,
  TableView,
  invertCells,
} from '../../../src/shared/engine/PermutationTable';
import {
  substitute,
  inverseSubstitute,
  computeDiagnostics,
  assertBijective,
} from '../../../src/shared/engine/substitution';
import {
  BijectivityViolation,
  EngineErrorCode,
  OutOfRange,
} from '../../../src/shared/engine/errors';
import type { Position } from '../../../src/shared/engine/geometry';

/** Table view over arbitrary values, for states the engine cannot reach. */
class ArrayTable implements TableView {
  constructor(
    readonly sideLength: number,
    private readonly values: number[]
  ) {}

  read(position: Position): number {
    return this.values[position.row * this.sideLength + position.col];
  }

  flatten(): number[] {
    return this.values.slice();
  }

  toRows(): number[][] {
    const rows: number[][] = [];
    for (let i = 0; i < this.values.length; i += this.sideLength) {
      rows.push(this.values.slice(i, i + this.sideLength));
    }
    return rows;
  }

  inverse(): number[] {
    return invertCells(this.values);
  }
}

function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('expected function to throw');
}

describe('substitution', () => {
  describe('substitute', () => {
    it('reads row value / N and column value % N', () => {
      const table = new PermutationTable(16);
      table.swap({ row: 7, col: 11 }, { row: 0, col: 0 });

      expect(substitute(table, 123)).toBe(table.read({ row: 7, col: 11 }));
      expect(substitute(table, 123)).toBe(0);
      expect(substitute(table, 0)).toBe(123);
      expect(substitute(table, 255)).toBe(255);
    });

    it.each([256, -1, 1.5, 1000])('rejects input %p outside [0, 256)', (value) => {
      const error = captureError(() => substitute(new PermutationTable(16), value));

      expect(error).toBeInstanceOf(OutOfRange);
      expect(error).toMatchObject({
        code: EngineErrorCode.RANGE_SUBSTITUTION_INPUT,
        context: { value, size: 256 },
      });
    });
  });

  describe('inverseSubstitute', () => {
    it('finds the input that maps onto a value', () => {
      const table = new PermutationTable(16);
      table.swap({ row: 7, col: 11 }, { row: 0, col: 0 });

      expect(inverseSubstitute(table, 0)).toBe(123);
      expect(inverseSubstitute(table, 123)).toBe(0);
      expect(inverseSubstitute(table, 42)).toBe(42);
    });

    it('answers from the table inverse', () => {
      const table = new PermutationTable(3);
      table.swap({ row: 0, col: 0 }, { row: 1, col: 2 });
      const inverse = jest.spyOn(table, 'inverse');

      expect(inverseSubstitute(table, 5)).toBe(0);
      expect(inverseSubstitute(table, 0)).toBe(5);
      expect(inverse).toHaveBeenCalledTimes(2);
    });

    it('rejects values outside the domain', () => {
      expect(captureError(() => inverseSubstitute(new PermutationTable(4), 16))).toBeInstanceOf(
        OutOfRange
      );
    });

    it('reports a missing value as a bijectivity violation', () => {
      const table = new ArrayTable(2, [0, 0, 2, 3]);
      expect(captureError(() => inverseSubstitute(table, 1))).toBeInstanceOf(BijectivityViolation);
    });
  });

  describe('computeDiagnostics', () => {
    it('summarises the identity table', () => {
      const diagnostics = computeDiagnostics(new PermutationTable(4));

      expect(diagnostics.isBijective).toBe(true);
      expect(diagnostics.min).toBe(0);
      expect(diagnostics.max).toBe(15);
      expect(diagnostics.mean).toBe(7.5);
      expect(diagnostics.stdDev).toBeCloseTo(Math.sqrt(21.25), 10);
      expect(diagnostics.fixedPoints).toBe(16);
    });

    it('counts fixed points after swaps', () => {
      const table = new PermutationTable(4);
      table.swap({ row: 0, col: 0 }, { row: 3, col: 3 });
      table.swap({ row: 1, col: 1 }, { row: 1, col: 2 });

      expect(computeDiagnostics(table).fixedPoints).toBe(12);
    });

    it('flags duplicates without throwing', () => {
      const diagnostics = computeDiagnostics(new ArrayTable(2, [0, 0, 2, 3]));

      expect(diagnostics.isBijective).toBe(false);
      expect(diagnostics.min).toBe(0);
      expect(diagnostics.max).toBe(3);
      expect(diagnostics.mean).toBe(1.25);
      expect(diagnostics.stdDev).toBeCloseTo(Math.sqrt(1.6875), 10);
      expect(diagnostics.fixedPoints).toBe(3);
    });

    it('flags values outside the index space', () => {
      expect(computeDiagnostics(new ArrayTable(2, [0, 1, 2, 7])).isBijective).toBe(false);
    });
  });

  describe('assertBijective', () => {
    it('accepts any table produced by swaps', () => {
      const table = new PermutationTable(5);
      table.swap({ row: 0, col: 4 }, { row: 4, col: 0 });
      expect(() => assertBijective(table)).not.toThrow();
    });

    it('lists duplicate values', () => {
      const error = captureError(() => assertBijective(new ArrayTable(2, [0, 0, 2, 3])));

      expect(error).toBeInstanceOf(BijectivityViolation);
      expect(error).toMatchObject({
        code: EngineErrorCode.INTERNAL_BIJECTIVITY_VIOLATION,
        context: { sideLength: 2, cellCount: 4, duplicates: [0], outOfDomain: [] },
      });
    });

    it('lists out-of-domain values and short tables', () => {
      expect(captureError(() => assertBijective(new ArrayTable(2, [0, 1, 2, 7])))).toMatchObject({
        context: { duplicates: [], outOfDomain: [7] },
      });
      expect(captureError(() => assertBijective(new ArrayTable(2, [0, 1, 2])))).toMatchObject({
        context: { cellCount: 3 },
      });
    });
  });
});
