import { PermutationTable, invertCells } from '../../../src/shared/engine/PermutationTable';

describe('PermutationTable', () => {
  it('starts as the row-major identity', () => {
    const table = new PermutationTable(3);

    expect(table.sideLength).toBe(3);
    expect(table.size).toBe(9);
    expect(table.flatten()).toEqual([0, 1, 2, 3, 4, 5, 6, 7, 8]);
    expect(table.toRows()).toEqual([
      [0, 1, 2],
      [3, 4, 5],
      [6, 7, 8],
    ]);
    expect(table.read({ row: 2, col: 1 })).toBe(7);
  });

  it('swaps two cells', () => {
    const table = new PermutationTable(3);
    table.swap({ row: 0, col: 1 }, { row: 2, col: 2 });

    expect(table.read({ row: 0, col: 1 })).toBe(8);
    expect(table.read({ row: 2, col: 2 })).toBe(1);
    expect(table.flatten()).toEqual([0, 8, 2, 3, 4, 5, 6, 7, 1]);
  });

  it('treats a self-swap as a no-op', () => {
    const table = new PermutationTable(4);
    table.swap({ row: 1, col: 3 }, { row: 0, col: 0 });
    const before = table.flatten();

    table.swap({ row: 2, col: 2 }, { row: 2, col: 2 });
    table.swap({ row: 1, col: 3 }, { row: 1, col: 3 });

    expect(table.flatten()).toEqual(before);
  });

  it('returns copies from flatten and toRows', () => {
    const table = new PermutationTable(3);
    const flat = table.flatten();
    const rows = table.toRows();
    flat[0] = 99;
    rows[1][1] = 99;

    expect(table.read({ row: 0, col: 0 })).toBe(0);
    expect(table.read({ row: 1, col: 1 })).toBe(4);
  });

  it('computes the inverse permutation', () => {
    const table = new PermutationTable(3);
    table.swap({ row: 0, col: 0 }, { row: 1, col: 2 });
    table.swap({ row: 1, col: 2 }, { row: 2, col: 0 });
    // flatten: [5, 1, 2, 3, 4, 6, 0, 7, 8]

    expect(table.flatten()).toEqual([5, 1, 2, 3, 4, 6, 0, 7, 8]);
    expect(table.inverse()).toEqual([6, 1, 2, 3, 4, 0, 5, 7, 8]);
  });

  it('leaves missing values undefined when inverting arbitrary cells', () => {
    const inverted = invertCells([0, 0, 3, 9]);

    expect(inverted).toHaveLength(4);
    expect(inverted[0]).toBe(1);
    expect(inverted[1]).toBeUndefined();
    expect(inverted[2]).toBeUndefined();
    expect(inverted[3]).toBe(2);
  });
});
