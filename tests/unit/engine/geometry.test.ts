import {
  wrap,
  wrapPosition,
  stepPosition,
  positionToString,
  isValidSideLength,
  positionToIndex,
  indexToPosition,
  MIN_SIDE_LENGTH,
} from '../../../src/shared/engine/geometry';

describe('board geometry', () => {
  describe('wrap', () => {
    it('leaves in-range values untouched', () => {
      expect(wrap(0, 16)).toBe(0);
      expect(wrap(7, 16)).toBe(7);
      expect(wrap(15, 16)).toBe(15);
    });

    it('wraps values past the far edge', () => {
      expect(wrap(16, 16)).toBe(0);
      expect(wrap(17, 16)).toBe(1);
      expect(wrap(33, 16)).toBe(1);
    });

    it('wraps negative values with true modulo', () => {
      expect(wrap(-1, 16)).toBe(15);
      expect(wrap(-2, 3)).toBe(1);
      expect(wrap(-17, 16)).toBe(15);
      expect(wrap(-16, 16)).toBe(0);
    });
  });

  it('wrapPosition wraps both coordinates independently', () => {
    expect(wrapPosition(-1, 18, 16)).toEqual({ row: 15, col: 2 });
  });

  it('stepPosition applies a direction and wraps', () => {
    expect(stepPosition({ row: 0, col: 15 }, { dRow: -1, dCol: 1 }, 16)).toEqual({
      row: 15,
      col: 0,
    });
  });

  it('formats positions as row,col keys', () => {
    expect(positionToString({ row: 3, col: 11 })).toBe('3,11');
  });

  it('converts between positions and row-major indices', () => {
    expect(positionToIndex({ row: 7, col: 11 }, 16)).toBe(123);
    expect(indexToPosition(123, 16)).toEqual({ row: 7, col: 11 });
    expect(indexToPosition(0, 16)).toEqual({ row: 0, col: 0 });
  });

  it('accepts side lengths from the minimum upward', () => {
    expect(MIN_SIDE_LENGTH).toBe(3);
    expect(isValidSideLength(3)).toBe(true);
    expect(isValidSideLength(16)).toBe(true);
    expect(isValidSideLength(2)).toBe(false);
    expect(isValidSideLength(0)).toBe(false);
    expect(isValidSideLength(-4)).toBe(false);
    expect(isValidSideLength(4.5)).toBe(false);
    expect(isValidSideLength(Number.NaN)).toBe(false);
  });
});
