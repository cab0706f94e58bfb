/**
 * Runtime tests for shape guards
 */

import { describe, it, expect } from 'vitest';
import {
  DimensionError,
  assertCellShape,
  assertDimension,
  assertIndex,
  assertLength,
  assertMatmulCompatible,
  assertSameShape,
  assertSquare,
  formatShape,
  inferShape,
  isValidDimension,
} from './runtime';

describe('formatShape', () => {
  it('should render rows by columns', () => {
    expect(formatShape({ rows: 2, cols: 3 })).toBe('2×3');
    expect(formatShape({ rows: 0, cols: 0 })).toBe('0×0');
  });
});

describe('isValidDimension', () => {
  it('should accept non-negative integers', () => {
    expect(isValidDimension(0)).toBe(true);
    expect(isValidDimension(128)).toBe(true);
  });

  it('should reject everything else', () => {
    expect(isValidDimension(-1)).toBe(false);
    expect(isValidDimension(2.5)).toBe(false);
    expect(isValidDimension(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isValidDimension('3')).toBe(false);
  });
});

describe('assertDimension', () => {
  it('should name the offending dimension', () => {
    expect(() => assertDimension(-2, 'Row count')).toThrow(
      'Row count must be a non-negative integer, got -2',
    );
    expect(() => assertDimension(3)).not.toThrow();
  });
});

describe('assertSameShape', () => {
  it('should pass for equal shapes', () => {
    expect(() => assertSameShape({ rows: 2, cols: 3 }, { rows: 2, cols: 3 }, 'add')).not.toThrow();
  });

  it('should report both shapes on mismatch', () => {
    expect(() => assertSameShape({ rows: 2, cols: 3 }, { rows: 3, cols: 2 }, 'add')).toThrow(
      'Cannot add matrices of shapes 2×3 and 3×2',
    );
  });

  it('should attach the operation and shapes to the error', () => {
    const a = { rows: 1, cols: 2 };
    const b = { rows: 1, cols: 3 };
    try {
      assertSameShape(a, b, 'subtract');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(DimensionError);
      if (error instanceof DimensionError) {
        expect(error.name).toBe('DimensionError');
        expect(error.operation).toBe('subtract');
        expect(error.shapes).toEqual([a, b]);
      }
    }
  });
});

describe('assertMatmulCompatible', () => {
  it('should require matching inner dimensions', () => {
    expect(() => assertMatmulCompatible({ rows: 2, cols: 3 }, { rows: 3, cols: 5 })).not.toThrow();
    expect(() => assertMatmulCompatible({ rows: 2, cols: 3 }, { rows: 2, cols: 3 })).toThrow(
      'Cannot multiply 2×3 by 2×3: inner dimensions 3 and 2 differ',
    );
  });
});

describe('assertSquare', () => {
  it('should reject non-square shapes', () => {
    expect(() => assertSquare({ rows: 3, cols: 3 }, 'trace')).not.toThrow();
    expect(() => assertSquare({ rows: 2, cols: 3 }, 'trace')).toThrow(
      'Cannot take the trace of non-square matrix 2×3',
    );
  });
});

describe('assertLength', () => {
  it('should compare vector length with the expected dimension', () => {
    expect(() => assertLength([1, 2], 2, 'take the dot product')).not.toThrow();
    expect(() => assertLength([1, 2], 3, 'take the dot product')).toThrow(
      'Cannot take the dot product: expected a vector of length 3 but got length 2',
    );
  });
});

describe('assertIndex', () => {
  it('should accept indices in [0, bound)', () => {
    expect(() => assertIndex(0, 2, 'Row')).not.toThrow();
    expect(() => assertIndex(1, 2, 'Row')).not.toThrow();
  });

  it('should reject out of range and fractional indices', () => {
    expect(() => assertIndex(2, 2, 'Row')).toThrow('Row index 2 is out of range [0, 2)');
    expect(() => assertIndex(-1, 2, 'Column')).toThrow('Column index -1 is out of range [0, 2)');
    expect(() => assertIndex(0.5, 2, 'Row')).toThrow(DimensionError);
  });
});

describe('inferShape', () => {
  it('should read rows and columns from nested arrays', () => {
    expect(inferShape([[1, 2, 3], [4, 5, 6]])).toEqual({ rows: 2, cols: 3 });
    expect(inferShape([[], []])).toEqual({ rows: 2, cols: 0 });
    expect(inferShape([])).toEqual({ rows: 0, cols: 0 });
  });

  it('should reject jagged rows', () => {
    expect(() => inferShape([[1, 2], [3]])).toThrow('Row 1 has 1 elements, expected 2');
  });
});

describe('assertCellShape', () => {
  it('should accept cells of the declared shape', () => {
    expect(() => assertCellShape([[1, 2], [3, 4]], { rows: 2, cols: 2 })).not.toThrow();
    expect(() => assertCellShape([], { rows: 0, cols: 5 })).not.toThrow();
  });

  it('should reject a wrong row count or row width', () => {
    expect(() => assertCellShape([[1]], { rows: 2, cols: 1 })).toThrow(
      'Expected 2 rows for a 2×1 matrix, got 1',
    );
    expect(() => assertCellShape([[1, 2], [3]], { rows: 2, cols: 2 })).toThrow(
      'Row 1 has 1 elements, expected 2',
    );
  });
});
