/**
 * Runtime tests for matrix operations
 */

import { describe, it, expect } from 'vitest';
import { numberScalar } from '../scalar/constants';
import { ScalarError, primeField } from '../scalar/field';
import type { Scalar } from '../scalar/types';
import { DimensionError } from '../shape/runtime';
import { fromFunction, identity, matrix, zeros } from './creation';
import { add, dotProduct, matVec, mult, scalarMult, sub, trace, transpose } from './operations';

const options = { scalar: numberScalar };

/**
 * A shape whose dimensions are only known at runtime
 */
function dynamic(rows: number, cols: number): readonly [number, number] {
  return [rows, cols];
}

describe('add() and sub()', () => {
  it('should add elementwise', () => {
    const a = matrix(
      [
        [1, 2],
        [3, 4],
      ] as const,
      options,
    );
    const b = matrix(
      [
        [5, 6],
        [7, 8],
      ] as const,
      options,
    );
    expect(add(a, b).toArray()).toEqual([
      [6, 8],
      [10, 12],
    ]);
  });

  it('should subtract elementwise with the left operand first', () => {
    const a = matrix([[10, 20, 30]] as const, options);
    const b = matrix([[1, 2, 3]] as const, options);
    expect(sub(a, b).toArray()).toEqual([[9, 18, 27]]);
    expect(sub(b, a).toArray()).toEqual([[-9, -18, -27]]);
  });

  it('should wrap around the modulus in a prime field', () => {
    const f7 = primeField(7n);
    const a = matrix([[5n, 6n]] as const, { scalar: f7 });
    const b = matrix([[4n, 1n]] as const, { scalar: f7 });
    expect(add(a, b).toArray()).toEqual([[2n, 0n]]);
    expect(sub(b, a).toArray()).toEqual([[6n, 2n]]);
  });

  it('should reject mismatched dynamic shapes', () => {
    const a = fromFunction(dynamic(2, 3), () => 1, options);
    const b = fromFunction(dynamic(3, 2), () => 1, options);
    expect(() => add(a, b)).toThrow('Cannot add matrices of shapes 2×3 and 3×2');
    expect(() => sub(a, b)).toThrow('Cannot subtract matrices of shapes 2×3 and 3×2');
  });
});

describe('scalarMult()', () => {
  it('should multiply every element', () => {
    const a = matrix(
      [
        [1, -2],
        [3, 0],
      ] as const,
      options,
    );
    expect(scalarMult(a, 3).toArray()).toEqual([
      [3, -6],
      [9, 0],
    ]);
  });

  it('should put the scalar on the left of each product', () => {
    const calls: [string, string][] = [];
    const tagged: Scalar<string> = {
      name: 'tagged',
      zero: () => '',
      add: (x, y) => x + y,
      sub: (x) => x,
      mul: (x, y) => {
        calls.push([x, y]);
        return `${x}${y}`;
      },
      equals: (x, y) => x === y,
      format: (x) => x,
    };
    const a = matrix([['a', 'b']] as const, { scalar: tagged });
    expect(scalarMult(a, 'k').toArray()).toEqual([['ka', 'kb']]);
    expect(calls).toEqual([
      ['k', 'a'],
      ['k', 'b'],
    ]);
  });
});

describe('mult()', () => {
  it('should multiply a 2×3 by a 3×2 matrix', () => {
    const a = matrix(
      [
        [1, 2, 3],
        [4, 5, 6],
      ] as const,
      options,
    );
    const b = matrix(
      [
        [7, 8],
        [9, 10],
        [11, 12],
      ] as const,
      options,
    );
    const product = mult(a, b);
    expect(product.shape).toEqual([2, 2]);
    expect(product.toArray()).toEqual([
      [58, 64],
      [139, 154],
    ]);
  });

  it('should chain dimensions through a sequence of products', () => {
    const a = fromFunction([1, 2] as const, (_, j) => j + 1, options);
    const b = fromFunction([2, 3] as const, (i, j) => i + j, options);
    const c = fromFunction([3, 1] as const, () => 1, options);
    // a = [[1, 2]], a·b = [[0 + 2, 1 + 4, 2 + 6]] = [[2, 5, 8]]
    expect(mult(a, b).toArray()).toEqual([[2, 5, 8]]);
    expect(mult(mult(a, b), c).toArray()).toEqual([[15]]);
  });

  it('should produce zeros when the inner dimension is empty', () => {
    const a = zeros([2, 0] as const, options);
    const b = zeros([0, 3] as const, options);
    expect(mult(a, b).toArray()).toEqual([
      [0, 0, 0],
      [0, 0, 0],
    ]);
  });

  it('should reject incompatible dynamic shapes', () => {
    const a = fromFunction(dynamic(2, 3), () => 1, options);
    expect(() => mult(a, a)).toThrow('Cannot multiply 2×3 by 2×3: inner dimensions 3 and 2 differ');
  });
});

describe('matVec()', () => {
  it('should multiply a matrix by a vector', () => {
    const a = matrix(
      [
        [1, 2, 3],
        [4, 5, 6],
      ] as const,
      options,
    );
    expect(matVec(a, [1, 0, -1] as const)).toEqual([-2, -2]);
  });

  it('should reject a vector of the wrong length at runtime', () => {
    const a = identity(2, options);
    const v: number[] = [1, 2, 3];
    expect(() => matVec(a, v)).toThrow(
      'Cannot multiply by a vector: expected a vector of length 2 but got length 3',
    );
  });
});

describe('transpose()', () => {
  it('should swap rows and columns', () => {
    const a = matrix(
      [
        [1, 2, 3],
        [4, 5, 6],
      ] as const,
      options,
    );
    const t = transpose(a);
    expect(t.shape).toEqual([3, 2]);
    expect(t.toArray()).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
  });

  it('should keep empty dimensions', () => {
    expect(transpose(zeros([0, 3] as const, options)).shape).toEqual([3, 0]);
    expect(transpose(zeros([0, 3] as const, options)).toArray()).toEqual([[], [], []]);
  });
});

describe('trace()', () => {
  it('should sum the main diagonal', () => {
    const a = matrix(
      [
        [1, 2, 3],
        [4, 5, 6],
        [7, 8, 9],
      ] as const,
      options,
    );
    expect(trace(a)).toBe(15);
  });

  it('should be the scalar zero for the empty matrix', () => {
    expect(trace(identity(0, { scalar: primeField(7n) }))).toBe(0n);
  });

  it('should reject a non-square dynamic matrix', () => {
    const a = fromFunction(dynamic(2, 3), () => 1, options);
    expect(() => trace(a)).toThrow(DimensionError);
  });
});

describe('dotProduct()', () => {
  it('should sum pairwise products', () => {
    expect(dotProduct([1, 2, 3] as const, [4, 5, 6] as const, numberScalar)).toBe(32);
  });

  it('should be zero for empty vectors', () => {
    expect(dotProduct([] as const, [] as const, numberScalar)).toBe(0);
  });

  it('should work over a prime field', () => {
    const f7 = primeField(7n);
    // 3·5 + 4·6 = 39 ≡ 4 (mod 7)
    expect(dotProduct([3n, 4n] as const, [5n, 6n] as const, f7)).toBe(4n);
  });

  it('should reject vectors of different lengths at runtime', () => {
    const u: number[] = [1, 2, 3];
    const v: number[] = [1, 2];
    expect(() => dotProduct(u, v, numberScalar)).toThrow(
      'Cannot take the dot product: expected a vector of length 3 but got length 2',
    );
  });
});

describe('mixed scalars', () => {
  const f7 = primeField(7n);
  const f11 = primeField(11n);
  const a = matrix([[5n]] as const, { scalar: f7 });
  const b = matrix([[5n]] as const, { scalar: f11 });

  it('should reject operands over different scalars of one element type', () => {
    expect(() => add(a, b)).toThrow('Cannot add matrices over different scalars F_7 and F_11');
    expect(() => add(b, a)).toThrow('Cannot add matrices over different scalars F_11 and F_7');
    expect(() => sub(a, b)).toThrow(ScalarError);
    expect(() => mult(a, b)).toThrow('Cannot multiply matrices over different scalars F_7 and F_11');
  });

  it('should accept operands that share a descriptor', () => {
    expect(add(a, matrix([[4n]] as const, { scalar: f7 })).toArray()).toEqual([[2n]]);
  });
});
