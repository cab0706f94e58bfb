/**
 * Evaluation order tests
 *
 * Element types whose arithmetic is not commutative or associative make the
 * operand order of every kernel observable. These tests pin it down with a
 * scalar that records its arithmetic as text and with 2×2 integer matrices
 * as elements.
 */

import { describe, it, expect } from 'vitest';
import type { Scalar } from '../scalar/types';
import { matrix } from './creation';
import { dotProduct, matVec, mult, scalarMult, trace } from './operations';
import * as kernels from './kernels';

/**
 * Renders each sum and product as an expression
 */
const recording: Scalar<string> = {
  name: 'expr',
  zero: () => '0',
  add: (a, b) => `(${a}+${b})`,
  sub: (a, b) => `(${a}-${b})`,
  mul: (a, b) => `${a}${b}`,
  equals: (a, b) => a === b,
  format: (value) => value,
};

/**
 * 2×2 integer matrices, row-major
 */
type Mat2 = readonly [number, number, number, number];

const mat2: Scalar<Mat2> = {
  name: 'mat2',
  zero: () => [0, 0, 0, 0],
  add: (a, b) => [a[0] + b[0], a[1] + b[1], a[2] + b[2], a[3] + b[3]],
  sub: (a, b) => [a[0] - b[0], a[1] - b[1], a[2] - b[2], a[3] - b[3]],
  mul: (a, b) => [
    a[0] * b[0] + a[1] * b[2],
    a[0] * b[1] + a[1] * b[3],
    a[2] * b[0] + a[3] * b[2],
    a[2] * b[1] + a[3] * b[3],
  ],
  equals: (a, b) => a.every((x, i) => x === b[i]),
  format: (value) => `[${value.join(' ')}]`,
};

// e·k = k but k·e = 0
const e: Mat2 = [1, 0, 0, 0];
const k: Mat2 = [0, 1, 0, 0];

describe('accumulation order', () => {
  const exprOptions = { scalar: recording };

  it('should accumulate products from zero in ascending inner index', () => {
    const a = matrix([['a', 'b', 'c']] as const, exprOptions);
    const b = matrix([['x'], ['y'], ['z']] as const, exprOptions);
    expect(mult(a, b).toArray()).toEqual([['(((0+ax)+by)+cz)']]);
  });

  it('should keep the left operand on the left of each product', () => {
    const a = matrix(
      [
        ['a', 'b'],
        ['c', 'd'],
      ] as const,
      exprOptions,
    );
    const b = matrix(
      [
        ['w', 'x'],
        ['y', 'z'],
      ] as const,
      exprOptions,
    );
    expect(mult(a, b).toArray()).toEqual([
      ['((0+aw)+by)', '((0+ax)+bz)'],
      ['((0+cw)+dy)', '((0+cx)+dz)'],
    ]);
  });

  it('should sum the diagonal left to right', () => {
    const a = matrix(
      [
        ['a', 'b'],
        ['c', 'd'],
      ] as const,
      exprOptions,
    );
    expect(trace(a)).toBe('((0+a)+d)');
  });

  it('should fold the dot product left to right', () => {
    expect(dotProduct(['a', 'b'] as const, ['x', 'y'] as const, recording)).toBe('((0+ax)+by)');
  });

  it('should use the matrix product order for matrix-vector products', () => {
    const a = matrix([['a', 'b']] as const, exprOptions);
    expect(matVec(a, ['x', 'y'] as const)).toEqual(['((0+ax)+by)']);
  });
});

describe('non-commutative elements', () => {
  const options = { scalar: mat2 };

  it('should multiply by the scalar on the left', () => {
    const a = matrix([[e, k]] as const, options);
    expect(scalarMult(a, k).toArray()).toEqual([
      [
        [0, 0, 0, 0],
        [0, 0, 0, 0],
      ],
    ]);
    expect(scalarMult(a, e).toArray()).toEqual([
      [
        [1, 0, 0, 0],
        [0, 1, 0, 0],
      ],
    ]);
  });

  it('should not commute single-cell products', () => {
    const left = matrix([[e]] as const, options);
    const right = matrix([[k]] as const, options);
    expect(mult(left, right).toArray()).toEqual([[[0, 1, 0, 0]]]);
    expect(mult(right, left).toArray()).toEqual([[[0, 0, 0, 0]]]);
  });
});

describe('kernels', () => {
  it('should allocate new rows for elementwise results', () => {
    const cells = [
      [1, 2],
      [3, 4],
    ];
    const out = kernels.elementwise(cells, cells, 2, 2, (x, y) => x * y);
    expect(out).toEqual([
      [1, 4],
      [9, 16],
    ]);
    expect(out[0]).not.toBe(cells[0]);
    expect(cells).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it('should leave an empty product of zeros when the inner dimension is 0', () => {
    expect(kernels.matmul([[], []], [], 2, 0, 1, recording)).toEqual([['0'], ['0']]);
  });

  it('should transpose rectangular grids', () => {
    expect(kernels.transpose([[1, 2, 3]], 1, 3)).toEqual([[1], [2], [3]]);
  });
});
