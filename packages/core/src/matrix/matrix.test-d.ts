/**
 * Type-level tests for matrix creation and operations
 *
 * Each `@ts-expect-error` marks a call whose shapes violate an operation's
 * dimension contract and must therefore be rejected by the compiler.
 */

import { expectTypeOf } from 'expect-type';
import { numberScalar } from '../scalar/constants';
import { bn254 } from '../scalar/field';
import type { Grid } from '../shape/types';
import { basisVector, fromFunction, identity, matrix, zeros } from './creation';
import type { Matrix } from './matrix';
import { add, dotProduct, matVec, mult, scalarMult, sub, trace, transpose } from './operations';

const options = { scalar: numberScalar };

const a23 = matrix(
  [
    [1, 2, 3],
    [4, 5, 6],
  ] as const,
  options,
);
const b23 = zeros([2, 3] as const, options);
const c32 = zeros([3, 2] as const, options);
const d34 = zeros([3, 4] as const, options);
const sq3 = identity(3, options);

// =============================================================================
// Creation
// =============================================================================
{
  expectTypeOf(a23).toEqualTypeOf<Matrix<2, 3, number>>();
  expectTypeOf(b23).toEqualTypeOf<Matrix<2, 3, number>>();
  expectTypeOf(sq3).toEqualTypeOf<Matrix<3, 3, number>>();
  expectTypeOf(identity(2, { scalar: bn254 })).toEqualTypeOf<Matrix<2, 2, bigint>>();
  expectTypeOf(fromFunction([4, 1] as const, (i, j) => i + j, options)).toEqualTypeOf<
    Matrix<4, 1, number>
  >();
  expectTypeOf(basisVector(3, 0, options)).toEqualTypeOf<readonly [number, number, number]>();
  expectTypeOf(basisVector(3, 2, options)).toEqualTypeOf<readonly [number, number, number]>();
  expectTypeOf(
    dotProduct(basisVector(3, 0, options), basisVector(3, 1, options), numberScalar),
  ).toEqualTypeOf<number>();

  // @ts-expect-error - index outside the vector
  basisVector(3, 3, options);

  expectTypeOf(a23.data).toEqualTypeOf<Grid<2, 3, number>>();
  expectTypeOf(a23.data[1]).toEqualTypeOf<readonly [number, number, number]>();
  expectTypeOf(a23.shape).toEqualTypeOf<readonly [2, 3]>();
  expectTypeOf(a23.size).toEqualTypeOf<6>();
  expectTypeOf(a23.row(0)).toEqualTypeOf<readonly [number, number, number]>();
  expectTypeOf(a23.column(2)).toEqualTypeOf<readonly [number, number]>();

  // Dynamic rows fall back to runtime-checked dimensions
  const dynamicRows: number[][] = [[1]];
  expectTypeOf(matrix(dynamicRows, options)).toEqualTypeOf<Matrix<number, number, number>>();

  // @ts-expect-error - rows of different lengths
  matrix([[1, 2], [3]] as const, options);

  // @ts-expect-error - negative dimension
  zeros([-1, 2] as const, options);

  // @ts-expect-error - fractional dimension
  identity(2.5, options);

  // @ts-expect-error - identity needs a multiplicative unit
  identity(2, { scalar: { ...numberScalar, one: undefined } });
}

// =============================================================================
// Elementwise operations
// =============================================================================
{
  expectTypeOf(add(a23, b23)).toEqualTypeOf<Matrix<2, 3, number>>();
  expectTypeOf(sub(a23, b23)).toEqualTypeOf<Matrix<2, 3, number>>();
  expectTypeOf(a23.add(b23)).toEqualTypeOf<Matrix<2, 3, number>>();
  expectTypeOf(scalarMult(a23, 2)).toEqualTypeOf<Matrix<2, 3, number>>();

  // @ts-expect-error - 2×3 + 3×2
  add(a23, c32);

  // @ts-expect-error - 2×3 - 3×2
  sub(a23, c32);

  // @ts-expect-error - method form
  a23.add(c32);

  // @ts-expect-error - element types differ
  add(a23, zeros([2, 3] as const, { scalar: bn254 }));

  // @ts-expect-error - scalar of the wrong element type
  scalarMult(a23, 2n);
}

// =============================================================================
// Matrix multiplication
// =============================================================================
{
  expectTypeOf(mult(a23, d34)).toEqualTypeOf<Matrix<2, 4, number>>();
  expectTypeOf(mult(c32, a23)).toEqualTypeOf<Matrix<3, 3, number>>();
  expectTypeOf(a23.mult(c32)).toEqualTypeOf<Matrix<2, 2, number>>();
  expectTypeOf(mult(mult(a23, d34), zeros([4, 7] as const, options))).toEqualTypeOf<
    Matrix<2, 7, number>
  >();

  // @ts-expect-error - inner dimensions 3 and 2 differ
  mult(a23, b23);

  // @ts-expect-error - inner dimensions 4 and 2 differ
  d34.mult(a23);

  expectTypeOf(matVec(a23, [1, 2, 3] as const)).toEqualTypeOf<readonly [number, number]>();

  // @ts-expect-error - vector length 2 for a 2×3 matrix
  matVec(a23, [1, 2] as const);
}

// =============================================================================
// Transpose, trace and dot product
// =============================================================================
{
  expectTypeOf(transpose(a23)).toEqualTypeOf<Matrix<3, 2, number>>();
  expectTypeOf(a23.T).toEqualTypeOf<Matrix<3, 2, number>>();
  expectTypeOf(transpose(transpose(a23))).toEqualTypeOf<Matrix<2, 3, number>>();

  expectTypeOf(trace(sq3)).toEqualTypeOf<number>();
  expectTypeOf(sq3.trace()).toEqualTypeOf<number>();
  expectTypeOf(trace(identity(2, { scalar: bn254 }))).toEqualTypeOf<bigint>();

  // @ts-expect-error - trace of a 2×3 matrix
  trace(a23);

  // @ts-expect-error - method form
  a23.trace();

  expectTypeOf(dotProduct([1, 2, 3] as const, [4, 5, 6] as const, numberScalar)).toEqualTypeOf<number>();
  expectTypeOf(dotProduct(a23.row(0), a23.row(1), numberScalar)).toEqualTypeOf<number>();

  // @ts-expect-error - lengths 3 and 2
  dotProduct([1, 2, 3] as const, [4, 5] as const, numberScalar);

  // @ts-expect-error - a row and a column of a non-square matrix
  dotProduct(a23.row(0), a23.column(0), numberScalar);
}
