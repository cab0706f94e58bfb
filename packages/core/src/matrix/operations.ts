/**
 * Matrix operations as free functions
 *
 * Each function is pure and total for well-typed inputs. Dimension
 * contracts are part of the signatures: `mult` threads the inner dimension
 * from the left operand's columns into the right operand's rows, `trace`
 * only accepts square matrices, and `add`/`sub` require identical shapes.
 */

import type { Scalar } from '../scalar/types';
import type {
  MatMulOperand,
  SameLengthOperand,
  SameShapeOperand,
  SquareOperand,
  Vector,
} from '../shape/types';
import { assertLength } from '../shape/runtime';
import { dot } from './kernels';
import { Matrix, expectMatrix, expectVector } from './matrix';

/**
 * `result[i][j] = a[i][j] + b[i][j]`
 */
export function add<M extends number, N extends number, P extends number, Q extends number, T>(
  a: Matrix<M, N, T>,
  b: SameShapeOperand<'add', M, N, P, Q, Matrix<P, Q, T>>,
): Matrix<M, N, T> {
  return a._add(expectMatrix<P, Q, T>(b, 'add'));
}

/**
 * `result[i][j] = a[i][j] - b[i][j]`
 */
export function sub<M extends number, N extends number, P extends number, Q extends number, T>(
  a: Matrix<M, N, T>,
  b: SameShapeOperand<'subtract', M, N, P, Q, Matrix<P, Q, T>>,
): Matrix<M, N, T> {
  return a._sub(expectMatrix<P, Q, T>(b, 'subtract'));
}

/**
 * `result[i][j] = k * a[i][j]`
 *
 * The scalar is always the left factor, which matters for element types
 * with non-commutative multiplication.
 */
export function scalarMult<M extends number, N extends number, T>(
  a: Matrix<M, N, T>,
  k: T,
): Matrix<M, N, T> {
  return a.scale(k);
}

/**
 * Dense product of an M×N and an N×K matrix.
 *
 * Each output cell is `zero + a[i][0]*b[0][j] + a[i][1]*b[1][j] + ...`,
 * accumulated left to right.
 *
 * @example
 * const a = matrix([[1, 2, 3], [4, 5, 6]] as const, { scalar: numberScalar });
 * const b = matrix([[7, 8], [9, 10], [11, 12]] as const, { scalar: numberScalar });
 * mult(a, b).toArray(); // [[58, 64], [139, 154]]
 */
export function mult<M extends number, N extends number, P extends number, K extends number, T>(
  a: Matrix<M, N, T>,
  b: MatMulOperand<M, N, P, K, Matrix<P, K, T>>,
): Matrix<M, K, T> {
  return a._mult(expectMatrix<P, K, T>(b, 'multiply'));
}

/**
 * Matrix–vector product, `result[i] = Σ a[i][k] * v[k]`
 */
export function matVec<M extends number, N extends number, T, V extends readonly T[]>(
  a: Matrix<M, N, T>,
  v: SameLengthOperand<'multiply by a vector', N, V['length'], V>,
): Vector<M, T> {
  return a._mulVector(expectVector<V>(v, 'multiply by a vector'));
}

/**
 * `result[j][i] = a[i][j]`
 */
export function transpose<M extends number, N extends number, T>(
  a: Matrix<M, N, T>,
): Matrix<N, M, T> {
  return a.transpose();
}

/**
 * Sum of the main diagonal of a square matrix
 *
 * @example
 * trace(matrix([[1, 2, 3], [4, 5, 6], [7, 8, 9]] as const, { scalar: numberScalar })); // 15
 */
export function trace<M extends number, N extends number, T>(
  a: SquareOperand<'trace', M, N, Matrix<M, N, T>>,
): T {
  return expectMatrix<M, N, T>(a, 'trace')._trace();
}

/**
 * Sum of pairwise products of two sequences of equal length
 *
 * @example
 * dotProduct([1, 2, 3] as const, [4, 5, 6] as const, numberScalar); // 32
 */
export function dotProduct<T, U extends readonly T[], V extends readonly T[]>(
  u: U,
  v: SameLengthOperand<'take the dot product', U['length'], V['length'], V>,
  scalar: Scalar<T>,
): T {
  const w = expectVector<V>(v, 'take the dot product');
  assertLength(w, u.length, 'take the dot product');
  return dot(u, w, scalar);
}
