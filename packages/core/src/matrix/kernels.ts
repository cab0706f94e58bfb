/**
 * Dense loops behind the matrix operations
 *
 * Every kernel allocates fresh output rows and never writes to its inputs.
 * Loops run rows outer, columns inner. Accumulations start from the scalar's
 * zero and add terms left to right in ascending index order; for element
 * types whose arithmetic is not associative or commutative this order is
 * part of the result.
 */

import type { Scalar } from '../scalar/types';
import type { Cells } from '../shape/types';

/**
 * Build an M×N grid cell by cell
 */
export function generate<T>(
  rows: number,
  cols: number,
  cell: (i: number, j: number) => T,
): T[][] {
  const out: T[][] = new Array<T[]>(rows);
  for (let i = 0; i < rows; i++) {
    const row = new Array<T>(cols);
    for (let j = 0; j < cols; j++) {
      row[j] = cell(i, j);
    }
    out[i] = row;
  }
  return out;
}

/**
 * `out[i][j] = op(a[i][j], b[i][j])`
 */
export function elementwise<T>(
  a: Cells<T>,
  b: Cells<T>,
  rows: number,
  cols: number,
  op: (x: T, y: T) => T,
): T[][] {
  return generate(rows, cols, (i, j) => op(a[i][j], b[i][j]));
}

/**
 * `out[i][j] = k * a[i][j]`, scalar on the left
 */
export function scale<T>(a: Cells<T>, rows: number, cols: number, k: T, scalar: Scalar<T>): T[][] {
  return generate(rows, cols, (i, j) => scalar.mul(k, a[i][j]));
}

/**
 * Dense triple-loop product of an M×N and an N×K grid
 */
export function matmul<T>(
  a: Cells<T>,
  b: Cells<T>,
  m: number,
  n: number,
  k: number,
  scalar: Scalar<T>,
): T[][] {
  const out: T[][] = new Array<T[]>(m);
  for (let i = 0; i < m; i++) {
    const aRow = a[i];
    const row = new Array<T>(k);
    for (let j = 0; j < k; j++) {
      let sum = scalar.zero();
      for (let p = 0; p < n; p++) {
        sum = scalar.add(sum, scalar.mul(aRow[p], b[p][j]));
      }
      row[j] = sum;
    }
    out[i] = row;
  }
  return out;
}

/**
 * `out[j][i] = a[i][j]`; no arithmetic
 */
export function transpose<T>(a: Cells<T>, rows: number, cols: number): T[][] {
  return generate(cols, rows, (j, i) => a[i][j]);
}

/**
 * Sum of the main diagonal of an N×N grid
 */
export function diagonalSum<T>(a: Cells<T>, n: number, scalar: Scalar<T>): T {
  let sum = scalar.zero();
  for (let i = 0; i < n; i++) {
    sum = scalar.add(sum, a[i][i]);
  }
  return sum;
}

/**
 * Sum of pairwise products of two equal-length sequences
 */
export function dot<T>(u: readonly T[], v: readonly T[], scalar: Scalar<T>): T {
  let sum = scalar.zero();
  for (let i = 0; i < u.length; i++) {
    sum = scalar.add(sum, scalar.mul(u[i], v[i]));
  }
  return sum;
}

/**
 * Product of an M×N grid and a length-N vector
 */
export function matvec<T>(a: Cells<T>, v: readonly T[], m: number, scalar: Scalar<T>): T[] {
  const out = new Array<T>(m);
  for (let i = 0; i < m; i++) {
    out[i] = dot(a[i], v, scalar);
  }
  return out;
}
