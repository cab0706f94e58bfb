/**
 * Matrix creation functions
 *
 * Shapes are taken from `as const` literals so that dimensions stay literal
 * types, and checked again at runtime for values typed with wide `number`
 * dimensions.
 */

import type { Scalar, ScalarOptions, UnitalScalar } from '../scalar/types';
import type {
  Cells,
  DimOperand,
  RowCount,
  RowWidth,
  RowsOperand,
  ShapeOperand,
  Vector,
} from '../shape/types';
import { DimensionError, assertDimension, assertIndex, inferShape } from '../shape/runtime';
import type { IndexOf } from '../arithmetic';
import { generate } from './kernels';
import { Matrix, createTuple } from './matrix';

/**
 * Type-safe dimension creation for values validated at runtime
 */
function createDim<D extends number>(value: number): D {
  return value as D;
}

function expectShape<M extends number, N extends number>(
  shape: readonly [M, N] | string,
): readonly [M, N] {
  if (typeof shape === 'string') {
    throw new DimensionError(shape, 'create');
  }
  assertDimension(shape[0], 'Row count');
  assertDimension(shape[1], 'Column count');
  return shape;
}

function expectRows<R extends Cells<unknown>>(rows: R | string): R {
  if (typeof rows === 'string') {
    throw new DimensionError(rows, 'create');
  }
  return rows;
}

function expectDim<D extends number>(value: D | string, label: string): D {
  if (typeof value === 'string') {
    throw new DimensionError(value, 'create');
  }
  assertDimension(value, label);
  return value;
}

/**
 * Create an M×N matrix with every cell set to the scalar's zero
 *
 * @example
 * const z = zeros([2, 3] as const, { scalar: numberScalar });
 * // Matrix<2, 3, number>, [[0, 0, 0], [0, 0, 0]]
 */
export function zeros<M extends number, N extends number, T>(
  shape: ShapeOperand<M, N>,
  options: ScalarOptions<Scalar<T>>,
): Matrix<M, N, T> {
  const [rows, cols] = expectShape<M, N>(shape);
  const { scalar } = options;
  return new Matrix(
    rows,
    cols,
    generate(rows, cols, () => scalar.zero()),
    scalar,
  );
}

/**
 * Create a matrix from nested rows; the shape is inferred from the literal
 *
 * @example
 * const m = matrix([[1, 2, 3], [4, 5, 6]] as const, { scalar: numberScalar });
 * // Matrix<2, 3, number>
 *
 * matrix([[1, 2], [3]] as const, { scalar: numberScalar }); // type error: jagged rows
 *
 * @throws {DimensionError} If dynamically typed rows have different lengths
 */
export function matrix<R extends Cells<T>, T>(
  rows: RowsOperand<R>,
  options: ScalarOptions<Scalar<T>>,
): Matrix<RowCount<R>, RowWidth<R>, T> {
  const cells = expectRows<R>(rows);
  const shape = inferShape(cells);
  return new Matrix(
    createDim<RowCount<R>>(shape.rows),
    createDim<RowWidth<R>>(shape.cols),
    cells.map((row) => [...row]),
    options.scalar,
  );
}

/**
 * Create the N×N identity matrix
 *
 * @example
 * identity(3, { scalar: bn254 }); // Matrix<3, 3, bigint>
 */
export function identity<N extends number, T>(
  size: DimOperand<N>,
  options: ScalarOptions<UnitalScalar<T>>,
): Matrix<N, N, T> {
  const n = expectDim<N>(size, 'Size');
  const { scalar } = options;
  return new Matrix(
    n,
    n,
    generate(n, n, (i, j) => (i === j ? scalar.one() : scalar.zero())),
    scalar,
  );
}

/**
 * Create an M×N matrix whose cell (i, j) is `cell(i, j)`
 *
 * @example
 * fromFunction([2, 2] as const, (i, j) => i * 2 + j, { scalar: numberScalar });
 * // [[0, 1], [2, 3]]
 */
export function fromFunction<M extends number, N extends number, T>(
  shape: ShapeOperand<M, N>,
  cell: (i: number, j: number) => T,
  options: ScalarOptions<Scalar<T>>,
): Matrix<M, N, T> {
  const [rows, cols] = expectShape<M, N>(shape);
  return new Matrix(rows, cols, generate(rows, cols, cell), options.scalar);
}

/**
 * Standard basis vector e_i of length N: one at index i, zero elsewhere
 *
 * @example
 * basisVector(3, 1, { scalar: numberScalar }); // [0, 1, 0]
 */
export function basisVector<N extends number, T>(
  length: DimOperand<N>,
  index: IndexOf<NoInfer<N>>,
  options: ScalarOptions<UnitalScalar<T>>,
): Vector<N, T> {
  const n = expectDim<N>(length, 'Length');
  assertIndex(index, n, 'Basis');
  const { scalar } = options;
  return createTuple<N, T>(
    Object.freeze(Array.from({ length: n }, (_, i) => (i === index ? scalar.one() : scalar.zero()))),
  );
}
