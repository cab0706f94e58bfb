/**
 * Fixed-shape matrix container
 *
 * A Matrix<M, N, T> holds exactly M rows of N cells of element type T, with
 * M and N carried as numeric literal types. Operations whose dimension
 * contract fails do not type-check: the offending parameter's type resolves
 * to a `[Matrix ❌]` message instead of a matrix type.
 */

import type { CellCount, IndexOf } from '../arithmetic';
import { ScalarError } from '../scalar/field';
import type { Scalar } from '../scalar/types';
import type {
  Cells,
  Grid,
  MatMulOperand,
  SameLengthOperand,
  SameShapeOperand,
  Tuple,
  Vector,
} from '../shape/types';
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
} from '../shape/runtime';
import * as kernels from './kernels';

/**
 * Type-safe grid creation: brands runtime cells with their compile-time shape
 */
function createGrid<M extends number, N extends number, T>(cells: Cells<T>): Grid<M, N, T> {
  return cells as Grid<M, N, T>;
}

/**
 * Type-safe tuple creation for rows, columns and vectors
 */
export function createTuple<L extends number, T>(values: readonly T[]): Tuple<T, L> {
  return values as Tuple<T, L>;
}

/**
 * Type-safe size computation
 */
function createSize<M extends number, N extends number>(rows: M, cols: N): CellCount<M, N> {
  return (rows * cols) as CellCount<M, N>;
}

/**
 * Unwrap a matrix operand that has passed its compile-time contract.
 * Only reachable with a non-matrix value when the caller bypassed the types.
 */
export function expectMatrix<P extends number, Q extends number, T>(
  value: Matrix<P, Q, T> | string,
  operation: string,
): Matrix<P, Q, T> {
  if (value instanceof Matrix) {
    return value;
  }
  throw new DimensionError(`Expected a matrix operand for ${operation}`, operation);
}

/**
 * Unwrap a vector operand that has passed its compile-time contract
 */
export function expectVector<V extends readonly unknown[]>(value: V | string, operation: string): V {
  if (typeof value === 'string') {
    throw new DimensionError(`Expected a vector operand for ${operation}`, operation);
  }
  return value;
}

/**
 * Dense M×N matrix over a scalar element type
 *
 * Instances are immutable: cells are frozen and every operation returns a
 * new matrix that shares no arrays with its operands.
 *
 * @template M - Row count
 * @template N - Column count
 * @template T - Element type
 */
export class Matrix<M extends number, N extends number, T> {
  readonly rows: M;
  readonly cols: N;
  readonly scalar: Scalar<T>;

  /**
   * Row-major cells, `data[i][j]` is row i, column j
   */
  readonly data: Grid<M, N, T>;

  private readonly cells: Cells<T>;

  /**
   * Wrap freshly allocated cells. Takes ownership of `cells` and freezes them;
   * use `zeros`, `matrix`, `identity` or `fromFunction` to create matrices.
   *
   * @throws {DimensionError} If the cells are not exactly rows×cols
   * @internal
   */
  constructor(rows: M, cols: N, cells: T[][], scalar: Scalar<T>) {
    assertDimension(rows, 'Row count');
    assertDimension(cols, 'Column count');
    assertCellShape(cells, { rows, cols });
    for (const row of cells) {
      Object.freeze(row);
    }
    Object.freeze(cells);
    this.rows = rows;
    this.cols = cols;
    this.scalar = scalar;
    this.cells = cells;
    this.data = createGrid<M, N, T>(cells);
  }

  // ===========================================================================
  // Properties
  // ===========================================================================

  get shape(): readonly [M, N] {
    return [this.rows, this.cols];
  }

  /**
   * Total number of cells
   */
  get size(): CellCount<M, N> {
    return createSize(this.rows, this.cols);
  }

  get(i: IndexOf<M>, j: IndexOf<N>): T {
    assertIndex(i, this.rows, 'Row');
    assertIndex(j, this.cols, 'Column');
    return this.cells[i][j];
  }

  row(i: IndexOf<M>): Vector<N, T> {
    assertIndex(i, this.rows, 'Row');
    return createTuple<N, T>(this.cells[i]);
  }

  column(j: IndexOf<N>): Vector<M, T> {
    assertIndex(j, this.cols, 'Column');
    return createTuple<M, T>(Object.freeze(this.cells.map((row) => row[j])));
  }

  /**
   * Copy the cells into plain mutable arrays
   */
  toArray(): T[][] {
    return this.cells.map((row) => [...row]);
  }

  /**
   * Structural equality using the scalar's `equals`.
   * Matrices of different shapes are never equal.
   */
  equals<P extends number, Q extends number>(other: Matrix<P, Q, T>): boolean {
    if (!sameShape(this, other)) {
      return false;
    }
    return this.cells.every((row, i) =>
      row.every((value, j) => this.scalar.equals(value, other.cells[i][j])),
    );
  }

  /**
   * Render the matrix with right-aligned columns
   *
   * @example
   * matrix([[1, 2], [10, 12]] as const, { scalar: numberScalar }).format();
   * // [[ 1,  2],
   * //  [10, 12]]
   */
  format(): string {
    if (this.cells.length === 0) {
      return '[]';
    }
    const text = this.cells.map((row) => row.map((value) => this.scalar.format(value)));
    const widths = kernels
      .transpose(text, this.rows, this.cols)
      .map((column) => Math.max(...column.map((s) => s.length)));
    const lines = text.map(
      (row) => `[${row.map((s, j) => s.padStart(widths[j])).join(', ')}]`,
    );
    return `[${lines.join(',\n ')}]`;
  }

  toString(): string {
    return `Matrix<${formatShape(this)}, ${this.scalar.name}>\n${this.format()}`;
  }

  // ===========================================================================
  // Operations
  // ===========================================================================

  /**
   * Elementwise sum of two matrices of the same shape
   *
   * @example
   * const a = matrix([[1, 2], [3, 4]] as const, { scalar: numberScalar });
   * const b = matrix([[5, 6], [7, 8]] as const, { scalar: numberScalar });
   * a.add(b).toArray(); // [[6, 8], [10, 12]]
   */
  add<P extends number, Q extends number>(
    other: SameShapeOperand<'add', M, N, P, Q, Matrix<P, Q, T>>,
  ): Matrix<M, N, T> {
    return this._add(expectMatrix<P, Q, T>(other, 'add'));
  }

  /**
   * Elementwise difference `this - other`
   */
  sub<P extends number, Q extends number>(
    other: SameShapeOperand<'subtract', M, N, P, Q, Matrix<P, Q, T>>,
  ): Matrix<M, N, T> {
    return this._sub(expectMatrix<P, Q, T>(other, 'subtract'));
  }

  /**
   * Multiply every cell by `k`, computed as `k * cell`
   */
  scale(k: T): Matrix<M, N, T> {
    return new Matrix(
      this.rows,
      this.cols,
      kernels.scale(this.cells, this.rows, this.cols, k, this.scalar),
      this.scalar,
    );
  }

  /**
   * Matrix product of an M×N and an N×K matrix
   *
   * @example
   * const a = zeros([2, 3] as const, { scalar: numberScalar });
   * const b = zeros([3, 4] as const, { scalar: numberScalar });
   * a.mult(b); // Matrix<2, 4, number>
   * b.mult(a); // type error: column count 4 does not match row count 2
   */
  mult<P extends number, K extends number>(
    other: MatMulOperand<M, N, P, K, Matrix<P, K, T>>,
  ): Matrix<M, K, T> {
    return this._mult(expectMatrix<P, K, T>(other, 'multiply'));
  }

  /**
   * Product with a length-N vector, giving a length-M vector
   */
  mulVector<V extends readonly T[]>(
    vector: SameLengthOperand<'multiply by a vector', N, V['length'], V>,
  ): Vector<M, T> {
    return this._mulVector(expectVector<V>(vector, 'multiply by a vector'));
  }

  transpose(): Matrix<N, M, T> {
    return new Matrix(
      this.cols,
      this.rows,
      kernels.transpose(this.cells, this.rows, this.cols),
      this.scalar,
    );
  }

  /**
   * Shorthand for transpose()
   */
  get T(): Matrix<N, M, T> {
    return this.transpose();
  }

  /**
   * Sum of the main diagonal; only callable on square matrices
   */
  trace(this: Matrix<M, M, T>): T {
    return this._trace();
  }

  // ===========================================================================
  // Shape-checked implementations
  // ===========================================================================
  //
  // These take operands whose contract has already been checked by the
  // public signatures and re-check it at runtime for dynamic shapes.

  /** @internal */
  _add<P extends number, Q extends number>(other: Matrix<P, Q, T>): Matrix<M, N, T> {
    assertSameShape(this, other, 'add');
    assertSameScalar(this.scalar, other.scalar, 'add');
    return this.zip(other, (x, y) => this.scalar.add(x, y));
  }

  /** @internal */
  _sub<P extends number, Q extends number>(other: Matrix<P, Q, T>): Matrix<M, N, T> {
    assertSameShape(this, other, 'subtract');
    assertSameScalar(this.scalar, other.scalar, 'subtract');
    return this.zip(other, (x, y) => this.scalar.sub(x, y));
  }

  /** @internal */
  _mult<P extends number, K extends number>(other: Matrix<P, K, T>): Matrix<M, K, T> {
    assertMatmulCompatible(this, other);
    assertSameScalar(this.scalar, other.scalar, 'multiply');
    return new Matrix(
      this.rows,
      other.cols,
      kernels.matmul(this.cells, other.cells, this.rows, this.cols, other.cols, this.scalar),
      this.scalar,
    );
  }

  /** @internal */
  _mulVector(vector: readonly T[]): Vector<M, T> {
    assertLength(vector, this.cols, 'multiply by a vector');
    return createTuple<M, T>(
      Object.freeze(kernels.matvec(this.cells, vector, this.rows, this.scalar)),
    );
  }

  /** @internal */
  _trace(): T {
    assertSquare(this, 'trace');
    return kernels.diagonalSum(this.cells, this.rows, this.scalar);
  }

  private zip<P extends number, Q extends number>(
    other: Matrix<P, Q, T>,
    op: (x: T, y: T) => T,
  ): Matrix<M, N, T> {
    return new Matrix(
      this.rows,
      this.cols,
      kernels.elementwise(this.cells, other.cells, this.rows, this.cols, op),
      this.scalar,
    );
  }
}

/**
 * Operands must share one scalar descriptor: two fields over the same
 * element type (F_7 and F_11 on bigint) do not mix.
 */
function assertSameScalar<T>(a: Scalar<T>, b: Scalar<T>, operation: string): void {
  if (a !== b) {
    throw new ScalarError(
      `Cannot ${operation} matrices over different scalars ${a.name} and ${b.name}`,
      a.name,
      b.name,
    );
  }
}

function sameShape(
  a: { readonly rows: number; readonly cols: number },
  b: { readonly rows: number; readonly cols: number },
): boolean {
  return a.rows === b.rows && a.cols === b.cols;
}
