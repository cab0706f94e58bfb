/**
 * Type-level shape operations for compile-time matrix dimension checking
 *
 * Dimensions are numeric literal types. A matrix's cells are typed as a
 * tuple of exactly M rows, each a tuple of exactly N cells, so a grid of the
 * wrong shape cannot be written down. When a dimension is the wide `number`
 * type the shape is only known at runtime and the tuples degrade to readonly
 * arrays.
 */

import type { IsDimension } from '../arithmetic';

// =============================================================================
// Fixed-Length Containers
// =============================================================================

/**
 * A readonly tuple of exactly L elements
 *
 * @example
 * type Row = Tuple<number, 3>; // readonly [number, number, number]
 * type Dynamic = Tuple<number, number>; // readonly number[]
 */
export type Tuple<T, L extends number> = number extends L
  ? readonly T[]
  : IsDimension<L> extends true
    ? TupleOf<T, L, readonly []>
    : never;

type TupleOf<T, L extends number, Acc extends readonly T[]> = Acc['length'] extends L
  ? Acc
  : TupleOf<T, L, readonly [...Acc, T]>;

/**
 * Row-major cells of an M×N matrix
 *
 * @example
 * type G = Grid<2, 3, number>;
 * // readonly [readonly [number, number, number], readonly [number, number, number]]
 */
export type Grid<M extends number, N extends number, T> = Tuple<Tuple<T, N>, M>;

/**
 * A vector is an unshaped fixed-length sequence
 */
export type Vector<N extends number, T> = Tuple<T, N>;

/**
 * Cells as plain nested arrays, used wherever the shape is checked at runtime
 */
export type Cells<T> = readonly (readonly T[])[];

// =============================================================================
// Dimension Comparison
// =============================================================================

/**
 * Check whether two dimensions agree.
 * A wide `number` dimension agrees with anything; the runtime guard
 * decides instead.
 *
 * @example
 * type A = DimEquals<3, 3>; // true
 * type B = DimEquals<3, 4>; // false
 * type C = DimEquals<number, 4>; // true
 */
export type DimEquals<A extends number, B extends number> = number extends A
  ? true
  : number extends B
    ? true
    : [A] extends [B]
      ? [B] extends [A]
        ? true
        : false
      : false;

/**
 * Check whether an M×N shape is square
 */
export type IsSquare<M extends number, N extends number> = DimEquals<M, N>;

/**
 * Row count of a nested array literal
 */
export type RowCount<R extends Cells<unknown>> = R['length'];

/**
 * Column count of a nested array literal (0 when there are no rows)
 */
export type RowWidth<R extends Cells<unknown>> = R extends readonly []
  ? 0
  : R extends readonly [infer First extends readonly unknown[], ...unknown[]]
    ? First['length']
    : number;

/**
 * Check that every row of a nested array literal has the same length
 *
 * @example
 * type Ok = IsRectangular<readonly [readonly [1, 2], readonly [3, 4]]>; // true
 * type Jagged = IsRectangular<readonly [readonly [1, 2], readonly [3]]>; // false
 */
export type IsRectangular<R extends Cells<unknown>> = number extends R['length']
  ? true
  : R extends readonly [infer First extends readonly unknown[], ...infer Rest extends Cells<unknown>]
    ? AllOfLength<Rest, First['length']>
    : true;

type AllOfLength<R extends Cells<unknown>, L extends number> = R extends readonly [
  infer Head extends readonly unknown[],
  ...infer Rest extends Cells<unknown>,
]
  ? DimEquals<Head['length'], L> extends true
    ? AllOfLength<Rest, L>
    : false
  : true;

// =============================================================================
// Error Messages
// =============================================================================

/**
 * Convert a shape to a readable string for error messages
 */
export type ShapeToString<M extends number, N extends number> = `${M}×${N}`;

export type ShapeMismatchError<
  Op extends string,
  M extends number,
  N extends number,
  P extends number,
  Q extends number,
> = `[Matrix ❌] Cannot ${Op} matrices of shapes ${ShapeToString<M, N>} and ${ShapeToString<P, Q>}. Both operands must have the same shape`;

export type MatMulMismatchError<
  M extends number,
  N extends number,
  P extends number,
  K extends number,
> = `[Matrix ❌] Cannot multiply ${ShapeToString<M, N>} by ${ShapeToString<P, K>}. The column count of the left operand (${N}) must equal the row count of the right operand (${P})`;

export type LengthMismatchError<
  Op extends string,
  Expected extends number,
  Actual extends number,
> = `[Matrix ❌] Cannot ${Op}: expected a vector of length ${Expected} but got length ${Actual}`;

export type NonSquareError<
  Op extends string,
  M extends number,
  N extends number,
> = `[Matrix ❌] Cannot take the ${Op} of a ${ShapeToString<M, N>} matrix. The matrix must be square`;

export type InvalidDimensionError<D extends number> =
  `[Matrix ❌] Invalid dimension ${D}. Dimensions must be non-negative integers`;

export type JaggedRowsError = '[Matrix ❌] Every row must have the same number of elements';

// =============================================================================
// Operand Contracts
// =============================================================================
//
// Each contract resolves to the operand type when the dimensions agree and to
// an error message otherwise, so a mismatched argument fails to type-check
// with the message in the diagnostic.

/**
 * Operand of an elementwise operation: same M×N as the receiver
 */
export type SameShapeOperand<
  Op extends string,
  M extends number,
  N extends number,
  P extends number,
  Q extends number,
  Operand,
> =
  DimEquals<M, P> extends true
    ? DimEquals<N, Q> extends true
      ? Operand
      : ShapeMismatchError<Op, M, N, P, Q>
    : ShapeMismatchError<Op, M, N, P, Q>;

/**
 * Right operand of a matrix product: its rows must match the left columns
 */
export type MatMulOperand<
  M extends number,
  N extends number,
  P extends number,
  K extends number,
  Operand,
> = DimEquals<N, P> extends true ? Operand : MatMulMismatchError<M, N, P, K>;

/**
 * Vector operand whose length must equal a known dimension
 */
export type SameLengthOperand<
  Op extends string,
  Expected extends number,
  Actual extends number,
  Operand,
> = DimEquals<Expected, Actual> extends true ? Operand : LengthMismatchError<Op, Expected, Actual>;

/**
 * Square matrix operand
 */
export type SquareOperand<Op extends string, M extends number, N extends number, Operand> =
  IsSquare<M, N> extends true ? Operand : NonSquareError<Op, M, N>;

/**
 * Dimension argument of a constructor
 */
export type DimOperand<D extends number> = IsDimension<D> extends true ? D : InvalidDimensionError<D>;

/**
 * Shape argument of a constructor: both dimensions must be valid
 */
export type ShapeOperand<M extends number, N extends number> =
  IsDimension<M> extends true
    ? IsDimension<N> extends true
      ? readonly [M, N]
      : InvalidDimensionError<N>
    : InvalidDimensionError<M>;

/**
 * Rows argument of a constructor: the literal must be rectangular
 */
export type RowsOperand<R extends Cells<unknown>> =
  IsRectangular<R> extends true ? R : JaggedRowsError;
