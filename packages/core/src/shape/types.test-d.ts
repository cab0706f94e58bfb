/**
 * Type tests for the shape system
 */

import { expectTypeOf } from 'expect-type';
import type {
  Tuple,
  Grid,
  Vector,
  DimEquals,
  IsSquare,
  RowCount,
  RowWidth,
  IsRectangular,
  ShapeToString,
  SameShapeOperand,
  MatMulOperand,
  SameLengthOperand,
  SquareOperand,
  DimOperand,
  ShapeOperand,
  RowsOperand,
  JaggedRowsError,
} from './types';

// =============================================================================
// Fixed-Length Containers
// =============================================================================
{
  expectTypeOf<Tuple<number, 3>>().toEqualTypeOf<readonly [number, number, number]>();
  expectTypeOf<Tuple<string, 0>>().toEqualTypeOf<readonly []>();
  expectTypeOf<Tuple<number, number>>().toEqualTypeOf<readonly number[]>();
  expectTypeOf<Tuple<number, -1>>().toEqualTypeOf<never>();
  expectTypeOf<Tuple<number, 1.5>>().toEqualTypeOf<never>();

  expectTypeOf<Grid<2, 3, bigint>>().toEqualTypeOf<
    readonly [readonly [bigint, bigint, bigint], readonly [bigint, bigint, bigint]]
  >();
  expectTypeOf<Grid<0, 3, number>>().toEqualTypeOf<readonly []>();
  expectTypeOf<Grid<number, 2, number>>().toEqualTypeOf<readonly (readonly [number, number])[]>();

  expectTypeOf<Vector<2, number>>().toEqualTypeOf<readonly [number, number]>();

  // A grid of the wrong shape cannot be written down
  expectTypeOf<readonly [readonly [1, 2], readonly [3]]>().not.toExtend<Grid<2, 2, number>>();
}

// =============================================================================
// Dimension Comparison
// =============================================================================
{
  expectTypeOf<DimEquals<3, 3>>().toEqualTypeOf<true>();
  expectTypeOf<DimEquals<3, 4>>().toEqualTypeOf<false>();
  expectTypeOf<DimEquals<number, 4>>().toEqualTypeOf<true>();
  expectTypeOf<DimEquals<4, number>>().toEqualTypeOf<true>();

  expectTypeOf<IsSquare<2, 2>>().toEqualTypeOf<true>();
  expectTypeOf<IsSquare<2, 3>>().toEqualTypeOf<false>();

  expectTypeOf<ShapeToString<2, 3>>().toEqualTypeOf<'2×3'>();
}

// =============================================================================
// Nested Array Literals
// =============================================================================
{
  type Rows = readonly [readonly [1, 2, 3], readonly [4, 5, 6]];
  expectTypeOf<RowCount<Rows>>().toEqualTypeOf<2>();
  expectTypeOf<RowWidth<Rows>>().toEqualTypeOf<3>();
  expectTypeOf<IsRectangular<Rows>>().toEqualTypeOf<true>();

  type Jagged = readonly [readonly [1, 2], readonly [3]];
  expectTypeOf<IsRectangular<Jagged>>().toEqualTypeOf<false>();
  expectTypeOf<RowsOperand<Jagged>>().toEqualTypeOf<JaggedRowsError>();

  expectTypeOf<RowWidth<readonly []>>().toEqualTypeOf<0>();
  expectTypeOf<RowCount<number[][]>>().toEqualTypeOf<number>();
  expectTypeOf<RowWidth<number[][]>>().toEqualTypeOf<number>();
  expectTypeOf<IsRectangular<number[][]>>().toEqualTypeOf<true>();
}

// =============================================================================
// Operand Contracts
// =============================================================================
{
  expectTypeOf<SameShapeOperand<'add', 2, 3, 2, 3, 'ok'>>().toEqualTypeOf<'ok'>();
  expectTypeOf<SameShapeOperand<'add', 2, 3, 3, 2, 'ok'>>().toEqualTypeOf<'[Matrix ❌] Cannot add matrices of shapes 2×3 and 3×2. Both operands must have the same shape'>();

  expectTypeOf<MatMulOperand<2, 3, 3, 4, 'ok'>>().toEqualTypeOf<'ok'>();
  expectTypeOf<MatMulOperand<2, 3, 4, 2, 'ok'>>().toEqualTypeOf<'[Matrix ❌] Cannot multiply 2×3 by 4×2. The column count of the left operand (3) must equal the row count of the right operand (4)'>();

  expectTypeOf<SameLengthOperand<'take the dot product', 3, 3, 'ok'>>().toEqualTypeOf<'ok'>();
  expectTypeOf<SameLengthOperand<'take the dot product', 3, 2, 'ok'>>().toEqualTypeOf<'[Matrix ❌] Cannot take the dot product: expected a vector of length 3 but got length 2'>();

  expectTypeOf<SquareOperand<'trace', 3, 3, 'ok'>>().toEqualTypeOf<'ok'>();
  expectTypeOf<SquareOperand<'trace', 2, 3, 'ok'>>().toEqualTypeOf<'[Matrix ❌] Cannot take the trace of a 2×3 matrix. The matrix must be square'>();

  expectTypeOf<DimOperand<4>>().toEqualTypeOf<4>();
  expectTypeOf<DimOperand<-4>>().toEqualTypeOf<'[Matrix ❌] Invalid dimension -4. Dimensions must be non-negative integers'>();

  expectTypeOf<ShapeOperand<2, 3>>().toEqualTypeOf<readonly [2, 3]>();
  expectTypeOf<ShapeOperand<2, 0.5>>().toEqualTypeOf<'[Matrix ❌] Invalid dimension 0.5. Dimensions must be non-negative integers'>();
}
