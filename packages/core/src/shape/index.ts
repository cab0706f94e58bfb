export type {
  Tuple,
  Grid,
  Vector,
  Cells,
  DimEquals,
  IsSquare,
  RowCount,
  RowWidth,
  IsRectangular,
  ShapeToString,
  ShapeMismatchError,
  MatMulMismatchError,
  LengthMismatchError,
  NonSquareError,
  InvalidDimensionError,
  JaggedRowsError,
  SameShapeOperand,
  MatMulOperand,
  SameLengthOperand,
  SquareOperand,
  DimOperand,
  ShapeOperand,
  RowsOperand,
} from './types';
export {
  formatShape,
  isValidDimension,
  assertDimension,
  assertSameShape,
  assertMatmulCompatible,
  assertSquare,
  assertLength,
  assertIndex,
  inferShape,
  assertCellShape,
  DimensionError,
} from './runtime';
export type { ShapeLike } from './runtime';
