/**
 * Runtime shape guards
 *
 * Shapes are checked by the compiler whenever dimensions are literal types.
 * These guards cover the remaining cases (dimensions typed as `number`,
 * values built from dynamic data, out-of-range indices) and fail fast with a
 * DimensionError at the boundary.
 */

import type { Cells } from './types';

/**
 * Anything that carries a matrix shape
 */
export interface ShapeLike {
  readonly rows: number;
  readonly cols: number;
}

/**
 * Format a shape for error messages
 *
 * @example
 * formatShape({ rows: 2, cols: 3 }); // '2×3'
 */
export function formatShape(shape: ShapeLike): string {
  return `${shape.rows.toString()}×${shape.cols.toString()}`;
}

/**
 * Check if a value can be used as a matrix dimension
 */
export function isValidDimension(value: unknown): value is number {
  return typeof value === 'number' && Number.isSafeInteger(value) && value >= 0;
}

export function assertDimension(value: number, label = 'Dimension'): void {
  if (!isValidDimension(value)) {
    throw new DimensionError(
      `${label} must be a non-negative integer, got ${String(value)}`,
      'create',
    );
  }
}

export function assertSameShape(a: ShapeLike, b: ShapeLike, operation: string): void {
  if (a.rows !== b.rows || a.cols !== b.cols) {
    throw new DimensionError(
      `Cannot ${operation} matrices of shapes ${formatShape(a)} and ${formatShape(b)}`,
      operation,
      [a, b],
    );
  }
}

export function assertMatmulCompatible(a: ShapeLike, b: ShapeLike): void {
  if (a.cols !== b.rows) {
    throw new DimensionError(
      `Cannot multiply ${formatShape(a)} by ${formatShape(b)}: ` +
        `inner dimensions ${a.cols.toString()} and ${b.rows.toString()} differ`,
      'mult',
      [a, b],
    );
  }
}

export function assertSquare(a: ShapeLike, operation: string): void {
  if (a.rows !== a.cols) {
    throw new DimensionError(
      `Cannot take the ${operation} of non-square matrix ${formatShape(a)}`,
      operation,
      [a],
    );
  }
}

export function assertLength(
  vector: readonly unknown[],
  expected: number,
  operation: string,
): void {
  if (vector.length !== expected) {
    throw new DimensionError(
      `Cannot ${operation}: expected a vector of length ${expected.toString()} ` +
        `but got length ${vector.length.toString()}`,
      operation,
    );
  }
}

export function assertIndex(index: number, bound: number, label: string): void {
  if (!Number.isInteger(index) || index < 0 || index >= bound) {
    throw new DimensionError(
      `${label} index ${String(index)} is out of range [0, ${bound.toString()})`,
      'index',
    );
  }
}

/**
 * Validate nested rows and return their shape
 *
 * @throws {DimensionError} If the rows have different lengths
 */
export function inferShape(rows: Cells<unknown>): ShapeLike {
  const first = rows[0];
  const cols = first === undefined ? 0 : first.length;
  rows.forEach((row, i) => {
    if (row.length !== cols) {
      throw new DimensionError(
        `Row ${i.toString()} has ${row.length.toString()} elements, expected ${cols.toString()}`,
        'create',
      );
    }
  });
  return { rows: rows.length, cols };
}

/**
 * Check that nested cells have exactly the declared shape
 *
 * @throws {DimensionError} If the row count or any row length differs
 */
export function assertCellShape(cells: Cells<unknown>, shape: ShapeLike): void {
  if (cells.length !== shape.rows) {
    throw new DimensionError(
      `Expected ${shape.rows.toString()} rows for a ${formatShape(shape)} matrix, got ${cells.length.toString()}`,
      'create',
      [shape],
    );
  }
  cells.forEach((row, i) => {
    if (row.length !== shape.cols) {
      throw new DimensionError(
        `Row ${i.toString()} has ${row.length.toString()} elements, expected ${shape.cols.toString()}`,
        'create',
        [shape],
      );
    }
  });
}

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when a shape contract is violated at runtime
 */
export class DimensionError extends Error {
  constructor(
    message: string,
    public readonly operation: string,
    public readonly shapes: readonly ShapeLike[] = [],
  ) {
    super(message);
    this.name = 'DimensionError';
  }
}
