/**
 * Operand generation for benchmarks
 */

import { bn254, fromFunction, numberScalar } from '@shapemat/core';
import type { Matrix, PrimeField } from '@shapemat/core';

/**
 * Uniform integers in [-limit, limit]; products of two stay exact
 */
export function randomSmallInt(limit = 1000): number {
  return Math.floor(Math.random() * (2 * limit + 1)) - limit;
}

/**
 * Random field element built from two 53-bit draws, so values cover the
 * full bit width of the curve fields
 */
export function randomFieldElement(field: PrimeField): bigint {
  const high = BigInt(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER));
  const low = BigInt(Math.floor(Math.random() * Number.MAX_SAFE_INTEGER));
  return field.element(((high << 200n) ^ (high << 100n)) + low);
}

export function randomNumberMatrix(rows: number, cols: number): Matrix<number, number, number> {
  return fromFunction([rows, cols] as const, () => randomSmallInt(), { scalar: numberScalar });
}

export function randomFieldMatrix(
  rows: number,
  cols: number,
  field: PrimeField = bn254,
): Matrix<number, number, bigint> {
  return fromFunction([rows, cols] as const, () => randomFieldElement(field), { scalar: field });
}

export function randomNumberVector(length: number): number[] {
  return Array.from({ length }, () => randomSmallInt());
}

export function randomFieldVector(length: number, field: PrimeField = bn254): bigint[] {
  return Array.from({ length }, () => randomFieldElement(field));
}
