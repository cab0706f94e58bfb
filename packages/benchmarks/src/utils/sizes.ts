/**
 * Matrix sizes for benchmarking
 *
 * Dense multiplication is cubic in the dimension, so the product cases stop
 * well below the elementwise ones.
 */

export interface BenchmarkSize {
  name: string;
  rows: number;
  cols: number;
}

export interface MatMulCase {
  name: string;
  /**
   * Left operand is m×n, right operand n×k
   */
  m: number;
  n: number;
  k: number;
}

export const MATRIX_SIZES: readonly BenchmarkSize[] = [
  { name: 'tiny', rows: 4, cols: 4 },
  { name: 'small', rows: 16, cols: 16 },
  { name: 'medium', rows: 64, cols: 64 },
  { name: 'large', rows: 256, cols: 256 },
  { name: 'wide', rows: 8, cols: 512 },
];

export const MATMUL_CASES: readonly MatMulCase[] = [
  { name: 'tiny', m: 4, n: 4, k: 4 },
  { name: 'small', m: 16, n: 16, k: 16 },
  { name: 'medium', m: 48, n: 48, k: 48 },
  { name: 'large', m: 96, n: 96, k: 96 },
  { name: 'tall-skinny', m: 128, n: 8, k: 128 },
  { name: 'row-vector', m: 1, n: 256, k: 64 },
];

export const VECTOR_LENGTHS: readonly number[] = [16, 256, 4096];

export function cellCount(size: BenchmarkSize): number {
  return size.rows * size.cols;
}

export function formatSize(size: BenchmarkSize): string {
  return `${size.name} ${size.rows.toString()}×${size.cols.toString()} (${cellCount(size).toLocaleString('en-US')} cells)`;
}

export function formatMatMulCase(c: MatMulCase): string {
  return `${c.name} ${c.m.toString()}×${c.n.toString()} · ${c.n.toString()}×${c.k.toString()}`;
}
