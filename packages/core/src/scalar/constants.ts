/**
 * Built-in scalar descriptors over the native numeric types
 */

import type { UnitalScalar } from './types';

/**
 * IEEE-754 doubles. Results are exact only while values stay within
 * `Number.MAX_SAFE_INTEGER`.
 */
export const numberScalar: UnitalScalar<number> = Object.freeze({
  name: 'number',
  zero: () => 0,
  one: () => 1,
  add: (a: number, b: number) => a + b,
  sub: (a: number, b: number) => a - b,
  mul: (a: number, b: number) => a * b,
  equals: (a: number, b: number) => a === b,
  format: (value: number) => value.toString(),
});

/**
 * Arbitrary-precision integers
 */
export const bigintScalar: UnitalScalar<bigint> = Object.freeze({
  name: 'bigint',
  zero: () => 0n,
  one: () => 1n,
  add: (a: bigint, b: bigint) => a + b,
  sub: (a: bigint, b: bigint) => a - b,
  mul: (a: bigint, b: bigint) => a * b,
  equals: (a: bigint, b: bigint) => a === b,
  format: (value: bigint) => value.toString(),
});
