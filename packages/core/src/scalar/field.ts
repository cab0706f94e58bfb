/**
 * Prime field scalars
 *
 * Elements are bigints kept in canonical form `[0, p)`. This is the element
 * type matrices use when they are destined for an arithmetic circuit, where
 * every value lives in the proof system's scalar field.
 */

import type { UnitalScalar } from './types';

// =============================================================================
// Field Moduli
// =============================================================================

/**
 * Order of the BN254 (alt_bn128) scalar field
 */
export const BN254_SCALAR_MODULUS =
  0x30644e72e131a029b85045b68181585d2833e84879b9709143e1f593f0000001n;

/**
 * Order of the BLS12-381 scalar field
 */
export const BLS12_381_SCALAR_MODULUS =
  0x73eda753299d7d483339d80809a1d80553bda402fffe5bfeffffffff00000001n;

// =============================================================================
// Prime Field
// =============================================================================

/**
 * Scalar descriptor for the integers modulo a prime
 */
export interface PrimeField extends UnitalScalar<bigint> {
  readonly modulus: bigint;

  /**
   * Reduce an integer into canonical form
   */
  element(value: bigint | number): bigint;
  neg(a: bigint): bigint;
  pow(base: bigint, exponent: bigint): bigint;

  /**
   * Multiplicative inverse, computed as `a^(p-2)`
   */
  inv(a: bigint): bigint;
}

/**
 * Create a prime field scalar.
 *
 * The modulus is not tested for primality; `inv` is only meaningful when it
 * is prime.
 *
 * @example
 * const f7 = primeField(7n);
 * f7.add(5n, 4n); // 2n
 * f7.inv(3n); // 5n
 */
export function primeField(modulus: bigint, name = `F_${modulus.toString()}`): PrimeField {
  if (modulus < 2n) {
    throw new ScalarError(`Field modulus must be at least 2, got ${modulus.toString()}`, name);
  }

  const reduce = (value: bigint): bigint => {
    const r = value % modulus;
    return r < 0n ? r + modulus : r;
  };

  const pow = (base: bigint, exponent: bigint): bigint => {
    if (exponent < 0n) {
      throw new ScalarError(`Negative exponent ${exponent.toString()}`, name, exponent);
    }
    let result = 1n % modulus;
    let b = reduce(base);
    let e = exponent;
    while (e > 0n) {
      if ((e & 1n) === 1n) {
        result = (result * b) % modulus;
      }
      b = (b * b) % modulus;
      e >>= 1n;
    }
    return result;
  };

  return Object.freeze({
    name,
    modulus,
    zero: () => 0n,
    one: () => 1n % modulus,
    add: (a: bigint, b: bigint) => reduce(a + b),
    sub: (a: bigint, b: bigint) => reduce(a - b),
    mul: (a: bigint, b: bigint) => reduce(a * b),
    neg: (a: bigint) => reduce(-a),
    equals: (a: bigint, b: bigint) => reduce(a) === reduce(b),
    format: (value: bigint) => reduce(value).toString(),
    element: (value: bigint | number): bigint => {
      if (typeof value === 'number') {
        if (!Number.isSafeInteger(value)) {
          throw new ScalarError(`Value ${value.toString()} is not a safe integer`, name, value);
        }
        return reduce(BigInt(value));
      }
      return reduce(value);
    },
    pow,
    inv: (a: bigint): bigint => {
      if (reduce(a) === 0n) {
        throw new ScalarError('Zero has no multiplicative inverse', name, a);
      }
      return pow(a, modulus - 2n);
    },
  });
}

/**
 * Scalar field of the BN254 curve
 */
export const bn254: PrimeField = primeField(BN254_SCALAR_MODULUS, 'bn254');

/**
 * Scalar field of the BLS12-381 curve
 */
export const bls12_381: PrimeField = primeField(BLS12_381_SCALAR_MODULUS, 'bls12_381');

// =============================================================================
// Error Classes
// =============================================================================

/**
 * Error thrown when a scalar cannot be constructed or an element is invalid
 */
export class ScalarError extends Error {
  constructor(
    message: string,
    public readonly scalar?: string,
    public readonly value?: unknown,
  ) {
    super(message);
    this.name = 'ScalarError';
  }
}
