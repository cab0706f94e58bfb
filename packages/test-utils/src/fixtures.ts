/**
 * Element samplers for the built-in scalars
 */

import { bigintScalar, bn254, numberScalar } from '@shapemat/core';
import type { PrimeField, UnitalScalar } from '@shapemat/core';
import { randomInt } from './random';
import type { Rng } from './random';

/**
 * A scalar paired with a way to draw sample elements from it
 */
export interface ScalarFixture<T> {
  readonly scalar: UnitalScalar<T>;
  /**
   * Whether `mul` is commutative; gates the laws that need it
   */
  readonly commutative: boolean;
  sample(rng: Rng): T;
}

/**
 * Small integers, so every sum and product stays exact
 */
export const numberFixture: ScalarFixture<number> = {
  scalar: numberScalar,
  commutative: true,
  sample: (rng) => randomInt(rng, -9, 9),
};

export const bigintFixture: ScalarFixture<bigint> = {
  scalar: bigintScalar,
  commutative: true,
  sample: (rng) => BigInt(randomInt(rng, -1000, 1000)),
};

/**
 * Field elements drawn near both ends of the range so that sums and
 * differences wrap around the modulus
 */
export function fieldFixture(field: PrimeField): ScalarFixture<bigint> {
  return {
    scalar: field,
    commutative: true,
    sample: (rng) => {
      const small = field.element(randomInt(rng, 0, 1000));
      return rng() < 0.5 ? small : field.neg(small);
    },
  };
}

export const bn254Fixture: ScalarFixture<bigint> = fieldFixture(bn254);
