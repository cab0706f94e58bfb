/**
 * Runtime tests for prime field scalars
 */

import { describe, it, expect } from 'vitest';
import { generateScalarLawTests, fieldFixture, bn254Fixture } from '@shapemat/test-utils';
import {
  primeField,
  bn254,
  bls12_381,
  BN254_SCALAR_MODULUS,
  BLS12_381_SCALAR_MODULUS,
  ScalarError,
} from './field';

describe('primeField', () => {
  const f7 = primeField(7n);

  it('should name the field after its modulus by default', () => {
    expect(f7.name).toBe('F_7');
    expect(primeField(11n, 'small').name).toBe('small');
  });

  it('should reduce elements into canonical form', () => {
    expect(f7.element(10)).toBe(3n);
    expect(f7.element(-1)).toBe(6n);
    expect(f7.element(14n)).toBe(0n);
    expect(f7.element(-15n)).toBe(6n);
  });

  it('should wrap addition and subtraction around the modulus', () => {
    expect(f7.add(5n, 4n)).toBe(2n);
    expect(f7.sub(2n, 5n)).toBe(4n);
    expect(f7.neg(3n)).toBe(4n);
    expect(f7.neg(0n)).toBe(0n);
  });

  it('should multiply modulo p', () => {
    expect(f7.mul(3n, 5n)).toBe(1n);
    expect(f7.mul(6n, 6n)).toBe(1n);
  });

  it('should compute powers and inverses', () => {
    expect(f7.pow(3n, 0n)).toBe(1n);
    expect(f7.pow(3n, 2n)).toBe(2n);
    expect(f7.pow(3n, 6n)).toBe(1n);
    expect(f7.inv(3n)).toBe(5n);
    expect(f7.inv(6n)).toBe(6n);
  });

  it('should compare and format by canonical representative', () => {
    expect(f7.equals(8n, 1n)).toBe(true);
    expect(f7.equals(2n, 3n)).toBe(false);
    expect(f7.format(-1n)).toBe('6');
  });

  it('should expose zero and one', () => {
    expect(f7.zero()).toBe(0n);
    expect(f7.one()).toBe(1n);
  });

  it('should reject a modulus below 2', () => {
    expect(() => primeField(1n)).toThrow(ScalarError);
    expect(() => primeField(0n)).toThrow('Field modulus must be at least 2, got 0');
  });

  it('should reject non-integer numbers', () => {
    expect(() => f7.element(1.5)).toThrow('Value 1.5 is not a safe integer');
    expect(() => f7.element(Number.NaN)).toThrow(ScalarError);
  });

  it('should reject inverting zero', () => {
    expect(() => f7.inv(0n)).toThrow('Zero has no multiplicative inverse');
    expect(() => f7.inv(14n)).toThrow(ScalarError);
  });

  it('should reject negative exponents', () => {
    expect(() => f7.pow(2n, -1n)).toThrow('Negative exponent -1');
  });

  it('should carry the field name on errors', () => {
    try {
      f7.inv(0n);
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ScalarError);
      if (error instanceof ScalarError) {
        expect(error.scalar).toBe('F_7');
        expect(error.value).toBe(0n);
      }
    }
  });
});

describe('curve scalar fields', () => {
  it('should use the curve group orders as moduli', () => {
    expect(bn254.modulus).toBe(BN254_SCALAR_MODULUS);
    expect(bls12_381.modulus).toBe(BLS12_381_SCALAR_MODULUS);
    expect(bn254.name).toBe('bn254');
    expect(bls12_381.name).toBe('bls12_381');
  });

  it('should map -1 to p - 1', () => {
    expect(bn254.sub(0n, 1n)).toBe(BN254_SCALAR_MODULUS - 1n);
    expect(bls12_381.element(-1)).toBe(BLS12_381_SCALAR_MODULUS - 1n);
  });

  it('should satisfy Fermat for small elements', () => {
    expect(bn254.pow(5n, BN254_SCALAR_MODULUS - 1n)).toBe(1n);
    expect(bn254.mul(bn254.inv(12345n), 12345n)).toBe(1n);
  });
});

generateScalarLawTests('bn254', bn254Fixture, { describe, it, expect });
generateScalarLawTests('F_101', fieldFixture(primeField(101n)), { describe, it, expect });
