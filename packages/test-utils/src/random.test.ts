import { describe, it, expect } from 'vitest';
import { createRng, randomInt } from './random';
import { fieldFixture, numberFixture } from './fixtures';
import { bn254, primeField } from '@shapemat/core';

describe('createRng', () => {
  it('should repeat the sequence for the same seed', () => {
    const a = createRng(42);
    const b = createRng(42);
    const first = [a(), a(), a()];
    expect([b(), b(), b()]).toEqual(first);
  });

  it('should produce floats in [0, 1)', () => {
    const rng = createRng(7);
    for (let i = 0; i < 1000; i++) {
      const x = rng();
      expect(x >= 0 && x < 1).toBe(true);
    }
  });
});

describe('randomInt', () => {
  it('should stay within the inclusive range and reach both ends', () => {
    const rng = createRng(1);
    const seen = new Set<number>();
    for (let i = 0; i < 500; i++) {
      seen.add(randomInt(rng, -2, 2));
    }
    expect([...seen].sort((x, y) => x - y)).toEqual([-2, -1, 0, 1, 2]);
  });

  it('should map the ends of [0, 1) onto the bounds', () => {
    expect(randomInt(() => 0, 3, 9)).toBe(3);
    expect(randomInt(() => 0.999999, 3, 9)).toBe(9);
  });
});

describe('fixtures', () => {
  it('should sample small integers for numbers', () => {
    const rng = createRng(3);
    for (let i = 0; i < 100; i++) {
      const x = numberFixture.sample(rng);
      expect(Number.isInteger(x) && x >= -9 && x <= 9).toBe(true);
    }
  });

  it('should sample canonical field elements', () => {
    const rng = createRng(5);
    const f101 = fieldFixture(primeField(101n));
    for (let i = 0; i < 100; i++) {
      const x = f101.sample(rng);
      expect(x >= 0n && x < 101n).toBe(true);
    }
    expect(fieldFixture(bn254).scalar).toBe(bn254);
  });
});
