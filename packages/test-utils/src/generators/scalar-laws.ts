/**
 * Scalar law test generator
 *
 * Checks that a scalar fixture behaves like a commutative ring on sampled
 * elements. Matrix properties only hold when these do.
 */

import type { ScalarFixture } from '../fixtures';
import type { TestFramework } from '../framework';
import { createRng } from '../random';
import type { Rng } from '../random';

const TRIALS = 50;

export function generateScalarLawTests<T>(
  name: string,
  fixture: ScalarFixture<T>,
  framework: TestFramework,
  seed = 0xc0ffee,
): void {
  const { describe, it, expect } = framework;
  const { scalar } = fixture;

  const forAll = (check: (rng: Rng) => void): void => {
    const rng = createRng(seed);
    for (let trial = 0; trial < TRIALS; trial++) {
      check(rng);
    }
  };

  describe(`Scalar laws for ${name}`, () => {
    it('should have zero as additive identity', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        expect(scalar.equals(scalar.add(a, scalar.zero()), a)).toBe(true);
        expect(scalar.equals(scalar.add(scalar.zero(), a), a)).toBe(true);
      });
    });

    it('should have one as multiplicative identity', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        expect(scalar.equals(scalar.mul(scalar.one(), a), a)).toBe(true);
        expect(scalar.equals(scalar.mul(a, scalar.one()), a)).toBe(true);
      });
    });

    it('should undo addition with subtraction', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        const b = fixture.sample(rng);
        expect(scalar.equals(scalar.sub(scalar.add(a, b), b), a)).toBe(true);
        expect(scalar.equals(scalar.sub(a, a), scalar.zero())).toBe(true);
      });
    });

    it('should add commutatively and associatively', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        const b = fixture.sample(rng);
        const c = fixture.sample(rng);
        expect(scalar.equals(scalar.add(a, b), scalar.add(b, a))).toBe(true);
        expect(
          scalar.equals(scalar.add(scalar.add(a, b), c), scalar.add(a, scalar.add(b, c))),
        ).toBe(true);
      });
    });

    it('should distribute multiplication over addition', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        const b = fixture.sample(rng);
        const c = fixture.sample(rng);
        expect(
          scalar.equals(
            scalar.mul(a, scalar.add(b, c)),
            scalar.add(scalar.mul(a, b), scalar.mul(a, c)),
          ),
        ).toBe(true);
      });
    });

    if (fixture.commutative) {
      it('should multiply commutatively', () => {
        forAll((rng) => {
          const a = fixture.sample(rng);
          const b = fixture.sample(rng);
          expect(scalar.equals(scalar.mul(a, b), scalar.mul(b, a))).toBe(true);
        });
      });
    }

    it('should annihilate with zero', () => {
      forAll((rng) => {
        const a = fixture.sample(rng);
        expect(scalar.equals(scalar.mul(scalar.zero(), a), scalar.zero())).toBe(true);
      });
    });
  });
}
