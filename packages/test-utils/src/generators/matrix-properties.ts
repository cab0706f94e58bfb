/**
 * Algebraic property test generator for matrix operations
 *
 * Runs the identities every matrix library over a unital scalar must satisfy,
 * on randomly shaped matrices drawn from a fixture:
 * - Zero matrix is the additive identity; A - A is zero
 * - Scaling by zero annihilates, scaling by one is the identity
 * - Identity matrices are neutral for multiplication, zero matrices absorb
 * - Transpose is an involution
 * - Trace is additive
 * - Standard basis vectors are orthonormal under the dot product
 */

import {
  add,
  basisVector,
  dotProduct,
  fromFunction,
  identity,
  mult,
  scalarMult,
  sub,
  trace,
  transpose,
  zeros,
} from '@shapemat/core';
import type { Matrix } from '@shapemat/core';
import type { ScalarFixture } from '../fixtures';
import type { TestFramework } from '../framework';
import { createRng, randomInt } from '../random';
import type { Rng } from '../random';

const TRIALS = 25;
const MAX_DIM = 4;

/**
 * m×n by n×k shapes with at least one empty dimension
 */
const EMPTY_SHAPES: readonly (readonly [number, number, number])[] = [
  [0, 3, 2],
  [3, 0, 2],
  [2, 3, 0],
  [0, 0, 0],
];

/**
 * Draw a rows×cols matrix of sample elements
 */
export function randomMatrix<T>(
  fixture: ScalarFixture<T>,
  rng: Rng,
  rows: number,
  cols: number,
): Matrix<number, number, T> {
  return fromFunction([rows, cols] as const, () => fixture.sample(rng), {
    scalar: fixture.scalar,
  });
}

export function generateMatrixPropertyTests<T>(
  name: string,
  fixture: ScalarFixture<T>,
  framework: TestFramework,
  seed = 0x5eed,
): void {
  const { describe, it, expect } = framework;
  const { scalar } = fixture;
  const options = { scalar };

  // Each property gets its own generator so that adding a test does not
  // shift the samples of the others
  const forAllShapes = (check: (rng: Rng, m: number, n: number, k: number) => void): void => {
    const rng = createRng(seed);
    for (let trial = 0; trial < TRIALS; trial++) {
      check(
        rng,
        randomInt(rng, 0, MAX_DIM),
        randomInt(rng, 0, MAX_DIM),
        randomInt(rng, 0, MAX_DIM),
      );
    }
  };

  describe(`Matrix properties over ${name}`, () => {
    it('should treat the zero matrix as additive identity', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(add(a, zeros([m, n] as const, options)).equals(a)).toBe(true);
      });
    });

    it('should give the zero matrix for A - A', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(sub(a, a).equals(zeros([m, n] as const, options))).toBe(true);
      });
    });

    it('should annihilate when scaling by zero', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(scalarMult(a, scalar.zero()).equals(zeros([m, n] as const, options))).toBe(true);
      });
    });

    it('should leave a matrix unchanged when scaling by one', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(scalarMult(a, scalar.one()).equals(a)).toBe(true);
      });
    });

    it('should be neutral to multiplication by the identity on either side', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(mult(a, identity(n, options)).equals(a)).toBe(true);
        expect(mult(identity(m, options), a).equals(a)).toBe(true);
      });
    });

    it('should absorb multiplication by a zero matrix', () => {
      forAllShapes((rng, m, n, k) => {
        const a = randomMatrix(fixture, rng, m, n);
        const product = mult(a, zeros([n, k] as const, options));
        expect(product.shape).toEqual([m, k]);
        expect(product.equals(zeros([m, k] as const, options))).toBe(true);
      });
    });

    it('should be an involution under transpose', () => {
      forAllShapes((rng, m, n) => {
        const a = randomMatrix(fixture, rng, m, n);
        expect(transpose(a).shape).toEqual([n, m]);
        expect(transpose(transpose(a)).equals(a)).toBe(true);
      });
    });

    it('should distribute trace over addition', () => {
      forAllShapes((rng, n) => {
        const a = randomMatrix(fixture, rng, n, n);
        const b = randomMatrix(fixture, rng, n, n);
        const expected = scalar.add(trace(a), trace(b));
        expect(scalar.equals(trace(add(a, b)), expected)).toBe(true);
      });
    });

    it('should distribute multiplication over addition', () => {
      forAllShapes((rng, m, n, k) => {
        const a = randomMatrix(fixture, rng, m, n);
        const b = randomMatrix(fixture, rng, n, k);
        const c = randomMatrix(fixture, rng, n, k);
        expect(mult(a, add(b, c)).equals(add(mult(a, b), mult(a, c)))).toBe(true);
      });
    });

    if (fixture.commutative) {
      it('should reverse the factors when transposing a product', () => {
        forAllShapes((rng, m, n, k) => {
          const a = randomMatrix(fixture, rng, m, n);
          const b = randomMatrix(fixture, rng, n, k);
          expect(transpose(mult(a, b)).equals(mult(transpose(b), transpose(a)))).toBe(true);
        });
      });
    }

    it('should keep the laws on empty shapes', () => {
      const rng = createRng(seed);
      for (const [m, n, k] of EMPTY_SHAPES) {
        const a = randomMatrix(fixture, rng, m, n);
        const b = randomMatrix(fixture, rng, n, k);
        expect(add(a, zeros([m, n] as const, options)).equals(a)).toBe(true);
        expect(mult(a, b).shape).toEqual([m, k]);
        expect(mult(a, b).equals(zeros([m, k] as const, options))).toBe(true);
        expect(mult(identity(m, options), a).equals(a)).toBe(true);
        expect(transpose(transpose(a)).equals(a)).toBe(true);
      }
      expect(scalar.equals(trace(zeros([0, 0] as const, options)), scalar.zero())).toBe(true);
    });

    it('should make standard basis vectors orthonormal', () => {
      for (let n = 1; n <= MAX_DIM + 1; n++) {
        for (let i = 0; i < n; i++) {
          for (let j = 0; j < n; j++) {
            const product = dotProduct(
              basisVector(n, i, options),
              basisVector(n, j, options),
              scalar,
            );
            const expected = i === j ? scalar.one() : scalar.zero();
            expect(scalar.equals(product, expected)).toBe(true);
          }
        }
      }
    });
  });
}
