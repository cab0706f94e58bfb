/**
 * Matrix multiplication benchmarks
 */

import { bench, describe } from 'vitest';
import { bn254, dotProduct, mult, numberScalar } from '@shapemat/core';
import {
  randomFieldMatrix,
  randomFieldVector,
  randomNumberMatrix,
  randomNumberVector,
} from '../utils/data';
import { MATMUL_CASES, VECTOR_LENGTHS, formatMatMulCase } from '../utils/sizes';

describe('mult', () => {
  for (const c of MATMUL_CASES) {
    const a = randomNumberMatrix(c.m, c.n);
    const b = randomNumberMatrix(c.n, c.k);
    const fa = randomFieldMatrix(c.m, c.n);
    const fb = randomFieldMatrix(c.n, c.k);

    bench(`mult ${formatMatMulCase(c)} - number`, () => {
      mult(a, b);
    });

    bench(`mult ${formatMatMulCase(c)} - bn254`, () => {
      mult(fa, fb);
    });
  }
});

describe('dotProduct', () => {
  for (const length of VECTOR_LENGTHS) {
    const u = randomNumberVector(length);
    const v = randomNumberVector(length);
    const fu = randomFieldVector(length);
    const fv = randomFieldVector(length);

    bench(`dotProduct length ${length.toString()} - number`, () => {
      dotProduct(u, v, numberScalar);
    });

    bench(`dotProduct length ${length.toString()} - bn254`, () => {
      dotProduct(fu, fv, bn254);
    });
  }
});
