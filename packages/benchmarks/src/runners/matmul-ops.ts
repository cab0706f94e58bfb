/**
 * Matrix multiplication benchmark runner
 *
 * Dense triple-loop products, matrix-vector products and dot products over
 * number and BN254 elements. Run with `npm run bench:matmul -w @shapemat/benchmarks`.
 */

import { bn254, dotProduct, matVec, mult, numberScalar } from '@shapemat/core';
import {
  randomFieldMatrix,
  randomFieldVector,
  randomNumberMatrix,
  randomNumberVector,
} from '../utils/data';
import { runSuite } from '../utils/runner';
import { MATMUL_CASES, VECTOR_LENGTHS, formatMatMulCase } from '../utils/sizes';

await runSuite('Matrix Multiplication Benchmarks', (bench) => {
  for (const c of MATMUL_CASES) {
    const label = formatMatMulCase(c);
    const a = randomNumberMatrix(c.m, c.n);
    const b = randomNumberMatrix(c.n, c.k);
    const fa = randomFieldMatrix(c.m, c.n);
    const fb = randomFieldMatrix(c.n, c.k);
    const fv = randomFieldVector(c.n);

    bench
      .add(`mult ${label} - number`, () => {
        mult(a, b);
      })
      .add(`mult ${label} - bn254`, () => {
        mult(fa, fb);
      })
      .add(`matVec ${label} - bn254`, () => {
        matVec(fa, fv);
      });
  }

  for (const length of VECTOR_LENGTHS) {
    const u = randomNumberVector(length);
    const v = randomNumberVector(length);
    const fu = randomFieldVector(length);
    const fv = randomFieldVector(length);

    bench
      .add(`dotProduct length ${length.toString()} - number`, () => {
        dotProduct(u, v, numberScalar);
      })
      .add(`dotProduct length ${length.toString()} - bn254`, () => {
        dotProduct(fu, fv, bn254);
      });
  }
});
