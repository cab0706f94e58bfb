/**
 * Elementwise operations benchmark runner
 *
 * add, sub, scalarMult, transpose and trace over number and BN254 matrices.
 * Run with `npm run bench:elementwise -w @shapemat/benchmarks`.
 */

import { add, bn254, numberScalar, scalarMult, sub, trace, transpose } from '@shapemat/core';
import { randomFieldElement, randomFieldMatrix, randomNumberMatrix } from '../utils/data';
import { runSuite } from '../utils/runner';
import { MATRIX_SIZES, formatSize } from '../utils/sizes';

await runSuite('Elementwise Matrix Benchmarks', (bench) => {
  for (const size of MATRIX_SIZES) {
    const label = formatSize(size);
    const a = randomNumberMatrix(size.rows, size.cols);
    const b = randomNumberMatrix(size.rows, size.cols);
    const fa = randomFieldMatrix(size.rows, size.cols);
    const fb = randomFieldMatrix(size.rows, size.cols);
    const k = randomFieldElement(bn254);

    bench
      .add(`add ${label} - number`, () => {
        add(a, b);
      })
      .add(`add ${label} - bn254`, () => {
        add(fa, fb);
      })
      .add(`sub ${label} - bn254`, () => {
        sub(fa, fb);
      })
      .add(`scalarMult ${label} - number`, () => {
        scalarMult(a, numberScalar.one());
      })
      .add(`scalarMult ${label} - bn254`, () => {
        scalarMult(fa, k);
      })
      .add(`transpose ${label} - number`, () => {
        transpose(a);
      });

    if (size.rows === size.cols) {
      bench.add(`trace ${label} - bn254`, () => {
        trace(fa);
      });
    }
  }
});
