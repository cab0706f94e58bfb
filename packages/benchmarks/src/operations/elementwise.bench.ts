/**
 * Elementwise operation benchmarks
 */

import { bench, describe } from 'vitest';
import { add, bn254, scalarMult, trace, transpose } from '@shapemat/core';
import { randomFieldElement, randomFieldMatrix, randomNumberMatrix } from '../utils/data';
import { MATRIX_SIZES, formatSize } from '../utils/sizes';

describe('add', () => {
  for (const size of MATRIX_SIZES) {
    const a = randomNumberMatrix(size.rows, size.cols);
    const b = randomNumberMatrix(size.rows, size.cols);
    const fa = randomFieldMatrix(size.rows, size.cols);
    const fb = randomFieldMatrix(size.rows, size.cols);

    bench(`add ${formatSize(size)} - number`, () => {
      add(a, b);
    });

    bench(`add ${formatSize(size)} - bn254`, () => {
      add(fa, fb);
    });
  }
});

describe('scalarMult', () => {
  for (const size of MATRIX_SIZES) {
    const fa = randomFieldMatrix(size.rows, size.cols);
    const k = randomFieldElement(bn254);

    bench(`scalarMult ${formatSize(size)} - bn254`, () => {
      scalarMult(fa, k);
    });
  }
});

describe('transpose and trace', () => {
  for (const size of MATRIX_SIZES.filter((s) => s.rows === s.cols)) {
    const a = randomNumberMatrix(size.rows, size.cols);

    bench(`transpose ${formatSize(size)}`, () => {
      transpose(a);
    });

    bench(`trace ${formatSize(size)}`, () => {
      trace(a);
    });
  }
});
