export { createRng, randomInt } from './random';
export type { Rng } from './random';
export { numberFixture, bigintFixture, bn254Fixture, fieldFixture } from './fixtures';
export type { ScalarFixture } from './fixtures';
export type { TestFramework } from './framework';
export { generateScalarLawTests } from './generators/scalar-laws';
export { generateMatrixPropertyTests, randomMatrix } from './generators/matrix-properties';
