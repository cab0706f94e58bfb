export type { Scalar, UnitalScalar, ElementOf, ScalarOptions } from './types';
export { numberScalar, bigintScalar } from './constants';
export {
  primeField,
  bn254,
  bls12_381,
  BN254_SCALAR_MODULUS,
  BLS12_381_SCALAR_MODULUS,
  ScalarError,
} from './field';
export type { PrimeField } from './field';
