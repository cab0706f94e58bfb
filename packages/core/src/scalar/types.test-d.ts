/**
 * Type-level tests for scalar descriptors
 */

import { expectTypeOf } from 'expect-type';
import type { ElementOf, Scalar, UnitalScalar } from './types';
import { numberScalar, bigintScalar } from './constants';
import { bn254, primeField } from './field';
import type { PrimeField } from './field';

expectTypeOf<ElementOf<typeof numberScalar>>().toEqualTypeOf<number>();
expectTypeOf<ElementOf<typeof bigintScalar>>().toEqualTypeOf<bigint>();
expectTypeOf<ElementOf<typeof bn254>>().toEqualTypeOf<bigint>();
expectTypeOf<ElementOf<string>>().toEqualTypeOf<never>();

expectTypeOf(primeField(7n)).toEqualTypeOf<PrimeField>();
expectTypeOf(bn254).toExtend<UnitalScalar<bigint>>();
expectTypeOf(numberScalar).toExtend<Scalar<number>>();
expectTypeOf(numberScalar).not.toExtend<Scalar<bigint>>();
