import { expectTypeOf } from 'expect-type';
import type { CellCount, IndexOf, IsDimension, IsInteger, IsNegative } from './arithmetic';

// IsInteger tests
expectTypeOf<IsInteger<4>>().toEqualTypeOf<true>();
expectTypeOf<IsInteger<0>>().toEqualTypeOf<true>();
expectTypeOf<IsInteger<-5>>().toEqualTypeOf<true>();
expectTypeOf<IsInteger<4.5>>().toEqualTypeOf<false>();
expectTypeOf<IsInteger<-3.7>>().toEqualTypeOf<false>();

// IsNegative tests
expectTypeOf<IsNegative<-1>>().toEqualTypeOf<true>();
expectTypeOf<IsNegative<0>>().toEqualTypeOf<false>();
expectTypeOf<IsNegative<7>>().toEqualTypeOf<false>();

// IsDimension tests
expectTypeOf<IsDimension<0>>().toEqualTypeOf<true>();
expectTypeOf<IsDimension<3>>().toEqualTypeOf<true>();
expectTypeOf<IsDimension<number>>().toEqualTypeOf<true>();
expectTypeOf<IsDimension<-2>>().toEqualTypeOf<false>();
expectTypeOf<IsDimension<2.5>>().toEqualTypeOf<false>();

// CellCount tests
expectTypeOf<CellCount<2, 3>>().toEqualTypeOf<6>();
expectTypeOf<CellCount<4, 4>>().toEqualTypeOf<16>();
expectTypeOf<CellCount<0, 5>>().toEqualTypeOf<0>();
expectTypeOf<CellCount<number, 3>>().toEqualTypeOf<number>();
expectTypeOf<CellCount<3, number>>().toEqualTypeOf<number>();

// IndexOf tests
expectTypeOf<IndexOf<3>>().toEqualTypeOf<0 | 1 | 2>();
expectTypeOf<IndexOf<1>>().toEqualTypeOf<0>();
expectTypeOf<IndexOf<0>>().toEqualTypeOf<never>();
expectTypeOf<IndexOf<number>>().toEqualTypeOf<number>();
