import type { Multiply } from 'ts-arithmetic';

/**
 * Check if a number is an integer (no decimal part)
 * IsInteger<4> = true
 * IsInteger<4.5> = false
 */
export type IsInteger<N extends number> = `${N}` extends `${number}.${number}` ? false : true;

/**
 * Check if a number literal is negative
 * IsNegative<-3> = true
 * IsNegative<0> = false
 */
export type IsNegative<N extends number> = `${N}` extends `-${string}` ? true : false;

/**
 * Check if a number can be used as a matrix dimension (non-negative integer).
 * The wide `number` type is accepted: its shape is only known at runtime.
 *
 * IsDimension<3> = true
 * IsDimension<0> = true
 * IsDimension<-1> = false
 * IsDimension<2.5> = false
 */
export type IsDimension<N extends number> = number extends N
  ? true
  : IsNegative<N> extends true
    ? false
    : IsInteger<N>;

/**
 * Number of cells in an M×N grid
 * CellCount<2, 3> = 6
 * CellCount<number, 3> = number
 */
export type CellCount<M extends number, N extends number> = number extends M
  ? number
  : number extends N
    ? number
    : Multiply<M, N>;

/**
 * Union of the valid indices below N
 * IndexOf<3> = 0 | 1 | 2
 * IndexOf<0> = never
 * IndexOf<number> = number
 */
export type IndexOf<N extends number> = (number extends N ? number : IndexOfHelper<N, []>) &
  number;

type IndexOfHelper<N extends number, Acc extends readonly number[]> = Acc['length'] extends N
  ? Acc[number]
  : IndexOfHelper<N, readonly [...Acc, Acc['length']]>;
