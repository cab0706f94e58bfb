export * from './scalar';
export * from './shape';
export * from './matrix';
export type { IsInteger, IsNegative, IsDimension, CellCount, IndexOf } from './arithmetic';
