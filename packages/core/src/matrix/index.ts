export { Matrix } from './matrix';
export { zeros, matrix, identity, fromFunction, basisVector } from './creation';
export {
  add,
  sub,
  scalarMult,
  mult,
  matVec,
  transpose,
  trace,
  dotProduct,
} from './operations';
