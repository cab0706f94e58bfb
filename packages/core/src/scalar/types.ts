/**
 * Scalar element contracts
 *
 * A matrix never performs arithmetic on its cells directly. Every sum,
 * difference and product goes through the scalar descriptor the matrix was
 * created with, so the same operations work over numbers, bigints and
 * finite-field elements alike.
 */

/**
 * Capability set required of a matrix element type.
 *
 * The operations of this package only call `zero`, `add`, `sub` and `mul`
 * for arithmetic. `equals` and `format` back structural equality and
 * display. None of the arithmetic members needs to be commutative or
 * associative; operand order is fixed by each operation.
 */
export interface Scalar<T> {
  readonly name: string;
  zero(): T;
  add(a: T, b: T): T;
  sub(a: T, b: T): T;
  mul(a: T, b: T): T;
  equals(a: T, b: T): boolean;
  format(value: T): string;
}

/**
 * A scalar with a multiplicative identity.
 * Needed for identity matrices and standard basis vectors.
 */
export interface UnitalScalar<T> extends Scalar<T> {
  one(): T;
}

/**
 * Extract the element type of a scalar descriptor
 *
 * @example
 * type E = ElementOf<typeof bn254>; // bigint
 */
export type ElementOf<S> = S extends Scalar<infer T> ? T : never;

/**
 * Options accepted by every matrix constructor
 */
export interface ScalarOptions<S> {
  readonly scalar: S;
}
