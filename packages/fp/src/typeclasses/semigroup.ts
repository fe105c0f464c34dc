/**
 * Semigroup Typeclass
 *
 * A type with an associative binary operation.
 *
 * Laws:
 *   - Associativity: combine(combine(x, y), z) === combine(x, combine(y, z))
 */

/**
 * Semigroup typeclass
 */
export interface Semigroup<A> {
  readonly combine: (x: A, y: A) => A;
}
