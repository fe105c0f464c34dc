/**
 * NonEmptyList Data Type
 *
 * A list that is guaranteed to have at least one element. Used as the error
 * channel of ValidatedNel, where an Invalid result must carry something.
 */

import type { Semigroup } from "../typeclasses/semigroup.js";

// ============================================================================
// NonEmptyList Type Definition
// ============================================================================

/**
 * NonEmptyList - guaranteed to have at least one element
 */
export interface NonEmptyList<A> {
  readonly _tag: "NonEmptyList";
  readonly head: A;
  readonly tail: ReadonlyArray<A>;
}

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a NonEmptyList
 */
export function NonEmptyList<A>(head: A, tail: ReadonlyArray<A>): NonEmptyList<A> {
  return { _tag: "NonEmptyList", head, tail };
}

/**
 * Create a NonEmptyList from variadic arguments
 */
export function of<A>(head: A, ...tail: A[]): NonEmptyList<A> {
  return NonEmptyList(head, tail);
}

/**
 * Create a single-element NonEmptyList
 */
export function singleton<A>(a: A): NonEmptyList<A> {
  return NonEmptyList(a, []);
}

// ============================================================================
// Basic Operations
// ============================================================================

/**
 * Convert to a plain array, head first
 */
export function toArray<A>(nel: NonEmptyList<A>): A[] {
  return [nel.head, ...nel.tail];
}

/**
 * Map over every element
 */
export function map<A, B>(nel: NonEmptyList<A>, f: (a: A) => B): NonEmptyList<B> {
  return NonEmptyList(f(nel.head), nel.tail.map(f));
}

/**
 * Concatenate two NonEmptyLists, preserving order
 */
export function concat<A>(x: NonEmptyList<A>, y: NonEmptyList<A>): NonEmptyList<A> {
  return NonEmptyList(x.head, [...x.tail, y.head, ...y.tail]);
}

// ============================================================================
// Typeclass Instances
// ============================================================================

/**
 * Semigroup instance (concatenation)
 */
export function getSemigroup<A>(): Semigroup<NonEmptyList<A>> {
  return {
    combine: concat,
  };
}
