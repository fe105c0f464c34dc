/**
 * Validated Data Type
 *
 * Validated is similar to Either but designed for error accumulation.
 * It only has an Applicative shape: combining several independent results
 * collects every error instead of stopping at the first one.
 *
 * ValidatedNel<E, A> = Validated<NonEmptyList<E>, A> is the most common usage.
 */

import type { NonEmptyList } from "./nonempty-list.js";
import * as NEL from "./nonempty-list.js";
import type { Semigroup } from "../typeclasses/semigroup.js";

// ============================================================================
// Validated Type Definition
// ============================================================================

/**
 * Validated data type - either Valid (success) or Invalid (errors)
 */
export type Validated<E, A> = Valid<A> | Invalid<E>;

/**
 * Valid variant - represents success
 */
export interface Valid<A> {
  readonly _tag: "Valid";
  readonly value: A;
}

/**
 * Invalid variant - represents accumulated errors
 */
export interface Invalid<E> {
  readonly _tag: "Invalid";
  readonly error: E;
}

/**
 * ValidatedNel - Validated with NonEmptyList of errors
 */
export type ValidatedNel<E, A> = Validated<NonEmptyList<E>, A>;

// ============================================================================
// Constructors
// ============================================================================

/**
 * Create a Valid value
 */
export function Valid<E = never, A = unknown>(value: A): Validated<E, A> {
  return { _tag: "Valid", value };
}

/**
 * Create an Invalid value
 */
export function Invalid<E, A = never>(error: E): Validated<E, A> {
  return { _tag: "Invalid", error };
}

/**
 * Create a ValidatedNel from a single error
 */
export function invalidNel<E, A = never>(e: E): ValidatedNel<E, A> {
  return Invalid(NEL.singleton(e));
}

/**
 * Create a Valid for ValidatedNel
 */
export function validNel<E = never, A = unknown>(a: A): ValidatedNel<E, A> {
  return Valid(a);
}

// ============================================================================
// Type Guards
// ============================================================================

/**
 * Check if Validated is Valid
 */
export function isValid<E, A>(v: Validated<E, A>): v is Valid<A> {
  return v._tag === "Valid";
}

/**
 * Check if Validated is Invalid
 */
export function isInvalid<E, A>(v: Validated<E, A>): v is Invalid<E> {
  return v._tag === "Invalid";
}

// ============================================================================
// Operations
// ============================================================================

/**
 * Map over the Valid value
 */
export function map<E, A, B>(v: Validated<E, A>, f: (a: A) => B): Validated<E, B> {
  return isValid(v) ? Valid(f(v.value)) : v;
}

/**
 * Map over the Invalid errors
 */
export function mapError<E, A, E2>(v: Validated<E, A>, f: (e: E) => E2): Validated<E2, A> {
  return isInvalid(v) ? Invalid(f(v.error)) : v;
}

// ============================================================================
// Applicative combination
// ============================================================================

/**
 * Apply a wrapped function, accumulating errors from both sides
 */
export function ap<E, A, B>(
  vf: Validated<E, (a: A) => B>,
  va: Validated<E, A>,
  S: Semigroup<E>,
): Validated<E, B> {
  if (isInvalid(va)) {
    return isInvalid(vf) ? Invalid(S.combine(vf.error, va.error)) : va;
  }
  if (isInvalid(vf)) {
    return vf;
  }
  return Valid(vf.value(va.value));
}

export function map2<E, A, B, C>(
  va: Validated<E, A>,
  vb: Validated<E, B>,
  f: (a: A, b: B) => C,
  S: Semigroup<E>,
): Validated<E, C> {
  return ap(
    map(va, (a) => (b: B) => f(a, b)),
    vb,
    S,
  );
}

export function map2Nel<E, A, B, C>(
  va: ValidatedNel<E, A>,
  vb: ValidatedNel<E, B>,
  f: (a: A, b: B) => C,
): ValidatedNel<E, C> {
  return map2(va, vb, f, NEL.getSemigroup<E>());
}

export function map3Nel<E, A, B, C, D>(
  va: ValidatedNel<E, A>,
  vb: ValidatedNel<E, B>,
  vc: ValidatedNel<E, C>,
  f: (a: A, b: B, c: C) => D,
): ValidatedNel<E, D> {
  return map2Nel(map2Nel(va, vb, (a, b) => [a, b] as const), vc, ([a, b], c) => f(a, b, c));
}

/**
 * Combine N independent results, collecting every error in order.
 * Succeeds only when every input is Valid.
 */
export function sequence<E, A>(
  vs: ReadonlyArray<Validated<E, A>>,
  S: Semigroup<E>,
): Validated<E, A[]> {
  const values: A[] = [];
  let failure: Invalid<E> | undefined;

  for (const v of vs) {
    if (isValid(v)) {
      values.push(v.value);
    } else {
      failure = failure ? { _tag: "Invalid", error: S.combine(failure.error, v.error) } : v;
    }
  }

  return failure ?? Valid(values);
}

export function sequenceNel<E, A>(vs: ReadonlyArray<ValidatedNel<E, A>>): ValidatedNel<E, A[]> {
  return sequence(vs, NEL.getSemigroup<E>());
}

export function traverseNel<E, A, B>(
  as: ReadonlyArray<A>,
  f: (a: A, index: number) => ValidatedNel<E, B>,
): ValidatedNel<E, B[]> {
  return sequenceNel(as.map(f));
}
