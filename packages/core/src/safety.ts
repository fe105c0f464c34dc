/**
 * Runtime Safety Primitives
 *
 * `invariant(condition, message)` asserts a condition the caller guarantees,
 * such as one already enforced when a descriptor was validated.
 */

/**
 * Runtime invariant check.
 *
 * @throws Error if condition is false
 */
export function invariant(condition: boolean, message?: string): asserts condition {
  if (!condition) {
    throw new Error(message ?? "Invariant violation");
  }
}
