/**
 * @shapecodec/fp: the small functional core the codec engine is built on.
 *
 * - NonEmptyList: a list with at least one element
 * - Validated / ValidatedNel: success or an accumulated list of errors
 *
 * @example
 * ```typescript
 * import { Validated, validNel, invalidNel } from "@shapecodec/fp";
 *
 * const both = Validated.map2Nel(
 *   validNel<string, number>(1),
 *   invalidNel<string, number>("bad"),
 *   (a, b) => a + b,
 * );
 * // { _tag: "Invalid", error: { _tag: "NonEmptyList", head: "bad", tail: [] } }
 * ```
 */

// ============================================================================
// Typeclasses
// ============================================================================

export type { Semigroup } from "./typeclasses/semigroup.js";

// ============================================================================
// Data Types - namespace export to avoid collisions
// ============================================================================

export * as NEL from "./data/nonempty-list.js";
export * as Validated from "./data/validated.js";

// ============================================================================
// Commonly used types and constructors
// ============================================================================

export type { NonEmptyList } from "./data/nonempty-list.js";
export type { ValidatedNel } from "./data/validated.js";
export {
  Valid,
  Invalid,
  validNel,
  invalidNel,
  isValid,
  isInvalid,
} from "./data/validated.js";
