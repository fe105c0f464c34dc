/**
 * Codec and descriptor types shared by every generator.
 */

import type { ValidatedNel } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import type { DecodeError } from "./errors.js";

// ============================================================================
// Codec
// ============================================================================

/**
 * Decode outcome: the value, or every error found in the input.
 */
export type DecodeResult<A> = ValidatedNel<DecodeError, A>;

/**
 * A bidirectional converter between `A` and the JSON tree.
 *
 * Encoding is total. Decoding reports bad input through the result and
 * throws only for programmer errors.
 */
export interface Codec<A> {
  readonly encode: (value: A) => Json;
  readonly decode: (json: Json) => DecodeResult<A>;
}

/** Value type carried by a codec. */
export type TypeOf<C> = C extends Codec<infer A> ? A : never;

/**
 * A codec produced from a type descriptor. Its metadata is computed on
 * first access and cached for the life of the process.
 */
export interface DerivedCodec<A> extends Codec<A> {
  readonly descriptor: TypeDescriptor;
  readonly meta: TypeMeta;
  /** The `(field, value)` member this codec writes at the front of its objects, if any. */
  readonly typeHint: TypeHint | undefined;
}

// ============================================================================
// Descriptors
// ============================================================================

/** Type-hint configuration as written on a descriptor. Either half may be omitted. */
export interface TypeHintOptions {
  readonly field?: string;
  readonly value?: string;
}

/**
 * The untyped view of one declared field, as the metadata cache reads it.
 */
export interface FieldDeclaration {
  /** Property name on the TypeScript value. */
  readonly key: string;
  /** JSON member name; defaults to `key`. */
  readonly name?: string;
  /** Fallback for a missing or ignored field. */
  readonly default?: () => unknown;
  readonly embedded?: boolean;
  readonly ignored?: boolean;
}

/**
 * Identity of a type for metadata purposes. The metadata cache is keyed by
 * the descriptor object itself, so a descriptor should be created once and
 * shared.
 */
export interface TypeDescriptor {
  readonly name: string;
  readonly typeHint?: TypeHintOptions;
  readonly fields?: ReadonlyArray<FieldDeclaration>;
}

// ============================================================================
// Metadata
// ============================================================================

/** A discriminator member: `{ [field]: value }`. */
export interface TypeHint {
  readonly field: string;
  readonly value: string;
}

/** Normalized, validated field metadata. */
export interface FieldMeta {
  readonly key: string;
  readonly name: string;
  readonly default?: () => unknown;
  readonly embedded: boolean;
  readonly ignored: boolean;
}

export interface TypeMeta {
  readonly name: string;
  /** Declaration order. */
  readonly fields: ReadonlyArray<FieldMeta>;
  readonly typeHint?: TypeHint;
}
