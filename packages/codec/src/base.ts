/**
 * Base codecs for JSON primitives and the common containers.
 */

import { Validated, invalidNel, validNel } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import {
  JsonArray,
  JsonBoolean,
  JsonNull,
  JsonNumber,
  JsonObject,
  JsonString,
  isArray,
  isBoolean,
  isNull,
  isNumber,
  isObject,
  isString,
} from "@shapecodec/json";
import type { DecodeError } from "./errors.js";
import { atPath, shapeError } from "./errors.js";
import type { Codec, DecodeResult } from "./types.js";

function fail<A>(error: DecodeError): DecodeResult<A> {
  return invalidNel(error);
}

// ============================================================================
// Primitives
// ============================================================================

export const string: Codec<string> = {
  encode: (value) => JsonString(value),
  decode: (json) => (isString(json) ? validNel(json.value) : fail(shapeError("string", json))),
};

export const number: Codec<number> = {
  encode: (value) => JsonNumber(value),
  decode: (json) => (isNumber(json) ? validNel(json.value) : fail(shapeError("number", json))),
};

export const integer: Codec<number> = {
  encode: (value) => JsonNumber(value),
  decode: (json) =>
    isNumber(json) && Number.isInteger(json.value)
      ? validNel(json.value)
      : fail(shapeError("integer", json)),
};

export const boolean: Codec<boolean> = {
  encode: (value) => JsonBoolean(value),
  decode: (json) => (isBoolean(json) ? validNel(json.value) : fail(shapeError("boolean", json))),
};

/** Passes the tree through untouched. */
export const json: Codec<Json> = {
  encode: (value) => value,
  decode: (value) => validNel(value),
};

// ============================================================================
// Combinators
// ============================================================================

/** `null` ⇄ JSON null, anything else through `codec`. */
export function nullable<A>(codec: Codec<A>): Codec<A | null> {
  return {
    encode: (value) => (value === null ? JsonNull : codec.encode(value)),
    decode: (json) => (isNull(json) ? validNel(null) : codec.decode(json)),
  };
}

/** `undefined` is written as JSON null and JSON null reads back as `undefined`. */
export function optional<A>(codec: Codec<A>): Codec<A | undefined> {
  return {
    encode: (value) => (value === undefined ? JsonNull : codec.encode(value)),
    decode: (json) => (isNull(json) ? validNel(undefined) : codec.decode(json)),
  };
}

/** Element errors are all reported, each under its index. */
export function array<A>(codec: Codec<A>): Codec<A[]> {
  return {
    encode: (values) => JsonArray(values.map((v) => codec.encode(v))),
    decode: (json) => {
      if (!isArray(json)) return fail(shapeError("array", json));
      return Validated.traverseNel(json.items, (item, i) => atPath(i, codec.decode(item)));
    },
  };
}

/**
 * String-keyed records. A key that appears more than once keeps its last
 * value, matching `JSON.parse`.
 */
export function dictionary<A>(codec: Codec<A>): Codec<Record<string, A>> {
  return {
    encode: (record) =>
      JsonObject(Object.entries(record).map(([k, v]) => [k, codec.encode(v)] as const)),
    decode: (json) => {
      if (!isObject(json)) return fail(shapeError("object", json));
      const entries = Validated.traverseNel(json.members, ([key, value]) =>
        atPath(
          key,
          Validated.map(codec.decode(value), (decoded) => [key, decoded] as const),
        ),
      );
      return Validated.map(entries, (pairs) => Object.fromEntries(pairs));
    },
  };
}

/** Defers to a codec built on first use, for recursive types. */
export function lazy<A>(thunk: () => Codec<A>): Codec<A> {
  let resolved: Codec<A> | undefined;
  const get = (): Codec<A> => (resolved ??= thunk());
  return {
    encode: (value) => get().encode(value),
    decode: (json) => get().decode(json),
  };
}

/** Carry a codec across an isomorphism. */
export function imap<A, B>(codec: Codec<A>, to: (a: A) => B, from: (b: B) => A): Codec<B> {
  return {
    encode: (value) => codec.encode(from(value)),
    decode: (json) => Validated.map(codec.decode(json), to),
  };
}
