/**
 * Entry points between codecs and JSON text or plain JS values.
 */

import { isValid } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import { fromNative, parseJson, renderCompact, toNative } from "@shapecodec/json";
import { DecodeFailure } from "./errors.js";
import type { Codec, DecodeResult } from "./types.js";

export function encodeToString<A>(codec: Codec<A>, value: A): string {
  return renderCompact(codec.encode(value));
}

/**
 * Parse then decode.
 *
 * @throws JsonParseError when `text` is not JSON
 */
export function decodeString<A>(codec: Codec<A>, text: string): DecodeResult<A> {
  return codec.decode(parseJson(text));
}

/**
 * Decode, throwing a `DecodeFailure` with every error when the tree does not match.
 */
export function decodeOrThrow<A>(codec: Codec<A>, json: Json): A {
  const result = codec.decode(json);
  if (isValid(result)) return result.value;
  throw new DecodeFailure(result.error);
}

/** `decodeString` that throws a `DecodeFailure` on mismatch. */
export function parseAndDecode<A>(codec: Codec<A>, text: string): A {
  return decodeOrThrow(codec, parseJson(text));
}

/** Encode to a plain value suitable for `JSON.stringify`. */
export function encodeToNative<A>(codec: Codec<A>, value: A): unknown {
  return toNative(codec.encode(value));
}

/**
 * Decode a plain value, such as the output of `JSON.parse`.
 *
 * @throws JsonConversionError when `value` has no JSON representation
 */
export function decodeNative<A>(codec: Codec<A>, value: unknown): DecodeResult<A> {
  return codec.decode(fromNative(value));
}
