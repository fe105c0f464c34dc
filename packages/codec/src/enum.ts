/**
 * Codecs for closed sets of names: TypeScript enums and string-literal unions.
 * Members are written as their name and matched case-sensitively.
 */

import { CodecConfigError } from "@shapecodec/core";
import { invalidNel, validNel } from "@shapecodec/fp";
import { JsonString, isString } from "@shapecodec/json";
import { invalidValue, shapeError } from "./errors.js";
import type { Codec } from "./types.js";

/** The member type of an enum object, without numeric reverse-mapping keys. */
export type EnumMember<E> = E[Extract<keyof E, string>];

/** Numeric enums also carry `value → name` entries; those keys are numeric. */
function isReverseMapping(key: string): boolean {
  return key.length > 0 && !Number.isNaN(Number(key));
}

/**
 * Codec for a TypeScript `enum` object.
 *
 * @example
 * ```typescript
 * enum Color { Red, Green, Blue }
 * const ColorCodec = enumCodec(Color);
 * ColorCodec.encode(Color.Green); // JsonString("Green")
 * ```
 */
export function enumCodec<E extends Record<string, string | number>>(
  enumObject: E,
  typeName = "enum",
): Codec<EnumMember<E>> {
  const byName = new Map<string, EnumMember<E>>();
  const byMember = new Map<EnumMember<E>, string>();

  for (const key in enumObject) {
    if (isReverseMapping(key)) continue;
    const member = enumObject[key];
    byName.set(key, member);
    byMember.set(member, key);
  }

  const names = [...byName.keys()];

  return {
    encode: (member) => {
      const name = byMember.get(member);
      if (name === undefined) {
        throw new CodecConfigError(
          typeName,
          "unknown_enum_member",
          `\`${String(member)}\` is not a member`,
        );
      }
      return JsonString(name);
    },
    decode: (json) => {
      if (!isString(json)) return invalidNel(shapeError("string", json));
      const member = byName.get(json.value);
      return member === undefined ? invalidNel(invalidValue(names, json.value)) : validNel(member);
    },
  };
}

/**
 * Codec for a union of string literals.
 *
 * @example
 * ```typescript
 * const Direction = literalCodec(["north", "south"] as const);
 * // Codec<"north" | "south">
 * ```
 */
export function literalCodec<V extends string>(values: ReadonlyArray<V>): Codec<V> {
  const isMember = (s: string): s is V => values.some((v) => v === s);

  return {
    encode: (value) => JsonString(value),
    decode: (json) => {
      if (!isString(json)) return invalidNel(shapeError("string", json));
      const value = json.value;
      return isMember(value) ? validNel(value) : invalidNel(invalidValue(values, value));
    },
  };
}
