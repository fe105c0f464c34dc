/**
 * Singleton codecs: a type with exactly one value is represented by its type
 * hint alone.
 */

import { CodecConfigError, config, createLogger } from "@shapecodec/core";
import { invalidNel, validNel } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import { JsonString, isObject, isString, lookup, obj } from "@shapecodec/json";
import { at, invalidValue, missingTypeField, shapeError } from "./errors.js";
import { defaultValueFromTypeName, metadataFor } from "./metadata.js";
import type { SumDescriptor } from "./type-switch.js";
import type { DecodeResult, DerivedCodec, TypeDescriptor, TypeHint } from "./types.js";

const log = createLogger("singleton");

/** A singleton written as a bare JSON string. */
export interface SingletonCodec<A> extends DerivedCodec<A> {
  /** The JSON string standing for `value`. */
  readonly literal: string;
  readonly value: A;
}

export interface SingletonSwitchCodec<T> extends DerivedCodec<T> {
  /** Every accepted string, in member order. */
  readonly literals: ReadonlyArray<string>;
}

/** What `singletonSwitch` needs from each member. */
export interface SingletonMember<T> {
  readonly literal: string;
  readonly value: T;
}

/**
 * The hint a singleton writes: its configured hint, or the default type
 * field paired with the type name. Resolved once, on first use.
 */
function singletonHint(descriptor: TypeDescriptor): () => TypeHint {
  let resolved: TypeHint | undefined;
  return () => {
    if (resolved === undefined) {
      const meta = metadataFor(descriptor);
      resolved = meta.typeHint ?? {
        field: config.defaultTypeField(),
        value: defaultValueFromTypeName(meta.name),
      };
    }
    return resolved;
  };
}

/**
 * Encodes `value` as a bare JSON string and accepts only that string.
 *
 * @example
 * ```typescript
 * const Stopped = singletonCodec(defineType("Stopped"), { state: "stopped" } as const);
 * encodeToString(Stopped, { state: "stopped" }); // "\"Stopped\""
 * ```
 */
export function singletonCodec<A>(descriptor: TypeDescriptor, value: A): SingletonCodec<A> {
  const hintOf = singletonHint(descriptor);
  return {
    descriptor,
    value,

    get literal() {
      return hintOf().value;
    },

    get meta() {
      return metadataFor(descriptor);
    },

    // Written as a bare string, never as a member of an object
    typeHint: undefined,

    encode(): Json {
      return JsonString(hintOf().value);
    },

    decode(json: Json): DecodeResult<A> {
      const expected = hintOf().value;
      if (isString(json) && json.value === expected) {
        return validNel(value);
      }
      return invalidNel(shapeError(`JSON string \`${expected}\``, json));
    },
  };
}

/**
 * Encodes `value` as `{ [typeField]: typeValue }`, so it can sit beside
 * object-shaped alternatives in a type switch.
 */
export function objectSingletonCodec<A>(descriptor: TypeDescriptor, value: A): DerivedCodec<A> {
  const hintOf = singletonHint(descriptor);
  return {
    descriptor,

    get meta() {
      return metadataFor(descriptor);
    },

    get typeHint() {
      return hintOf();
    },

    encode(): Json {
      const hint = hintOf();
      return obj([hint.field, JsonString(hint.value)]);
    },

    decode(json: Json): DecodeResult<A> {
      if (!isObject(json)) {
        return invalidNel(shapeError("object", json));
      }
      const hint = hintOf();
      const tag = lookup(json, hint.field);
      if (tag === undefined || !isString(tag)) {
        return invalidNel(missingTypeField(hint.field));
      }
      if (tag.value !== hint.value) {
        return invalidNel(at(hint.field, invalidValue([hint.value], tag.value)));
      }
      return validNel(value);
    },
  };
}

/**
 * A codec for a closed set of bare-string singletons. Each member is written
 * as its own string and only those strings decode.
 *
 * @example
 * ```typescript
 * const PhaseCodec = singletonSwitch(defineSum<Phase>("Phase"), [Running, Stopped]);
 * encodeToString(PhaseCodec, STOPPED); // "\"Stopped\""
 * ```
 *
 * @throws CodecConfigError when two members share a string
 */
export function singletonSwitch<T>(
  descriptor: SumDescriptor<T>,
  members: ReadonlyArray<SingletonMember<NoInfer<T>>>,
): SingletonSwitchCodec<T> {
  const meta = metadataFor(descriptor);
  const byLiteral = new Map<string, SingletonMember<T>>();
  const byValue = new Map<T, string>();

  for (const member of members) {
    const { literal, value } = member;
    const existing = byLiteral.get(literal);
    if (existing !== undefined && existing.value !== value) {
      throw new CodecConfigError(
        meta.name,
        "duplicate_discriminator",
        `string \`${literal}\` is claimed by two singletons`,
      );
    }
    byLiteral.set(literal, member);
    byValue.set(value, literal);
  }

  const literals = [...byLiteral.keys()];
  log.debug(`${meta.name}: ${literals.join(", ")}`);

  return {
    descriptor,
    literals,

    get meta() {
      return metadataFor(descriptor);
    },

    typeHint: undefined,

    encode(value: T): Json {
      const literal = byValue.get(value);
      if (literal === undefined) {
        throw new CodecConfigError(
          meta.name,
          "unregistered_variant",
          "value is not a registered singleton",
        );
      }
      return JsonString(literal);
    },

    decode(json: Json): DecodeResult<T> {
      if (!isString(json)) {
        return invalidNel(shapeError("string", json));
      }
      const member = byLiteral.get(json.value);
      if (member === undefined) {
        return invalidNel(invalidValue(literals, json.value));
      }
      return validNel(member.value);
    },
  };
}
