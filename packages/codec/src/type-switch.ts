/**
 * Type-Switch Codec Generator
 *
 * A codec for a tagged union. Decoding reads the discriminator member of the
 * JSON object and hands the whole object to the matching alternative;
 * encoding picks the alternative from the value's TypeScript tag property
 * and makes sure the output leads with its discriminator.
 *
 * @example
 * ```typescript
 * type Shape = Circle | Square;
 *
 * const ShapeCodec = typeSwitch(defineSum<Shape>("Shape"), "kind", {
 *   circle: CircleCodec,
 *   square: SquareCodec,
 * });
 *
 * encodeToString(ShapeCodec, { kind: "circle", radius: 1 });
 * // {"type":"circle","radius":1}
 * ```
 */

import { CodecConfigError, config, createLogger } from "@shapecodec/core";
import { invalidNel } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import { JsonString, firstKey, isObject, isString, lookup, prepend } from "@shapecodec/json";
import { invalidDiscriminator, missingTypeField, shapeError } from "./errors.js";
import { metadataFor } from "./metadata.js";
import type {
  DecodeResult,
  DerivedCodec,
  TypeDescriptor,
  TypeHint,
  TypeHintOptions,
} from "./types.js";

const log = createLogger("type-switch");

// ============================================================================
// Types
// ============================================================================

/**
 * Descriptor of a union type. Only `typeHint.field` is consulted: it names
 * the discriminator member shared by every alternative.
 */
export interface SumDescriptor<T> extends TypeDescriptor {
  /** Never set. Ties the descriptor to the union it describes. */
  readonly _union?: (value: T) => T;
}

export function defineSum<T>(
  name: string,
  options: { typeHint?: TypeHintOptions } = {},
): SumDescriptor<T> {
  return Object.freeze({ name, typeHint: options.typeHint });
}

/**
 * What a type switch needs from an alternative's codec. `encode` is a method
 * so a codec for one member of `T` can stand in for the whole union.
 */
export interface VariantCodec<A, T> {
  encode(value: A): Json;
  decode(json: Json): DecodeResult<T>;
  /** The alternative's own discriminator, if it writes one. */
  readonly typeHint?: TypeHint;
  /** Set by nested type switches: every discriminator they accept. */
  readonly alternatives?: ReadonlyArray<TypeHint>;
  /** Set by bare-string singletons, which have no member to dispatch on. */
  readonly literal?: string;
  /** Set by singleton switches, for the same reason. */
  readonly literals?: ReadonlyArray<string>;
}

/** One codec per value of the tag property. */
export type VariantCodecs<T, K extends keyof T> = {
  readonly [V in T[K] & string]: VariantCodec<Extract<T, Record<K, V>>, T>;
};

/** An alternative bound to its variant tag and discriminator. */
export interface TypeSelector<T> {
  readonly tag: string;
  readonly hint: TypeHint;
  readonly codec: VariantCodec<T, T>;
}

export interface TypeSwitchCodec<T> extends DerivedCodec<T> {
  /** The discriminator member read on decode. */
  readonly field: string;
  readonly alternatives: ReadonlyArray<TypeHint>;
  readonly selectors: ReadonlyArray<TypeSelector<T>>;
}

// ============================================================================
// Generator
// ============================================================================

/**
 * Build a type switch over `T`, dispatching on the property `tagKey`.
 *
 * Each alternative is tagged with its codec's own type hint, or with
 * `(field, tag)` when it has none. An alternative that is itself a type
 * switch is reachable through every discriminator it accepts.
 *
 * Bare-string singletons are rejected: they carry no discriminator member.
 * A union made only of them is a `singletonSwitch`.
 *
 * @throws CodecConfigError when two alternatives claim one discriminator
 * value, an alternative tags itself with a different field, or an
 * alternative is written as a bare string
 */
export function typeSwitch<T, K extends keyof T & string>(
  descriptor: SumDescriptor<T>,
  tagKey: K,
  variants: VariantCodecs<T, K>,
): TypeSwitchCodec<T> {
  const meta = metadataFor(descriptor);
  const field = meta.typeHint?.field ?? config.defaultTypeField();

  const selectors: TypeSelector<T>[] = [];
  const byTag = new Map<string, TypeSelector<T>>();
  const byValue = new Map<string, TypeSelector<T>>();

  const checkField = (hint: TypeHint, tag: string): void => {
    if (hint.field !== field) {
      throw new CodecConfigError(
        meta.name,
        "discriminator_field_mismatch",
        `alternative \`${tag}\` is tagged by \`${hint.field}\` but the switch reads \`${field}\``,
      );
    }
  };

  const register = (value: string, selector: TypeSelector<T>): void => {
    const existing = byValue.get(value);
    if (existing === undefined) {
      byValue.set(value, selector);
    } else if (existing.codec !== selector.codec) {
      throw new CodecConfigError(
        meta.name,
        "duplicate_discriminator",
        `\`${field}\` value \`${value}\` is claimed by both ` +
          `\`${existing.tag}\` and \`${selector.tag}\``,
      );
    }
  };

  let tag: keyof VariantCodecs<T, K>;
  for (tag in variants) {
    const codec: VariantCodec<T, T> = variants[tag];
    if (codec.literal !== undefined || codec.literals !== undefined) {
      throw new CodecConfigError(
        meta.name,
        "bare_string_alternative",
        `alternative \`${tag}\` is written as a bare string`,
      );
    }
    const hint = codec.typeHint ?? { field, value: tag };
    checkField(hint, tag);

    const selector: TypeSelector<T> = { tag, hint, codec };
    selectors.push(selector);
    byTag.set(tag, selector);

    if (codec.alternatives !== undefined) {
      for (const alternative of codec.alternatives) {
        checkField(alternative, tag);
        register(alternative.value, selector);
      }
    } else {
      register(hint.value, selector);
    }
  }

  const alternatives = [...byValue.keys()].map((value) => ({ field, value }));

  const table = [...byValue].map(([value, s]) => `${value} → ${s.tag}`).join(", ");
  log.debug(`${meta.name} on \`${field}\`: ${table}`);

  return {
    descriptor,
    field,
    alternatives,
    selectors,

    get meta() {
      return metadataFor(descriptor);
    },

    // Alternatives write their own discriminators
    typeHint: undefined,

    encode(value: T): Json {
      const tag: unknown = value[tagKey];
      const selector = typeof tag === "string" ? byTag.get(tag) : undefined;
      if (selector === undefined) {
        throw new CodecConfigError(
          meta.name,
          "unregistered_variant",
          `no alternative registered for ${tagKey} \`${String(tag)}\``,
        );
      }

      const encoded = selector.codec.encode(value);
      if (!isObject(encoded) || firstKey(encoded) === selector.hint.field) {
        return encoded;
      }
      return prepend(encoded, [selector.hint.field, JsonString(selector.hint.value)]);
    },

    decode(json: Json): DecodeResult<T> {
      if (!isObject(json)) {
        return invalidNel(shapeError("object", json));
      }

      const tag = lookup(json, field);
      if (tag === undefined || !isString(tag)) {
        return invalidNel(missingTypeField(field));
      }

      const selector = byValue.get(tag.value);
      if (selector === undefined) {
        return invalidNel(invalidDiscriminator(field, tag.value));
      }
      return selector.codec.decode(json);
    },
  };
}
