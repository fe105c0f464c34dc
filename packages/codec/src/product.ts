/**
 * Product Codec Generator
 *
 * Derives a codec for a record type from one codec per field. Decoding
 * checks every field independently and reports all failures together, in
 * declaration order.
 *
 * @example
 * ```typescript
 * interface Person { name: string; age: number }
 *
 * const PersonCodec = defineProduct<Person>("Person", {
 *   name: { codec: string },
 *   age: { codec: integer, name: "years", default: 0 },
 * });
 *
 * encodeToString(PersonCodec, { name: "Ada", age: 36 }); // {"name":"Ada","years":36}
 * ```
 */

import { CodecConfigError, invariant } from "@shapecodec/core";
import { Validated, invalidNel, validNel } from "@shapecodec/fp";
import type { Json, JsonMember } from "@shapecodec/json";
import { JsonObject, JsonString, isObject, lookup } from "@shapecodec/json";
import { atPath, missingField, shapeError } from "./errors.js";
import { literalCodec } from "./enum.js";
import { metadataFor } from "./metadata.js";
import type {
  Codec,
  DecodeResult,
  DerivedCodec,
  FieldDeclaration,
  FieldMeta,
  TypeDescriptor,
  TypeHintOptions,
} from "./types.js";

// ============================================================================
// Field Specs
// ============================================================================

/**
 * How one property is read and written.
 *
 * A default is in effect whenever the `default` key is present, even when
 * its value is `undefined`. Arrays and plain objects in `default` are copied
 * for every decoded record; other objects are shared, so build those with
 * `defaultWith`.
 */
export interface FieldSpec<A> {
  readonly codec: Codec<A>;
  /** JSON member name; the property name when omitted. */
  readonly name?: string;
  readonly default?: A;
  /** Called for every decoded record that needs a default. Wins over `default`. */
  readonly defaultWith?: () => A;
  /** Splice the field's own object members into the parent object. */
  readonly embedded?: boolean;
  /** Never read or written; the value always comes from `default`. */
  readonly ignored?: boolean;
}

export type FieldOptions<A> = Omit<FieldSpec<A>, "codec">;

/** One spec for every property of `A`, optional properties included. */
export type FieldSpecs<A> = { readonly [K in keyof A]-?: FieldSpec<A[K]> };

/**
 * A field declaration bound to its codec. `encode` reads its own property
 * off the record.
 */
export interface ProductField<A> extends FieldDeclaration {
  readonly encode: (record: A) => Json;
  readonly decode: (json: Json) => DecodeResult<unknown>;
}

function isPlainObject(value: unknown): value is Record<string, unknown> {
  if (typeof value !== "object" || value === null) return false;
  const proto: unknown = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function copyDefault(value: unknown): unknown {
  if (Array.isArray(value)) return value.map(copyDefault);
  if (isPlainObject(value)) {
    return Object.fromEntries(Object.entries(value).map(([k, v]) => [k, copyDefault(v)]));
  }
  return value;
}

function defaultOf<A>(spec: FieldSpec<A>): (() => unknown) | undefined {
  if (spec.defaultWith !== undefined) return spec.defaultWith;
  if (!("default" in spec)) return undefined;
  const fallback = spec.default;
  return () => copyDefault(fallback);
}

export function productField<A, K extends keyof A & string>(
  key: K,
  spec: FieldSpec<A[K]>,
): ProductField<A> {
  const { codec } = spec;
  return {
    key,
    name: spec.name,
    default: defaultOf(spec),
    embedded: spec.embedded,
    ignored: spec.ignored,
    encode: (record) => codec.encode(record[key]),
    decode: codec.decode,
  };
}

/**
 * Spec for the TypeScript tag property of a union member. The property is
 * never written; on decode it is filled with `value`.
 */
export function tagField<V extends string>(value: V): FieldSpec<V> {
  return { codec: literalCodec([value]), ignored: true, default: value };
}

// ============================================================================
// Descriptor
// ============================================================================

export interface ProductOptions<A> {
  readonly typeHint?: TypeHintOptions;
  /** Build the final value from the decoded record, e.g. a class instance. */
  readonly construct?: (fields: A) => A;
}

export interface ProductDescriptor<A> extends TypeDescriptor {
  readonly fields: ReadonlyArray<ProductField<A>>;
  readonly construct?: (fields: A) => A;
}

/**
 * Build a product descriptor. Fields are declared in the order of the keys
 * of `fields`.
 */
export function describeProduct<A extends object>(
  name: string,
  fields: FieldSpecs<A>,
  options: ProductOptions<A> = {},
): ProductDescriptor<A> {
  const bound: ProductField<A>[] = [];
  for (const key in fields) {
    const spec: FieldSpec<A[typeof key]> = fields[key];
    bound.push(productField<A, typeof key>(key, spec));
  }
  return Object.freeze({
    name,
    typeHint: options.typeHint,
    fields: Object.freeze(bound),
    construct: options.construct,
  });
}

// ============================================================================
// Codec
// ============================================================================

export interface ProductCodec<A> extends DerivedCodec<A> {
  readonly descriptor: ProductDescriptor<A>;
}

function decodeField(
  field: FieldMeta,
  decode: (json: Json) => DecodeResult<unknown>,
  object: JsonObject,
): DecodeResult<unknown> {
  if (field.ignored) {
    invariant(field.default !== undefined, `ignored field \`${field.key}\` has no default`);
    return validNel(field.default());
  }
  if (field.embedded) {
    return decode(object);
  }
  const member = lookup(object, field.name);
  if (member === undefined) {
    return field.default ? validNel(field.default()) : invalidNel(missingField(field.name));
  }
  return atPath(field.name, decode(member));
}

/**
 * Derive the codec for a product descriptor.
 */
export function productCodec<A>(descriptor: ProductDescriptor<A>): ProductCodec<A> {
  const byKey = new Map(descriptor.fields.map((f) => [f.key, f] as const));
  const construct = descriptor.construct;

  const bindingFor = (field: FieldMeta): ProductField<A> => {
    const binding = byKey.get(field.key);
    if (binding === undefined) {
      throw new CodecConfigError(
        descriptor.name,
        "invalid_descriptor",
        `no codec for field \`${field.key}\``,
      );
    }
    return binding;
  };

  return {
    descriptor,

    get meta() {
      return metadataFor(descriptor);
    },

    get typeHint() {
      return metadataFor(descriptor).typeHint;
    },

    encode(value: A): Json {
      const meta = metadataFor(descriptor);
      const members: JsonMember[] = [];

      if (meta.typeHint) {
        members.push([meta.typeHint.field, JsonString(meta.typeHint.value)]);
      }

      for (const field of meta.fields) {
        if (field.ignored) continue;
        const encoded = bindingFor(field).encode(value);
        if (field.embedded) {
          // Non-object results of an embedded field are dropped
          if (isObject(encoded)) members.push(...encoded.members);
        } else {
          members.push([field.name, encoded]);
        }
      }

      return JsonObject(members);
    },

    decode(json: Json): DecodeResult<A> {
      if (!isObject(json)) {
        return invalidNel(shapeError("object", json));
      }

      const object: JsonObject = json;
      const meta = metadataFor(descriptor);
      const decoded = Validated.traverseNel(meta.fields, (field) =>
        Validated.map(
          decodeField(field, bindingFor(field).decode, object),
          (value) => [field.key, value] as const,
        ),
      );

      return Validated.map(decoded, (entries) => {
        // Every declared key is present once all fields decoded
        const record = Object.fromEntries(entries) as A;
        return construct ? construct(record) : record;
      });
    },
  };
}

/**
 * Describe and derive in one step.
 */
export function defineProduct<A extends object>(
  name: string,
  fields: FieldSpecs<A>,
  options: ProductOptions<A> = {},
): ProductCodec<A> {
  return productCodec(describeProduct(name, fields, options));
}
