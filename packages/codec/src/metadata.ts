/**
 * Type Metadata Cache
 *
 * Structural metadata (field names, defaults, flags, type hint) is computed
 * from a descriptor once and reused by every encode and decode of that type.
 * Entries are keyed by descriptor identity and never invalidated.
 *
 * @example
 * ```typescript
 * const Stopped = defineType("Stopped", { typeHint: { field: "state" } });
 * metadataFor(Stopped).typeHint; // { field: "state", value: "Stopped" }
 * ```
 */

import { CodecConfigError, config, createLogger } from "@shapecodec/core";
import type {
  FieldDeclaration,
  FieldMeta,
  TypeDescriptor,
  TypeHint,
  TypeHintOptions,
  TypeMeta,
} from "./types.js";

const log = createLogger("metadata");

// ============================================================================
// Descriptors
// ============================================================================

/**
 * Create a descriptor for a type with no fields of its own (singletons, sums).
 */
export function defineType(
  name: string,
  options: { typeHint?: TypeHintOptions } = {},
): TypeDescriptor {
  return Object.freeze({ name, typeHint: options.typeHint });
}

/**
 * The discriminator value a type gets when it configures a field but no value.
 * Every `$` is removed, so nested or generated names such as `Outer$Inner$`
 * become `OuterInner`.
 */
export function defaultValueFromTypeName(name: string): string {
  return name.replace(/\$/g, "");
}

// ============================================================================
// Computation
// ============================================================================

function resolveTypeHint(
  name: string,
  options: TypeHintOptions | undefined,
  defaultField: string,
): TypeHint | undefined {
  if (options === undefined) return undefined;

  const { field, value } = options;
  if (field === "" || value === "") {
    throw new CodecConfigError(
      name,
      "invalid_descriptor",
      "type hint field and value must be non-empty",
    );
  }

  if (field !== undefined && value !== undefined) return { field, value };
  if (value !== undefined) return { field: defaultField, value };
  if (field !== undefined) return { field, value: defaultValueFromTypeName(name) };
  return undefined;
}

function normalizeField(typeName: string, declaration: FieldDeclaration): FieldMeta {
  const name = declaration.name ?? declaration.key;
  const embedded = declaration.embedded === true;
  const ignored = declaration.ignored === true;

  if (name.length === 0) {
    throw new CodecConfigError(
      typeName,
      "invalid_descriptor",
      `field \`${declaration.key}\` has an empty JSON name`,
    );
  }
  if (ignored && declaration.default === undefined) {
    throw new CodecConfigError(
      typeName,
      "ignored_without_default",
      `field \`${declaration.key}\` is ignored but has no default`,
    );
  }
  if (embedded && ignored) {
    throw new CodecConfigError(
      typeName,
      "embedded_and_ignored",
      `field \`${declaration.key}\` cannot be both embedded and ignored`,
    );
  }

  return Object.freeze(
    { key: declaration.key, name, default: declaration.default, embedded, ignored },
  );
}

/**
 * Validate a descriptor and build its metadata. Does not consult any cache.
 *
 * @throws CodecConfigError for a malformed descriptor
 */
export function computeTypeMeta(descriptor: TypeDescriptor, defaultField: string): TypeMeta {
  const typeName = descriptor.name;
  if (typeof typeName !== "string" || typeName.length === 0) {
    throw new CodecConfigError(
      "<anonymous>",
      "invalid_descriptor",
      "a type descriptor needs a name",
    );
  }

  const typeHint = resolveTypeHint(typeName, descriptor.typeHint, defaultField);
  const fields = (descriptor.fields ?? []).map((d) => normalizeField(typeName, d));

  const seen = new Set<string>();
  for (const field of fields) {
    if (field.embedded || field.ignored) continue;
    if (seen.has(field.name)) {
      throw new CodecConfigError(
        typeName,
        "duplicate_field_name",
        `JSON name \`${field.name}\` is used twice`,
      );
    }
    if (typeHint !== undefined && field.name === typeHint.field) {
      throw new CodecConfigError(
        typeName,
        "field_shadows_type_hint",
        `field \`${field.key}\` is written as \`${field.name}\`, which is the type hint field`,
      );
    }
    seen.add(field.name);
  }

  return Object.freeze({ name: typeName, fields: Object.freeze(fields), typeHint });
}

// ============================================================================
// Cache
// ============================================================================

/**
 * Memoizes `computeTypeMeta` per descriptor.
 *
 * Lookups are synchronous, so concurrent first accesses from different
 * async tasks all observe the single entry the first one stored.
 */
export class TypeMetadataCache {
  private readonly entries = new Map<TypeDescriptor, TypeMeta>();

  /** Statistics for cache monitoring */
  readonly stats = {
    hits: 0,
    misses: 0,
  };

  get size(): number {
    return this.entries.size;
  }

  has(descriptor: TypeDescriptor): boolean {
    return this.entries.has(descriptor);
  }

  /**
   * The metadata for `descriptor`, computing it on first request. The default
   * type field is read from configuration at that moment.
   */
  metadataFor(descriptor: TypeDescriptor): TypeMeta {
    const cached = this.entries.get(descriptor);
    if (cached !== undefined) {
      this.stats.hits++;
      return cached;
    }

    this.stats.misses++;
    const meta = computeTypeMeta(descriptor, config.defaultTypeField());
    this.entries.set(descriptor, meta);

    const hint = meta.typeHint ? ` hint ${meta.typeHint.field}=${meta.typeHint.value}` : "";
    log.debug(`computed ${meta.name}: ${meta.fields.length} field(s)${hint}`);
    return meta;
  }
}

/** The process-wide cache every derived codec reads through. */
export const globalMetadataCache = new TypeMetadataCache();

export function metadataFor(descriptor: TypeDescriptor): TypeMeta {
  return globalMetadataCache.metadataFor(descriptor);
}
