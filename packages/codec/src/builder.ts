import type { FieldOptions, ProductCodec, ProductField, ProductOptions } from "./product.js";
import { productCodec, productField } from "./product.js";
import type { Codec, TypeHintOptions } from "./types.js";

/**
 * Fluent builder for product codecs.
 *
 * `build()` only type-checks once every property of `T` has a field, and a
 * property cannot be declared twice.
 *
 * ```ts
 * const codec = product<User>("User")
 *   .field("name", string)
 *   .field("email", optional(string), { default: undefined })
 *   .hint({ field: "kind" })
 *   .build();
 * ```
 */
export class ProductBuilder<T extends object, Declared extends keyof T = never> {
  /** Never set. Records which properties have been declared. */
  private readonly _declared?: (key: Declared) => Declared;

  private readonly _name: string;
  private readonly _fields: ReadonlyArray<ProductField<T>>;
  private readonly _options: ProductOptions<T>;

  constructor(
    name: string,
    fields: ReadonlyArray<ProductField<T>> = [],
    options: ProductOptions<T> = {},
  ) {
    this._name = name;
    this._fields = fields;
    this._options = options;
  }

  /** Declare the next field. Fields are encoded in declaration order. */
  field<K extends Exclude<keyof T, Declared> & string>(
    key: K,
    codec: Codec<T[K]>,
    options: FieldOptions<T[K]> = {},
  ): ProductBuilder<T, Declared | K> {
    const bound = productField<T, K>(key, { ...options, codec });
    return new ProductBuilder<T, Declared | K>(this._name, [...this._fields, bound], this._options);
  }

  /** Set the type hint written in front of every encoded object. */
  hint(typeHint: TypeHintOptions): ProductBuilder<T, Declared> {
    return new ProductBuilder<T, Declared>(
      this._name,
      this._fields,
      { ...this._options, typeHint },
    );
  }

  /** Build the final value from the decoded record. */
  construct(construct: (fields: T) => T): ProductBuilder<T, Declared> {
    return new ProductBuilder<T, Declared>(
      this._name,
      this._fields,
      { ...this._options, construct },
    );
  }

  /** Derive the codec. */
  build(this: ProductBuilder<T, keyof T>): ProductCodec<T> {
    return productCodec(
      Object.freeze({
        name: this._name,
        typeHint: this._options.typeHint,
        fields: this._fields,
        construct: this._options.construct,
      }),
    );
  }
}

/** Start a product builder. */
export function product<T extends object>(name: string): ProductBuilder<T> {
  return new ProductBuilder<T>(name);
}
