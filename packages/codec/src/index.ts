/**
 * @shapecodec/codec: derived JSON codecs for records and tagged unions.
 *
 * Describe a type once and get an encoder and an error-accumulating decoder:
 * renamed, defaulted, ignored and embedded fields for records, discriminator
 * dispatch for unions, and singleton/enum forms for closed sets of values.
 *
 * @packageDocumentation
 */

export type {
  Codec,
  DecodeResult,
  DerivedCodec,
  FieldDeclaration,
  FieldMeta,
  TypeDescriptor,
  TypeHint,
  TypeHintOptions,
  TypeMeta,
  TypeOf,
} from "./types.js";

export type {
  DecodeError,
  InvalidDiscriminatorError,
  InvalidValueError,
  MissingFieldError,
  PathSegment,
  ShapeError,
} from "./errors.js";
export {
  DecodeFailure,
  at,
  atPath,
  formatDecodeError,
  formatDecodeErrors,
  invalidDiscriminator,
  invalidValue,
  missingField,
  missingTypeField,
  renderPath,
  shapeError,
} from "./errors.js";

export {
  TypeMetadataCache,
  computeTypeMeta,
  defaultValueFromTypeName,
  defineType,
  globalMetadataCache,
  metadataFor,
} from "./metadata.js";

export {
  array,
  boolean,
  dictionary,
  imap,
  integer,
  json,
  lazy,
  nullable,
  number,
  optional,
  string,
} from "./base.js";

export type {
  FieldOptions,
  FieldSpec,
  FieldSpecs,
  ProductCodec,
  ProductDescriptor,
  ProductField,
  ProductOptions,
} from "./product.js";
export { defineProduct, describeProduct, productCodec, productField, tagField } from "./product.js";

export { ProductBuilder, product } from "./builder.js";

export type {
  SumDescriptor,
  TypeSelector,
  TypeSwitchCodec,
  VariantCodec,
  VariantCodecs,
} from "./type-switch.js";
export { defineSum, typeSwitch } from "./type-switch.js";

export type { SingletonCodec, SingletonMember, SingletonSwitchCodec } from "./singleton.js";
export { objectSingletonCodec, singletonCodec, singletonSwitch } from "./singleton.js";

export type { EnumMember } from "./enum.js";
export { enumCodec, literalCodec } from "./enum.js";

export {
  decodeNative,
  decodeOrThrow,
  decodeString,
  encodeToNative,
  encodeToString,
  parseAndDecode,
} from "./convert.js";
