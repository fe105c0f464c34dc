/**
 * Programmer errors.
 *
 * These signal a defect in how a codec was assembled. They are thrown, never
 * returned through a decode result, and are not meant to be caught by
 * application code handling bad input.
 */

/** Reason codes for codec configuration failures. */
export type CodecConfigErrorReason =
  | "ignored_without_default"
  | "embedded_and_ignored"
  | "duplicate_field_name"
  | "field_shadows_type_hint"
  | "duplicate_discriminator"
  | "discriminator_field_mismatch"
  | "unregistered_variant"
  | "bare_string_alternative"
  | "unknown_enum_member"
  | "invalid_descriptor";

/** Error thrown when a type descriptor or codec is assembled incorrectly. */
export class CodecConfigError extends Error {
  constructor(
    readonly typeName: string,
    readonly reason: CodecConfigErrorReason,
    message: string,
  ) {
    super(`${typeName}: ${message}`);
    this.name = "CodecConfigError";
  }
}
