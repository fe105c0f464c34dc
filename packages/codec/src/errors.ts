/**
 * Decode errors.
 *
 * Every error carries the path from the root of the decoded tree to the
 * offending value and a human-readable message. Errors are data: a decoder
 * returns them inside an `Invalid`, it never throws them.
 */

import { config } from "@shapecodec/core";
import type { NonEmptyList } from "@shapecodec/fp";
import { NEL, Validated } from "@shapecodec/fp";
import type { Json } from "@shapecodec/json";
import { renderTruncated } from "@shapecodec/json";
import type { DecodeResult } from "./types.js";

// ============================================================================
// Error Types
// ============================================================================

/** A field name or an array index. */
export type PathSegment = string | number;

interface DecodeErrorBase {
  readonly path: ReadonlyArray<PathSegment>;
  readonly message: string;
}

/** The JSON value had the wrong kind, e.g. a number where an object was expected. */
export interface ShapeError extends DecodeErrorBase {
  readonly _tag: "ShapeError";
  readonly expected: string;
  readonly actual: Json;
}

/** A required member was absent. `discriminator` marks a missing type-hint field. */
export interface MissingFieldError extends DecodeErrorBase {
  readonly _tag: "MissingFieldError";
  readonly field: string;
  readonly discriminator: boolean;
}

/** A discriminator value no alternative is registered under. */
export interface InvalidDiscriminatorError extends DecodeErrorBase {
  readonly _tag: "InvalidDiscriminatorError";
  readonly field: string;
  readonly value: string;
}

/** A string outside a closed set of accepted values. */
export interface InvalidValueError extends DecodeErrorBase {
  readonly _tag: "InvalidValueError";
  readonly expected: ReadonlyArray<string>;
  readonly actual: string;
}

export type DecodeError =
  | ShapeError
  | MissingFieldError
  | InvalidDiscriminatorError
  | InvalidValueError;

// ============================================================================
// Constructors
// ============================================================================

export function shapeError(expected: string, actual: Json): ShapeError {
  return {
    _tag: "ShapeError",
    path: [],
    expected,
    actual,
    message: `${expected} expected, got ${renderTruncated(actual, config.maxRenderLength())}`,
  };
}

export function missingField(field: string): MissingFieldError {
  return {
    _tag: "MissingFieldError",
    path: [],
    field,
    discriminator: false,
    message: `missing field \`${field}\``,
  };
}

export function missingTypeField(field: string): MissingFieldError {
  return {
    _tag: "MissingFieldError",
    path: [],
    field,
    discriminator: true,
    message: `missing type field \`${field}\``,
  };
}

export function invalidDiscriminator(field: string, value: string): InvalidDiscriminatorError {
  return {
    _tag: "InvalidDiscriminatorError",
    path: [],
    field,
    value,
    message: `invalid type value \`${value}\``,
  };
}

export function invalidValue(expected: ReadonlyArray<string>, actual: string): InvalidValueError {
  const wanted =
    expected.length === 1
      ? `\`${expected[0]}\``
      : `one of ${expected.map((e) => `\`${e}\``).join(", ")}`;
  return {
    _tag: "InvalidValueError",
    path: [],
    expected,
    actual,
    message: `${wanted} expected, got \`${actual}\``,
  };
}

// ============================================================================
// Paths
// ============================================================================

/** Prefix a segment onto an error's path. */
export function at<E extends DecodeError>(segment: PathSegment, error: E): E {
  return { ...error, path: [segment, ...error.path] };
}

/** Prefix a segment onto the path of every error in a result. */
export function atPath<A>(segment: PathSegment, result: DecodeResult<A>): DecodeResult<A> {
  return Validated.mapError(result, (errors) => NEL.map(errors, (e) => at(segment, e)));
}

/** Render a path as `a.b[2].c`. */
export function renderPath(path: ReadonlyArray<PathSegment>): string {
  let out = "";
  for (const segment of path) {
    if (typeof segment === "number") {
      out += `[${segment}]`;
    } else {
      out += out.length > 0 ? `.${segment}` : segment;
    }
  }
  return out;
}

// ============================================================================
// Formatting
// ============================================================================

/** `path: message`, or just the message for an error at the root. */
export function formatDecodeError(error: DecodeError): string {
  return error.path.length > 0 ? `${renderPath(error.path)}: ${error.message}` : error.message;
}

/** One formatted error per line. */
export function formatDecodeErrors(errors: NonEmptyList<DecodeError>): string {
  return NEL.toArray(errors).map(formatDecodeError).join("\n");
}

/**
 * Thrown by the `...OrThrow` helpers when decoding fails.
 */
export class DecodeFailure extends Error {
  readonly errors: ReadonlyArray<DecodeError>;

  constructor(errors: NonEmptyList<DecodeError>) {
    const list = NEL.toArray(errors);
    const lines = list.map((e) => `  - ${formatDecodeError(e)}`).join("\n");
    super(`Decoding failed with ${list.length} error(s):\n${lines}`);
    this.name = "DecodeFailure";
    this.errors = list;
  }
}
