/**
 * Conversion between Json trees and plain JavaScript values.
 */

import type { Json } from "./types.js";
import { JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString } from "./types.js";

/** Error thrown when a JavaScript value has no JSON representation. */
export class JsonConversionError extends Error {
  constructor(
    readonly path: string,
    message: string,
  ) {
    super(path ? `${path}: ${message}` : message);
    this.name = "JsonConversionError";
  }
}

function hasToJSON(value: object): value is { toJSON(): unknown } {
  return "toJSON" in value && typeof value.toJSON === "function";
}

/**
 * Convert a JavaScript value to a Json tree, following JSON.stringify:
 * `toJSON()` is honoured, undefined object properties are skipped and
 * undefined array slots become null. Values JSON.stringify would silently
 * lose (NaN, Infinity, bigint, functions, symbols, cycles) throw.
 *
 * @throws JsonConversionError
 */
export function fromNative(value: unknown): Json {
  return convert(value, "", new Set());
}

function convert(value: unknown, path: string, ancestors: Set<object>): Json {
  switch (typeof value) {
    case "string":
      return JsonString(value);
    case "boolean":
      return JsonBoolean(value);
    case "number":
      if (!Number.isFinite(value)) {
        throw new JsonConversionError(path, `${value} has no JSON representation`);
      }
      return JsonNumber(value);
    case "object":
      if (value === null) return JsonNull;
      return convertObject(value, path, ancestors);
    default:
      throw new JsonConversionError(path, `a ${typeof value} has no JSON representation`);
  }
}

function convertObject(value: object, path: string, ancestors: Set<object>): Json {
  if (hasToJSON(value)) {
    return convert(value.toJSON(), path, ancestors);
  }
  if (ancestors.has(value)) {
    throw new JsonConversionError(path, "circular reference");
  }

  ancestors.add(value);
  try {
    if (Array.isArray(value)) {
      const items: unknown[] = value;
      return JsonArray(
        items.map((item, i) =>
          item === undefined ? JsonNull : convert(item, `${path}[${i}]`, ancestors),
        ),
      );
    }

    const members: [string, Json][] = [];
    for (const [key, item] of Object.entries(value)) {
      if (item === undefined) continue;
      members.push([key, convert(item, path ? `${path}.${key}` : key, ancestors)]);
    }
    return JsonObject(members);
  } finally {
    ancestors.delete(value);
  }
}

/**
 * Convert a Json tree to plain JavaScript values. When an object repeats a
 * key the last member wins, as with JSON.parse.
 */
export function toNative(json: Json): unknown {
  switch (json._tag) {
    case "JsonNull":
      return null;
    case "JsonBoolean":
    case "JsonNumber":
    case "JsonString":
      return json.value;
    case "JsonArray":
      return json.items.map(toNative);
    case "JsonObject":
      return Object.fromEntries(json.members.map(([k, v]) => [k, toNative(v)]));
  }
}
