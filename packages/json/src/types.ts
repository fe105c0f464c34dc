/**
 * The JSON tree value.
 *
 * Unlike the objects JSON.parse produces, a JsonObject keeps its members in
 * source order and may repeat a key. Lookups return the first member.
 */

// ============================================================================
// Json Type Definition
// ============================================================================

export type Json = JsonNull | JsonBoolean | JsonNumber | JsonString | JsonArray | JsonObject;

export interface JsonNull {
  readonly _tag: "JsonNull";
}

export interface JsonBoolean {
  readonly _tag: "JsonBoolean";
  readonly value: boolean;
}

export interface JsonNumber {
  readonly _tag: "JsonNumber";
  readonly value: number;
}

export interface JsonString {
  readonly _tag: "JsonString";
  readonly value: string;
}

export interface JsonArray {
  readonly _tag: "JsonArray";
  readonly items: ReadonlyArray<Json>;
}

/** One `key: value` member of an object. */
export type JsonMember = readonly [key: string, value: Json];

export interface JsonObject {
  readonly _tag: "JsonObject";
  readonly members: ReadonlyArray<JsonMember>;
}

/** Human-readable name of each variant, used in error messages. */
export type JsonKind = "null" | "boolean" | "number" | "string" | "array" | "object";

// ============================================================================
// Constructors
// ============================================================================

export const JsonNull: JsonNull = { _tag: "JsonNull" };

export function JsonBoolean(value: boolean): JsonBoolean {
  return { _tag: "JsonBoolean", value };
}

export function JsonNumber(value: number): JsonNumber {
  return { _tag: "JsonNumber", value };
}

export function JsonString(value: string): JsonString {
  return { _tag: "JsonString", value };
}

export function JsonArray(items: ReadonlyArray<Json>): JsonArray {
  return { _tag: "JsonArray", items };
}

export function JsonObject(members: ReadonlyArray<JsonMember>): JsonObject {
  return { _tag: "JsonObject", members };
}

/**
 * Build an object from `[key, value]` pairs given as arguments.
 *
 * ```ts
 * obj(["type", JsonString("circle")], ["radius", JsonNumber(2)])
 * ```
 */
export function obj(...members: JsonMember[]): JsonObject {
  return JsonObject(members);
}

// ============================================================================
// Type Guards
// ============================================================================

export function isNull(json: Json): json is JsonNull {
  return json._tag === "JsonNull";
}

export function isBoolean(json: Json): json is JsonBoolean {
  return json._tag === "JsonBoolean";
}

export function isNumber(json: Json): json is JsonNumber {
  return json._tag === "JsonNumber";
}

export function isString(json: Json): json is JsonString {
  return json._tag === "JsonString";
}

export function isArray(json: Json): json is JsonArray {
  return json._tag === "JsonArray";
}

export function isObject(json: Json): json is JsonObject {
  return json._tag === "JsonObject";
}

// ============================================================================
// Operations
// ============================================================================

export function kindOf(json: Json): JsonKind {
  switch (json._tag) {
    case "JsonNull":
      return "null";
    case "JsonBoolean":
      return "boolean";
    case "JsonNumber":
      return "number";
    case "JsonString":
      return "string";
    case "JsonArray":
      return "array";
    case "JsonObject":
      return "object";
  }
}

/**
 * The value of the first member named `key`, or undefined.
 */
export function lookup(object: JsonObject, key: string): Json | undefined {
  for (const [k, v] of object.members) {
    if (k === key) return v;
  }
  return undefined;
}

/**
 * The first member's key, or undefined for an empty object.
 */
export function firstKey(object: JsonObject): string | undefined {
  return object.members.length > 0 ? object.members[0][0] : undefined;
}

/**
 * A new object with `member` placed in front of the existing members.
 */
export function prepend(object: JsonObject, member: JsonMember): JsonObject {
  return JsonObject([member, ...object.members]);
}

/**
 * Structural equality. Object members are compared in order, so two objects
 * with the same members in a different order are not equal.
 */
export function equals(a: Json, b: Json): boolean {
  switch (a._tag) {
    case "JsonNull":
      return b._tag === "JsonNull";
    case "JsonBoolean":
      return b._tag === "JsonBoolean" && b.value === a.value;
    case "JsonNumber":
      return b._tag === "JsonNumber" && b.value === a.value;
    case "JsonString":
      return b._tag === "JsonString" && b.value === a.value;
    case "JsonArray":
      return (
        b._tag === "JsonArray" &&
        b.items.length === a.items.length &&
        a.items.every((item, i) => equals(item, b.items[i]))
      );
    case "JsonObject":
      return (
        b._tag === "JsonObject" &&
        b.members.length === a.members.length &&
        a.members.every(([k, v], i) => b.members[i][0] === k && equals(v, b.members[i][1]))
      );
  }
}
