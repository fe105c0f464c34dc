/**
 * @shapecodec/codec Showcase
 *
 * Self-documenting examples of product codecs, type switches, singletons,
 * enums and error accumulation.
 *
 * Build: npm run build && node dist/packages/codec/examples/showcase.js
 */

import assert from "node:assert/strict";
import { isInvalid, isValid, NEL } from "@shapecodec/fp";
import {
  array,
  decodeString,
  defineProduct,
  defineSum,
  defineType,
  encodeToString,
  enumCodec,
  formatDecodeError,
  integer,
  number,
  objectSingletonCodec,
  optional,
  product,
  string,
  tagField,
  typeSwitch,
} from "../src/index.js";

// ============================================================================
// 1. PRODUCTS - Renamed, defaulted and ignored fields
// ============================================================================

interface User {
  name: string;
  age: number;
  nickname: string | undefined;
  sessionId: string;
}

const UserCodec = defineProduct<User>("User", {
  name: { codec: string },
  age: { codec: integer, name: "years" },
  nickname: { codec: optional(string), default: undefined },
  sessionId: { codec: string, ignored: true, default: "none" },
});

const ada: User = { name: "Ada", age: 36, nickname: undefined, sessionId: "test-session" };
assert.equal(encodeToString(UserCodec, ada), '{"name":"Ada","years":36,"nickname":null}');

const decoded = decodeString(UserCodec, '{"name":"Ada","years":36}');
assert.ok(isValid(decoded));
assert.deepEqual(decoded.value, { name: "Ada", age: 36, nickname: undefined, sessionId: "none" });

// ============================================================================
// 2. ERROR ACCUMULATION - Every bad field is reported, in declaration order
// ============================================================================

const bad = decodeString(UserCodec, '{"name":false,"years":"old"}');
assert.ok(isInvalid(bad));
assert.deepEqual(NEL.toArray(bad.error).map(formatDecodeError), [
  "name: string expected, got false",
  'years: integer expected, got "old"',
]);

// ============================================================================
// 3. TYPE SWITCH - Discriminated unions
// ============================================================================

interface Circle {
  kind: "circle";
  radius: number;
}
interface Rect {
  kind: "rect";
  width: number;
  height: number;
}
interface Empty {
  kind: "empty";
}
type Shape = Circle | Rect | Empty;

const EMPTY: Empty = { kind: "empty" };

const ShapeCodec = typeSwitch(defineSum<Shape>("Shape"), "kind", {
  circle: defineProduct<Circle>("Circle", { kind: tagField("circle"), radius: { codec: number } }),
  rect: product<Rect>("Rect")
    .field("kind", tagField("rect").codec, { ignored: true, default: "rect" })
    .field("width", number)
    .field("height", number)
    .build(),
  empty: objectSingletonCodec(defineType("Empty", { typeHint: { value: "empty" } }), EMPTY),
});

const drawing: Shape[] = [
  { kind: "circle", radius: 1 },
  { kind: "rect", width: 2, height: 3 },
  EMPTY,
];
const DrawingCodec = array(ShapeCodec);

const text = encodeToString(DrawingCodec, drawing);
assert.equal(
  text,
  '[{"type":"circle","radius":1},{"type":"rect","width":2,"height":3},{"type":"empty"}]',
);
assert.deepEqual(decodeString(DrawingCodec, text), { _tag: "Valid", value: drawing });

const unmatched = decodeString(ShapeCodec, '{"type":"hexagon"}');
assert.ok(isInvalid(unmatched));
assert.equal(formatDecodeError(unmatched.error.head), "invalid type value `hexagon`");

// ============================================================================
// 4. ENUMS - Members by name
// ============================================================================

enum Priority {
  Low,
  Normal,
  Urgent,
}

const PriorityCodec = enumCodec(Priority, "Priority");
assert.equal(encodeToString(PriorityCodec, Priority.Urgent), '"Urgent"');

const wrong = decodeString(PriorityCodec, '"urgent"');
assert.ok(isInvalid(wrong));
assert.equal(
  formatDecodeError(wrong.error.head),
  "one of `Low`, `Normal`, `Urgent` expected, got `urgent`",
);

console.log("showcase: all assertions passed");
