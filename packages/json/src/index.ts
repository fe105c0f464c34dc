/**
 * @shapecodec/json: the JSON tree the codecs read and write.
 *
 * @example
 * ```typescript
 * import { parseJson, renderCompact } from "@shapecodec/json";
 *
 * const tree = parseJson('{"b":1,"a":2,"b":3}');
 * renderCompact(tree); // '{"b":1,"a":2,"b":3}'
 * ```
 *
 * @packageDocumentation
 */

export type {
  Json,
  JsonKind,
  JsonMember,
} from "./types.js";

export {
  JsonNull,
  JsonBoolean,
  JsonNumber,
  JsonString,
  JsonArray,
  JsonObject,
  obj,
  isNull,
  isBoolean,
  isNumber,
  isString,
  isArray,
  isObject,
  kindOf,
  lookup,
  firstKey,
  prepend,
  equals,
} from "./types.js";

export { renderCompact, renderTruncated } from "./render.js";

export { parseJson, JsonParseError } from "./parse.js";

export { fromNative, toNative, JsonConversionError } from "./native.js";
