/**
 * Compact rendering of Json trees.
 *
 * Members are written in order and duplicates are kept, so rendering a parsed
 * document gives back the same members (whitespace aside).
 */

import type { Json } from "./types.js";

/** Render without whitespace, like JSON.stringify with no indent. */
export function renderCompact(json: Json): string {
  switch (json._tag) {
    case "JsonNull":
      return "null";
    case "JsonBoolean":
      return json.value ? "true" : "false";
    case "JsonNumber":
      // NaN and the infinities have no JSON form; JSON.stringify writes null
      return Number.isFinite(json.value) ? String(json.value) : "null";
    case "JsonString":
      return JSON.stringify(json.value);
    case "JsonArray":
      return `[${json.items.map(renderCompact).join(",")}]`;
    case "JsonObject":
      return `{${json.members
        .map(([k, v]) => `${JSON.stringify(k)}:${renderCompact(v)}`)
        .join(",")}}`;
  }
}

/**
 * Render compactly, cutting the text to `maxLength` characters followed by
 * an ellipsis when it is longer.
 */
export function renderTruncated(json: Json, maxLength: number): string {
  const text = renderCompact(json);
  return text.length <= maxLength ? text : `${text.slice(0, maxLength)}…`;
}
