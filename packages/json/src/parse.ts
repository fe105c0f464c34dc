/**
 * JSON text → Json tree.
 *
 * A recursive-descent reader over the input string. Object members keep
 * their source order and repeated keys are all retained.
 */

import type { Json, JsonMember } from "./types.js";
import { JsonArray, JsonBoolean, JsonNull, JsonNumber, JsonObject, JsonString } from "./types.js";

// ---------------------------------------------------------------------------
// Error reporting
// ---------------------------------------------------------------------------

/** Descriptive parse error with position context. */
export class JsonParseError extends Error {
  /** Zero-based position in the input where parsing failed. */
  readonly pos: number;
  /** What the parser expected at the failure position. */
  readonly expected: string;
  readonly line: number;
  readonly col: number;

  constructor(input: string, pos: number, expected: string) {
    const { line, col } = lineCol(input, pos);
    const snippet = input.slice(Math.max(0, pos - 10), pos + 20);
    super(`JSON parse error at line ${line}, col ${col}: expected ${expected}\n  ...${snippet}...`);
    this.name = "JsonParseError";
    this.pos = pos;
    this.expected = expected;
    this.line = line;
    this.col = col;
  }
}

/** Convert a zero-based offset to 1-based line/col. */
function lineCol(input: string, pos: number): { line: number; col: number } {
  let line = 1;
  let col = 1;
  for (let i = 0; i < pos && i < input.length; i++) {
    if (input[i] === "\n") {
      line++;
      col = 1;
    } else {
      col++;
    }
  }
  return { line, col };
}

// ---------------------------------------------------------------------------
// Reader
// ---------------------------------------------------------------------------

const NUMBER = /-?(?:0|[1-9]\d*)(?:\.\d+)?(?:[eE][+-]?\d+)?/y;
const HEX4 = /^[0-9a-fA-F]{4}$/;

const ESCAPES: Readonly<Record<string, string>> = {
  '"': '"',
  "\\": "\\",
  "/": "/",
  b: "\b",
  f: "\f",
  n: "\n",
  r: "\r",
  t: "\t",
};

class Reader {
  private pos = 0;

  constructor(private readonly input: string) {}

  readDocument(): Json {
    this.skipWhitespace();
    const value = this.readValue();
    this.skipWhitespace();
    if (this.pos !== this.input.length) {
      throw this.error("end of input");
    }
    return value;
  }

  private error(expected: string): JsonParseError {
    return new JsonParseError(this.input, this.pos, expected);
  }

  private skipWhitespace(): void {
    while (this.pos < this.input.length) {
      const c = this.input[this.pos];
      if (c !== " " && c !== "\t" && c !== "\n" && c !== "\r") break;
      this.pos++;
    }
  }

  private expectChar(c: string): void {
    if (this.input[this.pos] !== c) {
      throw this.error(JSON.stringify(c));
    }
    this.pos++;
  }

  private readLiteral<T extends Json>(word: string, value: T): T {
    if (!this.input.startsWith(word, this.pos)) {
      throw this.error(word);
    }
    this.pos += word.length;
    return value;
  }

  private readValue(): Json {
    switch (this.input[this.pos]) {
      case "{":
        return this.readObject();
      case "[":
        return this.readArray();
      case '"':
        return JsonString(this.readString());
      case "t":
        return this.readLiteral("true", JsonBoolean(true));
      case "f":
        return this.readLiteral("false", JsonBoolean(false));
      case "n":
        return this.readLiteral("null", JsonNull);
      default:
        return this.readNumber();
    }
  }

  private readNumber(): Json {
    NUMBER.lastIndex = this.pos;
    const match = NUMBER.exec(this.input);
    if (!match) {
      throw this.error("a JSON value");
    }
    this.pos += match[0].length;
    return JsonNumber(Number(match[0]));
  }

  private readString(): string {
    this.expectChar('"');
    let out = "";

    for (;;) {
      if (this.pos >= this.input.length) {
        throw this.error('closing "');
      }
      const c = this.input[this.pos];

      if (c === '"') {
        this.pos++;
        return out;
      }

      if (c === "\\") {
        const escape = this.input[this.pos + 1];
        if (escape === "u") {
          const hex = this.input.slice(this.pos + 2, this.pos + 6);
          if (!HEX4.test(hex)) {
            this.pos += 2;
            throw this.error("4 hex digits");
          }
          out += String.fromCharCode(parseInt(hex, 16));
          this.pos += 6;
          continue;
        }
        const decoded = escape === undefined ? undefined : ESCAPES[escape];
        if (decoded === undefined) {
          this.pos++;
          throw this.error("escape character");
        }
        out += decoded;
        this.pos += 2;
        continue;
      }

      if (c < " ") {
        throw this.error("escaped control character");
      }
      out += c;
      this.pos++;
    }
  }

  private readArray(): Json {
    this.expectChar("[");
    const items: Json[] = [];
    this.skipWhitespace();

    if (this.input[this.pos] === "]") {
      this.pos++;
      return JsonArray(items);
    }

    for (;;) {
      this.skipWhitespace();
      items.push(this.readValue());
      this.skipWhitespace();
      if (this.input[this.pos] === ",") {
        this.pos++;
        continue;
      }
      if (this.input[this.pos] === "]") {
        this.pos++;
        return JsonArray(items);
      }
      throw this.error('"," or "]"');
    }
  }

  private readObject(): Json {
    this.expectChar("{");
    const members: JsonMember[] = [];
    this.skipWhitespace();

    if (this.input[this.pos] === "}") {
      this.pos++;
      return JsonObject(members);
    }

    for (;;) {
      this.skipWhitespace();
      if (this.input[this.pos] !== '"') {
        throw this.error("member name");
      }
      const key = this.readString();
      this.skipWhitespace();
      this.expectChar(":");
      this.skipWhitespace();
      members.push([key, this.readValue()]);
      this.skipWhitespace();
      if (this.input[this.pos] === ",") {
        this.pos++;
        continue;
      }
      if (this.input[this.pos] === "}") {
        this.pos++;
        return JsonObject(members);
      }
      throw this.error('"," or "}"');
    }
  }
}

/**
 * Parse JSON text, keeping member order and duplicate keys.
 *
 * @throws JsonParseError on malformed input
 */
export function parseJson(text: string): Json {
  return new Reader(text).readDocument();
}
