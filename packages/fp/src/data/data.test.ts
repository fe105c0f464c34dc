/**
 * Data Types Tests - NonEmptyList, Validated
 */
import { describe, it, expect } from "vitest";
import * as NEL from "./nonempty-list.js";
import {
  Valid,
  Invalid,
  validNel,
  invalidNel,
  isValid,
  isInvalid,
  map,
  mapError,
  map2Nel,
  map3Nel,
  sequenceNel,
  traverseNel,
} from "./validated.js";
import type { ValidatedNel } from "./validated.js";

// ============================================================================
// NonEmptyList Tests
// ============================================================================

describe("NonEmptyList", () => {
  it("of keeps head and tail in order", () => {
    const nel = NEL.of(1, 2, 3);
    expect(nel.head).toBe(1);
    expect(nel.tail).toEqual([2, 3]);
  });

  it("concat preserves order across both lists", () => {
    const joined = NEL.concat(NEL.of("a", "b"), NEL.of("c", "d"));
    expect(NEL.toArray(joined)).toEqual(["a", "b", "c", "d"]);
  });

  it("map applies to every element", () => {
    expect(NEL.toArray(NEL.map(NEL.of(1, 2), (n) => n * 10))).toEqual([10, 20]);
  });
});

// ============================================================================
// Validated Tests
// ============================================================================

describe("Validated", () => {
  describe("constructors and guards", () => {
    it("Valid and Invalid are distinguished by tag", () => {
      expect(isValid(Valid(1))).toBe(true);
      expect(isInvalid(Invalid("e"))).toBe(true);
    });

    it("invalidNel wraps a single error", () => {
      const v = invalidNel<string, number>("boom");
      expect(v).toEqual({ _tag: "Invalid", error: NEL.singleton("boom") });
    });
  });

  describe("operations", () => {
    it("map only touches Valid values", () => {
      expect(map(Valid(2), (n: number) => n + 1)).toEqual(Valid(3));
      expect(map(Invalid<string, number>("e"), (n) => n + 1)).toEqual(Invalid("e"));
    });

    it("mapError only touches Invalid values", () => {
      expect(mapError(Invalid("e"), (e: string) => e.toUpperCase())).toEqual(Invalid("E"));
      expect(mapError(Valid<string, number>(1), (e) => e.length)).toEqual(Valid(1));
    });
  });

  describe("error accumulation", () => {
    it("map2Nel accumulates both errors in argument order", () => {
      const r = map2Nel(
        invalidNel<string, number>("left"),
        invalidNel<string, number>("right"),
        (a, b) => a + b,
      );
      expect(r).toEqual(Invalid(NEL.of("left", "right")));
    });

    it("map3Nel combines three valid values", () => {
      const r = map3Nel(
        validNel<string, number>(1),
        validNel<string, string>("x"),
        validNel<string, boolean>(true),
        (a, b, c) => `${a}${b}${c}`,
      );
      expect(r).toEqual(Valid("1xtrue"));
    });

    it("sequenceNel collects every error and drops the values", () => {
      const inputs: ValidatedNel<string, number>[] = [
        validNel(1),
        invalidNel("a"),
        validNel(2),
        Invalid(NEL.of("b", "c")),
      ];
      expect(sequenceNel(inputs)).toEqual(Invalid(NEL.of("a", "b", "c")));
    });

    it("sequenceNel of only Valid values keeps them in order", () => {
      expect(sequenceNel([validNel(1), validNel(2)])).toEqual(Valid([1, 2]));
    });

    it("sequenceNel of nothing is Valid and empty", () => {
      expect(sequenceNel([])).toEqual(Valid([]));
    });

    it("traverseNel passes the index", () => {
      const r = traverseNel(["a", "b"], (s, i) => validNel<string, string>(`${i}:${s}`));
      expect(r).toEqual(Valid(["0:a", "1:b"]));
    });
  });
});
