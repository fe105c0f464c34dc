import { describe, expect, it } from "vitest";
import { CodecConfigError } from "@shapecodec/core";
import { NEL, Valid, isInvalid } from "@shapecodec/fp";
import {
  decodeString,
  defineSum,
  defineType,
  encodeToString,
  enumCodec,
  formatDecodeError,
  literalCodec,
  objectSingletonCodec,
  singletonCodec,
  singletonSwitch,
} from "../index.js";
import type { DecodeResult } from "../index.js";

function messages<A>(result: DecodeResult<A>): string[] {
  return isInvalid(result) ? NEL.toArray(result.error).map(formatDecodeError) : [];
}

function configErrorOf(f: () => unknown): CodecConfigError {
  try {
    f();
  } catch (e) {
    if (e instanceof CodecConfigError) return e;
    throw e;
  }
  throw new Error("expected a CodecConfigError");
}

const RUNNING = { state: "running" } as const;
const STOPPED = { state: "stopped" } as const;
const OFF = { power: "off" } as const;

describe("singletonCodec", () => {
  const Stopped = singletonCodec(defineType("Stopped"), STOPPED);

  it("encodes as the bare type name", () => {
    expect(encodeToString(Stopped, STOPPED)).toBe('"Stopped"');
  });

  it("decodes only that exact string, to the same value", () => {
    const result = decodeString(Stopped, '"Stopped"');
    expect(result).toEqual(Valid(STOPPED));
    expect(result._tag === "Valid" && result.value).toBe(STOPPED);
  });

  it("rejects any other JSON", () => {
    expect(messages(decodeString(Stopped, '"Running"'))).toEqual(
      ['JSON string `Stopped` expected, got "Running"'],
    );
    expect(messages(decodeString(Stopped, '"stopped"'))).toEqual(
      ['JSON string `Stopped` expected, got "stopped"'],
    );
    expect(messages(decodeString(Stopped, "{}"))).toEqual(
      ["JSON string `Stopped` expected, got {}"],
    );
  });

  it("strips every $ from the type name", () => {
    const Idle = singletonCodec(defineType("Machine$Idle$"), STOPPED);
    expect(encodeToString(Idle, STOPPED)).toBe('"MachineIdle"');
  });

  it("uses a configured hint value", () => {
    const Paused = singletonCodec(defineType("Paused", { typeHint: { value: "paused" } }), STOPPED);
    expect(encodeToString(Paused, STOPPED)).toBe('"paused"');
    expect(decodeString(Paused, '"paused"')).toEqual(Valid(STOPPED));
  });

  it("writes no object type hint", () => {
    expect(Stopped.typeHint).toBeUndefined();
  });
});

describe("singletonSwitch", () => {
  type Phase = typeof RUNNING | typeof STOPPED;

  const Running = singletonCodec(defineType("Running"), RUNNING);
  const Stopped = singletonCodec(defineType("Stopped"), STOPPED);
  const PhaseCodec = singletonSwitch(defineSum<Phase>("Phase"), [Running, Stopped]);

  it("writes each member as its own string", () => {
    expect(Stopped.literal).toBe("Stopped");
    expect(PhaseCodec.literals).toEqual(["Running", "Stopped"]);
    expect(encodeToString(PhaseCodec, RUNNING)).toBe('"Running"');
    expect(encodeToString(PhaseCodec, STOPPED)).toBe('"Stopped"');
  });

  it("decodes what it encodes, to the member value", () => {
    const result = decodeString(PhaseCodec, encodeToString(PhaseCodec, STOPPED));
    expect(result._tag === "Valid" && result.value).toBe(STOPPED);
  });

  it("lists every member string when the match fails", () => {
    expect(messages(decodeString(PhaseCodec, '"Paused"'))).toEqual([
      "one of `Running`, `Stopped` expected, got `Paused`",
    ]);
    expect(messages(decodeString(PhaseCodec, "{}"))).toEqual(["string expected, got {}"]);
  });

  it("rejects two members with one string", () => {
    const Impostor = singletonCodec(
      defineType("Impostor", { typeHint: { value: "Running" } }),
      STOPPED,
    );
    const error = configErrorOf(
      () => singletonSwitch(defineSum<Phase>("Phase"), [Running, Impostor]),
    );
    expect(error.reason).toBe("duplicate_discriminator");
    expect(error.message).toBe("Phase: string `Running` is claimed by two singletons");
  });

  it("throws when encoding a value that is not a member", () => {
    const partial = singletonSwitch(defineSum<Phase>("Phase"), [Running]);
    const error = configErrorOf(() => partial.encode(STOPPED));
    expect(error.reason).toBe("unregistered_variant");
    expect(error.message).toBe("Phase: value is not a registered singleton");
  });
});

describe("objectSingletonCodec", () => {
  const Off = objectSingletonCodec(defineType("Off"), OFF);

  it("encodes as a single discriminator member", () => {
    expect(encodeToString(Off, OFF)).toBe('{"type":"Off"}');
    expect(Off.typeHint).toEqual({ field: "type", value: "Off" });
  });

  it("decodes the discriminator to the singleton value", () => {
    expect(decodeString(Off, '{"type":"Off","extra":1}')).toEqual(Valid(OFF));
  });

  it("names the expected and actual values on a mismatch", () => {
    expect(messages(decodeString(Off, '{"type":"On"}'))).toEqual(
      ["type: `Off` expected, got `On`"],
    );
  });

  it("reports a missing discriminator", () => {
    expect(messages(decodeString(Off, "{}"))).toEqual(["missing type field `type`"]);
    expect(messages(decodeString(Off, "[]"))).toEqual(["object expected, got []"]);
  });

  it("honours a configured field and value", () => {
    const codec = objectSingletonCodec(
      defineType("Off", { typeHint: { field: "state", value: "off" } }),
      OFF,
    );
    expect(encodeToString(codec, OFF)).toBe('{"state":"off"}');
    expect(decodeString(codec, '{"state":"off"}')).toEqual(Valid(OFF));
  });
});

describe("enumCodec", () => {
  enum Color {
    Red,
    Green,
    Blue,
  }
  enum Level {
    Low = "low",
    High = "high",
  }

  const ColorCodec = enumCodec(Color, "Color");
  const LevelCodec = enumCodec(Level, "Level");

  it("encodes a member as its name", () => {
    expect(encodeToString(ColorCodec, Color.Green)).toBe('"Green"');
    expect(encodeToString(LevelCodec, Level.High)).toBe('"High"');
  });

  it("decodes an exact name", () => {
    expect(decodeString(ColorCodec, '"Blue"')).toEqual(Valid(Color.Blue));
    expect(decodeString(LevelCodec, '"Low"')).toEqual(Valid(Level.Low));
  });

  it("lists every name when the match fails", () => {
    expect(messages(decodeString(ColorCodec, '"blue"'))).toEqual([
      "one of `Red`, `Green`, `Blue` expected, got `blue`",
    ]);
    expect(messages(decodeString(LevelCodec, '"high"'))).toEqual(
      ["one of `Low`, `High` expected, got `high`"],
    );
  });

  it("does not accept reverse-mapping keys", () => {
    expect(messages(decodeString(ColorCodec, '"0"'))).toEqual(
      ["one of `Red`, `Green`, `Blue` expected, got `0`"],
    );
  });

  it("rejects non-strings", () => {
    expect(messages(decodeString(ColorCodec, "2"))).toEqual(["string expected, got 2"]);
  });

  it("throws when encoding a value outside the enum", () => {
    const outside: number = 7;
    expect(() => ColorCodec.encode(outside)).toThrow(CodecConfigError);
    expect(() => ColorCodec.encode(outside)).toThrow("Color: `7` is not a member");
  });
});

describe("literalCodec", () => {
  const Direction = literalCodec(["north", "south"]);

  it("round-trips each literal", () => {
    expect(encodeToString(Direction, "south")).toBe('"south"');
    expect(decodeString(Direction, '"north"')).toEqual(Valid("north"));
  });

  it("rejects other strings", () => {
    expect(messages(decodeString(Direction, '"east"'))).toEqual(
      ["one of `north`, `south` expected, got `east`"],
    );
  });
});
