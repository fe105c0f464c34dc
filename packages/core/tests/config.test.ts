/**
 * Tests for the configuration system
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { fileURLToPath } from "node:url";
import { config, defineConfig, DEFAULT_TYPE_FIELD } from "@shapecodec/core";

const fixtureDir = fileURLToPath(new URL("./fixtures/rc", import.meta.url));
const brokenDir = fileURLToPath(new URL("./fixtures/broken", import.meta.url));

// ============================================================================
// config.get / config.set Tests
// ============================================================================

describe("config.get and config.set", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    config.reset();
  });

  it("should return default values", () => {
    expect(config.get("debug")).toBe(false);
    expect(config.get("typeHint.field")).toBe("type");
    expect(config.get("errors.maxRenderLength")).toBe(120);
  });

  it("should set nested values without dropping siblings", () => {
    config.set({ errors: { maxRenderLength: 10 } });
    config.set({ custom: { flag: true } });
    expect(config.get("errors.maxRenderLength")).toBe(10);
    expect(config.get("custom.flag")).toBe(true);
    expect(config.get("typeHint.field")).toBe("type");
  });

  it("should return undefined for non-existent paths", () => {
    expect(config.get("nonexistent")).toBeUndefined();
    expect(config.get("typeHint.field.deeper")).toBeUndefined();
  });

  it("has reports truthiness", () => {
    expect(config.has("debug")).toBe(false);
    config.set({ debug: true });
    expect(config.has("debug")).toBe(true);
  });

  it("defineConfig returns its argument", () => {
    const cfg = { typeHint: { field: "kind" } };
    expect(defineConfig(cfg)).toBe(cfg);
  });
});

// ============================================================================
// Typed Helpers
// ============================================================================

describe("typed helpers", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("defaultTypeField falls back when the value is unusable", () => {
    expect(config.defaultTypeField()).toBe(DEFAULT_TYPE_FIELD);
    config.set({ typeHint: { field: "" } });
    expect(config.defaultTypeField()).toBe("type");
    config.set({ typeHint: { field: "kind" } });
    expect(config.defaultTypeField()).toBe("kind");
  });

  it("maxRenderLength ignores non-positive limits", () => {
    config.set({ errors: { maxRenderLength: 0 } });
    expect(config.maxRenderLength()).toBe(120);
    config.set({ errors: { maxRenderLength: 16 } });
    expect(config.maxRenderLength()).toBe(16);
  });

  it("isDebugEnabled requires an actual true", () => {
    vi.stubEnv("SHAPECODEC_DEBUG", "yes");
    expect(config.get("debug")).toBe("yes");
    expect(config.isDebugEnabled()).toBe(false);
    config.set({ debug: true });
    expect(config.isDebugEnabled()).toBe(true);
  });
});

// ============================================================================
// Environment and File Sources
// ============================================================================

describe("environment variables", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("maps SHAPECODEC_* names onto camel-cased paths", () => {
    vi.stubEnv("SHAPECODEC_TYPEHINT_FIELD", "tag");
    vi.stubEnv("SHAPECODEC_ERRORS_MAXRENDERLENGTH", "64");
    vi.stubEnv("SHAPECODEC_DEBUG", "1");
    expect(config.get("typeHint.field")).toBe("tag");
    expect(config.get("errors.maxRenderLength")).toBe(64);
    expect(config.get("debug")).toBe(true);
  });

  it("programmatic values win over the environment", () => {
    vi.stubEnv("SHAPECODEC_TYPEHINT_FIELD", "tag");
    config.set({ typeHint: { field: "kind" } });
    expect(config.defaultTypeField()).toBe("kind");
  });
});

describe("config files", () => {
  beforeEach(() => {
    config.reset();
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    config.reset();
  });

  it("loads .shapecodecrc.json from the search directory", () => {
    config.reload(fixtureDir);
    expect(config.get("typeHint.field")).toBe("kind");
    expect(config.maxRenderLength()).toBe(40);
    expect(config.getConfigFilePath()).toMatch(/\.shapecodecrc\.json$/);
  });

  it("environment wins over the file", () => {
    vi.stubEnv("SHAPECODEC_TYPEHINT_FIELD", "tag");
    config.reload(fixtureDir);
    expect(config.get("typeHint.field")).toBe("tag");
    expect(config.get("errors.maxRenderLength")).toBe(40);
  });

  it("reload keeps programmatic overrides", () => {
    config.set({ debug: true });
    config.reload(fixtureDir);
    expect(config.isDebugEnabled()).toBe(true);
  });

  it("warns about an unreadable file and keeps the defaults", () => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
    config.reload(brokenDir);
    expect(console.warn).toHaveBeenCalledWith(
      expect.stringMatching(/^\[shapecodec:config\] ignoring unreadable config file: /),
    );
    expect(config.get("typeHint.field")).toBe("type");
    vi.restoreAllMocks();
  });
});
