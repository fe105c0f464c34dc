/**
 * Unified Configuration System
 *
 * Configuration is merged from (lowest priority first):
 *
 * 1. Defaults
 * 2. Config files: package.json#shapecodec, .shapecodecrc, shapecodec.config.ts, ...
 * 3. Environment variables: SHAPECODEC_* (for CI overrides)
 * 4. Programmatic: config.set() calls
 *
 * @example
 * ```typescript
 * import { config } from "@shapecodec/core";
 *
 * config.get("typeHint.field")          // → "type"
 * config.set({ typeHint: { field: "kind" } });
 * config.defaultTypeField()             // → "kind"
 * ```
 */

import { cosmiconfigSync } from "cosmiconfig";
import { createLogger } from "./logger.js";

// ============================================================================
// Types
// ============================================================================

/**
 * Type-hint defaults shared by every derived codec.
 */
export interface TypeHintConfig {
  /** Discriminator key used when a type does not name its own. */
  field?: string;
}

/**
 * Decode-error rendering options.
 */
export interface ErrorsConfig {
  /** Longest rendering of a JSON fragment embedded in an error message. */
  maxRenderLength?: number;
}

/**
 * Full shapecodec configuration schema.
 */
export interface ShapecodecConfig {
  /** Enable debug logging */
  debug?: boolean;
  typeHint?: TypeHintConfig;
  errors?: ErrorsConfig;
  /** Custom user configuration */
  [key: string]: unknown;
}

/** Discriminator key used when neither the type nor the configuration names one. */
export const DEFAULT_TYPE_FIELD = "type";

const DEFAULT_MAX_RENDER_LENGTH = 120;

function defaults(): ShapecodecConfig {
  return {
    debug: false,
    typeHint: { field: DEFAULT_TYPE_FIELD },
    errors: { maxRenderLength: DEFAULT_MAX_RENDER_LENGTH },
  };
}

// ============================================================================
// Global State
// ============================================================================

let configStore: Record<string, unknown> = {};
let overrides: Record<string, unknown> = {};
let configLoaded = false;
let configFilePath: string | undefined;

// ============================================================================
// Utility Functions
// ============================================================================

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Set a nested value using dot notation.
 */
function setNestedValue(obj: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split(".");
  let current: Record<string, unknown> = obj;

  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }

  current[parts[parts.length - 1]] = value;
}

/**
 * Get a nested value using dot notation.
 */
function getNestedValue(obj: unknown, path: string): unknown {
  let current: unknown = obj;

  for (const part of path.split(".")) {
    if (!isRecord(current)) {
      return undefined;
    }
    current = current[part];
  }

  return current;
}

/**
 * Deep merge objects (right takes precedence).
 */
function deepMerge(
  target: Record<string, unknown>,
  source: Record<string, unknown>
): Record<string, unknown> {
  const result = { ...target };

  for (const key of Object.keys(source)) {
    const sourceValue = source[key];
    const targetValue = result[key];

    if (isRecord(sourceValue) && isRecord(targetValue)) {
      result[key] = deepMerge(targetValue, sourceValue);
    } else {
      result[key] = sourceValue;
    }
  }

  return result;
}

/**
 * Map a lower-cased dotted path onto the camel-cased keys of the defaults,
 * so SHAPECODEC_TYPEHINT_FIELD lands on typeHint.field.
 */
function canonicalPath(path: string): string {
  let shape: unknown = defaults();
  const out: string[] = [];

  for (const part of path.split(".")) {
    const known = isRecord(shape)
      ? Object.keys(shape).find((k) => k.toLowerCase() === part)
      : undefined;
    out.push(known ?? part);
    shape = known !== undefined && isRecord(shape) ? shape[known] : undefined;
  }

  return out.join(".");
}

// ============================================================================
// Environment Variable Loading
// ============================================================================

const ENV_PREFIX = "SHAPECODEC_";

/**
 * Load configuration from environment variables.
 *
 * Examples:
 *   SHAPECODEC_DEBUG=1                     → { debug: true }
 *   SHAPECODEC_TYPEHINT_FIELD=kind         → { typeHint: { field: "kind" } }
 *   SHAPECODEC_ERRORS_MAXRENDERLENGTH=80   → { errors: { maxRenderLength: 80 } }
 */
function loadConfigFromEnv(env: NodeJS.ProcessEnv): Record<string, unknown> {
  const envConfig: Record<string, unknown> = {};

  for (const [key, value] of Object.entries(env)) {
    if (!key.startsWith(ENV_PREFIX) || value === undefined) continue;

    // Double underscore and single underscore both separate path segments
    const configPath = canonicalPath(
      key.slice(ENV_PREFIX.length).toLowerCase().replace(/__/g, ".").replace(/_/g, ".")
    );

    let parsedValue: unknown;
    if (value === "1" || value === "true") {
      parsedValue = true;
    } else if (value === "0" || value === "false" || value === "") {
      parsedValue = false;
    } else if (/^\d+$/.test(value)) {
      parsedValue = parseInt(value, 10);
    } else {
      parsedValue = value;
    }

    setNestedValue(envConfig, configPath, parsedValue);
  }

  return envConfig;
}

// ============================================================================
// Config File Loading
// ============================================================================

const MODULE_NAME = "shapecodec";

/**
 * Search for a config file starting at `searchFrom` (defaults to the cwd).
 */
function loadConfigFromFiles(searchFrom?: string): Record<string, unknown> {
  const explorer = cosmiconfigSync(MODULE_NAME, {
    searchPlaces: [
      "package.json",
      `.${MODULE_NAME}rc`,
      `.${MODULE_NAME}rc.json`,
      `.${MODULE_NAME}rc.yaml`,
      `.${MODULE_NAME}rc.yml`,
      `.${MODULE_NAME}rc.js`,
      `.${MODULE_NAME}rc.cjs`,
      `.${MODULE_NAME}rc.ts`,
      `${MODULE_NAME}.config.js`,
      `${MODULE_NAME}.config.cjs`,
      `${MODULE_NAME}.config.ts`,
    ],
  });

  let result: { config: unknown; filepath: string; isEmpty?: boolean } | null;
  try {
    result = explorer.search(searchFrom);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    createLogger("config").warn(`ignoring unreadable config file: ${reason}`);
    return {};
  }

  if (result && !result.isEmpty && isRecord(result.config)) {
    configFilePath = result.filepath;
    return result.config;
  }
  return {};
}

// ============================================================================
// Config Initialization
// ============================================================================

function build(fileConfig: Record<string, unknown>): void {
  const envConfig = loadConfigFromEnv(process.env);

  // Merge: defaults < fileConfig < envConfig < overrides
  configStore = deepMerge(deepMerge(deepMerge(defaults(), fileConfig), envConfig), overrides);
  configLoaded = true;
}

/**
 * Initialize configuration from all sources.
 */
function initializeConfig(): void {
  if (configLoaded) return;
  build(loadConfigFromFiles());
}

// ============================================================================
// Public API
// ============================================================================

/**
 * Get a configuration value by dotted path.
 */
function get(path: string): unknown {
  initializeConfig();
  return getNestedValue(configStore, path);
}

/**
 * Set configuration values programmatically. Survives reload().
 */
function set(values: ShapecodecConfig): void {
  initializeConfig();
  overrides = deepMerge(overrides, values);
  configStore = deepMerge(configStore, values);
}

/**
 * Check if a configuration path has a truthy value.
 */
function has(path: string): boolean {
  return !!get(path);
}

/**
 * Get the path to the loaded config file (if any).
 */
function getConfigFilePath(): string | undefined {
  initializeConfig();
  return configFilePath;
}

/**
 * Re-read files and environment, searching for a config file from `searchFrom`.
 */
function reload(searchFrom?: string): void {
  configFilePath = undefined;
  build(loadConfigFromFiles(searchFrom));
}

/**
 * Reset configuration to defaults (mainly for testing).
 */
function reset(): void {
  configStore = {};
  overrides = {};
  configLoaded = false;
  configFilePath = undefined;
}

// ============================================================================
// Typed Helpers
// ============================================================================

/**
 * Check if debug logging is enabled.
 */
function isDebugEnabled(): boolean {
  return get("debug") === true;
}

/**
 * The discriminator key used by types that do not name their own.
 */
function defaultTypeField(): string {
  const field = get("typeHint.field");
  return typeof field === "string" && field.length > 0 ? field : DEFAULT_TYPE_FIELD;
}

/**
 * Longest rendering of a JSON fragment embedded in an error message.
 */
function maxRenderLength(): number {
  const limit = get("errors.maxRenderLength");
  return typeof limit === "number" && limit > 0 ? limit : DEFAULT_MAX_RENDER_LENGTH;
}

// ============================================================================
// Export: config object
// ============================================================================

/**
 * Unified configuration API.
 */
export const config = {
  get,
  set,
  has,
  getConfigFilePath,
  reload,
  reset,
  isDebugEnabled,
  defaultTypeField,
  maxRenderLength,
} as const;

/**
 * Helper for creating type-safe configuration files.
 */
export function defineConfig(cfg: ShapecodecConfig): ShapecodecConfig {
  return cfg;
}
