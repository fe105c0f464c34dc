/**
 * Core module exports for @shapecodec/core
 *
 * This package provides:
 * - Configuration (defaults, config files, SHAPECODEC_* environment)
 * - Scoped debug logging
 * - Programmer-error types and runtime safety primitives
 */

// Configuration System
export {
  config,
  defineConfig,
  DEFAULT_TYPE_FIELD,
  type ShapecodecConfig,
  type TypeHintConfig,
  type ErrorsConfig,
} from "./config.js";

// Logging
export { createLogger, type Logger } from "./logger.js";

// Errors
export { CodecConfigError, type CodecConfigErrorReason } from "./errors.js";

// Runtime Safety Primitives
export { invariant } from "./safety.js";
