/**
 * Scoped console logging.
 *
 * Debug lines are emitted only while `config.isDebugEnabled()` is true, and
 * the check runs on every call so `config.set({ debug: true })` takes effect
 * immediately.
 */

import { config } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[shapecodec:${scope}]`;
  return {
    scope,
    debug(message) {
      if (config.isDebugEnabled()) {
        console.debug(`${prefix} ${message}`);
      }
    },
    warn(message) {
      console.warn(`${prefix} ${message}`);
    },
  };
}
