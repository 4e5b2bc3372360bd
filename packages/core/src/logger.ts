/**
 * Console diagnostics with the `[orbis]` prefix. Debug lines are only
 * written while `config.getAll().debug` is set.
 */

import { config } from "./config.js";

export interface Logger {
  debug(message: string, ...details: unknown[]): void;
  warn(message: string, ...details: unknown[]): void;
  error(message: string, ...details: unknown[]): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[orbis/${scope}]`;
  return {
    debug(message, ...details) {
      if (config.getAll().debug) {
        console.log(`${prefix} ${message}`, ...details);
      }
    },
    warn(message, ...details) {
      console.warn(`${prefix} WARN: ${message}`, ...details);
    },
    error(message, ...details) {
      console.error(`${prefix} ERROR: ${message}`, ...details);
    },
  };
}
