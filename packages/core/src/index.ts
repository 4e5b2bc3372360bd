/**
 * @orbis/core
 *
 * Configuration, diagnostics and the error taxonomy shared by every orbis
 * package.
 *
 * @packageDocumentation
 */

export { config, defineConfig, parseEnvConfig } from "./config.js";
export type { OrbisConfig, OrbisConfigInput, EpsilonConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  OrbisError,
  InvalidArgumentError,
  ConversionError,
  DecodeError,
  DomainError,
} from "./errors.js";
export type { OrbisErrorCode } from "./errors.js";
