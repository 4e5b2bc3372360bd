/**
 * Error Types
 *
 * Every failure the orbis packages surface to callers is one of these.
 * Numerical degeneracies with a fallback (singular inversion, near-identity
 * slerp) are not errors and never reach this module.
 */

export type OrbisErrorCode =
  | "invalid-argument"
  | "conversion"
  | "decode"
  | "domain";

/**
 * Base class for all orbis errors.
 */
export class OrbisError extends Error {
  constructor(
    message: string,
    public readonly code: OrbisErrorCode
  ) {
    super(message);
    this.name = "OrbisError";
  }
}

/**
 * Thrown when an argument violates a documented precondition, e.g. a
 * negative scale factor.
 */
export class InvalidArgumentError extends OrbisError {
  constructor(
    public readonly argument: string,
    message: string
  ) {
    super(`Invalid argument '${argument}': ${message}`, "invalid-argument");
    this.name = "InvalidArgumentError";
  }
}

/**
 * A narrowing precision conversion that cannot represent its input.
 */
export class ConversionError extends OrbisError {
  constructor(
    public readonly from: string,
    public readonly to: string,
    public readonly input: string
  ) {
    super(`Cannot convert ${input} from ${from} to ${to}`, "conversion");
    this.name = "ConversionError";
  }
}

/**
 * Malformed, unknown or incompatible serialized shape data.
 */
export class DecodeError extends OrbisError {
  constructor(message: string) {
    super(message, "decode");
    this.name = "DecodeError";
  }
}

/**
 * Raised by scalar representations that have no indeterminate value
 * (no NaN) when an operation leaves its domain.
 */
export class DomainError extends OrbisError {
  constructor(
    public readonly operation: string,
    message: string
  ) {
    super(`${operation}: ${message}`, "domain");
    this.name = "DomainError";
  }
}
