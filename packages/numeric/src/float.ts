/**
 * IEEE-754 scalars: double (JS number) and single (binary32 via
 * `Math.fround`). Indeterminate results propagate as NaN / ±Infinity.
 */

import { config, InvalidArgumentError } from "@orbis/core";
import type { Ord, Scalar } from "./typeclasses.js";

export interface FloatScalarOptions {
  /** Nearly-zero tolerance; defaults to the configured value. */
  epsilon?: number;
}

const FLOAT_PATTERN = /^[-+]?((\d+\.?\d*|\.\d+)(e[-+]?\d+)?|Infinity)$|^NaN$/i;

const ordNumber: Ord<number> = {
  equals: (a, b) => a === b,
  notEquals: (a, b) => a !== b,
  compare: (a, b) => (a < b ? -1 : a > b ? 1 : 0),
  lessThan: (a, b) => a < b,
  lessThanOrEqual: (a, b) => a <= b,
  greaterThan: (a, b) => a > b,
  greaterThanOrEqual: (a, b) => a >= b,
  min: (a, b) => (a <= b ? a : b),
  max: (a, b) => (a >= b ? a : b),
};

function parseFloatStrict(text: string): number {
  const trimmed = text.trim();
  if (!FLOAT_PATTERN.test(trimmed)) {
    throw new InvalidArgumentError("text", `'${text}' is not a number`);
  }
  return Number(trimmed);
}

/**
 * Build a number-backed scalar whose every result passes through `round`.
 */
function floatScalar(
  name: string,
  round: (n: number) => number,
  epsilon: number,
  precision: number
): Scalar<number> {
  return {
    ...ordNumber,
    name,
    epsilon: round(epsilon),
    precision,

    add: (a, b) => round(a + b),
    sub: (a, b) => round(a - b),
    mul: (a, b) => round(a * b),
    negate: (a) => -a,
    abs: (a) => Math.abs(a),
    signum: (a) => Math.sign(a),
    fromNumber: round,
    toNumber: (a) => a,
    zero: () => 0,
    one: () => 1,

    div: (a, b) => round(a / b),
    recip: (a) => round(1 / a),

    pi: () => round(Math.PI),
    sqrt: (a) => round(Math.sqrt(a)),
    cbrt: (a) => round(Math.cbrt(a)),
    pow: (a, b) => round(Math.pow(a, b)),
    sin: (a) => round(Math.sin(a)),
    cos: (a) => round(Math.cos(a)),
    tan: (a) => round(Math.tan(a)),
    asin: (a) => round(Math.asin(a)),
    acos: (a) => round(Math.acos(a)),
    atan: (a) => round(Math.atan(a)),
    atan2: (y, x) => round(Math.atan2(y, x)),

    isNaN: (a) => Number.isNaN(a),
    isFinite: (a) => Number.isFinite(a),
    parse: (text) => round(parseFloatStrict(text)),
    format: (a) => String(a),
  };
}

const identity = (n: number): number => n;

export function createDoubleScalar(options: FloatScalarOptions = {}): Scalar<number> {
  const epsilon = options.epsilon ?? config.getAll().epsilon.double;
  return floatScalar("double", identity, epsilon, 15);
}

export function createSingleScalar(options: FloatScalarOptions = {}): Scalar<number> {
  const epsilon = options.epsilon ?? config.getAll().epsilon.single;
  return floatScalar("single", Math.fround, epsilon, 7);
}

/** 64-bit IEEE-754 scalar. */
export const scalarDouble: Scalar<number> = createDoubleScalar();

/** 32-bit IEEE-754 scalar, stored in a JS number. */
export const scalarSingle: Scalar<number> = createSingleScalar();
