/**
 * Decimal scalar: BigDecimal arithmetic with a fixed number of fractional
 * digits.
 *
 * Addition and subtraction are exact. Products, quotients and the
 * elementary functions are rounded (half to even) to `precision`
 * fractional digits. Transcendentals are evaluated in bigint fixed point
 * with guard digits: Taylor series after argument reduction, Newton
 * iteration for roots, and Machin's formula for π.
 *
 * There is no indeterminate value; leaving a function's domain throws
 * DomainError.
 */

import { config, DomainError } from "@orbis/core";
import {
  absDecimal,
  addDecimal,
  compareDecimal,
  decimalFromNumber,
  decimalFromString,
  decimalToNumber,
  decimalToString,
  integerPart,
  isIntegral,
  mulDecimal,
  negateDecimal,
  normalizeDecimal,
  roundDecimal,
  subDecimal,
  unscaledAt,
  DECIMAL_ONE,
  DECIMAL_ZERO,
  type BigDecimal,
} from "./bigdecimal.js";
import { makeOrd, type Scalar } from "./typeclasses.js";

export interface DecimalScalarOptions {
  /** Fractional digits kept; defaults to the configured `decimal.precision`. */
  precision?: number;
  /** Nearly-zero tolerance; defaults to the configured `epsilon.decimal`. */
  epsilon?: number;
}

const GUARD_DIGITS = 10;

// ============================================================================
// Integer roots
// ============================================================================

function bitLength(n: bigint): number {
  return n.toString(2).length;
}

/**
 * floor(√n) for n ≥ 0.
 */
export function isqrt(n: bigint): bigint {
  if (n < 2n) return n;
  let x = 1n << BigInt(Math.ceil(bitLength(n) / 2));
  for (;;) {
    const y = (x + n / x) / 2n;
    if (y >= x) return x;
    x = y;
  }
}

/**
 * floor(∛n) for n ≥ 0.
 */
export function icbrt(n: bigint): bigint {
  if (n < 2n) return n;
  let x = 1n << BigInt(Math.ceil(bitLength(n) / 3));
  for (;;) {
    const y = (2n * x + n / (x * x)) / 3n;
    if (y >= x) return x;
    x = y;
  }
}

// ============================================================================
// Fixed-point kernel
// ============================================================================

/**
 * Elementary functions over bigints holding value × 10^scale.
 */
interface FixedPoint {
  readonly scale: number;
  readonly one: bigint;
  readonly pi: bigint;
  mul(a: bigint, b: bigint): bigint;
  div(a: bigint, b: bigint): bigint;
  sqrt(a: bigint): bigint;
  cbrt(a: bigint): bigint;
  exp(a: bigint): bigint;
  ln(a: bigint): bigint;
  sin(a: bigint): bigint;
  cos(a: bigint): bigint;
  atan(a: bigint): bigint;
}

function abs(n: bigint): bigint {
  return n < 0n ? -n : n;
}

function createFixedPoint(scale: number): FixedPoint {
  const one = 10n ** BigInt(scale);
  const mul = (a: bigint, b: bigint): bigint => (a * b) / one;
  const div = (a: bigint, b: bigint): bigint => (a * one) / b;

  // Σ (-1)^k x^(2k+1) / (2k+1), valid for |x| < 1
  const atanSeries = (x: bigint): bigint => {
    const x2 = mul(x, x);
    let term = x;
    let sum = x;
    for (let k = 1n; term !== 0n; k++) {
      term = -mul(term, x2);
      sum += term / (2n * k + 1n);
    }
    return sum;
  };

  // Machin: π = 16·atan(1/5) − 4·atan(1/239)
  const pi = 16n * atanSeries(one / 5n) - 4n * atanSeries(one / 239n);
  const halfPi = pi / 2n;
  const twoPi = 2n * pi;

  const sqrt = (a: bigint): bigint => isqrt(a * one);

  const cbrt = (a: bigint): bigint =>
    a < 0n ? -icbrt(-a * one * one) : icbrt(a * one * one);

  const exp = (a: bigint): bigint => {
    let x = a;
    let halvings = 0;
    while (abs(x) > one / 2n) {
      x /= 2n;
      halvings++;
    }
    let term = one;
    let sum = one;
    for (let k = 1n; term !== 0n; k++) {
      term = mul(term, x) / k;
      sum += term;
    }
    for (let i = 0; i < halvings; i++) {
      sum = mul(sum, sum);
    }
    return sum;
  };

  // ln x for x near 1: 2·atanh((x−1)/(x+1)), after repeated square roots
  const lnNearOne = (a: bigint): bigint => {
    let x = a;
    let roots = 0n;
    const upper = one + one / 10n;
    const lower = one - one / 10n;
    while (x > upper || x < lower) {
      x = sqrt(x);
      roots++;
    }
    const y = div(x - one, x + one);
    const y2 = mul(y, y);
    let term = y;
    let sum = y;
    for (let k = 1n; term !== 0n; k++) {
      term = mul(term, y2);
      sum += term / (2n * k + 1n);
    }
    return 2n * sum * (1n << roots);
  };

  const ln10 = lnNearOne(10n * one);

  const ln = (a: bigint): bigint => {
    // a = m · 10^e with 1 ≤ m < 10
    const e = a.toString().length - 1 - scale;
    const m = e >= 0 ? a / 10n ** BigInt(e) : a * 10n ** BigInt(-e);
    return lnNearOne(m) + BigInt(e) * ln10;
  };

  const reduceAngle = (a: bigint): bigint => {
    let r = a % twoPi;
    if (r > pi) r -= twoPi;
    if (r < -pi) r += twoPi;
    return r;
  };

  const sin = (a: bigint): bigint => {
    const x = reduceAngle(a);
    const x2 = mul(x, x);
    let term = x;
    let sum = x;
    for (let k = 1n; term !== 0n; k++) {
      term = -mul(term, x2) / (2n * k * (2n * k + 1n));
      sum += term;
    }
    return sum;
  };

  const cos = (a: bigint): bigint => {
    const x = reduceAngle(a);
    const x2 = mul(x, x);
    let term = one;
    let sum = one;
    for (let k = 1n; term !== 0n; k++) {
      term = -mul(term, x2) / ((2n * k - 1n) * (2n * k));
      sum += term;
    }
    return sum;
  };

  const atan = (a: bigint): bigint => {
    if (a < 0n) return -atan(-a);
    if (a > one) return halfPi - atan(div(one, a));
    // atan(x) = 2·atan(x / (1 + √(1 + x²))), applied twice
    let x = a;
    for (let i = 0; i < 2; i++) {
      x = div(x, one + sqrt(one + mul(x, x)));
    }
    return 4n * atanSeries(x);
  };

  return { scale, one, pi, mul, div, sqrt, cbrt, exp, ln, sin, cos, atan };
}

// ============================================================================
// Scalar instance
// ============================================================================

export function createDecimalScalar(
  options: DecimalScalarOptions = {}
): Scalar<BigDecimal> {
  const settings = config.getAll();
  const precision = options.precision ?? settings.decimal.precision;
  const epsilon = options.epsilon ?? settings.epsilon.decimal;
  const fp = createFixedPoint(precision + GUARD_DIGITS);

  const toFixed = (a: BigDecimal): bigint => unscaledAt(a, fp.scale);
  const fromFixed = (n: bigint): BigDecimal =>
    normalizeDecimal(roundDecimal({ unscaled: n, scale: fp.scale }, precision));
  const rounded = (a: BigDecimal): BigDecimal =>
    normalizeDecimal(roundDecimal(a, precision));

  const halfPi = fp.pi / 2n;
  const ord = makeOrd(compareDecimal);

  const div = (a: BigDecimal, b: BigDecimal): BigDecimal => {
    if (b.unscaled === 0n) {
      throw new DomainError("div", "division by zero");
    }
    return fromFixed(fp.div(toFixed(a), toFixed(b)));
  };

  const sqrt = (a: BigDecimal): BigDecimal => {
    if (a.unscaled < 0n) {
      throw new DomainError("sqrt", `negative operand ${decimalToString(a)}`);
    }
    return fromFixed(fp.sqrt(toFixed(a)));
  };

  const asinFixed = (x: bigint, operation: string): bigint => {
    if (abs(x) > fp.one) {
      throw new DomainError(operation, "operand outside [-1, 1]");
    }
    if (x === fp.one) return halfPi;
    if (x === -fp.one) return -halfPi;
    return fp.atan(fp.div(x, fp.sqrt(fp.one - fp.mul(x, x))));
  };

  const atan2Fixed = (y: bigint, x: bigint): bigint => {
    if (x > 0n) return fp.atan(fp.div(y, x));
    if (x < 0n) {
      const base = fp.atan(fp.div(y, x));
      return y >= 0n ? base + fp.pi : base - fp.pi;
    }
    if (y > 0n) return halfPi;
    if (y < 0n) return -halfPi;
    return 0n;
  };

  const powIntegral = (base: BigDecimal, exponent: bigint): BigDecimal => {
    let result = DECIMAL_ONE;
    let b = base;
    let e = exponent < 0n ? -exponent : exponent;
    while (e > 0n) {
      if (e & 1n) result = rounded(mulDecimal(result, b));
      b = rounded(mulDecimal(b, b));
      e >>= 1n;
    }
    return exponent < 0n ? div(DECIMAL_ONE, result) : result;
  };

  return {
    ...ord,
    name: "decimal",
    epsilon: decimalFromNumber(epsilon),
    precision,

    add: addDecimal,
    sub: subDecimal,
    mul: (a, b) => rounded(mulDecimal(a, b)),
    negate: negateDecimal,
    abs: absDecimal,
    signum: (a) =>
      a.unscaled < 0n ? negateDecimal(DECIMAL_ONE) : a.unscaled > 0n ? DECIMAL_ONE : DECIMAL_ZERO,
    fromNumber: (n) => rounded(decimalFromNumber(n)),
    toNumber: decimalToNumber,
    zero: () => DECIMAL_ZERO,
    one: () => DECIMAL_ONE,

    div,
    recip: (a) => div(DECIMAL_ONE, a),

    pi: () => fromFixed(fp.pi),
    sqrt,
    cbrt: (a) => fromFixed(fp.cbrt(toFixed(a))),
    pow: (base, exponent) => {
      if (isIntegral(exponent)) {
        if (base.unscaled === 0n && exponent.unscaled < 0n) {
          throw new DomainError("pow", "zero to a negative power");
        }
        return powIntegral(base, integerPart(exponent));
      }
      if (base.unscaled < 0n) {
        throw new DomainError("pow", "negative base with fractional exponent");
      }
      if (base.unscaled === 0n) {
        if (exponent.unscaled < 0n) {
          throw new DomainError("pow", "zero to a negative power");
        }
        return DECIMAL_ZERO;
      }
      const fixedBase = toFixed(base);
      if (fixedBase === 0n) {
        throw new DomainError("pow", "base is below the working precision");
      }
      return fromFixed(fp.exp(fp.mul(toFixed(exponent), fp.ln(fixedBase))));
    },
    sin: (a) => fromFixed(fp.sin(toFixed(a))),
    cos: (a) => fromFixed(fp.cos(toFixed(a))),
    tan: (a) => {
      const c = fp.cos(toFixed(a));
      if (c === 0n) {
        throw new DomainError("tan", "undefined at odd multiples of π/2");
      }
      return fromFixed(fp.div(fp.sin(toFixed(a)), c));
    },
    asin: (a) => fromFixed(asinFixed(toFixed(a), "asin")),
    acos: (a) => fromFixed(halfPi - asinFixed(toFixed(a), "acos")),
    atan: (a) => fromFixed(fp.atan(toFixed(a))),
    atan2: (y, x) => fromFixed(atan2Fixed(toFixed(y), toFixed(x))),

    isNaN: () => false,
    isFinite: () => true,
    parse: (text) => rounded(decimalFromString(text)),
    format: decimalToString,
  };
}

/** Arbitrary-precision decimal scalar at the configured precision. */
export const scalarDecimal: Scalar<BigDecimal> = createDecimalScalar();
