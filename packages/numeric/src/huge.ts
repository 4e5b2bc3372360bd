/**
 * HugeNumber - base-10 floating point with an unbounded exponent.
 *
 * value = mantissa × 10^exponent, with `1 ≤ |mantissa| < 10` for finite
 * non-zero values. Zero is `{ 0, 0 }`; NaN and ±Infinity keep exponent 0.
 * The mantissa carries double precision, the exponent any safe integer,
 * so magnitudes like 1e4000 stay representable.
 */

import { config, InvalidArgumentError } from "@orbis/core";
import type { Ord, Ordering, Scalar } from "./typeclasses.js";

export interface HugeNumber {
  readonly mantissa: number;
  readonly exponent: number;
}

export interface HugeScalarOptions {
  epsilon?: number;
}

export const HUGE_ZERO: HugeNumber = { mantissa: 0, exponent: 0 };
export const HUGE_ONE: HugeNumber = { mantissa: 1, exponent: 0 };

// Exponents whose tail is below a double's 17 significant digits.
const ALIGN_LIMIT = 17;

function scaleByPow10(x: number, power: number): number {
  if (power > 300) return scaleByPow10(x * 1e300, power - 300);
  if (power < -300) return scaleByPow10(x / 1e300, power + 300);
  return power >= 0 ? x * 10 ** power : x / 10 ** -power;
}

/**
 * Normalizing constructor.
 */
export function huge(mantissa: number, exponent = 0): HugeNumber {
  if (mantissa === 0) return HUGE_ZERO;
  if (!Number.isFinite(mantissa)) return { mantissa, exponent: 0 };

  const shift = Math.floor(Math.log10(Math.abs(mantissa)));
  let m = scaleByPow10(mantissa, -shift);
  let e = exponent + shift;
  if (Math.abs(m) >= 10) {
    m /= 10;
    e++;
  } else if (Math.abs(m) < 1) {
    m *= 10;
    e--;
  }
  return { mantissa: m, exponent: e };
}

export function hugeToNumber(a: HugeNumber): number {
  return scaleByPow10(a.mantissa, a.exponent);
}

export function addHuge(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (!Number.isFinite(a.mantissa) || !Number.isFinite(b.mantissa)) {
    return huge(a.mantissa + b.mantissa);
  }
  if (a.mantissa === 0) return b;
  if (b.mantissa === 0) return a;

  const diff = a.exponent - b.exponent;
  if (diff > ALIGN_LIMIT) return a;
  if (diff < -ALIGN_LIMIT) return b;
  return diff >= 0
    ? huge(a.mantissa + scaleByPow10(b.mantissa, -diff), a.exponent)
    : huge(scaleByPow10(a.mantissa, diff) + b.mantissa, b.exponent);
}

export function negateHuge(a: HugeNumber): HugeNumber {
  return a.mantissa === 0 ? a : { mantissa: -a.mantissa, exponent: a.exponent };
}

export function mulHuge(a: HugeNumber, b: HugeNumber): HugeNumber {
  return huge(a.mantissa * b.mantissa, a.exponent + b.exponent);
}

export function divHuge(a: HugeNumber, b: HugeNumber): HugeNumber {
  if (b.mantissa === 0) return huge(a.mantissa / 0);
  return huge(a.mantissa / b.mantissa, a.exponent - b.exponent);
}

export function compareHuge(a: HugeNumber, b: HugeNumber): Ordering {
  const sa = Math.sign(a.mantissa);
  const sb = Math.sign(b.mantissa);
  if (sa !== sb) return sa < sb ? -1 : 1;
  if (sa === 0) return 0;

  const infA = !Number.isFinite(a.mantissa);
  const infB = !Number.isFinite(b.mantissa);
  if (infA || infB) {
    if (infA && infB) return 0;
    return infA ? (sa > 0 ? 1 : -1) : sa > 0 ? -1 : 1;
  }

  if (a.exponent !== b.exponent) {
    return (a.exponent > b.exponent) === sa > 0 ? 1 : -1;
  }
  return a.mantissa < b.mantissa ? -1 : a.mantissa > b.mantissa ? 1 : 0;
}

const unordered = (a: HugeNumber, b: HugeNumber): boolean =>
  Number.isNaN(a.mantissa) || Number.isNaN(b.mantissa);

const ordHuge: Ord<HugeNumber> = {
  equals: (a, b) => !unordered(a, b) && compareHuge(a, b) === 0,
  notEquals: (a, b) => unordered(a, b) || compareHuge(a, b) !== 0,
  compare: compareHuge,
  lessThan: (a, b) => !unordered(a, b) && compareHuge(a, b) < 0,
  lessThanOrEqual: (a, b) => !unordered(a, b) && compareHuge(a, b) <= 0,
  greaterThan: (a, b) => !unordered(a, b) && compareHuge(a, b) > 0,
  greaterThanOrEqual: (a, b) => !unordered(a, b) && compareHuge(a, b) >= 0,
  min: (a, b) => (compareHuge(a, b) <= 0 ? a : b),
  max: (a, b) => (compareHuge(a, b) >= 0 ? a : b),
};

function sqrtHuge(a: HugeNumber): HugeNumber {
  if (a.mantissa < 0) return huge(NaN);
  if (a.mantissa === 0 || !Number.isFinite(a.mantissa)) return huge(Math.sqrt(a.mantissa));
  return a.exponent % 2 !== 0
    ? huge(Math.sqrt(a.mantissa * 10), (a.exponent - 1) / 2)
    : huge(Math.sqrt(a.mantissa), a.exponent / 2);
}

function cbrtHuge(a: HugeNumber): HugeNumber {
  if (a.mantissa === 0 || !Number.isFinite(a.mantissa)) return huge(Math.cbrt(a.mantissa));
  const r = ((a.exponent % 3) + 3) % 3;
  return huge(Math.cbrt(a.mantissa * 10 ** r), (a.exponent - r) / 3);
}

function powHuge(base: HugeNumber, exponent: HugeNumber): HugeNumber {
  const x = hugeToNumber(exponent);

  if (Number.isInteger(x) && Math.abs(x) <= 64) {
    let result = HUGE_ONE;
    let b = base;
    for (let e = Math.abs(x); e > 0; e = Math.floor(e / 2)) {
      if (e % 2 === 1) result = mulHuge(result, b);
      b = mulHuge(b, b);
    }
    return x < 0 ? divHuge(HUGE_ONE, result) : result;
  }

  if (base.mantissa === 0 || !Number.isFinite(base.mantissa)) {
    return huge(Math.pow(base.mantissa, x));
  }
  if (base.mantissa < 0 && !Number.isInteger(x)) return huge(NaN);

  const total = x * (Math.log10(Math.abs(base.mantissa)) + base.exponent);
  const whole = Math.floor(total);
  const negative = base.mantissa < 0 && Math.abs(x % 2) === 1;
  return huge((negative ? -1 : 1) * 10 ** (total - whole), whole);
}

function atan2Huge(y: HugeNumber, x: HugeNumber): HugeNumber {
  const top = Math.max(y.exponent, x.exponent);
  return huge(
    Math.atan2(
      scaleByPow10(y.mantissa, y.exponent - top),
      scaleByPow10(x.mantissa, x.exponent - top)
    )
  );
}

const HUGE_PATTERN = /^([-+]?(?:\d+\.?\d*|\.\d+))(?:e([-+]?\d+))?$/i;

export function parseHuge(text: string): HugeNumber {
  const trimmed = text.trim();
  if (/^[-+]?(Infinity|NaN)$/.test(trimmed)) return huge(Number(trimmed));

  const match = HUGE_PATTERN.exec(trimmed);
  if (!match) {
    throw new InvalidArgumentError("text", `'${text}' is not a number`);
  }
  return huge(Number(match[1]), match[2] === undefined ? 0 : parseInt(match[2], 10));
}

export function formatHuge(a: HugeNumber): string {
  if (!Number.isFinite(a.mantissa)) return String(a.mantissa);
  if (a.mantissa === 0) return "0";
  return `${a.mantissa}e${a.exponent}`;
}

const viaNumber =
  (f: (n: number) => number) =>
  (a: HugeNumber): HugeNumber =>
    huge(f(hugeToNumber(a)));

export function createHugeScalar(options: HugeScalarOptions = {}): Scalar<HugeNumber> {
  const epsilon = options.epsilon ?? config.getAll().epsilon.huge;

  return {
    ...ordHuge,
    name: "huge",
    epsilon: huge(epsilon),
    precision: 15,

    add: addHuge,
    sub: (a, b) => addHuge(a, negateHuge(b)),
    mul: mulHuge,
    negate: negateHuge,
    abs: (a) => (a.mantissa < 0 ? negateHuge(a) : a),
    signum: (a) => huge(Math.sign(a.mantissa)),
    fromNumber: (n) => huge(n),
    toNumber: hugeToNumber,
    zero: () => HUGE_ZERO,
    one: () => HUGE_ONE,

    div: divHuge,
    recip: (a) => divHuge(HUGE_ONE, a),

    pi: () => huge(Math.PI),
    sqrt: sqrtHuge,
    cbrt: cbrtHuge,
    pow: powHuge,
    sin: viaNumber(Math.sin),
    cos: viaNumber(Math.cos),
    tan: viaNumber(Math.tan),
    asin: viaNumber(Math.asin),
    acos: viaNumber(Math.acos),
    atan: viaNumber(Math.atan),
    atan2: atan2Huge,

    isNaN: (a) => Number.isNaN(a.mantissa),
    isFinite: (a) => Number.isFinite(a.mantissa),
    parse: parseHuge,
    format: formatHuge,
  };
}

/** Base-10 scalar with an unbounded exponent. */
export const scalarHuge: Scalar<HugeNumber> = createHugeScalar();
