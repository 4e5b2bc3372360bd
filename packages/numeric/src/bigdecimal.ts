/**
 * BigDecimal - Arbitrary Precision Decimals
 *
 * Exact decimal values using bigint storage with explicit scale.
 * Value = unscaled * 10^(-scale)
 *
 * @example
 * ```typescript
 * const a = bigDecimal("123.456"); // unscaled=123456, scale=3
 * const b = bigDecimal(100n, 2);   // unscaled=100, scale=2 → 1.00
 * const sum = addDecimal(a, b);    // 124.456
 * ```
 */

import { DomainError, InvalidArgumentError } from "@orbis/core";
import type { Ordering } from "./typeclasses.js";

/**
 * Arbitrary precision decimal number.
 * value = unscaled * 10^(-scale)
 *
 * @example
 * - { unscaled: 123n, scale: 0 } = 123
 * - { unscaled: 123n, scale: 2 } = 1.23
 * - { unscaled: -456n, scale: 3 } = -0.456
 * - { unscaled: 5n, scale: -3 } = 5000
 */
export interface BigDecimal {
  readonly unscaled: bigint;
  readonly scale: number;
}

const DECIMAL_PATTERN = /^[-+]?(\d+\.?\d*|\.\d+)(e[-+]?\d+)?$/i;

/**
 * Create a BigDecimal from a bigint with scale, a number, or a string.
 */
export function bigDecimal(value: bigint | number | string, scale = 0): BigDecimal {
  if (typeof value === "string") return decimalFromString(value);
  if (typeof value === "number") return decimalFromNumber(value);
  return { unscaled: value, scale };
}

/**
 * Parse a BigDecimal from a string like "123.456", "-0.001" or "1.5e-5".
 */
export function decimalFromString(text: string): BigDecimal {
  let s = text.trim();
  if (!DECIMAL_PATTERN.test(s)) {
    throw new InvalidArgumentError("text", `'${text}' is not a decimal number`);
  }

  const eIndex = s.toLowerCase().indexOf("e");
  if (eIndex !== -1) {
    const exponent = parseInt(s.slice(eIndex + 1), 10);
    const base = decimalFromString(s.slice(0, eIndex));
    return { unscaled: base.unscaled, scale: base.scale - exponent };
  }

  const negative = s.startsWith("-");
  if (negative || s.startsWith("+")) {
    s = s.slice(1);
  }

  const dotIndex = s.indexOf(".");
  let unscaled: bigint;
  let scale: number;

  if (dotIndex === -1) {
    unscaled = BigInt(s);
    scale = 0;
  } else {
    const fracPart = s.slice(dotIndex + 1);
    unscaled = BigInt((s.slice(0, dotIndex) || "0") + fracPart);
    scale = fracPart.length;
  }

  return { unscaled: negative ? -unscaled : unscaled, scale };
}

/**
 * Create a BigDecimal from a JavaScript number via its shortest
 * round-tripping decimal representation.
 */
export function decimalFromNumber(n: number): BigDecimal {
  if (!Number.isFinite(n)) {
    throw new DomainError("fromNumber", `${n} has no decimal representation`);
  }
  return decimalFromString(n.toString());
}

/**
 * Convert to the nearest JavaScript number. Magnitudes beyond the double
 * range become ±Infinity.
 */
export function decimalToNumber(bd: BigDecimal): number {
  return parseFloat(decimalToString(bd));
}

/**
 * Canonical string form, without trailing fractional zeros.
 */
export function decimalToString(bd: BigDecimal): string {
  return formatWithScale(normalizeDecimal(bd));
}

function formatWithScale(bd: BigDecimal): string {
  if (bd.scale <= 0) {
    if (bd.unscaled === 0n) return "0";
    return bd.unscaled.toString() + "0".repeat(-bd.scale);
  }

  const negative = bd.unscaled < 0n;
  const absStr = (negative ? -bd.unscaled : bd.unscaled).toString();

  if (absStr.length <= bd.scale) {
    const leadingZeros = "0".repeat(bd.scale - absStr.length);
    return (negative ? "-" : "") + "0." + leadingZeros + absStr;
  }

  const intPart = absStr.slice(0, absStr.length - bd.scale);
  const fracPart = absStr.slice(absStr.length - bd.scale);
  return (negative ? "-" : "") + intPart + "." + fracPart;
}

/**
 * Remove trailing zeros from the unscaled value.
 */
export function normalizeDecimal(bd: BigDecimal): BigDecimal {
  if (bd.unscaled === 0n) {
    return { unscaled: 0n, scale: 0 };
  }

  let unscaled = bd.unscaled;
  let scale = bd.scale;

  while (scale > 0 && unscaled % 10n === 0n) {
    unscaled /= 10n;
    scale--;
  }

  return { unscaled, scale };
}

/**
 * Express the value as an integer count of 10^-scale units, truncating
 * toward zero when the target scale is smaller.
 */
export function unscaledAt(bd: BigDecimal, scale: number): bigint {
  if (scale === bd.scale) return bd.unscaled;
  if (scale > bd.scale) return bd.unscaled * 10n ** BigInt(scale - bd.scale);
  return bd.unscaled / 10n ** BigInt(bd.scale - scale);
}

function alignScales(a: BigDecimal, b: BigDecimal): [bigint, bigint, number] {
  const scale = Math.max(a.scale, b.scale);
  return [unscaledAt(a, scale), unscaledAt(b, scale), scale];
}

/**
 * Round to a number of decimal places, half to even.
 */
export function roundDecimal(bd: BigDecimal, places: number): BigDecimal {
  if (places >= bd.scale) {
    return bd;
  }

  const divisor = 10n ** BigInt(bd.scale - places);
  let quotient = bd.unscaled / divisor;
  const remainder = bd.unscaled % divisor;

  if (remainder === 0n) {
    return { unscaled: quotient, scale: places };
  }

  const negative = bd.unscaled < 0n;
  const absRemainder = remainder < 0n ? -remainder : remainder;
  const halfDivisor = divisor / 2n;

  if (
    absRemainder > halfDivisor ||
    (absRemainder === halfDivisor && quotient % 2n !== 0n)
  ) {
    quotient += negative ? -1n : 1n;
  }

  return { unscaled: quotient, scale: places };
}

export function addDecimal(a: BigDecimal, b: BigDecimal): BigDecimal {
  const [aa, bb, scale] = alignScales(a, b);
  return normalizeDecimal({ unscaled: aa + bb, scale });
}

export function subDecimal(a: BigDecimal, b: BigDecimal): BigDecimal {
  const [aa, bb, scale] = alignScales(a, b);
  return normalizeDecimal({ unscaled: aa - bb, scale });
}

/**
 * Exact product.
 */
export function mulDecimal(a: BigDecimal, b: BigDecimal): BigDecimal {
  return normalizeDecimal({
    unscaled: a.unscaled * b.unscaled,
    scale: a.scale + b.scale,
  });
}

export function negateDecimal(a: BigDecimal): BigDecimal {
  return { unscaled: -a.unscaled, scale: a.scale };
}

export function absDecimal(a: BigDecimal): BigDecimal {
  return a.unscaled < 0n ? negateDecimal(a) : a;
}

export function compareDecimal(a: BigDecimal, b: BigDecimal): Ordering {
  const [aa, bb] = alignScales(a, b);
  return aa < bb ? -1 : aa > bb ? 1 : 0;
}

/**
 * Integer part, truncated toward zero.
 */
export function integerPart(bd: BigDecimal): bigint {
  return unscaledAt(bd, 0);
}

export function isIntegral(bd: BigDecimal): boolean {
  return normalizeDecimal(bd).scale <= 0;
}

/**
 * Common BigDecimal constants.
 */
export const DECIMAL_ZERO: BigDecimal = { unscaled: 0n, scale: 0 };
export const DECIMAL_ONE: BigDecimal = { unscaled: 1n, scale: 0 };
