/**
 * Precision conversions between scalar representations.
 *
 * Widening conversions (into a representation that holds every value of
 * the source) return the converted value. Narrowing ones can overflow and
 * return a `ConversionResult`; each has an `*OrThrow` companion.
 *
 * The `map*` and `tryMap*` helpers lift a scalar conversion over vectors,
 * quaternions and matrices.
 */

import { ConversionError, createLogger } from "@orbis/core";
import {
  decimalFromNumber,
  decimalFromString,
  decimalToNumber,
  decimalToString,
  formatHuge,
  huge,
  hugeToNumber,
  parseHuge,
  type BigDecimal,
  type HugeNumber,
} from "@orbis/numeric";
import type {
  Matrix3x2,
  Matrix4x4,
  Quaternion,
  Vector2,
  Vector3,
  Vector4,
} from "./types.js";

const log = createLogger("conversions");

export type ConversionResult<B> =
  | { readonly ok: true; readonly value: B }
  | { readonly ok: false; readonly error: ConversionError };

const succeed = <B>(value: B): ConversionResult<B> => ({ ok: true, value });

const fail = <B>(from: string, to: string, input: string): ConversionResult<B> => {
  const error = new ConversionError(from, to, input);
  log.debug(error.message);
  return { ok: false, error };
};

export function unwrapConversion<B>(result: ConversionResult<B>): B {
  if (result.ok) return result.value;
  throw result.error;
}

// ============================================================================
// Widening
// ============================================================================

export function singleToDouble(x: number): number {
  return x;
}

/**
 * Exact decimal of the double's shortest round-trip form. NaN and ±∞ have
 * no decimal counterpart and throw ConversionError.
 */
export function doubleToDecimal(x: number): BigDecimal {
  if (!Number.isFinite(x)) {
    throw new ConversionError("double", "decimal", String(x));
  }
  return decimalFromNumber(x);
}

export function doubleToHuge(x: number): HugeNumber {
  return huge(x);
}

export function singleToDecimal(x: number): BigDecimal {
  return doubleToDecimal(x);
}

export function singleToHuge(x: number): HugeNumber {
  return huge(x);
}

/** Keeps the magnitude; digits beyond a double's 17 are rounded away. */
export function decimalToHuge(x: BigDecimal): HugeNumber {
  return parseHuge(decimalToString(x));
}

// ============================================================================
// Narrowing
// ============================================================================

// Largest finite binary32 value.
const SINGLE_MAX = 3.4028234663852886e38;

/** Fails when a finite input lies beyond the binary32 range. */
export function tryDoubleToSingle(x: number): ConversionResult<number> {
  if (Number.isFinite(x) && Math.abs(x) > SINGLE_MAX) {
    return fail("double", "single", String(x));
  }
  return succeed(Math.fround(x));
}

export function tryDecimalToDouble(x: BigDecimal): ConversionResult<number> {
  const n = decimalToNumber(x);
  return Number.isFinite(n) ? succeed(n) : fail("decimal", "double", decimalToString(x));
}

export function tryHugeToDouble(x: HugeNumber): ConversionResult<number> {
  const n = hugeToNumber(x);
  if (Number.isFinite(x.mantissa) && !Number.isFinite(n)) {
    return fail("huge", "double", formatHuge(x));
  }
  return succeed(n);
}

export function tryHugeToDecimal(x: HugeNumber): ConversionResult<BigDecimal> {
  if (!Number.isFinite(x.mantissa)) {
    return fail("huge", "decimal", formatHuge(x));
  }
  return succeed(decimalFromString(formatHuge(x)));
}

export const doubleToSingleOrThrow = (x: number): number => unwrapConversion(tryDoubleToSingle(x));
export const decimalToDoubleOrThrow = (x: BigDecimal): number => unwrapConversion(tryDecimalToDouble(x));
export const hugeToDoubleOrThrow = (x: HugeNumber): number => unwrapConversion(tryHugeToDouble(x));
export const hugeToDecimalOrThrow = (x: HugeNumber): BigDecimal => unwrapConversion(tryHugeToDecimal(x));

// ============================================================================
// Lifting over composite values
// ============================================================================

export function mapVector2<A, B>(v: Vector2<A>, f: (a: A) => B): Vector2<B> {
  return { x: f(v.x), y: f(v.y) };
}

export function mapVector3<A, B>(v: Vector3<A>, f: (a: A) => B): Vector3<B> {
  return { x: f(v.x), y: f(v.y), z: f(v.z) };
}

export function mapVector4<A, B>(v: Vector4<A>, f: (a: A) => B): Vector4<B> {
  return { x: f(v.x), y: f(v.y), z: f(v.z), w: f(v.w) };
}

export function mapQuaternion<A, B>(q: Quaternion<A>, f: (a: A) => B): Quaternion<B> {
  return { x: f(q.x), y: f(q.y), z: f(q.z), w: f(q.w) };
}

export function mapMatrix3x2<A, B>(m: Matrix3x2<A>, f: (a: A) => B): Matrix3x2<B> {
  return {
    m11: f(m.m11),
    m12: f(m.m12),
    m21: f(m.m21),
    m22: f(m.m22),
    m31: f(m.m31),
    m32: f(m.m32),
  };
}

export function mapMatrix4x4<A, B>(m: Matrix4x4<A>, f: (a: A) => B): Matrix4x4<B> {
  return {
    m11: f(m.m11), m12: f(m.m12), m13: f(m.m13), m14: f(m.m14),
    m21: f(m.m21), m22: f(m.m22), m23: f(m.m23), m24: f(m.m24),
    m31: f(m.m31), m32: f(m.m32), m33: f(m.m33), m34: f(m.m34),
    m41: f(m.m41), m42: f(m.m42), m43: f(m.m43), m44: f(m.m44),
  };
}

// Run a lifted conversion; the first failing component becomes the result.
function attempt<T>(convert: () => T): ConversionResult<T> {
  try {
    return succeed(convert());
  } catch (error) {
    if (error instanceof ConversionError) {
      return { ok: false, error };
    }
    throw error;
  }
}

type Narrowing<A, B> = (a: A) => ConversionResult<B>;

export const tryMapVector2 = <A, B>(v: Vector2<A>, f: Narrowing<A, B>): ConversionResult<Vector2<B>> =>
  attempt(() => mapVector2(v, (a) => unwrapConversion(f(a))));

export const tryMapVector3 = <A, B>(v: Vector3<A>, f: Narrowing<A, B>): ConversionResult<Vector3<B>> =>
  attempt(() => mapVector3(v, (a) => unwrapConversion(f(a))));

export const tryMapVector4 = <A, B>(v: Vector4<A>, f: Narrowing<A, B>): ConversionResult<Vector4<B>> =>
  attempt(() => mapVector4(v, (a) => unwrapConversion(f(a))));

export const tryMapQuaternion = <A, B>(q: Quaternion<A>, f: Narrowing<A, B>): ConversionResult<Quaternion<B>> =>
  attempt(() => mapQuaternion(q, (a) => unwrapConversion(f(a))));

export const tryMapMatrix3x2 = <A, B>(m: Matrix3x2<A>, f: Narrowing<A, B>): ConversionResult<Matrix3x2<B>> =>
  attempt(() => mapMatrix3x2(m, (a) => unwrapConversion(f(a))));

export const tryMapMatrix4x4 = <A, B>(m: Matrix4x4<A>, f: Narrowing<A, B>): ConversionResult<Matrix4x4<B>> =>
  attempt(() => mapMatrix4x4(m, (a) => unwrapConversion(f(a))));
