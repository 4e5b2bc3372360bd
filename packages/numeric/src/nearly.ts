/**
 * Derived operations over any Scalar instance: magnitude-relative
 * comparison and the handful of constants every algorithm reaches for.
 */

import type { Scalar } from "./typeclasses.js";

/**
 * `|a| < epsilon`.
 */
export function isNearlyZero<A>(S: Scalar<A>, a: A): boolean {
  return S.lessThan(S.abs(a), S.epsilon);
}

/**
 * True when `a` and `b` are equal or differ by less than
 * `max(|a|, |b|) * epsilon`.
 */
export function isNearlyEqual<A>(S: Scalar<A>, a: A, b: A): boolean {
  if (S.equals(a, b)) return true;
  const magnitude = S.max(S.abs(a), S.abs(b));
  return S.lessThan(S.abs(S.sub(a, b)), S.mul(magnitude, S.epsilon));
}

export function two<A>(S: Scalar<A>): A {
  return S.add(S.one(), S.one());
}

export function half<A>(S: Scalar<A>): A {
  return S.div(S.one(), two(S));
}

/** τ = 2π */
export function tau<A>(S: Scalar<A>): A {
  return S.mul(two(S), S.pi());
}

export function square<A>(S: Scalar<A>, a: A): A {
  return S.mul(a, a);
}

export function clamp<A>(S: Scalar<A>, a: A, lo: A, hi: A): A {
  return S.min(S.max(a, lo), hi);
}

export function isZero<A>(S: Scalar<A>, a: A): boolean {
  return S.equals(a, S.zero());
}

export function isNegative<A>(S: Scalar<A>, a: A): boolean {
  return S.lessThan(a, S.zero());
}

/**
 * Convenience for literal constants in algorithm bodies.
 */
export function lit<A>(S: Scalar<A>, n: number): A {
  return S.fromNumber(n);
}
