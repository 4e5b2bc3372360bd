/**
 * Numeric Typeclasses
 *
 * The operations a scalar representation must supply so that one algorithm
 * body runs unchanged over every representation. Instances are plain
 * dictionaries passed explicitly to the code that needs them.
 */

// ============================================================================
// Eq / Ord
// ============================================================================

/**
 * Eq typeclass - equality comparison.
 *
 * Laws:
 * - Reflexivity: `equals(x, x) === true` (except for indeterminate values)
 * - Symmetry: `equals(x, y) === equals(y, x)`
 *
 * @typeclass
 */
export interface Eq<A> {
  equals(a: A, b: A): boolean;
  notEquals(a: A, b: A): boolean;
}

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;

/**
 * Ord typeclass - total ordering.
 *
 * Laws (in addition to Eq laws):
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => equals(x, y)`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 *
 * @typeclass
 */
export interface Ord<A> extends Eq<A> {
  compare(a: A, b: A): Ordering;
  lessThan(a: A, b: A): boolean;
  lessThanOrEqual(a: A, b: A): boolean;
  greaterThan(a: A, b: A): boolean;
  greaterThanOrEqual(a: A, b: A): boolean;
  min(a: A, b: A): A;
  max(a: A, b: A): A;
}

/**
 * Build an Ord instance from a single comparison function.
 */
export function makeOrd<A>(compare: (a: A, b: A) => Ordering): Ord<A> {
  return {
    equals: (a, b) => compare(a, b) === 0,
    notEquals: (a, b) => compare(a, b) !== 0,
    compare,
    lessThan: (a, b) => compare(a, b) < 0,
    lessThanOrEqual: (a, b) => compare(a, b) <= 0,
    greaterThan: (a, b) => compare(a, b) > 0,
    greaterThanOrEqual: (a, b) => compare(a, b) >= 0,
    min: (a, b) => (compare(a, b) <= 0 ? a : b),
    max: (a, b) => (compare(a, b) >= 0 ? a : b),
  };
}

// ============================================================================
// Numeric: ring operations
// ============================================================================

/**
 * Numeric typeclass - ring arithmetic.
 *
 * Laws:
 * - Additive identity: `add(x, zero()) === x`
 * - Multiplicative identity: `mul(x, one()) === x`
 * - Additive inverse: `add(x, negate(x)) === zero()`
 *
 * @typeclass
 */
export interface Numeric<A> {
  add(a: A, b: A): A;
  sub(a: A, b: A): A;
  mul(a: A, b: A): A;
  negate(a: A): A;
  abs(a: A): A;
  signum(a: A): A;
  fromNumber(n: number): A;
  toNumber(a: A): number;
  zero(): A;
  one(): A;
}

// ============================================================================
// Fractional: field division
// ============================================================================

/**
 * Fractional typeclass - division.
 *
 * Law: `mul(x, recip(x)) === one()` for non-zero x.
 *
 * @typeclass
 */
export interface Fractional<A> {
  div(a: A, b: A): A;
  recip(a: A): A;
}

// ============================================================================
// Floating: elementary functions
// ============================================================================

/**
 * Floating typeclass - the elementary functions geometry needs.
 *
 * @typeclass
 */
export interface Floating<A> {
  /** π at the representation's working precision. */
  pi(): A;
  sqrt(a: A): A;
  cbrt(a: A): A;
  pow(base: A, exponent: A): A;
  sin(a: A): A;
  cos(a: A): A;
  tan(a: A): A;
  asin(a: A): A;
  acos(a: A): A;
  atan(a: A): A;
  atan2(y: A, x: A): A;
}

// ============================================================================
// Scalar: the full contract
// ============================================================================

/**
 * A scalar representation usable by every spatial algorithm.
 *
 * `epsilon` is the nearly-zero tolerance; comparisons of two values scale it
 * by the larger magnitude (see `isNearlyEqual`).
 *
 * @typeclass
 */
export interface Scalar<A>
  extends Numeric<A>,
    Fractional<A>,
    Floating<A>,
    Ord<A> {
  readonly name: string;
  readonly epsilon: A;
  /** Approximate significant decimal digits. */
  readonly precision: number;
  isNaN(a: A): boolean;
  isFinite(a: A): boolean;
  parse(text: string): A;
  format(a: A): string;
}
