/**
 * @orbis/numeric
 *
 * The Numeric Contract: a `Scalar<A>` dictionary bundles ordered field
 * arithmetic, the elementary functions and a magnitude-relative epsilon so
 * that one spatial algorithm body works across every representation.
 *
 * Instances:
 * - `scalarDouble`: 64-bit IEEE-754
 * - `scalarSingle`: 32-bit IEEE-754 (rounded with Math.fround)
 * - `scalarDecimal`: bigint-backed decimal at a fixed working precision
 * - `scalarHuge`: base-10 mantissa/exponent with an unbounded exponent
 *
 * @packageDocumentation
 */

export type {
  Eq,
  Ord,
  Ordering,
  Numeric,
  Fractional,
  Floating,
  Scalar,
} from "./typeclasses.js";
export { makeOrd } from "./typeclasses.js";

export {
  isNearlyZero,
  isNearlyEqual,
  isZero,
  isNegative,
  two,
  half,
  tau,
  square,
  clamp,
  lit,
} from "./nearly.js";

export {
  createDoubleScalar,
  createSingleScalar,
  scalarDouble,
  scalarSingle,
} from "./float.js";
export type { FloatScalarOptions } from "./float.js";

export {
  bigDecimal,
  decimalFromString,
  decimalFromNumber,
  decimalToNumber,
  decimalToString,
  normalizeDecimal,
  roundDecimal,
  compareDecimal,
  DECIMAL_ZERO,
  DECIMAL_ONE,
} from "./bigdecimal.js";
export type { BigDecimal } from "./bigdecimal.js";

export { createDecimalScalar, scalarDecimal, isqrt, icbrt } from "./decimal.js";
export type { DecimalScalarOptions } from "./decimal.js";

export {
  huge,
  hugeToNumber,
  parseHuge,
  formatHuge,
  compareHuge,
  createHugeScalar,
  scalarHuge,
  HUGE_ZERO,
  HUGE_ONE,
} from "./huge.js";
export type { HugeNumber, HugeScalarOptions } from "./huge.js";
