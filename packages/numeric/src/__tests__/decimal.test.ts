import { describe, expect, it } from "vitest";
import { DomainError } from "@orbis/core";
import {
  bigDecimal,
  createDecimalScalar,
  decimalToString,
  icbrt,
  isNearlyEqual,
  isqrt,
  scalarDecimal as D,
} from "../index.js";

const d = (text: string) => D.parse(text);
const str = decimalToString;

describe("BigDecimal", () => {
  it("parses plain and scientific notation", () => {
    expect(bigDecimal("123.456")).toEqual({ unscaled: 123456n, scale: 3 });
    expect(bigDecimal("1.5e3")).toEqual({ unscaled: 15n, scale: -2 });
    expect(str(bigDecimal("1.5e3"))).toBe("1500");
    expect(str(bigDecimal("-0.001"))).toBe("-0.001");
  });

  it("strips trailing zeros when formatting", () => {
    expect(str(bigDecimal(1200n, 2))).toBe("12");
  });
});

describe("integer roots", () => {
  it("computes floor square and cube roots", () => {
    expect(isqrt(15n)).toBe(3n);
    expect(isqrt(16n)).toBe(4n);
    expect(isqrt(10n ** 40n)).toBe(10n ** 20n);
    expect(icbrt(26n)).toBe(2n);
    expect(icbrt(27n)).toBe(3n);
  });
});

describe("scalarDecimal", () => {
  it("adds exactly", () => {
    expect(str(D.add(d("0.1"), d("0.2")))).toBe("0.3");
  });

  it("rounds quotients to the working precision", () => {
    expect(str(D.div(d("1"), d("3")))).toBe("0." + "3".repeat(34));
    expect(str(D.div(d("2"), d("3")))).toBe("0." + "6".repeat(33) + "7");
  });

  it("computes square roots to the working precision", () => {
    expect(str(D.sqrt(d("2")))).toBe("1.4142135623730950488016887242096981");
    expect(str(D.sqrt(d("144")))).toBe("12");
  });

  it("computes exact cube roots of perfect cubes", () => {
    expect(str(D.cbrt(d("27")))).toBe("3");
    expect(str(D.cbrt(d("-8")))).toBe("-2");
  });

  it("computes π by Machin's formula", () => {
    expect(str(D.pi())).toBe("3.1415926535897932384626433832795029");
  });

  it("evaluates trigonometric functions", () => {
    const sixth = D.div(D.pi(), d("6"));
    expect(D.toNumber(D.sin(sixth))).toBeCloseTo(0.5, 15);
    expect(D.toNumber(D.cos(D.pi()))).toBeCloseTo(-1, 15);
    expect(D.toNumber(D.acos(d("0.5")))).toBeCloseTo(Math.PI / 3, 15);
    expect(D.toNumber(D.mul(d("4"), D.atan2(d("1"), d("1"))))).toBeCloseTo(Math.PI, 15);
    expect(D.toNumber(D.atan2(d("0"), d("-1")))).toBeCloseTo(Math.PI, 15);
  });

  it("keeps identities within epsilon", () => {
    const x = d("0.7");
    const identity = D.add(D.mul(D.sin(x), D.sin(x)), D.mul(D.cos(x), D.cos(x)));
    expect(isNearlyEqual(D, identity, D.one())).toBe(true);
  });

  it("raises to integral and fractional powers", () => {
    expect(str(D.pow(d("2"), d("10")))).toBe("1024");
    expect(str(D.pow(d("2"), d("-2")))).toBe("0.25");
    expect(D.toNumber(D.pow(d("2"), d("0.5")))).toBeCloseTo(Math.SQRT2, 15);
  });

  it("throws DomainError where no indeterminate value exists", () => {
    expect(() => D.div(d("1"), d("0"))).toThrow(DomainError);
    expect(() => D.sqrt(d("-1"))).toThrow(DomainError);
    expect(() => D.acos(d("1.5"))).toThrow(DomainError);
    expect(() => D.pow(d("-2"), d("0.5"))).toThrow(DomainError);
  });

  it("rounds parsed input to a custom precision", () => {
    const coarse = createDecimalScalar({ precision: 4 });
    expect(str(coarse.parse("1.23456"))).toBe("1.2346");
    expect(str(coarse.pi())).toBe("3.1416");
  });

  it("round-trips extreme magnitudes through format and parse", () => {
    const big = d("1234e20");
    expect(D.format(big)).toBe("123400000000000000000000");
    expect(D.equals(D.parse(D.format(big)), big)).toBe(true);
  });
});
