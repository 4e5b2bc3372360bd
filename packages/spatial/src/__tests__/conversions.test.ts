import { describe, expect, it } from "vitest";
import { ConversionError } from "@orbis/core";
import { decimalFromString, decimalToString, huge } from "@orbis/numeric";
import {
  decimalToHuge,
  doubleToDecimal,
  doubleToHuge,
  doubleToSingleOrThrow,
  mapVector2,
  tryDecimalToDouble,
  tryDoubleToSingle,
  tryHugeToDecimal,
  tryHugeToDouble,
  tryMapVector3,
} from "../index.js";

describe("widening conversions", () => {
  it("converts doubles to exact decimals", () => {
    expect(decimalToString(doubleToDecimal(0.1))).toBe("0.1");
    expect(() => doubleToDecimal(NaN)).toThrow(ConversionError);
  });

  it("keeps decimal magnitude in a huge number", () => {
    expect(decimalToHuge(decimalFromString("12345.5"))).toEqual({ mantissa: 1.23455, exponent: 4 });
  });

  it("lifts over vectors", () => {
    expect(mapVector2({ x: 1, y: 2 }, doubleToHuge)).toEqual({
      x: { mantissa: 1, exponent: 0 },
      y: { mantissa: 2, exponent: 0 },
    });
  });
});

describe("narrowing conversions", () => {
  it("rounds doubles into single range", () => {
    expect(tryDoubleToSingle(0.1)).toEqual({ ok: true, value: Math.fround(0.1) });
  });

  it("fails on single overflow", () => {
    const result = tryDoubleToSingle(1e39);
    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(ConversionError);
      expect(result.error.message).toBe("Cannot convert 1e+39 from double to single");
    }
    expect(() => doubleToSingleOrThrow(-1e39)).toThrow(ConversionError);
  });

  it("fails when a decimal or huge number exceeds the double range", () => {
    expect(tryDecimalToDouble(decimalFromString("1e400")).ok).toBe(false);
    expect(tryHugeToDouble(huge(1, 400)).ok).toBe(false);
    expect(tryHugeToDouble(huge(2.5, 3))).toEqual({ ok: true, value: 2500 });
  });

  it("moves huge values into decimals unless they are not finite", () => {
    const result = tryHugeToDecimal(huge(1.5, 300));
    expect(result.ok && decimalToString(result.value)).toBe("15" + "0".repeat(299));
    expect(tryHugeToDecimal(huge(Infinity)).ok).toBe(false);
  });

  it("reports the first failing component of a vector", () => {
    const bad = tryMapVector3({ x: 1, y: 1e39, z: 2 }, tryDoubleToSingle);
    expect(bad.ok).toBe(false);
    if (!bad.ok) {
      expect(bad.error.input).toBe("1e+39");
    }
    expect(tryMapVector3({ x: 1, y: 2, z: 3 }, tryDoubleToSingle)).toEqual({
      ok: true,
      value: { x: 1, y: 2, z: 3 },
    });
  });
});
