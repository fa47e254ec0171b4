/**
 * Runtime type guard tests for @tally/types
 *
 * Validates that guards separate integers from floats
 * and reject malformed values at the arithmetic boundary.
 */
import { describe, it, expect } from "vitest";
import {
  isMinorUnits,
  isMajorUnits,
  isCurrencyCode,
  isMoneyValue,
  describeType,
} from "../src/guards.js";

// =============================================================================
// Amount guards
// =============================================================================

describe("isMinorUnits", () => {
  it("accepts bigint values", () => {
    expect(isMinorUnits(0n)).toBe(true);
    expect(isMinorUnits(-1000n)).toBe(true);
    expect(isMinorUnits(10n ** 30n)).toBe(true);
  });

  it("rejects whole-valued numbers", () => {
    expect(isMinorUnits(1000)).toBe(false);
    expect(isMinorUnits(1000.0)).toBe(false);
  });

  it("rejects strings and objects", () => {
    expect(isMinorUnits("1000")).toBe(false);
    expect(isMinorUnits({ amount: 1000n })).toBe(false);
    expect(isMinorUnits(null)).toBe(false);
  });
});

describe("isMajorUnits", () => {
  it("accepts finite numbers", () => {
    expect(isMajorUnits(10)).toBe(true);
    expect(isMajorUnits(-0.5)).toBe(true);
  });

  it("rejects NaN and infinities", () => {
    expect(isMajorUnits(Number.NaN)).toBe(false);
    expect(isMajorUnits(Number.POSITIVE_INFINITY)).toBe(false);
    expect(isMajorUnits(Number.NEGATIVE_INFINITY)).toBe(false);
  });

  it("rejects bigint", () => {
    expect(isMajorUnits(10n)).toBe(false);
  });
});

// =============================================================================
// Currency & money guards
// =============================================================================

describe("isCurrencyCode", () => {
  it("accepts three upper-case letters", () => {
    expect(isCurrencyCode("USD")).toBe(true);
    expect(isCurrencyCode("EUR")).toBe(true);
  });

  it("rejects other shapes", () => {
    expect(isCurrencyCode("usd")).toBe(false);
    expect(isCurrencyCode("USDC")).toBe(false);
    expect(isCurrencyCode("")).toBe(false);
    expect(isCurrencyCode(840)).toBe(false);
  });
});

describe("isMoneyValue", () => {
  it("accepts a well-formed value", () => {
    expect(isMoneyValue({ amount: 1050n, currency: "USD" })).toBe(true);
  });

  it("rejects a number amount", () => {
    expect(isMoneyValue({ amount: 10.5, currency: "USD" })).toBe(false);
  });

  it("rejects a missing currency", () => {
    expect(isMoneyValue({ amount: 1050n })).toBe(false);
  });

  it("rejects primitives and null", () => {
    expect(isMoneyValue(null)).toBe(false);
    expect(isMoneyValue(1050n)).toBe(false);
    expect(isMoneyValue("$10.50")).toBe(false);
  });
});

// =============================================================================
// describeType
// =============================================================================

describe("describeType", () => {
  it("names primitive types", () => {
    expect(describeType(1)).toBe("number");
    expect(describeType(1n)).toBe("bigint");
    expect(describeType("x")).toBe("string");
    expect(describeType(undefined)).toBe("undefined");
    expect(describeType(null)).toBe("null");
  });

  it("names class instances by constructor", () => {
    class Wallet {}
    expect(describeType(new Wallet())).toBe("Wallet");
    expect(describeType(new Date(0))).toBe("Date");
  });

  it("falls back to object for prototype-less values", () => {
    expect(describeType(Object.create(null))).toBe("object");
    expect(describeType({})).toBe("Object");
  });
});
