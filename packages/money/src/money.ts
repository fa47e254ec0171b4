/**
 * @tally/money — The Money value type.
 *
 * Fowler's Money pattern: an immutable amount of integer minor units
 * (cents) paired with a currency code.
 *
 * Rules:
 * - Amounts are bigint; a number is never accepted where an integer is expected
 * - add, subtract and comparisons take Money or bigint, never number
 * - multiply and the division family also take number, rounding half to even
 * - Every operation returns a new instance
 */

import { describeType, isMajorUnits, isMinorUnits } from "@tally/types";
import type { Currency, MoneyValue } from "@tally/types";
import { decimalToNumber, parseDecimal, stripToDecimal } from "./decimal.js";
import { CurrencyFormatter, toMajorUnits } from "./formatter.js";
import { divideHalfEven, floorDiv, roundHalfEven } from "./rounding.js";
import {
  DEFAULT_CURRENCY,
  MINOR_UNITS_PER_MAJOR,
  MoneyError,
} from "./types.js";
import type { Ordering } from "./types.js";

/** Operand of add, subtract and the comparisons. */
export type IntegerOperand = Money | bigint;

/** Operand of multiply. */
export type Factor = bigint | number;

/** Operand of divide and floorDivide. */
export type Divisor = Money | bigint | number;

const defaultFormatter = new CurrencyFormatter();

// ─── Internal Helpers ────────────────────────────────────────────────────

function invalidOperand(operation: string, operand: unknown, accepted: string): MoneyError {
  return new MoneyError(
    "INVALID_OPERAND",
    `${operation} takes ${accepted}, got ${describeType(operand)}`,
  );
}

function divisionByZero(): MoneyError {
  return new MoneyError("DIVISION_BY_ZERO", "Division by zero");
}

/**
 * Minor units behind a Money-or-bigint operand.
 */
function integerOperand(operation: string, operand: unknown): bigint {
  if (operand instanceof Money) return operand.amount;
  if (isMinorUnits(operand)) return operand;
  throw invalidOperand(operation, operand, "a Money or an integer amount");
}

/**
 * Division accepts infinities as well as finite floats; NaN carries no quotient.
 */
function isFloatDivisor(value: unknown): value is number {
  return typeof value === "number" && !Number.isNaN(value);
}

/**
 * floor(dividend / divisor) in floating point.
 *
 * A quotient that underflows to -0 against an infinite divisor still
 * lies below zero, so it floors to -1.
 */
function floorQuotient(dividend: number, divisor: number): number {
  if (!Number.isFinite(divisor) && dividend !== 0) {
    return dividend < 0 !== divisor < 0 ? -1 : 0;
  }
  return Math.floor(dividend / divisor);
}

/**
 * Convert an integral float result back to minor units.
 * Overflow to ±Infinity leaves no amount to keep.
 */
function integralToMinorUnits(operation: string, value: number): bigint {
  if (!Number.isFinite(value)) {
    throw new MoneyError("INVALID_OPERAND", `${operation} result is not a finite amount`);
  }
  return BigInt(value);
}

// ─── Money ───────────────────────────────────────────────────────────────

export class Money implements MoneyValue {
  /** Signed amount in minor units */
  readonly amount: bigint;

  /** Fixed currency code, not compared by equals */
  readonly currency: Currency = DEFAULT_CURRENCY;

  /**
   * @throws MoneyError INVALID_AMOUNT unless amount is a bigint
   */
  constructor(amount: bigint) {
    if (!isMinorUnits(amount)) {
      throw new MoneyError(
        "INVALID_AMOUNT",
        `Amount must be an integer (bigint), got ${describeType(amount)}`,
      );
    }
    this.amount = amount;
    Object.freeze(this);
  }

  static of(amount: bigint): Money {
    return new Money(amount);
  }

  static zero(): Money {
    return new Money(0n);
  }

  /**
   * Money from a major-unit float, floored to the cent.
   *
   * Floors rather than rounds: fromFloat(-0.001) is -1 cent, and
   * fromFloat(10.999) is 1099 cents.
   */
  static fromFloat(amount: number): Money {
    if (!isMajorUnits(amount)) {
      throw new MoneyError(
        "INVALID_AMOUNT",
        `Amount must be a finite float, got ${describeType(amount)}`,
      );
    }

    const scaled = Math.floor(amount * Number(MINOR_UNITS_PER_MAJOR));
    if (!Number.isFinite(scaled)) {
      throw new MoneyError("INVALID_AMOUNT", `Amount ${String(amount)} is out of range`);
    }
    return new Money(BigInt(scaled));
  }

  /**
   * Money from display text such as "$6,150,593.22".
   *
   * Everything but digits and "." is dropped before parsing, the
   * minus sign included, so "-$5.00" reads as 500 cents.
   * The parsed value then goes through fromFloat, whose floor keeps
   * binary drift: "$0.29" is 28 cents.
   */
  static fromString(text: string): Money {
    if (typeof text !== "string") {
      throw new MoneyError(
        "INVALID_AMOUNT",
        `Amount must be a string, got ${describeType(text)}`,
      );
    }
    const decimal = parseDecimal(stripToDecimal(text));
    return Money.fromFloat(decimalToNumber(decimal));
  }

  /**
   * A new Money of the same currency holding `amount`.
   */
  instance(amount: bigint): Money {
    return new Money(amount);
  }

  // ─── Arithmetic ────────────────────────────────────────────────────────

  add(other: IntegerOperand): Money {
    return this.instance(this.amount + integerOperand("add", other));
  }

  subtract(other: IntegerOperand): Money {
    return this.instance(this.amount - integerOperand("subtract", other));
  }

  /**
   * Reflected subtraction: `other - this`.
   */
  subtractFrom(other: IntegerOperand): Money {
    return this.negate().add(other);
  }

  /**
   * Integer factors multiply exactly. Float factors multiply in
   * floating point and round half to even: 1000 × 1.0009 → 1001.
   */
  multiply(factor: Factor): Money {
    if (isMinorUnits(factor)) {
      return this.instance(this.amount * factor);
    }
    if (isMajorUnits(factor)) {
      const product = roundHalfEven(Number(this.amount) * factor);
      return this.instance(integralToMinorUnits("multiply", product));
    }
    throw invalidOperand("multiply", factor, "an integer or a finite float");
  }

  /**
   * True division, rounded half to even.
   *
   * An infinite float divisor gives zero.
   *
   * Dividing by a Money yields the bare ratio as a bigint, not a
   * Money; floorDivide by a Money yields a Money. Both are kept.
   *
   * @throws MoneyError DIVISION_BY_ZERO for a zero divisor
   */
  divide(other: Money): bigint;
  divide(other: bigint | number): Money;
  divide(other: Divisor): Money | bigint;
  divide(other: Divisor): Money | bigint {
    if (other instanceof Money) {
      if (other.amount === 0n) throw divisionByZero();
      return divideHalfEven(this.amount, other.amount);
    }
    if (isMinorUnits(other)) {
      if (other === 0n) throw divisionByZero();
      return this.instance(divideHalfEven(this.amount, other));
    }
    if (isFloatDivisor(other)) {
      if (other === 0) throw divisionByZero();
      const quotient = roundHalfEven(Number(this.amount) / other);
      return this.instance(integralToMinorUnits("divide", quotient));
    }
    throw invalidOperand("divide", other, "a Money, an integer or a float");
  }

  /**
   * Floor division (toward negative infinity). Always returns Money,
   * unlike divide by a Money which returns a bigint.
   *
   * An infinite float divisor gives 0, or -1 when the amount is non-zero
   * and its sign differs from the divisor's.
   *
   * @throws MoneyError DIVISION_BY_ZERO for a zero divisor
   */
  floorDivide(other: Divisor): Money {
    if (other instanceof Money) {
      if (other.amount === 0n) throw divisionByZero();
      return this.instance(floorDiv(this.amount, other.amount));
    }
    if (isMinorUnits(other)) {
      if (other === 0n) throw divisionByZero();
      return this.instance(floorDiv(this.amount, other));
    }
    if (isFloatDivisor(other)) {
      if (other === 0) throw divisionByZero();
      const quotient = floorQuotient(Number(this.amount), other);
      return this.instance(integralToMinorUnits("floorDivide", quotient));
    }
    throw invalidOperand("floorDivide", other, "a Money, an integer or a float");
  }

  negate(): Money {
    return this.instance(-this.amount);
  }

  plus(): Money {
    return this.instance(this.amount);
  }

  abs(): Money {
    return this.instance(this.amount < 0n ? -this.amount : this.amount);
  }

  /**
   * Round to the nearest whole major unit, ties to even.
   *
   * 1001 → 1000, 1051 → 1100, 1050 → 1000, 1150 → 1200
   */
  round(): Money {
    const units = divideHalfEven(this.amount, MINOR_UNITS_PER_MAJOR);
    return this.instance(units * MINOR_UNITS_PER_MAJOR);
  }

  // ─── Casting ───────────────────────────────────────────────────────────

  toInteger(): bigint {
    return this.amount;
  }

  /**
   * Major units to two decimal places. Display only: large amounts
   * lose precision.
   */
  toFloat(): number {
    return toMajorUnits(this);
  }

  // ─── Comparison ────────────────────────────────────────────────────────

  /**
   * Three-way comparison of amounts. Currency is not considered.
   */
  compareTo(other: IntegerOperand): Ordering {
    const rhs = integerOperand("compareTo", other);
    if (this.amount < rhs) return -1;
    if (this.amount > rhs) return 1;
    return 0;
  }

  equals(other: IntegerOperand): boolean {
    return this.amount === integerOperand("equals", other);
  }

  lessThan(other: IntegerOperand): boolean {
    return this.amount < integerOperand("lessThan", other);
  }

  lessThanOrEqual(other: IntegerOperand): boolean {
    return this.amount <= integerOperand("lessThanOrEqual", other);
  }

  greaterThan(other: IntegerOperand): boolean {
    return this.amount > integerOperand("greaterThan", other);
  }

  greaterThanOrEqual(other: IntegerOperand): boolean {
    return this.amount >= integerOperand("greaterThanOrEqual", other);
  }

  isZero(): boolean {
    return this.amount === 0n;
  }

  isPositive(): boolean {
    return this.amount > 0n;
  }

  isNegative(): boolean {
    return this.amount < 0n;
  }

  // ─── Display ───────────────────────────────────────────────────────────

  format(formatter: CurrencyFormatter): string {
    return formatter.format(this);
  }

  /**
   * en-US currency string, e.g. "$1,000.00".
   */
  toString(): string {
    return this.format(defaultFormatter);
  }
}
