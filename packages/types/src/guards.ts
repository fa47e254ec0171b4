/**
 * Runtime Type Guards
 *
 * Narrowing functions for Tally primitive types.
 * Arithmetic entry points call these to tell integers (bigint)
 * from floats (number) at run time, since callers in plain
 * JavaScript are not held to the declared parameter types.
 */

import type { Currency, MajorUnits, MinorUnits, MoneyValue } from "./financial.js";

const CURRENCY_CODE = /^[A-Z]{3}$/;

export function isMinorUnits(value: unknown): value is MinorUnits {
  return typeof value === "bigint";
}

/**
 * Finite numbers only. NaN and the infinities carry no amount.
 */
export function isMajorUnits(value: unknown): value is MajorUnits {
  return typeof value === "number" && Number.isFinite(value);
}

export function isCurrencyCode(value: unknown): value is Currency {
  return typeof value === "string" && CURRENCY_CODE.test(value);
}

export function isMoneyValue(value: unknown): value is MoneyValue {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isMinorUnits(v.amount) && isCurrencyCode(v.currency);
}

/**
 * Short name of a value's runtime type, for error messages.
 *
 * Class instances report their constructor name ("Money", "Date"),
 * everything else its typeof ("number", "string", "null").
 */
export function describeType(value: unknown): string {
  if (value === null) return "null";
  if (typeof value !== "object") return typeof value;
  const name: unknown = Object.getPrototypeOf(value)?.constructor?.name;
  return typeof name === "string" && name !== "" ? name : "object";
}
