/**
 * Financial Types
 *
 * Primitive types shared by every Tally package.
 *
 * Rules:
 * - Amounts are integer minor units held as bigint
 * - bigint is the integer type, number is the floating-point type
 * - One currency code per value, no conversion
 */

/**
 * ISO 4217 currency code (e.g. "USD").
 */
export type Currency = string;

/**
 * An exact amount in minor currency units (cents for USD).
 * Signed and unbounded.
 */
export type MinorUnits = bigint;

/**
 * An approximate amount in major currency units (dollars for USD).
 * Only used at the edges: parsing floats in, display values out.
 */
export type MajorUnits = number;

/**
 * Structural shape of a monetary value.
 */
export interface MoneyValue {
  /** Signed amount in minor units */
  readonly amount: MinorUnits;

  /** Currency code of the amount */
  readonly currency: Currency;
}
