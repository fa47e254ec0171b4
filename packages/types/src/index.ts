/**
 * @tally/types — Shared primitive types for the Tally packages.
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - Integers are bigint, floats are number; the two never mix implicitly
 */

// Financial types
export type {
  Currency,
  MinorUnits,
  MajorUnits,
  MoneyValue,
} from "./financial.js";

// Runtime type guards
export {
  isMinorUnits,
  isMajorUnits,
  isCurrencyCode,
  isMoneyValue,
  describeType,
} from "./guards.js";
