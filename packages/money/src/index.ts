/**
 * @tally/money — Fixed-point money value type.
 *
 * Amounts live as integer minor units (cents) so that financial
 * arithmetic never drifts through binary floating point.
 *
 * Design rules:
 * - Money is immutable; every operation returns a new instance
 * - bigint is the integer type, number the float type; each
 *   operation states which of the two it accepts
 * - Fail-closed: invalid operands throw MoneyError, never coerce
 * - Money itself does no logging and reads no configuration
 */

// Value type
export { Money } from "./money.js";
export type { IntegerOperand, Factor, Divisor } from "./money.js";

// Rounding
export { floorDiv, divideHalfEven, roundHalfEven } from "./rounding.js";

// Decimal parsing
export { stripToDecimal, parseDecimal, decimalToNumber, formatDecimal } from "./decimal.js";
export type { Decimal } from "./decimal.js";

// Display
export { CurrencyFormatter, toMajorUnits } from "./formatter.js";
export type { CurrencyFormatterOptions } from "./formatter.js";

// Configuration
export { ConfigSchema, loadConfig, createFormatter } from "./config.js";
export type { MoneyConfig } from "./config.js";

// Types
export type { MoneyErrorCode, Ordering } from "./types.js";
export {
  MoneyError,
  DEFAULT_CURRENCY,
  DEFAULT_LOCALE,
  MINOR_UNITS_PER_MAJOR,
  MINOR_UNIT_DIGITS,
} from "./types.js";
