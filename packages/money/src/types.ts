/**
 * @tally/money — Types, constants and the error class.
 */

import type { Currency } from "@tally/types";

// ─── Constants ───────────────────────────────────────────────────────────

/** Currency of every Money value. Not configurable per instance. */
export const DEFAULT_CURRENCY: Currency = "USD";

/** Locale used by Money#toString. */
export const DEFAULT_LOCALE = "en-US";

/** Minor units (cents) in one major unit (dollar). */
export const MINOR_UNITS_PER_MAJOR = 100n;

/** Decimal places between minor and major units. */
export const MINOR_UNIT_DIGITS = 2;

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for money operations. */
export type MoneyErrorCode =
  | "INVALID_AMOUNT"
  | "INVALID_OPERAND"
  | "DIVISION_BY_ZERO";

/**
 * Structured error from the money engine.
 * Thrown by every failing operation; nothing returns an error value.
 */
export class MoneyError extends Error {
  public readonly code: MoneyErrorCode;

  constructor(code: MoneyErrorCode, message: string) {
    super(message);
    this.name = "MoneyError";
    this.code = code;
  }
}

// ─── Comparison ──────────────────────────────────────────────────────────

/** Result of a three-way comparison. */
export type Ordering = -1 | 0 | 1;
