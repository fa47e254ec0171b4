/**
 * @tally/money — Exact decimal parsing.
 *
 * Turns decimal text into a scaled bigint without passing through
 * binary floating point, so "6150593.22" is read as exactly
 * 615059322 × 10^-2 before any conversion to number happens.
 * formatDecimal goes the other way, for display without rounding.
 */

import { MoneyError } from "./types.js";

/**
 * An exact decimal: coefficient × 10^-scale.
 */
export interface Decimal {
  readonly coefficient: bigint;
  readonly scale: number;
}

// Digits with at most one decimal point, at least one digit overall.
const DECIMAL_TEXT = /^(?:\d+\.?\d*|\.\d+)$/;

// Signed plain decimal, as formatDecimal writes it.
const NUMERIC_LITERAL = /^-?\d+(?:\.\d+)?$/;

/**
 * Drop every character that is not an ASCII digit or a decimal point.
 *
 * "$6,150,593.22" → "6150593.22"
 * "-$5.00" → "5.00" (the sign goes too)
 */
export function stripToDecimal(text: string): string {
  return text.replace(/[^\d.]/g, "");
}

/**
 * Parse unsigned decimal text into an exact Decimal.
 *
 * "100.50" → { coefficient: 10050n, scale: 2 }
 * "5." → { coefficient: 5n, scale: 0 }
 * ".25" → { coefficient: 25n, scale: 2 }
 */
export function parseDecimal(text: string): Decimal {
  if (!DECIMAL_TEXT.test(text)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid decimal text: "${text}"`);
  }

  const [intPart = "", fracPart = ""] = text.split(".");
  const digits = `${intPart}${fracPart}`;

  return {
    coefficient: BigInt(digits),
    scale: fracPart.length,
  };
}

/**
 * Nearest number to an exact Decimal.
 *
 * Goes through exponent notation so the runtime's correctly
 * rounded string-to-number conversion does the work.
 */
export function decimalToNumber(decimal: Decimal): number {
  return Number(`${decimal.coefficient.toString()}e-${String(decimal.scale)}`);
}

function isNumericLiteral(text: string): text is Intl.StringNumericLiteral {
  return NUMERIC_LITERAL.test(text);
}

/**
 * Exact decimal text of a Decimal, with a leading zero and a sign.
 *
 * { coefficient: -5n, scale: 2 } → "-0.05"
 * { coefficient: 123456789012345678901n, scale: 2 } → "1234567890123456789.01"
 */
export function formatDecimal(decimal: Decimal): Intl.StringNumericLiteral {
  const { coefficient, scale } = decimal;
  if (!Number.isInteger(scale) || scale < 0) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid decimal scale: ${String(scale)}`);
  }

  const sign = coefficient < 0n ? "-" : "";
  const digits = (coefficient < 0n ? -coefficient : coefficient).toString();

  let text = `${sign}${digits}`;
  if (scale > 0) {
    const padded = digits.padStart(scale + 1, "0");
    const point = padded.length - scale;
    text = `${sign}${padded.slice(0, point)}.${padded.slice(point)}`;
  }

  if (!isNumericLiteral(text)) {
    throw new MoneyError("INVALID_AMOUNT", `Invalid decimal text: "${text}"`);
  }
  return text;
}
