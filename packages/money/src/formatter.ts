/**
 * @tally/money — Currency display formatting.
 *
 * Writes a minor-unit amount as exact major-unit decimal text and
 * hands it, with the currency code and a locale, to Intl.NumberFormat.
 * Locale data, grouping and symbol placement all come from Intl.
 */

import { pino } from "pino";
import type { Logger } from "pino";
import { describeType, isMoneyValue } from "@tally/types";
import type { Currency, MoneyValue } from "@tally/types";
import { decimalToNumber, formatDecimal } from "./decimal.js";
import { DEFAULT_LOCALE, MINOR_UNIT_DIGITS, MoneyError } from "./types.js";

export interface CurrencyFormatterOptions {
  /** BCP 47 display locale (default: "en-US") */
  readonly locale?: string | undefined;

  /** Logger for format construction (default: silent) */
  readonly logger?: Logger | undefined;
}

/**
 * Formats money values for display in one locale.
 *
 * One Intl.NumberFormat is built per currency and reused.
 */
export class CurrencyFormatter {
  readonly locale: string;
  private readonly logger: Logger;
  private readonly formats = new Map<Currency, Intl.NumberFormat>();

  constructor(options: CurrencyFormatterOptions = {}) {
    this.locale = options.locale ?? DEFAULT_LOCALE;
    this.logger = options.logger ?? pino({ level: "silent" });
  }

  /**
   * Display string for a money value, e.g. "$1,000.00".
   *
   * @throws MoneyError INVALID_OPERAND unless the value has a bigint
   *   amount and a three-letter currency code
   */
  format(value: MoneyValue): string {
    if (!isMoneyValue(value)) {
      throw new MoneyError(
        "INVALID_OPERAND",
        `format takes a money value, got ${describeType(value)}`,
      );
    }
    const text = formatDecimal({ coefficient: value.amount, scale: MINOR_UNIT_DIGITS });
    return this.numberFormat(value.currency).format(text);
  }

  private numberFormat(currency: Currency): Intl.NumberFormat {
    const cached = this.formats.get(currency);
    if (cached !== undefined) {
      return cached;
    }

    const created = new Intl.NumberFormat(this.locale, {
      style: "currency",
      currency,
    });
    this.formats.set(currency, created);
    this.logger.debug({ locale: this.locale, currency }, "Created currency number format");
    return created;
  }
}

/**
 * Nearest number to a value's amount in major units.
 *
 * 100050n → 1000.5
 */
export function toMajorUnits(value: MoneyValue): number {
  return decimalToNumber({ coefficient: value.amount, scale: MINOR_UNIT_DIGITS });
}
