/**
 * @tally/money — Configuration.
 *
 * Loads and validates formatter configuration from environment
 * variables using Zod. Money arithmetic itself takes no configuration.
 */

import { pino } from "pino";
import type { DestinationStream } from "pino";
import { z } from "zod";
import { CurrencyFormatter } from "./formatter.js";
import { DEFAULT_LOCALE } from "./types.js";

// =============================================================================
// Schema
// =============================================================================

/**
 * Whether Intl.NumberFormat has data for a locale.
 * Malformed tags make supportedLocalesOf throw a RangeError.
 */
function isSupportedLocale(locale: string): boolean {
  try {
    return Intl.NumberFormat.supportedLocalesOf(locale).length > 0;
  } catch (err) {
    if (err instanceof RangeError) {
      return false;
    }
    throw err;
  }
}

export const ConfigSchema = z.object({
  MONEY_LOCALE: z
    .string()
    .default(DEFAULT_LOCALE)
    .refine(isSupportedLocale, { message: "Unsupported display locale" }),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("info"),
});

export type MoneyConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if env vars are invalid
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): MoneyConfig {
  return ConfigSchema.parse(env);
}

/**
 * Build a formatter for the configured locale, logging through pino
 * at the configured level. Logs go to stdout unless a destination is given.
 */
export function createFormatter(
  config: MoneyConfig,
  destination?: DestinationStream,
): CurrencyFormatter {
  const options = { level: config.LOG_LEVEL };
  const logger = destination !== undefined ? pino(options, destination) : pino(options);
  return new CurrencyFormatter({ locale: config.MONEY_LOCALE, logger });
}
