/**
 * @tallybook/ledger — Amount arithmetic.
 *
 * Nominals are plain numbers. Amounts of different currencies are
 * combined through the price quotes attached to the right-hand amount.
 *
 * Rules:
 * - The result of add() takes the left-hand currency and price list
 * - A missing quote is a CURRENCY_CONVERSION error, never a 1:1 guess
 * - is-zero is an exact comparison; no epsilon
 */

import type { Amount, UnitIndex } from "@tallybook/types";
import { CurrencyConversionError, LedgerError } from "./types.js";

const NOMINAL_PATTERN = /^-?\d+(\.\d+)?$/;

// ─── Nominals ────────────────────────────────────────────────────────────

/**
 * Parse a decimal nominal as written in source.
 *
 * "199" → 199
 * "-65750.55" → -65750.55
 */
export function parseNominal(text: string): number {
  const trimmed = text.trim();
  if (!NOMINAL_PATTERN.test(trimmed)) {
    throw new LedgerError("INVALID_AMOUNT", `Invalid nominal: "${text}"`);
  }
  return Number(trimmed);
}

/**
 * Format a nominal for display. Negative zero prints as "0".
 */
export function formatNominal(nominal: number): string {
  return Object.is(nominal, -0) ? "0" : String(nominal);
}

// ─── Public API ──────────────────────────────────────────────────────────

/**
 * Create a zero amount in the given currency, with no price quotes.
 */
export function zeroAmount(currency: UnitIndex): Amount {
  return { nominal: 0, currency, prices: [] };
}

/**
 * Flip the sign of an amount. Currency and prices are kept.
 */
export function negateAmount(amount: Amount): Amount {
  return { nominal: -amount.nominal, currency: amount.currency, prices: amount.prices };
}

/**
 * The rate quoted on `amount` for converting into `target`,
 * or undefined when no quote names that currency.
 */
export function conversionRate(amount: Amount, target: UnitIndex): number | undefined {
  if (amount.currency === target) {
    return 1;
  }
  return amount.prices.find((p) => p.currency === target)?.nominal;
}

/**
 * Add b to a, in a's currency.
 *
 * Throws CurrencyConversionError when the currencies differ and b carries
 * no quote into a's currency.
 */
export function addAmounts(a: Amount, b: Amount): Amount {
  const rate = conversionRate(b, a.currency);
  if (rate === undefined) {
    throw new CurrencyConversionError(b.currency, a.currency);
  }
  return {
    nominal: a.nominal + b.nominal * rate,
    currency: a.currency,
    prices: a.prices,
  };
}

/**
 * Subtract b from a: add(a, negate(b)).
 */
export function subtractAmounts(a: Amount, b: Amount): Amount {
  return addAmounts(a, negateAmount(b));
}

/**
 * Check if an amount's nominal is exactly zero.
 */
export function isZero(amount: Amount): boolean {
  return amount.nominal === 0;
}

/**
 * Check if an amount is positive (> 0).
 */
export function isPositive(amount: Amount): boolean {
  return amount.nominal > 0;
}
