/**
 * Runtime Type Guards
 *
 * Narrowing functions for ledger-format types, for use where values
 * arrive untyped (deserialized snapshots, command-line input).
 */

import { ACCOUNT_KINDS } from "./account.js";
import type { AccountKind, ParsedAccount, TxnAccount } from "./account.js";
import type { Amount, ParsedAmount, ParsedPrice, Price } from "./amount.js";
import type { LedgerDate } from "./date.js";
import type { StatementType, TransactionState } from "./statement.js";

// =============================================================================
// Account guards
// =============================================================================

const KINDS = new Set<string>(ACCOUNT_KINDS);

export function isAccountKind(value: unknown): value is AccountKind {
  return typeof value === "string" && KINDS.has(value);
}

export function isParsedAccount(value: unknown): value is ParsedAccount {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAccountKind(v.kind) &&
    Array.isArray(v.segments) &&
    v.segments.length > 0 &&
    v.segments.every((s) => typeof s === "string" && s.length > 0)
  );
}

export function isTxnAccount(value: unknown): value is TxnAccount {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    isAccountKind(v.kind) &&
    Array.isArray(v.segments) &&
    v.segments.length > 0 &&
    v.segments.every((s) => typeof s === "number" && Number.isInteger(s) && s >= 0)
  );
}

// =============================================================================
// Date guards
// =============================================================================

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;

/**
 * Accepts `YYYY-MM-DD` strings naming a real calendar day
 * (rejects 2021-02-29, 2021-13-01, ...).
 */
export function isLedgerDate(value: unknown): value is LedgerDate {
  if (typeof value !== "string") return false;
  const match = DATE_PATTERN.exec(value);
  if (match === null) return false;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  if (month < 1 || month > 12 || day < 1) return false;

  return day <= daysInMonth(year, month);
}

/** Proleptic Gregorian month length; year 0 is a leap year. */
function daysInMonth(year: number, month: number): number {
  if (month === 2) {
    const leap = (year % 4 === 0 && year % 100 !== 0) || year % 400 === 0;
    return leap ? 29 : 28;
  }
  return month === 4 || month === 6 || month === 9 || month === 11 ? 30 : 31;
}

// =============================================================================
// Amount guards
// =============================================================================

function isParsedPrice(value: unknown): value is ParsedPrice {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.nominal === "number" &&
    Number.isFinite(v.nominal) &&
    typeof v.currency === "string" &&
    v.currency.length > 0
  );
}

export function isParsedAmount(value: unknown): value is ParsedAmount {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isParsedPrice(value) && Array.isArray(v.prices) && v.prices.every(isParsedPrice);
}

function isPrice(value: unknown): value is Price {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return (
    typeof v.nominal === "number" &&
    Number.isFinite(v.nominal) &&
    typeof v.currency === "number" &&
    Number.isInteger(v.currency) &&
    v.currency >= 0
  );
}

export function isAmount(value: unknown): value is Amount {
  if (value === null || typeof value !== "object") return false;
  const v = value as Record<string, unknown>;
  return isPrice(value) && Array.isArray(v.prices) && v.prices.every(isPrice);
}

// =============================================================================
// Statement guards
// =============================================================================

const TRANSACTION_STATES = new Set<string>(["settled", "unsettled", "recurring", "virtual"]);

export function isTransactionState(value: unknown): value is TransactionState {
  return typeof value === "string" && TRANSACTION_STATES.has(value);
}

const STATEMENT_TYPES = new Set<string>([
  "custom", "open", "close", "pad", "balance", "price", "transaction",
]);

export function isStatementType(value: unknown): value is StatementType {
  return typeof value === "string" && STATEMENT_TYPES.has(value);
}
