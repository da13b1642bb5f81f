/**
 * @tallybook/ledger — Internal types for the ledger engine.
 *
 * These extend the shared @tallybook/types with resolved structures
 * produced while a ledger is being built.
 *
 * Rules:
 * - All exposed types are readonly
 * - Fail-closed: invalid input throws LedgerError, never silently succeeds
 * - Balance diagnostics are data, not exceptions
 */

import type { Logger } from "pino";
import type { Amount, LedgerDate, TxnAccount, UnitIndex } from "@tallybook/types";

// ─── Account Activity ────────────────────────────────────────────────────

/**
 * One open/close window of an account.
 * The account is usable on `d` when `openedAt <= d` and `closedAt` is
 * absent or later than `d`.
 */
export interface AccountWindow {
  readonly openedAt: LedgerDate;
  readonly closedAt?: LedgerDate | undefined;
}

// ─── Bookings ────────────────────────────────────────────────────────────

/** One leg of a transaction. `elided` marks the leg inferred by balancing. */
export interface Exchange {
  readonly account: TxnAccount;
  readonly amount: Amount;
  readonly elided: boolean;
}

/** Input leg for balancing; an absent amount is inferred. */
export interface ExchangeInput {
  readonly account: TxnAccount;
  readonly amount?: Amount | undefined;
}

/** Recorded intent to pad `target` from `source`. Nothing is synthesized. */
export interface PadTransaction {
  readonly target: TxnAccount;
  readonly source: TxnAccount;
}

/** Expected account amount at a date, checked by reporting collaborators. */
export interface BalanceAssertion {
  readonly account: TxnAccount;
  readonly amount: Amount;
}

/** A `price` statement: one unit of `currency` is worth `price`. */
export interface PriceQuote {
  readonly currency: UnitIndex;
  readonly price: Amount;
}

// ─── Balance Diagnostics ─────────────────────────────────────────────────

/**
 * `with-sum` folds every leg into the anchor currency and requires zero;
 * `without-sum` only checks the leg count.
 */
export type BalanceCheck = "with-sum" | "without-sum";

export type BalanceDiagnostic =
  | { readonly kind: "unbalanced"; readonly exchangeCount: number }
  | { readonly kind: "not-zero-sum"; readonly sum: Amount }
  | { readonly kind: "other"; readonly error: LedgerError };

// ─── Error Types ─────────────────────────────────────────────────────────

/** Error codes for ledger operations. */
export type LedgerErrorCode =
  | "SYNTAX_ERROR"
  | "INVALID_DATE"
  | "INVALID_ACCOUNT"
  | "INVALID_AMOUNT"
  | "UNKNOWN_SEGMENT"
  | "UNRESOLVED_ACCOUNT"
  | "ACCOUNT_NOT_VALID_AT_DATE"
  | "CLOSE_WITHOUT_OPEN"
  | "DUPLICATE_CLOSE"
  | "UNDECLARED_UNIT"
  | "TOO_MANY_ELIDED_AMOUNTS"
  | "MISSING_AMOUNT"
  | "CURRENCY_CONVERSION"
  | "UNDEFINED_SEGMENT_INDEX"
  | "INCLUDE_CYCLE"
  | "IO_ERROR";

/**
 * Structured error from the ledger engine.
 * Always thrown — never returns error codes silently.
 */
export class LedgerError extends Error {
  public readonly code: LedgerErrorCode;

  constructor(code: LedgerErrorCode, message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = "LedgerError";
    this.code = code;
  }

  /**
   * Same error with `context` prefixed to the message,
   * e.g. the source line or the included file it came from.
   */
  withContext(context: string): LedgerError {
    return new LedgerError(this.code, `${context}: ${this.message}`, { cause: this });
  }
}

/** 1-based position of a token within the ledger source. */
export interface SourceLocation {
  readonly line: number;
  readonly column: number;
  /** The offending source line, trimmed. */
  readonly text: string;
}

/** Malformed input at the grammar layer. */
export class LedgerSyntaxError extends LedgerError {
  public readonly location: SourceLocation;

  constructor(message: string, location: SourceLocation, options?: ErrorOptions) {
    super("SYNTAX_ERROR", message, options);
    this.name = "LedgerSyntaxError";
    this.location = location;
  }

  static at(reason: string, location: SourceLocation): LedgerSyntaxError {
    return new LedgerSyntaxError(
      `syntax error at line ${String(location.line)}, column ${String(location.column)}: ${reason}`,
      location,
    );
  }

  override withContext(context: string): LedgerSyntaxError {
    return new LedgerSyntaxError(`${context}: ${this.message}`, this.location, { cause: this });
  }
}

/**
 * Adding amounts of different currencies where the right-hand amount
 * carries no quote into the left-hand currency.
 */
export class CurrencyConversionError extends LedgerError {
  public readonly from: UnitIndex;
  public readonly to: UnitIndex;

  constructor(from: UnitIndex, to: UnitIndex) {
    super(
      "CURRENCY_CONVERSION",
      `no price quote converts unit #${String(from)} into unit #${String(to)}`,
    );
    this.name = "CurrencyConversionError";
    this.from = from;
    this.to = to;
  }
}

// ─── Parse Options ───────────────────────────────────────────────────────

/**
 * Collaborators for `parse` and `parseFile`.
 */
export interface ParseOptions {
  /** Reads a file as UTF-8 text. Defaults to a synchronous fs read. */
  readonly readFile?: ((path: string) => string) | undefined;
  /** Receives include and summary records. Defaults to a silent logger. */
  readonly logger?: Logger | undefined;
  /** Directory `include` paths are resolved against when parsing bare text. */
  readonly baseDir?: string | undefined;
}
