/**
 * @tallybook/ledger — Plain-text double-entry ledger engine.
 *
 * Parses ledger source into a validated, date-indexed model:
 * - Accounts are opened before use and valid only inside their windows
 * - Units are declared before any amount may use them
 * - Transactions balance; one elided amount per transaction is inferred
 * - Price quotes on an amount convert it into other units
 *
 * Design rules:
 * - Parsing is atomic: a failed parse never touches the caller's ledger
 * - Fail-closed: invalid statements throw LedgerError with a stable code
 * - Balance problems of a valid transaction are reported as diagnostics
 */

// Entry points
export { parse, parseFile } from "./parser.js";

// Core engine
export { Ledger } from "./ledger.js";
export type { DatedTransaction, TransactionDiagnostics } from "./ledger.js";
export { DayBook } from "./day-book.js";
export { Transaction } from "./transaction.js";

// Stores
export { AccountStore, formatAccount } from "./accounts.js";
export { UnitStore } from "./units.js";

// Grammar & statement building
export { parseRule } from "./grammar.js";
export type { EntryRule, GrammarRule, ParseNode } from "./grammar.js";
export {
  buildAccount,
  buildAmount,
  buildDate,
  buildHeader,
  buildStatement,
  parseAccount,
  parseAmount,
  parseStatement,
} from "./statement-builder.js";

// Amount arithmetic
export {
  parseNominal,
  formatNominal,
  zeroAmount,
  negateAmount,
  conversionRate,
  addAmounts,
  subtractAmounts,
  isZero,
  isPositive,
} from "./amount-math.js";

// Types
export type {
  AccountWindow,
  Exchange,
  ExchangeInput,
  PadTransaction,
  BalanceAssertion,
  PriceQuote,
  BalanceCheck,
  BalanceDiagnostic,
  LedgerErrorCode,
  SourceLocation,
  ParseOptions,
} from "./types.js";

export { LedgerError, LedgerSyntaxError, CurrencyConversionError } from "./types.js";
