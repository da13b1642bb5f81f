/**
 * @tallybook/types — Shared domain types for the tallybook ledger format.
 *
 * Used by the ledger engine and the command-line checker:
 * - Account kinds and account references (parsed and resolved)
 * - Amounts and price quotes (parsed and resolved)
 * - Dated statements and transaction headers
 *
 * Design rules:
 * - All types are immutable (readonly)
 * - No runtime dependencies
 * - No semantic interpretation in types — meaning lives in the ledger engine
 */

// Account types
export type {
  AccountKind,
  ParsedAccount,
  TxnAccount,
} from "./account.js";
export { ACCOUNT_KINDS } from "./account.js";

// Date type
export type { LedgerDate } from "./date.js";

// Amount types
export type {
  UnitIndex,
  ParsedPrice,
  ParsedAmount,
  Price,
  Amount,
} from "./amount.js";

// Statement types
export type {
  TransactionState,
  TxnHeader,
  ParsedExchange,
  CustomStatement,
  OpenStatement,
  CloseStatement,
  PadStatement,
  BalanceStatement,
  PriceStatement,
  TransactionStatement,
  Statement,
  StatementType,
} from "./statement.js";
export { TRANSACTION_STATE_SYMBOLS } from "./statement.js";

// Runtime type guards
export {
  isAccountKind,
  isParsedAccount,
  isTxnAccount,
  isLedgerDate,
  isParsedAmount,
  isAmount,
  isTransactionState,
  isStatementType,
} from "./guards.js";
