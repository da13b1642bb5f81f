/**
 * Statement Types
 *
 * The dated statements of the ledger format, after the grammar layer
 * has split them and before any account or unit is resolved.
 */

import type { ParsedAccount } from "./account.js";
import type { ParsedAmount } from "./amount.js";
import type { LedgerDate } from "./date.js";

/**
 * Transaction flags.
 *
 * `*` settled, `!` unsettled, `#` recurring. Virtual transactions have
 * no source symbol; they are only ever constructed programmatically.
 */
export type TransactionState = "settled" | "unsettled" | "recurring" | "virtual";

export const TRANSACTION_STATE_SYMBOLS: Readonly<Record<string, TransactionState>> = {
  "*": "settled",
  "!": "unsettled",
  "#": "recurring",
};

export interface TxnHeader {
  readonly state: TransactionState;
  readonly payee?: string | undefined;
  readonly title: string;
}

/** One posting line; `amount` is absent when elided in source. */
export interface ParsedExchange {
  readonly account: ParsedAccount;
  readonly amount?: ParsedAmount | undefined;
}

interface StatementBase {
  readonly date: LedgerDate;
  /** 1-based source line, when the statement came from text. */
  readonly line?: number | undefined;
}

export interface CustomStatement extends StatementBase {
  readonly type: "custom";
  readonly args: readonly string[];
}

export interface OpenStatement extends StatementBase {
  readonly type: "open";
  readonly account: ParsedAccount;
}

export interface CloseStatement extends StatementBase {
  readonly type: "close";
  readonly account: ParsedAccount;
}

export interface PadStatement extends StatementBase {
  readonly type: "pad";
  readonly target: ParsedAccount;
  readonly source: ParsedAccount;
}

export interface BalanceStatement extends StatementBase {
  readonly type: "balance";
  readonly account: ParsedAccount;
  readonly amount: ParsedAmount;
}

export interface PriceStatement extends StatementBase {
  readonly type: "price";
  readonly currency: string;
  readonly price: ParsedAmount;
}

export interface TransactionStatement extends StatementBase {
  readonly type: "transaction";
  readonly header: TxnHeader;
  readonly exchanges: readonly ParsedExchange[];
}

export type Statement =
  | CustomStatement
  | OpenStatement
  | CloseStatement
  | PadStatement
  | BalanceStatement
  | PriceStatement
  | TransactionStatement;

export type StatementType = Statement["type"];
