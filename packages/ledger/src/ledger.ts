/**
 * @tallybook/ledger — Core Ledger class.
 *
 * Owns the account store, the unit store, the options map and one
 * DayBook per date. Statements are applied one at a time, in source
 * order; a statement may only reference accounts and units declared
 * by an earlier one.
 *
 * API surface:
 * - process() — Apply one dated statement
 * - declareUnit() / setOption() — Apply an undated directive
 * - getAt() / days() / transactions() — Query bookings by date
 * - resolveAccount() / unresolveAccount() — Map accounts to and from indices
 * - errors() — Balance diagnostics over every transaction
 * - clone() — Deep copy, used to keep parses atomic
 *
 * There is NO update() or delete(). Closing an account adds a window
 * boundary; it does not remove the account.
 */

import type {
  Amount,
  LedgerDate,
  ParsedAccount,
  Statement,
  TransactionStatement,
  TxnAccount,
  UnitIndex,
} from "@tallybook/types";
import { AccountStore, formatAccount } from "./accounts.js";
import { formatNominal } from "./amount-math.js";
import { DayBook } from "./day-book.js";
import { Transaction } from "./transaction.js";
import type { AccountWindow, BalanceCheck, BalanceDiagnostic, ExchangeInput } from "./types.js";
import { CurrencyConversionError, LedgerError } from "./types.js";
import { UnitStore } from "./units.js";

/**
 * A transaction together with the date it is booked on.
 */
export interface DatedTransaction {
  readonly date: LedgerDate;
  readonly transaction: Transaction;
}

/**
 * A transaction that failed a balance check.
 */
export interface TransactionDiagnostics extends DatedTransaction {
  readonly diagnostics: readonly BalanceDiagnostic[];
}

/**
 * Date-indexed, validated double-entry ledger.
 */
export class Ledger {
  private _accounts: AccountStore;
  private _units: UnitStore;
  private readonly _bookings: Map<LedgerDate, DayBook>;
  private readonly _options: Map<string, string>;

  constructor() {
    this._accounts = new AccountStore();
    this._units = new UnitStore();
    this._bookings = new Map();
    this._options = new Map();
  }

  // ─── Directives ──────────────────────────────────────────────────────

  setOption(key: string, value: string): void {
    this._options.set(key, value);
  }

  getOption(key: string): string | undefined {
    return this._options.get(key);
  }

  options(): ReadonlyMap<string, string> {
    return new Map(this._options);
  }

  /**
   * Declare a unit. Re-declaring is a no-op returning the same index.
   */
  declareUnit(code: string): UnitIndex {
    return this._units.declare(code);
  }

  // ─── Statements ──────────────────────────────────────────────────────

  /**
   * Apply one statement. Errors are prefixed with the statement's source
   * line when it has one.
   */
  process(statement: Statement): void {
    try {
      this._apply(statement);
    } catch (err) {
      if (err instanceof LedgerError && statement.line !== undefined) {
        throw err.withContext(`line ${String(statement.line)}`);
      }
      throw err;
    }
  }

  private _apply(statement: Statement): void {
    const { date } = statement;

    switch (statement.type) {
      case "custom":
        this._book(date).addCustom(statement.args);
        break;
      case "open":
        this._accounts.open(statement.account, date);
        break;
      case "close":
        this._accounts.close(statement.account, date);
        break;
      case "pad": {
        const target = this._accounts.resolve(statement.target, date);
        const source = this._accounts.resolve(statement.source, date);
        this._book(date).addPad({ target, source });
        break;
      }
      case "balance": {
        const account = this._accounts.resolve(statement.account, date);
        const amount = this._units.resolveAmount(statement.amount);
        this._book(date).addBalanceAssertion({ account, amount });
        break;
      }
      case "price": {
        const currency = this._units.lookup(statement.currency);
        const price = this._units.resolveAmount(statement.price);
        this._book(date).addPrice({ currency, price });
        break;
      }
      case "transaction":
        this._book(date).addTransaction(this._transaction(statement));
        break;
    }
  }

  private _transaction(statement: TransactionStatement): Transaction {
    const inputs = statement.exchanges.map((exchange): ExchangeInput => {
      const account = this._accounts.resolve(exchange.account, statement.date);
      return exchange.amount === undefined
        ? { account }
        : { account, amount: this._units.resolveAmount(exchange.amount) };
    });

    try {
      return Transaction.balance(statement.header, inputs);
    } catch (err) {
      if (err instanceof CurrencyConversionError) {
        throw new LedgerError("CURRENCY_CONVERSION", this._describeConversion(err), { cause: err });
      }
      throw err;
    }
  }

  private _book(date: LedgerDate): DayBook {
    let book = this._bookings.get(date);
    if (book === undefined) {
      book = new DayBook();
      this._bookings.set(date, book);
    }
    return book;
  }

  // ─── Account & Unit Queries ──────────────────────────────────────────

  /**
   * Resolve an account that must be open at `date`.
   */
  resolveAccount(account: ParsedAccount, date: LedgerDate): TxnAccount {
    return this._accounts.resolve(account, date);
  }

  unresolveAccount(account: TxnAccount): ParsedAccount {
    return this._accounts.unresolve(account);
  }

  /**
   * Every account ever opened.
   */
  getAccounts(): readonly TxnAccount[] {
    return this._accounts.getAll();
  }

  accountActivities(account: TxnAccount): readonly AccountWindow[] {
    return this._accounts.activities(account);
  }

  unitCode(index: UnitIndex): string | undefined {
    return this._units.unresolve(index);
  }

  getUnits(): readonly string[] {
    return this._units.getAll();
  }

  // ─── Formatting ──────────────────────────────────────────────────────

  formatAccount(account: TxnAccount): string {
    return formatAccount(this._accounts.unresolve(account));
  }

  /**
   * Format an amount with its quotes, e.g. `40 EUR @ 1.25 USD`.
   */
  formatAmount(amount: Amount): string {
    const unit = (index: UnitIndex): string => this.unitCode(index) ?? `#${String(index)}`;
    return [
      `${formatNominal(amount.nominal)} ${unit(amount.currency)}`,
      ...amount.prices.map((p) => `@ ${formatNominal(p.nominal)} ${unit(p.currency)}`),
    ].join(" ");
  }

  formatDiagnostic(diagnostic: BalanceDiagnostic): string {
    switch (diagnostic.kind) {
      case "unbalanced":
        return `unbalanced: ${String(diagnostic.exchangeCount)} exchange(s), at least 2 required`;
      case "not-zero-sum":
        return `does not sum to zero: ${this.formatAmount(diagnostic.sum)}`;
      case "other":
        return diagnostic.error instanceof CurrencyConversionError
          ? this._describeConversion(diagnostic.error)
          : diagnostic.error.message;
    }
  }

  private _describeConversion(err: CurrencyConversionError): string {
    const from = this.unitCode(err.from) ?? `#${String(err.from)}`;
    const to = this.unitCode(err.to) ?? `#${String(err.to)}`;
    return `no price quote converts ${from} into ${to}`;
  }

  // ─── Booking Queries ─────────────────────────────────────────────────

  getAt(date: LedgerDate): DayBook | undefined {
    return this._bookings.get(date);
  }

  /**
   * Dates with at least one booking, ascending.
   */
  dates(): readonly LedgerDate[] {
    return [...this._bookings.keys()].sort();
  }

  /**
   * `[date, DayBook]` pairs, ascending by date.
   */
  days(): readonly (readonly [LedgerDate, DayBook])[] {
    const days: (readonly [LedgerDate, DayBook])[] = [];
    for (const date of this.dates()) {
      const book = this._bookings.get(date);
      if (book !== undefined) {
        days.push([date, book]);
      }
    }
    return days;
  }

  /**
   * All transactions, by date then source order.
   */
  transactions(): readonly DatedTransaction[] {
    return this.days().flatMap(([date, book]) =>
      book.transactions().map((transaction) => ({ date, transaction })),
    );
  }

  /**
   * Every transaction that fails `check`, with its diagnostics.
   */
  errors(check: BalanceCheck): readonly TransactionDiagnostics[] {
    return this.transactions().flatMap(({ date, transaction }) => {
      const diagnostics = transaction.errors(check);
      return diagnostics.length === 0 ? [] : [{ date, transaction, diagnostics }];
    });
  }

  get transactionCount(): number {
    let count = 0;
    for (const book of this._bookings.values()) {
      count += book.transactions().length;
    }
    return count;
  }

  get accountCount(): number {
    return this._accounts.count;
  }

  // ─── Copying ─────────────────────────────────────────────────────────

  /**
   * Deep copy of the stores and bookings.
   */
  clone(): Ledger {
    const copy = new Ledger();
    copy._accounts = this._accounts.clone();
    copy._units = this._units.clone();
    for (const [date, book] of this._bookings) {
      copy._bookings.set(date, book.clone());
    }
    for (const [key, value] of this._options) {
      copy._options.set(key, value);
    }
    return copy;
  }
}
