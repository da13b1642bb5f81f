/**
 * @tallybook/ledger — Bookings for one calendar date.
 */

import type { Transaction } from "./transaction.js";
import type { BalanceAssertion, PadTransaction, PriceQuote } from "./types.js";

/**
 * Custom entries, pads, balance assertions, price quotes and
 * transactions recorded on one date, each in source order.
 */
export class DayBook {
  private readonly _custom: (readonly string[])[] = [];
  private readonly _pads: PadTransaction[] = [];
  private readonly _balanceAssertions: BalanceAssertion[] = [];
  private readonly _prices: PriceQuote[] = [];
  private readonly _transactions: Transaction[] = [];

  addCustom(args: readonly string[]): void {
    this._custom.push([...args]);
  }

  addPad(pad: PadTransaction): void {
    this._pads.push(pad);
  }

  addBalanceAssertion(assertion: BalanceAssertion): void {
    this._balanceAssertions.push(assertion);
  }

  addPrice(quote: PriceQuote): void {
    this._prices.push(quote);
  }

  addTransaction(transaction: Transaction): void {
    this._transactions.push(transaction);
  }

  custom(): readonly (readonly string[])[] {
    return [...this._custom];
  }

  pads(): readonly PadTransaction[] {
    return [...this._pads];
  }

  balanceAssertions(): readonly BalanceAssertion[] {
    return [...this._balanceAssertions];
  }

  prices(): readonly PriceQuote[] {
    return [...this._prices];
  }

  transactions(): readonly Transaction[] {
    return [...this._transactions];
  }

  /**
   * Copy with its own lists. Recorded entries are immutable and shared.
   */
  clone(): DayBook {
    const copy = new DayBook();
    copy._custom.push(...this._custom);
    copy._pads.push(...this._pads);
    copy._balanceAssertions.push(...this._balanceAssertions);
    copy._prices.push(...this._prices);
    copy._transactions.push(...this._transactions);
    return copy;
  }
}
