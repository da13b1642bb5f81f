/**
 * @tallybook/ledger — Unit store.
 *
 * Units (currencies, commodities) must be declared with a `unit`
 * statement before any amount may use them. Referencing an undeclared
 * code fails, so a typo never creates a spurious currency.
 */

import type { Amount, ParsedAmount, UnitIndex } from "@tallybook/types";
import { LedgerError } from "./types.js";

/**
 * Append-only interner of unit codes.
 */
export class UnitStore {
  private readonly _codes: string[] = [];
  private readonly _index: Map<string, UnitIndex> = new Map();

  /**
   * Declare a unit. Re-declaring returns the existing index.
   */
  declare(code: string): UnitIndex {
    const existing = this._index.get(code);
    if (existing !== undefined) {
      return existing;
    }
    const index = this._codes.length;
    this._codes.push(code);
    this._index.set(code, index);
    return index;
  }

  /**
   * Index of a declared unit. Throws if the code was never declared.
   */
  lookup(code: string): UnitIndex {
    const index = this._index.get(code);
    if (index === undefined) {
      throw new LedgerError("UNDECLARED_UNIT", `unit "${code}" is not declared`);
    }
    return index;
  }

  has(code: string): boolean {
    return this._index.has(code);
  }

  /**
   * Code of a unit index, or undefined when out of range.
   */
  unresolve(index: UnitIndex): string | undefined {
    return this._codes[index];
  }

  /**
   * Resolve an amount and each of its price quotes to unit indices.
   */
  resolveAmount(amount: ParsedAmount): Amount {
    return {
      nominal: amount.nominal,
      currency: this.lookup(amount.currency),
      prices: amount.prices.map((p) => ({ nominal: p.nominal, currency: this.lookup(p.currency) })),
    };
  }

  /**
   * All declared codes, in declaration order.
   */
  getAll(): readonly string[] {
    return [...this._codes];
  }

  get count(): number {
    return this._codes.length;
  }

  clone(): UnitStore {
    const copy = new UnitStore();
    for (const code of this._codes) {
      copy.declare(code);
    }
    return copy;
  }
}
