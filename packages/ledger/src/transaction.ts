/**
 * @tallybook/ledger — Transactions and the balancer.
 *
 * A transaction lists exchanges (account + amount legs). At most one leg
 * may omit its amount in source; the balancer infers it as the negated
 * sum of the explicit legs, in the anchor currency.
 *
 * The anchor currency is the currency of the first explicit leg.
 */

import type { Amount, TransactionState, TxnHeader, UnitIndex } from "@tallybook/types";
import { addAmounts, isPositive, isZero, subtractAmounts, zeroAmount } from "./amount-math.js";
import type { BalanceCheck, BalanceDiagnostic, Exchange, ExchangeInput } from "./types.js";
import { LedgerError } from "./types.js";

/**
 * An immutable, balanced-or-diagnosable transaction.
 */
export class Transaction {
  readonly state: TransactionState;
  readonly payee: string | undefined;
  readonly title: string;
  readonly exchanges: readonly Exchange[];

  constructor(header: TxnHeader, exchanges: readonly Exchange[]) {
    this.state = header.state;
    this.payee = header.payee;
    this.title = header.title;
    this.exchanges = [...exchanges];
  }

  /**
   * Build a transaction from its legs, inferring the elided amount.
   *
   * 1. More than one leg without an amount → TOO_MANY_ELIDED_AMOUNTS
   * 2. Explicit legs are kept in order, `elided: false`
   * 3. An elided leg becomes `zero(anchor) - total` in place, `elided: true`
   *
   * The explicit legs are only folded when an amount must be inferred, so
   * a missing price quote fails here only for transactions with an elided leg.
   */
  static balance(header: TxnHeader, inputs: readonly ExchangeInput[]): Transaction {
    const elided = inputs.filter((input) => input.amount === undefined).length;
    if (elided > 1) {
      throw new LedgerError(
        "TOO_MANY_ELIDED_AMOUNTS",
        "only one account may have its amount elided",
      );
    }

    const explicit: Amount[] = [];
    for (const input of inputs) {
      if (input.amount !== undefined) {
        explicit.push(input.amount);
      }
    }

    let inferred: Amount | undefined;
    if (elided === 1) {
      const [first, ...rest] = explicit;
      if (first === undefined) {
        throw new LedgerError(
          "MISSING_AMOUNT",
          "cannot infer the elided amount: transaction has no explicit amount",
        );
      }
      const total = rest.reduce(addAmounts, first);
      inferred = subtractAmounts(zeroAmount(total.currency), total);
    }

    const exchanges = inputs.map((input): Exchange => {
      if (input.amount !== undefined) {
        return { account: input.account, amount: input.amount, elided: false };
      }
      if (inferred === undefined) {
        throw new LedgerError("MISSING_AMOUNT", "elided amount was not inferred");
      }
      return { account: input.account, amount: inferred, elided: true };
    });

    return new Transaction(header, exchanges);
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Currency of the first explicit leg, falling back to the first leg.
   * Undefined for a transaction without legs.
   */
  get anchorCurrency(): UnitIndex | undefined {
    const anchor = this.exchanges.find((e) => !e.elided) ?? this.exchanges[0];
    return anchor?.amount.currency;
  }

  /**
   * Fold every leg, elided included, into the anchor currency.
   * Explicit legs are folded in source order and the elided leg last,
   * the order balance() inferred it in, so it cancels exactly.
   * Throws CurrencyConversionError when a leg cannot be converted.
   */
  sum(): Amount | undefined {
    const anchor = this.anchorCurrency;
    if (anchor === undefined) {
      return undefined;
    }
    const ordered = [
      ...this.exchanges.filter((e) => !e.elided),
      ...this.exchanges.filter((e) => e.elided),
    ];
    return ordered.reduce((total, e) => addAmounts(total, e.amount), zeroAmount(anchor));
  }

  /**
   * Sum of the positive legs, in the anchor currency.
   */
  totalDebited(): Amount | undefined {
    const anchor = this.anchorCurrency;
    if (anchor === undefined) {
      return undefined;
    }
    return this.exchanges
      .filter((e) => isPositive(e.amount))
      .reduce((total, e) => addAmounts(total, e.amount), zeroAmount(anchor));
  }

  /**
   * Balance diagnostics. Empty when the transaction passes the check.
   *
   * - Always: one leg or none → `unbalanced`
   * - `with-sum`: non-zero sum → `not-zero-sum`; conversion failure → `other`
   */
  errors(check: BalanceCheck): readonly BalanceDiagnostic[] {
    const diagnostics: BalanceDiagnostic[] = [];

    if (this.exchanges.length <= 1) {
      diagnostics.push({ kind: "unbalanced", exchangeCount: this.exchanges.length });
    }

    if (check === "with-sum") {
      try {
        const sum = this.sum();
        if (sum !== undefined && !isZero(sum)) {
          diagnostics.push({ kind: "not-zero-sum", sum });
        }
      } catch (err) {
        if (!(err instanceof LedgerError)) {
          throw err;
        }
        diagnostics.push({ kind: "other", error: err });
      }
    }

    return diagnostics;
  }

  isBalanced(check: BalanceCheck): boolean {
    return this.errors(check).length === 0;
  }
}
