/**
 * Account Types
 *
 * An account is one of five kinds followed by a path of segments,
 * written `Kind:Segment:Segment` in ledger source.
 *
 * Two shapes exist:
 * - ParsedAccount holds the segment strings as written
 * - TxnAccount holds indices into the account store's shared segment table
 */

/** The five account kinds, in their ledger spelling. */
export const ACCOUNT_KINDS = [
  "Assets",
  "Expenses",
  "Liabilities",
  "Income",
  "Equity",
] as const;

export type AccountKind = (typeof ACCOUNT_KINDS)[number];

/**
 * An account path as written in source, e.g. `Assets:Bank:Checking`
 * is `{ kind: "Assets", segments: ["Bank", "Checking"] }`.
 */
export interface ParsedAccount {
  readonly kind: AccountKind;
  readonly segments: readonly string[];
}

/**
 * A resolved account reference.
 * Segment indices are shared across all kinds: `Assets:Bank` and
 * `Liabilities:Bank` carry the same index for "Bank".
 */
export interface TxnAccount {
  readonly kind: AccountKind;
  readonly segments: readonly number[];
}
