/**
 * @tallybook/ledger — Account store.
 *
 * Interns account path segments and tracks the open/close windows of
 * every fully-qualified account.
 *
 * Rules:
 * - Segment indices are append-only and shared across all account kinds
 * - Only open() interns new segments; every other lookup is non-inserting
 * - A path may be opened, closed and reopened; each reopen after a close
 *   starts a new window
 * - Segments compare by exact value (case-sensitive)
 */

import { ACCOUNT_KINDS } from "@tallybook/types";
import type { AccountKind, LedgerDate, ParsedAccount, TxnAccount } from "@tallybook/types";
import type { AccountWindow } from "./types.js";
import { LedgerError } from "./types.js";

interface MutableWindow {
  openedAt: LedgerDate;
  closedAt: LedgerDate | undefined;
}

type WindowMap = Map<string, MutableWindow[]>;

/**
 * Format an account the way it is written in source: `Assets:Bank:Swiss`.
 */
export function formatAccount(account: ParsedAccount): string {
  return [account.kind, ...account.segments].join(":");
}

function pathKey(segments: readonly number[]): string {
  return segments.join(",");
}

function windowContains(window: MutableWindow, date: LedgerDate): boolean {
  return window.openedAt <= date && (window.closedAt === undefined || window.closedAt > date);
}

type ResolutionCode = "UNKNOWN_SEGMENT" | "UNRESOLVED_ACCOUNT" | "ACCOUNT_NOT_VALID_AT_DATE";

function notOpened(
  account: ParsedAccount,
  date: LedgerDate,
  code: ResolutionCode,
  detail?: string,
): LedgerError {
  const base = `account "${formatAccount(account)}" is not opened at ${date}`;
  return new LedgerError(code, detail === undefined ? base : `${base}: ${detail}`);
}

/**
 * Registry of account segments and validity windows.
 * One map per account kind, keyed by the segment-index path.
 */
export class AccountStore {
  private readonly _segments: string[] = [];
  private readonly _segmentIndex: Map<string, number> = new Map();
  private readonly _windows: Record<AccountKind, WindowMap> = {
    Assets: new Map(),
    Expenses: new Map(),
    Liabilities: new Map(),
    Income: new Map(),
    Equity: new Map(),
  };

  // ─── Segment Interning ───────────────────────────────────────────────

  private _intern(segments: readonly string[]): number[] {
    return segments.map((segment) => {
      const existing = this._segmentIndex.get(segment);
      if (existing !== undefined) {
        return existing;
      }
      const index = this._segments.length;
      this._segments.push(segment);
      this._segmentIndex.set(segment, index);
      return index;
    });
  }

  /**
   * Index path for the given segments, or the first segment that was
   * never interned.
   */
  private _lookup(segments: readonly string[]): { indices: number[] } | { unknown: string } {
    const indices: number[] = [];
    for (const segment of segments) {
      const index = this._segmentIndex.get(segment);
      if (index === undefined) {
        return { unknown: segment };
      }
      indices.push(index);
    }
    return { indices };
  }

  // ─── Open / Close ────────────────────────────────────────────────────

  /**
   * Open an account at `date`, interning any new segments.
   *
   * Opening a path whose latest window is still open moves that window's
   * open date; opening after a close appends a new window.
   */
  open(account: ParsedAccount, date: LedgerDate): TxnAccount {
    const segments = this._intern(account.segments);
    const windows = this._windows[account.kind];
    const key = pathKey(segments);
    const existing = windows.get(key);
    const latest = existing?.[existing.length - 1];

    if (existing === undefined) {
      windows.set(key, [{ openedAt: date, closedAt: undefined }]);
    } else if (latest !== undefined && latest.closedAt === undefined) {
      latest.openedAt = date;
    } else {
      existing.push({ openedAt: date, closedAt: undefined });
    }

    return { kind: account.kind, segments };
  }

  /**
   * Close the current window of an account at `date`.
   * Throws if the account was never opened, is already closed, or opens
   * after `date`.
   */
  close(account: ParsedAccount, date: LedgerDate): TxnAccount {
    const lookup = this._lookup(account.segments);
    const windows = "indices" in lookup
      ? this._windows[account.kind].get(pathKey(lookup.indices))
      : undefined;
    const latest = windows?.[windows.length - 1];

    if (!("indices" in lookup) || latest === undefined) {
      throw new LedgerError(
        "CLOSE_WITHOUT_OPEN",
        `cannot close account "${formatAccount(account)}" at ${date}: account was never opened`,
      );
    }
    if (latest.closedAt !== undefined) {
      throw new LedgerError(
        "DUPLICATE_CLOSE",
        `cannot close account "${formatAccount(account)}" at ${date}: already closed at ${latest.closedAt}`,
      );
    }
    if (latest.openedAt > date) {
      throw notOpened(account, date, "ACCOUNT_NOT_VALID_AT_DATE");
    }

    latest.closedAt = date;
    return { kind: account.kind, segments: lookup.indices };
  }

  // ─── Resolution ──────────────────────────────────────────────────────

  /**
   * Resolve an account to its index path, requiring it to be open at `date`.
   */
  resolve(account: ParsedAccount, date: LedgerDate): TxnAccount {
    const lookup = this._lookup(account.segments);
    if ("unknown" in lookup) {
      throw notOpened(account, date, "UNKNOWN_SEGMENT", `unknown segment "${lookup.unknown}"`);
    }

    const windows = this._windows[account.kind].get(pathKey(lookup.indices));
    if (windows === undefined) {
      throw notOpened(account, date, "UNRESOLVED_ACCOUNT", "account was never opened");
    }
    if (!windows.some((w) => windowContains(w, date))) {
      throw notOpened(account, date, "ACCOUNT_NOT_VALID_AT_DATE");
    }

    return { kind: account.kind, segments: lookup.indices };
  }

  /**
   * Index path of an account regardless of date, or undefined when the
   * path was never opened.
   */
  lookup(account: ParsedAccount): TxnAccount | undefined {
    const lookup = this._lookup(account.segments);
    if ("unknown" in lookup || !this._windows[account.kind].has(pathKey(lookup.indices))) {
      return undefined;
    }
    return { kind: account.kind, segments: lookup.indices };
  }

  /**
   * Map a resolved account back to its segment strings.
   * Throws if any index is out of range.
   */
  unresolve(account: TxnAccount): ParsedAccount {
    const segments = account.segments.map((index) => {
      const segment = this._segments[index];
      if (segment === undefined) {
        throw new LedgerError(
          "UNDEFINED_SEGMENT_INDEX",
          `undefined account segment index ${String(index)}`,
        );
      }
      return segment;
    });
    return { kind: account.kind, segments };
  }

  // ─── Queries ─────────────────────────────────────────────────────────

  /**
   * Validity windows of an account, oldest first. Empty if never opened.
   */
  activities(account: TxnAccount): readonly AccountWindow[] {
    const windows = this._windows[account.kind].get(pathKey(account.segments)) ?? [];
    return windows.map((w) =>
      w.closedAt === undefined ? { openedAt: w.openedAt } : { openedAt: w.openedAt, closedAt: w.closedAt },
    );
  }

  /**
   * Every account ever opened, grouped by kind in ACCOUNT_KINDS order,
   * then in first-open order.
   */
  getAll(): readonly TxnAccount[] {
    return ACCOUNT_KINDS.flatMap((kind) =>
      [...this._windows[kind].keys()].map((key) => ({
        kind,
        segments: key.split(",").map(Number),
      })),
    );
  }

  /**
   * The shared segment table, in index order.
   */
  get segments(): readonly string[] {
    return [...this._segments];
  }

  /**
   * Get the count of accounts ever opened.
   */
  get count(): number {
    return ACCOUNT_KINDS.reduce((n, kind) => n + this._windows[kind].size, 0);
  }

  /**
   * Deep copy. Windows are copied, not shared.
   */
  clone(): AccountStore {
    const copy = new AccountStore();
    copy._segments.push(...this._segments);
    for (const [segment, index] of this._segmentIndex) {
      copy._segmentIndex.set(segment, index);
    }
    for (const kind of ACCOUNT_KINDS) {
      for (const [key, windows] of this._windows[kind]) {
        copy._windows[kind].set(key, windows.map((w) => ({ ...w })));
      }
    }
    return copy;
  }
}
