/**
 * Tests for the account store.
 *
 * Covers:
 * - Segment interning shared across account kinds
 * - Resolution inside and outside validity windows
 * - Close and reopen windows
 * - Close errors (never opened, already closed, before open)
 * - Unresolve and formatting round trip
 * - Clone independence
 */

import { describe, it, expect, beforeEach } from "vitest";
import type { ParsedAccount } from "@tallybook/types";
import { AccountStore, formatAccount } from "../src/accounts.js";
import { catchLedgerError } from "./helpers.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const JAWIR: ParsedAccount = { kind: "Assets", segments: ["Bank", "Jawir"] };
const CREDIT_CARD: ParsedAccount = { kind: "Liabilities", segments: ["Bank", "CreditCard"] };
const DINING: ParsedAccount = { kind: "Expenses", segments: ["Dining"] };

// ─── Tests ───────────────────────────────────────────────────────────────

describe("formatAccount", () => {
  it("joins kind and segments with colons", () => {
    expect(formatAccount(JAWIR)).toBe("Assets:Bank:Jawir");
    expect(formatAccount(DINING)).toBe("Expenses:Dining");
  });
});

describe("AccountStore", () => {
  let store: AccountStore;

  beforeEach(() => {
    store = new AccountStore();
  });

  describe("open", () => {
    it("interns segments shared across kinds", () => {
      const jawir = store.open(JAWIR, "2021-01-01");
      const card = store.open(CREDIT_CARD, "2021-01-01");

      expect(jawir).toEqual({ kind: "Assets", segments: [0, 1] });
      expect(card).toEqual({ kind: "Liabilities", segments: [0, 2] });
      expect(store.segments).toEqual(["Bank", "Jawir", "CreditCard"]);
    });

    it("moves the open date when reopened while still open", () => {
      store.open(DINING, "2021-03-01");
      const txn = store.open(DINING, "2021-01-01");
      expect(store.activities(txn)).toEqual([{ openedAt: "2021-01-01" }]);
    });

    it("compares segments case-sensitively", () => {
      const a = store.open({ kind: "Assets", segments: ["cash"] }, "2021-01-01");
      const b = store.open({ kind: "Assets", segments: ["Cash"] }, "2021-01-01");
      expect(a.segments).toEqual([0]);
      expect(b.segments).toEqual([1]);
    });
  });

  describe("resolve", () => {
    it("resolves an account on and after its open date", () => {
      store.open(JAWIR, "2021-01-01");
      expect(store.resolve(JAWIR, "2021-01-01")).toEqual({ kind: "Assets", segments: [0, 1] });
      expect(store.resolve(JAWIR, "2030-12-31")).toEqual({ kind: "Assets", segments: [0, 1] });
    });

    it("rejects a date before the account was opened", () => {
      store.open(DINING, "2021-11-01");
      const err = catchLedgerError(() => store.resolve(DINING, "2021-10-25"));
      expect(err.code).toBe("ACCOUNT_NOT_VALID_AT_DATE");
      expect(err.message).toBe('account "Expenses:Dining" is not opened at 2021-10-25');
    });

    it("rejects an account with a segment never seen", () => {
      const err = catchLedgerError(() => store.resolve(DINING, "2021-10-25"));
      expect(err.code).toBe("UNKNOWN_SEGMENT");
      expect(err.message).toBe(
        'account "Expenses:Dining" is not opened at 2021-10-25: unknown segment "Dining"',
      );
    });

    it("rejects known segments under a kind they were never opened in", () => {
      store.open(JAWIR, "2021-01-01");
      const err = catchLedgerError(() =>
        store.resolve({ kind: "Expenses", segments: ["Bank", "Jawir"] }, "2021-02-01"),
      );
      expect(err.code).toBe("UNRESOLVED_ACCOUNT");
      expect(err.message).toBe(
        'account "Expenses:Bank:Jawir" is not opened at 2021-02-01: account was never opened',
      );
    });

    it("does not intern segments", () => {
      catchLedgerError(() => store.resolve(DINING, "2021-01-01"));
      expect(store.segments).toEqual([]);
    });
  });

  describe("close and reopen", () => {
    beforeEach(() => {
      store.open(JAWIR, "2021-01-01");
      store.close(JAWIR, "2021-06-01");
    });

    it("is valid up to the day before the close date", () => {
      expect(() => store.resolve(JAWIR, "2021-05-31")).not.toThrow();
      expect(catchLedgerError(() => store.resolve(JAWIR, "2021-06-01")).code).toBe(
        "ACCOUNT_NOT_VALID_AT_DATE",
      );
    });

    it("starts a new window when reopened", () => {
      const txn = store.open(JAWIR, "2021-09-01");

      expect(catchLedgerError(() => store.resolve(JAWIR, "2021-07-01")).code).toBe(
        "ACCOUNT_NOT_VALID_AT_DATE",
      );
      expect(() => store.resolve(JAWIR, "2021-09-01")).not.toThrow();
      expect(() => store.resolve(JAWIR, "2021-03-15")).not.toThrow();
      expect(store.activities(txn)).toEqual([
        { openedAt: "2021-01-01", closedAt: "2021-06-01" },
        { openedAt: "2021-09-01" },
      ]);
    });

    it("rejects closing twice", () => {
      const err = catchLedgerError(() => store.close(JAWIR, "2021-07-01"));
      expect(err.code).toBe("DUPLICATE_CLOSE");
      expect(err.message).toBe(
        'cannot close account "Assets:Bank:Jawir" at 2021-07-01: already closed at 2021-06-01',
      );
    });
  });

  describe("close errors", () => {
    it("rejects closing an account never opened", () => {
      const err = catchLedgerError(() => store.close(DINING, "2021-01-01"));
      expect(err.code).toBe("CLOSE_WITHOUT_OPEN");
      expect(err.message).toBe(
        'cannot close account "Expenses:Dining" at 2021-01-01: account was never opened',
      );
    });

    it("rejects closing before the open date", () => {
      store.open(DINING, "2021-05-01");
      const err = catchLedgerError(() => store.close(DINING, "2021-04-30"));
      expect(err.code).toBe("ACCOUNT_NOT_VALID_AT_DATE");
    });
  });

  describe("lookup / unresolve", () => {
    it("looks up an account regardless of date", () => {
      store.open(JAWIR, "2021-01-01");
      expect(store.lookup(JAWIR)).toEqual({ kind: "Assets", segments: [0, 1] });
      expect(store.lookup(CREDIT_CARD)).toBeUndefined();
    });

    it("round-trips a resolved account", () => {
      const txn = store.open(CREDIT_CARD, "2021-01-01");
      expect(store.unresolve(txn)).toEqual(CREDIT_CARD);
      expect(formatAccount(store.unresolve(txn))).toBe("Liabilities:Bank:CreditCard");
    });

    it("throws for an out-of-range segment index", () => {
      const err = catchLedgerError(() => store.unresolve({ kind: "Assets", segments: [7] }));
      expect(err.code).toBe("UNDEFINED_SEGMENT_INDEX");
    });
  });

  describe("getAll / count / clone", () => {
    it("lists accounts grouped by kind", () => {
      store.open(CREDIT_CARD, "2021-01-01");
      store.open(DINING, "2021-01-01");
      store.open(JAWIR, "2021-01-01");

      expect(store.getAll()).toEqual([
        { kind: "Assets", segments: [0, 3] },
        { kind: "Expenses", segments: [2] },
        { kind: "Liabilities", segments: [0, 1] },
      ]);
      expect(store.count).toBe(3);
    });

    it("returns an independent copy", () => {
      store.open(JAWIR, "2021-01-01");
      const copy = store.clone();
      copy.close(JAWIR, "2021-02-01");
      copy.open(DINING, "2021-01-01");

      expect(() => store.resolve(JAWIR, "2021-03-01")).not.toThrow();
      expect(store.count).toBe(1);
      expect(store.segments).toEqual(["Bank", "Jawir"]);
      expect(copy.count).toBe(2);
    });
  });
});
