/**
 * Tests for the check command.
 *
 * Covers:
 * - Usage errors
 * - Summary line for a clean ledger
 * - Diagnostic lines and exit codes under each config
 * - Parse failures reported on stderr
 */

import { describe, it, expect, beforeEach } from "vitest";
import { Chalk } from "chalk";
import pino from "pino";
import { run, USAGE } from "../src/check.js";
import type { CheckContext } from "../src/check.js";
import { loadConfig } from "../src/config.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const SETUP = [
  "unit USD",
  "unit EUR",
  "2021-01-01 open Assets:Cash",
  "2021-01-01 open Expenses:Food",
  "",
].join("\n");

const FILES: Record<string, string> = {
  "/books/clean.ledger": [
    'include "setup.ledger"',
    '2021-02-01 * "Bakery" "Bread"',
    "  Expenses:Food  4 USD",
    "  Assets:Cash",
    '2021-02-03 * "Groceries"',
    "  Expenses:Food  20 USD",
    "  Assets:Cash",
  ].join("\n"),
  "/books/setup.ledger": SETUP,
  "/books/short.ledger": [
    'include "setup.ledger"',
    '2021-02-01 * "Short"',
    "  Expenses:Food  10 USD",
    "  Assets:Cash  -7.5 USD",
    '2021-02-02 * "Mixed"',
    "  Expenses:Food  10 USD",
    "  Assets:Cash  -10 EUR",
  ].join("\n"),
  "/books/broken.ledger": ['include "setup.ledger"', "2021-02-01 close Assets:Bank"].join("\n"),
};

function readFile(path: string): string {
  const text = FILES[path];
  if (text === undefined) {
    throw new Error(`ENOENT: no such file, open '${path}'`);
  }
  return text;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("run", () => {
  let out: string[];
  let err: string[];

  function context(env: Record<string, string> = {}): CheckContext {
    return {
      config: loadConfig(env),
      logger: pino({ level: "silent" }),
      chalk: new Chalk({ level: 0 }),
      stdout: (line) => out.push(line),
      stderr: (line) => err.push(line),
      readFile,
    };
  }

  beforeEach(() => {
    out = [];
    err = [];
  });

  describe("usage", () => {
    it("requires the check command and one file", () => {
      expect(run([], context())).toBe(2);
      expect(run(["verify", "/books/clean.ledger"], context())).toBe(2);
      expect(run(["check"], context())).toBe(2);
      expect(run(["check", "a", "b"], context())).toBe(2);
      expect(err).toEqual([USAGE, USAGE, USAGE, USAGE]);
      expect(out).toEqual([]);
    });
  });

  describe("check", () => {
    it("prints a summary for a clean ledger", () => {
      expect(run(["check", "/books/clean.ledger"], context())).toBe(0);
      expect(out).toEqual(["2 days, 2 transactions, 2 accounts"]);
      expect(err).toEqual([]);
    });

    it("prints one line per diagnostic and fails", () => {
      expect(run(["check", "/books/short.ledger"], context())).toBe(1);
      expect(out).toEqual([
        "2 days, 2 transactions, 2 accounts",
        '2021-02-01 "Short": does not sum to zero: 2.5 USD',
        '2021-02-02 "Mixed": no price quote converts EUR into USD',
      ]);
    });

    it("passes with diagnostics when failing is turned off", () => {
      const ctx = context({ TALLYBOOK_FAIL_ON_UNBALANCED: "false" });
      expect(run(["check", "/books/short.ledger"], ctx)).toBe(0);
      expect(out).toHaveLength(3);
    });

    it("skips the sum check under without-sum", () => {
      const ctx = context({ TALLYBOOK_BALANCE_CHECK: "without-sum" });
      expect(run(["check", "/books/short.ledger"], ctx)).toBe(0);
      expect(out).toEqual(["2 days, 2 transactions, 2 accounts"]);
    });

    it("reports a parse failure on stderr", () => {
      expect(run(["check", "/books/broken.ledger"], context())).toBe(1);
      expect(out).toEqual([]);
      expect(err).toEqual([
        "error: /books/broken.ledger: line 2: " +
          'cannot close account "Assets:Bank" at 2021-02-01: account was never opened',
      ]);
    });

    it("reports a missing file", () => {
      expect(run(["check", "/books/none.ledger"], context())).toBe(1);
      expect(err).toEqual([
        `error: cannot read "/books/none.ledger": ENOENT: no such file, open '/books/none.ledger'`,
      ]);
    });
  });
});
