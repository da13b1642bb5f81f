/**
 * Tests for the grammar layer.
 *
 * Covers:
 * - Single-token rules (date, account, amount, string)
 * - Statement and directive lines
 * - Transaction exchange lines, comments and blank lines
 * - Syntax error locations
 */

import { describe, it, expect } from "vitest";
import { parseRule } from "../src/grammar.js";
import type { ParseNode } from "../src/grammar.js";
import { LedgerSyntaxError } from "../src/types.js";
import { catchLedgerError } from "./helpers.js";

// ─── Fixtures ────────────────────────────────────────────────────────────

const SAMPLE = [
  'option "title" "Household"',
  "unit USD",
  "",
  "2021-04-01 open Assets:Bank:Jawir ; opening balance follows",
  '2021-04-01 * "Gubuk mang Engking" "Splurge @ diner"',
  "  Expenses:Dining  199 USD",
  "  Assets:Bank:Jawir",
  "",
].join("\n");

function rules(nodes: readonly ParseNode[]): string[] {
  return nodes.map((n) => n.rule);
}

function syntaxMessage(fn: () => unknown): string {
  const err = catchLedgerError(fn);
  expect(err).toBeInstanceOf(LedgerSyntaxError);
  return err.message;
}

// ─── Tests ───────────────────────────────────────────────────────────────

describe("parseRule", () => {
  describe("tokens", () => {
    it("parses a date", () => {
      expect(parseRule("date", "2021-04-01")).toEqual({
        rule: "date",
        text: "2021-04-01",
        line: 1,
        column: 1,
        children: [],
      });
    });

    it("splits an account into kind and segments", () => {
      const node = parseRule("account", "Assets:Bank:Jawir");
      expect(rules(node.children)).toEqual(["account_kind", "segment", "segment"]);
      expect(node.children.map((c) => [c.text, c.column])).toEqual([
        ["Assets", 1],
        ["Bank", 8],
        ["Jawir", 13],
      ]);
    });

    it("accepts non-ASCII segments", () => {
      const node = parseRule("account", "Expenses:Makan:Bakso_Ø");
      expect(node.children.map((c) => c.text)).toEqual(["Expenses", "Makan", "Bakso_Ø"]);
    });

    it("rejects an account without segments", () => {
      expect(syntaxMessage(() => parseRule("account", "Assets"))).toBe(
        'syntax error at line 1, column 1: expected account, found "Assets"',
      );
    });

    it("parses an amount", () => {
      const node = parseRule("amount", "-199 USD");
      expect(node.text).toBe("-199 USD");
      expect(node.children.map((c) => [c.rule, c.text, c.column])).toEqual([
        ["nominal", "-199", 1],
        ["currency", "USD", 6],
      ]);
    });

    it("parses an amount with price quotes", () => {
      const node = parseRule("amount_with_price", "40 EUR @ 1.25 USD");
      expect(node.text).toBe("40 EUR @ 1.25 USD");
      expect(node.children.map((c) => [c.rule, c.text])).toEqual([
        ["amount", "40 EUR"],
        ["price", "1.25 USD"],
      ]);
    });

    it("requires a quote for amount_with_price", () => {
      expect(syntaxMessage(() => parseRule("amount_with_price", "40 EUR"))).toBe(
        'syntax error at line 1, column 7: expected "@"',
      );
    });

    it("decodes string escapes", () => {
      expect(parseRule("string", '"say \\"hi\\" \\\\ ok"').text).toBe('say "hi" \\ ok');
      expect(parseRule("string", '"Splurge @ diner"').text).toBe("Splurge @ diner");
    });

    it("rejects unknown escapes", () => {
      expect(catchLedgerError(() => parseRule("string", '"a\\nb"')).code).toBe("SYNTAX_ERROR");
    });

    it("rejects trailing input", () => {
      expect(syntaxMessage(() => parseRule("date", "2021-04-01 extra"))).toBe(
        'syntax error at line 1, column 12: unexpected "extra"',
      );
    });
  });

  describe("ledger", () => {
    it("produces one node per directive or statement", () => {
      const tree = parseRule("ledger", SAMPLE);
      expect(tree.rule).toBe("ledger");
      expect(rules(tree.children)).toEqual(["option", "unit", "statement", "statement"]);
    });

    it("keeps directive arguments", () => {
      const [option, unit] = parseRule("ledger", SAMPLE).children;
      expect(option?.children.map((c) => c.text)).toEqual(["title", "Household"]);
      expect(unit?.children.map((c) => c.text)).toEqual(["USD"]);
    });

    it("ignores trailing comments", () => {
      const open = parseRule("ledger", SAMPLE).children[2]?.children[0];
      expect(open?.rule).toBe("open_statement");
      expect(open?.line).toBe(4);
      expect(open?.children.map((c) => c.rule)).toEqual(["date", "account"]);
    });

    it("attaches exchange lines to the transaction above", () => {
      const txn = parseRule("ledger", SAMPLE).children[3]?.children[0];
      expect(txn?.rule).toBe("transaction");
      expect(txn?.children.map((c) => c.rule)).toEqual(["date", "txn_header", "txn_list"]);

      const header = txn?.children[1];
      expect(header?.children.map((c) => [c.rule, c.text])).toEqual([
        ["txn_state", "*"],
        ["string", "Gubuk mang Engking"],
        ["string", "Splurge @ diner"],
      ]);

      const exchanges = txn?.children[2]?.children ?? [];
      expect(exchanges.map((e) => rules(e.children))).toEqual([["account", "amount"], ["account"]]);
      expect(exchanges.map((e) => e.line)).toEqual([6, 7]);
    });

    it("accepts tabs and CRLF line endings", () => {
      const tree = parseRule("ledger", '2021-04-01\t!\t"Rent"\r\n\tExpenses:Rent\t-10 USD @ 2 EUR\r\n');
      const list = tree.children[0]?.children[0]?.children[2];
      expect(list?.children[0]?.children[1]?.rule).toBe("amount_with_price");
    });

    it("skips a leading byte order mark", () => {
      const tree = parseRule("ledger", "\uFEFFunit USD\n");
      expect(rules(tree.children)).toEqual(["unit"]);
      expect(tree.children[0]?.children[0]?.text).toBe("USD");
    });

    it("rejects an indented line outside a transaction", () => {
      expect(syntaxMessage(() => parseRule("ledger", "  Assets:Cash 5 USD"))).toBe(
        "syntax error at line 1, column 3: indented line outside a transaction",
      );
    });

    it("rejects a transaction without exchange lines", () => {
      const text = '2021-04-01 * "Empty"\n2021-04-02 open Assets:Cash';
      expect(syntaxMessage(() => parseRule("ledger", text))).toBe(
        "syntax error at line 1, column 1: transaction has no exchange lines",
      );
    });

    it("rejects an unknown statement keyword", () => {
      expect(syntaxMessage(() => parseRule("ledger", "2021-04-01 frobnicate"))).toBe(
        'syntax error at line 1, column 12: unknown statement "frobnicate"',
      );
    });

    it("reports an unterminated string where it starts", () => {
      expect(syntaxMessage(() => parseRule("ledger", '2021-04-01 * "abc'))).toBe(
        "syntax error at line 1, column 14: unterminated string",
      );
    });

    it("reports the line of a bad exchange", () => {
      const text = ['2021-04-01 * "Lunch"', "  Expenses:Food 12 usd", "  Assets:Cash"].join("\n");
      expect(syntaxMessage(() => parseRule("ledger", text))).toBe(
        'syntax error at line 2, column 20: expected unit, found "usd"',
      );
    });
  });

  describe("statement", () => {
    it("accepts exactly one statement", () => {
      expect(parseRule("statement", "2021-04-01 close Assets:Cash").children[0]?.rule).toBe(
        "close_statement",
      );
    });

    it("rejects more than one", () => {
      const text = "2021-04-01 open Assets:Cash\n2021-04-02 close Assets:Cash";
      expect(syntaxMessage(() => parseRule("statement", text))).toBe(
        "syntax error at line 1, column 1: expected exactly one statement",
      );
    });
  });
});
