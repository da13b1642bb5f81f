/**
 * @tallybook/ledger — Statement builder.
 *
 * Converts grammar nodes into typed statements, accounts, amounts and
 * transaction headers. Nothing here touches the account or unit store;
 * resolution happens when the ledger applies a statement.
 */

import { TRANSACTION_STATE_SYMBOLS, isAccountKind, isLedgerDate } from "@tallybook/types";
import type {
  LedgerDate,
  ParsedAccount,
  ParsedAmount,
  ParsedExchange,
  Statement,
  TxnHeader,
} from "@tallybook/types";
import { parseNominal } from "./amount-math.js";
import { parseRule } from "./grammar.js";
import type { GrammarRule, ParseNode } from "./grammar.js";
import { LedgerError, LedgerSyntaxError } from "./types.js";

function unexpected(node: ParseNode, reason: string): LedgerSyntaxError {
  return LedgerSyntaxError.at(reason, { line: node.line, column: node.column, text: node.text });
}

function child(node: ParseNode, index: number, ...rules: GrammarRule[]): ParseNode {
  const found = node.children[index];
  if (found === undefined || !rules.includes(found.rule)) {
    throw unexpected(node, `expected ${rules.join(" or ")} in ${node.rule}`);
  }
  return found;
}

// ─── Tokens ──────────────────────────────────────────────────────────────

export function buildDate(node: ParseNode): LedgerDate {
  if (!isLedgerDate(node.text)) {
    throw new LedgerError("INVALID_DATE", `invalid date "${node.text}"`);
  }
  return node.text;
}

export function buildAccount(node: ParseNode): ParsedAccount {
  const kind = child(node, 0, "account_kind").text;
  const segments = node.children.slice(1).map((segment) => segment.text);
  if (!isAccountKind(kind) || segments.length === 0) {
    throw new LedgerError("INVALID_ACCOUNT", `input "${node.text}" is not a valid account`);
  }
  return { kind, segments };
}

/**
 * Build an `amount` or `amount_with_price` node.
 */
export function buildAmount(node: ParseNode): ParsedAmount {
  if (node.rule === "amount_with_price") {
    const base = buildAmount(child(node, 0, "amount"));
    const prices = node.children.slice(1).map((price) => ({
      nominal: parseNominal(child(price, 0, "nominal").text),
      currency: child(price, 1, "currency").text,
    }));
    return { ...base, prices };
  }
  if (node.rule !== "amount") {
    throw unexpected(node, `expected amount, found ${node.rule}`);
  }
  return {
    nominal: parseNominal(child(node, 0, "nominal").text),
    currency: child(node, 1, "currency").text,
    prices: [],
  };
}

export function buildHeader(node: ParseNode): TxnHeader {
  const symbol = child(node, 0, "txn_state").text;
  const state = Object.hasOwn(TRANSACTION_STATE_SYMBOLS, symbol)
    ? TRANSACTION_STATE_SYMBOLS[symbol]
    : undefined;
  if (state === undefined) {
    throw unexpected(node, `invalid transaction state "${symbol}"`);
  }

  const first = child(node, 1, "string").text;
  const second = node.children[2];
  return second === undefined
    ? { state, title: first }
    : { state, payee: first, title: child(node, 2, "string").text };
}

function buildExchange(node: ParseNode): ParsedExchange {
  const account = buildAccount(child(node, 0, "account"));
  const amount = node.children[1];
  return amount === undefined ? { account } : { account, amount: buildAmount(amount) };
}

// ─── Statements ──────────────────────────────────────────────────────────

const STATEMENT_RULES: GrammarRule[] = [
  "custom_statement",
  "open_statement",
  "close_statement",
  "pad_statement",
  "balance_statement",
  "price_statement",
  "transaction",
];

/**
 * Build a typed statement from a `statement` node (or its inner node).
 */
export function buildStatement(node: ParseNode): Statement {
  const inner = node.rule === "statement" ? child(node, 0, ...STATEMENT_RULES) : node;
  const date = buildDate(child(inner, 0, "date"));
  const line = inner.line;

  switch (inner.rule) {
    case "custom_statement":
      return {
        type: "custom",
        date,
        line,
        args: inner.children.slice(1).map((arg) => arg.text),
      };
    case "open_statement":
      return { type: "open", date, line, account: buildAccount(child(inner, 1, "account")) };
    case "close_statement":
      return { type: "close", date, line, account: buildAccount(child(inner, 1, "account")) };
    case "pad_statement":
      return {
        type: "pad",
        date,
        line,
        target: buildAccount(child(inner, 1, "account")),
        source: buildAccount(child(inner, 2, "account")),
      };
    case "balance_statement":
      return {
        type: "balance",
        date,
        line,
        account: buildAccount(child(inner, 1, "account")),
        amount: buildAmount(child(inner, 2, "amount")),
      };
    case "price_statement":
      return {
        type: "price",
        date,
        line,
        currency: child(inner, 1, "currency").text,
        price: buildAmount(child(inner, 2, "amount")),
      };
    case "transaction":
      return {
        type: "transaction",
        date,
        line,
        header: buildHeader(child(inner, 1, "txn_header")),
        exchanges: child(inner, 2, "txn_list").children.map(buildExchange),
      };
    default:
      throw unexpected(inner, `expected statement, found ${inner.rule}`);
  }
}

// ─── Text Helpers ────────────────────────────────────────────────────────

/**
 * Parse `Kind:Segment:...` text into an account.
 *
 * "Assets:Bank:Swiss" → { kind: "Assets", segments: ["Bank", "Swiss"] }
 */
export function parseAccount(text: string): ParsedAccount {
  return buildAccount(parseRule("account", text));
}

/**
 * Parse `<nominal> <UNIT> [@ <nominal> <UNIT>]...` text into an amount.
 */
export function parseAmount(text: string): ParsedAmount {
  return buildAmount(parseRule(text.includes("@") ? "amount_with_price" : "amount", text));
}

/**
 * Parse one statement (with its exchange lines) into a typed statement.
 */
export function parseStatement(text: string): Statement {
  return buildStatement(parseRule("statement", text));
}
