/**
 * @tallybook/ledger — Grammar layer.
 *
 * Line-oriented tokenizer turning ledger source into a tree of typed
 * nodes, one `statement` (or directive) node per non-indented line.
 * Indented lines are the exchange lines of the transaction above them.
 *
 * The tree only checks shape: token patterns, token order and line
 * structure. Calendar validity, account kinds and number parsing are
 * the statement builder's job.
 *
 * Lexical rules:
 * - Tokens are separated by spaces or tabs
 * - `;` starts a comment running to the end of the line (outside strings)
 * - Strings are double-quoted; `\"` and `\\` are the only escapes
 */

import type { SourceLocation } from "./types.js";
import { LedgerSyntaxError } from "./types.js";

export type GrammarRule =
  | "ledger"
  | "option"
  | "unit"
  | "include"
  | "statement"
  | "custom_statement"
  | "open_statement"
  | "close_statement"
  | "pad_statement"
  | "balance_statement"
  | "price_statement"
  | "transaction"
  | "txn_header"
  | "txn_state"
  | "txn_list"
  | "txn_exchange"
  | "date"
  | "account"
  | "account_kind"
  | "segment"
  | "amount"
  | "amount_with_price"
  | "price"
  | "nominal"
  | "currency"
  | "string";

/** Rules that may be parsed on their own with parseRule(). */
export type EntryRule =
  | "ledger"
  | "statement"
  | "date"
  | "account"
  | "amount"
  | "amount_with_price"
  | "string";

/**
 * A node of the parse tree.
 *
 * `text` is the source text the node spans, except for `string` nodes,
 * where it is the decoded string contents without quotes.
 */
export interface ParseNode {
  readonly rule: GrammarRule;
  readonly text: string;
  /** 1-based line of the node's first character. */
  readonly line: number;
  /** 1-based column of the node's first character. */
  readonly column: number;
  readonly children: readonly ParseNode[];
}

interface MutableNode extends ParseNode {
  readonly children: MutableNode[];
}

interface Word {
  readonly text: string;
  readonly column: number;
}

const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const ACCOUNT_PATTERN = /^[A-Z][A-Za-z]*(?::[\p{L}\p{N}][\p{L}\p{N}_-]*)+$/u;
const NOMINAL_PATTERN = /^-?\d+(?:\.\d+)?$/;
const CURRENCY_PATTERN = /^[A-Z][A-Z0-9._-]*$/;
const STATE_SYMBOLS = new Set(["*", "!", "#"]);

const STATEMENT_KEYWORDS: ReadonlyMap<string, GrammarRule> = new Map<string, GrammarRule>([
  ["custom", "custom_statement"],
  ["open", "open_statement"],
  ["close", "close_statement"],
  ["pad", "pad_statement"],
  ["balance", "balance_statement"],
  ["price", "price_statement"],
]);

function node(
  rule: GrammarRule,
  text: string,
  line: number,
  column: number,
  children: MutableNode[] = [],
): MutableNode {
  return { rule, text, line, column, children };
}

function isBlank(char: string | undefined): boolean {
  return char === " " || char === "\t" || char === "\r";
}

// =============================================================================
// Line Scanner
// =============================================================================

class LineScanner {
  private _pos = 0;

  constructor(
    readonly source: string,
    readonly line: number,
  ) {}

  location(column: number): SourceLocation {
    return { line: this.line, column, text: this.source.trim() };
  }

  fail(reason: string, column: number = this._pos + 1): LedgerSyntaxError {
    return LedgerSyntaxError.at(reason, this.location(column));
  }

  get column(): number {
    this._skipBlanks();
    return this._pos + 1;
  }

  /** Source text from `column` up to the current position. */
  textFrom(column: number): string {
    return this.source.slice(column - 1, this._pos).trim();
  }

  atEnd(): boolean {
    this._skipBlanks();
    return this._pos >= this.source.length || this.source[this._pos] === ";";
  }

  peek(): string | undefined {
    return this.atEnd() ? undefined : this.source[this._pos];
  }

  /** Next run of non-blank characters, stopping at a comment or quote. */
  word(expected: string): Word {
    if (this.atEnd()) {
      throw this.fail(`expected ${expected}, found end of line`);
    }
    const start = this._pos;
    while (
      this._pos < this.source.length &&
      !isBlank(this.source[this._pos]) &&
      this.source[this._pos] !== ";" &&
      this.source[this._pos] !== '"'
    ) {
      this._pos++;
    }
    if (this._pos === start) {
      throw this.fail(`expected ${expected}, found "${this.source.slice(start, start + 1)}"`);
    }
    return { text: this.source.slice(start, this._pos), column: start + 1 };
  }

  /** A double-quoted string, decoded. */
  quoted(): Word {
    if (this.peek() !== '"') {
      const found = this.atEnd() ? "end of line" : `"${this.word("string").text}"`;
      throw this.fail(`expected string, found ${found}`);
    }
    const column = this._pos + 1;
    this._pos++;
    let value = "";
    while (this._pos < this.source.length) {
      const char = this.source[this._pos];
      this._pos++;
      if (char === '"') {
        return { text: value, column };
      }
      if (char === "\\") {
        const escaped = this.source[this._pos];
        if (escaped !== '"' && escaped !== "\\") {
          throw this.fail(`invalid escape "\\${escaped ?? ""}"`, this._pos);
        }
        value += escaped;
        this._pos++;
      } else {
        value += char;
      }
    }
    throw this.fail("unterminated string", column);
  }

  expectEnd(): void {
    if (!this.atEnd()) {
      const rest = this.peek() === '"' ? this.quoted() : this.word("end of line");
      throw this.fail(`unexpected "${rest.text}"`, rest.column);
    }
  }

  private _skipBlanks(): void {
    while (this._pos < this.source.length && isBlank(this.source[this._pos])) {
      this._pos++;
    }
  }
}

// =============================================================================
// Tokens
// =============================================================================

function dateNode(s: LineScanner, w: Word = s.word("date")): MutableNode {
  if (!DATE_PATTERN.test(w.text)) {
    throw s.fail(`expected date (YYYY-MM-DD), found "${w.text}"`, w.column);
  }
  return node("date", w.text, s.line, w.column);
}

function accountNode(s: LineScanner): MutableNode {
  const w = s.word("account");
  if (!ACCOUNT_PATTERN.test(w.text)) {
    throw s.fail(`expected account, found "${w.text}"`, w.column);
  }

  const children: MutableNode[] = [];
  let column = w.column;
  w.text.split(":").forEach((part, i) => {
    children.push(node(i === 0 ? "account_kind" : "segment", part, s.line, column));
    column += part.length + 1;
  });
  return node("account", w.text, s.line, w.column, children);
}

function stringNode(s: LineScanner): MutableNode {
  const q = s.quoted();
  return node("string", q.text, s.line, q.column);
}

function nominalNode(s: LineScanner): MutableNode {
  const w = s.word("number");
  if (!NOMINAL_PATTERN.test(w.text)) {
    throw s.fail(`expected number, found "${w.text}"`, w.column);
  }
  return node("nominal", w.text, s.line, w.column);
}

function currencyNode(s: LineScanner): MutableNode {
  const w = s.word("unit");
  if (!CURRENCY_PATTERN.test(w.text)) {
    throw s.fail(`expected unit, found "${w.text}"`, w.column);
  }
  return node("currency", w.text, s.line, w.column);
}

function amountNode(s: LineScanner): MutableNode {
  const column = s.column;
  const nominal = nominalNode(s);
  const currency = currencyNode(s);
  return node("amount", s.textFrom(column), s.line, column, [nominal, currency]);
}

/**
 * An amount followed by `@ <nominal> <unit>` quotes. With `requirePrice`
 * unset, a bare amount comes back as an `amount` node.
 */
function pricedAmountNode(s: LineScanner, requirePrice: boolean): MutableNode {
  const column = s.column;
  const amount = amountNode(s);
  const prices: MutableNode[] = [];

  while (s.peek() === "@") {
    const at = s.word('"@"');
    if (at.text !== "@") {
      throw s.fail(`expected "@", found "${at.text}"`, at.column);
    }
    const priceColumn = s.column;
    const nominal = nominalNode(s);
    const currency = currencyNode(s);
    prices.push(node("price", s.textFrom(priceColumn), s.line, priceColumn, [nominal, currency]));
  }

  if (prices.length === 0) {
    if (requirePrice) {
      throw s.fail('expected "@"');
    }
    return amount;
  }
  return node("amount_with_price", s.textFrom(column), s.line, column, [amount, ...prices]);
}

// =============================================================================
// Lines
// =============================================================================

function statementNode(s: LineScanner, date: MutableNode): MutableNode {
  const w = s.word("statement keyword or transaction flag");
  const children: MutableNode[] = [date];
  let rule: GrammarRule;

  if (STATE_SYMBOLS.has(w.text)) {
    rule = "transaction";
    const header = node("txn_header", "", s.line, w.column, [node("txn_state", w.text, s.line, w.column)]);
    header.children.push(stringNode(s));
    if (!s.atEnd()) {
      header.children.push(stringNode(s));
    }
    children.push(
      { ...header, text: s.textFrom(w.column) },
      node("txn_list", "", s.line, w.column),
    );
  } else {
    const keyword = STATEMENT_KEYWORDS.get(w.text);
    if (keyword === undefined) {
      throw s.fail(`unknown statement "${w.text}"`, w.column);
    }
    rule = keyword;
    switch (keyword) {
      case "custom_statement":
        do {
          children.push(stringNode(s));
        } while (!s.atEnd());
        break;
      case "open_statement":
      case "close_statement":
        children.push(accountNode(s));
        break;
      case "pad_statement":
        children.push(accountNode(s), accountNode(s));
        break;
      case "balance_statement":
        children.push(accountNode(s), amountNode(s));
        break;
      default:
        children.push(currencyNode(s), amountNode(s));
        break;
    }
  }

  s.expectEnd();
  const text = s.source.trim();
  const inner = node(rule, text, s.line, date.column, children);
  return node("statement", text, s.line, date.column, [inner]);
}

function directiveNode(s: LineScanner): MutableNode {
  const w = s.word("date or directive");
  let result: MutableNode;

  switch (w.text) {
    case "option":
      result = node("option", "", s.line, w.column, [stringNode(s), stringNode(s)]);
      break;
    case "unit":
      result = node("unit", "", s.line, w.column, [currencyNode(s)]);
      break;
    case "include":
      result = node("include", "", s.line, w.column, [stringNode(s)]);
      break;
    default:
      if (!DATE_PATTERN.test(w.text)) {
        throw s.fail(`expected date or directive, found "${w.text}"`, w.column);
      }
      return statementNode(s, dateNode(s, w));
  }

  s.expectEnd();
  return { ...result, text: s.source.trim() };
}

function exchangeNode(s: LineScanner): MutableNode {
  const column = s.column;
  const children = [accountNode(s)];
  if (!s.atEnd()) {
    children.push(pricedAmountNode(s, false));
  }
  s.expectEnd();
  return node("txn_exchange", s.textFrom(column), s.line, column, children);
}

function transactionList(statement: MutableNode): MutableNode | undefined {
  const inner = statement.children[0];
  return inner?.rule === "transaction" ? inner.children[2] : undefined;
}

function assertHasExchanges(statement: MutableNode | undefined): void {
  const list = statement === undefined ? undefined : transactionList(statement);
  if (statement !== undefined && list !== undefined && list.children.length === 0) {
    throw LedgerSyntaxError.at("transaction has no exchange lines", {
      line: statement.line,
      column: statement.column,
      text: statement.text,
    });
  }
}

function parseLedger(text: string): MutableNode {
  const root = node("ledger", text, 1, 1);
  let open: MutableNode | undefined;

  const body = text.startsWith("\uFEFF") ? text.slice(1) : text;
  body.split(/\r?\n/).forEach((source, i) => {
    const s = new LineScanner(source, i + 1);
    if (s.atEnd()) {
      return;
    }

    if (isBlank(source[0])) {
      const list = open === undefined ? undefined : transactionList(open);
      if (list === undefined) {
        throw s.fail("indented line outside a transaction", s.column);
      }
      list.children.push(exchangeNode(s));
      return;
    }

    assertHasExchanges(open);
    const line = directiveNode(s);
    root.children.push(line);
    open = line.rule === "statement" && transactionList(line) !== undefined ? line : undefined;
  });

  assertHasExchanges(open);
  return root;
}

// =============================================================================
// Entry Point
// =============================================================================

/**
 * Parse `text` as the given rule.
 *
 * `ledger` accepts a whole file; `statement` accepts exactly one statement
 * (with its exchange lines); the other rules accept a single token or
 * amount on one line.
 *
 * @throws {LedgerSyntaxError} on malformed input
 */
export function parseRule(rule: EntryRule, text: string): ParseNode {
  if (rule === "ledger") {
    return parseLedger(text);
  }

  if (rule === "statement") {
    const [first, ...rest] = parseLedger(text).children;
    if (first === undefined || first.rule !== "statement" || rest.length > 0) {
      throw LedgerSyntaxError.at("expected exactly one statement", {
        line: first?.line ?? 1,
        column: 1,
        text: first?.text ?? text.trim(),
      });
    }
    return first;
  }

  if (/[\r\n]/.test(text)) {
    throw LedgerSyntaxError.at(`expected a single line for ${rule}`, { line: 1, column: 1, text: text.trim() });
  }

  const s = new LineScanner(text, 1);
  let result: MutableNode;
  switch (rule) {
    case "date":
      result = dateNode(s);
      break;
    case "account":
      result = accountNode(s);
      break;
    case "amount":
      result = amountNode(s);
      break;
    case "amount_with_price":
      result = pricedAmountNode(s, true);
      break;
    case "string":
      result = stringNode(s);
      break;
  }
  s.expectEnd();
  return result;
}
