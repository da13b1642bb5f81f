/**
 * @tallybook/ledger — Source loading.
 *
 * Walks the grammar tree of a ledger source and applies each line to a
 * Ledger, in order. `include` directives load further files into the
 * same ledger, resolved relative to the including file.
 *
 * Parsing is atomic: the caller's ledger is cloned first and only the
 * clone is modified, so a failure leaves `existing` untouched.
 */

import { readFileSync } from "node:fs";
import { dirname, resolve } from "node:path";
import pino from "pino";
import type { Logger } from "pino";
import { parseRule } from "./grammar.js";
import type { ParseNode } from "./grammar.js";
import { Ledger } from "./ledger.js";
import { buildStatement } from "./statement-builder.js";
import type { ParseOptions } from "./types.js";
import { LedgerError } from "./types.js";

interface LoadContext {
  readonly ledger: Ledger;
  readonly readFile: (path: string) => string;
  readonly logger: Logger;
  /** Absolute paths of the files currently being loaded, outermost first. */
  readonly stack: string[];
}

function defaultReadFile(path: string): string {
  return readFileSync(path, "utf-8");
}

function createContext(ledger: Ledger, options: ParseOptions): LoadContext {
  return {
    ledger,
    readFile: options.readFile ?? defaultReadFile,
    logger: options.logger ?? pino({ level: "silent" }),
    stack: [],
  };
}

function stringArg(node: ParseNode, index: number): string {
  const arg = node.children[index];
  if (arg === undefined) {
    throw new LedgerError("SYNTAX_ERROR", `${node.rule} is missing argument ${String(index + 1)}`);
  }
  return arg.text;
}

// =============================================================================
// Directives
// =============================================================================

function applyOption(ctx: LoadContext, node: ParseNode): void {
  const key = stringArg(node, 0);
  const value = stringArg(node, 1);
  const previous = ctx.ledger.getOption(key);
  if (previous !== undefined) {
    ctx.logger.warn({ key, previous, value, line: node.line }, "option set more than once");
  }
  ctx.ledger.setOption(key, value);
}

function applyInclude(ctx: LoadContext, node: ParseNode, baseDir: string): void {
  const path = resolve(baseDir, stringArg(node, 0));
  try {
    loadFile(ctx, path);
  } catch (err) {
    if (err instanceof LedgerError) {
      throw err.withContext(`line ${String(node.line)}`);
    }
    throw err;
  }
}

function applyLine(ctx: LoadContext, node: ParseNode, baseDir: string): void {
  switch (node.rule) {
    case "option":
      applyOption(ctx, node);
      break;
    case "unit":
      ctx.ledger.declareUnit(stringArg(node, 0));
      break;
    case "include":
      applyInclude(ctx, node, baseDir);
      break;
    default:
      ctx.ledger.process(buildStatement(node));
      break;
  }
}

// =============================================================================
// Sources
// =============================================================================

function loadText(ctx: LoadContext, text: string, baseDir: string): void {
  const tree = parseRule("ledger", text);
  for (const line of tree.children) {
    applyLine(ctx, line, baseDir);
  }
}

function loadFile(ctx: LoadContext, path: string): void {
  if (ctx.stack.includes(path)) {
    throw new LedgerError("INCLUDE_CYCLE", `include cycle: ${[...ctx.stack, path].join(" -> ")}`);
  }

  let text: string;
  try {
    text = ctx.readFile(path);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LedgerError("IO_ERROR", `cannot read "${path}": ${reason}`, { cause: err });
  }

  ctx.logger.debug({ path, depth: ctx.stack.length }, "loading ledger file");
  ctx.stack.push(path);
  try {
    loadText(ctx, text, dirname(path));
  } catch (err) {
    if (err instanceof LedgerError) {
      throw err.withContext(path);
    }
    throw err;
  } finally {
    ctx.stack.pop();
  }
}

function logSummary(ctx: LoadContext): void {
  ctx.logger.debug(
    {
      days: ctx.ledger.dates().length,
      transactions: ctx.ledger.transactionCount,
      accounts: ctx.ledger.accountCount,
      units: ctx.ledger.getUnits().length,
    },
    "ledger parsed",
  );
}

// =============================================================================
// Entry Points
// =============================================================================

/**
 * Parse ledger source text.
 *
 * Statements are applied on top of a copy of `existing` when given.
 * `include` paths resolve against `options.baseDir`, or the working
 * directory.
 *
 * @throws {LedgerError} on the first syntax or semantic error
 */
export function parse(text: string, existing?: Ledger, options: ParseOptions = {}): Ledger {
  const ctx = createContext(existing?.clone() ?? new Ledger(), options);
  loadText(ctx, text, resolve(options.baseDir ?? "."));
  logSummary(ctx);
  return ctx.ledger;
}

/**
 * Read and parse a ledger file, following its includes.
 *
 * @throws {LedgerError} on the first read, syntax or semantic error,
 *   prefixed with the path of the file it occurred in
 */
export function parseFile(path: string, existing?: Ledger, options: ParseOptions = {}): Ledger {
  const ctx = createContext(existing?.clone() ?? new Ledger(), options);
  loadFile(ctx, resolve(options.baseDir ?? ".", path));
  logSummary(ctx);
  return ctx.ledger;
}
