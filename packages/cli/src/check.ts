/**
 * @tallybook/cli — `tallybook check <file>`.
 *
 * Parses a ledger file, prints a one-line summary and one line per
 * balance diagnostic. Returns the process exit code rather than exiting,
 * so the command can run inside tests.
 *
 * Exit codes:
 * - 0 — parsed, and no diagnostic fails the run
 * - 1 — parse failure, or diagnostics with failOnUnbalanced set
 * - 2 — usage error
 */

import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";
import { LedgerError, parseFile } from "@tallybook/ledger";
import type { Ledger } from "@tallybook/ledger";
import type { CliConfig } from "./config.js";

export const USAGE = "usage: tallybook check <file>";

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

/**
 * Everything the command touches outside its own arguments.
 */
export interface CheckContext {
  readonly config: CliConfig;
  readonly logger: Logger;
  readonly chalk: ChalkInstance;
  readonly stdout: (line: string) => void;
  readonly stderr: (line: string) => void;
  /** Defaults to a synchronous fs read inside the ledger package. */
  readonly readFile?: ((path: string) => string) | undefined;
}

// =============================================================================
// Output
// =============================================================================

function summary(ledger: Ledger): string {
  return [
    `${String(ledger.dates().length)} days`,
    `${String(ledger.transactionCount)} transactions`,
    `${String(ledger.accountCount)} accounts`,
  ].join(", ");
}

function diagnosticLines(ledger: Ledger, ctx: CheckContext): string[] {
  return ledger.errors(ctx.config.TALLYBOOK_BALANCE_CHECK).flatMap(({ date, transaction, diagnostics }) =>
    diagnostics.map(
      (d) =>
        `${ctx.chalk.gray(date)} ${ctx.chalk.white(`"${transaction.title}"`)}: ` +
        ctx.chalk.yellow(ledger.formatDiagnostic(d)),
    ),
  );
}

// =============================================================================
// Commands
// =============================================================================

/**
 * Check one ledger file.
 */
export function checkFile(path: string, ctx: CheckContext): number {
  let ledger: Ledger;
  try {
    ledger = parseFile(path, undefined, { readFile: ctx.readFile, logger: ctx.logger });
  } catch (err) {
    if (!(err instanceof LedgerError)) {
      throw err;
    }
    ctx.logger.debug({ code: err.code, path }, "parse failed");
    ctx.stderr(ctx.chalk.red("error: ") + err.message);
    return EXIT_FAILURE;
  }

  const lines = diagnosticLines(ledger, ctx);
  ctx.stdout(summary(ledger));
  for (const line of lines) {
    ctx.stdout(line);
  }

  if (lines.length > 0 && ctx.config.TALLYBOOK_FAIL_ON_UNBALANCED) {
    return EXIT_FAILURE;
  }
  return EXIT_OK;
}

/**
 * Dispatch command-line arguments (without the node and script paths).
 */
export function run(argv: readonly string[], ctx: CheckContext): number {
  const [command, file, ...extra] = argv;
  if (command !== "check" || file === undefined || extra.length > 0) {
    ctx.stderr(USAGE);
    return EXIT_USAGE;
  }
  return checkFile(file, ctx);
}
