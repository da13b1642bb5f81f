/**
 * Shared test helpers for the ledger engine.
 */

import { LedgerError } from "../src/types.js";

/**
 * Run `fn` and return the LedgerError it throws.
 * Fails the test if it returns normally or throws anything else.
 */
export function catchLedgerError(fn: () => unknown): LedgerError {
  try {
    fn();
  } catch (err) {
    if (err instanceof LedgerError) {
      return err;
    }
    throw err;
  }
  throw new Error("expected a LedgerError to be thrown");
}

/**
 * In-memory file system for parseFile/include tests.
 */
export function memoryFiles(files: Record<string, string>): (path: string) => string {
  return (path) => {
    const text = files[path];
    if (text === undefined) {
      throw new Error(`ENOENT: no such file, open '${path}'`);
    }
    return text;
  };
}
