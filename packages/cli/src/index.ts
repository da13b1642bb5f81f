/**
 * @tallybook/cli — Command-line checker for tallybook ledger files.
 */

export { run, checkFile, USAGE, EXIT_OK, EXIT_FAILURE, EXIT_USAGE } from "./check.js";
export type { CheckContext } from "./check.js";
export { loadConfig, ConfigSchema } from "./config.js";
export type { CliConfig } from "./config.js";
