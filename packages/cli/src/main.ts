#!/usr/bin/env node
/**
 * @tallybook/cli — Entry point.
 *
 * Loads config, builds the logger and runs the command. Logs go to
 * stderr so they never mix with the report on stdout.
 */

import chalk from "chalk";
import pino from "pino";
import type { Logger } from "pino";
import { ZodError } from "zod";
import { run, EXIT_USAGE } from "./check.js";
import { loadConfig } from "./config.js";
import type { CliConfig } from "./config.js";

function createLogger(config: CliConfig): Logger {
  if (config.NODE_ENV === "development") {
    return pino({
      level: config.LOG_LEVEL,
      transport: { target: "pino-pretty", options: { destination: 2 } },
    });
  }
  return pino({ level: config.LOG_LEVEL }, pino.destination(2));
}

function main(): number {
  let config: CliConfig;
  try {
    config = loadConfig();
  } catch (err) {
    if (err instanceof ZodError) {
      for (const issue of err.issues) {
        console.error(chalk.red("config: ") + `${issue.path.join(".")}: ${issue.message}`);
      }
      return EXIT_USAGE;
    }
    throw err;
  }

  return run(process.argv.slice(2), {
    config,
    logger: createLogger(config),
    chalk,
    stdout: (line) => console.log(line),
    stderr: (line) => console.error(line),
  });
}

process.exitCode = main();
