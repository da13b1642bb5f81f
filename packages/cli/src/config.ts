/**
 * @tallybook/cli — Configuration.
 *
 * Loads and validates configuration from environment variables using Zod.
 */

import { z } from "zod";

// =============================================================================
// Schema
// =============================================================================

export const ConfigSchema = z.object({
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .default("warn"),
  NODE_ENV: z
    .enum(["development", "production", "test"])
    .default("production"),

  // Checking
  TALLYBOOK_BALANCE_CHECK: z.enum(["with-sum", "without-sum"]).default("with-sum"),
  TALLYBOOK_FAIL_ON_UNBALANCED: z
    .enum(["true", "false"])
    .default("true")
    .transform((v) => v === "true"),
});

export type CliConfig = z.infer<typeof ConfigSchema>;

// =============================================================================
// Loader
// =============================================================================

/**
 * Load and validate configuration from process.env.
 *
 * @throws {z.ZodError} if an env var holds an invalid value
 */
export function loadConfig(
  env: Record<string, string | undefined> = process.env,
): CliConfig {
  return ConfigSchema.parse(env);
}
