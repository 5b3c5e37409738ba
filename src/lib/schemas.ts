/**
 * Zod schemas for compiler options and command-line configuration
 *
 */

import { z } from "zod";
import { ConfigurationError } from "./errors.js";
import { LogLevel, parseLogLevel, type LogLevelName } from "./logger.js";

/**
 * Schema for output format validation
 *
 * @public
 */
export const OutputFormatSchema = z.enum(["table", "json", "jsonl"]).default("table");

export type OutputFormat = z.infer<typeof OutputFormatSchema>;

const LOG_LEVEL_NAMES = [
  "debug",
  "info",
  "warn",
  "error",
  "silent",
] as const satisfies readonly LogLevelName[];

/**
 * Options shared by every compile invocation
 *
 * @public
 */
export const CompilerOptionsSchema = z.object({
  /**
   * Reject descriptors that only produced warnings
   */
  failOnWarnings: z.boolean().default(false),

  /**
   * Minimum level for compiler log output; unset keeps LOG_LEVEL or WARN
   */
  logLevel: z.enum(LOG_LEVEL_NAMES).optional(),
});

export type CompilerOptions = z.infer<typeof CompilerOptionsSchema>;

/**
 * Common CLI configuration schema
 *
 * @public
 */
export const CliConfigSchema = CompilerOptionsSchema.extend({
  format: OutputFormatSchema,
  verbose: z.boolean().default(false),
});

export type CliConfig = z.infer<typeof CliConfigSchema>;

/**
 * Validate compiler options
 *
 * @param input - Options to validate, e.g. assembled from command flags
 * @returns Options with defaults applied
 * @throws ConfigurationError naming the first invalid option
 *
 * @public
 */
export function parseCompilerOptions(input: unknown): CompilerOptions {
  const result = CompilerOptionsSchema.safeParse(input);

  if (!result.success) {
    const [issue] = result.error.issues;
    const key = issue?.path.join(".") || undefined;
    throw new ConfigurationError(
      `Invalid compiler option${key ? ` "${key}"` : ""}: ${issue?.message ?? "unknown issue"}`,
      key,
      issue?.code === "invalid_enum_value" ? issue.options.join(" | ") : undefined,
      issue?.code === "invalid_enum_value" || issue?.code === "invalid_type"
        ? issue.received
        : undefined,
    );
  }

  return result.data;
}

/**
 * Log level for validated options
 *
 * @param options - Validated compiler options
 * @param verbose - Verbose flag, which forces DEBUG
 * @returns Level, or undefined to keep the logger's own default
 *
 * @public
 */
export function resolveLogLevel(options: CompilerOptions, verbose = false): LogLevel | undefined {
  if (verbose) return LogLevel.DEBUG;
  return parseLogLevel(options.logLevel);
}
