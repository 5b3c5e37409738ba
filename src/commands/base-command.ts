/**
 * @module base-command
 * Base command class for the bucket commands
 *
 * Provides the shared flags, descriptor loading, compiler construction,
 * error formatting and report output. Commands that extend this class only
 * decide what to print for a compile result.
 *
 * @example Basic command implementation
 * ```typescript
 * export default class MyCommand extends BaseCommand {
 *   static override readonly description = "My command description";
 *   static override readonly args = BaseCommand.descriptorArgs;
 *   static override readonly flags = BaseCommand.commonFlags;
 *
 *   async run(): Promise<void> {
 *     const { args, flags } = await this.parse(MyCommand);
 *     const { config, result } = await this.runCompile(args.descriptor, flags, "my command");
 *     if (result.status === "rejected") {
 *       return this.reportRejection(result, config);
 *     }
 *     this.createFormatter(config).bundle(result.bundle);
 *   }
 * }
 * ```
 *
 * @public
 */

import { Args, Command, Flags } from "@oclif/core";
import { ZodError } from "zod";
import {
  CompilationRejectedError,
  formatError as formatBaseError,
  isBaseError,
} from "../lib/errors.js";
import { FormatterFactory, type Formatter } from "../lib/formatters.js";
import { Logger } from "../lib/logger.js";
import { parseDescriptorInput } from "../lib/parsing.js";
import {
  OutputFormatSchema,
  parseCompilerOptions,
  resolveLogLevel,
  type CliConfig,
} from "../lib/schemas.js";
import { BucketCompiler } from "../services/compiler/compiler-pipeline.js";
import type { CompileResult, Violation } from "../services/compiler/types.js";

/**
 * Flags accepted by every bucket command
 *
 * @public
 */
export interface CommonFlagValues {
  format?: string;
  verbose?: boolean;
  "fail-on-warnings"?: boolean;
  "log-level"?: string;
}

/**
 * Rejected compile result
 *
 * @public
 */
export type RejectedResult = Extract<CompileResult, { status: "rejected" }>;

/**
 * Configuration and outcome of one compile run
 *
 * @public
 */
export interface CompileRun {
  config: CliConfig;
  result: CompileResult;
}

/**
 * Base command class providing common functionality for all commands
 *
 * @public
 */
export abstract class BaseCommand extends Command {
  /**
   * The descriptor positional argument
   */
  static readonly descriptorArgs = {
    descriptor: Args.string({
      description: "Bucket descriptor as inline JSON or a file:// path",
      required: true,
    }),
  };

  /**
   * Common flags shared across all commands
   *
   * @example
   * ```typescript
   * static override readonly flags = {
   *   ...BaseCommand.commonFlags,
   *   customFlag: Flags.string({ description: "Custom flag" }),
   * };
   * ```
   */
  static readonly commonFlags = {
    format: Flags.string({
      char: "f",
      description: "Output format",
      options: ["table", "json", "jsonl"],
      default: "table",
      helpValue: "FORMAT",
    }),

    verbose: Flags.boolean({
      char: "v",
      description: "Enable verbose output with debug information",
      default: false,
    }),

    "fail-on-warnings": Flags.boolean({
      description: "Reject descriptors that produce warnings",
      default: false,
    }),

    "log-level": Flags.string({
      description: "Compiler log level (LOG_LEVEL or warn when unset)",
      options: ["debug", "info", "warn", "error", "silent"],
      helpValue: "LEVEL",
    }),
  };

  /**
   * Validate flag values into a CLI configuration
   *
   * @throws ConfigurationError or ZodError for invalid values
   */
  protected resolveCliConfig(flags: CommonFlagValues): CliConfig {
    const options = parseCompilerOptions({
      failOnWarnings: flags["fail-on-warnings"] ?? false,
      ...(flags["log-level"] !== undefined && { logLevel: flags["log-level"] }),
    });

    return {
      ...options,
      format: OutputFormatSchema.parse(flags.format),
      verbose: flags.verbose ?? false,
    };
  }

  /**
   * Read a descriptor and compile it
   *
   * @param descriptor - Inline JSON or file:// path
   * @param config - Resolved CLI configuration
   * @throws DescriptorInputError when the descriptor cannot be read
   */
  protected async compileDescriptor(descriptor: string, config: CliConfig): Promise<CompileResult> {
    const input = await parseDescriptorInput(descriptor);
    const level = resolveLogLevel(config, config.verbose);
    const logger = new Logger({ component: "compiler", ...(level !== undefined && { level }) });
    const compiler = new BucketCompiler({ logger, failOnWarnings: config.failOnWarnings });
    return compiler.compile(input);
  }

  /**
   * Resolve flags, read the descriptor and compile it
   *
   * Input and option failures end the command with status 1; a rejected
   * descriptor is returned as a result for the caller to report.
   *
   * @param descriptor - Inline JSON or file:// path
   * @param flags - Parsed common flags
   * @param context - Operation name for error messages
   */
  protected async runCompile(
    descriptor: string,
    flags: CommonFlagValues,
    context: string,
  ): Promise<CompileRun> {
    try {
      const config = this.resolveCliConfig(flags);
      const result = await this.compileDescriptor(descriptor, config);
      return { config, result };
    } catch (error) {
      return this.error(this.formatError(error, flags.verbose, context), { exit: 1 });
    }
  }

  /**
   * Formatter writing to stdout
   */
  protected createFormatter(config: CliConfig): Formatter {
    return FormatterFactory.create(config.format, (message) => this.log(message));
  }

  /**
   * Print the violations of a rejected descriptor and exit with status 1
   */
  protected reportRejection(result: RejectedResult, config: CliConfig): never {
    this.createFormatter(config).violations(result.violations);
    const error = new CompilationRejectedError(result.name, result.violations);
    return this.error(this.formatError(error, config.verbose), { exit: 1 });
  }

  /**
   * Print warnings to stderr, leaving stdout to the primary output
   */
  protected reportWarnings(warnings: readonly Violation[]): void {
    for (const warning of warnings) {
      this.logToStderr(`warning: ${warning.code} ${warning.path}: ${warning.message}`);
    }
  }

  /**
   * Format Zod validation errors
   */
  private formatZodError(error: ZodError, contextPrefix: string): string {
    const issues = error.issues
      .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
      .join("; ");
    return `${contextPrefix}Validation failed - ${issues}`;
  }

  /**
   * Format error with context
   *
   * @param error - Error to format
   * @param verbose - Include metadata and stack traces
   * @param context - Operation context for error message
   * @returns Formatted error message
   */
  protected formatError(error: unknown, verbose = false, context?: string): string {
    const contextPrefix = context ? `${context}: ` : "";

    if (error instanceof ZodError) {
      return this.formatZodError(error, contextPrefix);
    }

    if (isBaseError(error)) {
      return `${contextPrefix}${formatBaseError(error, verbose)}`;
    }

    if (error instanceof Error) {
      let message = `${contextPrefix}${error.message}`;
      if (verbose && error.stack) {
        message += `\n\nStack trace:\n${error.stack}`;
      }
      return message;
    }

    return `${contextPrefix}${String(error)}`;
  }
}
