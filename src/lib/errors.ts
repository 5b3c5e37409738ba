/**
 * Error hierarchy for the bucket compiler
 *
 * Violations found in a descriptor are data, not exceptions: the compiler
 * returns them. The classes here cover the cases where there is nothing to
 * compile at all (unreadable input, invalid options) and the opt-in
 * throwing entry point.
 *
 * @file
 * - BaseError: abstract base with code and metadata
 * - DescriptorInputError: descriptor could not be read or is not a JSON object
 * - ConfigurationError: invalid compiler options
 * - CompilationRejectedError: the pipeline ended in the Rejected state
 */

import type { Violation } from "../services/compiler/types.js";

/**
 * Base error class for all compiler errors
 *
 * @public
 */
export abstract class BaseError extends Error {
  /**
   * Unique error code for this error type
   */
  public readonly code: string;

  /**
   * Additional error metadata
   */
  public readonly metadata: Record<string, unknown>;

  constructor(message: string, code: string, metadata: Record<string, unknown> = {}) {
    super(message);
    this.name = this.constructor.name;
    this.code = code;
    this.metadata = metadata;

    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/**
 * Descriptor input could not be turned into a JSON object
 *
 * @public
 */
export class DescriptorInputError extends BaseError {
  /**
   * @param message - User-facing message
   * @param source - Where the input came from ("inline" or a file path)
   * @param cause - Underlying read or parse failure
   */
  constructor(message: string, source?: string, cause?: unknown) {
    super(message, "DESCRIPTOR_INPUT_ERROR", { source, cause });
  }
}

/**
 * Compiler options failed validation
 *
 * @public
 */
export class ConfigurationError extends BaseError {
  /**
   * @param message - User-facing message
   * @param configKey - Option that is invalid
   * @param expectedValue - Description of what was expected
   * @param actualValue - Value that was supplied
   */
  constructor(message: string, configKey?: string, expectedValue?: unknown, actualValue?: unknown) {
    super(message, "CONFIGURATION_ERROR", { configKey, expectedValue, actualValue });
  }
}

/**
 * Raised by the throwing compile entry point when a descriptor is rejected
 *
 * @public
 */
export class CompilationRejectedError extends BaseError {
  public readonly violations: readonly Violation[];

  /**
   * @param bucketName - Descriptor name, when it could be read
   * @param violations - Full, ordered violation list
   */
  constructor(bucketName: string | undefined, violations: readonly Violation[]) {
    const errorCount = violations.filter((violation) => violation.severity === "error").length;
    const subject = bucketName ? `Bucket descriptor "${bucketName}"` : "Bucket descriptor";
    super(
      `${subject} rejected with ${errorCount} error(s) and ${violations.length - errorCount} warning(s)`,
      "COMPILATION_REJECTED",
      { bucketName, violationCount: violations.length },
    );
    this.violations = violations;
  }
}

/**
 * Check if an error is one of our custom error types
 *
 * @public
 */
export function isBaseError(error: unknown): error is BaseError {
  return error instanceof BaseError;
}

/**
 * Format error for user display
 *
 * @param error - The error to format
 * @param includeMetadata - Whether to include error metadata in output
 * @returns Formatted message
 *
 * @public
 */
export function formatError(error: unknown, includeMetadata = false): string {
  if (isBaseError(error)) {
    let formatted = `${error.code}: ${error.message}`;

    if (includeMetadata && Object.keys(error.metadata).length > 0) {
      formatted += `\nDetails: ${JSON.stringify(error.metadata, metadataReplacer, 2)}`;
    }

    return formatted;
  }

  if (error instanceof Error) {
    return error.message;
  }

  return String(error);
}

function metadataReplacer(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}
