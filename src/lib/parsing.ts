/**
 * Descriptor input parsing for the command-line shell
 *
 * A descriptor arrives either as inline JSON or as a file:// path to a JSON
 * file. Either way the result must be a JSON object; anything else is a
 * {@link DescriptorInputError}, never a violation.
 *
 * @file
 */

import { readFile } from "node:fs/promises";
import { DescriptorInputError } from "./errors.js";

const FILE_PROTOCOL = "file://";

/**
 * Safely parse JSON content and validate as Record\<string, unknown\>
 *
 * @param content - JSON string to parse
 * @param source - Where the content came from, for error messages
 * @returns Parsed object
 * @throws DescriptorInputError if JSON is invalid or not an object
 */
export function parseJsonAsRecord(content: string, source: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(content);
  } catch (error) {
    throw new DescriptorInputError(
      `Descriptor from ${source} is not valid JSON: ${error instanceof Error ? error.message : String(error)}`,
      source,
      error,
    );
  }

  if (!isRecord(parsed)) {
    const actual = Array.isArray(parsed) ? "array" : parsed === null ? "null" : typeof parsed;
    throw new DescriptorInputError(
      `Descriptor from ${source} must be a JSON object, got ${actual}`,
      source,
    );
  }

  return parsed;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/**
 * Parse a descriptor from either direct JSON or file:// protocol
 *
 * @param input - JSON string or file:// path
 * @returns Parsed descriptor object, not yet validated
 * @throws DescriptorInputError if the file cannot be read, the JSON is
 * invalid, or the value is not an object
 *
 * @example
 * ```typescript
 * // Direct JSON
 * const descriptor = await parseDescriptorInput('{"name": "access-logs"}');
 *
 * // File input
 * const descriptor = await parseDescriptorInput("file://buckets/access-logs.json");
 * ```
 */
export async function parseDescriptorInput(input: string): Promise<Record<string, unknown>> {
  if (!input.startsWith(FILE_PROTOCOL)) {
    return parseJsonAsRecord(input, "inline input");
  }

  const filePath = input.slice(FILE_PROTOCOL.length);
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    throw new DescriptorInputError(
      `Cannot read descriptor file ${filePath}: ${error instanceof Error ? error.message : String(error)}`,
      filePath,
      error,
    );
  }

  return parseJsonAsRecord(content, filePath);
}
