/**
 * @module structural
 * Structural parse of the raw descriptor
 *
 * Runs the zod descriptor schema and translates every issue into a
 * violation with a code from the closed set. Top-level fields that parse
 * are kept even when others fail.
 */

import type { ZodIssue } from "zod";
import { BucketDescriptorSchema, type BucketDescriptor } from "../../lib/descriptor-schemas.js";
import { locationFromPath } from "./diagnostics.js";
import type {
  DescriptorField,
  DescriptorFields,
  ViolationCode,
  ViolationReporter,
} from "./types.js";

/**
 * Map a zod issue onto the closed violation code set
 *
 * Missing values and wrong types mean the field is not present in the
 * required form; enum and literal mismatches are enum violations; every
 * other constraint (bounds, length, integer-ness, pattern) is a range one.
 *
 * @public
 */
export function violationCodeForIssue(issue: ZodIssue): ViolationCode {
  switch (issue.code) {
    case "invalid_type": {
      return issue.expected === "integer" ? "OUT_OF_RANGE" : "REQUIRES_FIELD";
    }
    case "invalid_enum_value":
    case "invalid_literal":
    case "invalid_union_discriminator": {
      return "INVALID_ENUM_VALUE";
    }
    default: {
      return "OUT_OF_RANGE";
    }
  }
}

function messageForIssue(issue: ZodIssue): string {
  if (issue.code === "invalid_type" && issue.received === "undefined") {
    return `Field is required (expected ${issue.expected})`;
  }
  return issue.message;
}

/**
 * Outcome of the structural parse of an object descriptor
 *
 * @public
 */
export interface ParsedDescriptor {
  /**
   * Every top-level field that parsed
   */
  readonly fields: DescriptorFields;

  /**
   * Top-level fields with at least one structural violation
   */
  readonly invalidFields: ReadonlySet<DescriptorField>;

  /**
   * The whole descriptor, present only when nothing failed
   */
  readonly descriptor?: BucketDescriptor;
}

const DESCRIPTOR_FIELDS: ReadonlySet<string> = new Set(BucketDescriptorSchema.keyof().options);

function isDescriptorField(value: unknown): value is DescriptorField {
  return typeof value === "string" && DESCRIPTOR_FIELDS.has(value);
}

const PartialDescriptorSchema = BucketDescriptorSchema.partial();

/**
 * Parse raw input into typed descriptor fields
 *
 * Every issue is reported. Fields that failed are dropped and the rest
 * are kept, so relational checks can still run over them.
 *
 * @param input - Caller-supplied value
 * @param reporter - Sink for structural violations
 * @returns The parsed fields, or undefined when the input is not an object
 *
 * @public
 */
export function parseDescriptor(
  input: unknown,
  reporter: ViolationReporter,
): ParsedDescriptor | undefined {
  const result = BucketDescriptorSchema.safeParse(input);

  if (result.success) {
    return { fields: result.data, invalidFields: new Set(), descriptor: result.data };
  }

  const invalidFields = new Set<DescriptorField>();
  let wholeInputInvalid = false;

  for (const issue of result.error.issues) {
    reporter.error(
      violationCodeForIssue(issue),
      locationFromPath(issue.path),
      messageForIssue(issue),
    );

    const [field] = issue.path;
    if (isDescriptorField(field)) {
      invalidFields.add(field);
    } else {
      wholeInputInvalid = true;
    }
  }

  if (wholeInputInvalid || typeof input !== "object" || input === null) {
    return undefined;
  }

  const remaining = Object.fromEntries(
    Object.entries(input).filter(([key]) => !isDescriptorField(key) || !invalidFields.has(key)),
  );
  const partial = PartialDescriptorSchema.safeParse(remaining);
  if (!partial.success) {
    // Fields parse independently, so what is left parses on its own.
    throw new Error(`Descriptor fields failed to re-parse: ${partial.error.message}`);
  }

  return { fields: partial.data, invalidFields };
}

/**
 * Best-effort read of the descriptor name for reporting
 *
 * @public
 */
export function readDescriptorName(input: unknown): string | undefined {
  if (typeof input !== "object" || input === null || !("name" in input)) {
    return undefined;
  }
  return typeof input.name === "string" && input.name.length > 0 ? input.name : undefined;
}
