/**
 * @module filters
 * Object filter compilation shared by the rule compilers
 */

import type { ObjectFilter } from "../../lib/descriptor-schemas.js";
import type { BucketTag, CompiledFilter, ViolationLocation, ViolationReporter } from "./types.js";

/**
 * Tag map to tag list, keeping the descriptor's key order
 *
 * @public
 */
export function toBucketTags(tags: Readonly<Record<string, string>> | undefined): BucketTag[] {
  return Object.entries(tags ?? {}).map(([key, value]) => ({ key, value }));
}

/**
 * Compile a filter into its single-condition form, or `and` when more than
 * one condition is present
 *
 * Every tag counts as its own condition, as does each size bound. A lower
 * size bound that is not below the upper bound matches nothing and is
 * reported at the filter.
 *
 * @param filter - Filter as written in the descriptor
 * @param location - Location of the owning rule
 * @param reporter - Violation sink
 *
 * @public
 */
export function compileFilter(
  filter: ObjectFilter | undefined,
  location: ViolationLocation,
  reporter: ViolationReporter,
): CompiledFilter {
  if (!filter) return { kind: "all" };

  const { prefix, object_size_greater_than: greaterThan, object_size_less_than: lessThan } = filter;
  const tags = toBucketTags(filter.tags);

  if (greaterThan !== undefined && lessThan !== undefined && greaterThan >= lessThan) {
    reporter.error(
      "OUT_OF_RANGE",
      { ...location, field: ["filter"] },
      `object_size_greater_than (${greaterThan}) must be less than object_size_less_than (${lessThan})`,
      ["object_size_greater_than", "object_size_less_than"],
    );
  }

  const conditionCount =
    (prefix === undefined ? 0 : 1) +
    tags.length +
    (greaterThan === undefined ? 0 : 1) +
    (lessThan === undefined ? 0 : 1);

  if (conditionCount > 1) {
    return {
      kind: "and",
      ...(prefix !== undefined && { prefix }),
      tags,
      ...(greaterThan !== undefined && { sizeGreaterThan: greaterThan }),
      ...(lessThan !== undefined && { sizeLessThan: lessThan }),
    };
  }

  const [tag] = tags;
  if (prefix !== undefined) return { kind: "prefix", prefix };
  if (tag) return { kind: "tag", tag };
  if (greaterThan !== undefined) return { kind: "size-greater-than", bytes: greaterThan };
  if (lessThan !== undefined) return { kind: "size-less-than", bytes: lessThan };
  return { kind: "all" };
}
