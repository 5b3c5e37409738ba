/**
 * @module inventory-compiler
 * Inventory report compilation
 */

import { INVENTORY_OPTIONAL_FIELDS, type InventoryOptionalField } from "../../lib/s3-vocabulary.js";
import { isOneOf } from "../../lib/type-utilities.js";
import type { ResolvedInventoryRule } from "./defaults.js";
import { toBucketArn } from "./replication-compiler.js";
import type { CompiledInventoryRule, ViolationReporter } from "./types.js";

/**
 * Compile one inventory rule
 *
 * Optional fields are checked against the report vocabulary and
 * de-duplicated in input order.
 *
 * @public
 */
export function compileInventoryRule(
  name: string,
  rule: ResolvedInventoryRule,
  reporter: ViolationReporter,
): CompiledInventoryRule {
  const optionalFields: InventoryOptionalField[] = [];

  for (const [index, field] of rule.optional_fields.entries()) {
    if (!isOneOf(INVENTORY_OPTIONAL_FIELDS, field)) {
      reporter.error(
        "INVALID_ENUM_VALUE",
        { section: "inventory_rules", rule: name, field: ["optional_fields", index] },
        `Unknown inventory field "${field}"`,
      );
      continue;
    }
    if (!optionalFields.includes(field)) {
      optionalFields.push(field);
    }
  }

  const { destination } = rule;
  const prefix = rule.filter?.prefix;

  return {
    id: name,
    enabled: rule.enabled,
    ...(prefix !== undefined && { prefix }),
    destination: {
      bucketArn: toBucketArn(destination.bucket),
      ...(destination.account_id !== undefined && { accountId: destination.account_id }),
      ...(destination.prefix !== undefined && { prefix: destination.prefix }),
      format: rule.output_format,
      ...(destination.encryption && {
        encryption:
          destination.encryption.type === "SSE-KMS"
            ? { type: destination.encryption.type, keyId: destination.encryption.key_id }
            : { type: destination.encryption.type },
      }),
    },
    frequency: rule.frequency,
    includedObjectVersions: rule.include_noncurrent_objects ? "All" : "Current",
    optionalFields,
  };
}

/**
 * Compile every inventory rule, keyed by rule name in input order
 *
 * @public
 */
export function compileInventoryRules(
  rules: Readonly<Record<string, ResolvedInventoryRule>>,
  reporter: ViolationReporter,
): Record<string, CompiledInventoryRule> {
  return Object.fromEntries(
    Object.entries(rules).map(([name, rule]) => [name, compileInventoryRule(name, rule, reporter)]),
  );
}
