/**
 * Unit tests for replication validators
 */

import { describe, expect, it } from "vitest";
import type {
  BucketDescriptor,
  ReplicationRule,
} from "../../../../../src/lib/descriptor-schemas.js";
import {
  ReplicationEncryptionValidator,
  ReplicationOwnershipValidator,
  ReplicationPrerequisitesValidator,
} from "../../../../../src/services/compiler/validators/replication-validators.js";
import { runValidator, summarize } from "./validator-test-helpers.js";

const ROLE_ARN = "arn:aws:iam::123456789012:role/replication";

function withRules(
  rules: Record<string, ReplicationRule>,
  overrides: Partial<BucketDescriptor> = {},
): BucketDescriptor {
  return { name: "logs", replication: { role_arn: ROLE_ARN, rules }, ...overrides };
}

const baseRule: ReplicationRule = { destination_bucket: "dr-logs", priority: 1 };

describe("Replication Validators", () => {
  describe("ReplicationPrerequisitesValidator", () => {
    const validator = new ReplicationPrerequisitesValidator();

    it("should reject replication with versioning explicitly off", () => {
      expect(
        summarize(
          runValidator(validator, withRules({ a: baseRule }, { versioning_enabled: false })),
        ),
      ).toEqual([["versioning_enabled", "REQUIRES_FIELD", "error"]]);
    });

    it("should require at least one rule", () => {
      expect(summarize(runValidator(validator, withRules({})))).toEqual([
        ["replication.rules", "REQUIRES_FIELD", "error"],
      ]);
    });

    it("should ignore descriptors without replication", () => {
      expect(runValidator(validator, { name: "logs", versioning_enabled: false })).toEqual([]);
    });
  });

  describe("ReplicationOwnershipValidator", () => {
    const validator = new ReplicationOwnershipValidator();
    const field =
      "replication.rules.a.change_object_ownership_to_destination_bucket_owner.destination_account_id";

    it("should require a non-empty account id", () => {
      const violations = runValidator(
        validator,
        withRules({
          a: {
            ...baseRule,
            change_object_ownership_to_destination_bucket_owner: { destination_account_id: "   " },
          },
        }),
      );

      expect(summarize(violations)).toEqual([[field, "REQUIRES_FIELD", "error"]]);
      expect(violations[0]?.rule).toBe("a");
    });

    it("should require twelve digits", () => {
      expect(
        summarize(
          runValidator(
            validator,
            withRules({
              a: {
                ...baseRule,
                change_object_ownership_to_destination_bucket_owner: {
                  destination_account_id: "12345",
                },
              },
            }),
          ),
        ),
      ).toEqual([[field, "OUT_OF_RANGE", "error"]]);
    });

    it("should accept a padded valid account id", () => {
      expect(
        runValidator(
          validator,
          withRules({
            a: {
              ...baseRule,
              change_object_ownership_to_destination_bucket_owner: {
                destination_account_id: " 210987654321 ",
              },
            },
          }),
        ),
      ).toEqual([]);
    });
  });

  describe("ReplicationEncryptionValidator", () => {
    const validator = new ReplicationEncryptionValidator();

    it("should require a replica key and a KMS source algorithm", () => {
      const violations = runValidator(
        validator,
        withRules({ a: { ...baseRule, replicate_encrypted_objects: {} } }),
      );

      expect(violations.map((entry) => [entry.path, entry.message])).toEqual([
        [
          "replication.rules.a.replicate_encrypted_objects",
          'Encrypted-object replication requires encryption_config.sse_algorithm "aws:kms" or "aws:kms:dsse", got "AES256"',
        ],
        [
          "replication.rules.a.replicate_encrypted_objects.replica_kms_key_id",
          "Encrypted-object replication requires a destination replica_kms_key_id",
        ],
      ]);
    });

    it("should accept a complete encrypted rule", () => {
      expect(
        runValidator(
          validator,
          withRules(
            { a: { ...baseRule, replicate_encrypted_objects: { replica_kms_key_id: "alias/dr" } } },
            { encryption_config: { sse_algorithm: "aws:kms" } },
          ),
        ),
      ).toEqual([]);
    });
  });
});
