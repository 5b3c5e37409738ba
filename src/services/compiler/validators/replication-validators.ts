/**
 * @module replication-validators
 * Relational checks on replication rules
 *
 * Priority uniqueness is a cross-rule concern and lives in the
 * replication compiler; these validators look at one rule at a time
 * against the rest of the descriptor.
 */

import { KEY_BASED_SSE_ALGORITHMS } from "../../../lib/s3-vocabulary.js";
import { isOneOf } from "../../../lib/type-utilities.js";
import type {
  DescriptorField,
  DescriptorFields,
  DescriptorSection,
  FieldValidator,
  ViolationReporter,
} from "../types.js";

const ACCOUNT_ID = /^\d{12}$/;

/**
 * Replication needs a versioned source bucket and at least one rule
 *
 * @public
 */
export class ReplicationPrerequisitesValidator implements FieldValidator {
  readonly id = "replication-prerequisites";
  readonly description = "Replication requires versioning and at least one rule";
  readonly section: DescriptorSection = "replication";
  readonly fields: readonly DescriptorField[] = ["replication", "versioning_enabled"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const replication = descriptor.replication;
    if (!replication) return;

    if (descriptor.versioning_enabled === false) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "bucket", field: ["versioning_enabled"] },
        "replication requires versioning_enabled to be true",
      );
    }

    if (Object.keys(replication.rules).length === 0) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "replication", field: ["rules"] },
        "replication requires at least one rule",
      );
    }
  }
}

/**
 * Ownership transfer needs the destination account
 *
 * Whether that account differs from the source cannot be decided without
 * live account context and is left to the caller.
 *
 * @public
 */
export class ReplicationOwnershipValidator implements FieldValidator {
  readonly id = "replication-ownership";
  readonly description = "Ownership transfer requires a destination account id";
  readonly section: DescriptorSection = "replication";
  readonly fields: readonly DescriptorField[] = ["replication"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    for (const [name, rule] of Object.entries(descriptor.replication?.rules ?? {})) {
      const ownership = rule.change_object_ownership_to_destination_bucket_owner;
      if (!ownership) continue;

      const accountId = ownership.destination_account_id?.trim() ?? "";
      const location = {
        section: "replication",
        rule: name,
        field: ["change_object_ownership_to_destination_bucket_owner", "destination_account_id"],
      } as const;

      if (accountId.length === 0) {
        sink.error(
          "REQUIRES_FIELD",
          location,
          "Ownership transfer requires a non-empty destination_account_id",
        );
      } else if (!ACCOUNT_ID.test(accountId)) {
        sink.error("OUT_OF_RANGE", location, "destination_account_id must be 12 digits");
      }
    }
  }
}

/**
 * Encrypted-object replication needs a destination key and a key-based
 * scheme on the source bucket
 *
 * @public
 */
export class ReplicationEncryptionValidator implements FieldValidator {
  readonly id = "replication-encryption";
  readonly description = "Encrypted-object replication requires KMS keys on both sides";
  readonly section: DescriptorSection = "replication";
  readonly fields: readonly DescriptorField[] = ["replication", "encryption_config"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const algorithm = descriptor.encryption_config?.sse_algorithm ?? "AES256";

    for (const [name, rule] of Object.entries(descriptor.replication?.rules ?? {})) {
      const encrypted = rule.replicate_encrypted_objects;
      if (!encrypted) continue;

      if (!encrypted.replica_kms_key_id?.trim()) {
        sink.error(
          "REQUIRES_FIELD",
          {
            section: "replication",
            rule: name,
            field: ["replicate_encrypted_objects", "replica_kms_key_id"],
          },
          "Encrypted-object replication requires a destination replica_kms_key_id",
        );
      }

      if (!isOneOf(KEY_BASED_SSE_ALGORITHMS, algorithm)) {
        sink.error(
          "REQUIRES_FIELD",
          { section: "replication", rule: name, field: ["replicate_encrypted_objects"] },
          `Encrypted-object replication requires encryption_config.sse_algorithm "aws:kms" or "aws:kms:dsse", got "${algorithm}"`,
        );
      }
    }
  }
}
