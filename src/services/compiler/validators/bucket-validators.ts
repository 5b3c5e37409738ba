/**
 * @module bucket-validators
 * Validators for bucket-level settings
 *
 * Name, tags, encryption, requester-pays and object lock.
 */

import { S3BucketNameSchema } from "../../../lib/descriptor-schemas.js";
import { KEY_BASED_SSE_ALGORITHMS, MAX_BUCKET_TAGS } from "../../../lib/s3-vocabulary.js";
import { isOneOf } from "../../../lib/type-utilities.js";
import type {
  DescriptorField,
  DescriptorFields,
  DescriptorSection,
  FieldValidator,
  ViolationReporter,
} from "../types.js";

const MAX_TAG_KEY_LENGTH = 128;
const MAX_TAG_VALUE_LENGTH = 256;
const RESERVED_TAG_PREFIX = "aws:";

/**
 * S3 naming rules, reported as warnings
 *
 * Providers other than S3 accept names outside these rules, so a
 * non-conforming name does not reject the descriptor.
 *
 * @public
 */
export class BucketNameValidator implements FieldValidator {
  readonly id = "bucket-name";
  readonly description = "Bucket name follows S3 naming rules";
  readonly section: DescriptorSection = "bucket";
  readonly fields: readonly DescriptorField[] = ["name"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    if (descriptor.name === undefined) return;

    const result = S3BucketNameSchema.safeParse(descriptor.name);
    if (result.success) return;

    for (const issue of result.error.issues) {
      sink.warn("OUT_OF_RANGE", { section: "bucket", field: ["name"] }, issue.message);
    }
  }
}

/**
 * @public
 */
export class TagsValidator implements FieldValidator {
  readonly id = "tags";
  readonly description = "Tag count, key and value lengths, reserved prefix";
  readonly section: DescriptorSection = "tags";
  readonly fields: readonly DescriptorField[] = ["tags"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const tags = descriptor.tags ?? {};
    const entries = Object.entries(tags);

    if (entries.length > MAX_BUCKET_TAGS) {
      sink.error(
        "OUT_OF_RANGE",
        { section: "tags" },
        `At most ${MAX_BUCKET_TAGS} tags are allowed, got ${entries.length}`,
      );
    }

    for (const [key, value] of entries) {
      const location = { section: "tags", field: [key] } as const;

      if (key.length === 0 || key.length > MAX_TAG_KEY_LENGTH) {
        sink.error("OUT_OF_RANGE", location, `Tag key must be 1-${MAX_TAG_KEY_LENGTH} characters`);
      }
      if (key.toLowerCase().startsWith(RESERVED_TAG_PREFIX)) {
        sink.error(
          "OUT_OF_RANGE",
          location,
          `Tag keys starting with "${RESERVED_TAG_PREFIX}" are reserved`,
        );
      }
      if (value.length > MAX_TAG_VALUE_LENGTH) {
        sink.error(
          "OUT_OF_RANGE",
          location,
          `Tag value must not exceed ${MAX_TAG_VALUE_LENGTH} characters`,
        );
      }
    }
  }
}

/**
 * A customer key id only makes sense with a key-based algorithm
 *
 * @public
 */
export class EncryptionValidator implements FieldValidator {
  readonly id = "encryption";
  readonly description = "KMS key id requires a KMS algorithm";
  readonly section: DescriptorSection = "encryption_config";
  readonly fields: readonly DescriptorField[] = ["encryption_config"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const config = descriptor.encryption_config;
    if (config?.kms_master_key_id === undefined) return;

    const algorithm = config.sse_algorithm ?? "AES256";
    if (!isOneOf(KEY_BASED_SSE_ALGORITHMS, algorithm)) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "encryption_config", field: ["sse_algorithm"] },
        `kms_master_key_id requires sse_algorithm "aws:kms" or "aws:kms:dsse", got "${algorithm}"`,
      );
    }
  }
}

/**
 * Requester-pays billing must be attributable to an owner account
 *
 * @public
 */
export class RequesterPaysValidator implements FieldValidator {
  readonly id = "requester-pays";
  readonly description = "Requester pays requires the owner account id";
  readonly section: DescriptorSection = "bucket";
  readonly fields: readonly DescriptorField[] = ["requester_pays", "bucket_owner_account_id"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    if (descriptor.requester_pays === true && !descriptor.bucket_owner_account_id) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "bucket", field: ["bucket_owner_account_id"] },
        "requester_pays requires bucket_owner_account_id so that billing can be attributed",
      );
    }
  }
}

/**
 * Object lock prerequisites and default retention completeness
 *
 * Without a token, a default retention needs both its period and its mode.
 *
 * @public
 */
export class ObjectLockValidator implements FieldValidator {
  readonly id = "object-lock";
  readonly description = "Object lock requires versioning and a complete default retention";
  readonly section: DescriptorSection = "object_lock";
  readonly fields: readonly DescriptorField[] = [
    "enables_object_lock",
    "versioning_enabled",
    "object_lock",
  ];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const lockEnabled = descriptor.enables_object_lock === true;

    if (lockEnabled && descriptor.versioning_enabled === false) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "bucket", field: ["versioning_enabled"] },
        "enables_object_lock requires versioning_enabled to be true",
      );
    }

    const settings = descriptor.object_lock;
    if (!settings) return;

    if (!lockEnabled) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "bucket", field: ["enables_object_lock"] },
        "object_lock settings require enables_object_lock to be true",
      );
    }

    const retention = settings.default_retention;
    if (settings.token !== undefined || !retention) return;

    if (retention.retention_days === undefined) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "object_lock", field: ["default_retention", "retention_days"] },
        "default_retention requires retention_days when no token is given",
      );
    }
    if (retention.retention_mode === undefined) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "object_lock", field: ["default_retention", "retention_mode"] },
        "default_retention requires retention_mode when no token is given",
      );
    }
  }
}
