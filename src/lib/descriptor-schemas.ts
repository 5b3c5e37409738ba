/**
 * @module descriptor-schemas
 * Zod schemas for the raw bucket descriptor
 *
 * These schemas check shape only: presence, primitive types and simple
 * bounds. No defaults are applied here, so later stages can still tell an
 * explicit `false` from an unset field. Cross-field rules live in the
 * field validators and the per-concern compilers.
 */

import { z } from "zod";

/**
 * S3 bucket naming rules
 *
 * - 3-63 characters
 * - Lowercase letters, numbers, hyphens, and periods
 * - Must start and end with lowercase letter or number
 * - No consecutive periods, no period adjacent to hyphen
 * - Not formatted as IP address
 *
 * The descriptor only requires a non-empty name; these rules are reported
 * as warnings by the bucket-name validator.
 *
 * @public
 */
export const S3BucketNameSchema = z
  .string()
  .min(3, "Bucket name must be at least 3 characters")
  .max(63, "Bucket name must not exceed 63 characters")
  .regex(
    /^[a-z0-9][a-z0-9.-]*[a-z0-9]$/,
    "Bucket name must start and end with lowercase letter or number",
  )
  .regex(/^(?!.*\.\.)/, "Bucket name cannot contain consecutive periods")
  .regex(/^(?!.*\.-|.*-\.)/, "Bucket name cannot have period adjacent to hyphen")
  .regex(
    /^(?!\d{1,3}\.\d{1,3}\.\d{1,3}\.\d{1,3}$)/,
    "Bucket name cannot be formatted as IP address",
  );

/**
 * Twelve-digit account identifier
 *
 * @public
 */
export const AccountIdSchema = z.string().regex(/^\d{12}$/, "Account id must be 12 digits");

const DaysSchema = z.number().int().min(0);
const PositiveDaysSchema = z.number().int().min(1);
const TagMapSchema = z.record(z.string(), z.string());

/**
 * Filter narrowing a lifecycle rule to part of the bucket
 *
 * @public
 */
export const ObjectFilterSchema = z.object({
  prefix: z.string().optional(),
  tags: TagMapSchema.optional(),
  object_size_greater_than: z.number().int().min(0).optional(),
  object_size_less_than: z.number().int().min(1).optional(),
});

/**
 * Prefix/tag filter used by replication and intelligent tiering
 *
 * @public
 */
export const PrefixTagFilterSchema = z.object({
  prefix: z.string().optional(),
  tags: TagMapSchema.optional(),
});

export const ObjectLockSchema = z.object({
  token: z.string().min(1).optional(),
  default_retention: z
    .object({
      retention_days: PositiveDaysSchema.optional(),
      retention_mode: z.enum(["GOVERNANCE", "COMPLIANCE"]).optional(),
    })
    .optional(),
});

export const EncryptionConfigSchema = z.object({
  sse_algorithm: z.enum(["AES256", "aws:kms", "aws:kms:dsse"]).optional(),
  kms_master_key_id: z.string().min(1).optional(),
  bucket_key_enabled: z.boolean().optional(),
});

export const PublicAccessBlockSchema = z.object({
  block_public_acls: z.boolean().optional(),
  block_public_policy: z.boolean().optional(),
  ignore_public_acls: z.boolean().optional(),
  restrict_public_buckets: z.boolean().optional(),
});

export const ObjectOwnershipSchema = z.enum([
  "BucketOwnerEnforced",
  "BucketOwnerPreferred",
  "ObjectWriter",
]);

export const CorsRuleSchema = z.object({
  id: z.string().min(1).max(255).optional(),
  allowed_methods: z.array(z.string()),
  allowed_origins: z.array(z.string()),
  allowed_headers: z.array(z.string()).optional(),
  expose_headers: z.array(z.string()).optional(),
  max_age_seconds: z.number().int().min(0).optional(),
});

const ProtocolSchema = z.enum(["http", "https"]);

export const RoutingRuleSchema = z.object({
  condition: z
    .object({
      key_prefix_equals: z.string().optional(),
      http_error_code_returned_equals: z.string().regex(/^\d{3}$/).optional(),
    })
    .optional(),
  redirect: z.object({
    host_name: z.string().min(1).optional(),
    protocol: ProtocolSchema.optional(),
    replace_key_prefix_with: z.string().optional(),
    replace_key_with: z.string().optional(),
    http_redirect_code: z.string().regex(/^3\d{2}$/).optional(),
  }),
});

/**
 * Website hosting; the two modes arrive as independent optional fields
 *
 * @public
 */
export const WebsiteSchema = z.object({
  redirect_requests_for_an_object: z
    .object({
      host_name: z.string().min(1),
      protocol: ProtocolSchema.optional(),
    })
    .optional(),
  static_website: z
    .object({
      index_document: z.string().min(1).optional(),
      error_document: z.string().min(1).optional(),
      routing_rules: z.array(RoutingRuleSchema).optional(),
    })
    .optional(),
});

export const EventSubscriptionSchema = z.object({
  events: z.array(z.string()),
  filter_prefix: z.string().optional(),
  filter_suffix: z.string().optional(),
});

const StorageClassNameSchema = z.string().min(1);

export const LifecycleRuleSchema = z.object({
  enabled: z.boolean().optional(),
  filter: ObjectFilterSchema.optional(),
  transitions: z
    .array(z.object({ days: DaysSchema, storage_class: StorageClassNameSchema }))
    .optional(),
  expiration: z
    .object({
      days_after_object_creation: PositiveDaysSchema.optional(),
      clean_up_expired_object_delete_markers: z.boolean().optional(),
    })
    .optional(),
  noncurrent_version_expiration: z
    .object({
      days_after_becoming_noncurrent: PositiveDaysSchema,
      newer_noncurrent_versions: z.number().int().min(1).max(100).optional(),
    })
    .optional(),
  noncurrent_version_transitions: z
    .array(
      z.object({
        days_after_becoming_noncurrent: DaysSchema,
        newer_noncurrent_versions: z.number().int().min(1).max(100).optional(),
        storage_class: StorageClassNameSchema,
      }),
    )
    .optional(),
  abort_incomplete_multipart_upload_days: PositiveDaysSchema.optional(),
});

export const ReplicationRuleSchema = z.object({
  enabled: z.boolean().optional(),
  destination_bucket: z.string().min(1),
  priority: z.number().int().min(0),
  filter: PrefixTagFilterSchema.optional(),
  storage_class: StorageClassNameSchema.optional(),
  replicate_encrypted_objects: z
    .object({
      replica_kms_key_id: z.string().optional(),
    })
    .optional(),
  change_object_ownership_to_destination_bucket_owner: z
    .object({
      destination_account_id: z.string().optional(),
    })
    .optional(),
  features: z
    .object({
      metrics: z.boolean().optional(),
      replication_time_control: z.boolean().optional(),
      replica_modification_sync: z.boolean().optional(),
      delete_marker_replication: z.boolean().optional(),
    })
    .optional(),
});

export const ReplicationSchema = z.object({
  role_arn: z.string().min(1),
  rules: z.record(z.string(), ReplicationRuleSchema),
});

export const InventoryRuleSchema = z.object({
  enabled: z.boolean().optional(),
  filter: z.object({ prefix: z.string().optional() }).optional(),
  destination: z.object({
    bucket: z.string().min(1),
    account_id: AccountIdSchema.optional(),
    prefix: z.string().optional(),
    encryption: z
      .discriminatedUnion("type", [
        z.object({ type: z.literal("SSE-S3") }),
        z.object({ type: z.literal("SSE-KMS"), key_id: z.string().min(1) }),
      ])
      .optional(),
  }),
  frequency: z.enum(["Daily", "Weekly"]).optional(),
  output_format: z.enum(["CSV", "ORC", "Parquet"]).optional(),
  include_noncurrent_objects: z.boolean().optional(),
  optional_fields: z.array(z.string()).optional(),
});

export const TieringRuleSchema = z.object({
  enabled: z.boolean().optional(),
  filter: PrefixTagFilterSchema.optional(),
  tierings: z.array(z.object({ access_tier: z.string().min(1), days: PositiveDaysSchema })),
});

/**
 * Root bucket descriptor
 *
 * @public
 */
export const BucketDescriptorSchema = z.object({
  name: z.string().min(1, "Bucket name is required"),
  bucket_owner_account_id: AccountIdSchema.optional(),
  tags: TagMapSchema.optional(),
  versioning_enabled: z.boolean().optional(),
  enables_object_lock: z.boolean().optional(),
  object_lock: ObjectLockSchema.optional(),
  encryption_config: EncryptionConfigSchema.optional(),
  public_access_block: PublicAccessBlockSchema.optional(),
  object_ownership: ObjectOwnershipSchema.optional(),
  requester_pays: z.boolean().optional(),
  transfer_acceleration: z.boolean().optional(),
  policy: z.string().optional(),
  cors_rules: z.array(CorsRuleSchema).optional(),
  website: WebsiteSchema.optional(),
  notifications: z.record(z.string(), z.array(EventSubscriptionSchema)).optional(),
  lifecycle_rules: z.record(z.string(), LifecycleRuleSchema).optional(),
  replication: ReplicationSchema.optional(),
  inventory_rules: z.record(z.string(), InventoryRuleSchema).optional(),
  intelligent_tiering_rules: z.record(z.string(), TieringRuleSchema).optional(),
});

export type BucketDescriptor = z.infer<typeof BucketDescriptorSchema>;
export type ObjectFilter = z.infer<typeof ObjectFilterSchema>;
export type ObjectLockSettings = z.infer<typeof ObjectLockSchema>;
export type EncryptionConfig = z.infer<typeof EncryptionConfigSchema>;
export type SseAlgorithm = NonNullable<EncryptionConfig["sse_algorithm"]>;
export type PublicAccessBlock = z.infer<typeof PublicAccessBlockSchema>;
export type ObjectOwnership = z.infer<typeof ObjectOwnershipSchema>;
export type CorsRule = z.infer<typeof CorsRuleSchema>;
export type WebsiteSettings = z.infer<typeof WebsiteSchema>;
export type EventSubscription = z.infer<typeof EventSubscriptionSchema>;
export type LifecycleRule = z.infer<typeof LifecycleRuleSchema>;
export type ReplicationRule = z.infer<typeof ReplicationRuleSchema>;
export type InventoryRule = z.infer<typeof InventoryRuleSchema>;
export type TieringRule = z.infer<typeof TieringRuleSchema>;
