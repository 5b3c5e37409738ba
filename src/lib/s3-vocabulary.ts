/**
 * @module s3-vocabulary
 * Enumerated values accepted by the storage control plane
 *
 * Descriptor fields that name one of these values are parsed as plain
 * strings and checked against these lists by the compilers, so that an
 * unknown value surfaces as an INVALID_ENUM_VALUE violation at the rule
 * that uses it.
 */

/**
 * Storage classes a lifecycle rule may transition objects to
 *
 * @public
 */
export const LIFECYCLE_TRANSITION_STORAGE_CLASSES = [
  "STANDARD_IA",
  "ONEZONE_IA",
  "INTELLIGENT_TIERING",
  "GLACIER_IR",
  "GLACIER",
  "DEEP_ARCHIVE",
] as const;

export type LifecycleTransitionStorageClass = (typeof LIFECYCLE_TRANSITION_STORAGE_CLASSES)[number];

/**
 * Infrequent-access classes that need objects at least 30 days old
 *
 * @public
 */
export const MINIMUM_AGE_STORAGE_CLASSES: readonly LifecycleTransitionStorageClass[] = [
  "STANDARD_IA",
  "ONEZONE_IA",
];

export const MINIMUM_INFREQUENT_ACCESS_DAYS = 30;

/**
 * Storage classes a replication rule may write replicas as
 *
 * @public
 */
export const REPLICATION_STORAGE_CLASSES = [
  "STANDARD",
  "REDUCED_REDUNDANCY",
  "STANDARD_IA",
  "ONEZONE_IA",
  "INTELLIGENT_TIERING",
  "GLACIER_IR",
  "GLACIER",
  "DEEP_ARCHIVE",
] as const;

export type ReplicationStorageClass = (typeof REPLICATION_STORAGE_CLASSES)[number];

/**
 * Event types a notification subscription may name
 *
 * Grouped by family: object created, removed, restore, replication,
 * lifecycle, tagging/ACL and intelligent tiering.
 *
 * @public
 */
export const NOTIFICATION_EVENTS = [
  "s3:ObjectCreated:*",
  "s3:ObjectCreated:Put",
  "s3:ObjectCreated:Post",
  "s3:ObjectCreated:Copy",
  "s3:ObjectCreated:CompleteMultipartUpload",
  "s3:ObjectRemoved:*",
  "s3:ObjectRemoved:Delete",
  "s3:ObjectRemoved:DeleteMarkerCreated",
  "s3:ObjectRestore:*",
  "s3:ObjectRestore:Post",
  "s3:ObjectRestore:Completed",
  "s3:ObjectRestore:Delete",
  "s3:ReducedRedundancyLostObject",
  "s3:Replication:*",
  "s3:Replication:OperationFailedReplication",
  "s3:Replication:OperationMissedThreshold",
  "s3:Replication:OperationReplicatedAfterThreshold",
  "s3:Replication:OperationNotTracked",
  "s3:LifecycleTransition",
  "s3:LifecycleExpiration:*",
  "s3:LifecycleExpiration:Delete",
  "s3:LifecycleExpiration:DeleteMarkerCreated",
  "s3:IntelligentTiering",
  "s3:ObjectTagging:*",
  "s3:ObjectTagging:Put",
  "s3:ObjectTagging:Delete",
  "s3:ObjectAcl:Put",
] as const;

export type NotificationEvent = (typeof NOTIFICATION_EVENTS)[number];

/**
 * Longest object key the service accepts, in bytes
 */
export const MAX_OBJECT_KEY_BYTES = 1024;

/**
 * Optional fields an inventory report may include
 *
 * @public
 */
export const INVENTORY_OPTIONAL_FIELDS = [
  "Size",
  "LastModifiedDate",
  "StorageClass",
  "ETag",
  "IsMultipartUploaded",
  "ReplicationStatus",
  "EncryptionStatus",
  "ObjectLockRetainUntilDate",
  "ObjectLockMode",
  "ObjectLockLegalHoldStatus",
  "IntelligentTieringAccessTier",
  "BucketKeyStatus",
  "ChecksumAlgorithm",
  "ObjectAccessControlList",
  "ObjectOwner",
] as const;

export type InventoryOptionalField = (typeof INVENTORY_OPTIONAL_FIELDS)[number];

/**
 * Intelligent-tiering archive tiers with their allowed day ranges
 *
 * @public
 */
export const ACCESS_TIER_DAY_RANGES = {
  ARCHIVE_ACCESS: { min: 90, max: 730 },
  DEEP_ARCHIVE_ACCESS: { min: 180, max: 730 },
} as const;

export type AccessTier = keyof typeof ACCESS_TIER_DAY_RANGES;

export const ACCESS_TIERS: readonly AccessTier[] = ["ARCHIVE_ACCESS", "DEEP_ARCHIVE_ACCESS"];

/**
 * HTTP methods a CORS rule may allow
 *
 * @public
 */
export const CORS_METHODS = ["GET", "PUT", "POST", "DELETE", "HEAD"] as const;

export type CorsMethod = (typeof CORS_METHODS)[number];

export const MAX_CORS_RULES = 100;

export const MAX_BUCKET_TAGS = 50;

/**
 * Server-side encryption algorithms that use a managed key
 */
export const KEY_BASED_SSE_ALGORITHMS = ["aws:kms", "aws:kms:dsse"] as const;
