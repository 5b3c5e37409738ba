/**
 * @module defaults
 * Defaulting resolver
 *
 * Fills unset optional fields with their documented defaults and derives
 * values implied by other fields. Explicit values are never overridden.
 * Runs after validation so validators still see what the caller omitted.
 */

import type {
  BucketDescriptor,
  CorsRule,
  EventSubscription,
  InventoryRule,
  LifecycleRule,
  ObjectLockSettings,
  ObjectOwnership,
  ReplicationRule,
  SseAlgorithm,
  TieringRule,
  WebsiteSettings,
} from "../../lib/descriptor-schemas.js";

/**
 * Documented defaults
 *
 * @public
 */
export const DESCRIPTOR_DEFAULTS = {
  objectOwnership: "BucketOwnerEnforced",
  sseAlgorithm: "AES256",
  bucketKeyEnabled: false,
  publicAccessBlockFlag: false,
  featureFlag: false,
  ruleEnabled: true,
  inventoryOutputFormat: "CSV",
  inventoryFrequency: "Weekly",
  inventoryIncludeNoncurrentObjects: true,
} as const satisfies {
  objectOwnership: ObjectOwnership;
  sseAlgorithm: SseAlgorithm;
  bucketKeyEnabled: boolean;
  publicAccessBlockFlag: boolean;
  featureFlag: boolean;
  ruleEnabled: boolean;
  inventoryOutputFormat: NonNullable<InventoryRule["output_format"]>;
  inventoryFrequency: NonNullable<InventoryRule["frequency"]>;
  inventoryIncludeNoncurrentObjects: boolean;
};

export type ResolvedLifecycleRule = Omit<
  LifecycleRule,
  "enabled" | "transitions" | "noncurrent_version_transitions"
> & {
  readonly enabled: boolean;
  readonly transitions: NonNullable<LifecycleRule["transitions"]>;
  readonly noncurrent_version_transitions: NonNullable<
    LifecycleRule["noncurrent_version_transitions"]
  >;
};

export interface ReplicationFeatureFlags {
  readonly metrics: boolean;
  readonly replication_time_control: boolean;
  readonly replica_modification_sync: boolean;
  readonly delete_marker_replication: boolean;
}

export type ResolvedReplicationRule = Omit<ReplicationRule, "enabled" | "features"> & {
  readonly enabled: boolean;
  readonly features: ReplicationFeatureFlags;
};

export type ResolvedInventoryRule = Omit<
  InventoryRule,
  "enabled" | "frequency" | "output_format" | "include_noncurrent_objects" | "optional_fields"
> & {
  readonly enabled: boolean;
  readonly frequency: NonNullable<InventoryRule["frequency"]>;
  readonly output_format: NonNullable<InventoryRule["output_format"]>;
  readonly include_noncurrent_objects: boolean;
  readonly optional_fields: readonly string[];
};

export type ResolvedTieringRule = Omit<TieringRule, "enabled"> & { readonly enabled: boolean };

/**
 * Descriptor with every default applied
 *
 * @public
 */
export interface ResolvedDescriptor {
  readonly name: string;
  readonly bucket_owner_account_id?: string;
  readonly tags: Readonly<Record<string, string>>;
  readonly versioning_enabled: boolean;
  readonly enables_object_lock: boolean;
  readonly object_lock?: ObjectLockSettings;
  readonly encryption_config: {
    readonly sse_algorithm: SseAlgorithm;
    readonly kms_master_key_id?: string;
    readonly bucket_key_enabled: boolean;
  };
  readonly public_access_block: {
    readonly block_public_acls: boolean;
    readonly block_public_policy: boolean;
    readonly ignore_public_acls: boolean;
    readonly restrict_public_buckets: boolean;
  };
  readonly object_ownership: ObjectOwnership;
  readonly requester_pays: boolean;
  readonly transfer_acceleration: boolean;
  readonly policy?: string;
  readonly cors_rules: readonly CorsRule[];
  readonly website?: WebsiteSettings;
  readonly notifications: Readonly<Record<string, readonly EventSubscription[]>>;
  readonly lifecycle_rules: Readonly<Record<string, ResolvedLifecycleRule>>;
  readonly replication?: {
    readonly role_arn: string;
    readonly rules: Readonly<Record<string, ResolvedReplicationRule>>;
  };
  readonly inventory_rules: Readonly<Record<string, ResolvedInventoryRule>>;
  readonly intelligent_tiering_rules: Readonly<Record<string, ResolvedTieringRule>>;
}

/**
 * Map the values of a record, keeping key order
 */
function mapRecord<Input, Output>(
  record: Readonly<Record<string, Input>> | undefined,
  transform: (value: Input) => Output,
): Record<string, Output> {
  return Object.fromEntries(
    Object.entries(record ?? {}).map(([key, value]) => [key, transform(value)]),
  );
}

function resolveReplicationRule(rule: ReplicationRule): ResolvedReplicationRule {
  const { enabled, features, ...rest } = rule;
  const replicationTimeControl =
    features?.replication_time_control ?? DESCRIPTOR_DEFAULTS.featureFlag;

  return {
    ...rest,
    enabled: enabled ?? DESCRIPTOR_DEFAULTS.ruleEnabled,
    features: {
      // Replication time control reports through replication metrics
      metrics: features?.metrics ?? (replicationTimeControl || DESCRIPTOR_DEFAULTS.featureFlag),
      replication_time_control: replicationTimeControl,
      replica_modification_sync:
        features?.replica_modification_sync ?? DESCRIPTOR_DEFAULTS.featureFlag,
      delete_marker_replication:
        features?.delete_marker_replication ?? DESCRIPTOR_DEFAULTS.featureFlag,
    },
  };
}

function resolveInventoryRule(rule: InventoryRule): ResolvedInventoryRule {
  const {
    enabled,
    frequency,
    output_format,
    include_noncurrent_objects,
    optional_fields,
    ...rest
  } = rule;

  return {
    ...rest,
    enabled: enabled ?? DESCRIPTOR_DEFAULTS.ruleEnabled,
    frequency: frequency ?? DESCRIPTOR_DEFAULTS.inventoryFrequency,
    output_format: output_format ?? DESCRIPTOR_DEFAULTS.inventoryOutputFormat,
    include_noncurrent_objects:
      include_noncurrent_objects ?? DESCRIPTOR_DEFAULTS.inventoryIncludeNoncurrentObjects,
    optional_fields: optional_fields ?? [],
  };
}

/**
 * Apply defaults and implied values to a validated descriptor
 *
 * Versioning, when unset, is considered enabled if object lock or
 * replication is configured, since both depend on it. An explicit
 * `false` is left alone (and has already been reported by validation).
 *
 * @param descriptor - Parsed, validated descriptor
 * @returns A new, fully-defaulted descriptor; the input is not modified
 *
 * @public
 */
export function resolveDefaults(descriptor: BucketDescriptor): ResolvedDescriptor {
  const objectLockEnabled = descriptor.enables_object_lock ?? false;
  const impliedVersioning = objectLockEnabled || descriptor.replication !== undefined;
  const encryption = descriptor.encryption_config;
  const publicAccess = descriptor.public_access_block;

  return {
    name: descriptor.name,
    ...(descriptor.bucket_owner_account_id !== undefined && {
      bucket_owner_account_id: descriptor.bucket_owner_account_id,
    }),
    tags: { ...descriptor.tags },
    versioning_enabled: descriptor.versioning_enabled ?? impliedVersioning,
    enables_object_lock: objectLockEnabled,
    ...(descriptor.object_lock !== undefined && { object_lock: descriptor.object_lock }),
    encryption_config: {
      sse_algorithm: encryption?.sse_algorithm ?? DESCRIPTOR_DEFAULTS.sseAlgorithm,
      ...(encryption?.kms_master_key_id !== undefined && {
        kms_master_key_id: encryption.kms_master_key_id,
      }),
      bucket_key_enabled: encryption?.bucket_key_enabled ?? DESCRIPTOR_DEFAULTS.bucketKeyEnabled,
    },
    public_access_block: {
      block_public_acls:
        publicAccess?.block_public_acls ?? DESCRIPTOR_DEFAULTS.publicAccessBlockFlag,
      block_public_policy:
        publicAccess?.block_public_policy ?? DESCRIPTOR_DEFAULTS.publicAccessBlockFlag,
      ignore_public_acls:
        publicAccess?.ignore_public_acls ?? DESCRIPTOR_DEFAULTS.publicAccessBlockFlag,
      restrict_public_buckets:
        publicAccess?.restrict_public_buckets ?? DESCRIPTOR_DEFAULTS.publicAccessBlockFlag,
    },
    object_ownership: descriptor.object_ownership ?? DESCRIPTOR_DEFAULTS.objectOwnership,
    requester_pays: descriptor.requester_pays ?? DESCRIPTOR_DEFAULTS.featureFlag,
    transfer_acceleration: descriptor.transfer_acceleration ?? DESCRIPTOR_DEFAULTS.featureFlag,
    ...(descriptor.policy !== undefined && { policy: descriptor.policy }),
    cors_rules: descriptor.cors_rules ?? [],
    ...(descriptor.website !== undefined && { website: descriptor.website }),
    notifications: mapRecord(descriptor.notifications, (subscriptions) => subscriptions),
    lifecycle_rules: mapRecord(descriptor.lifecycle_rules, (rule) => ({
      ...rule,
      enabled: rule.enabled ?? DESCRIPTOR_DEFAULTS.ruleEnabled,
      transitions: rule.transitions ?? [],
      noncurrent_version_transitions: rule.noncurrent_version_transitions ?? [],
    })),
    ...(descriptor.replication !== undefined && {
      replication: {
        role_arn: descriptor.replication.role_arn,
        rules: mapRecord(descriptor.replication.rules, resolveReplicationRule),
      },
    }),
    inventory_rules: mapRecord(descriptor.inventory_rules, resolveInventoryRule),
    intelligent_tiering_rules: mapRecord(descriptor.intelligent_tiering_rules, (rule) => ({
      ...rule,
      enabled: rule.enabled ?? DESCRIPTOR_DEFAULTS.ruleEnabled,
    })),
  };
}
