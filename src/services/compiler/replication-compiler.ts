/**
 * @module replication-compiler
 * Replication rule compilation
 *
 * Checks priority uniqueness across the rule map, normalizes destinations
 * to bucket ARNs and emits rules in priority order, highest first.
 */

import {
  REPLICATION_STORAGE_CLASSES,
  type ReplicationStorageClass,
} from "../../lib/s3-vocabulary.js";
import { compareText, isOneOf } from "../../lib/type-utilities.js";
import type { ResolvedDescriptor, ResolvedReplicationRule } from "./defaults.js";
import { compileFilter } from "./filters.js";
import type {
  CompiledReplication,
  CompiledReplicationRule,
  ViolationLocation,
  ViolationReporter,
} from "./types.js";

/**
 * Bucket name or ARN to ARN
 *
 * @example
 * ```typescript
 * toBucketArn("logs-replica"); // "arn:aws:s3:::logs-replica"
 * toBucketArn("arn:aws-cn:s3:::logs-replica"); // unchanged
 * ```
 *
 * @public
 */
export function toBucketArn(bucket: string): string {
  return bucket.startsWith("arn:") ? bucket : `arn:aws:s3:::${bucket}`;
}

function reportDuplicatePriorities(
  rules: Readonly<Record<string, ResolvedReplicationRule>>,
  reporter: ViolationReporter,
): void {
  const namesByPriority = new Map<number, string[]>();

  for (const [name, rule] of Object.entries(rules)) {
    namesByPriority.set(rule.priority, [...(namesByPriority.get(rule.priority) ?? []), name]);
  }

  for (const [priority, names] of namesByPriority) {
    const [first] = names;
    if (first === undefined || names.length < 2) continue;

    reporter.error(
      "DUPLICATE_KEY",
      { section: "replication", rule: first, field: ["priority"] },
      `Priority ${priority} is used by rules ${names.map((name) => `"${name}"`).join(", ")}`,
      names,
    );
  }
}

function compileStorageClass(
  rule: ResolvedReplicationRule,
  location: ViolationLocation,
  reporter: ViolationReporter,
): ReplicationStorageClass | undefined {
  const storageClass = rule.storage_class;
  if (storageClass === undefined) return undefined;
  if (isOneOf(REPLICATION_STORAGE_CLASSES, storageClass)) return storageClass;

  reporter.error(
    "INVALID_ENUM_VALUE",
    { ...location, field: ["storage_class"] },
    `Storage class "${storageClass}" cannot be used for replicas; expected one of ${REPLICATION_STORAGE_CLASSES.join(", ")}`,
  );
  return undefined;
}

/**
 * Compile one replication rule
 *
 * Ownership transfer makes the rule cross-account: replicas change owner,
 * and the destination bucket must grant the replication role access. That
 * grant lives in the destination's policy and is only flagged here.
 *
 * @public
 */
export function compileReplicationRule(
  name: string,
  rule: ResolvedReplicationRule,
  reporter: ViolationReporter,
): CompiledReplicationRule {
  const location: ViolationLocation = { section: "replication", rule: name };
  const storageClass = compileStorageClass(rule, location, reporter);
  const ownership = rule.change_object_ownership_to_destination_bucket_owner;
  const account = ownership?.destination_account_id?.trim();
  const replicaKmsKeyId = rule.replicate_encrypted_objects?.replica_kms_key_id?.trim();
  const crossAccount = ownership !== undefined;

  return {
    id: name,
    priority: rule.priority,
    status: rule.enabled ? "Enabled" : "Disabled",
    filter: compileFilter(rule.filter, location, reporter),
    destination: {
      bucketArn: toBucketArn(rule.destination_bucket),
      ...(storageClass && { storageClass }),
      ...(account && { account }),
      ...(crossAccount && { ownerOverride: "Destination" as const }),
      ...(replicaKmsKeyId && { replicaKmsKeyId }),
    },
    replicateEncryptedObjects: rule.replicate_encrypted_objects !== undefined,
    metrics: rule.features.metrics,
    replicationTimeControl: rule.features.replication_time_control,
    replicaModificationSync: rule.features.replica_modification_sync,
    deleteMarkerReplication: rule.features.delete_marker_replication,
    accountScope: crossAccount ? "cross-account" : "same-account",
    requiresDestinationGrant: crossAccount,
  };
}

/**
 * Compile the replication configuration
 *
 * @returns Rules ordered by priority descending (ties by name), or
 * undefined when the descriptor configures no replication
 *
 * @public
 */
export function compileReplication(
  replication: ResolvedDescriptor["replication"],
  reporter: ViolationReporter,
): CompiledReplication | undefined {
  if (!replication) return undefined;

  reportDuplicatePriorities(replication.rules, reporter);

  const rules = Object.entries(replication.rules)
    .map(([name, rule]) => compileReplicationRule(name, rule, reporter))
    .sort((left, right) => right.priority - left.priority || compareText(left.id, right.id));

  return { roleArn: replication.role_arn, rules };
}
