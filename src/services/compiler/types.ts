/**
 * @module types
 * Type definitions for the bucket compiler
 *
 * Violations, pipeline states, the validator contract and the compiled
 * configuration bundle. Everything the compiler returns is described here.
 *
 */

import type {
  BucketDescriptor,
  ObjectOwnership,
  SseAlgorithm,
} from "../../lib/descriptor-schemas.js";
import type {
  AccessTier,
  CorsMethod,
  InventoryOptionalField,
  LifecycleTransitionStorageClass,
  NotificationEvent,
  ReplicationStorageClass,
} from "../../lib/s3-vocabulary.js";

/**
 * Closed set of violation codes
 *
 * @public
 */
export type ViolationCode =
  | "MUTUALLY_EXCLUSIVE"
  | "REQUIRES_FIELD"
  | "DUPLICATE_KEY"
  | "OUT_OF_RANGE"
  | "INVALID_ENUM_VALUE"
  | "NON_MONOTONIC_SEQUENCE";

/**
 * Only errors reject a descriptor; warnings ride along with the bundle
 *
 * @public
 */
export type ViolationSeverity = "error" | "warning";

/**
 * Where in the pipeline a violation was detected
 *
 * - structural: missing field or wrong shape
 * - relational: cross-field or cross-rule constraint
 * - compilation: a compiler could not produce a consistent action list
 *
 * @public
 */
export type ViolationCategory = "structural" | "relational" | "compilation";

/**
 * Sub-configurations, in report order
 *
 * @public
 */
export const DESCRIPTOR_SECTIONS = [
  "bucket",
  "tags",
  "object_lock",
  "encryption_config",
  "public_access_block",
  "website",
  "cors_rules",
  "lifecycle_rules",
  "replication",
  "notifications",
  "inventory_rules",
  "intelligent_tiering_rules",
] as const;

export type DescriptorSection = (typeof DESCRIPTOR_SECTIONS)[number];

/**
 * Location of a violation inside the descriptor
 *
 * @public
 */
export interface ViolationLocation {
  readonly section: DescriptorSection;

  /**
   * Map key of the rule or destination, for map-keyed sections
   */
  readonly rule?: string;

  /**
   * Field path below the rule (or below the section)
   */
  readonly field?: readonly (string | number)[];
}

/**
 * One structured compilation failure or warning
 *
 * @public
 */
export interface Violation {
  /**
   * Dot-separated path, e.g. `lifecycle_rules.rotate-logs.expiration.days_after_object_creation`
   */
  readonly path: string;
  readonly code: ViolationCode;
  readonly message: string;
  readonly severity: ViolationSeverity;
  readonly category: ViolationCategory;
  readonly section: DescriptorSection;
  readonly rule?: string;

  /**
   * Every map key a cross-entry violation involves
   */
  readonly keys?: readonly string[];
}

/**
 * Pipeline states; transitions only move forward
 *
 * @public
 */
export type CompilerState =
  | "Received"
  | "Validating"
  | "Defaulting"
  | "Compiling"
  | "Bundled"
  | "Rejected";

/**
 * Accumulator that every validator and compiler writes into
 *
 * @public
 */
export interface ViolationReporter {
  error(
    code: ViolationCode,
    location: ViolationLocation,
    message: string,
    keys?: readonly string[],
  ): void;
  warn(
    code: ViolationCode,
    location: ViolationLocation,
    message: string,
    keys?: readonly string[],
  ): void;
}

/**
 * Top-level descriptor field name
 *
 * @public
 */
export type DescriptorField = keyof BucketDescriptor;

/**
 * The descriptor fields that passed the structural parse
 *
 * A field that failed is absent, whatever the caller wrote for it.
 *
 * @public
 */
export type DescriptorFields = Partial<BucketDescriptor>;

/**
 * Destination address → kind, holding only the addresses that classify
 *
 * @public
 */
export type DestinationClassification = ReadonlyMap<string, DestinationKind>;

/**
 * Facts computed once per descriptor and shared by validators and compilers
 *
 * @public
 */
export interface ValidationContext {
  readonly destinations: DestinationClassification;
}

/**
 * Field validator contract
 *
 * Validators look at the parsed descriptor as the caller wrote it (no
 * defaults applied) and report into the sink. They never throw. A
 * validator is skipped when any of its `fields` failed the structural
 * parse.
 *
 * @public
 */
export interface FieldValidator {
  /**
   * Unique identifier, e.g. "website-mode"
   */
  readonly id: string;

  /**
   * What this validator checks
   */
  readonly description: string;

  readonly section: DescriptorSection;

  /**
   * Every top-level field the validator reads
   */
  readonly fields: readonly DescriptorField[];

  validate(
    descriptor: DescriptorFields,
    sink: ViolationReporter,
    context: ValidationContext,
  ): void;
}

/**
 * Registry of field validators in run order
 *
 * @public
 */
export interface IValidatorRegistry {
  register(validator: FieldValidator): void;
  getValidators(): readonly FieldValidator[];
  getValidatorsForSection(section: DescriptorSection): readonly FieldValidator[];
  getValidatorCount(): number;
}

// ---------------------------------------------------------------------------
// Compiled output
// ---------------------------------------------------------------------------

export interface BucketTag {
  readonly key: string;
  readonly value: string;
}

/**
 * Compiled object filter
 *
 * `and` is produced whenever more than one condition is present.
 *
 * @public
 */
export type CompiledFilter =
  | { readonly kind: "all" }
  | { readonly kind: "prefix"; readonly prefix: string }
  | { readonly kind: "tag"; readonly tag: BucketTag }
  | { readonly kind: "size-greater-than"; readonly bytes: number }
  | { readonly kind: "size-less-than"; readonly bytes: number }
  | {
      readonly kind: "and";
      readonly prefix?: string;
      readonly tags: readonly BucketTag[];
      readonly sizeGreaterThan?: number;
      readonly sizeLessThan?: number;
    };

export type RuleStatus = "Enabled" | "Disabled";

export interface CompiledTransition {
  readonly days: number;
  readonly storageClass: LifecycleTransitionStorageClass;
}

export interface CompiledNoncurrentTransition {
  readonly noncurrentDays: number;
  readonly newerNoncurrentVersions?: number;
  readonly storageClass: LifecycleTransitionStorageClass;
}

/**
 * Current-version expiration: either dated or delete-marker cleanup
 *
 * @public
 */
export type CompiledExpiration =
  | { readonly kind: "days"; readonly days: number }
  | { readonly kind: "expired-delete-markers" };

export interface CompiledLifecycleRule {
  readonly id: string;
  readonly status: RuleStatus;
  readonly filter: CompiledFilter;
  readonly transitions: readonly CompiledTransition[];
  readonly expiration?: CompiledExpiration;
  readonly noncurrentTransitions: readonly CompiledNoncurrentTransition[];
  readonly noncurrentExpiration?: {
    readonly noncurrentDays: number;
    readonly newerNoncurrentVersions?: number;
  };
  readonly abortIncompleteMultipartUploadDays?: number;
}

/**
 * same-account replicas keep the source owner; cross-account replicas are
 * handed to the destination account and need a grant on the destination
 * bucket that this compiler cannot see
 *
 * @public
 */
export type AccountScope = "same-account" | "cross-account";

export interface CompiledReplicationRule {
  readonly id: string;
  readonly priority: number;
  readonly status: RuleStatus;
  readonly filter: CompiledFilter;
  readonly destination: {
    readonly bucketArn: string;
    readonly storageClass?: ReplicationStorageClass;
    readonly account?: string;
    readonly ownerOverride?: "Destination";
    readonly replicaKmsKeyId?: string;
  };
  readonly replicateEncryptedObjects: boolean;
  readonly metrics: boolean;
  readonly replicationTimeControl: boolean;
  readonly replicaModificationSync: boolean;
  readonly deleteMarkerReplication: boolean;
  readonly accountScope: AccountScope;
  readonly requiresDestinationGrant: boolean;
}

export interface CompiledReplication {
  readonly roleArn: string;
  readonly rules: readonly CompiledReplicationRule[];
}

export type DestinationKind = "function" | "queue" | "topic";

export interface CompiledSubscription {
  readonly events: readonly NotificationEvent[];
  readonly filterPrefix?: string;
  readonly filterSuffix?: string;
}

export interface CompiledNotificationDestination {
  readonly address: string;
  readonly kind: DestinationKind;
  readonly subscriptions: readonly CompiledSubscription[];
}

export interface CompiledInventoryRule {
  readonly id: string;
  readonly enabled: boolean;
  readonly prefix?: string;
  readonly destination: {
    readonly bucketArn: string;
    readonly accountId?: string;
    readonly prefix?: string;
    readonly format: "CSV" | "ORC" | "Parquet";
    readonly encryption?:
      | { readonly type: "SSE-S3" }
      | { readonly type: "SSE-KMS"; readonly keyId: string };
  };
  readonly frequency: "Daily" | "Weekly";
  readonly includedObjectVersions: "All" | "Current";
  readonly optionalFields: readonly InventoryOptionalField[];
}

export interface CompiledTiering {
  readonly accessTier: AccessTier;
  readonly days: number;
}

export interface CompiledTieringRule {
  readonly id: string;
  readonly status: RuleStatus;
  readonly filter: CompiledFilter;
  readonly tierings: readonly CompiledTiering[];
}

export interface CompiledCorsRule {
  readonly id?: string;
  readonly allowedMethods: readonly CorsMethod[];
  readonly allowedOrigins: readonly string[];
  readonly allowedHeaders: readonly string[];
  readonly exposeHeaders: readonly string[];
  readonly maxAgeSeconds?: number;
}

export interface CompiledRoutingRule {
  readonly condition?: {
    readonly keyPrefixEquals?: string;
    readonly httpErrorCodeReturnedEquals?: string;
  };
  readonly redirect: {
    readonly hostName?: string;
    readonly protocol?: "http" | "https";
    readonly replaceKeyPrefixWith?: string;
    readonly replaceKeyWith?: string;
    readonly httpRedirectCode?: string;
  };
}

/**
 * Website hosting, exactly one mode
 *
 * @public
 */
export type CompiledWebsite =
  | {
      readonly kind: "redirect";
      readonly hostName: string;
      readonly protocol?: "http" | "https";
    }
  | {
      readonly kind: "static";
      readonly indexDocument: string;
      readonly errorDocument?: string;
      readonly routingRules: readonly CompiledRoutingRule[];
    };

export interface CompiledObjectLock {
  readonly token?: string;
  readonly defaultRetention?: {
    readonly mode?: "GOVERNANCE" | "COMPLIANCE";
    readonly days?: number;
  };
}

/**
 * Validated, defaulted and normalized bucket configuration
 *
 * Frozen on creation.
 *
 * @public
 */
export interface ConfigurationBundle {
  readonly bucketName: string;
  readonly expectedBucketOwner?: string;
  readonly tags: readonly BucketTag[];
  readonly versioning: { readonly enabled: boolean };
  readonly objectLock?: CompiledObjectLock;
  readonly encryption: {
    readonly sseAlgorithm: SseAlgorithm;
    readonly kmsMasterKeyId?: string;
    readonly bucketKeyEnabled: boolean;
  };
  readonly publicAccessBlock: {
    readonly blockPublicAcls: boolean;
    readonly blockPublicPolicy: boolean;
    readonly ignorePublicAcls: boolean;
    readonly restrictPublicBuckets: boolean;
  };
  readonly objectOwnership: ObjectOwnership;
  readonly requesterPays: boolean;
  readonly transferAcceleration: boolean;
  readonly policy?: string;
  readonly corsRules: readonly CompiledCorsRule[];
  readonly website?: CompiledWebsite;
  readonly lifecycleRules: Readonly<Record<string, CompiledLifecycleRule>>;
  readonly replication?: CompiledReplication;
  readonly notifications: readonly CompiledNotificationDestination[];
  readonly inventoryRules: Readonly<Record<string, CompiledInventoryRule>>;
  readonly intelligentTieringRules: Readonly<Record<string, CompiledTieringRule>>;
}

/**
 * Outcome of one compile invocation
 *
 * @public
 */
export type CompileResult =
  | {
      readonly status: "bundled";
      readonly name: string;
      readonly bundle: ConfigurationBundle;
      readonly warnings: readonly Violation[];
      readonly states: readonly CompilerState[];
    }
  | {
      readonly status: "rejected";
      readonly name?: string;
      readonly violations: readonly Violation[];
      readonly states: readonly CompilerState[];
    };
