/**
 * @module control-plane-plan
 * Mechanical mapping from a bundle to S3 control-plane requests
 *
 * The plan is an ordered list of command inputs. Nothing here talks to the
 * network: callers that apply a plan construct the matching
 * `@aws-sdk/client-s3` commands themselves.
 */

import type {
  CreateBucketCommandInput,
  IntelligentTieringFilter,
  LambdaFunctionConfiguration,
  LifecycleRule,
  LifecycleRuleFilter,
  NotificationConfigurationFilter,
  PutBucketAccelerateConfigurationCommandInput,
  PutBucketCorsCommandInput,
  PutBucketEncryptionCommandInput,
  PutBucketIntelligentTieringConfigurationCommandInput,
  PutBucketInventoryConfigurationCommandInput,
  PutBucketLifecycleConfigurationCommandInput,
  PutBucketNotificationConfigurationCommandInput,
  PutBucketOwnershipControlsCommandInput,
  PutBucketPolicyCommandInput,
  PutBucketReplicationCommandInput,
  PutBucketRequestPaymentCommandInput,
  PutBucketTaggingCommandInput,
  PutBucketVersioningCommandInput,
  PutBucketWebsiteCommandInput,
  PutObjectLockConfigurationCommandInput,
  PutPublicAccessBlockCommandInput,
  QueueConfiguration,
  ReplicationRule,
  ReplicationRuleFilter,
  Tag,
  TopicConfiguration,
} from "@aws-sdk/client-s3";
import { assertNever } from "../../lib/type-utilities.js";
import type {
  BucketTag,
  CompiledFilter,
  CompiledInventoryRule,
  CompiledLifecycleRule,
  CompiledNotificationDestination,
  CompiledReplicationRule,
  CompiledSubscription,
  CompiledTieringRule,
  CompiledWebsite,
  ConfigurationBundle,
} from "./types.js";

/**
 * Replication time control threshold, the only value S3 accepts
 */
const REPLICATION_TIME_MINUTES = 15;

interface ControlPlaneInputs {
  CreateBucket: CreateBucketCommandInput;
  PutBucketOwnershipControls: PutBucketOwnershipControlsCommandInput;
  PutPublicAccessBlock: PutPublicAccessBlockCommandInput;
  PutBucketVersioning: PutBucketVersioningCommandInput;
  PutObjectLockConfiguration: PutObjectLockConfigurationCommandInput;
  PutBucketEncryption: PutBucketEncryptionCommandInput;
  PutBucketTagging: PutBucketTaggingCommandInput;
  PutBucketPolicy: PutBucketPolicyCommandInput;
  PutBucketCors: PutBucketCorsCommandInput;
  PutBucketWebsite: PutBucketWebsiteCommandInput;
  PutBucketRequestPayment: PutBucketRequestPaymentCommandInput;
  PutBucketAccelerateConfiguration: PutBucketAccelerateConfigurationCommandInput;
  PutBucketLifecycleConfiguration: PutBucketLifecycleConfigurationCommandInput;
  PutBucketReplication: PutBucketReplicationCommandInput;
  PutBucketNotificationConfiguration: PutBucketNotificationConfigurationCommandInput;
  PutBucketInventoryConfiguration: PutBucketInventoryConfigurationCommandInput;
  PutBucketIntelligentTieringConfiguration: PutBucketIntelligentTieringConfigurationCommandInput;
}

/**
 * S3 operation name
 *
 * @public
 */
export type ControlPlaneOperation = keyof ControlPlaneInputs;

/**
 * One request of a plan, discriminated by operation
 *
 * @public
 */
export type ControlPlaneStep = {
  [Operation in ControlPlaneOperation]: {
    readonly operation: Operation;
    readonly input: ControlPlaneInputs[Operation];
  };
}[ControlPlaneOperation];

/**
 * Bucket addressing shared by every request
 */
interface BucketTarget {
  readonly Bucket: string;
  readonly ExpectedBucketOwner?: string;
}

function toTagSet(tags: readonly BucketTag[]): Tag[] {
  return tags.map(({ key, value }) => ({ Key: key, Value: value }));
}

/**
 * Lifecycle filter; a whole-bucket rule is an empty prefix
 */
function toLifecycleFilter(filter: CompiledFilter): LifecycleRuleFilter {
  switch (filter.kind) {
    case "all": {
      return { Prefix: "" };
    }
    case "prefix": {
      return { Prefix: filter.prefix };
    }
    case "tag": {
      return { Tag: { Key: filter.tag.key, Value: filter.tag.value } };
    }
    case "size-greater-than": {
      return { ObjectSizeGreaterThan: filter.bytes };
    }
    case "size-less-than": {
      return { ObjectSizeLessThan: filter.bytes };
    }
    case "and": {
      return {
        And: {
          ...(filter.prefix !== undefined && { Prefix: filter.prefix }),
          ...(filter.tags.length > 0 && { Tags: toTagSet(filter.tags) }),
          ...(filter.sizeGreaterThan !== undefined && {
            ObjectSizeGreaterThan: filter.sizeGreaterThan,
          }),
          ...(filter.sizeLessThan !== undefined && { ObjectSizeLessThan: filter.sizeLessThan }),
        },
      };
    }
    default: {
      return assertNever(filter, "lifecycle filter kind");
    }
  }
}

function toReplicationFilter(filter: CompiledFilter): ReplicationRuleFilter {
  switch (filter.kind) {
    case "all": {
      return { Prefix: "" };
    }
    case "prefix": {
      return { Prefix: filter.prefix };
    }
    case "tag": {
      return { Tag: { Key: filter.tag.key, Value: filter.tag.value } };
    }
    case "and": {
      return {
        And: {
          ...(filter.prefix !== undefined && { Prefix: filter.prefix }),
          ...(filter.tags.length > 0 && { Tags: toTagSet(filter.tags) }),
        },
      };
    }
    case "size-greater-than":
    case "size-less-than": {
      throw new Error(`Replication rules cannot filter by object size (${filter.kind})`);
    }
    default: {
      return assertNever(filter, "replication filter kind");
    }
  }
}

function toTieringFilter(filter: CompiledFilter): IntelligentTieringFilter | undefined {
  switch (filter.kind) {
    case "all": {
      return undefined;
    }
    case "prefix": {
      return { Prefix: filter.prefix };
    }
    case "tag": {
      return { Tag: { Key: filter.tag.key, Value: filter.tag.value } };
    }
    case "and": {
      return {
        And: {
          ...(filter.prefix !== undefined && { Prefix: filter.prefix }),
          ...(filter.tags.length > 0 && { Tags: toTagSet(filter.tags) }),
        },
      };
    }
    case "size-greater-than":
    case "size-less-than": {
      throw new Error(`Intelligent-tiering rules cannot filter by object size (${filter.kind})`);
    }
    default: {
      return assertNever(filter, "tiering filter kind");
    }
  }
}

function toLifecycleRule(rule: CompiledLifecycleRule): LifecycleRule {
  const expiration = rule.expiration;

  return {
    ID: rule.id,
    Status: rule.status,
    Filter: toLifecycleFilter(rule.filter),
    ...(rule.transitions.length > 0 && {
      Transitions: rule.transitions.map(({ days, storageClass }) => ({
        Days: days,
        StorageClass: storageClass,
      })),
    }),
    ...(expiration && {
      Expiration:
        expiration.kind === "days"
          ? { Days: expiration.days }
          : { ExpiredObjectDeleteMarker: true },
    }),
    ...(rule.noncurrentTransitions.length > 0 && {
      NoncurrentVersionTransitions: rule.noncurrentTransitions.map((transition) => ({
        NoncurrentDays: transition.noncurrentDays,
        StorageClass: transition.storageClass,
        ...(transition.newerNoncurrentVersions !== undefined && {
          NewerNoncurrentVersions: transition.newerNoncurrentVersions,
        }),
      })),
    }),
    ...(rule.noncurrentExpiration && {
      NoncurrentVersionExpiration: {
        NoncurrentDays: rule.noncurrentExpiration.noncurrentDays,
        ...(rule.noncurrentExpiration.newerNoncurrentVersions !== undefined && {
          NewerNoncurrentVersions: rule.noncurrentExpiration.newerNoncurrentVersions,
        }),
      },
    }),
    ...(rule.abortIncompleteMultipartUploadDays !== undefined && {
      AbortIncompleteMultipartUpload: {
        DaysAfterInitiation: rule.abortIncompleteMultipartUploadDays,
      },
    }),
  };
}

function toReplicationRule(rule: CompiledReplicationRule): ReplicationRule {
  const { destination } = rule;

  return {
    ID: rule.id,
    Priority: rule.priority,
    Status: rule.status,
    Filter: toReplicationFilter(rule.filter),
    DeleteMarkerReplication: { Status: rule.deleteMarkerReplication ? "Enabled" : "Disabled" },
    ...((rule.replicateEncryptedObjects || rule.replicaModificationSync) && {
      SourceSelectionCriteria: {
        ...(rule.replicateEncryptedObjects && {
          SseKmsEncryptedObjects: { Status: "Enabled" as const },
        }),
        ...(rule.replicaModificationSync && {
          ReplicaModifications: { Status: "Enabled" as const },
        }),
      },
    }),
    Destination: {
      Bucket: destination.bucketArn,
      ...(destination.account !== undefined && { Account: destination.account }),
      ...(destination.storageClass !== undefined && { StorageClass: destination.storageClass }),
      ...(destination.ownerOverride !== undefined && {
        AccessControlTranslation: { Owner: destination.ownerOverride },
      }),
      ...(destination.replicaKmsKeyId !== undefined && {
        EncryptionConfiguration: { ReplicaKmsKeyID: destination.replicaKmsKeyId },
      }),
      ...(rule.replicationTimeControl && {
        ReplicationTime: {
          Status: "Enabled" as const,
          Time: { Minutes: REPLICATION_TIME_MINUTES },
        },
      }),
      ...(rule.metrics && {
        Metrics: {
          Status: "Enabled" as const,
          ...(rule.replicationTimeControl && {
            EventThreshold: { Minutes: REPLICATION_TIME_MINUTES },
          }),
        },
      }),
    },
  };
}

function toNotificationFilter(
  subscription: CompiledSubscription,
): NotificationConfigurationFilter | undefined {
  const rules = [
    ...(subscription.filterPrefix === undefined
      ? []
      : [{ Name: "prefix" as const, Value: subscription.filterPrefix }]),
    ...(subscription.filterSuffix === undefined
      ? []
      : [{ Name: "suffix" as const, Value: subscription.filterSuffix }]),
  ];
  return rules.length > 0 ? { Key: { FilterRules: rules } } : undefined;
}

function toNotificationConfiguration(
  destinations: readonly CompiledNotificationDestination[],
): PutBucketNotificationConfigurationCommandInput["NotificationConfiguration"] {
  const lambdas: LambdaFunctionConfiguration[] = [];
  const queues: QueueConfiguration[] = [];
  const topics: TopicConfiguration[] = [];

  for (const destination of destinations) {
    for (const subscription of destination.subscriptions) {
      const filter = toNotificationFilter(subscription);
      const common = { Events: [...subscription.events], ...(filter && { Filter: filter }) };

      switch (destination.kind) {
        case "function": {
          lambdas.push({ LambdaFunctionArn: destination.address, ...common });
          break;
        }
        case "queue": {
          queues.push({ QueueArn: destination.address, ...common });
          break;
        }
        case "topic": {
          topics.push({ TopicArn: destination.address, ...common });
          break;
        }
        default: {
          assertNever(destination.kind, "destination kind");
        }
      }
    }
  }

  return {
    ...(lambdas.length > 0 && { LambdaFunctionConfigurations: lambdas }),
    ...(queues.length > 0 && { QueueConfigurations: queues }),
    ...(topics.length > 0 && { TopicConfigurations: topics }),
  };
}

function toWebsiteConfiguration(
  website: CompiledWebsite,
): PutBucketWebsiteCommandInput["WebsiteConfiguration"] {
  if (website.kind === "redirect") {
    return {
      RedirectAllRequestsTo: {
        HostName: website.hostName,
        ...(website.protocol !== undefined && { Protocol: website.protocol }),
      },
    };
  }

  return {
    IndexDocument: { Suffix: website.indexDocument },
    ...(website.errorDocument !== undefined && { ErrorDocument: { Key: website.errorDocument } }),
    ...(website.routingRules.length > 0 && {
      RoutingRules: website.routingRules.map(({ condition, redirect }) => ({
        ...(condition && {
          Condition: {
            ...(condition.keyPrefixEquals !== undefined && {
              KeyPrefixEquals: condition.keyPrefixEquals,
            }),
            ...(condition.httpErrorCodeReturnedEquals !== undefined && {
              HttpErrorCodeReturnedEquals: condition.httpErrorCodeReturnedEquals,
            }),
          },
        }),
        Redirect: {
          ...(redirect.hostName !== undefined && { HostName: redirect.hostName }),
          ...(redirect.protocol !== undefined && { Protocol: redirect.protocol }),
          ...(redirect.replaceKeyPrefixWith !== undefined && {
            ReplaceKeyPrefixWith: redirect.replaceKeyPrefixWith,
          }),
          ...(redirect.replaceKeyWith !== undefined && { ReplaceKeyWith: redirect.replaceKeyWith }),
          ...(redirect.httpRedirectCode !== undefined && {
            HttpRedirectCode: redirect.httpRedirectCode,
          }),
        },
      })),
    }),
  };
}

function toInventoryInput(
  target: BucketTarget,
  rule: CompiledInventoryRule,
): PutBucketInventoryConfigurationCommandInput {
  const { destination } = rule;
  const encryption = destination.encryption;

  return {
    ...target,
    Id: rule.id,
    InventoryConfiguration: {
      Id: rule.id,
      IsEnabled: rule.enabled,
      ...(rule.prefix !== undefined && { Filter: { Prefix: rule.prefix } }),
      Destination: {
        S3BucketDestination: {
          Bucket: destination.bucketArn,
          Format: destination.format,
          ...(destination.accountId !== undefined && { AccountId: destination.accountId }),
          ...(destination.prefix !== undefined && { Prefix: destination.prefix }),
          ...(encryption && {
            Encryption:
              encryption.type === "SSE-KMS"
                ? { SSEKMS: { KeyId: encryption.keyId } }
                : { SSES3: {} },
          }),
        },
      },
      IncludedObjectVersions: rule.includedObjectVersions,
      Schedule: { Frequency: rule.frequency },
      ...(rule.optionalFields.length > 0 && { OptionalFields: [...rule.optionalFields] }),
    },
  };
}

function toTieringInput(
  bucket: string,
  rule: CompiledTieringRule,
): PutBucketIntelligentTieringConfigurationCommandInput {
  const filter = toTieringFilter(rule.filter);

  return {
    Bucket: bucket,
    Id: rule.id,
    IntelligentTieringConfiguration: {
      Id: rule.id,
      Status: rule.status,
      ...(filter && { Filter: filter }),
      Tierings: rule.tierings.map(({ accessTier, days }) => ({
        AccessTier: accessTier,
        Days: days,
      })),
    },
  };
}

function bucketSteps(bundle: ConfigurationBundle, target: BucketTarget): ControlPlaneStep[] {
  const steps: ControlPlaneStep[] = [
    {
      operation: "CreateBucket",
      input: {
        Bucket: target.Bucket,
        ObjectOwnership: bundle.objectOwnership,
        ...(bundle.objectLock && { ObjectLockEnabledForBucket: true }),
      },
    },
    {
      operation: "PutBucketOwnershipControls",
      input: {
        ...target,
        OwnershipControls: { Rules: [{ ObjectOwnership: bundle.objectOwnership }] },
      },
    },
    {
      operation: "PutPublicAccessBlock",
      input: {
        ...target,
        PublicAccessBlockConfiguration: {
          BlockPublicAcls: bundle.publicAccessBlock.blockPublicAcls,
          BlockPublicPolicy: bundle.publicAccessBlock.blockPublicPolicy,
          IgnorePublicAcls: bundle.publicAccessBlock.ignorePublicAcls,
          RestrictPublicBuckets: bundle.publicAccessBlock.restrictPublicBuckets,
        },
      },
    },
  ];

  if (bundle.versioning.enabled) {
    steps.push({
      operation: "PutBucketVersioning",
      input: { ...target, VersioningConfiguration: { Status: "Enabled" } },
    });
  }

  const objectLock = bundle.objectLock;
  if (objectLock) {
    const retention = objectLock.defaultRetention;
    steps.push({
      operation: "PutObjectLockConfiguration",
      input: {
        ...target,
        ...(objectLock.token !== undefined && { Token: objectLock.token }),
        ObjectLockConfiguration: {
          ObjectLockEnabled: "Enabled",
          ...(retention && {
            Rule: {
              DefaultRetention: {
                ...(retention.mode !== undefined && { Mode: retention.mode }),
                ...(retention.days !== undefined && { Days: retention.days }),
              },
            },
          }),
        },
      },
    });
  }

  steps.push({
    operation: "PutBucketEncryption",
    input: {
      ...target,
      ServerSideEncryptionConfiguration: {
        Rules: [
          {
            ApplyServerSideEncryptionByDefault: {
              SSEAlgorithm: bundle.encryption.sseAlgorithm,
              ...(bundle.encryption.kmsMasterKeyId !== undefined && {
                KMSMasterKeyID: bundle.encryption.kmsMasterKeyId,
              }),
            },
            BucketKeyEnabled: bundle.encryption.bucketKeyEnabled,
          },
        ],
      },
    },
  });

  if (bundle.tags.length > 0) {
    steps.push({
      operation: "PutBucketTagging",
      input: { ...target, Tagging: { TagSet: toTagSet(bundle.tags) } },
    });
  }

  if (bundle.policy !== undefined) {
    steps.push({ operation: "PutBucketPolicy", input: { ...target, Policy: bundle.policy } });
  }

  return steps;
}

function accessSteps(bundle: ConfigurationBundle, target: BucketTarget): ControlPlaneStep[] {
  const steps: ControlPlaneStep[] = [];

  if (bundle.corsRules.length > 0) {
    steps.push({
      operation: "PutBucketCors",
      input: {
        ...target,
        CORSConfiguration: {
          CORSRules: bundle.corsRules.map((rule) => ({
            ...(rule.id !== undefined && { ID: rule.id }),
            AllowedMethods: [...rule.allowedMethods],
            AllowedOrigins: [...rule.allowedOrigins],
            ...(rule.allowedHeaders.length > 0 && { AllowedHeaders: [...rule.allowedHeaders] }),
            ...(rule.exposeHeaders.length > 0 && { ExposeHeaders: [...rule.exposeHeaders] }),
            ...(rule.maxAgeSeconds !== undefined && { MaxAgeSeconds: rule.maxAgeSeconds }),
          })),
        },
      },
    });
  }

  if (bundle.website) {
    steps.push({
      operation: "PutBucketWebsite",
      input: { ...target, WebsiteConfiguration: toWebsiteConfiguration(bundle.website) },
    });
  }

  steps.push(
    {
      operation: "PutBucketRequestPayment",
      input: {
        ...target,
        RequestPaymentConfiguration: { Payer: bundle.requesterPays ? "Requester" : "BucketOwner" },
      },
    },
    {
      operation: "PutBucketAccelerateConfiguration",
      input: {
        ...target,
        AccelerateConfiguration: { Status: bundle.transferAcceleration ? "Enabled" : "Suspended" },
      },
    },
  );

  return steps;
}

function ruleSteps(bundle: ConfigurationBundle, target: BucketTarget): ControlPlaneStep[] {
  const steps: ControlPlaneStep[] = [];

  const lifecycleRules = Object.values(bundle.lifecycleRules);
  if (lifecycleRules.length > 0) {
    steps.push({
      operation: "PutBucketLifecycleConfiguration",
      input: { ...target, LifecycleConfiguration: { Rules: lifecycleRules.map(toLifecycleRule) } },
    });
  }

  if (bundle.replication) {
    steps.push({
      operation: "PutBucketReplication",
      input: {
        ...target,
        ReplicationConfiguration: {
          Role: bundle.replication.roleArn,
          Rules: bundle.replication.rules.map(toReplicationRule),
        },
      },
    });
  }

  if (bundle.notifications.length > 0) {
    steps.push({
      operation: "PutBucketNotificationConfiguration",
      input: {
        ...target,
        NotificationConfiguration: toNotificationConfiguration(bundle.notifications),
      },
    });
  }

  for (const rule of Object.values(bundle.inventoryRules)) {
    steps.push({
      operation: "PutBucketInventoryConfiguration",
      input: toInventoryInput(target, rule),
    });
  }

  // This operation takes no expected-owner header
  for (const rule of Object.values(bundle.intelligentTieringRules)) {
    steps.push({
      operation: "PutBucketIntelligentTieringConfiguration",
      input: toTieringInput(target.Bucket, rule),
    });
  }

  return steps;
}

/**
 * Translate a bundle into ordered control-plane requests
 *
 * Order: bucket creation, ownership and public access, versioning, object
 * lock, encryption, tags, policy, then access settings and the rule
 * collections. `ExpectedBucketOwner` is set on every request that accepts
 * it when the owner is known.
 *
 * @param bundle - Compiled configuration
 * @returns Steps in apply order
 *
 * @public
 */
export function buildControlPlanePlan(bundle: ConfigurationBundle): ControlPlaneStep[] {
  const owner = bundle.expectedBucketOwner;
  const target: BucketTarget = {
    Bucket: bundle.bucketName,
    ...(owner !== undefined && { ExpectedBucketOwner: owner }),
  };

  return [
    ...bucketSteps(bundle, target),
    ...accessSteps(bundle, target),
    ...ruleSteps(bundle, target),
  ];
}
