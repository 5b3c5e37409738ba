/**
 * @module bundle
 * Assembly of the configuration bundle
 *
 * Maps the defaulted descriptor and the per-concern compiler outputs onto
 * the camelCase bundle shape and freezes the result.
 */

import type {
  CorsRule,
  ObjectLockSettings,
  WebsiteSettings,
} from "../../lib/descriptor-schemas.js";
import { CORS_METHODS, type CorsMethod } from "../../lib/s3-vocabulary.js";
import { deepFreeze, isOneOf } from "../../lib/type-utilities.js";
import type { ResolvedDescriptor } from "./defaults.js";
import { toBucketTags } from "./filters.js";
import type {
  CompiledCorsRule,
  CompiledInventoryRule,
  CompiledLifecycleRule,
  CompiledNotificationDestination,
  CompiledObjectLock,
  CompiledReplication,
  CompiledTieringRule,
  CompiledWebsite,
  ConfigurationBundle,
} from "./types.js";

/**
 * Outputs of the per-concern compilers
 *
 * @public
 */
export interface CompiledSections {
  readonly lifecycleRules: Readonly<Record<string, CompiledLifecycleRule>>;
  readonly replication?: CompiledReplication;
  readonly notifications: readonly CompiledNotificationDestination[];
  readonly inventoryRules: Readonly<Record<string, CompiledInventoryRule>>;
  readonly intelligentTieringRules: Readonly<Record<string, CompiledTieringRule>>;
}

function bundleCorsRule(rule: CorsRule): CompiledCorsRule {
  const allowedMethods = rule.allowed_methods.filter((method): method is CorsMethod =>
    isOneOf(CORS_METHODS, method),
  );

  return {
    ...(rule.id !== undefined && { id: rule.id }),
    allowedMethods,
    allowedOrigins: [...rule.allowed_origins],
    allowedHeaders: [...(rule.allowed_headers ?? [])],
    exposeHeaders: [...(rule.expose_headers ?? [])],
    ...(rule.max_age_seconds !== undefined && { maxAgeSeconds: rule.max_age_seconds }),
  };
}

/**
 * Website settings as a tagged variant
 *
 * Validation has already guaranteed exactly one mode and an index
 * document for static hosting.
 */
function bundleWebsite(website: WebsiteSettings): CompiledWebsite | undefined {
  const redirect = website.redirect_requests_for_an_object;
  if (redirect) {
    return {
      kind: "redirect",
      hostName: redirect.host_name,
      ...(redirect.protocol !== undefined && { protocol: redirect.protocol }),
    };
  }

  const staticSite = website.static_website;
  if (!staticSite?.index_document) return undefined;

  return {
    kind: "static",
    indexDocument: staticSite.index_document,
    ...(staticSite.error_document !== undefined && { errorDocument: staticSite.error_document }),
    routingRules: (staticSite.routing_rules ?? []).map(({ condition, redirect: target }) => ({
      ...(condition && {
        condition: {
          ...(condition.key_prefix_equals !== undefined && {
            keyPrefixEquals: condition.key_prefix_equals,
          }),
          ...(condition.http_error_code_returned_equals !== undefined && {
            httpErrorCodeReturnedEquals: condition.http_error_code_returned_equals,
          }),
        },
      }),
      redirect: {
        ...(target.host_name !== undefined && { hostName: target.host_name }),
        ...(target.protocol !== undefined && { protocol: target.protocol }),
        ...(target.replace_key_prefix_with !== undefined && {
          replaceKeyPrefixWith: target.replace_key_prefix_with,
        }),
        ...(target.replace_key_with !== undefined && { replaceKeyWith: target.replace_key_with }),
        ...(target.http_redirect_code !== undefined && {
          httpRedirectCode: target.http_redirect_code,
        }),
      },
    })),
  };
}

function bundleObjectLock(settings: ObjectLockSettings | undefined): CompiledObjectLock {
  const retention = settings?.default_retention;

  return {
    ...(settings?.token !== undefined && { token: settings.token }),
    ...(retention && {
      defaultRetention: {
        ...(retention.retention_mode !== undefined && { mode: retention.retention_mode }),
        ...(retention.retention_days !== undefined && { days: retention.retention_days }),
      },
    }),
  };
}

/**
 * Build the frozen bundle
 *
 * @param resolved - Defaulted descriptor
 * @param sections - Per-concern compiler outputs
 *
 * @public
 */
export function assembleBundle(
  resolved: ResolvedDescriptor,
  sections: CompiledSections,
): ConfigurationBundle {
  const encryption = resolved.encryption_config;
  const publicAccess = resolved.public_access_block;
  const website = resolved.website ? bundleWebsite(resolved.website) : undefined;

  const bundle: ConfigurationBundle = {
    bucketName: resolved.name,
    ...(resolved.bucket_owner_account_id !== undefined && {
      expectedBucketOwner: resolved.bucket_owner_account_id,
    }),
    tags: toBucketTags(resolved.tags),
    versioning: { enabled: resolved.versioning_enabled },
    ...(resolved.enables_object_lock && { objectLock: bundleObjectLock(resolved.object_lock) }),
    encryption: {
      sseAlgorithm: encryption.sse_algorithm,
      ...(encryption.kms_master_key_id !== undefined && {
        kmsMasterKeyId: encryption.kms_master_key_id,
      }),
      bucketKeyEnabled: encryption.bucket_key_enabled,
    },
    publicAccessBlock: {
      blockPublicAcls: publicAccess.block_public_acls,
      blockPublicPolicy: publicAccess.block_public_policy,
      ignorePublicAcls: publicAccess.ignore_public_acls,
      restrictPublicBuckets: publicAccess.restrict_public_buckets,
    },
    objectOwnership: resolved.object_ownership,
    requesterPays: resolved.requester_pays,
    transferAcceleration: resolved.transfer_acceleration,
    ...(resolved.policy !== undefined && { policy: resolved.policy }),
    corsRules: resolved.cors_rules.map(bundleCorsRule),
    ...(website && { website }),
    lifecycleRules: sections.lifecycleRules,
    ...(sections.replication && { replication: sections.replication }),
    notifications: sections.notifications,
    inventoryRules: sections.inventoryRules,
    intelligentTieringRules: sections.intelligentTieringRules,
  };

  return deepFreeze(bundle);
}
