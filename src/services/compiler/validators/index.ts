/**
 * Default field validator set
 */

import { ValidatorRegistry } from "../validator-registry.js";
import {
  BucketNameValidator,
  EncryptionValidator,
  ObjectLockValidator,
  RequesterPaysValidator,
  TagsValidator,
} from "./bucket-validators.js";
import { NotificationDestinationValidator } from "./notification-validators.js";
import {
  ReplicationEncryptionValidator,
  ReplicationOwnershipValidator,
  ReplicationPrerequisitesValidator,
} from "./replication-validators.js";
import { CorsRulesValidator, WebsiteModeValidator } from "./website-validators.js";

export {
  BucketNameValidator,
  CorsRulesValidator,
  EncryptionValidator,
  NotificationDestinationValidator,
  ObjectLockValidator,
  ReplicationEncryptionValidator,
  ReplicationOwnershipValidator,
  ReplicationPrerequisitesValidator,
  RequesterPaysValidator,
  TagsValidator,
  WebsiteModeValidator,
};

/**
 * Registry holding every built-in validator
 *
 * @public
 */
export function createDefaultValidatorRegistry(): ValidatorRegistry {
  const registry = new ValidatorRegistry();

  registry.register(new BucketNameValidator());
  registry.register(new RequesterPaysValidator());
  registry.register(new TagsValidator());
  registry.register(new ObjectLockValidator());
  registry.register(new EncryptionValidator());
  registry.register(new WebsiteModeValidator());
  registry.register(new CorsRulesValidator());
  registry.register(new ReplicationPrerequisitesValidator());
  registry.register(new ReplicationOwnershipValidator());
  registry.register(new ReplicationEncryptionValidator());
  registry.register(new NotificationDestinationValidator());

  return registry;
}
