/**
 * @module notification-validators
 * Destination address classification
 */

import type {
  DescriptorField,
  DescriptorFields,
  DescriptorSection,
  FieldValidator,
  ValidationContext,
  ViolationReporter,
} from "../types.js";

/**
 * Every destination address must classify as function, queue or topic
 *
 * @public
 */
export class NotificationDestinationValidator implements FieldValidator {
  readonly id = "notification-destinations";
  readonly description = "Notification destinations are function, queue or topic ARNs";
  readonly section: DescriptorSection = "notifications";
  readonly fields: readonly DescriptorField[] = ["notifications"];

  validate(
    descriptor: DescriptorFields,
    sink: ViolationReporter,
    { destinations }: ValidationContext,
  ): void {
    for (const address of Object.keys(descriptor.notifications ?? {})) {
      if (!destinations.has(address)) {
        sink.error(
          "INVALID_ENUM_VALUE",
          { section: "notifications", rule: address },
          `Cannot classify destination "${address}"; expected a lambda, sqs or sns ARN`,
        );
      }
    }
  }
}
