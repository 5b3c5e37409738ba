/**
 * @module notification-compiler
 * Event notification compilation
 *
 * Destinations arrive classified and are checked for arity: any number
 * of function destinations, but at most one queue and one topic.
 */

import type { EventSubscription } from "../../lib/descriptor-schemas.js";
import {
  MAX_OBJECT_KEY_BYTES,
  NOTIFICATION_EVENTS,
  type NotificationEvent,
} from "../../lib/s3-vocabulary.js";
import { isOneOf } from "../../lib/type-utilities.js";
import type {
  CompiledNotificationDestination,
  CompiledSubscription,
  DestinationClassification,
  DestinationKind,
  ViolationLocation,
  ViolationReporter,
} from "./types.js";

/**
 * Destination kinds limited to a single address per bucket
 */
const SINGLE_DESTINATION_KINDS: readonly DestinationKind[] = ["queue", "topic"];

function compileSubscription(
  subscription: EventSubscription,
  location: ViolationLocation,
  reporter: ViolationReporter,
): CompiledSubscription {
  const events: NotificationEvent[] = [];

  if (subscription.events.length === 0) {
    reporter.error(
      "REQUIRES_FIELD",
      { ...location, field: [...(location.field ?? []), "events"] },
      "Subscription requires at least one event type",
    );
  }

  for (const [index, event] of subscription.events.entries()) {
    if (!isOneOf(NOTIFICATION_EVENTS, event)) {
      reporter.error(
        "INVALID_ENUM_VALUE",
        { ...location, field: [...(location.field ?? []), "events", index] },
        `Unknown event type "${event}"`,
      );
      continue;
    }
    if (!events.includes(event)) {
      events.push(event);
    }
  }

  const { filter_prefix: filterPrefix, filter_suffix: filterSuffix } = subscription;
  const filterBytes =
    Buffer.byteLength(filterPrefix ?? "", "utf8") + Buffer.byteLength(filterSuffix ?? "", "utf8");

  if (filterBytes > MAX_OBJECT_KEY_BYTES) {
    reporter.warn(
      "OUT_OF_RANGE",
      location,
      `filter_prefix and filter_suffix together span ${filterBytes} bytes, longer than any object key (${MAX_OBJECT_KEY_BYTES}); the subscription can never match`,
    );
  }

  return {
    events,
    ...(filterPrefix !== undefined && { filterPrefix }),
    ...(filterSuffix !== undefined && { filterSuffix }),
  };
}

/**
 * Compile the destination → subscriptions map
 *
 * Addresses missing from `destinations` are skipped here; the
 * destination validator has already reported them.
 *
 * @returns One entry per classified address, in descriptor order
 *
 * @public
 */
export function compileNotifications(
  notifications: Readonly<Record<string, readonly EventSubscription[]>>,
  destinations: DestinationClassification,
  reporter: ViolationReporter,
): CompiledNotificationDestination[] {
  const compiled: CompiledNotificationDestination[] = [];
  const addressesByKind = new Map<DestinationKind, string[]>();

  for (const [address, subscriptions] of Object.entries(notifications)) {
    const kind = destinations.get(address);
    if (!kind) continue;

    addressesByKind.set(kind, [...(addressesByKind.get(kind) ?? []), address]);

    compiled.push({
      address,
      kind,
      subscriptions: subscriptions.map((subscription, index) =>
        compileSubscription(
          subscription,
          { section: "notifications", rule: address, field: [index] },
          reporter,
        ),
      ),
    });
  }

  for (const kind of SINGLE_DESTINATION_KINDS) {
    const addresses = addressesByKind.get(kind) ?? [];
    if (addresses.length <= 1) continue;

    reporter.error(
      "OUT_OF_RANGE",
      { section: "notifications" },
      `At most one ${kind} destination is allowed, got ${addresses.length}: ${addresses.join(", ")}`,
      addresses,
    );
  }

  return compiled;
}
