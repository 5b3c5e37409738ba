/**
 * @module destination-classifier
 * Classify notification destination addresses by shape
 *
 * An address is an ARN whose service segment names the destination kind:
 * `lambda` for functions, `sqs` for queues and `sns` for topics, in any
 * partition (aws, aws-cn, aws-us-gov, ...). Anything else is unclassified;
 * there is no fallback kind.
 */

import type { DestinationClassification, DestinationKind } from "./types.js";

const DESTINATION_ARN = /^arn:aws(?:-[a-z]+)*:(lambda|sqs|sns):[a-z0-9-]+:\d{12}:\S+$/;

const SERVICE_KINDS: Readonly<Record<string, DestinationKind>> = {
  lambda: "function",
  sqs: "queue",
  sns: "topic",
};

/**
 * Classify one destination address
 *
 * @param address - Destination ARN
 * @returns Destination kind, or undefined when the shape is not recognized
 *
 * @example
 * ```typescript
 * classifyDestination("arn:aws:sqs:eu-west-1:123456789012:uploads"); // "queue"
 * classifyDestination("uploads"); // undefined
 * ```
 *
 * @public
 */
export function classifyDestination(address: string): DestinationKind | undefined {
  const service = DESTINATION_ARN.exec(address)?.[1];
  return service === undefined ? undefined : SERVICE_KINDS[service];
}

/**
 * Classify every address once
 *
 * The result is shared by the destination validator and the notification
 * compiler. Unclassified addresses are left out of the map.
 *
 * @public
 */
export function classifyDestinations(addresses: Iterable<string>): DestinationClassification {
  const destinations = new Map<string, DestinationKind>();
  for (const address of addresses) {
    const kind = classifyDestination(address);
    if (kind !== undefined) {
      destinations.set(address, kind);
    }
  }
  return destinations;
}
