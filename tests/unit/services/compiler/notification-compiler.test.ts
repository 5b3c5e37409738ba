/**
 * Unit tests for event notification compilation
 */

import { describe, expect, it } from "vitest";
import type { EventSubscription } from "../../../../src/lib/descriptor-schemas.js";
import { DiagnosticsSink } from "../../../../src/services/compiler/diagnostics.js";
import { classifyDestinations } from "../../../../src/services/compiler/destination-classifier.js";
import { compileNotifications } from "../../../../src/services/compiler/notification-compiler.js";

const QUEUE_A = "arn:aws:sqs:eu-west-1:123456789012:uploads";
const QUEUE_B = "arn:aws:sqs:eu-west-1:123456789012:audits";
const TOPIC = "arn:aws:sns:eu-west-1:123456789012:alerts";
const FUNCTION_A = "arn:aws:lambda:eu-west-1:123456789012:function:thumbnailer";
const FUNCTION_B = "arn:aws:lambda:eu-west-1:123456789012:function:indexer";

function compile(notifications: Record<string, EventSubscription[]>) {
  const sink = new DiagnosticsSink();
  const compiled = compileNotifications(
    notifications,
    classifyDestinations(Object.keys(notifications)),
    sink.reporter("compilation"),
  );
  return { compiled, violations: sink.toSortedArray() };
}

describe("Notification Compiler", () => {
  it("should classify destinations in descriptor order", () => {
    const { compiled, violations } = compile({
      [TOPIC]: [{ events: ["s3:ObjectRemoved:*"] }],
      [FUNCTION_A]: [{ events: ["s3:ObjectCreated:Put"], filter_suffix: ".jpg" }],
      [FUNCTION_B]: [{ events: ["s3:ObjectCreated:*"], filter_prefix: "docs/" }],
      [QUEUE_A]: [{ events: ["s3:ObjectCreated:*"] }],
    });

    expect(violations).toEqual([]);
    expect(compiled).toEqual([
      { address: TOPIC, kind: "topic", subscriptions: [{ events: ["s3:ObjectRemoved:*"] }] },
      {
        address: FUNCTION_A,
        kind: "function",
        subscriptions: [{ events: ["s3:ObjectCreated:Put"], filterSuffix: ".jpg" }],
      },
      {
        address: FUNCTION_B,
        kind: "function",
        subscriptions: [{ events: ["s3:ObjectCreated:*"], filterPrefix: "docs/" }],
      },
      { address: QUEUE_A, kind: "queue", subscriptions: [{ events: ["s3:ObjectCreated:*"] }] },
    ]);
  });

  it("should skip unclassified addresses", () => {
    const { compiled, violations } = compile({
      "not-an-arn": [{ events: ["s3:ObjectCreated:*"] }],
    });

    expect(compiled).toEqual([]);
    expect(violations).toEqual([]);
  });

  it("should allow at most one queue", () => {
    const { violations } = compile({
      [QUEUE_A]: [{ events: ["s3:ObjectCreated:*"] }],
      [QUEUE_B]: [{ events: ["s3:ObjectRemoved:*"] }],
    });

    expect(violations).toEqual([
      {
        path: "notifications",
        code: "OUT_OF_RANGE",
        message: `At most one queue destination is allowed, got 2: ${QUEUE_A}, ${QUEUE_B}`,
        severity: "error",
        category: "compilation",
        section: "notifications",
        keys: [QUEUE_A, QUEUE_B],
      },
    ]);
  });

  it("should require events", () => {
    const { violations } = compile({ [QUEUE_A]: [{ events: [] }] });

    expect(violations.map((entry) => [entry.path, entry.code])).toEqual([
      [`notifications.${QUEUE_A}.0.events`, "REQUIRES_FIELD"],
    ]);
  });

  it("should reject unknown events and de-duplicate known ones", () => {
    const { compiled, violations } = compile({
      [QUEUE_A]: [{ events: ["s3:ObjectCreated:*", "s3:ObjectExploded", "s3:ObjectCreated:*"] }],
    });

    expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
      [
        `notifications.${QUEUE_A}.0.events.1`,
        "INVALID_ENUM_VALUE",
        'Unknown event type "s3:ObjectExploded"',
      ],
    ]);
    expect(compiled[0]?.subscriptions[0]?.events).toEqual(["s3:ObjectCreated:*"]);
  });

  it("should warn when filters exceed the object key length", () => {
    const { violations } = compile({
      [QUEUE_A]: [
        { events: ["s3:ObjectCreated:*"] },
        {
          events: ["s3:ObjectCreated:*"],
          filter_prefix: "p".repeat(1000),
          filter_suffix: "é".repeat(13),
        },
      ],
    });

    expect(violations).toEqual([
      {
        path: `notifications.${QUEUE_A}.1`,
        code: "OUT_OF_RANGE",
        message:
          "filter_prefix and filter_suffix together span 1026 bytes, longer than any object key (1024); the subscription can never match",
        severity: "warning",
        category: "compilation",
        section: "notifications",
        rule: QUEUE_A,
      },
    ]);
  });
});
