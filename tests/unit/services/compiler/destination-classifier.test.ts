/**
 * Unit tests for notification destination classification
 */

import { describe, expect, it } from "vitest";
import {
  classifyDestination,
  classifyDestinations,
} from "../../../../src/services/compiler/destination-classifier.js";

describe("classifyDestination", () => {
  it.each([
    ["arn:aws:lambda:eu-west-1:123456789012:function:thumbnailer", "function"],
    ["arn:aws:sqs:eu-west-1:123456789012:uploads", "queue"],
    ["arn:aws:sns:us-east-1:123456789012:alerts", "topic"],
    ["arn:aws-cn:sqs:cn-north-1:123456789012:uploads", "queue"],
    ["arn:aws-us-gov:sns:us-gov-west-1:123456789012:alerts", "topic"],
  ])("should classify %s as %s", (address, kind) => {
    expect(classifyDestination(address)).toBe(kind);
  });

  it.each([
    ["uploads"],
    ["arn:aws:s3:::access-logs"],
    ["arn:aws:sqs:eu-west-1:12345:uploads"],
    ["arn:aws:sqs:eu-west-1:123456789012:"],
    ["ARN:AWS:SQS:eu-west-1:123456789012:uploads"],
    [""],
  ])("should leave %j unclassified", (address) => {
    expect(classifyDestination(address)).toBeUndefined();
  });

  describe("classifyDestinations", () => {
    it("should map classified addresses and leave the rest out", () => {
      const destinations = classifyDestinations([
        "arn:aws:sns:us-east-1:123456789012:alerts",
        "uploads",
        "arn:aws:lambda:eu-west-1:123456789012:function:thumbnailer",
      ]);

      expect([...destinations]).toEqual([
        ["arn:aws:sns:us-east-1:123456789012:alerts", "topic"],
        ["arn:aws:lambda:eu-west-1:123456789012:function:thumbnailer", "function"],
      ]);
      expect(destinations.has("uploads")).toBe(false);
    });
  });
});
