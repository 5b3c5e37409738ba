/**
 * Unit tests for replication compilation
 */

import { describe, expect, it } from "vitest";
import type { ResolvedReplicationRule } from "../../../../src/services/compiler/defaults.js";
import { DiagnosticsSink } from "../../../../src/services/compiler/diagnostics.js";
import {
  compileReplication,
  compileReplicationRule,
  toBucketArn,
} from "../../../../src/services/compiler/replication-compiler.js";

const ROLE_ARN = "arn:aws:iam::123456789012:role/replication";

function replicationRule(
  overrides: Partial<ResolvedReplicationRule> = {},
): ResolvedReplicationRule {
  return {
    enabled: true,
    destination_bucket: "dr-logs",
    priority: 1,
    features: {
      metrics: false,
      replication_time_control: false,
      replica_modification_sync: false,
      delete_marker_replication: false,
    },
    ...overrides,
  };
}

describe("Replication Compiler", () => {
  describe("toBucketArn", () => {
    it("should turn bucket names into ARNs", () => {
      expect(toBucketArn("dr-logs")).toBe("arn:aws:s3:::dr-logs");
    });

    it("should keep ARNs as given", () => {
      expect(toBucketArn("arn:aws-cn:s3:::dr-logs")).toBe("arn:aws-cn:s3:::dr-logs");
    });
  });

  describe("compileReplicationRule", () => {
    it("should compile a same-account rule", () => {
      const sink = new DiagnosticsSink();

      expect(
        compileReplicationRule("to-dr", replicationRule(), sink.reporter("compilation")),
      ).toEqual({
        id: "to-dr",
        priority: 1,
        status: "Enabled",
        filter: { kind: "all" },
        destination: { bucketArn: "arn:aws:s3:::dr-logs" },
        replicateEncryptedObjects: false,
        metrics: false,
        replicationTimeControl: false,
        replicaModificationSync: false,
        deleteMarkerReplication: false,
        accountScope: "same-account",
        requiresDestinationGrant: false,
      });
      expect(sink.size).toBe(0);
    });

    it("should flag ownership transfer as cross-account", () => {
      const sink = new DiagnosticsSink();
      const compiled = compileReplicationRule(
        "to-archive",
        replicationRule({
          storage_class: "GLACIER",
          change_object_ownership_to_destination_bucket_owner: {
            destination_account_id: " 210987654321 ",
          },
          replicate_encrypted_objects: { replica_kms_key_id: "alias/archive" },
        }),
        sink.reporter("compilation"),
      );

      expect(compiled.destination).toEqual({
        bucketArn: "arn:aws:s3:::dr-logs",
        storageClass: "GLACIER",
        account: "210987654321",
        ownerOverride: "Destination",
        replicaKmsKeyId: "alias/archive",
      });
      expect(compiled.accountScope).toBe("cross-account");
      expect(compiled.requiresDestinationGrant).toBe(true);
      expect(compiled.replicateEncryptedObjects).toBe(true);
    });

    it("should reject unknown storage classes", () => {
      const sink = new DiagnosticsSink();
      const compiled = compileReplicationRule(
        "to-dr",
        replicationRule({ storage_class: "COLD" }),
        sink.reporter("compilation"),
      );

      expect(sink.toSortedArray().map((entry) => [entry.path, entry.code])).toEqual([
        ["replication.rules.to-dr.storage_class", "INVALID_ENUM_VALUE"],
      ]);
      expect(compiled.destination).not.toHaveProperty("storageClass");
    });

    it("should compile tag filters", () => {
      const sink = new DiagnosticsSink();
      const compiled = compileReplicationRule(
        "to-dr",
        replicationRule({ filter: { prefix: "logs/", tags: { team: "data" } } }),
        sink.reporter("compilation"),
      );

      expect(compiled.filter).toEqual({
        kind: "and",
        prefix: "logs/",
        tags: [{ key: "team", value: "data" }],
      });
    });
  });

  describe("compileReplication", () => {
    it("should return undefined without replication", () => {
      expect(
        compileReplication(undefined, new DiagnosticsSink().reporter("compilation")),
      ).toBeUndefined();
    });

    it("should order rules by priority descending, ties by name", () => {
      const sink = new DiagnosticsSink();
      const compiled = compileReplication(
        {
          role_arn: ROLE_ARN,
          rules: {
            low: replicationRule({ priority: 1 }),
            high: replicationRule({ priority: 10 }),
            mid: replicationRule({ priority: 5 }),
          },
        },
        sink.reporter("compilation"),
      );

      expect(compiled?.roleArn).toBe(ROLE_ARN);
      expect(compiled?.rules.map((rule) => rule.id)).toEqual(["high", "mid", "low"]);
      expect(sink.size).toBe(0);
    });

    it("should report each shared priority once, naming every rule", () => {
      const sink = new DiagnosticsSink();
      compileReplication(
        {
          role_arn: ROLE_ARN,
          rules: {
            primary: replicationRule({ priority: 1 }),
            secondary: replicationRule({ priority: 1 }),
            tertiary: replicationRule({ priority: 1 }),
            other: replicationRule({ priority: 2 }),
          },
        },
        sink.reporter("compilation"),
      );

      expect(sink.toSortedArray()).toEqual([
        {
          path: "replication.rules.primary.priority",
          code: "DUPLICATE_KEY",
          message: 'Priority 1 is used by rules "primary", "secondary", "tertiary"',
          severity: "error",
          category: "compilation",
          section: "replication",
          rule: "primary",
          keys: ["primary", "secondary", "tertiary"],
        },
      ]);
    });
  });
});
