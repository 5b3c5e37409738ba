/**
 * Unit tests for lifecycle rule compilation
 */

import { describe, expect, it } from "vitest";
import type { ResolvedLifecycleRule } from "../../../../src/services/compiler/defaults.js";
import { DiagnosticsSink } from "../../../../src/services/compiler/diagnostics.js";
import {
  compileLifecycleRule,
  compileLifecycleRules,
} from "../../../../src/services/compiler/lifecycle-compiler.js";

function lifecycleRule(overrides: Partial<ResolvedLifecycleRule> = {}): ResolvedLifecycleRule {
  return { enabled: true, transitions: [], noncurrent_version_transitions: [], ...overrides };
}

function compile(rule: ResolvedLifecycleRule) {
  const sink = new DiagnosticsSink();
  const compiled = compileLifecycleRule("rotate", rule, sink.reporter("compilation"));
  return { compiled, violations: sink.toSortedArray() };
}

describe("Lifecycle Compiler", () => {
  it("should sort transitions by age", () => {
    const { compiled, violations } = compile(
      lifecycleRule({
        transitions: [
          { days: 365, storage_class: "DEEP_ARCHIVE" },
          { days: 30, storage_class: "STANDARD_IA" },
          { days: 90, storage_class: "GLACIER" },
        ],
      }),
    );

    expect(violations).toEqual([]);
    expect(compiled).toEqual({
      id: "rotate",
      status: "Enabled",
      filter: { kind: "all" },
      transitions: [
        { days: 30, storageClass: "STANDARD_IA" },
        { days: 90, storageClass: "GLACIER" },
        { days: 365, storageClass: "DEEP_ARCHIVE" },
      ],
      noncurrentTransitions: [],
    });
  });

  it("should produce the same transitions for any input order", () => {
    const transitions = [
      { days: 30, storage_class: "STANDARD_IA" },
      { days: 90, storage_class: "GLACIER" },
    ];

    expect(compile(lifecycleRule({ transitions })).compiled.transitions).toEqual(
      compile(lifecycleRule({ transitions: [...transitions].reverse() })).compiled.transitions,
    );
  });

  it("should reject transitions that share a day", () => {
    const { violations } = compile(
      lifecycleRule({
        transitions: [
          { days: 90, storage_class: "GLACIER" },
          { days: 30, storage_class: "STANDARD_IA" },
          { days: 90, storage_class: "DEEP_ARCHIVE" },
        ],
      }),
    );

    expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
      [
        "lifecycle_rules.rotate.transitions.2",
        "NON_MONOTONIC_SEQUENCE",
        "transitions[0] and transitions[2] both occur at day 90; days must be strictly increasing",
      ],
    ]);
  });

  it("should reject infrequent-access transitions before 30 days", () => {
    const { violations } = compile(
      lifecycleRule({ transitions: [{ days: 10, storage_class: "ONEZONE_IA" }] }),
    );

    expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
      [
        "lifecycle_rules.rotate.transitions.0.days",
        "OUT_OF_RANGE",
        "Transition to ONEZONE_IA requires at least 30 days, got 10",
      ],
    ]);
  });

  it("should allow early transitions to other classes", () => {
    expect(
      compile(lifecycleRule({ transitions: [{ days: 0, storage_class: "GLACIER_IR" }] }))
        .violations,
    ).toEqual([]);
  });

  it("should reject unknown storage classes and drop the transition", () => {
    const { compiled, violations } = compile(
      lifecycleRule({ transitions: [{ days: 30, storage_class: "STANDARD" }] }),
    );

    expect(violations.map((entry) => [entry.path, entry.code])).toEqual([
      ["lifecycle_rules.rotate.transitions.0.storage_class", "INVALID_ENUM_VALUE"],
    ]);
    expect(compiled.transitions).toEqual([]);
  });

  describe("expiration", () => {
    it("should compile dated expiration after the last transition", () => {
      const { compiled, violations } = compile(
        lifecycleRule({
          transitions: [{ days: 30, storage_class: "STANDARD_IA" }],
          expiration: { days_after_object_creation: 365 },
        }),
      );

      expect(violations).toEqual([]);
      expect(compiled.expiration).toEqual({ kind: "days", days: 365 });
    });

    it("should reject expiration on or before the last transition", () => {
      const { violations } = compile(
        lifecycleRule({
          transitions: [
            { days: 30, storage_class: "STANDARD_IA" },
            { days: 90, storage_class: "GLACIER" },
          ],
          expiration: { days_after_object_creation: 90 },
        }),
      );

      expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
        [
          "lifecycle_rules.rotate.expiration.days_after_object_creation",
          "NON_MONOTONIC_SEQUENCE",
          "Expiration at day 90 must come after the last transition at day 90",
        ],
      ]);
    });

    it("should compile delete-marker cleanup", () => {
      const { compiled, violations } = compile(
        lifecycleRule({ expiration: { clean_up_expired_object_delete_markers: true } }),
      );

      expect(violations).toEqual([]);
      expect(compiled.expiration).toEqual({ kind: "expired-delete-markers" });
    });

    it("should reject delete-marker cleanup combined with dated expiration", () => {
      const { violations } = compile(
        lifecycleRule({
          expiration: {
            days_after_object_creation: 30,
            clean_up_expired_object_delete_markers: true,
          },
        }),
      );

      expect(violations.map((entry) => [entry.path, entry.code, entry.keys])).toEqual([
        [
          "lifecycle_rules.rotate.expiration",
          "MUTUALLY_EXCLUSIVE",
          ["clean_up_expired_object_delete_markers", "days_after_object_creation"],
        ],
      ]);
    });
  });

  describe("noncurrent versions", () => {
    it("should sort noncurrent transitions and keep version counts", () => {
      const { compiled, violations } = compile(
        lifecycleRule({
          noncurrent_version_transitions: [
            {
              days_after_becoming_noncurrent: 60,
              storage_class: "GLACIER",
              newer_noncurrent_versions: 3,
            },
            { days_after_becoming_noncurrent: 30, storage_class: "STANDARD_IA" },
          ],
          noncurrent_version_expiration: {
            days_after_becoming_noncurrent: 120,
            newer_noncurrent_versions: 5,
          },
        }),
      );

      expect(violations).toEqual([]);
      expect(compiled.noncurrentTransitions).toEqual([
        { noncurrentDays: 30, storageClass: "STANDARD_IA" },
        { noncurrentDays: 60, newerNoncurrentVersions: 3, storageClass: "GLACIER" },
      ]);
      expect(compiled.noncurrentExpiration).toEqual({
        noncurrentDays: 120,
        newerNoncurrentVersions: 5,
      });
    });

    it("should reject noncurrent infrequent-access transitions before 30 days", () => {
      const { compiled, violations } = compile(
        lifecycleRule({
          noncurrent_version_transitions: [
            { days_after_becoming_noncurrent: 90, storage_class: "GLACIER" },
            { days_after_becoming_noncurrent: 7, storage_class: "STANDARD_IA" },
          ],
        }),
      );

      expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
        [
          "lifecycle_rules.rotate.noncurrent_version_transitions.1.days_after_becoming_noncurrent",
          "OUT_OF_RANGE",
          "Transition to STANDARD_IA requires at least 30 days, got 7",
        ],
      ]);
      expect(compiled.noncurrentTransitions.map((entry) => entry.noncurrentDays)).toEqual([7, 90]);
    });

    it("should reject noncurrent expiration before the last noncurrent transition", () => {
      const { violations } = compile(
        lifecycleRule({
          noncurrent_version_transitions: [
            { days_after_becoming_noncurrent: 60, storage_class: "GLACIER" },
          ],
          noncurrent_version_expiration: { days_after_becoming_noncurrent: 30 },
        }),
      );

      expect(violations.map((entry) => [entry.path, entry.code])).toEqual([
        [
          "lifecycle_rules.rotate.noncurrent_version_expiration.days_after_becoming_noncurrent",
          "NON_MONOTONIC_SEQUENCE",
        ],
      ]);
    });
  });

  it("should require at least one action", () => {
    const { violations } = compile(lifecycleRule({ filter: { prefix: "logs/" } }));

    expect(violations).toEqual([
      {
        path: "lifecycle_rules.rotate",
        code: "REQUIRES_FIELD",
        message:
          "Lifecycle rule requires at least one transition, expiration or multipart-upload cleanup",
        severity: "error",
        category: "compilation",
        section: "lifecycle_rules",
        rule: "rotate",
      },
    ]);
  });

  it("should compile multipart cleanup and disabled status", () => {
    const { compiled } = compile(
      lifecycleRule({ enabled: false, abort_incomplete_multipart_upload_days: 7 }),
    );

    expect(compiled.status).toBe("Disabled");
    expect(compiled.abortIncompleteMultipartUploadDays).toBe(7);
  });

  it("should key compiled rules by name in input order", () => {
    const sink = new DiagnosticsSink();
    const compiled = compileLifecycleRules(
      {
        zeta: lifecycleRule({ abort_incomplete_multipart_upload_days: 1 }),
        alpha: lifecycleRule({ abort_incomplete_multipart_upload_days: 2 }),
      },
      sink.reporter("compilation"),
    );

    expect(Object.keys(compiled)).toEqual(["zeta", "alpha"]);
    expect(compiled.alpha?.id).toBe("alpha");
  });
});
