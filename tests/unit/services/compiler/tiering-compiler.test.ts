/**
 * Unit tests for intelligent-tiering compilation
 */

import { describe, expect, it } from "vitest";
import type { ResolvedTieringRule } from "../../../../src/services/compiler/defaults.js";
import { DiagnosticsSink } from "../../../../src/services/compiler/diagnostics.js";
import {
  compileTieringRule,
  compileTieringRules,
} from "../../../../src/services/compiler/tiering-compiler.js";

function compile(
  tierings: ResolvedTieringRule["tierings"],
  overrides: Partial<ResolvedTieringRule> = {},
) {
  const sink = new DiagnosticsSink();
  const compiled = compileTieringRule(
    "archive",
    { enabled: true, tierings, ...overrides },
    sink.reporter("compilation"),
  );
  return { compiled, violations: sink.toSortedArray() };
}

describe("Tiering Compiler", () => {
  it("should sort tierings by days", () => {
    const { compiled, violations } = compile([
      { access_tier: "DEEP_ARCHIVE_ACCESS", days: 180 },
      { access_tier: "ARCHIVE_ACCESS", days: 90 },
    ]);

    expect(violations).toEqual([]);
    expect(compiled).toEqual({
      id: "archive",
      status: "Enabled",
      filter: { kind: "all" },
      tierings: [
        { accessTier: "ARCHIVE_ACCESS", days: 90 },
        { accessTier: "DEEP_ARCHIVE_ACCESS", days: 180 },
      ],
    });
  });

  it("should require at least one tiering", () => {
    expect(compile([]).violations.map((entry) => [entry.path, entry.code])).toEqual([
      ["intelligent_tiering_rules.archive.tierings", "REQUIRES_FIELD"],
    ]);
  });

  it("should reject unknown tiers", () => {
    expect(
      compile([{ access_tier: "FROZEN_ACCESS", days: 90 }]).violations.map((entry) => [
        entry.path,
        entry.code,
      ]),
    ).toEqual([["intelligent_tiering_rules.archive.tierings.0.access_tier", "INVALID_ENUM_VALUE"]]);
  });

  it.each([
    ["ARCHIVE_ACCESS", 89, "ARCHIVE_ACCESS requires 90-730 days, got 89"],
    ["ARCHIVE_ACCESS", 731, "ARCHIVE_ACCESS requires 90-730 days, got 731"],
    ["DEEP_ARCHIVE_ACCESS", 179, "DEEP_ARCHIVE_ACCESS requires 180-730 days, got 179"],
  ])("should bound %s days (%i)", (accessTier, days, message) => {
    expect(
      compile([{ access_tier: accessTier, days }]).violations.map((entry) => [
        entry.path,
        entry.message,
      ]),
    ).toEqual([["intelligent_tiering_rules.archive.tierings.0.days", message]]);
  });

  it("should reject a tier configured twice", () => {
    const { compiled, violations } = compile([
      { access_tier: "ARCHIVE_ACCESS", days: 90 },
      { access_tier: "ARCHIVE_ACCESS", days: 120 },
    ]);

    expect(violations.map((entry) => [entry.path, entry.code, entry.message, entry.keys])).toEqual([
      [
        "intelligent_tiering_rules.archive.tierings.1.access_tier",
        "DUPLICATE_KEY",
        "ARCHIVE_ACCESS is configured by tierings 0 and 1",
        ["0", "1"],
      ],
    ]);
    expect(compiled.tierings).toEqual([{ accessTier: "ARCHIVE_ACCESS", days: 90 }]);
  });

  it("should require deep archive after archive", () => {
    const { violations } = compile([
      { access_tier: "ARCHIVE_ACCESS", days: 200 },
      { access_tier: "DEEP_ARCHIVE_ACCESS", days: 180 },
    ]);

    expect(violations.map((entry) => [entry.path, entry.code, entry.message])).toEqual([
      [
        "intelligent_tiering_rules.archive.tierings.1.days",
        "NON_MONOTONIC_SEQUENCE",
        "DEEP_ARCHIVE_ACCESS at day 180 must come after ARCHIVE_ACCESS at day 200",
      ],
    ]);
  });

  it("should compile filters and disabled status", () => {
    const { compiled } = compile([{ access_tier: "ARCHIVE_ACCESS", days: 90 }], {
      enabled: false,
      filter: { prefix: "cold/" },
    });

    expect(compiled.status).toBe("Disabled");
    expect(compiled.filter).toEqual({ kind: "prefix", prefix: "cold/" });
  });

  it("should key rules by name in input order", () => {
    const sink = new DiagnosticsSink();
    const compiled = compileTieringRules(
      {
        second: { enabled: true, tierings: [{ access_tier: "ARCHIVE_ACCESS", days: 90 }] },
        first: { enabled: true, tierings: [{ access_tier: "ARCHIVE_ACCESS", days: 100 }] },
      },
      sink.reporter("compilation"),
    );

    expect(Object.keys(compiled)).toEqual(["second", "first"]);
  });
});
