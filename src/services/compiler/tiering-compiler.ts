/**
 * @module tiering-compiler
 * Intelligent-tiering archive configuration compilation
 */

import { ACCESS_TIER_DAY_RANGES, ACCESS_TIERS, type AccessTier } from "../../lib/s3-vocabulary.js";
import { isOneOf } from "../../lib/type-utilities.js";
import type { ResolvedTieringRule } from "./defaults.js";
import { compileFilter } from "./filters.js";
import type {
  CompiledTiering,
  CompiledTieringRule,
  ViolationLocation,
  ViolationReporter,
} from "./types.js";

interface IndexedTiering extends CompiledTiering {
  readonly index: number;
}

/**
 * Compile one tiering rule
 *
 * Each archive tier may appear once, within its day range, and the deep
 * archive tier must start after the archive tier. Output tierings are
 * sorted by days.
 *
 * @public
 */
export function compileTieringRule(
  name: string,
  rule: ResolvedTieringRule,
  reporter: ViolationReporter,
): CompiledTieringRule {
  const location: ViolationLocation = { section: "intelligent_tiering_rules", rule: name };
  const byTier = new Map<AccessTier, IndexedTiering>();

  if (rule.tierings.length === 0) {
    reporter.error(
      "REQUIRES_FIELD",
      { ...location, field: ["tierings"] },
      "Tiering rule requires at least one tiering",
    );
  }

  for (const [index, tiering] of rule.tierings.entries()) {
    const accessTier = tiering.access_tier;

    if (!isOneOf(ACCESS_TIERS, accessTier)) {
      reporter.error(
        "INVALID_ENUM_VALUE",
        { ...location, field: ["tierings", index, "access_tier"] },
        `Unknown access tier "${accessTier}"; expected one of ${ACCESS_TIERS.join(", ")}`,
      );
      continue;
    }

    const range = ACCESS_TIER_DAY_RANGES[accessTier];
    if (tiering.days < range.min || tiering.days > range.max) {
      reporter.error(
        "OUT_OF_RANGE",
        { ...location, field: ["tierings", index, "days"] },
        `${accessTier} requires ${range.min}-${range.max} days, got ${tiering.days}`,
      );
    }

    const existing = byTier.get(accessTier);
    if (existing) {
      reporter.error(
        "DUPLICATE_KEY",
        { ...location, field: ["tierings", index, "access_tier"] },
        `${accessTier} is configured by tierings ${existing.index} and ${index}`,
        [String(existing.index), String(index)],
      );
      continue;
    }

    byTier.set(accessTier, { index, accessTier, days: tiering.days });
  }

  const archive = byTier.get("ARCHIVE_ACCESS");
  const deepArchive = byTier.get("DEEP_ARCHIVE_ACCESS");
  if (archive && deepArchive && deepArchive.days <= archive.days) {
    reporter.error(
      "NON_MONOTONIC_SEQUENCE",
      { ...location, field: ["tierings", deepArchive.index, "days"] },
      `DEEP_ARCHIVE_ACCESS at day ${deepArchive.days} must come after ARCHIVE_ACCESS at day ${archive.days}`,
    );
  }

  const tierings = [...byTier.values()]
    .sort((left, right) => left.days - right.days)
    .map(({ accessTier, days }) => ({ accessTier, days }));

  return {
    id: name,
    status: rule.enabled ? "Enabled" : "Disabled",
    filter: compileFilter(rule.filter, location, reporter),
    tierings,
  };
}

/**
 * Compile every tiering rule, keyed by rule name in input order
 *
 * @public
 */
export function compileTieringRules(
  rules: Readonly<Record<string, ResolvedTieringRule>>,
  reporter: ViolationReporter,
): Record<string, CompiledTieringRule> {
  return Object.fromEntries(
    Object.entries(rules).map(([name, rule]) => [name, compileTieringRule(name, rule, reporter)]),
  );
}
