/**
 * @module lifecycle-compiler
 * Lifecycle rule compilation
 *
 * Turns each named rule into a filter-scoped action list: transitions
 * sorted by age, storage classes checked against the transition set, and
 * expirations that come strictly after the last transition.
 */

import {
  LIFECYCLE_TRANSITION_STORAGE_CLASSES,
  MINIMUM_AGE_STORAGE_CLASSES,
  MINIMUM_INFREQUENT_ACCESS_DAYS,
  type LifecycleTransitionStorageClass,
} from "../../lib/s3-vocabulary.js";
import { isOneOf } from "../../lib/type-utilities.js";
import type { ResolvedLifecycleRule } from "./defaults.js";
import { compileFilter } from "./filters.js";
import type {
  CompiledExpiration,
  CompiledLifecycleRule,
  CompiledNoncurrentTransition,
  CompiledTransition,
  ViolationLocation,
  ViolationReporter,
} from "./types.js";

interface DatedStep {
  readonly index: number;
  readonly days: number;
  readonly storageClass: string;
}

/**
 * Sort steps by day and report any day that appears more than once
 *
 * Sorting is stable, so equal days keep their input order; the sorted
 * output does not depend on how the input was ordered otherwise.
 */
function sortSteps(
  steps: readonly DatedStep[],
  field: string,
  location: ViolationLocation,
  reporter: ViolationReporter,
): DatedStep[] {
  const sorted = [...steps].sort((left, right) => left.days - right.days);

  for (const [position, step] of sorted.entries()) {
    const previous = sorted[position - 1];
    if (previous && previous.days === step.days) {
      reporter.error(
        "NON_MONOTONIC_SEQUENCE",
        { ...location, field: [field, step.index] },
        `${field}[${previous.index}] and ${field}[${step.index}] both occur at day ${step.days}; days must be strictly increasing`,
      );
    }
  }

  return sorted;
}

function checkStorageClass(
  step: DatedStep,
  field: string,
  location: ViolationLocation,
  reporter: ViolationReporter,
): LifecycleTransitionStorageClass | undefined {
  if (isOneOf(LIFECYCLE_TRANSITION_STORAGE_CLASSES, step.storageClass)) {
    return step.storageClass;
  }

  reporter.error(
    "INVALID_ENUM_VALUE",
    { ...location, field: [field, step.index, "storage_class"] },
    `Storage class "${step.storageClass}" cannot be a transition target; expected one of ${LIFECYCLE_TRANSITION_STORAGE_CLASSES.join(", ")}`,
  );
  return undefined;
}

/**
 * Infrequent-access classes bill a minimum object age, current or noncurrent
 */
function checkMinimumAge(
  step: DatedStep,
  storageClass: LifecycleTransitionStorageClass,
  field: readonly (string | number)[],
  location: ViolationLocation,
  reporter: ViolationReporter,
): void {
  if (
    MINIMUM_AGE_STORAGE_CLASSES.includes(storageClass) &&
    step.days < MINIMUM_INFREQUENT_ACCESS_DAYS
  ) {
    reporter.error(
      "OUT_OF_RANGE",
      { ...location, field },
      `Transition to ${storageClass} requires at least ${MINIMUM_INFREQUENT_ACCESS_DAYS} days, got ${step.days}`,
    );
  }
}

function compileTransitions(
  rule: ResolvedLifecycleRule,
  location: ViolationLocation,
  reporter: ViolationReporter,
): CompiledTransition[] {
  const steps = rule.transitions.map((transition, index) => ({
    index,
    days: transition.days,
    storageClass: transition.storage_class,
  }));
  const compiled: CompiledTransition[] = [];

  for (const step of sortSteps(steps, "transitions", location, reporter)) {
    const storageClass = checkStorageClass(step, "transitions", location, reporter);
    if (!storageClass) continue;

    checkMinimumAge(step, storageClass, ["transitions", step.index, "days"], location, reporter);
    compiled.push({ days: step.days, storageClass });
  }

  return compiled;
}

function compileNoncurrentTransitions(
  rule: ResolvedLifecycleRule,
  location: ViolationLocation,
  reporter: ViolationReporter,
): CompiledNoncurrentTransition[] {
  const steps = rule.noncurrent_version_transitions.map((transition, index) => ({
    index,
    days: transition.days_after_becoming_noncurrent,
    storageClass: transition.storage_class,
  }));
  const compiled: CompiledNoncurrentTransition[] = [];

  for (const step of sortSteps(steps, "noncurrent_version_transitions", location, reporter)) {
    const storageClass = checkStorageClass(
      step,
      "noncurrent_version_transitions",
      location,
      reporter,
    );
    if (!storageClass) continue;

    checkMinimumAge(
      step,
      storageClass,
      ["noncurrent_version_transitions", step.index, "days_after_becoming_noncurrent"],
      location,
      reporter,
    );

    const newer = rule.noncurrent_version_transitions[step.index]?.newer_noncurrent_versions;
    compiled.push({
      noncurrentDays: step.days,
      ...(newer !== undefined && { newerNoncurrentVersions: newer }),
      storageClass,
    });
  }

  return compiled;
}

function compileExpiration(
  rule: ResolvedLifecycleRule,
  transitions: readonly CompiledTransition[],
  location: ViolationLocation,
  reporter: ViolationReporter,
): CompiledExpiration | undefined {
  const days = rule.expiration?.days_after_object_creation;
  const cleanUpDeleteMarkers = rule.expiration?.clean_up_expired_object_delete_markers === true;

  if (days !== undefined && cleanUpDeleteMarkers) {
    reporter.error(
      "MUTUALLY_EXCLUSIVE",
      { ...location, field: ["expiration"] },
      "clean_up_expired_object_delete_markers cannot be combined with days_after_object_creation",
      ["clean_up_expired_object_delete_markers", "days_after_object_creation"],
    );
  }

  if (days === undefined) {
    return cleanUpDeleteMarkers ? { kind: "expired-delete-markers" } : undefined;
  }

  const lastTransition = transitions.at(-1);
  if (lastTransition && days <= lastTransition.days) {
    reporter.error(
      "NON_MONOTONIC_SEQUENCE",
      { ...location, field: ["expiration", "days_after_object_creation"] },
      `Expiration at day ${days} must come after the last transition at day ${lastTransition.days}`,
    );
  }

  return { kind: "days", days };
}

/**
 * Compile one lifecycle rule
 *
 * @param name - Rule key
 * @param rule - Defaulted rule
 * @param reporter - Violation sink
 *
 * @public
 */
export function compileLifecycleRule(
  name: string,
  rule: ResolvedLifecycleRule,
  reporter: ViolationReporter,
): CompiledLifecycleRule {
  const location: ViolationLocation = { section: "lifecycle_rules", rule: name };

  const filter = compileFilter(rule.filter, location, reporter);
  const transitions = compileTransitions(rule, location, reporter);
  const expiration = compileExpiration(rule, transitions, location, reporter);
  const noncurrentTransitions = compileNoncurrentTransitions(rule, location, reporter);

  const noncurrentExpiration = rule.noncurrent_version_expiration;
  const lastNoncurrent = noncurrentTransitions.at(-1);
  if (
    noncurrentExpiration &&
    lastNoncurrent &&
    noncurrentExpiration.days_after_becoming_noncurrent <= lastNoncurrent.noncurrentDays
  ) {
    reporter.error(
      "NON_MONOTONIC_SEQUENCE",
      { ...location, field: ["noncurrent_version_expiration", "days_after_becoming_noncurrent"] },
      `Noncurrent expiration at day ${noncurrentExpiration.days_after_becoming_noncurrent} must come after the last noncurrent transition at day ${lastNoncurrent.noncurrentDays}`,
    );
  }

  const abortDays = rule.abort_incomplete_multipart_upload_days;

  const hasAction =
    rule.transitions.length > 0 ||
    expiration !== undefined ||
    rule.noncurrent_version_transitions.length > 0 ||
    noncurrentExpiration !== undefined ||
    abortDays !== undefined;

  if (!hasAction) {
    reporter.error(
      "REQUIRES_FIELD",
      location,
      "Lifecycle rule requires at least one transition, expiration or multipart-upload cleanup",
    );
  }

  return {
    id: name,
    status: rule.enabled ? "Enabled" : "Disabled",
    filter,
    transitions,
    ...(expiration && { expiration }),
    noncurrentTransitions,
    ...(noncurrentExpiration && {
      noncurrentExpiration: {
        noncurrentDays: noncurrentExpiration.days_after_becoming_noncurrent,
        ...(noncurrentExpiration.newer_noncurrent_versions !== undefined && {
          newerNoncurrentVersions: noncurrentExpiration.newer_noncurrent_versions,
        }),
      },
    }),
    ...(abortDays !== undefined && { abortIncompleteMultipartUploadDays: abortDays }),
  };
}

/**
 * Compile every lifecycle rule, keyed by rule name in input order
 *
 * @public
 */
export function compileLifecycleRules(
  rules: Readonly<Record<string, ResolvedLifecycleRule>>,
  reporter: ViolationReporter,
): Record<string, CompiledLifecycleRule> {
  return Object.fromEntries(
    Object.entries(rules).map(([name, rule]) => [name, compileLifecycleRule(name, rule, reporter)]),
  );
}
