/**
 * @module diagnostics
 * Violation accumulator shared by every pipeline stage
 *
 * Validators and compilers never return early on a problem: they report it
 * here and keep going, so one compile pass surfaces every violation. The
 * sink also owns path construction and the deterministic report order.
 */

import { compareText } from "../../lib/type-utilities.js";
import {
  DESCRIPTOR_SECTIONS,
  type DescriptorSection,
  type Violation,
  type ViolationCategory,
  type ViolationCode,
  type ViolationLocation,
  type ViolationReporter,
  type ViolationSeverity,
} from "./types.js";

/**
 * Sections whose second path segment is a rule or destination key
 */
const KEYED_SECTIONS: ReadonlySet<DescriptorSection> = new Set<DescriptorSection>([
  "lifecycle_rules",
  "notifications",
  "inventory_rules",
  "intelligent_tiering_rules",
]);

const SECTION_RANK = new Map<DescriptorSection, number>(
  DESCRIPTOR_SECTIONS.map((section, index) => [section, index]),
);

const SECTION_NAMES: ReadonlySet<string> = new Set(DESCRIPTOR_SECTIONS);

function isDescriptorSection(value: string | number | undefined): value is DescriptorSection {
  return typeof value === "string" && value !== "bucket" && SECTION_NAMES.has(value);
}

/**
 * Build the dot-separated path for a location
 *
 * Bucket-level fields are reported bare (`versioning_enabled`); replication
 * rules live under `replication.rules.<name>`.
 *
 * @public
 */
export function buildViolationPath(location: ViolationLocation): string {
  const field = location.field ?? [];
  const segments: (string | number)[] = [];

  if (location.section !== "bucket") {
    segments.push(location.section);
  }

  if (location.rule !== undefined) {
    if (location.section === "replication") {
      segments.push("rules");
    }
    segments.push(location.rule);
  }

  segments.push(...field);
  return segments.join(".");
}

/**
 * Recover a location from a raw descriptor path (as produced by zod)
 *
 * @public
 */
export function locationFromPath(path: readonly (string | number)[]): ViolationLocation {
  const [head, second, third] = path;

  if (!isDescriptorSection(head)) {
    return { section: "bucket", field: path };
  }

  if (head === "replication" && second === "rules" && third !== undefined) {
    return { section: head, rule: String(third), field: path.slice(3) };
  }

  if (KEYED_SECTIONS.has(head) && second !== undefined) {
    return { section: head, rule: String(second), field: path.slice(2) };
  }

  return { section: head, field: path.slice(1) };
}

/**
 * Report order: section, then rule name, then path, code and message
 *
 * @public
 */
export function compareViolations(left: Violation, right: Violation): number {
  const sectionOrder =
    (SECTION_RANK.get(left.section) ?? 0) - (SECTION_RANK.get(right.section) ?? 0);
  if (sectionOrder !== 0) return sectionOrder;

  return (
    compareText(left.rule ?? "", right.rule ?? "") ||
    compareText(left.path, right.path) ||
    compareText(left.code, right.code) ||
    compareText(left.message, right.message)
  );
}

/**
 * Sorted copy of a violation list
 *
 * @public
 */
export function sortViolations(violations: readonly Violation[]): Violation[] {
  return [...violations].sort(compareViolations);
}

/**
 * Collects violations across all stages of one compile invocation
 *
 * @public
 */
export class DiagnosticsSink {
  private readonly entries: Violation[] = [];

  /**
   * Reporter that stamps every violation with the given category
   *
   * @param category - Category of the stage that will use the reporter
   */
  reporter(category: ViolationCategory): ViolationReporter {
    return {
      error: (code, location, message, keys) => {
        this.add("error", category, code, location, message, keys);
      },
      warn: (code, location, message, keys) => {
        this.add("warning", category, code, location, message, keys);
      },
    };
  }

  /**
   * Whether the collected violations reject the descriptor
   *
   * @param failOnWarnings - Treat warnings as rejecting too
   */
  isRejecting(failOnWarnings = false): boolean {
    return this.entries.some(
      (violation) => violation.severity === "error" || failOnWarnings,
    );
  }

  get errorCount(): number {
    return this.entries.filter((violation) => violation.severity === "error").length;
  }

  get size(): number {
    return this.entries.length;
  }

  /**
   * All violations in report order
   */
  toSortedArray(): Violation[] {
    return sortViolations(this.entries);
  }

  private add(
    severity: ViolationSeverity,
    category: ViolationCategory,
    code: ViolationCode,
    location: ViolationLocation,
    message: string,
    keys?: readonly string[],
  ): void {
    this.entries.push({
      path: buildViolationPath(location),
      code,
      message,
      severity,
      category,
      section: location.section,
      ...(location.rule !== undefined && { rule: location.rule }),
      ...(keys && keys.length > 0 && { keys: [...keys] }),
    });
  }
}
