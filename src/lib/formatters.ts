/**
 * Output formatting for compiler reports
 *
 * Strategy implementations for violations, bundles and control-plane
 * plans in each output format, selected through {@link FormatterFactory}.
 *
 * @file Centralized output formatting with Strategy pattern
 */

import type { ControlPlaneStep } from "../services/compiler/control-plane-plan.js";
import type { ConfigurationBundle, Violation } from "../services/compiler/types.js";
import { assertNever } from "./type-utilities.js";
import type { OutputFormat } from "./schemas.js";

/**
 * Base interface for all output formatters
 */
export interface Formatter {
  violations(violations: readonly Violation[]): void;
  bundle(bundle: ConfigurationBundle): void;
  plan(steps: readonly ControlPlaneStep[]): void;
}

/**
 * Align rows into columns separated by two spaces
 *
 * @param headers - Column headers
 * @param rows - Cell values, one array per row
 * @returns Lines with trailing whitespace removed
 *
 * @public
 */
export function renderTable(
  headers: readonly string[],
  rows: readonly (readonly string[])[],
): string[] {
  const widths = headers.map((header, column) =>
    Math.max(header.length, ...rows.map((row) => (row[column] ?? "").length)),
  );
  const renderRow = (cells: readonly string[]): string =>
    widths
      .map((width, column) => (cells[column] ?? "").padEnd(width))
      .join("  ")
      .trimEnd();

  return [renderRow(headers), ...rows.map(renderRow)];
}

/**
 * Base formatter with common functionality
 */
abstract class BaseFormatter implements Formatter {
  constructor(protected readonly logger: (message: string) => void) {}

  abstract violations(violations: readonly Violation[]): void;
  abstract bundle(bundle: ConfigurationBundle): void;
  abstract plan(steps: readonly ControlPlaneStep[]): void;
}

/**
 * Table formatter for human-readable output
 */
export class TableFormatter extends BaseFormatter {
  violations(violations: readonly Violation[]): void {
    if (violations.length === 0) {
      this.logger("No violations found.");
      return;
    }

    const lines = renderTable(
      ["SEVERITY", "CODE", "PATH", "MESSAGE"],
      violations.map((violation) => [
        violation.severity,
        violation.code,
        violation.path,
        violation.message,
      ]),
    );
    for (const line of lines) {
      this.logger(line);
    }
  }

  bundle(bundle: ConfigurationBundle): void {
    const bucketKey = bundle.encryption.bucketKeyEnabled ? "enabled" : "disabled";
    const encryption = `${bundle.encryption.sseAlgorithm} (bucket key ${bucketKey})`;
    const rows: [string, string][] = [
      ["Bucket", bundle.bucketName],
      ["Versioning", bundle.versioning.enabled ? "enabled" : "disabled"],
      ["Object lock", bundle.objectLock ? "enabled" : "disabled"],
      ["Encryption", encryption],
      ["Object ownership", bundle.objectOwnership],
      ["Tags", String(bundle.tags.length)],
      ["CORS rules", String(bundle.corsRules.length)],
      ["Website", bundle.website?.kind ?? "none"],
      ["Lifecycle rules", String(Object.keys(bundle.lifecycleRules).length)],
      ["Replication rules", String(bundle.replication?.rules.length ?? 0)],
      ["Notification destinations", String(bundle.notifications.length)],
      ["Inventory rules", String(Object.keys(bundle.inventoryRules).length)],
      ["Intelligent-tiering rules", String(Object.keys(bundle.intelligentTieringRules).length)],
    ];

    for (const line of renderTable(["SETTING", "VALUE"], rows)) {
      this.logger(line);
    }
  }

  plan(steps: readonly ControlPlaneStep[]): void {
    const lines = renderTable(
      ["#", "OPERATION"],
      steps.map((step, index) => [String(index + 1), step.operation]),
    );
    for (const line of lines) {
      this.logger(line);
    }
  }
}

/**
 * JSON formatter for machine-readable output
 */
export class JsonFormatter extends BaseFormatter {
  violations(violations: readonly Violation[]): void {
    this.logger(JSON.stringify(violations, undefined, 2));
  }

  bundle(bundle: ConfigurationBundle): void {
    this.logger(JSON.stringify(bundle, undefined, 2));
  }

  plan(steps: readonly ControlPlaneStep[]): void {
    this.logger(JSON.stringify(steps, undefined, 2));
  }
}

/**
 * JSON Lines formatter, one record per line
 */
export class JsonLinesFormatter extends BaseFormatter {
  violations(violations: readonly Violation[]): void {
    for (const violation of violations) {
      this.logger(JSON.stringify(violation));
    }
  }

  bundle(bundle: ConfigurationBundle): void {
    this.logger(JSON.stringify(bundle));
  }

  plan(steps: readonly ControlPlaneStep[]): void {
    for (const step of steps) {
      this.logger(JSON.stringify(step));
    }
  }
}

/**
 * Factory for creating formatters
 */
export const FormatterFactory = {
  /**
   * Create a formatter instance based on the format type
   *
   * @param format - Output format type
   * @param logger - Logger function for output
   * @returns Formatter instance
   */
  create(format: OutputFormat, logger: (message: string) => void): Formatter {
    switch (format) {
      case "table": {
        return new TableFormatter(logger);
      }
      case "json": {
        return new JsonFormatter(logger);
      }
      case "jsonl": {
        return new JsonLinesFormatter(logger);
      }
      default: {
        return assertNever(format, "output format");
      }
    }
  },
};
