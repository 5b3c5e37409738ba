/**
 * @module website-validators
 * Validators for website hosting and CORS
 */

import { CORS_METHODS, MAX_CORS_RULES } from "../../../lib/s3-vocabulary.js";
import { isOneOf } from "../../../lib/type-utilities.js";
import type {
  DescriptorField,
  DescriptorFields,
  DescriptorSection,
  FieldValidator,
  ViolationReporter,
} from "../types.js";

/**
 * Website hosting runs in exactly one mode
 *
 * The two modes arrive as independent optional fields. When both are set
 * only the exclusivity violation is reported; checks inside either mode
 * would describe a configuration that cannot exist.
 *
 * @public
 */
export class WebsiteModeValidator implements FieldValidator {
  readonly id = "website-mode";
  readonly description = "Redirect and static website hosting are mutually exclusive";
  readonly section: DescriptorSection = "website";
  readonly fields: readonly DescriptorField[] = ["website"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const website = descriptor.website;
    if (!website) return;

    const redirect = website.redirect_requests_for_an_object;
    const staticSite = website.static_website;

    if (redirect && staticSite) {
      sink.error(
        "MUTUALLY_EXCLUSIVE",
        { section: "website" },
        "redirect_requests_for_an_object and static_website cannot both be set",
        ["redirect_requests_for_an_object", "static_website"],
      );
      return;
    }

    if (!redirect && !staticSite) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "website" },
        "website requires one of redirect_requests_for_an_object or static_website",
      );
      return;
    }

    if (!staticSite) return;

    if (staticSite.index_document === undefined) {
      sink.error(
        "REQUIRES_FIELD",
        { section: "website", field: ["static_website", "index_document"] },
        "static_website requires index_document",
      );
    }

    for (const [index, rule] of (staticSite.routing_rules ?? []).entries()) {
      const { replace_key_prefix_with: prefixWith, replace_key_with: keyWith } = rule.redirect;
      if (prefixWith !== undefined && keyWith !== undefined) {
        sink.error(
          "MUTUALLY_EXCLUSIVE",
          { section: "website", field: ["static_website", "routing_rules", index, "redirect"] },
          "replace_key_prefix_with and replace_key_with cannot both be set",
          ["replace_key_prefix_with", "replace_key_with"],
        );
      }
    }
  }
}

/**
 * CORS rule count, methods, origins and id uniqueness
 *
 * @public
 */
export class CorsRulesValidator implements FieldValidator {
  readonly id = "cors-rules";
  readonly description = "CORS rules are complete, use known methods and have unique ids";
  readonly section: DescriptorSection = "cors_rules";
  readonly fields: readonly DescriptorField[] = ["cors_rules"];

  validate(descriptor: DescriptorFields, sink: ViolationReporter): void {
    const rules = descriptor.cors_rules ?? [];

    if (rules.length > MAX_CORS_RULES) {
      sink.error(
        "OUT_OF_RANGE",
        { section: "cors_rules" },
        `At most ${MAX_CORS_RULES} CORS rules are allowed, got ${rules.length}`,
      );
    }

    const indexesById = new Map<string, number[]>();

    for (const [index, rule] of rules.entries()) {
      if (rule.allowed_methods.length === 0) {
        sink.error(
          "REQUIRES_FIELD",
          { section: "cors_rules", field: [index, "allowed_methods"] },
          "CORS rule requires at least one allowed method",
        );
      }

      for (const [methodIndex, method] of rule.allowed_methods.entries()) {
        if (!isOneOf(CORS_METHODS, method)) {
          sink.error(
            "INVALID_ENUM_VALUE",
            { section: "cors_rules", field: [index, "allowed_methods", methodIndex] },
            `Unsupported CORS method "${method}"; expected one of ${CORS_METHODS.join(", ")}`,
          );
        }
      }

      if (rule.allowed_origins.length === 0) {
        sink.error(
          "REQUIRES_FIELD",
          { section: "cors_rules", field: [index, "allowed_origins"] },
          "CORS rule requires at least one allowed origin",
        );
      }

      if (rule.id !== undefined) {
        indexesById.set(rule.id, [...(indexesById.get(rule.id) ?? []), index]);
      }
    }

    for (const [id, indexes] of indexesById) {
      if (indexes.length < 2) continue;
      sink.error(
        "DUPLICATE_KEY",
        { section: "cors_rules", field: [indexes[0] ?? 0, "id"] },
        `CORS rule id "${id}" is used by rules ${indexes.join(", ")}`,
        indexes.map(String),
      );
    }
  }
}
