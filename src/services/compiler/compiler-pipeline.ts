/**
 * @module compiler-pipeline
 * Bucket compiler pipeline
 *
 * Received → Validating → Defaulting → Compiling → Bundled | Rejected.
 * Every stage reports into one diagnostics sink. Validation is exhaustive:
 * fields that fail the structural parse only skip the validators that read
 * them. Validation errors stop the pipeline before any compiler runs,
 * compiler errors stop it before a bundle is assembled. The pipeline is
 * synchronous and holds no state between invocations.
 */

import { CompilationRejectedError } from "../../lib/errors.js";
import { Logger } from "../../lib/logger.js";
import { assembleBundle } from "./bundle.js";
import { resolveDefaults } from "./defaults.js";
import { classifyDestinations } from "./destination-classifier.js";
import { DiagnosticsSink } from "./diagnostics.js";
import { compileInventoryRules } from "./inventory-compiler.js";
import { compileLifecycleRules } from "./lifecycle-compiler.js";
import { compileNotifications } from "./notification-compiler.js";
import { compileReplication } from "./replication-compiler.js";
import { parseDescriptor, readDescriptorName } from "./structural.js";
import { compileTieringRules } from "./tiering-compiler.js";
import type {
  CompileResult,
  CompilerState,
  ConfigurationBundle,
  IValidatorRegistry,
  ValidationContext,
} from "./types.js";
import { createDefaultValidatorRegistry } from "./validators/index.js";

/**
 * Options accepted by {@link BucketCompiler}
 *
 * @public
 */
export interface BucketCompilerOptions {
  /**
   * Logger for state transitions and outcomes
   */
  logger?: Logger;

  /**
   * Validators to run; defaults to the built-in set
   */
  registry?: IValidatorRegistry;

  /**
   * Reject descriptors that only produced warnings
   */
  failOnWarnings?: boolean;
}

/**
 * Compiles bucket descriptors into configuration bundles
 *
 * @example
 * ```typescript
 * const compiler = new BucketCompiler();
 * const result = compiler.compile({ name: "access-logs" });
 * if (result.status === "bundled") {
 *   console.log(result.bundle.encryption.sseAlgorithm); // "AES256"
 * }
 * ```
 *
 * @public
 */
export class BucketCompiler {
  private readonly logger: Logger;
  private readonly registry: IValidatorRegistry;
  private readonly failOnWarnings: boolean;

  constructor(options: BucketCompilerOptions = {}) {
    this.logger = options.logger ?? new Logger({ component: "compiler" });
    this.registry = options.registry ?? createDefaultValidatorRegistry();
    this.failOnWarnings = options.failOnWarnings ?? false;
  }

  /**
   * Compile one descriptor
   *
   * Never throws for descriptor problems; they come back as violations.
   *
   * @param input - Raw descriptor, typically parsed JSON
   */
  compile(input: unknown): CompileResult {
    const name = readDescriptorName(input);
    const log = this.logger.child({ bucket: name ?? "(unnamed)" });
    const sink = new DiagnosticsSink();
    const states: CompilerState[] = ["Received"];

    const enter = (state: CompilerState): void => {
      log.debug(`Compiler state ${states.at(-1) ?? "Received"} -> ${state}`, {
        violations: sink.size,
      });
      states.push(state);
    };

    const reject = (): CompileResult => {
      enter("Rejected");
      const violations = sink.toSortedArray();
      log.info("Descriptor rejected", {
        errors: sink.errorCount,
        warnings: sink.size - sink.errorCount,
      });
      return {
        status: "rejected",
        ...(name !== undefined && { name }),
        violations,
        states,
      };
    };

    enter("Validating");
    const parsed = parseDescriptor(input, sink.reporter("structural"));
    if (!parsed) {
      return reject();
    }

    const context: ValidationContext = {
      destinations: classifyDestinations(Object.keys(parsed.fields.notifications ?? {})),
    };
    const relational = sink.reporter("relational");
    let skipped = 0;
    for (const validator of this.registry.getValidators()) {
      if (validator.fields.some((field) => parsed.invalidFields.has(field))) {
        skipped += 1;
        continue;
      }
      validator.validate(parsed.fields, relational, context);
    }
    log.debug("Validation finished", {
      validators: this.registry.getValidatorCount(),
      skipped,
      violations: sink.size,
    });

    const descriptor = parsed.descriptor;
    if (!descriptor || sink.isRejecting()) {
      return reject();
    }

    enter("Defaulting");
    const resolved = resolveDefaults(descriptor);

    enter("Compiling");
    const compilation = sink.reporter("compilation");
    const lifecycleRules = compileLifecycleRules(resolved.lifecycle_rules, compilation);
    const replication = compileReplication(resolved.replication, compilation);
    const notifications = compileNotifications(
      resolved.notifications,
      context.destinations,
      compilation,
    );
    const inventoryRules = compileInventoryRules(resolved.inventory_rules, compilation);
    const intelligentTieringRules = compileTieringRules(
      resolved.intelligent_tiering_rules,
      compilation,
    );

    if (sink.isRejecting(this.failOnWarnings)) {
      return reject();
    }

    const bundle = assembleBundle(resolved, {
      lifecycleRules,
      ...(replication && { replication }),
      notifications,
      inventoryRules,
      intelligentTieringRules,
    });

    enter("Bundled");
    const warnings = sink.toSortedArray();
    log.info("Descriptor bundled", { warnings: warnings.length });

    return { status: "bundled", name: resolved.name, bundle, warnings, states };
  }
}

/**
 * Compile one descriptor with a fresh compiler
 *
 * @public
 */
export function compileBucket(input: unknown, options?: BucketCompilerOptions): CompileResult {
  return new BucketCompiler(options).compile(input);
}

/**
 * Compile one descriptor, throwing when it is rejected
 *
 * @throws CompilationRejectedError carrying the ordered violation list
 *
 * @public
 */
export function compileOrThrow(
  input: unknown,
  options?: BucketCompilerOptions,
): ConfigurationBundle {
  const result = compileBucket(input, options);
  if (result.status === "rejected") {
    throw new CompilationRejectedError(result.name, result.violations);
  }
  return result.bundle;
}
