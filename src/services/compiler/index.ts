/**
 * Bucket compiler public API
 */

export {
  BucketCompiler,
  compileBucket,
  compileOrThrow,
  type BucketCompilerOptions,
} from "./compiler-pipeline.js";
export {
  buildControlPlanePlan,
  type ControlPlaneOperation,
  type ControlPlaneStep,
} from "./control-plane-plan.js";
export { DESCRIPTOR_DEFAULTS, resolveDefaults, type ResolvedDescriptor } from "./defaults.js";
export { classifyDestination, classifyDestinations } from "./destination-classifier.js";
export {
  DiagnosticsSink,
  buildViolationPath,
  compareViolations,
  sortViolations,
} from "./diagnostics.js";
export { ValidatorRegistry } from "./validator-registry.js";
export { createDefaultValidatorRegistry } from "./validators/index.js";
export * from "./types.js";
export {
  BucketDescriptorSchema,
  type BucketDescriptor,
} from "../../lib/descriptor-schemas.js";
export {
  CompilationRejectedError,
  ConfigurationError,
  DescriptorInputError,
  formatError,
} from "../../lib/errors.js";
