/**
 * Type utilities shared by the compiler stages
 *
 * @file
 * Exhaustiveness checks, deep freezing of compiled output and the
 * locale-independent comparison used for deterministic ordering.
 */

/**
 * Fail on a value the type system says cannot exist
 *
 * Reaching this is a defect in the compiler, never a descriptor problem.
 *
 * @param value - Value that should have type `never`
 * @param context - Short description of the switch being exhausted
 * @throws Always
 *
 * @public
 */
export function assertNever(value: never, context: string): never {
  throw new Error(`Unreachable ${context}: ${JSON.stringify(value)}`);
}

/**
 * Freeze a value and everything reachable from it
 *
 * @param value - Plain data (objects, arrays, primitives)
 * @returns The same value, frozen
 *
 * @public
 */
export function deepFreeze<T>(value: T): T {
  if (typeof value !== "object" || value === null || Object.isFrozen(value)) {
    return value;
  }

  for (const nested of Object.values(value)) {
    deepFreeze(nested);
  }

  return Object.freeze(value);
}

/**
 * Byte-wise string comparison for sort callbacks
 *
 * `localeCompare` depends on the host's ICU data; reports must not.
 *
 * @public
 */
export function compareText(left: string, right: string): number {
  if (left === right) return 0;
  return left < right ? -1 : 1;
}

/**
 * Narrow a string to a member of a readonly literal list
 *
 * @example
 * ```typescript
 * const METHODS = ["GET", "PUT"] as const;
 * if (isOneOf(METHODS, input)) {
 *   // input: "GET" | "PUT"
 * }
 * ```
 *
 * @public
 */
export function isOneOf<const T extends string>(allowed: readonly T[], value: string): value is T {
  const values: readonly string[] = allowed;
  return values.includes(value);
}
