/**
 * Property-Based Testing
 */

import type { Gen } from "./gen.js";
import { config } from "./config.js";

/**
 * Render a generated input for a failure message.
 */
export function describeInput(value: unknown): string {
  try {
    return JSON.stringify(value) ?? String(value);
  } catch {
    return String(value);
  }
}

/**
 * Run a property-based test with generated values.
 *
 * Iteration `i` runs the property on `generator(seed + i)`, where the base seed
 * and the default iteration count come from configuration
 * (`laws.seed`, `laws.iterations`).
 *
 * @example
 * ```typescript
 * // Configured number of iterations (100 by default)
 * forAll(gen.int(), (n) => {
 *   expect(n + 0).toBe(n);
 * });
 *
 * // Explicit iteration count
 * forAll(gen.string(), 500, (s) => {
 *   expect(s.length).toBeLessThanOrEqual(8);
 * });
 * ```
 */
export function forAll<T>(generator: Gen<T>, property: (value: T) => void): void;
export function forAll<T>(generator: Gen<T>, count: number, property: (value: T) => void): void;
export function forAll<T>(
  generator: Gen<T>,
  countOrProperty: number | ((value: T) => void),
  property?: (value: T) => void,
): void {
  const count = typeof countOrProperty === "number" ? countOrProperty : config.get("laws.iterations");
  const prop = typeof countOrProperty === "function" ? countOrProperty : property;
  if (prop === undefined) {
    throw new TypeError("forAll: missing property function");
  }
  const seed = config.get("laws.seed");

  for (let i = 0; i < count; i++) {
    const value = generator(seed + i);
    try {
      prop(value);
    } catch (e) {
      const err = e instanceof Error ? e.message : String(e);
      throw new Error(
        `Property failed after ${i + 1} tests.\n` +
          `Failing input: ${describeInput(value)}\n` +
          `Error: ${err}`,
      );
    }
  }
}
