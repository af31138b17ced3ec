import { DEFAULT_ORIGIN, type Origin } from "./types.js";

/**
 * One contribution to a resolution: the fields a layer (or one layer's
 * overlay section) sets, and where they came from.
 */
export interface StackEntry<F> {
  readonly origin: Origin;
  readonly fields: F;
}

export interface ResolvedScalar<T> {
  readonly value: T;
  readonly origin: Origin;
}

/**
 * Empty strings count as absent: a layer cannot clear a value set below it.
 */
function isSet<T>(value: T | undefined): value is T {
  return value !== undefined && value !== null && value !== "";
}

/**
 * Picks the value of a scalar field from the highest-precedence entry that
 * sets it.
 *
 * @param stack - Entries in ascending precedence
 * @param pick - Reads the field from an entry
 * @param fallback - Value when no entry sets the field; attributed to "default"
 */
export function resolveScalar<F, T>(
  stack: readonly StackEntry<F>[],
  pick: (fields: F) => T | undefined,
  fallback: T,
): ResolvedScalar<T> {
  let resolved: ResolvedScalar<T> = { value: fallback, origin: DEFAULT_ORIGIN };
  for (const entry of stack) {
    const value = pick(entry.fields);
    if (isSet(value)) {
      resolved = { value, origin: entry.origin };
    }
  }
  return resolved;
}
