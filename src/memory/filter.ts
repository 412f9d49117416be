import type { FilterValue } from "../types/memory.js";

/** Reads a dotted path such as `metadata.type` from a plain object tree. */
export function readPath(target: Record<string, unknown>, path: string): unknown {
  let current: unknown = target;
  for (const segment of path.split(".")) {
    if (typeof current !== "object" || current === null || Array.isArray(current)) {
      return undefined;
    }
    current = Object.hasOwn(current, segment)
      ? Reflect.get(current, segment)
      : undefined;
  }
  return current;
}

/**
 * Equality with keyword-index semantics: an array field matches when any
 * element equals the expected value.
 */
export function matchesValue(actual: unknown, expected: FilterValue): boolean {
  if (Array.isArray(actual)) {
    return actual.some((element) => element === expected);
  }
  return actual === expected;
}

export function matchesFilter(
  target: Record<string, unknown>,
  filter: Record<string, FilterValue> | undefined,
): boolean {
  if (!filter) return true;
  return Object.entries(filter).every(([path, expected]) =>
    matchesValue(readPath(target, path), expected),
  );
}
