/**
 * Recursively freezes a plain object graph in place. Used for configuration
 * objects shared across concurrent runs.
 */
export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === "object" && !Object.isFrozen(value)) {
    Object.freeze(value);
    for (const child of Object.values(value)) {
      deepFreeze<unknown>(child);
    }
  }
  return value;
}
