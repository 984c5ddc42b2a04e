export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Deep merge two objects, with the second object taking precedence. Arrays are replaced, not merged.
 */
export function deepMerge(target: Record<string, unknown>, source: Record<string, unknown>): Record<string, unknown> {
  const result: Record<string, unknown> = { ...target };

  for (const [key, value] of Object.entries(source)) {
    const existing = result[key];
    if (isPlainObject(value)) {
      result[key] = deepMerge(isPlainObject(existing) ? existing : {}, value);
    } else {
      result[key] = value;
    }
  }

  return result;
}
