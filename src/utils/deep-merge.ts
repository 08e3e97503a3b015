/**
 * Recursively optional view of a configuration object. Arrays are replaced, not merged.
 */
export type DeepPartial<T> = {
  [K in keyof T]?: T[K] extends readonly unknown[] ? T[K] : T[K] extends object ? DeepPartial<T[K]> : T[K];
};

/**
 * Merge `source` over `target` without mutating either. Keys missing from
 * `source` or set to undefined keep the target's value.
 */
export function deepMerge<T extends Record<string, unknown>>(target: T, source?: DeepPartial<T>): T {
  if (!source) {
    return target;
  }

  const result: Record<string, unknown> = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) continue;

    const targetValue = result[key];
    result[key] = isObject(sourceValue) && isObject(targetValue) ? deepMerge(targetValue, sourceValue) : sourceValue;
  }

  return result as T;
}

function isObject(item: unknown): item is Record<string, unknown> {
  return typeof item === 'object' && item !== null && !Array.isArray(item);
}
