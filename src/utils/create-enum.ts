import { z } from 'zod';

/**
 * Helper to create enum-like object with Zod schema
 * - Creates object with uppercase keys: CACHE -> 'cache'
 * - Creates Zod schema for validation
 * - Infers TypeScript type as string literals
 *
 * @example
 * ```ts
 * const artifactSource = createEnum(['cache', 'remote'] as const);
 *
 * // artifactSource.object.REMOTE === 'remote'
 * // artifactSource.schema.parse('cache')
 * // typeof artifactSource.type === 'cache' | 'remote'
 * ```
 */
export function createEnum<const T extends readonly [string, ...string[]]>(values: T) {
  const object = Object.fromEntries(values.map((value) => [value.toUpperCase(), value])) as Record<
    Uppercase<T[number]>,
    T[number]
  >;

  return {
    values,
    object,
    schema: z.enum(values),
    type: null as unknown as T[number],
  };
}
