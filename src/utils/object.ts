/**
 * Utility helpers operating on plain JavaScript objects.
 */

/**
 * Returns a shallow copy of the provided record without any `undefined` values.
 *
 * Useful when building objects that expose optional fields while the inputs
 * surface `undefined` explicitly (e.g. optional zod fields), so serialised
 * payloads never carry `"key": undefined` placeholders.
 */
export function omitUndefinedEntries<T extends Record<string, unknown>>(
  entries: T,
): Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> {
  const result: Partial<{ [K in keyof T]: Exclude<T[K], undefined> }> = {};
  for (const key of Object.keys(entries) as (keyof T)[]) {
    const value = entries[key];
    if (value !== undefined) {
      result[key] = value as Exclude<T[typeof key], undefined>;
    }
  }
  return result;
}
