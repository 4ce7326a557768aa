/**
 * Maps each value of an object, keeping its keys
 */
export function mapValues<T, R>(obj: Record<string, T>, fn: (value: T, key: string) => R): Record<string, R> {
  const output: Record<string, R> = {};
  for (const [key, value] of Object.entries(obj)) {
    output[key] = fn(value, key);
  }
  return output;
}

/**
 * True for `undefined`, `null` and objects with no own keys
 */
export function isEmptyObject(value: unknown): boolean {
  return value === undefined || value === null || (typeof value === "object" && Object.keys(value).length === 0);
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}
