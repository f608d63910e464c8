/**
 * Shape checks for decoded JSON. Wire objects are checked only for the
 * fields the CLI reads; unknown fields pass through untouched.
 */

export type JsonObject = Record<string, unknown>;

export function isObject(value: unknown): value is JsonObject {
  return value !== null && typeof value === 'object' && !Array.isArray(value);
}

export function isOptionalString(value: unknown): value is string | undefined {
  return value === undefined || typeof value === 'string';
}

export function isOptionalBoolean(value: unknown): value is boolean | undefined {
  return value === undefined || typeof value === 'boolean';
}

export function isOptionalNumber(value: unknown): value is number | undefined {
  return value === undefined || typeof value === 'number';
}

/** `{ data: T[] }` with every element accepted by `item`. */
export function isDataList<T>(
  value: unknown,
  item: (v: unknown) => v is T,
): value is { data: T[] } & JsonObject {
  return isObject(value) && Array.isArray(value['data']) && value['data'].every(item);
}
