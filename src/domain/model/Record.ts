/** Any value JSON can carry. Narrowed with `typeof` and `Array.isArray`. */
export type JsonValue = string | number | boolean | null | readonly JsonValue[] | JsonObject;

export interface JsonObject {
  readonly [key: string]: JsonValue;
}

/** One JSON object instance of (part of) a schema's shape. */
export type JsonRecord = JsonObject;

/** Check whether a value is a plain JSON object (not `null`, not an array). */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set an own enumerable entry. Unlike `target[key] = value`, a `__proto__` key
 * becomes a plain entry instead of replacing the prototype.
 */
export function setEntry<T>(target: Record<string, T>, key: string, value: T): void {
  Object.defineProperty(target, key, { value, enumerable: true, writable: true, configurable: true });
}

/** Render any JSON value as text: strings unchanged, scalars via `String`, nested values as JSON. */
export function stringifyValue(value: JsonValue): string {
  if (typeof value === 'string') return value;
  if (value === null || typeof value === 'number' || typeof value === 'boolean') return String(value);
  return JSON.stringify(value);
}
