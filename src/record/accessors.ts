import type { JsonObject, JsonValue } from '../types.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Reads a nested attribute by dotted path ("profile.address.city").
 * Returns undefined when any segment is missing or not an object.
 */
export function getPath(record: JsonObject, path: string): JsonValue | undefined {
  let current: JsonValue | undefined = record;
  for (const segment of path.split('.')) {
    if (!isJsonObject(current)) return undefined;
    current = current[segment];
  }
  return current;
}

export function getString(record: JsonObject, path: string): string | undefined {
  const value = getPath(record, path);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(record: JsonObject, path: string): number | undefined {
  const value = getPath(record, path);
  return typeof value === 'number' ? value : undefined;
}

export function getBoolean(record: JsonObject, path: string): boolean | undefined {
  const value = getPath(record, path);
  return typeof value === 'boolean' ? value : undefined;
}

export function getArray(record: JsonObject, path: string): JsonValue[] | undefined {
  const value = getPath(record, path);
  return Array.isArray(value) ? value : undefined;
}

export function getObject(record: JsonObject, path: string): JsonObject | undefined {
  const value = getPath(record, path);
  return isJsonObject(value) ? value : undefined;
}
