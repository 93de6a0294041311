/**
 * Helpers for plain JSON trees
 */

import type { FieldPath, JsonObject, JsonValue } from './types.js';

export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Convert an arbitrary value (client model instances, Dates) into a plain
 * JSON tree. Undefined members and functions are dropped.
 */
export function toJsonValue(value: unknown): JsonValue | undefined {
  if (value === null) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (value instanceof Date) return value.toISOString();

  if (Array.isArray(value)) {
    return value.map((item) => toJsonValue(item) ?? null);
  }

  if (typeof value === 'object') {
    const result: JsonObject = {};
    for (const [key, entry] of Object.entries(value)) {
      const converted = toJsonValue(entry);
      if (converted !== undefined) {
        result[key] = converted;
      }
    }
    return result;
  }

  return undefined;
}

/**
 * Convert to a JSON object, or undefined when the value is not an object
 */
export function toJsonObject(value: unknown): JsonObject | undefined {
  const converted = toJsonValue(value);
  return isJsonObject(converted) ? converted : undefined;
}

export function deepEqual(a: JsonValue | undefined, b: JsonValue | undefined): boolean {
  if (a === b) return true;
  if (a === undefined || b === undefined || a === null || b === null) return false;

  if (Array.isArray(a)) {
    return Array.isArray(b) && a.length === b.length && a.every((item, i) => deepEqual(item, b[i]));
  }

  if (isJsonObject(a)) {
    if (!isJsonObject(b)) return false;
    const keys = Object.keys(a);
    if (keys.length !== Object.keys(b).length) return false;
    return keys.every((key) => key in b && deepEqual(a[key], b[key]));
  }

  return false;
}

export function deepClone<T extends JsonValue>(value: T): T {
  return structuredClone(value);
}

/**
 * Recursively freeze a JSON tree in place and return it
 */
export function deepFreeze<T extends JsonValue>(value: T): T {
  if (Array.isArray(value)) {
    value.forEach((item) => deepFreeze(item));
    Object.freeze(value);
  } else if (isJsonObject(value)) {
    Object.values(value).forEach((item) => deepFreeze(item));
    Object.freeze(value);
  }
  return value;
}

export function getPath(root: JsonValue | undefined, path: FieldPath): JsonValue | undefined {
  let current = root;
  for (const key of path) {
    if (!isJsonObject(current)) return undefined;
    current = current[key];
  }
  return current;
}

export function getString(root: JsonValue | undefined, path: FieldPath): string | undefined {
  const value = getPath(root, path);
  return typeof value === 'string' ? value : undefined;
}

export function getNumber(root: JsonValue | undefined, path: FieldPath): number | undefined {
  const value = getPath(root, path);
  return typeof value === 'number' ? value : undefined;
}

export function getObject(root: JsonValue | undefined, path: FieldPath): JsonObject | undefined {
  const value = getPath(root, path);
  return isJsonObject(value) ? value : undefined;
}

export function getArray(root: JsonValue | undefined, path: FieldPath): JsonValue[] | undefined {
  const value = getPath(root, path);
  return Array.isArray(value) ? value : undefined;
}

/**
 * Return a copy of `root` with `value` stored at `path`, creating
 * intermediate objects as needed. The input is not modified.
 */
export function setPath(root: JsonObject, path: FieldPath, value: JsonValue): JsonObject {
  if (path.length === 0) {
    return isJsonObject(value) ? { ...value } : root;
  }
  const [head, ...rest] = path;
  const child = root[head];
  return {
    ...root,
    [head]: rest.length === 0 ? value : setPath(isJsonObject(child) ? child : {}, rest, value),
  };
}

/**
 * Return a copy of `root` without the member at `path`
 */
export function removePath(root: JsonObject, path: FieldPath): JsonObject {
  if (path.length === 0) return root;
  const [head, ...rest] = path;
  if (!(head in root)) return root;

  if (rest.length === 0) {
    const { [head]: _removed, ...remaining } = root;
    return remaining;
  }

  const child = root[head];
  if (!isJsonObject(child)) return root;
  return { ...root, [head]: removePath(child, rest) };
}

export function formatPath(path: FieldPath): string {
  return path.join('.');
}
