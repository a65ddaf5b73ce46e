import { ResponseShapeError } from '../errors.js';
import type { JsonObject } from '../types/index.js';

export function isRecord(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function expectRecord(value: unknown, path: string): JsonObject {
  if (!isRecord(value)) {
    throw new ResponseShapeError(`${path} must be an object`);
  }
  return value;
}

/** Map of id to object. A missing map reads as empty. */
export function expectRecordMap(value: unknown, path: string): Record<string, JsonObject> {
  if (value === undefined || value === null) {
    return {};
  }

  const map = expectRecord(value, path);
  const result: Record<string, JsonObject> = {};
  for (const [key, entry] of Object.entries(map)) {
    result[key] = expectRecord(entry, `${path}.${key}`);
  }
  return result;
}

export function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) {
    throw new ResponseShapeError(`${path} must be an array`);
  }
  return value;
}

export function expectStringArray(value: unknown, path: string): string[] {
  return expectArray(value, path).map((item, index) => {
    if (typeof item !== 'string') {
      throw new ResponseShapeError(`${path}[${index}] must be a string`);
    }
    return item;
  });
}

export function optionalString(value: unknown): string | null {
  return typeof value === 'string' && value.length > 0 ? value : null;
}

export function optionalNumber(value: unknown): number | null {
  return typeof value === 'number' && Number.isFinite(value) ? value : null;
}
