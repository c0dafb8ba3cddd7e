import type { JsonObject, JsonValue } from './actions.js';

/** Current time as an ISO-8601 UTC string. */
export function now(): string {
  return new Date().toISOString();
}

/** Type guard: checks that a value is a non-null, non-array object. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Deep check that a value is representable as JSON. */
export function isJsonValue(value: unknown): value is JsonValue {
  if (value === null) return true;
  switch (typeof value) {
    case 'string':
    case 'boolean':
      return true;
    case 'number':
      return Number.isFinite(value);
    case 'object':
      if (Array.isArray(value)) return value.every(isJsonValue);
      return isRecord(value) && Object.values(value).every(isJsonValue);
    default:
      return false;
  }
}

/** Type guard for JSON object literals. */
export function isJsonObject(value: unknown): value is JsonObject {
  return isRecord(value) && isJsonValue(value);
}

/** Message of an unknown thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
