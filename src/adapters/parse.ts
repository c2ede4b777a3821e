import { isJsonObject } from '../gateway/json';
import type { JsonObject, JsonValue } from '../gateway/json';

export { isJsonObject };

const EMPTY_MARKERS = new Set(['', '-', 'n/a', 'na']);

/**
 * The gateway sends numbers as numbers, as formatted strings ("C1,234.50",
 * "12.5%"), or wrapped as `{ amount }` / `{ value }`.
 */
export function parseDecimal(value: JsonValue | undefined): number | null {
  if (value === undefined || value === null) return null;
  if (typeof value === 'number') return Number.isFinite(value) ? value : null;
  if (isJsonObject(value)) {
    if ('amount' in value) return parseDecimal(value.amount);
    if ('value' in value) return parseDecimal(value.value);
    return null;
  }
  if (typeof value !== 'string') return null;
  const trimmed = value.trim();
  if (EMPTY_MARKERS.has(trimmed.toLowerCase())) return null;
  const cleaned = trimmed.replace(/[^0-9.-]/g, '');
  if (cleaned === '' || cleaned === '-') return null;
  const n = Number(cleaned);
  return Number.isFinite(n) ? n : null;
}

export function parseInteger(value: JsonValue | undefined): number | null {
  if (typeof value === 'number') return Number.isInteger(value) ? value : null;
  if (typeof value === 'string' && /^-?\d+$/.test(value.trim())) return Number(value.trim());
  return null;
}

export function parseString(value: JsonValue | undefined): string | null {
  if (typeof value === 'string') return value;
  if (typeof value === 'number') return String(value);
  if (isJsonObject(value) && 'value' in value) return parseString(value.value);
  return null;
}

export function parseBoolean(value: JsonValue | undefined): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value === 'string') {
    const v = value.trim().toLowerCase();
    if (v === 'true') return true;
    if (v === 'false') return false;
    return null;
  }
  if (isJsonObject(value) && 'value' in value) return parseBoolean(value.value);
  return null;
}

export function asArray(value: JsonValue): JsonValue[] {
  return Array.isArray(value) ? value : [];
}

export function asRecords(value: JsonValue): JsonObject[] {
  return asArray(value).filter(isJsonObject);
}

/** First field present on the row; the gateway names some fields differently per endpoint. */
export function pick(row: JsonObject, ...keys: string[]): JsonValue | undefined {
  for (const key of keys) {
    if (row[key] !== undefined) return row[key];
  }
  return undefined;
}
