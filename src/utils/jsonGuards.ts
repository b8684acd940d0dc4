/**
 * Narrowing helpers for JSON that arrives from the wire as `unknown`.
 */

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(record: JsonRecord, key: string): string | undefined {
  const value = record[key];
  return typeof value === 'string' ? value : undefined;
}

export function readNumber(record: JsonRecord, key: string): number | undefined {
  const value = record[key];
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readBoolean(record: JsonRecord, key: string): boolean | undefined {
  const value = record[key];
  return typeof value === 'boolean' ? value : undefined;
}

/**
 * null and missing both read as null; any other non-string is rejected
 * as undefined so callers can tell "absent" from "wrong type".
 */
export function readNullableString(record: JsonRecord, key: string): string | null | undefined {
  const value = record[key];
  if (value === null || value === undefined) return null;
  return typeof value === 'string' ? value : undefined;
}

export function readNullableNumber(record: JsonRecord, key: string): number | null | undefined {
  const value = record[key];
  if (value === null || value === undefined) return null;
  return typeof value === 'number' && Number.isFinite(value) ? value : undefined;
}

export function readStringArray(record: JsonRecord, key: string): string[] | null | undefined {
  const value = record[key];
  if (value === null || value === undefined) return null;
  if (!Array.isArray(value)) return undefined;
  const items: string[] = [];
  for (const item of value) {
    if (typeof item !== 'string') return undefined;
    items.push(item);
  }
  return items;
}
