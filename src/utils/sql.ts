import type { JsonValue, SampleRow } from '../modules/metadata/types/metadata.types.js';

/**
 * Quote an identifier for interpolation into SQL text: `user"s` becomes `"user""s"`.
 */
export function quoteIdent(name: string): string {
  return `"${name.replace(/"/g, '""')}"`;
}

export function qualifiedName(schemaName: string, relationName: string): string {
  return `${quoteIdent(schemaName)}.${quoteIdent(relationName)}`;
}

/**
 * Convert a driver value into something JSON.stringify/parse returns unchanged.
 */
export function toJsonValue(value: unknown): JsonValue {
  if (value === null || value === undefined) return null;
  if (typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') return Number.isFinite(value) ? value : String(value);
  if (typeof value === 'bigint') return value.toString();
  if (value instanceof Date) return Number.isNaN(value.getTime()) ? null : value.toISOString();
  if (Buffer.isBuffer(value)) return `\\x${value.toString('hex')}`;
  if (Array.isArray(value)) return value.map((item) => toJsonValue(item));
  if (typeof value === 'object') {
    const result: Record<string, JsonValue> = {};
    for (const [key, item] of Object.entries(value)) {
      result[key] = toJsonValue(item);
    }
    return result;
  }
  return String(value);
}

export function toSampleRow(row: Record<string, unknown>): SampleRow {
  const result: SampleRow = {};
  for (const [key, value] of Object.entries(row)) {
    result[key] = toJsonValue(value);
  }
  return result;
}

/**
 * Parse a count or estimate that pg may return as string (bigint) or number.
 */
export function toCount(value: unknown): number {
  const parsed = typeof value === 'number' ? value : Number(value);
  return Number.isFinite(parsed) ? parsed : 0;
}
