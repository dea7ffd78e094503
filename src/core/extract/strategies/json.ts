// src/core/extract/strategies/json.ts
import { resolveUrl } from '../../fetch/utils.js';

export type JsonRecord = Record<string, unknown>;

export function isRecord(value: unknown): value is JsonRecord {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function readString(value: unknown): string | undefined {
  if (typeof value === 'string') {
    const trimmed = value.trim();
    return trimmed || undefined;
  }
  if (typeof value === 'number' && Number.isFinite(value)) {
    return String(value);
  }
  return undefined;
}

/** Returns the value itself when it is a record, or the first record of an array. */
export function firstRecord(value: unknown): JsonRecord | undefined {
  if (isRecord(value)) return value;
  if (Array.isArray(value)) return value.find(isRecord);
  return undefined;
}

export function pickString(record: JsonRecord, keys: string[]): string | undefined {
  for (const key of keys) {
    const value = readString(record[key]);
    if (value) return value;
  }
  return undefined;
}

/**
 * Accepts `"url"`, `["url", ...]`, `{ url }` and `[{ url | full_size_url | contentUrl }]`.
 */
export function readImageUrls(value: unknown, baseUrl: string): string[] {
  const items = Array.isArray(value) ? value : [value];
  const urls: string[] = [];

  for (const item of items) {
    const raw = isRecord(item)
      ? pickString(item, ['full_size_url', 'url', 'contentUrl', 'src'])
      : readString(item);
    const resolved = raw ? resolveUrl(raw, baseUrl) : undefined;
    if (resolved) urls.push(resolved);
  }

  return urls;
}

/**
 * Accepts a plain string, a schema.org Place/PostalAddress, or `{ city, region }`.
 */
export function readLocation(value: unknown): string | undefined {
  const direct = readString(value);
  if (direct) return direct;

  const record = firstRecord(value);
  if (!record) return undefined;

  const address = firstRecord(record.address);
  if (address) {
    const nested = readLocation(address);
    if (nested) return nested;
  }

  const parts = [
    pickString(record, ['addressLocality', 'city', 'city_name', 'name']),
    pickString(record, ['addressRegion', 'region', 'region_name', 'country_title']),
  ].filter((part): part is string => part !== undefined);

  return parts.length > 0 ? parts.join(', ') : undefined;
}
