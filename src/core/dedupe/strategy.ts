// src/core/dedupe/strategy.ts
import { normalizeUrl } from '../fetch/utils.js';

/** Listings are identified by their URL alone, fragment dropped. */
export function getDedupeKey(url: string): string {
  try {
    return normalizeUrl(url);
  } catch {
    return url.trim();
  }
}
