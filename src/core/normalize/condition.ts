// src/core/normalize/condition.ts
import type { ListingCondition } from '../types/index.js';

const NEW_PREFIXES = ['new', 'brand new', 'nowy', 'nowa', 'nowe', 'newcondition'];
const USED_PREFIXES = ['used', 'używany', 'używana', 'używane', 'uzywany', 'uzywana', 'uzywane', 'usedcondition'];

/**
 * Maps schema.org tokens and Polish/English condition words onto
 * `new` / `used` / `unknown`. Anything else is returned as the trimmed raw phrase.
 */
export function normalizeCondition(raw: string | null | undefined): ListingCondition {
  const value = (raw ?? '').replace(/\s+/g, ' ').trim();
  if (!value) {
    return 'unknown';
  }

  // https://schema.org/UsedCondition -> usedcondition
  const token = value.replace(/^https?:\/\/schema\.org\//i, '').toLowerCase();

  if (matchesPrefix(token, NEW_PREFIXES)) return 'new';
  if (matchesPrefix(token, USED_PREFIXES)) return 'used';

  return value;
}

function matchesPrefix(token: string, prefixes: string[]): boolean {
  return prefixes.some(prefix => {
    if (!token.startsWith(prefix)) return false;
    const next = token.charAt(prefix.length);
    return next === '' || !/\p{L}/u.test(next);
  });
}
