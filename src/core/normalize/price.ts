// src/core/normalize/price.ts

const CURRENCY_SUFFIX = /\s*(?:zł|zl|pln)\.?$/i;
const GROUP_SEPARATORS = /[\s\u00a0\u202f]/g;

// "1 250,50 zł", "1250.5", "99 PLN". Grouping is space-only so that adjacent
// numbers on separate lines are never glued together.
const PRICE_IN_TEXT =
  /(?<![\d.,])(\d{1,3}(?:[ \u00a0\u202f]\d{3})+|\d+)(?:[.,](\d{1,2}))?[ \u00a0\u202f]*(?:zł|PLN)/i;

/**
 * Parses a locale-formatted price token into a non-negative number.
 * Returns null for anything unrecognized; callers render that as 0.
 */
export function parsePrice(token: string | number | null | undefined): number | null {
  if (typeof token === 'number') {
    return Number.isFinite(token) && token >= 0 ? token : null;
  }
  if (typeof token !== 'string') {
    return null;
  }

  const compact = token.trim().replace(CURRENCY_SUFFIX, '').replace(GROUP_SEPARATORS, '');
  if (!compact) {
    return null;
  }

  let numeric: string;
  if (/^\d{1,3}(?:\.\d{3})+,\d{1,2}$/.test(compact)) {
    // 1.250,50
    numeric = compact.replace(/\./g, '').replace(',', '.');
  } else if (/^\d{1,3}(?:,\d{3})+\.\d{1,2}$/.test(compact)) {
    // 1,250.50
    numeric = compact.replace(/,/g, '');
  } else if (/^\d+(?:[.,]\d+)?$/.test(compact)) {
    numeric = compact.replace(',', '.');
  } else {
    return null;
  }

  const value = Number(numeric);
  return Number.isFinite(value) ? value : null;
}

/**
 * Finds the first currency-marked price in free text.
 */
export function findPriceInText(text: string): number | null {
  const match = text.match(PRICE_IN_TEXT);
  if (!match) return null;

  const [, whole, fraction] = match;
  return parsePrice(fraction ? `${whole},${fraction}` : whole);
}
