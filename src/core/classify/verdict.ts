// src/core/classify/verdict.ts
import type { Listing, Verdict } from '../types/index.js';
import type { Margin, ValueRange } from './types.js';
import { parsePrice } from '../normalize/index.js';

interface VerdictMarkers {
  verdict: Verdict;
  emoji: string;
  words: string[];
}

// Checked in this order; the first hit wins.
const VERDICT_MARKERS: VerdictMarkers[] = [
  { verdict: 'BUY', emoji: '🟢', words: ['KUP', 'BUY'] },
  { verdict: 'NEGOTIATE', emoji: '🟡', words: ['NEGOCJUJ', 'NEGOTIATE'] },
  { verdict: 'INVESTIGATE', emoji: '🟠', words: ['ZBADAJ', 'INVESTIGATE'] },
];

export const VERDICT_EMOJI: Record<Verdict, string> = {
  BUY: '🟢',
  NEGOTIATE: '🟡',
  INVESTIGATE: '🟠',
  SKIP: '❌',
};

export function parseVerdict(analysis: string): Verdict {
  const text = analysis.toUpperCase();

  for (const { verdict, emoji, words } of VERDICT_MARKERS) {
    if (text.includes(emoji) || words.some(word => containsWord(text, word))) {
      return verdict;
    }
  }
  return 'SKIP';
}

/** Whole-word match: "KUP" must not fire inside "KUPIONY". */
function containsWord(text: string, word: string): boolean {
  return new RegExp(`(?<![\\p{L}\\p{N}])${word}(?![\\p{L}\\p{N}])`, 'u').test(text);
}

// Space grouping only in threes, so a year in front of the range is not glued on.
const VALUE_RANGE_PATTERN =
  /(?<![\d.,])((?:\d{1,3}(?:[ \u00a0]\d{3})+|\d+)(?:[.,]\d{1,2})?)\s*[-–—]\s*((?:\d{1,3}(?:[ \u00a0]\d{3})+|\d+)(?:[.,]\d{1,2})?)\s*(?:zł|PLN)/i;

/**
 * Pulls the first "<low>-<high> zł" estimate out of an analysis.
 */
export function parseValueRange(analysis: string): ValueRange | null {
  const match = analysis.match(VALUE_RANGE_PATTERN);
  if (!match) return null;

  const low = parsePrice(match[1]);
  const high = parsePrice(match[2]);
  if (low === null || high === null) return null;

  return low <= high ? { low, high } : { low: high, high: low };
}

/** Margins in percent, or null when the price or the estimate is unknown. */
export function computeMargin(listing: Listing): Margin | null {
  const { price, estimatedValueLow, estimatedValueHigh } = listing;
  if (price <= 0 || estimatedValueLow === undefined || estimatedValueHigh === undefined) {
    return null;
  }

  return {
    low: ((estimatedValueLow - price) / price) * 100,
    high: ((estimatedValueHigh - price) / price) * 100,
  };
}
