// src/core/classify/prompt.ts
import type { Listing } from '../types/index.js';
import { DEFAULT_MAX_PRICE, DEFAULT_MIN_MARGIN_PERCENT } from '../config/constants.js';

export interface PromptProfile {
  maxPrice: number;
  minMarginPercent: number;
  homeCity: string;
}

export const DEFAULT_PROFILE: PromptProfile = {
  maxPrice: DEFAULT_MAX_PRICE,
  minMarginPercent: DEFAULT_MIN_MARGIN_PERCENT,
  homeCity: 'Katowice',
};

export function buildSystemPrompt(profile: PromptProfile = DEFAULT_PROFILE): string {
  return `You appraise antiques, collectibles and militaria on the Polish second-hand market.
Review the offer and recommend whether to buy it.

BUYER:
- Reseller based in ${profile.homeCity}: PRL-era comics, porcelain, vintage watches, edged weapons, paintings, collectible books
- Maximum purchase price: ${profile.maxPrice} zł per item
- Minimum margin: ${profile.minMarginPercent}%
- Pickup in person up to 2 hours from ${profile.homeCity}; shipping is fine when offered

YOUR ANSWER MUST COVER:
1. IDENTIFICATION: what the item is, original or replica, key features.
2. RED FLAGS: "new" condition on antiques, missing signatures, replica-level price, a terse description.
3. MARKET VALUE: a realistic price range for an original, written as "<low>-<high> zł".
4. CALCULATION: purchase price against realistic resale price, margin in %.
5. VERDICT: exactly one of 🟢 KUP (margin ${profile.minMarginPercent}%+, certain original), 🟡 NEGOCJUJ (potential but overpriced), 🟠 ZBADAJ (needs an in-person look), ❌ OMIŃ (replica, overpriced or no margin).

Keep it under 300 words. Answer in Polish.`;
}

export function buildListingPrompt(listing: Listing): string {
  const price = listing.price > 0 ? `${listing.price} zł` : 'unknown';

  return [
    'Analyze this offer:',
    '',
    `TITLE: ${listing.title}`,
    `PRICE: ${price}`,
    `CONDITION: ${listing.condition === 'unknown' ? 'not stated' : listing.condition}`,
    `PLATFORM: ${listing.platform}`,
    `LOCATION: ${listing.location}`,
    `SELLER: ${listing.seller}`,
    `DESCRIPTION: ${listing.description}`,
    `URL: ${listing.url}`,
    `PHOTOS: ${listing.images.length}`,
  ].join('\n');
}
