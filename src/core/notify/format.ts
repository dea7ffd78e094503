// src/core/notify/format.ts
import type { Listing, ListingStub } from '../types/index.js';
import { PLATFORM_LABELS } from '../types/index.js';
import { truncateText } from '../normalize/index.js';
import { VERDICT_EMOJI, computeMargin } from '../classify/verdict.js';

const ALERT_TITLE_LENGTH = 50;

export function formatPrice(price: number): string {
  return price > 0 ? `${price} zł` : 'price unknown';
}

export function formatAlert(listings: ListingStub[], accepted: number): string {
  const lines = [`🔔 NEW LISTINGS (${accepted} found)`, ''];

  listings.forEach((listing, index) => {
    lines.push(
      `${index + 1}. ${truncateText(listing.title, ALERT_TITLE_LENGTH)}`,
      `   💰 ${formatPrice(listing.price)} | 📍 ${PLATFORM_LABELS[listing.platform]}`,
      `   🔗 ${listing.url}`,
      ''
    );
  });

  if (accepted > listings.length) {
    lines.push(`...and ${accepted - listings.length} more`, '');
  }

  lines.push('💡 Run `scout analyze <url>` for a full appraisal.');
  return lines.join('\n');
}

/** Multi-line summary of one extracted listing, with its analysis if present. */
export function formatListing(listing: Listing): string {
  const lines = [
    `📦 ${listing.title}`,
    `💰 ${formatPrice(listing.price)}`,
    `📍 ${listing.location || 'no location'}`,
    `📄 Condition: ${listing.condition}`,
  ];

  if (listing.seller) lines.push(`👤 ${listing.seller}`);
  if (listing.url) lines.push(`🔗 ${listing.url}`);

  if (listing.estimatedValueLow !== undefined && listing.estimatedValueHigh !== undefined) {
    lines.push(`💎 Value: ${listing.estimatedValueLow}-${listing.estimatedValueHigh} zł`);
    const margin = computeMargin(listing);
    if (margin) {
      lines.push(`📈 Margin: ${Math.round(margin.low)}% to ${Math.round(margin.high)}%`);
    }
  }

  if (listing.analysis !== undefined) {
    const emoji = listing.verdict ? VERDICT_EMOJI[listing.verdict] : '❓';
    lines.push('', `${emoji} ${listing.verdict ?? 'SKIP'}`, '', listing.analysis);
  }

  return lines.join('\n');
}
