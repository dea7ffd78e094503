// src/core/extract/listing.ts
import { createHash } from 'node:crypto';
import type { Listing, ListingStub, Platform } from '../types/index.js';
import type { ListingDraft } from './types.js';
import { MAX_DESCRIPTION_LENGTH, MAX_IMAGES } from '../config/constants.js';
import { cleanText, collapseWhitespace, normalizeCondition, truncateText } from '../normalize/index.js';

const MANUAL_TITLE_LENGTH = 50;

export interface ListingLimits {
  maxDescriptionLength?: number;
  maxImages?: number;
}

export function listingId(url: string): string {
  return createHash('md5').update(url).digest('hex').slice(0, 12);
}

export function buildListing(
  draft: ListingDraft,
  url: string,
  platform: Platform,
  limits: ListingLimits = {}
): Listing {
  const maxDescriptionLength = limits.maxDescriptionLength ?? MAX_DESCRIPTION_LENGTH;
  const maxImages = limits.maxImages ?? MAX_IMAGES;

  return {
    id: listingId(url),
    url,
    title: collapseWhitespace(draft.title ?? ''),
    price: draft.price !== undefined && draft.price > 0 ? draft.price : 0,
    platform,
    scrapedAt: new Date().toISOString(),
    description: truncateText(cleanText(draft.description ?? ''), maxDescriptionLength),
    condition: normalizeCondition(draft.condition),
    seller: collapseWhitespace(draft.seller ?? ''),
    location: collapseWhitespace(draft.location ?? ''),
    images: dedupeImages(draft.images ?? []).slice(0, maxImages),
  };
}

export function buildStub(url: string, title: string, price: number | null, platform: Platform): ListingStub {
  return {
    id: listingId(url),
    url,
    title,
    price: price ?? 0,
    platform,
    scrapedAt: new Date().toISOString(),
  };
}

/**
 * A listing typed in by hand. It has no URL and never enters the seen-set.
 */
export function createManualListing(text: string, limits: ListingLimits = {}): Listing {
  const description = cleanText(text);

  return {
    id: listingId(description),
    url: '',
    title: truncateText(collapseWhitespace(description), MANUAL_TITLE_LENGTH),
    price: 0,
    platform: 'manual',
    scrapedAt: new Date().toISOString(),
    description: truncateText(description, limits.maxDescriptionLength ?? MAX_DESCRIPTION_LENGTH),
    condition: 'unknown',
    seller: '',
    location: '',
    images: [],
  };
}

export function isDedupable(listing: ListingStub): boolean {
  return listing.platform !== 'manual' && listing.url.length > 0;
}

function dedupeImages(images: string[]): string[] {
  return [...new Set(images.filter(image => image.length > 0))];
}
