// src/core/extract/strategies/structured-data.ts
import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy, ListingDraft } from '../types.js';
import { mergeDraft } from '../chain.js';
import { parsePrice } from '../../normalize/index.js';
import {
  firstRecord,
  isRecord,
  pickString,
  readImageUrls,
  readLocation,
  readString,
  type JsonRecord,
} from './json.js';

const MAX_SEARCH_DEPTH = 8;

/**
 * Embedded JSON payloads: JSON-LD blocks first, then inline application/json
 * state blobs. The first listing-shaped object in each payload contributes.
 */
export const structuredDataStrategy: ExtractionStrategy = {
  name: 'structured-data',
  run({ $, page }) {
    let draft: ListingDraft = {};

    for (const payload of collectEmbeddedJson($)) {
      const record = findListingRecord(payload);
      if (record) {
        draft = mergeDraft(draft, draftFromRecord(record, page.url));
      }
    }

    return draft;
  },
};

export function collectEmbeddedJson($: CheerioAPI): unknown[] {
  const payloads: unknown[] = [];
  const scripts = [
    ...$('script[type="application/ld+json"]').toArray(),
    ...$('script[type="application/json"]').toArray(),
  ];

  for (const script of scripts) {
    const source = $(script).text().trim();
    if (!source) continue;

    try {
      payloads.push(JSON.parse(source));
    } catch {
      // Not every script block is valid JSON; skip it.
      continue;
    }
  }

  return payloads;
}

/**
 * Breadth-first search for an object that carries both a name and a price.
 */
export function findListingRecord(payload: unknown): JsonRecord | undefined {
  let level: unknown[] = [payload];

  for (let depth = 0; depth <= MAX_SEARCH_DEPTH && level.length > 0; depth++) {
    const next: unknown[] = [];

    for (const value of level) {
      if (Array.isArray(value)) {
        next.push(...value);
        continue;
      }
      if (!isRecord(value)) continue;

      if (isListingRecord(value)) {
        return value;
      }
      next.push(...Object.values(value));
    }

    level = next;
  }

  return undefined;
}

function isListingRecord(record: JsonRecord): boolean {
  const hasName = readString(record.name) !== undefined || readString(record.title) !== undefined;
  const hasPrice = record.offers !== undefined || record.price !== undefined;
  return hasName && hasPrice;
}

export function draftFromRecord(record: JsonRecord, baseUrl: string): ListingDraft {
  const offer = firstRecord(record.offers);
  const seller = firstRecord(record.seller) ?? (offer ? firstRecord(offer.seller) : undefined);
  const place = record.location ?? record.address ?? offer?.availableAtOrFrom;

  const draft: ListingDraft = {
    title: pickString(record, ['name', 'title']),
    description: readString(record.description),
    condition:
      pickString(record, ['itemCondition', 'condition', 'status']) ??
      (offer ? readString(offer.itemCondition) : undefined),
    seller: seller ? pickString(seller, ['name', 'login']) : readString(record.seller),
    location: readLocation(place),
    images: readImageUrls(record.photos ?? record.image ?? [], baseUrl),
  };

  const price = readOfferPrice(offer) ?? readPriceValue(record.price);
  if (price !== undefined) {
    draft.price = price;
  }

  return draft;
}

function readOfferPrice(offer: JsonRecord | undefined): number | undefined {
  if (!offer) return undefined;
  return readPriceValue(offer.price) ?? readPriceValue(offer.lowPrice);
}

function readPriceValue(value: unknown): number | undefined {
  // { amount: "12.0", currency_code: "PLN" }
  const raw = isRecord(value) ? value.amount : value;
  if (typeof raw !== 'string' && typeof raw !== 'number') return undefined;

  const price = parsePrice(raw);
  return price !== null && price > 0 ? price : undefined;
}
