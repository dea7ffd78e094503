// src/core/extract/adapters/vinted/api.ts
import type { ExtractionStrategy, ListingDraft } from '../../types.js';
import { isRecord, pickString, readImageUrls, readLocation, readString } from '../../strategies/json.js';
import { parsePrice } from '../../../normalize/index.js';
import { errorMessage } from '../../../errors.js';
import { VintedApiError } from './errors.js';

const ITEM_ID_PATTERN = /\/items\/(\d+)/;

export function parseVintedItemId(url: string): string | undefined {
  return url.match(ITEM_ID_PATTERN)?.[1];
}

export function vintedItemApiUrl(pageUrl: string, itemId: string): string {
  const { origin } = new URL(pageUrl);
  return `${origin}/api/v2/items/${itemId}?localize=false`;
}

/**
 * The item endpoint answers only with the session cookie the home page sets,
 * so a session is opened against the origin first.
 */
export const vintedApiStrategy: ExtractionStrategy = {
  name: 'vinted-api',
  async run({ page, fetcher }) {
    const itemId = parseVintedItemId(page.url);
    if (!itemId) {
      throw new VintedApiError(`No item id in ${page.url}`, 'ITEM_ID_MISSING');
    }

    let cookie: string;
    try {
      cookie = await fetcher.openSession(new URL(page.url).origin);
    } catch (error) {
      throw new VintedApiError(
        `Could not open a session: ${errorMessage(error)}`,
        'SESSION_FAILED',
        error instanceof Error ? error : undefined
      );
    }

    const headers: Record<string, string> = cookie ? { Cookie: cookie } : {};
    const payload = await fetcher.fetchJson(vintedItemApiUrl(page.url, itemId), { headers });
    return parseItemPayload(payload, page.url);
  },
};

export function parseItemPayload(payload: unknown, baseUrl: string): ListingDraft {
  const item = isRecord(payload) ? payload.item : undefined;
  if (!isRecord(item)) {
    throw new VintedApiError('Item payload has no "item" object', 'INVALID_PAYLOAD');
  }

  const user = isRecord(item.user) ? item.user : undefined;
  const draft: ListingDraft = {
    title: readString(item.title),
    description: readString(item.description),
    condition: pickString(item, ['status', 'status_title']),
    seller: user ? pickString(user, ['login', 'name']) : undefined,
    location: readLocation(user ?? item),
    images: readImageUrls(item.photos ?? [], baseUrl),
  };

  const rawPrice = isRecord(item.price) ? item.price.amount : item.price;
  const price = typeof rawPrice === 'string' || typeof rawPrice === 'number' ? parsePrice(rawPrice) : null;
  if (price !== null && price > 0) {
    draft.price = price;
  }

  return draft;
}
