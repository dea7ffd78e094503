// src/core/extract/strategies/semantic-markup.ts
import type { CheerioAPI, Cheerio } from 'cheerio';
import type { AnyNode } from 'domhandler';
import type { ExtractionStrategy, ListingDraft } from '../types.js';
import { findPriceInText, parsePrice } from '../../normalize/index.js';
import { resolveUrl } from '../../fetch/utils.js';

export interface MarkupSelectors {
  title: string[];
  price: string[];
  description: string[];
  condition: string[];
  seller: string[];
  location: string[];
  images: string[];
}

const MAX_DESCRIPTION_PARTS = 3;

export const DEFAULT_MARKUP_SELECTORS: MarkupSelectors = {
  title: ['[itemprop="name"]', 'meta[property="og:title"]'],
  price: [
    '[itemprop="price"]',
    'meta[property="product:price:amount"]',
    'meta[property="og:price:amount"]',
    '[class*="price" i]',
    '[class*="cena" i]',
    '[id*="price" i]',
  ],
  description: [
    '[itemprop="description"]',
    '[class*="desc" i]',
    '[class*="opis" i]',
    '[id*="desc" i]',
    'meta[property="og:description"]',
  ],
  condition: ['[itemprop="itemCondition"]'],
  seller: ['[itemprop="seller"] [itemprop="name"]', '[class*="seller" i]'],
  location: ['[itemprop="addressLocality"]', '[class*="location" i]', '[class*="lokalizacja" i]'],
  images: ['meta[property="og:image"]', '[itemprop="image"]'],
};

/**
 * Builds a markup strategy. Platform selectors are tried before the defaults.
 */
export function createMarkupStrategy(extra: Partial<MarkupSelectors> = {}): ExtractionStrategy {
  const selectors = mergeSelectors(DEFAULT_MARKUP_SELECTORS, extra);

  return {
    name: 'semantic-markup',
    run({ $, page }) {
      const draft: ListingDraft = {
        title: firstValue($, selectors.title),
        description: descriptionValue($, selectors.description),
        condition: firstValue($, selectors.condition),
        seller: firstValue($, selectors.seller),
        location: firstValue($, selectors.location),
        images: imageValues($, selectors.images, page.url),
      };

      const price = priceValue($, selectors.price);
      if (price !== undefined) {
        draft.price = price;
      }

      return draft;
    },
  };
}

export function mergeSelectors(base: MarkupSelectors, extra: Partial<MarkupSelectors>): MarkupSelectors {
  return {
    title: [...(extra.title ?? []), ...base.title],
    price: [...(extra.price ?? []), ...base.price],
    description: [...(extra.description ?? []), ...base.description],
    condition: [...(extra.condition ?? []), ...base.condition],
    seller: [...(extra.seller ?? []), ...base.seller],
    location: [...(extra.location ?? []), ...base.location],
    images: [...(extra.images ?? []), ...base.images],
  };
}

function readValue(node: Cheerio<AnyNode>): string {
  const content = node.attr('content');
  const raw = content !== undefined ? content : node.text();
  return raw.replace(/\s+/g, ' ').trim();
}

function firstValue($: CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    for (const element of $(selector).toArray()) {
      const value = readValue($(element));
      if (value) return value;
    }
  }
  return undefined;
}

function priceValue($: CheerioAPI, selectors: string[]): number | undefined {
  for (const selector of selectors) {
    for (const element of $(selector).toArray()) {
      const value = readValue($(element));
      const price = parsePrice(value) ?? findPriceInText(value);
      if (price !== null && price > 0) return price;
    }
  }
  return undefined;
}

function descriptionValue($: CheerioAPI, selectors: string[]): string | undefined {
  for (const selector of selectors) {
    // Outermost matches only, so nested description wrappers are not repeated.
    const parts = $(selector)
      .toArray()
      .filter(element => $(element).parents(selector).length === 0)
      .map(element => readValue($(element)))
      .filter(value => value.length > 0)
      .slice(0, MAX_DESCRIPTION_PARTS);

    if (parts.length > 0) return parts.join('\n');
  }
  return undefined;
}

function imageValues($: CheerioAPI, selectors: string[], baseUrl: string): string[] {
  const images: string[] = [];

  for (const selector of selectors) {
    for (const element of $(selector).toArray()) {
      const node = $(element);
      const raw = node.attr('content') ?? node.attr('data-src') ?? node.attr('src') ?? node.attr('href');
      const resolved = raw ? resolveUrl(raw, baseUrl) : undefined;
      if (resolved && !images.includes(resolved)) images.push(resolved);
    }
  }

  return images;
}
