// src/core/extract/strategies/raw-text.ts
import type { CheerioAPI } from 'cheerio';
import type { ExtractionStrategy, ListingDraft } from '../types.js';
import { findPriceInText } from '../../normalize/index.js';
import { resolveUrl } from '../../fetch/utils.js';

const VOIVODESHIPS = [
  'dolnośląskie',
  'kujawsko-pomorskie',
  'lubelskie',
  'lubuskie',
  'łódzkie',
  'małopolskie',
  'mazowieckie',
  'opolskie',
  'podkarpackie',
  'podlaskie',
  'pomorskie',
  'śląskie',
  'świętokrzyskie',
  'warmińsko-mazurskie',
  'wielkopolskie',
  'zachodniopomorskie',
];

// "Bielsko-Biała, śląskie", "Nowy Sącz, woj. małopolskie"
const LOCATION_PATTERN = new RegExp(
  `(\\p{Lu}[\\p{L}-]*(?: \\p{Lu}[\\p{L}-]*)*),\\s*(?:woj\\.\\s*)?(${VOIVODESHIPS.join('|')})(?!\\p{L})`,
  'u'
);

const CONDITION_PATTERN = /Stan:\s*([^\n]{1,60})/i;

export const DESCRIPTION_MARKERS = ['Polecam', 'Sprzedam', 'Oferuję', 'Zapraszam', 'Stan:'];

const IGNORED_IMAGE = /\.svg(?:\?|$)|logo|icon|avatar|sprite|pixel/i;

export interface RawTextOptions {
  /** Keeps only the images a platform actually uses for listing photos. */
  imageFilter?: (url: string) => boolean;
}

/**
 * Last resort: regex heuristics over the visible text.
 */
export function createRawTextStrategy(options: RawTextOptions = {}): ExtractionStrategy {
  return {
    name: 'raw-text',
    run({ $, page, text }) {
      const draft: ListingDraft = {
        title: pageTitle($),
        description: descriptionSnippet(text),
        condition: text.match(CONDITION_PATTERN)?.[1]?.trim(),
        location: findLocation(text),
        images: pageImages($, page.url, options.imageFilter),
      };

      const price = findPriceInText(text);
      if (price !== null && price > 0) {
        draft.price = price;
      }

      return draft;
    },
  };
}

export const rawTextStrategy = createRawTextStrategy();

export function findLocation(text: string): string | undefined {
  const match = text.match(LOCATION_PATTERN);
  if (!match) return undefined;
  return `${match[1]}, ${match[2]}`;
}

export function descriptionSnippet(text: string): string | undefined {
  for (const marker of DESCRIPTION_MARKERS) {
    const index = text.indexOf(marker);
    if (index !== -1) {
      return text.slice(index);
    }
  }
  return text || undefined;
}

function pageTitle($: CheerioAPI): string | undefined {
  const candidates = [$('h1').first().text(), $('title').first().text()];
  for (const candidate of candidates) {
    const value = candidate.replace(/\s+/g, ' ').trim();
    if (value) return value;
  }
  return undefined;
}

function pageImages($: CheerioAPI, baseUrl: string, filter?: (url: string) => boolean): string[] {
  const images: string[] = [];

  for (const element of $('img').toArray()) {
    const node = $(element);
    const raw = node.attr('data-src') ?? node.attr('src');
    const resolved = raw ? resolveUrl(raw, baseUrl) : undefined;
    if (!resolved || images.includes(resolved)) continue;

    const keep = filter ? filter(resolved) : !IGNORED_IMAGE.test(resolved);
    if (keep) images.push(resolved);
  }

  return images;
}
