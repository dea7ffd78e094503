// src/core/discover/base.ts
import * as cheerio from 'cheerio';
import type { ListingStub, Platform } from '../types/index.js';
import type { PageFetcher } from '../fetch/types.js';
import type { DiscoveryAdapter } from './types.js';
import { buildStub } from '../extract/listing.js';
import { resolveUrl } from '../fetch/utils.js';
import { collapseWhitespace, findPriceInText, truncateText } from '../normalize/index.js';
import { errorMessage } from '../errors.js';
import { SEARCH_RESULT_LIMIT, STUB_TITLE_MAX_LENGTH, STUB_TITLE_MIN_LENGTH } from '../config/constants.js';

interface Candidate {
  url: string;
  text: string;
}

export function encodeKeyword(keyword: string): string {
  return encodeURIComponent(keyword.trim()).replace(/%20/g, '+');
}

export abstract class BaseDiscoveryAdapter implements DiscoveryAdapter {
  abstract readonly platform: Platform;

  /** Result links are recognized by their URL shape. */
  protected abstract readonly linkPattern: RegExp;

  constructor(protected readonly fetcher: PageFetcher) {}

  abstract buildSearchUrl(keyword: string): string;

  async search(keyword: string, priceCeiling: number): Promise<ListingStub[]> {
    const searchUrl = this.buildSearchUrl(keyword);

    let html: string;
    try {
      ({ html } = await this.fetcher.fetchPage(searchUrl));
    } catch (error) {
      console.error(`[Search] ${this.platform} "${keyword}" failed: ${errorMessage(error)}`);
      return [];
    }

    return this.parseResults(html, searchUrl, priceCeiling);
  }

  parseResults(html: string, searchUrl: string, priceCeiling: number): ListingStub[] {
    const stubs: ListingStub[] = [];

    for (const candidate of this.collectCandidates(html, searchUrl)) {
      const text = collapseWhitespace(candidate.text);
      if (text.length < STUB_TITLE_MIN_LENGTH) continue;

      const price = findPriceInText(text);
      if (price !== null && (price < 0 || price > priceCeiling)) continue;

      stubs.push(buildStub(candidate.url, truncateText(text, STUB_TITLE_MAX_LENGTH), price, this.platform));
    }

    return stubs;
  }

  /**
   * Result anchors grouped by listing URL (query and fragment dropped). A
   * listing card often links twice, image and caption, so the longest text wins.
   */
  private collectCandidates(html: string, searchUrl: string): Candidate[] {
    const $ = cheerio.load(html);
    const byUrl = new Map<string, Candidate>();

    for (const element of $('a[href]').toArray()) {
      const anchor = $(element);
      const resolved = resolveUrl(anchor.attr('href') ?? '', searchUrl);
      if (!resolved) continue;

      const url = stripQuery(resolved);
      if (!this.linkPattern.test(url)) continue;

      const text = anchor.text();
      const existing = byUrl.get(url);
      if (!existing) {
        if (byUrl.size >= SEARCH_RESULT_LIMIT) continue;
        byUrl.set(url, { url, text });
      } else if (text.trim().length > existing.text.trim().length) {
        existing.text = text;
      }
    }

    return [...byUrl.values()];
  }
}

function stripQuery(url: string): string {
  const parsed = new URL(url);
  parsed.search = '';
  parsed.hash = '';
  return parsed.toString();
}
