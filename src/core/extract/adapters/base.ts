// src/core/extract/adapters/base.ts
import * as cheerio from 'cheerio';
import type { Adapter, AdapterContext, ExtractResult, ExtractionStrategy } from '../types.js';
import type { FetchedPage } from '../../fetch/types.js';
import type { Platform } from '../../types/index.js';
import { runFallbackChain } from '../chain.js';
import { buildListing } from '../listing.js';
import { extractPageText } from '../strategies/page-text.js';
import { ScoutError, ErrorCode } from '../../errors.js';

export abstract class BaseAdapter implements Adapter {
  abstract readonly platform: Platform;
  abstract readonly domains: string[];

  canHandle(url: string): boolean {
    try {
      const hostname = new URL(url).hostname.toLowerCase();
      return this.domains.some(domain => hostname === domain || hostname.endsWith(`.${domain}`));
    } catch {
      return false;
    }
  }

  /** Strategies in priority order; the first one to yield a title ends the chain. */
  protected abstract strategies(): ExtractionStrategy[];

  async extract(page: FetchedPage, context: AdapterContext): Promise<ExtractResult> {
    const $ = cheerio.load(page.html);
    const { draft, warnings, attempted } = await runFallbackChain(this.strategies(), {
      page,
      $,
      text: extractPageText($),
      fetcher: context.fetcher,
    });

    if (!draft.title) {
      throw new ScoutError(
        ErrorCode.PARSE_ERROR,
        `No listing title found on ${page.url}`,
        false,
        'The page may require JavaScript or the listing was removed',
        { url: page.url, platform: this.platform, warnings }
      );
    }

    const listing = buildListing(draft, page.url, this.platform, {
      maxDescriptionLength: context.maxDescriptionLength,
      maxImages: context.maxImages,
    });

    return { listing, warnings, strategies: attempted };
  }
}
