// src/core/extractor.ts
import type { PageFetcher } from './fetch/types.js';
import type { ExtractOutcome } from './extract/types.js';
import type { ListingLimits } from './extract/listing.js';
import { AdapterRegistry, registry as defaultRegistry } from './extract/registry.js';
import { isValidUrl, normalizeUrl } from './fetch/utils.js';
import { ScoutError, ErrorCode, createExtractionFailure } from './errors.js';

export interface ExtractorOptions extends ListingLimits {
  verbose?: boolean;
}

/**
 * Fetches a listing page and runs the matching platform adapter over it.
 * Failures come back as a value; only programming errors are thrown.
 */
export class ListingExtractor {
  constructor(
    private readonly fetcher: PageFetcher,
    private readonly registry: AdapterRegistry = defaultRegistry,
    private readonly options: ExtractorOptions = {}
  ) {}

  async extract(url: string): Promise<ExtractOutcome> {
    if (!isValidUrl(url)) {
      return {
        status: 'failed',
        failure: createExtractionFailure(
          new ScoutError(ErrorCode.INVALID_URL, `Invalid URL: ${url}`, false, 'Pass an absolute http(s) URL'),
          url
        ),
      };
    }

    const normalizedUrl = normalizeUrl(url);
    const adapter = this.registry.select(normalizedUrl);

    try {
      const page = await this.fetcher.fetchPage(normalizedUrl);
      const { listing, warnings, strategies } = await adapter.extract(page, {
        fetcher: this.fetcher,
        maxDescriptionLength: this.options.maxDescriptionLength,
        maxImages: this.options.maxImages,
      });

      if (this.options.verbose) {
        console.log(`[Extract] ${adapter.platform}: ${strategies.join(' -> ')}`);
        for (const warning of warnings) {
          console.warn(`[Extract] ${warning}`);
        }
      }

      return { status: 'success', listing, warnings, strategies };
    } catch (error) {
      if (error instanceof ScoutError) {
        console.warn(`[Extract] ${error.code}: ${error.message}`);
        return { status: 'failed', failure: createExtractionFailure(error, normalizedUrl) };
      }

      throw error;
    }
  }
}
