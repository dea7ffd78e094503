// src/core/__tests__/extractor.test.ts
import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ListingExtractor } from '../extractor.js';
import { AdapterRegistry } from '../extract/registry.js';
import { FakeFetcher } from './fakes.js';

describe('ListingExtractor', () => {
  let fetcher: FakeFetcher;
  let extractor: ListingExtractor;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;

  beforeEach(() => {
    fetcher = new FakeFetcher();
    extractor = new ListingExtractor(fetcher, new AdapterRegistry());
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    warnSpy.mockRestore();
  });

  it('rejects invalid URLs without fetching', async () => {
    const outcome = await extractor.extract('nope');

    expect(outcome).toEqual({
      status: 'failed',
      failure: {
        kind: 'invalid_url',
        message: 'Invalid URL: nope',
        url: 'nope',
        retryable: false,
        suggestion: 'Pass an absolute http(s) URL',
      },
    });
    expect(fetcher.requests).toEqual([]);
  });

  it('extracts a listing from the normalized URL', async () => {
    fetcher.pages.set(
      'https://example.com/item/1',
      '<html><head><title>Ikona prawosławna</title></head><body><p>Cena: 300 zł</p></body></html>'
    );

    const outcome = await extractor.extract('https://example.com/item/1#photos');

    expect(outcome.status).toBe('success');
    if (outcome.status === 'success') {
      expect(outcome.listing.url).toBe('https://example.com/item/1');
      expect(outcome.listing.title).toBe('Ikona prawosławna');
      expect(outcome.listing.price).toBe(300);
      expect(outcome.listing.platform).toBe('other');
    }
  });

  it('reports fetch failures as a value', async () => {
    const outcome = await extractor.extract('https://gratka.pl/missing-1');

    expect(outcome).toEqual({
      status: 'failed',
      failure: {
        kind: 'fetch_error',
        message: 'HTTP 404 for https://gratka.pl/missing-1',
        url: 'https://gratka.pl/missing-1',
        retryable: false,
        suggestion: undefined,
      },
    });
    expect(warnSpy).toHaveBeenCalledWith('[Extract] fetch_error: HTTP 404 for https://gratka.pl/missing-1');
  });

  it('reports pages without a title as parse errors', async () => {
    fetcher.pages.set('https://example.com/empty', '<html><body></body></html>');

    const outcome = await extractor.extract('https://example.com/empty');

    expect(outcome.status === 'failed' && outcome.failure.kind).toBe('parse_error');
  });
});
