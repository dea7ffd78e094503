// src/core/extract/adapters/olx.ts
import { BaseAdapter } from './base.js';
import type { ExtractionStrategy } from '../types.js';
import { structuredDataStrategy } from '../strategies/structured-data.js';
import { createMarkupStrategy } from '../strategies/semantic-markup.js';
import { rawTextStrategy } from '../strategies/raw-text.js';

/**
 * OLX renders most of the page client-side, but ships the offer as JSON-LD
 * and keeps stable data-testid / data-cy hooks on the server-rendered parts.
 */
export class OlxAdapter extends BaseAdapter {
  readonly platform = 'olx';
  readonly domains = ['olx.pl'];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    createMarkupStrategy({
      title: ['[data-cy="ad_title"]', '[data-testid="ad_title"]'],
      price: ['[data-testid="ad-price-container"]'],
      description: ['[data-cy="ad_description"]', '[data-testid="ad_description"]'],
      seller: ['[data-testid="user-profile-user-name"]'],
      location: ['[data-testid="location-date"]'],
    }),
    rawTextStrategy,
  ];

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}
