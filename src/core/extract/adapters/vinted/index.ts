// src/core/extract/adapters/vinted/index.ts
import { BaseAdapter } from '../base.js';
import type { ExtractionStrategy } from '../../types.js';
import { structuredDataStrategy } from '../../strategies/structured-data.js';
import { createMarkupStrategy } from '../../strategies/semantic-markup.js';
import { rawTextStrategy } from '../../strategies/raw-text.js';
import { vintedApiStrategy } from './api.js';

export class VintedAdapter extends BaseAdapter {
  readonly platform = 'vinted';
  readonly domains = ['vinted.pl', 'vinted.com', 'vinted.de', 'vinted.fr'];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    vintedApiStrategy,
    createMarkupStrategy({
      title: ['[data-testid="item-page-summary-plugin"] h1'],
      price: ['[data-testid="item-price"]'],
      description: ['[itemprop="description"]', '[data-testid="item-description"]'],
      seller: ['[data-testid="profile-username"]'],
    }),
    rawTextStrategy,
  ];

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}

export { VintedApiError } from './errors.js';
export { parseItemPayload, parseVintedItemId } from './api.js';
