import { BaseAdapter } from './base.js';
import type { ExtractionStrategy } from '../types.js';
import { structuredDataStrategy } from '../strategies/structured-data.js';
import { createMarkupStrategy } from '../strategies/semantic-markup.js';
import { rawTextStrategy } from '../strategies/raw-text.js';

export class GratkaAdapter extends BaseAdapter {
  readonly platform = 'gratka';
  readonly domains = ['gratka.pl'];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    createMarkupStrategy({
      price: ['[class*="priceInfo" i]', '[data-cy="price"]'],
      description: ['[class*="description" i]', '[data-cy="description"]'],
      location: ['[class*="location" i] span', '[data-cy="location"]'],
    }),
    rawTextStrategy,
  ];

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}
