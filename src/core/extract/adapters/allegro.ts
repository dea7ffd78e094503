import { BaseAdapter } from './base.js';
import type { ExtractionStrategy } from '../types.js';
import { structuredDataStrategy } from '../strategies/structured-data.js';
import { createMarkupStrategy } from '../strategies/semantic-markup.js';
import { rawTextStrategy } from '../strategies/raw-text.js';

export class AllegroAdapter extends BaseAdapter {
  readonly platform = 'allegro';
  readonly domains = ['allegro.pl'];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    createMarkupStrategy({
      price: ['meta[itemprop="price"]', '[aria-label^="cena" i]'],
      description: ['[data-box-name="Description"]'],
      seller: ['[data-box-name="Seller"] a'],
    }),
    rawTextStrategy,
  ];

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}
