// src/core/extract/adapters/sprzedajemy.ts
import { BaseAdapter } from './base.js';
import type { ExtractionStrategy } from '../types.js';
import { structuredDataStrategy } from '../strategies/structured-data.js';
import { createMarkupStrategy } from '../strategies/semantic-markup.js';
import { createRawTextStrategy } from '../strategies/raw-text.js';

export class SprzedajemyAdapter extends BaseAdapter {
  readonly platform = 'sprzedajemy';
  readonly domains = ['sprzedajemy.pl'];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    createMarkupStrategy({
      price: ['span[class*="price" i]', 'span[class*="cena" i]'],
      description: ['div[class*="desc" i]', 'div[class*="opis" i]', 'div[class*="content" i]'],
      seller: ['[class*="user" i] [class*="name" i]', '[class*="user" i]'],
    }),
    // Listing photos are served from the thumbs host; everything else is chrome.
    createRawTextStrategy({ imageFilter: url => url.includes('thumbs') }),
  ];

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}
