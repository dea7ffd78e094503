// src/core/extract/adapters/generic.ts
import { BaseAdapter } from './base.js';
import type { ExtractionStrategy } from '../types.js';
import { structuredDataStrategy } from '../strategies/structured-data.js';
import { createMarkupStrategy } from '../strategies/semantic-markup.js';
import { rawTextStrategy } from '../strategies/raw-text.js';

/**
 * Catch-all for sites without a dedicated adapter. Matches every URL.
 */
export class GenericAdapter extends BaseAdapter {
  readonly platform = 'other';
  readonly domains: string[] = [];

  private readonly chain: ExtractionStrategy[] = [
    structuredDataStrategy,
    createMarkupStrategy(),
    rawTextStrategy,
  ];

  canHandle(_url: string): boolean {
    return true;
  }

  protected strategies(): ExtractionStrategy[] {
    return this.chain;
  }
}
