import { BaseDiscoveryAdapter, encodeKeyword } from './base.js';

export class GratkaDiscovery extends BaseDiscoveryAdapter {
  readonly platform = 'gratka';
  protected readonly linkPattern = /gratka\.pl\/.*\d/;

  buildSearchUrl(keyword: string): string {
    return `https://gratka.pl/szukaj?q=${encodeKeyword(keyword)}`;
  }
}
