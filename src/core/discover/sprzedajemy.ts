import { BaseDiscoveryAdapter, encodeKeyword } from './base.js';

export class SprzedajemyDiscovery extends BaseDiscoveryAdapter {
  readonly platform = 'sprzedajemy';
  protected readonly linkPattern = /-nr\d+/;

  buildSearchUrl(keyword: string): string {
    return `https://sprzedajemy.pl/szukaj?inp_text=${encodeKeyword(keyword)}`;
  }
}
