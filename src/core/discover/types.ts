import type { ListingStub, Platform } from '../types/index.js';

export interface DiscoveryAdapter {
  readonly platform: Platform;
  buildSearchUrl(keyword: string): string;
  search(keyword: string, priceCeiling: number): Promise<ListingStub[]>;
}

/** What the orchestrator needs from discovery. */
export interface ListingSearch {
  platforms(): Platform[];
  search(platform: Platform, keyword: string, priceCeiling: number): Promise<ListingStub[]>;
}
