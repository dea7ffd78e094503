// src/core/discover/service.ts
import type { ListingStub, Platform } from '../types/index.js';
import type { PageFetcher } from '../fetch/types.js';
import type { DiscoveryAdapter, ListingSearch } from './types.js';
import { SprzedajemyDiscovery } from './sprzedajemy.js';
import { GratkaDiscovery } from './gratka.js';

export class DiscoveryService implements ListingSearch {
  private readonly adapters: DiscoveryAdapter[];

  constructor(fetcher: PageFetcher, adapters?: DiscoveryAdapter[]) {
    this.adapters = adapters ?? [new SprzedajemyDiscovery(fetcher), new GratkaDiscovery(fetcher)];
  }

  platforms(): Platform[] {
    return this.adapters.map(adapter => adapter.platform);
  }

  /** Platforms without discovery support yield no stubs. */
  async search(platform: Platform, keyword: string, priceCeiling: number): Promise<ListingStub[]> {
    const adapter = this.adapters.find(a => a.platform === platform);
    if (!adapter) {
      return [];
    }
    return adapter.search(keyword, priceCeiling);
  }
}
