// src/core/orchestrator.ts
import type { ListingStub } from './types/index.js';
import type { ListingSearch } from './discover/types.js';
import type { SeenSet } from './dedupe/types.js';
import type { Notifier } from './notify/types.js';
import { ScoutError, ErrorCode, errorMessage } from './errors.js';
import { ALERT_TOP_K, DEFAULT_MAX_PRICE, DEFAULT_SCAN_DELAY_MS } from './config/constants.js';

export interface ScanDependencies {
  keywords: { list(): Promise<string[]> };
  search: ListingSearch;
  seen: SeenSet;
  notifier: Notifier;
  sleep?: (ms: number) => Promise<void>;
}

export interface ScanOptions {
  maxPrice?: number;
  delayMs?: number;
  topK?: number;
  verbose?: boolean;
}

const defaultSleep = (ms: number) => new Promise<void>(resolve => setTimeout(resolve, ms));

/**
 * Stable ascending sort by price; unknown prices (0) go last.
 */
export function rankListings<T extends ListingStub>(listings: T[]): T[] {
  const key = (listing: T) => (listing.price > 0 ? listing.price : Number.POSITIVE_INFINITY);
  return listings
    .map((listing, index) => ({ listing, index }))
    .sort((a, b) => {
      const diff = key(a.listing) - key(b.listing);
      // Infinity - Infinity is NaN
      return Number.isNaN(diff) || diff === 0 ? a.index - b.index : diff;
    })
    .map(({ listing }) => listing);
}

export class ScanOrchestrator {
  private readonly maxPrice: number;
  private readonly delayMs: number;
  private readonly topK: number;
  private readonly sleep: (ms: number) => Promise<void>;

  constructor(
    private readonly deps: ScanDependencies,
    private readonly options: ScanOptions = {}
  ) {
    this.maxPrice = options.maxPrice ?? DEFAULT_MAX_PRICE;
    this.delayMs = options.delayMs ?? DEFAULT_SCAN_DELAY_MS;
    this.topK = options.topK ?? ALERT_TOP_K;
    this.sleep = deps.sleep ?? defaultSleep;
  }

  /** Runs one scan and returns the number of newly accepted listings. */
  async run(destination: string): Promise<number> {
    if (!destination.trim()) {
      console.warn('[Scan] No alert destination set, skipping scan');
      return 0;
    }

    const keywords = await this.deps.keywords.list();
    await this.deps.seen.load();
    const accepted: ListingStub[] = [];

    for (const [index, keyword] of keywords.entries()) {
      if (index > 0 && this.delayMs > 0) {
        await this.sleep(this.delayMs);
      }

      for (const platform of this.deps.search.platforms()) {
        try {
          const stubs = await this.deps.search.search(platform, keyword, this.maxPrice);
          const fresh = await this.acceptNew(stubs);
          accepted.push(...fresh);

          if (this.options.verbose) {
            console.log(`[Scan] ${platform} "${keyword}": ${stubs.length} results, ${fresh.length} new`);
          }
        } catch (error) {
          console.error(`[Scan] ${platform} "${keyword}" failed: ${errorMessage(error)}`);
        }
      }
    }

    if (accepted.length === 0) {
      console.log('[Scan] Complete: 0 new listings');
      return 0;
    }

    const top = rankListings(accepted).slice(0, this.topK);

    try {
      await this.deps.notifier.notify(destination, top, accepted.length);
    } catch (error) {
      console.error(`[Scan] Failed to send alert: ${errorMessage(error)}`);
    }

    console.log(`[Scan] Complete: ${accepted.length} new listings, ${top.length} sent`);
    return accepted.length;
  }

  /**
   * Each unseen stub is recorded before it is reported, so a crash after this
   * point never re-alerts. Duplicates inside one scan collapse to the first.
   * A failed write still reports the stub: the store already holds it in
   * memory and would otherwise hide it for the rest of the process.
   */
  private async acceptNew(stubs: ListingStub[]): Promise<ListingStub[]> {
    const fresh: ListingStub[] = [];

    for (const stub of stubs) {
      if (await this.deps.seen.has(stub.url)) continue;
      try {
        await this.deps.seen.add(stub.url);
      } catch (error) {
        if (!(error instanceof ScoutError && error.code === ErrorCode.PERSISTENCE_ERROR)) throw error;
        console.error(`[Scan] Could not persist ${stub.url}: ${error.message}`);
      }
      fresh.push(stub);
    }

    return fresh;
  }
}
