import { describe, it, expect, beforeEach, afterEach, jest } from '@jest/globals';
import { ScanOrchestrator, rankListings, type ScanDependencies } from '../orchestrator.js';
import type { ListingSearch } from '../discover/types.js';
import type { SeenSet } from '../dedupe/types.js';
import type { Notifier } from '../notify/types.js';
import type { ListingStub, Platform } from '../types/index.js';
import { ScoutError, ErrorCode } from '../errors.js';

function stub(url: string, price: number, platform: Platform = 'sprzedajemy'): ListingStub {
  return { id: url, url, title: `Listing ${url}`, price, platform, scrapedAt: '2026-01-19T00:00:00.000Z' };
}

class FakeSearch implements ListingSearch {
  calls: string[] = [];

  constructor(
    private readonly results: Record<string, ListingStub[] | Error>,
    private readonly available: Platform[] = ['sprzedajemy', 'gratka']
  ) {}

  platforms(): Platform[] {
    return this.available;
  }

  async search(platform: Platform, keyword: string, priceCeiling: number): Promise<ListingStub[]> {
    this.calls.push(`${platform}:${keyword}:${priceCeiling}`);
    const result = this.results[`${platform}:${keyword}`] ?? [];
    if (result instanceof Error) throw result;
    return result;
  }
}

class MemorySeen implements SeenSet {
  loads = 0;
  readonly urls: Set<string>;

  constructor(initial: string[] = []) {
    this.urls = new Set(initial);
  }

  async load(): Promise<void> {
    this.loads++;
  }

  async has(url: string): Promise<boolean> {
    return this.urls.has(url);
  }

  async add(url: string): Promise<void> {
    this.urls.add(url);
  }

  async size(): Promise<number> {
    return this.urls.size;
  }
}

/** Keeps every URL in memory but fails to persist from the given add onward. */
class FailingWriteSeen extends MemorySeen {
  private adds = 0;

  constructor(private readonly failFrom: number) {
    super();
  }

  async add(url: string): Promise<void> {
    await super.add(url);
    this.adds++;
    if (this.adds >= this.failFrom) {
      throw new ScoutError(ErrorCode.PERSISTENCE_ERROR, 'Failed to write seen-set: disk full', true);
    }
  }
}

class RecordingNotifier implements Notifier {
  sent: Array<{ destination: string; listings: ListingStub[]; accepted: number }> = [];

  constructor(private readonly failure?: Error) {}

  async notify(destination: string, listings: ListingStub[], accepted: number): Promise<void> {
    if (this.failure) throw this.failure;
    this.sent.push({ destination, listings, accepted });
  }
}

class StaticKeywords {
  calls = 0;

  constructor(private readonly keywords: string[]) {}

  async list(): Promise<string[]> {
    this.calls++;
    return this.keywords;
  }
}

describe('rankListings', () => {
  it('sorts ascending by price with unknown prices last', () => {
    const ranked = rankListings([stub('a', 300), stub('b', 0), stub('c', 150), stub('d', 999)]);

    expect(ranked.map(listing => listing.price)).toEqual([150, 300, 999, 0]);
  });

  it('keeps the original order for equal prices', () => {
    const ranked = rankListings([stub('a', 0), stub('b', 200), stub('c', 0), stub('d', 200)]);

    expect(ranked.map(listing => listing.url)).toEqual(['b', 'd', 'a', 'c']);
  });
});

describe('ScanOrchestrator', () => {
  let sleeps: number[];
  let logSpy: jest.SpiedFunction<typeof console.log>;
  let warnSpy: jest.SpiedFunction<typeof console.warn>;
  let errorSpy: jest.SpiedFunction<typeof console.error>;

  const sleep = async (ms: number): Promise<void> => {
    sleeps.push(ms);
  };

  function deps(overrides: Partial<ScanDependencies> = {}): ScanDependencies {
    return {
      keywords: new StaticKeywords(['szabla']),
      search: new FakeSearch({}),
      seen: new MemorySeen(),
      notifier: new RecordingNotifier(),
      sleep,
      ...overrides,
    };
  }

  beforeEach(() => {
    sleeps = [];
    logSpy = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warnSpy = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    errorSpy = jest.spyOn(console, 'error').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('skips the scan without a destination', async () => {
    const keywords = new StaticKeywords(['szabla']);
    const search = new FakeSearch({});

    await expect(new ScanOrchestrator(deps({ keywords, search })).run('  ')).resolves.toBe(0);

    expect(keywords.calls).toBe(0);
    expect(search.calls).toEqual([]);
    expect(warnSpy).toHaveBeenCalledWith('[Scan] No alert destination set, skipping scan');
  });

  it('searches every platform for every keyword with a delay between keywords', async () => {
    const search = new FakeSearch({});
    const seen = new MemorySeen();
    const orchestrator = new ScanOrchestrator(
      deps({ keywords: new StaticKeywords(['szabla', 'bagnet', 'kordelas']), search, seen }),
      { maxPrice: 300, delayMs: 5 }
    );

    await orchestrator.run('alerts');

    expect(search.calls).toEqual([
      'sprzedajemy:szabla:300',
      'gratka:szabla:300',
      'sprzedajemy:bagnet:300',
      'gratka:bagnet:300',
      'sprzedajemy:kordelas:300',
      'gratka:kordelas:300',
    ]);
    expect(sleeps).toEqual([5, 5]);
    expect(seen.loads).toBe(1);
  });

  it('reports only listings not seen before', async () => {
    const seen = new MemorySeen(['https://x/old']);
    const notifier = new RecordingNotifier();
    const search = new FakeSearch({
      'sprzedajemy:szabla': [stub('https://x/old', 100), stub('https://x/new', 200)],
      'gratka:szabla': [stub('https://x/new', 200, 'gratka'), stub('https://x/other', 150, 'gratka')],
    });

    const accepted = await new ScanOrchestrator(deps({ search, seen, notifier })).run('alerts');

    expect(accepted).toBe(2);
    expect(notifier.sent).toHaveLength(1);
    expect(notifier.sent[0].destination).toBe('alerts');
    expect(notifier.sent[0].accepted).toBe(2);
    expect(notifier.sent[0].listings.map(listing => listing.url)).toEqual(['https://x/other', 'https://x/new']);
    expect([...seen.urls]).toEqual(['https://x/old', 'https://x/new', 'https://x/other']);
    expect(logSpy).toHaveBeenCalledWith('[Scan] Complete: 2 new listings, 2 sent');
  });

  it('keeps going when one platform fails', async () => {
    const notifier = new RecordingNotifier();
    const search = new FakeSearch({
      'sprzedajemy:szabla': new Error('boom'),
      'gratka:szabla': [stub('https://x/1', 100, 'gratka')],
    });

    const accepted = await new ScanOrchestrator(deps({ search, notifier })).run('alerts');

    expect(accepted).toBe(1);
    expect(errorSpy).toHaveBeenCalledWith('[Scan] sprzedajemy "szabla" failed: boom');
    expect(notifier.sent[0].listings.map(listing => listing.url)).toEqual(['https://x/1']);
  });

  it('sends at most topK listings but counts them all', async () => {
    const notifier = new RecordingNotifier();
    const search = new FakeSearch({
      'sprzedajemy:szabla': [stub('https://x/1', 500), stub('https://x/2', 0), stub('https://x/3', 100)],
    });

    const accepted = await new ScanOrchestrator(deps({ search, notifier }), { topK: 2 }).run('alerts');

    expect(accepted).toBe(3);
    expect(notifier.sent[0].accepted).toBe(3);
    expect(notifier.sent[0].listings.map(listing => listing.url)).toEqual(['https://x/3', 'https://x/1']);
  });

  it('does not notify when nothing is new', async () => {
    const notifier = new RecordingNotifier();

    await expect(new ScanOrchestrator(deps({ notifier })).run('alerts')).resolves.toBe(0);

    expect(notifier.sent).toEqual([]);
    expect(logSpy).toHaveBeenCalledWith('[Scan] Complete: 0 new listings');
  });

  it('reports listings whose seen-set write failed', async () => {
    const seen = new FailingWriteSeen(2);
    const notifier = new RecordingNotifier();
    const search = new FakeSearch({ 'sprzedajemy:szabla': [stub('https://x/1', 100), stub('https://x/2', 200)] });

    const accepted = await new ScanOrchestrator(deps({ search, seen, notifier })).run('alerts');

    expect(accepted).toBe(2);
    expect(notifier.sent[0].listings.map(listing => listing.url)).toEqual(['https://x/1', 'https://x/2']);
    expect(errorSpy).toHaveBeenCalledWith('[Scan] Could not persist https://x/2: Failed to write seen-set: disk full');
  });

  it('still returns the count and keeps listings seen when the alert fails', async () => {
    const seen = new MemorySeen();
    const search = new FakeSearch({ 'gratka:szabla': [stub('https://x/1', 100, 'gratka')] });
    const notifier = new RecordingNotifier(new Error('network down'));

    const accepted = await new ScanOrchestrator(deps({ search, seen, notifier })).run('alerts');

    expect(accepted).toBe(1);
    expect(await seen.has('https://x/1')).toBe(true);
    expect(errorSpy).toHaveBeenCalledWith('[Scan] Failed to send alert: network down');
  });
});
