// src/core/dedupe/store.ts
import PQueue from 'p-queue';
import type { SeenDatabase, SeenSet, SeenStoreOptions } from './types.js';
import { getDedupeKey } from './strategy.js';
import { backupCorruptFile, readJsonFile, writeJsonFile } from '../storage/json-file.js';
import { isRecord } from '../extract/strategies/json.js';
import { ScoutError, ErrorCode, errorMessage } from '../errors.js';
import { SEEN_HIGH_WATER_MARK, SEEN_PRUNE_TARGET } from '../config/constants.js';

const DATABASE_VERSION = 1;

export class SeenStore implements SeenSet {
  // A JS Set iterates in insertion order, which is the eviction order.
  private urls: Set<string> = new Set();
  private loading?: Promise<void>;
  private readonly writer = new PQueue({ concurrency: 1 });
  private readonly highWaterMark: number;
  private readonly pruneTarget: number;

  constructor(
    private readonly filePath: string,
    options: SeenStoreOptions = {}
  ) {
    this.highWaterMark = options.highWaterMark ?? SEEN_HIGH_WATER_MARK;
    this.pruneTarget = options.pruneTarget ?? SEEN_PRUNE_TARGET;

    if (this.pruneTarget > this.highWaterMark) {
      throw new ScoutError(
        ErrorCode.INVALID_CONFIG,
        `Seen-set prune target ${this.pruneTarget} exceeds high-water mark ${this.highWaterMark}`
      );
    }
  }

  load(): Promise<void> {
    if (!this.loading) {
      this.loading = this.readDatabase();
    }
    return this.loading;
  }

  async has(url: string): Promise<boolean> {
    await this.load();
    return this.urls.has(getDedupeKey(url));
  }

  /**
   * Resolves once the URL is on disk. On a failed write the URL stays in
   * memory, so the current process still treats it as seen.
   *
   * Another process (a one-off `analyze` next to a running `watch`) may have
   * written the file since it was loaded, so its entries are merged in first.
   */
  async add(url: string): Promise<void> {
    await this.load();
    const key = getDedupeKey(url);

    await this.writer.add(async () => {
      await this.mergeFromDisk();
      if (this.urls.has(key)) return;

      this.urls.add(key);
      this.prune();
      await this.flush();
    });
  }

  async size(): Promise<number> {
    await this.load();
    return this.urls.size;
  }

  /** Snapshot, oldest first. */
  async list(): Promise<string[]> {
    await this.load();
    return [...this.urls];
  }

  private prune(): void {
    if (this.urls.size <= this.highWaterMark) return;

    const kept = [...this.urls].slice(-this.pruneTarget);
    console.log(`[Seen] Pruned ${this.urls.size - kept.length} oldest entries`);
    this.urls = new Set(kept);
  }

  /** On-disk order first, then entries only this process knows about. */
  private async mergeFromDisk(): Promise<void> {
    const result = await readJsonFile(this.filePath);
    if (result.status !== 'ok') return;

    const onDisk = parseSeenUrls(result.data);
    if (!onDisk) return;

    this.urls = new Set([...onDisk.map(getDedupeKey), ...this.urls]);
  }

  private async flush(): Promise<void> {
    const database: SeenDatabase = { version: DATABASE_VERSION, seenUrls: [...this.urls] };

    try {
      await writeJsonFile(this.filePath, database);
    } catch (error) {
      throw new ScoutError(
        ErrorCode.PERSISTENCE_ERROR,
        `Failed to write seen-set: ${errorMessage(error)}`,
        true,
        'Check that the data directory is writable',
        { path: this.filePath }
      );
    }
  }

  private async readDatabase(): Promise<void> {
    const result = await readJsonFile(this.filePath);

    if (result.status === 'missing') {
      return;
    }

    const urls = result.status === 'ok' ? parseSeenUrls(result.data) : undefined;
    if (urls) {
      this.urls = new Set(urls.map(getDedupeKey));
      return;
    }

    // Unreadable or wrong shape: keep a copy and start empty.
    console.error(`[Seen] ${this.filePath} is corrupt; starting with an empty seen-set`);
    await backupCorruptFile(this.filePath);
  }
}

/** Accepts the current `{ seenUrls }` shape and the older `{ seen_urls }` one. */
export function parseSeenUrls(data: unknown): string[] | undefined {
  if (!isRecord(data)) return undefined;

  const raw = data.seenUrls ?? data.seen_urls;
  if (!Array.isArray(raw)) return undefined;

  return raw.filter((value): value is string => typeof value === 'string' && value.length > 0);
}
