// src/core/dedupe/types.ts
export interface SeenDatabase {
  version: number;
  /** Oldest first. */
  seenUrls: string[];
}

export interface SeenStoreOptions {
  highWaterMark?: number;
  pruneTarget?: number;
}

/** Durable record of listing URLs that were already reported. */
export interface SeenSet {
  load(): Promise<void>;
  has(url: string): Promise<boolean>;
  add(url: string): Promise<void>;
  size(): Promise<number>;
}
