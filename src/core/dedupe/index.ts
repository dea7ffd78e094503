// src/core/dedupe/index.ts
export { SeenStore, parseSeenUrls } from './store.js';
export { getDedupeKey } from './strategy.js';
export type { SeenDatabase, SeenSet, SeenStoreOptions } from './types.js';
