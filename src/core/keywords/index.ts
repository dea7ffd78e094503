export { KeywordStore, parseKeywords } from './store.js';
export type { KeywordChange } from './store.js';
