// src/core/extract/types.ts
import type { CheerioAPI } from 'cheerio';
import type { Listing, Platform } from '../types/index.js';
import type { FetchedPage, PageFetcher } from '../fetch/types.js';
import type { ErrorCode } from '../errors.js';

/** Fields a strategy may contribute. Condition is raw until normalized. */
export interface ListingDraft {
  title?: string;
  price?: number;
  description?: string;
  condition?: string;
  seller?: string;
  location?: string;
  images?: string[];
}

export interface StrategyContext {
  page: FetchedPage;
  $: CheerioAPI;
  /** Visible page text, one text node per line. */
  text: string;
  fetcher: PageFetcher;
}

export interface ExtractionStrategy {
  readonly name: string;
  run(context: StrategyContext): ListingDraft | Promise<ListingDraft>;
}

export interface ChainResult {
  draft: ListingDraft;
  warnings: string[];
  /** Names of the strategies that ran, in order. */
  attempted: string[];
}

export interface ExtractResult {
  listing: Listing;
  warnings: string[];
  strategies: string[];
}

export interface AdapterContext {
  fetcher: PageFetcher;
  maxDescriptionLength?: number;
  maxImages?: number;
}

export interface Adapter {
  readonly platform: Platform;
  readonly domains: string[];

  canHandle(url: string): boolean;
  extract(page: FetchedPage, context: AdapterContext): Promise<ExtractResult>;
}

export interface ExtractionFailure {
  kind: ErrorCode.FETCH_ERROR | ErrorCode.PARSE_ERROR | ErrorCode.INVALID_URL;
  message: string;
  url: string;
  retryable: boolean;
  suggestion?: string;
}

export type ExtractOutcome =
  | { status: 'success'; listing: Listing; warnings: string[]; strategies: string[] }
  | { status: 'failed'; failure: ExtractionFailure };
