// src/core/fetch/types.ts
export interface FetchedPage {
  url: string;
  status: number;
  html: string;
}

export interface FetchOptions {
  headers?: Record<string, string>;
  timeout?: number;
}

export interface PageFetcher {
  fetchPage(url: string, options?: FetchOptions): Promise<FetchedPage>;
  fetchJson(url: string, options?: FetchOptions): Promise<unknown>;
  /** Opens a cookie session against `url` and returns a `Cookie` header value. */
  openSession(url: string): Promise<string>;
}
