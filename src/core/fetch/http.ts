// src/core/fetch/http.ts
import axios, { type AxiosRequestConfig } from 'axios';
import { ScoutError, ErrorCode, errorMessage } from '../errors.js';
import {
  DEFAULT_ACCEPT_LANGUAGE,
  DEFAULT_MAX_REDIRECTS,
  DEFAULT_TIMEOUT,
  DEFAULT_USER_AGENT,
} from '../config/constants.js';
import type { FetchedPage, FetchOptions, PageFetcher } from './types.js';

export interface HttpResponse {
  status: number;
  data: unknown;
  headers: object;
}

/** The slice of an axios instance the fetcher relies on. */
export interface HttpClient {
  get(url: string, config?: AxiosRequestConfig): Promise<HttpResponse>;
}

export function createHttpClient(timeout: number = DEFAULT_TIMEOUT): HttpClient {
  return axios.create({
    timeout,
    maxRedirects: DEFAULT_MAX_REDIRECTS,
    headers: {
      'User-Agent': DEFAULT_USER_AGENT,
      'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,*/*;q=0.8',
      'Accept-Language': DEFAULT_ACCEPT_LANGUAGE,
    },
    // Only 2xx counts as a fetched page
    validateStatus: status => status >= 200 && status < 300,
  });
}

export class HttpFetcher implements PageFetcher {
  constructor(private client: HttpClient = createHttpClient()) {}

  async fetchPage(url: string, options: FetchOptions = {}): Promise<FetchedPage> {
    const response = await this.request(url, { ...this.toConfig(options), responseType: 'text' });
    const html = typeof response.data === 'string' ? response.data : String(response.data ?? '');

    return { url, status: response.status, html };
  }

  async fetchJson(url: string, options: FetchOptions = {}): Promise<unknown> {
    const response = await this.request(url, {
      ...this.toConfig(options),
      responseType: 'json',
      headers: { Accept: 'application/json', ...options.headers },
    });
    return response.data;
  }

  async openSession(url: string): Promise<string> {
    const response = await this.request(url, { responseType: 'text' });
    return toCookieHeader(readSetCookie(response.headers));
  }

  private async request(url: string, config: AxiosRequestConfig): Promise<HttpResponse> {
    try {
      return await this.client.get(url, config);
    } catch (error) {
      throw toFetchError(url, error);
    }
  }

  private toConfig(options: FetchOptions): AxiosRequestConfig {
    const config: AxiosRequestConfig = {};
    if (options.headers) config.headers = options.headers;
    if (options.timeout !== undefined) config.timeout = options.timeout;
    return config;
  }
}

export function toFetchError(url: string, error: unknown): ScoutError {
  if (error instanceof ScoutError) {
    return error;
  }

  if (axios.isAxiosError(error)) {
    if (error.response) {
      const status = error.response.status;
      return new ScoutError(
        ErrorCode.FETCH_ERROR,
        `HTTP ${status} for ${url}`,
        status >= 500 || status === 429,
        undefined,
        { url, status }
      );
    }
    if (error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT') {
      return new ScoutError(
        ErrorCode.FETCH_ERROR,
        `Request timed out: ${url}`,
        true,
        undefined,
        { url }
      );
    }
  }

  return new ScoutError(
    ErrorCode.FETCH_ERROR,
    `Request failed for ${url}: ${errorMessage(error)}`,
    true,
    undefined,
    { url }
  );
}

export function readSetCookie(headers: object): string[] {
  if (!('set-cookie' in headers)) {
    return [];
  }
  const raw = headers['set-cookie'];
  if (Array.isArray(raw)) {
    return raw.filter((value): value is string => typeof value === 'string');
  }
  return typeof raw === 'string' ? [raw] : [];
}

export function toCookieHeader(setCookies: string[]): string {
  return setCookies
    .map(cookie => cookie.split(';')[0].trim())
    .filter(pair => pair.includes('='))
    .join('; ');
}
