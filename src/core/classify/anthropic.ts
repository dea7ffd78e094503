// src/core/classify/anthropic.ts
import axios, { type AxiosRequestConfig } from 'axios';
import type { Classifier } from './types.js';
import { isRecord, readString } from '../extract/strategies/json.js';
import { ScoutError, ErrorCode, errorMessage } from '../errors.js';
import { CLASSIFIER_MAX_TOKENS, DEFAULT_CLASSIFIER_MODEL, DEFAULT_TIMEOUT } from '../config/constants.js';

export const ANTHROPIC_MESSAGES_URL = 'https://api.anthropic.com/v1/messages';
export const ANTHROPIC_VERSION = '2023-06-01';

/** The slice of axios the classifier posts through. */
export interface HttpPoster {
  post(url: string, body: unknown, config?: AxiosRequestConfig): Promise<{ data: unknown }>;
}

export interface AnthropicClassifierOptions {
  apiKey: string;
  model?: string;
  maxTokens?: number;
  timeout?: number;
  http?: HttpPoster;
}

export class AnthropicClassifier implements Classifier {
  private readonly model: string;
  private readonly maxTokens: number;
  private readonly http: HttpPoster;

  constructor(private readonly options: AnthropicClassifierOptions) {
    if (!options.apiKey) {
      throw new ScoutError(
        ErrorCode.INVALID_CONFIG,
        'Missing Anthropic API key',
        false,
        'Set ANTHROPIC_API_KEY'
      );
    }
    this.model = options.model ?? DEFAULT_CLASSIFIER_MODEL;
    this.maxTokens = options.maxTokens ?? CLASSIFIER_MAX_TOKENS;
    // Model calls run far longer than page fetches.
    this.http = options.http ?? axios.create({ timeout: options.timeout ?? DEFAULT_TIMEOUT * 4 });
  }

  async complete(systemPrompt: string, userPrompt: string): Promise<string> {
    let data: unknown;
    try {
      ({ data } = await this.http.post(
        ANTHROPIC_MESSAGES_URL,
        {
          model: this.model,
          max_tokens: this.maxTokens,
          system: systemPrompt,
          messages: [{ role: 'user', content: userPrompt }],
        },
        {
          headers: {
            'x-api-key': this.options.apiKey,
            'anthropic-version': ANTHROPIC_VERSION,
            'content-type': 'application/json',
          },
        }
      ));
    } catch (error) {
      throw new ScoutError(
        ErrorCode.CLASSIFIER_ERROR,
        `Classifier request failed: ${describeAxiosError(error)}`,
        true
      );
    }

    return readMessageText(data);
  }
}

/** Joins the text blocks of a Messages API response. */
export function readMessageText(data: unknown): string {
  const content = isRecord(data) ? data.content : undefined;
  const blocks = Array.isArray(content) ? content.filter(isRecord) : [];
  const text = blocks
    .filter(block => block.type === 'text')
    .map(block => readString(block.text) ?? '')
    .join('\n')
    .trim();

  if (!text) {
    throw new ScoutError(ErrorCode.CLASSIFIER_ERROR, 'Classifier returned no text', true);
  }
  return text;
}

function describeAxiosError(error: unknown): string {
  if (axios.isAxiosError(error) && error.response) {
    const body = error.response.data;
    const apiError = isRecord(body) && isRecord(body.error) ? readString(body.error.message) : undefined;
    return `HTTP ${error.response.status}${apiError ? ` ${apiError}` : ''}`;
  }
  return errorMessage(error);
}
