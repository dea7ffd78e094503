// src/core/errors.ts
import type { ExtractionFailure } from './extract/types.js';

export enum ErrorCode {
  FETCH_ERROR = 'fetch_error',
  PARSE_ERROR = 'parse_error',
  INVALID_URL = 'invalid_url',
  CLASSIFIER_ERROR = 'classifier_error',
  PERSISTENCE_ERROR = 'persistence_error',
  INVALID_CONFIG = 'invalid_config',
}

export class ScoutError extends Error {
  code: ErrorCode;
  retryable: boolean;
  suggestion?: string;
  context?: Record<string, unknown>;

  constructor(
    code: ErrorCode,
    message: string,
    retryable: boolean = false,
    suggestion?: string,
    context?: Record<string, unknown>
  ) {
    super(message);
    this.name = 'ScoutError';
    this.code = code;
    this.retryable = retryable;
    this.suggestion = suggestion;
    this.context = context;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function createExtractionFailure(error: ScoutError, url: string): ExtractionFailure {
  const kind =
    error.code === ErrorCode.FETCH_ERROR || error.code === ErrorCode.INVALID_URL
      ? error.code
      : ErrorCode.PARSE_ERROR;

  return {
    kind,
    message: error.message,
    url,
    retryable: error.retryable,
    suggestion: error.suggestion,
  };
}
