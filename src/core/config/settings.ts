// src/core/config/settings.ts
import { ScoutError, ErrorCode } from '../errors.js';
import { getAppDataDir } from './app-dirs.js';
import {
  APP_NAME,
  DEFAULT_CLASSIFIER_MODEL,
  DEFAULT_MAX_PRICE,
  DEFAULT_MIN_MARGIN_PERCENT,
  DEFAULT_SCAN_DELAY_MS,
  DEFAULT_SCAN_INTERVAL_MINUTES,
} from './constants.js';

export interface Settings {
  dataDir: string;
  maxPrice: number;
  /** Margin the classifier asks for before recommending a buy. */
  minMarginPercent: number;
  scanIntervalMinutes: number;
  scanDelayMs: number;
  /** Where scan alerts go; empty disables scanning. */
  alertDestination: string;
  anthropicApiKey?: string;
  classifierModel: string;
}

export function loadSettings(env: NodeJS.ProcessEnv = process.env): Settings {
  return {
    dataDir: env.SCOUT_DATA_DIR || getAppDataDir(APP_NAME, env),
    maxPrice: readNumber(env, 'MAX_PRICE', DEFAULT_MAX_PRICE),
    minMarginPercent: readNumber(env, 'MIN_MARGIN', DEFAULT_MIN_MARGIN_PERCENT),
    scanIntervalMinutes: readNumber(env, 'SCAN_INTERVAL', DEFAULT_SCAN_INTERVAL_MINUTES),
    scanDelayMs: readNumber(env, 'SCAN_DELAY_MS', DEFAULT_SCAN_DELAY_MS),
    alertDestination: (env.ALERT_DESTINATION || env.CHAT_ID || '').trim(),
    anthropicApiKey: env.ANTHROPIC_API_KEY || undefined,
    classifierModel: env.CLASSIFIER_MODEL || DEFAULT_CLASSIFIER_MODEL,
  };
}

export function parseNonNegativeNumber(name: string, value: string): number {
  const parsed = Number(value.trim());
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ScoutError(
      ErrorCode.INVALID_CONFIG,
      `Invalid ${name}: "${value}"`,
      false,
      `Set ${name} to a non-negative number`
    );
  }
  return parsed;
}

function readNumber(env: NodeJS.ProcessEnv, name: string, fallback: number): number {
  const raw = env[name];
  if (raw === undefined || raw === '') {
    return fallback;
  }
  return parseNonNegativeNumber(name, raw);
}
