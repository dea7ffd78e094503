// src/core/config/constants.ts
export const APP_NAME = 'listing-scout';

export const DEFAULT_TIMEOUT = 15000; // 15 seconds
export const DEFAULT_MAX_REDIRECTS = 5;
export const DEFAULT_USER_AGENT = 'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';
export const DEFAULT_ACCEPT_LANGUAGE = 'pl-PL,pl;q=0.9,en-US;q=0.8,en;q=0.7';

export const MAX_DESCRIPTION_LENGTH = 1000;
export const MAX_IMAGES = 5;

export const SEARCH_RESULT_LIMIT = 20;
export const STUB_TITLE_MAX_LENGTH = 100;
export const STUB_TITLE_MIN_LENGTH = 3;

export const SEEN_HIGH_WATER_MARK = 5000;
export const SEEN_PRUNE_TARGET = 3000;

export const DEFAULT_MAX_PRICE = 550;
export const DEFAULT_MIN_MARGIN_PERCENT = 200;
export const DEFAULT_SCAN_INTERVAL_MINUTES = 30;
export const DEFAULT_SCAN_DELAY_MS = 2000;
export const FIRST_SCAN_DELAY_MS = 60000;
export const ALERT_TOP_K = 10;

export const DEFAULT_CLASSIFIER_MODEL = 'claude-sonnet-4-20250514';
export const CLASSIFIER_MAX_TOKENS = 600;

export const DEFAULT_KEYWORDS: readonly string[] = [
  'komiks PRL',
  'Relax komiks',
  'Kapitan Żbik',
  'figurka Ćmielów',
  'porcelana PRL',
  'zegarek Błonie',
  'zegarek Rakieta',
  'zegarek Wostok',
  'obraz olejny',
  'szabla',
  'bagnet',
  'Lem pierwsze wydanie',
  'Sapkowski wydanie',
  'ikona prawosławna',
  'sztućce srebrne',
  'kordelas',
];
