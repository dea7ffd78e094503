import { describe, it, expect } from '@jest/globals';
import { loadSettings, parseNonNegativeNumber } from '../settings.js';
import { getAppDataDir, getDataFiles } from '../app-dirs.js';
import { ScoutError, ErrorCode } from '../../errors.js';

describe('loadSettings', () => {
  it('applies defaults', () => {
    expect(loadSettings({ SCOUT_DATA_DIR: '/tmp/scout' })).toEqual({
      dataDir: '/tmp/scout',
      maxPrice: 550,
      minMarginPercent: 200,
      scanIntervalMinutes: 30,
      scanDelayMs: 2000,
      alertDestination: '',
      anthropicApiKey: undefined,
      classifierModel: 'claude-sonnet-4-20250514',
    });
  });

  it('reads overrides from the environment', () => {
    const settings = loadSettings({
      SCOUT_DATA_DIR: '/tmp/scout',
      MAX_PRICE: '300',
      MIN_MARGIN: '150',
      SCAN_INTERVAL: '15',
      SCAN_DELAY_MS: '0',
      ALERT_DESTINATION: 'alerts',
      ANTHROPIC_API_KEY: 'test-secret',
      CLASSIFIER_MODEL: 'test-model',
    });

    expect(settings.maxPrice).toBe(300);
    expect(settings.minMarginPercent).toBe(150);
    expect(settings.scanIntervalMinutes).toBe(15);
    expect(settings.scanDelayMs).toBe(0);
    expect(settings.alertDestination).toBe('alerts');
    expect(settings.anthropicApiKey).toBe('test-secret');
    expect(settings.classifierModel).toBe('test-model');
  });

  it('falls back to CHAT_ID for the alert destination', () => {
    expect(loadSettings({ SCOUT_DATA_DIR: '/d', CHAT_ID: ' 12345 ' }).alertDestination).toBe('12345');
  });

  it('rejects non-numeric and negative values', () => {
    expect(() => loadSettings({ SCOUT_DATA_DIR: '/d', MAX_PRICE: 'abc' })).toThrow('Invalid MAX_PRICE: "abc"');
    expect(() => loadSettings({ SCOUT_DATA_DIR: '/d', SCAN_INTERVAL: '-1' })).toThrow(ScoutError);
    expect(() => loadSettings({ SCOUT_DATA_DIR: '/d', MIN_MARGIN: 'high' })).toThrow('Invalid MIN_MARGIN: "high"');
  });
});

describe('parseNonNegativeNumber', () => {
  it('throws an invalid_config error with a suggestion', () => {
    try {
      parseNonNegativeNumber('MAX_PRICE', ' ');
      throw new Error('expected a throw');
    } catch (error) {
      expect(error).toBeInstanceOf(ScoutError);
      if (error instanceof ScoutError) {
        expect(error.code).toBe(ErrorCode.INVALID_CONFIG);
        expect(error.suggestion).toBe('Set MAX_PRICE to a non-negative number');
      }
    }
  });

  it('accepts zero and decimals', () => {
    expect(parseNonNegativeNumber('X', '0')).toBe(0);
    expect(parseNonNegativeNumber('X', '2.5')).toBe(2.5);
  });
});

describe('app dirs', () => {
  it('uses XDG_DATA_HOME on linux', () => {
    expect(getAppDataDir('listing-scout', { XDG_DATA_HOME: '/data' }, 'linux')).toBe('/data/listing-scout');
  });

  it('places the data files in the data dir', () => {
    expect(getDataFiles('/d')).toEqual({
      dataDir: '/d',
      seenPath: '/d/seen.json',
      keywordsPath: '/d/keywords.json',
    });
  });
});
