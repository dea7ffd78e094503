// src/cli/services.ts
import type { Settings } from '../core/config/settings.js';
import { loadSettings } from '../core/config/settings.js';
import { getDataFiles } from '../core/config/app-dirs.js';
import type { ExtractOutcome } from '../core/extract/types.js';
import { DiscoveryService, type ListingSearch } from '../core/discover/index.js';
import { SeenStore, type SeenSet } from '../core/dedupe/index.js';
import { ConsoleNotifier, type Notifier } from '../core/notify/index.js';
import { AnthropicClassifier, type Classifier } from '../core/classify/index.js';
import { KeywordStore } from '../core/keywords/index.js';
import { HttpFetcher } from '../core/fetch/http.js';
import { ListingExtractor } from '../core/extractor.js';
import { ScoutError, ErrorCode, errorMessage } from '../core/errors.js';

/** Everything a command touches, so tests can swap in fakes. */
export interface Services {
  settings: Settings;
  extractor: { extract(url: string): Promise<ExtractOutcome> };
  search: ListingSearch;
  seen: SeenSet;
  keywords: Pick<KeywordStore, 'list' | 'add' | 'remove'>;
  notifier: Notifier;
  /** Throws invalid_config when no API key is set. */
  classifier(): Classifier;
}

export type ServicesFactory = () => Services;

export function createServices(env: NodeJS.ProcessEnv = process.env): Services {
  const settings = loadSettings(env);
  const files = getDataFiles(settings.dataDir);
  const fetcher = new HttpFetcher();

  return {
    settings,
    extractor: new ListingExtractor(fetcher),
    search: new DiscoveryService(fetcher),
    seen: new SeenStore(files.seenPath),
    keywords: new KeywordStore(files.keywordsPath),
    notifier: new ConsoleNotifier(),
    classifier: () => {
      if (!settings.anthropicApiKey) {
        throw new ScoutError(ErrorCode.INVALID_CONFIG, 'Missing Anthropic API key', false, 'Set ANTHROPIC_API_KEY');
      }
      return new AnthropicClassifier({ apiKey: settings.anthropicApiKey, model: settings.classifierModel });
    },
  };
}

/** Prints the error (with its suggestion) and exits with status 1. */
export function exitWithError(error: unknown): void {
  console.error('Error:', errorMessage(error));
  if (error instanceof ScoutError && error.suggestion) {
    console.error('Hint:', error.suggestion);
  }
  process.exit(1);
}
