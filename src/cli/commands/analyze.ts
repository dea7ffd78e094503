// src/cli/commands/analyze.ts
import { Command } from 'commander';
import type { Services, ServicesFactory } from '../services.js';
import { exitWithError } from '../services.js';
import { extractUrls } from '../../core/fetch/utils.js';
import { createManualListing, isDedupable } from '../../core/extract/listing.js';
import { analyzeListing } from '../../core/classify/analyze.js';
import { DEFAULT_PROFILE } from '../../core/classify/prompt.js';
import { formatListing } from '../../core/notify/format.js';

export const MIN_MANUAL_TEXT_LENGTH = 20;

export function registerAnalyzeCommand(program: Command, services: ServicesFactory): void {
  program
    .command('analyze [text...]')
    .description('Appraise listings from links, or a pasted description')
    .action(async (words: string[] = []) => {
      try {
        const text = words.join(' ').trim();
        const ok = await analyzeText(text, services());
        if (!ok) process.exit(1);
      } catch (error) {
        exitWithError(error);
      }
    });
}

/**
 * Links in `text` are extracted, classified and marked seen. Text without
 * links is appraised as a hand-written description. Returns false when
 * nothing could be analyzed.
 */
export async function analyzeText(text: string, services: Services): Promise<boolean> {
  const urls = extractUrls(text);
  const profile = {
    ...DEFAULT_PROFILE,
    maxPrice: services.settings.maxPrice,
    minMarginPercent: services.settings.minMarginPercent,
  };

  if (urls.length === 0) {
    if (text.length < MIN_MANUAL_TEXT_LENGTH) {
      console.error(`Paste a listing URL or describe the item (at least ${MIN_MANUAL_TEXT_LENGTH} characters)`);
      return false;
    }
    const listing = await analyzeListing(createManualListing(text), services.classifier(), profile);
    console.log(formatListing(listing));
    return true;
  }

  const classifier = services.classifier();
  let analyzed = 0;

  for (const url of urls) {
    console.log(`Fetching: ${url}`);
    const outcome = await services.extractor.extract(url);

    if (outcome.status === 'failed') {
      console.error(`Failed [${outcome.failure.kind}]: ${outcome.failure.message}`);
      console.error('You can paste the description instead and it will be appraised as text.');
      continue;
    }

    const listing = await analyzeListing(outcome.listing, classifier, profile);
    if (isDedupable(listing)) {
      await services.seen.add(listing.url);
    }
    console.log(formatListing(listing));
    console.log('');
    analyzed++;
  }

  return analyzed > 0;
}
