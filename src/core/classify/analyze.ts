// src/core/classify/analyze.ts
import type { Listing } from '../types/index.js';
import type { Classifier } from './types.js';
import { buildListingPrompt, buildSystemPrompt, type PromptProfile } from './prompt.js';
import { parseValueRange, parseVerdict } from './verdict.js';
import { errorMessage } from '../errors.js';

/**
 * Asks the classifier about a listing and returns an enriched copy. A failed
 * call still yields a listing: the error text becomes the analysis and the
 * verdict is SKIP.
 */
export async function analyzeListing(
  listing: Listing,
  classifier: Classifier,
  profile?: PromptProfile
): Promise<Listing> {
  let analysis: string;
  try {
    analysis = await classifier.complete(buildSystemPrompt(profile), buildListingPrompt(listing));
  } catch (error) {
    console.error(`[Classify] ${listing.id}: ${errorMessage(error)}`);
    return { ...listing, analysis: `Analysis failed: ${errorMessage(error)}`, verdict: 'SKIP' };
  }

  const range = parseValueRange(analysis);
  return {
    ...listing,
    analysis,
    verdict: parseVerdict(analysis),
    ...(range ? { estimatedValueLow: range.low, estimatedValueHigh: range.high } : {}),
  };
}
