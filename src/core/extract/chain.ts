// src/core/extract/chain.ts
import { errorMessage } from '../errors.js';
import type { ChainResult, ExtractionStrategy, ListingDraft, StrategyContext } from './types.js';

/**
 * Runs strategies in priority order. Each one only fills fields that are still
 * empty; the chain stops once a title is present.
 */
export async function runFallbackChain(
  strategies: ExtractionStrategy[],
  context: StrategyContext
): Promise<ChainResult> {
  let draft: ListingDraft = {};
  const warnings: string[] = [];
  const attempted: string[] = [];

  for (const strategy of strategies) {
    attempted.push(strategy.name);

    try {
      const partial = await strategy.run(context);
      draft = mergeDraft(draft, partial);
    } catch (error) {
      warnings.push(`${strategy.name} strategy failed: ${errorMessage(error)}`);
    }

    if (hasText(draft.title)) {
      break;
    }
  }

  return { draft, warnings, attempted };
}

export function mergeDraft(base: ListingDraft, addition: ListingDraft): ListingDraft {
  const merged: ListingDraft = { ...base };

  if (!hasText(merged.title) && hasText(addition.title)) merged.title = addition.title;
  if (!hasText(merged.description) && hasText(addition.description)) merged.description = addition.description;
  if (!hasText(merged.condition) && hasText(addition.condition)) merged.condition = addition.condition;
  if (!hasText(merged.seller) && hasText(addition.seller)) merged.seller = addition.seller;
  if (!hasText(merged.location) && hasText(addition.location)) merged.location = addition.location;

  if (merged.price === undefined && addition.price !== undefined) {
    merged.price = addition.price;
  }
  if ((merged.images ?? []).length === 0 && (addition.images ?? []).length > 0) {
    merged.images = addition.images;
  }

  return merged;
}

function hasText(value: string | undefined): value is string {
  return value !== undefined && value.trim().length > 0;
}
