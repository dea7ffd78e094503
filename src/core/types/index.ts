// src/core/types/index.ts
export type Platform =
  | 'sprzedajemy'
  | 'gratka'
  | 'olx'
  | 'allegro'
  | 'vinted'
  | 'other'
  | 'manual';

export type Verdict = 'BUY' | 'NEGOTIATE' | 'INVESTIGATE' | 'SKIP';

export type KnownCondition = 'new' | 'used' | 'unknown';

// Unrecognized phrases are kept verbatim for the classifier.
export type ListingCondition = KnownCondition | (string & {});

export interface ListingStub {
  id: string;
  url: string;
  title: string;
  /** 0 means the price could not be extracted, never "free". */
  price: number;
  platform: Platform;
  scrapedAt: string;
}

export interface Listing extends ListingStub {
  description: string;
  condition: ListingCondition;
  seller: string;
  location: string;
  images: string[];

  analysis?: string;
  verdict?: Verdict;
  estimatedValueLow?: number;
  estimatedValueHigh?: number;
}

export const PLATFORM_LABELS: Record<Platform, string> = {
  sprzedajemy: 'Sprzedajemy.pl',
  gratka: 'Gratka.pl',
  olx: 'OLX',
  allegro: 'Allegro',
  vinted: 'Vinted',
  other: 'other',
  manual: 'manual',
};
