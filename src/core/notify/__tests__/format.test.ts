// src/core/notify/__tests__/format.test.ts
import { describe, it, expect } from '@jest/globals';
import { formatAlert, formatListing, formatPrice } from '../format.js';
import { ConsoleNotifier } from '../console.js';
import type { ListingStub } from '../../types/index.js';
import { sampleListing } from '../../__tests__/listings.js';

function stub(overrides: Partial<ListingStub> = {}): ListingStub {
  return {
    id: 'a1',
    url: 'https://sprzedajemy.pl/szabla-nr1',
    title: 'Szabla',
    price: 400,
    platform: 'sprzedajemy',
    scrapedAt: '2026-01-19T00:00:00.000Z',
    ...overrides,
  };
}

describe('formatPrice', () => {
  it('marks unknown prices', () => {
    expect(formatPrice(120)).toBe('120 zł');
    expect(formatPrice(0)).toBe('price unknown');
  });
});

describe('formatAlert', () => {
  it('lists each listing and the remainder', () => {
    const text = formatAlert(
      [stub(), stub({ title: 'Bagnet', price: 0, platform: 'gratka', url: 'https://gratka.pl/b/2' })],
      5
    );

    expect(text).toBe(
      [
        '🔔 NEW LISTINGS (5 found)',
        '',
        '1. Szabla',
        '   💰 400 zł | 📍 Sprzedajemy.pl',
        '   🔗 https://sprzedajemy.pl/szabla-nr1',
        '',
        '2. Bagnet',
        '   💰 price unknown | 📍 Gratka.pl',
        '   🔗 https://gratka.pl/b/2',
        '',
        '...and 3 more',
        '',
        '💡 Run `scout analyze <url>` for a full appraisal.',
      ].join('\n')
    );
  });

  it('truncates long titles to 50 characters', () => {
    const text = formatAlert([stub({ title: 'x'.repeat(80) })], 1);

    expect(text.split('\n')[2]).toBe(`1. ${'x'.repeat(50)}`);
    expect(text).not.toContain('...and');
  });
});

describe('formatListing', () => {
  it('renders a listing without analysis', () => {
    expect(formatListing(sampleListing({ seller: '', location: '' }))).toBe(
      ['📦 Zegarek Rakieta', '💰 450 zł', '📍 no location', '📄 Condition: used', '🔗 https://olx.pl/d/1'].join('\n')
    );
  });

  it('appends the verdict and analysis', () => {
    const text = formatListing(sampleListing({ analysis: 'Oryginał, dobra cena.', verdict: 'BUY' }));

    expect(text.split('\n').slice(4)).toEqual(['👤 Jan', '🔗 https://olx.pl/d/1', '', '🟢 BUY', '', 'Oryginał, dobra cena.']);
  });
});

describe('formatListing estimates', () => {
  it('shows the estimated value and margin', () => {
    const text = formatListing(sampleListing({ price: 300, estimatedValueLow: 800, estimatedValueHigh: 1000 }));

    expect(text.split('\n').slice(6)).toEqual(['💎 Value: 800-1000 zł', '📈 Margin: 167% to 233%']);
  });

  it('omits the margin when the price is unknown', () => {
    const text = formatListing(sampleListing({ price: 0, estimatedValueLow: 800, estimatedValueHigh: 1000 }));

    expect(text.split('\n').slice(6)).toEqual(['💎 Value: 800-1000 zł']);
  });
});

describe('ConsoleNotifier', () => {
  it('writes the destination and the alert', async () => {
    const written: string[] = [];
    const notifier = new ConsoleNotifier(text => written.push(text));

    await notifier.notify('alerts', [stub()], 1);

    expect(written).toEqual([`[Notify] -> alerts\n${formatAlert([stub()], 1)}`]);
  });
});
