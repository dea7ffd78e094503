// src/core/extract/__tests__/chain.test.ts
import { describe, it, expect } from '@jest/globals';
import { mergeDraft, runFallbackChain } from '../chain.js';
import type { ExtractionStrategy } from '../types.js';
import { strategyContext } from './context.js';

const fixed = (name: string, draft: ReturnType<ExtractionStrategy['run']>): ExtractionStrategy => ({
  name,
  run: () => draft,
});

describe('runFallbackChain', () => {
  const context = strategyContext('<html><body></body></html>');

  it('stops once a title is present', async () => {
    const result = await runFallbackChain(
      [fixed('a', { price: 10 }), fixed('b', { title: 'Szabla', price: 20 }), fixed('c', { description: 'x' })],
      context
    );

    expect(result.draft).toEqual({ price: 10, title: 'Szabla' });
    expect(result.attempted).toEqual(['a', 'b']);
    expect(result.warnings).toEqual([]);
  });

  it('records a throwing strategy as a warning and continues', async () => {
    const throwing: ExtractionStrategy = {
      name: 'boom',
      run() {
        throw new Error('bad markup');
      },
    };
    const rejecting: ExtractionStrategy = {
      name: 'remote',
      run: async () => {
        throw new Error('HTTP 403');
      },
    };

    const result = await runFallbackChain([throwing, rejecting, fixed('last', { title: 'Bagnet' })], context);

    expect(result.draft.title).toBe('Bagnet');
    expect(result.warnings).toEqual(['boom strategy failed: bad markup', 'remote strategy failed: HTTP 403']);
    expect(result.attempted).toEqual(['boom', 'remote', 'last']);
  });

  it('runs every strategy when none yields a title', async () => {
    const result = await runFallbackChain([fixed('a', {}), fixed('b', { title: '   ' })], context);

    expect(result.attempted).toEqual(['a', 'b']);
    expect(result.draft.title).toBeUndefined();
  });
});

describe('mergeDraft', () => {
  it('fills only empty fields', () => {
    const merged = mergeDraft(
      { title: 'A', images: [], seller: ' ' },
      { title: 'B', images: ['https://img/1.jpg'], price: 5, seller: 'Jan' }
    );

    expect(merged).toEqual({ title: 'A', images: ['https://img/1.jpg'], price: 5, seller: 'Jan' });
  });

  it('keeps an existing price', () => {
    expect(mergeDraft({ price: 100 }, { price: 200 }).price).toBe(100);
  });
});
