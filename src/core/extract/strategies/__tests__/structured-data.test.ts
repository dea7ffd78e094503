// src/core/extract/strategies/__tests__/structured-data.test.ts
import { describe, it, expect } from '@jest/globals';
import { collectEmbeddedJson, findListingRecord, structuredDataStrategy } from '../structured-data.js';
import { strategyContext } from '../../__tests__/context.js';
import * as cheerio from 'cheerio';

const ldJson = (payload: string) => `<script type="application/ld+json">${payload}</script>`;

describe('structuredDataStrategy', () => {
  it('reads name and offer price from JSON-LD', async () => {
    const html = `<html><head>${ldJson('{"offers":{"price":"199.99"},"name":"Vintage clock"}')}</head><body></body></html>`;

    const draft = await structuredDataStrategy.run(strategyContext(html));

    expect(draft).toEqual({ title: 'Vintage clock', price: 199.99 });
  });

  it('finds the product inside an @graph payload', async () => {
    const payload = JSON.stringify({
      '@context': 'https://schema.org',
      '@graph': [
        { '@type': 'BreadcrumbList', itemListElement: [{ name: 'Antyki' }] },
        {
          '@type': 'Product',
          name: 'Szabla',
          itemCondition: 'https://schema.org/UsedCondition',
          image: ['https://img.example/1.jpg', '/2.jpg'],
          offers: [{ price: '450', seller: { name: 'Jan' } }],
        },
      ],
    });
    const html = `<html><head>${ldJson(payload)}</head><body></body></html>`;

    const draft = await structuredDataStrategy.run(strategyContext(html, 'https://www.olx.pl/d/oferta/szabla'));

    expect(draft).toEqual({
      title: 'Szabla',
      price: 450,
      condition: 'https://schema.org/UsedCondition',
      seller: 'Jan',
      images: ['https://img.example/1.jpg', 'https://www.olx.pl/2.jpg'],
    });
  });

  it('skips malformed blocks', async () => {
    const html = `<html><head>${ldJson('{not json')}${ldJson('{"name":"Bagnet","price":120}')}</head></html>`;

    const draft = await structuredDataStrategy.run(strategyContext(html));

    expect(draft.title).toBe('Bagnet');
    expect(draft.price).toBe(120);
  });

  it('reads inline application/json state with an amount price', async () => {
    const state = '{"props":{"item":{"title":"Lalka","price":{"amount":"35.0","currency_code":"PLN"}}}}';
    const html = `<html><body><script type="application/json">${state}</script></body></html>`;

    const draft = await structuredDataStrategy.run(strategyContext(html));

    expect(draft.title).toBe('Lalka');
    expect(draft.price).toBe(35);
  });

  it('reads a postal address as the location', async () => {
    const payload = JSON.stringify({
      name: 'Ikona',
      offers: { price: 300 },
      address: { addressLocality: 'Kraków', addressRegion: 'małopolskie' },
    });

    const draft = await structuredDataStrategy.run(strategyContext(`<html><head>${ldJson(payload)}</head></html>`));

    expect(draft.location).toBe('Kraków, małopolskie');
  });

  it('ignores a zero price', async () => {
    const html = `<html><head>${ldJson('{"name":"Gratis","offers":{"price":"0"}}')}</head></html>`;

    const draft = await structuredDataStrategy.run(strategyContext(html));

    expect(draft.price).toBeUndefined();
  });
});

describe('findListingRecord', () => {
  it('returns undefined when nothing has both a name and a price', () => {
    expect(findListingRecord({ name: 'Only a name' })).toBeUndefined();
    expect(findListingRecord([1, 'two', null])).toBeUndefined();
  });
});

describe('collectEmbeddedJson', () => {
  it('collects JSON-LD before application/json and skips empty blocks', () => {
    const $ = cheerio.load(
      '<script type="application/json">{"b":2}</script><script type="application/ld+json"> </script>' +
        '<script type="application/ld+json">{"a":1}</script>'
    );

    expect(collectEmbeddedJson($)).toEqual([{ a: 1 }, { b: 2 }]);
  });
});
