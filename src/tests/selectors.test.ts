import { describe, it, expect } from 'vitest';
import * as cheerio from 'cheerio';
import {
  Strategy,
  cascadeFirst,
  cascadePooled,
  labelInteger,
  labelValue,
  locate,
  normalisePricePair,
  priceTokens,
  resolvePrices,
  scopeOf,
  visibleText,
  withAncestors,
} from '../crawler/selectors';
import { MANUFACTURER_PATTERNS, REVIEW_COUNT_PATTERNS } from '../crawler/patterns';
import { BASE_URL, mockListingPage1HTML } from './mock-data';

const fixed = (label: string, values: string[]): Strategy<string> => ({
  kind: 'selector',
  label,
  run: () => values,
});

describe('Selector cascade', () => {
  const $ = cheerio.load('<div><span>one</span></div>');
  const root = scopeOf($, $.root(), BASE_URL);

  it('returns the first strategy that yields a value', () => {
    const result = cascadeFirst([fixed('empty', []), fixed('second', ['b']), fixed('third', ['c'])], [root]);
    expect(result).toBe('b');
  });

  it('returns undefined when nothing matches', () => {
    expect(cascadeFirst([fixed('empty', [])], [root])).toBeUndefined();
  });

  it('pools values from every strategy without duplicates', () => {
    const pooled = cascadePooled([fixed('a', ['x', 'y']), fixed('b', ['y', 'z'])], [root], v => v);
    expect(pooled).toEqual(['x', 'y', 'z']);
  });

  it('widens a scope by the requested number of ancestors', () => {
    const span = scopeOf($, $('span'), BASE_URL);
    const scopes = withAncestors(span, 2);
    expect(scopes.map(s => s.node.first().prop('tagName'))).toEqual(['SPAN', 'DIV', 'BODY']);
  });
});

describe('Price resolution', () => {
  it('treats the lower of two prices as current and computes the discount', () => {
    expect(resolvePrices([50, 40])).toEqual({ current: 40, original: 50, discountPercentage: 20 });
  });

  it('keeps a single price as current only', () => {
    expect(resolvePrices([40, 40])).toEqual({ current: 40 });
  });

  it('returns nothing when no prices are present', () => {
    expect(resolvePrices([])).toEqual({});
  });

  it('drops an original price that is not above the current one', () => {
    expect(normalisePricePair(45, 40)).toEqual({ current: 45 });
    expect(normalisePricePair(45, 60)).toEqual({ current: 45, original: 60, discountPercentage: 25 });
  });

  it('reads currency tokens with thousands separators', () => {
    expect(priceTokens(['Rs. 1,250 and rs.99', 'no price here'])).toEqual([1250, 99]);
  });
});

describe('Text helpers', () => {
  it('separates block elements by newlines and skips scripts', () => {
    const $ = cheerio.load('<div><p>Line one</p><p>Line <b>two</b></p><script>var x = 1;</script></div>');
    expect(visibleText($('div').toArray())).toBe('Line one\nLine two');
  });

  it('extracts the value after a label up to the end of the line', () => {
    expect(labelValue('SKU: AB-1\nManufacturer: Acme Labs', MANUFACTURER_PATTERNS)).toBe('Acme Labs');
    expect(labelValue('Nothing to see', MANUFACTURER_PATTERNS)).toBeUndefined();
  });

  it('parses integer labels', () => {
    expect(labelInteger('Rated by many, 12 reviews', REVIEW_COUNT_PATTERNS)).toBe(12);
  });
});

describe('Field locators', () => {
  const $ = cheerio.load(mockListingPage1HTML);
  const pageUrl = `${BASE_URL}/cat/pain-relief?page=1`;

  it('finds each product link once', () => {
    const links = locate(scopeOf($, $.root(), pageUrl), 'productLinks') ?? [];
    expect(links.map(link => link.url)).toEqual([
      `${BASE_URL}/p/panadol-500mg-tablets`,
      `${BASE_URL}/p/augmentin-625mg`,
      `${BASE_URL}/p/vitamin-c-1000mg`,
    ]);
  });

  it('resolves price, brand and image from the enclosing card', () => {
    const link = scopeOf($, $('a[href="/p/panadol-500mg-tablets"]'), pageUrl);
    expect(locate(link, 'price')).toEqual({ current: 40, original: 50, discountPercentage: 20 });
    expect(locate(link, 'brand')).toBe('GSK Pharma');
    expect(locate(link, 'image')).toBe(`${BASE_URL}/images/product/panadol.jpg`);
  });

  it('falls back to the image alt text for the name', () => {
    const link = scopeOf($, $('a[href="/p/vitamin-c-1000mg"]'), pageUrl);
    expect(locate(link, 'name')).toBe('Vitamin C 1000mg');
  });
});
