import { describe, it, expect } from 'vitest';
import {
  CategoryDiscoverer,
  azCategories,
  deduplicateCategories,
  inferCategoryName,
} from '../crawler/category-discoverer';
import { FakePageSource } from './fakes';
import {
  BASE_URL,
  mockCategoryPageHTML,
  mockHomepageHTML,
  mockHtmlSitemap,
  mockSitemapIndexXML,
  mockSitemapXML,
} from './mock-data';

describe('CategoryDiscoverer', () => {
  describe('A-Z enumeration', () => {
    it('produces one category per letter', () => {
      const categories = azCategories(BASE_URL);
      expect(categories).toHaveLength(26);
      expect(categories[0]).toEqual({
        name: 'Medicines starting with A',
        url: `${BASE_URL}/atozmedicine/A`,
        slug: 'medicine-a',
        source: 'az-enumeration',
      });
      expect(categories[25].url).toBe(`${BASE_URL}/atozmedicine/Z`);
    });
  });

  describe('homepage and navigation', () => {
    const source = new FakePageSource({ [BASE_URL]: mockHomepageHTML });
    const discoverer = new CategoryDiscoverer(source, BASE_URL);

    it('collects category links from the homepage', async () => {
      const categories = await discoverer.collectHomepage();
      expect(categories.map(c => c.url)).toEqual([
        `${BASE_URL}/cat/medicine`,
        `${BASE_URL}/cat/baby-care`,
        `${BASE_URL}/cat/personal-care`,
        `${BASE_URL}/atozmedicine/B`,
      ]);
      expect(categories[1]).toEqual({
        name: 'Baby Care',
        url: `${BASE_URL}/cat/baby-care`,
        slug: 'baby-care',
        imageUrl: `${BASE_URL}/img/baby.png`,
        parentUrl: undefined,
        source: 'homepage',
      });
      expect(categories[3].name).toBe('Browse B');
    });

    it('collects only category links inside navigation regions', async () => {
      const categories = await discoverer.collectNavigation();
      expect(categories.map(c => c.url)).toEqual([
        `${BASE_URL}/cat/medicine`,
        `${BASE_URL}/atozmedicine/B`,
        `${BASE_URL}/cat/personal-care`,
      ]);
      expect(categories.every(c => c.source === 'navigation')).toBe(true);
    });
  });

  describe('sitemap', () => {
    it('reads category URLs from an XML sitemap', async () => {
      const source = new FakePageSource({ [`${BASE_URL}/sitemap.xml`]: mockSitemapXML });
      const categories = await new CategoryDiscoverer(source, BASE_URL).collectSitemap();

      expect(categories).toEqual([
        { name: 'Vitamins', url: `${BASE_URL}/cat/vitamins`, slug: 'vitamins', source: 'sitemap' },
        { name: 'Medicine', url: `${BASE_URL}/cat/medicine`, slug: 'medicine', source: 'sitemap' },
      ]);
      expect(source.calls.map(c => c.url)).toEqual([`${BASE_URL}/sitemap.xml`]);
    });

    it('falls back to the next candidate when one is unavailable', async () => {
      const source = new FakePageSource({ [`${BASE_URL}/sitemap`]: mockHtmlSitemap });
      const categories = await new CategoryDiscoverer(source, BASE_URL).collectSitemap();

      expect(categories.map(c => c.name)).toEqual(['Skin Care']);
      expect(source.calls.map(c => c.url)).toEqual([`${BASE_URL}/sitemap.xml`, `${BASE_URL}/sitemap`]);
    });

    it('follows a sitemap index one level down', async () => {
      const source = new FakePageSource({
        [`${BASE_URL}/sitemap.xml`]: mockSitemapIndexXML,
        [`${BASE_URL}/sitemap-categories.xml`]: mockSitemapXML,
      });
      const categories = await new CategoryDiscoverer(source, BASE_URL).collectSitemap();
      expect(categories.map(c => c.slug)).toEqual(['vitamins', 'medicine']);
    });

    it('returns nothing when no candidate yields categories', async () => {
      const source = new FakePageSource();
      expect(await new CategoryDiscoverer(source, BASE_URL).collectSitemap()).toEqual([]);
      expect(source.calls).toHaveLength(3);
    });
  });

  describe('discoverAll', () => {
    it('unions every source and keeps the first finder of each URL', async () => {
      const source = new FakePageSource({
        [BASE_URL]: mockHomepageHTML,
        [`${BASE_URL}/sitemap.xml`]: mockSitemapXML,
      });
      const report = await new CategoryDiscoverer(source, BASE_URL).discoverAll();

      expect(report.bySource).toEqual({
        'homepage': 4,
        'sitemap': 2,
        'az-enumeration': 26,
        'navigation': 3,
      });
      expect(report.categories).toHaveLength(30);
      expect(report.categories.find(c => c.url === `${BASE_URL}/atozmedicine/B`)?.source).toBe('homepage');
      expect(report.categories.find(c => c.url === `${BASE_URL}/cat/vitamins`)?.source).toBe('sitemap');
      expect(source.calls.filter(c => c.url === BASE_URL)).toHaveLength(1);
    });

    it('is idempotent under deduplication', async () => {
      const source = new FakePageSource({ [BASE_URL]: mockHomepageHTML });
      const { categories } = await new CategoryDiscoverer(source, BASE_URL).discoverAll();

      expect(deduplicateCategories(categories)).toEqual(categories);
      expect(new Set(categories.map(c => c.url)).size).toBe(categories.length);
    });
  });

  describe('subcategories', () => {
    it('collects child categories from a rendered category page', async () => {
      const source = new FakePageSource({ [`${BASE_URL}/cat/medicine`]: mockCategoryPageHTML });
      const parent = { name: 'Medicine', url: `${BASE_URL}/cat/medicine`, source: 'homepage' as const };
      const subcategories = await new CategoryDiscoverer(source, BASE_URL).discoverSubcategories(parent);

      expect(subcategories.map(c => [c.name, c.url])).toEqual([
        ['Pain Relief', `${BASE_URL}/cat/pain-relief`],
        ['Cold & Flu', `${BASE_URL}/cat/cold-flu`],
      ]);
      expect(subcategories.every(c => c.parentUrl === parent.url && c.source === 'navigation')).toBe(true);
      expect(source.calls).toEqual([{ url: parent.url, mode: 'rendered' }]);
    });

    it('returns nothing when the category page cannot be fetched', async () => {
      const parent = { name: 'Gone', url: `${BASE_URL}/cat/gone`, source: 'sitemap' as const };
      expect(await new CategoryDiscoverer(new FakePageSource(), BASE_URL).discoverSubcategories(parent)).toEqual([]);
    });
  });

  it('infers names from category and A-Z URLs', () => {
    expect(inferCategoryName(`${BASE_URL}/cat/cold-flu`)).toBe('Cold Flu');
    expect(inferCategoryName(`${BASE_URL}/atozmedicine/q`)).toBe('Medicines - Q');
    expect(inferCategoryName(`${BASE_URL}/about`)).toBeUndefined();
  });
});
