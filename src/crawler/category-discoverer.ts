import * as cheerio from 'cheerio';
import { config } from '../config';
import { Category, CategorySource } from '../types';
import { parserLogger as logger } from '../utils/logger';
import { canonicalUrl, pathSegmentAfter, titleCaseSlug } from '../utils/url';
import { PageSource } from './fetcher';
import {
  AZ_PATH,
  CATEGORY_IMAGE_ATTRIBUTES,
  CATEGORY_PATH,
  NAVIGATION_LINK,
  NAVIGATION_REGIONS,
  SITEMAP_PATHS,
  SUBCATEGORY_LINK_SELECTORS,
} from './patterns';
import { LinkCandidate, cascadePooled, cleanText, linksMatching, locate, scopeOf } from './selectors';

const LETTERS = 'ABCDEFGHIJKLMNOPQRSTUVWXYZ'.split('');
const MIN_CATEGORY_NAME_LENGTH = 2;

export interface DiscoveryReport {
  categories: Category[];
  bySource: Record<CategorySource, number>;
}

/** Keeps the first record per canonical URL, in input order. */
export function deduplicateCategories(categories: Category[]): Category[] {
  const seen = new Set<string>();
  return categories.filter(category => {
    if (seen.has(category.url)) return false;
    seen.add(category.url);
    return true;
  });
}

export function inferCategoryName(url: string): string | undefined {
  const slug = pathSegmentAfter(url, CATEGORY_PATH);
  if (slug) return titleCaseSlug(slug);

  const letter = pathSegmentAfter(url, AZ_PATH);
  if (letter) return `Medicines - ${letter.toUpperCase()}`;

  return undefined;
}

export function inferCategorySlug(url: string): string | undefined {
  const slug = pathSegmentAfter(url, CATEGORY_PATH);
  if (slug) return slug;

  const letter = pathSegmentAfter(url, AZ_PATH);
  return letter ? `atozmedicine-${letter.toLowerCase()}` : undefined;
}

export function azCategories(baseUrl: string = config.site.baseUrl): Category[] {
  return LETTERS.map((letter): Category => ({
    name: `Medicines starting with ${letter}`,
    url: `${baseUrl}${AZ_PATH}${letter}`,
    slug: `medicine-${letter.toLowerCase()}`,
    source: 'az-enumeration',
  }));
}

export class CategoryDiscoverer {
  constructor(
    private source: PageSource,
    private baseUrl: string = config.site.baseUrl
  ) {}

  /** Category record for a link, or undefined when no usable name can be found. */
  categoryFromLink(link: LinkCandidate, source: CategorySource, parentUrl?: string): Category | undefined {
    const { element, url } = link;
    const name =
      cleanText(element.text()) ||
      cleanText(element.attr('title') || element.attr('alt') || '') ||
      inferCategoryName(url) ||
      '';

    if (name.length < MIN_CATEGORY_NAME_LENGTH) return undefined;

    const img = element.find('img').first();
    const imageSrc = CATEGORY_IMAGE_ATTRIBUTES.map(attribute => img.attr(attribute)).find(Boolean);

    return {
      name,
      url,
      slug: inferCategorySlug(url),
      imageUrl: imageSrc ? canonicalUrl(imageSrc, this.baseUrl) : undefined,
      parentUrl,
      source,
    };
  }

  private categoriesFrom(links: LinkCandidate[], source: CategorySource, parentUrl?: string): Category[] {
    return deduplicateCategories(
      links.flatMap(link => {
        const category = this.categoryFromLink(link, source, parentUrl);
        return category ? [category] : [];
      })
    );
  }

  fromHomepage($: cheerio.CheerioAPI): Category[] {
    const links = locate(scopeOf($, $.root(), this.baseUrl), 'categoryLinks') ?? [];
    return this.categoriesFrom(links, 'homepage');
  }

  fromNavigation($: cheerio.CheerioAPI): Category[] {
    const links = NAVIGATION_REGIONS.flatMap(region =>
      $(region)
        .toArray()
        .flatMap(el => linksMatching('a[href]').run(scopeOf($, $(el), this.baseUrl)))
    ).filter(link => NAVIGATION_LINK.test(link.url));

    return this.categoriesFrom(links, 'navigation');
  }

  fromSitemapDocument($: cheerio.CheerioAPI): Category[] {
    const fromLoc: Category[] = $('url > loc')
      .toArray()
      .flatMap(el => {
        const url = canonicalUrl($(el).text(), this.baseUrl);
        if (!url || !url.includes(CATEGORY_PATH)) return [];
        const slug = pathSegmentAfter(url, CATEGORY_PATH);
        return slug ? [{ name: titleCaseSlug(slug), url, slug, source: 'sitemap' as const }] : [];
      });

    const fromAnchors = this.categoriesFrom(
      linksMatching(`a[href*="${CATEGORY_PATH}"]`).run(scopeOf($, $.root(), this.baseUrl)),
      'sitemap'
    );

    return deduplicateCategories([...fromLoc, ...fromAnchors]);
  }

  async collectHomepage(): Promise<Category[]> {
    const $ = await this.source.fetch(this.baseUrl);
    return $ ? this.fromHomepage($) : [];
  }

  async collectNavigation(): Promise<Category[]> {
    const $ = await this.source.fetch(this.baseUrl);
    return $ ? this.fromNavigation($) : [];
  }

  async collectSitemap(): Promise<Category[]> {
    for (const path of SITEMAP_PATHS) {
      const url = `${this.baseUrl}${path}`;
      const $ = await this.source.fetch(url);
      if (!$) {
        logger.debug(`Sitemap candidate unavailable: ${url}`);
        continue;
      }

      let categories = this.fromSitemapDocument($);

      const children = $('sitemapindex > sitemap > loc')
        .toArray()
        .map(el => cleanText($(el).text()))
        .filter(Boolean);
      for (const child of children) {
        const child$ = await this.source.fetch(child);
        if (child$) categories = categories.concat(this.fromSitemapDocument(child$));
      }

      categories = deduplicateCategories(categories);
      if (categories.length > 0) {
        logger.info(`Found ${categories.length} categories in sitemap ${url}`);
        return categories;
      }
    }

    logger.warn('No sitemap candidate yielded categories');
    return [];
  }

  collectAtoZ(): Category[] {
    return azCategories(this.baseUrl);
  }

  /** Union of every collector, deduplicated by canonical URL; source of the first finder is kept. */
  async discoverAll(): Promise<DiscoveryReport> {
    const homepage$ = await this.source.fetch(this.baseUrl);

    const collected: Array<[CategorySource, Category[]]> = [
      ['homepage', homepage$ ? this.fromHomepage(homepage$) : []],
      ['sitemap', await this.collectSitemap()],
      ['az-enumeration', this.collectAtoZ()],
      ['navigation', homepage$ ? this.fromNavigation(homepage$) : []],
    ];

    const bySource: Record<CategorySource, number> = {
      'homepage': 0,
      'sitemap': 0,
      'az-enumeration': 0,
      'navigation': 0,
    };
    for (const [source, categories] of collected) {
      bySource[source] = categories.length;
      logger.info(`Collected ${categories.length} categories from ${source}`);
    }

    const categories = deduplicateCategories(collected.flatMap(([, list]) => list));
    logger.info(`Discovered ${categories.length} unique categories`);
    return { categories, bySource };
  }

  async discoverSubcategories(category: Category): Promise<Category[]> {
    const $ = await this.source.fetch(category.url, 'rendered');
    if (!$) return [];

    const scope = scopeOf($, $.root(), category.url);
    const links = cascadePooled(SUBCATEGORY_LINK_SELECTORS.map(linksMatching), [scope], link => link.url)
      .filter(link => link.url !== category.url);

    const subcategories = this.categoriesFrom(links, 'navigation', category.url);
    logger.debug(`Found ${subcategories.length} subcategories under ${category.name}`);
    return subcategories;
  }
}
