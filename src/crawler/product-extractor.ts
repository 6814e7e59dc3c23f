import * as cheerio from 'cheerio';
import { config } from '../config';
import { ProductSummary } from '../types';
import { errorMessage, throwIfInterrupted } from '../utils/errors';
import { parserLogger as logger } from '../utils/logger';
import { pathSegmentAfter, withPageParam } from '../utils/url';
import { sleep } from '../utils/time';
import { PageSource } from './fetcher';
import { NEXT_PAGE_SELECTORS, PRODUCT_COUNT_SELECTORS, PRODUCT_PATH } from './patterns';
import { LinkCandidate, locate, scopeOf } from './selectors';

export interface ProductExtractorOptions {
  delayMs?: number;
}

export class ProductExtractor {
  private delayMs: number;

  constructor(
    private source: PageSource,
    options: ProductExtractorOptions = {}
  ) {
    this.delayMs = options.delayMs ?? config.crawler.delayMs;
  }

  summaryFromLink($: cheerio.CheerioAPI, link: LinkCandidate, pageUrl: string): ProductSummary | undefined {
    const scope = scopeOf($, link.element, pageUrl);

    const name = locate(scope, 'name');
    if (!name) return undefined;

    const price = locate(scope, 'price') ?? {};

    return {
      name,
      url: link.url,
      slug: pathSegmentAfter(link.url, PRODUCT_PATH),
      priceCurrent: price.current,
      priceOriginal: price.original,
      discountPercentage: price.discountPercentage,
      imageUrl: locate(scope, 'image'),
      brand: locate(scope, 'brand'),
      inStock: locate(scope, 'inStock') ?? true,
      prescriptionRequired: locate(scope, 'prescriptionRequired') ?? false,
    };
  }

  summariesFromPage($: cheerio.CheerioAPI, pageUrl: string): ProductSummary[] {
    const links = locate(scopeOf($, $.root(), pageUrl), 'productLinks') ?? [];
    const products: ProductSummary[] = [];

    for (const link of links) {
      try {
        const product = this.summaryFromLink($, link, pageUrl);
        if (product) products.push(product);
      } catch (error) {
        logger.debug(`Skipping product link ${link.url}: ${errorMessage(error)}`);
      }
    }

    return products;
  }

  hasNextPage($: cheerio.CheerioAPI): boolean {
    const labelled = $('a[href*="page="]')
      .toArray()
      .some(el => {
        const text = $(el).text();
        return text.includes('Next') || text.includes('>');
      });

    return labelled || NEXT_PAGE_SELECTORS.some(selector => $(selector).length > 0);
  }

  async extractPage(pageUrl: string): Promise<ProductSummary[]> {
    const $ = await this.source.fetch(pageUrl, 'rendered');
    return $ ? this.summariesFromPage($, pageUrl) : [];
  }

  async extractPaginated(categoryUrl: string, maxPages?: number, signal?: AbortSignal): Promise<ProductSummary[]> {
    const seen = new Set<string>();
    const all: ProductSummary[] = [];

    for (let page = 1; maxPages === undefined || page <= maxPages; page++) {
      throwIfInterrupted(signal);
      const pageUrl = withPageParam(categoryUrl, page);
      logger.info(`Scraping page ${page}: ${pageUrl}`);

      const $ = await this.source.fetch(pageUrl, 'rendered');
      const products = $ ? this.summariesFromPage($, pageUrl) : [];

      if (!$ || products.length === 0) {
        logger.info(`No products found on page ${page}, stopping pagination`);
        break;
      }

      for (const product of products) {
        if (seen.has(product.url)) continue;
        seen.add(product.url);
        all.push(product);
      }
      logger.info(`Found ${products.length} products on page ${page}`);

      if (!this.hasNextPage($)) {
        logger.info('No more pages found');
        break;
      }

      await sleep(this.delayMs);
    }

    logger.info(`Total products extracted from ${categoryUrl}: ${all.length}`);
    return all;
  }

  async countProducts(categoryUrl: string): Promise<number> {
    const $ = await this.source.fetch(categoryUrl);
    if (!$) return 0;

    for (const selector of PRODUCT_COUNT_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;
      const match = /(\d+)/.exec(element.text());
      if (match) return parseInt(match[1], 10);
    }

    return $(`a[href*="${PRODUCT_PATH}"]`).length;
  }
}
