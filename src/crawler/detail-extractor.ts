import * as cheerio from 'cheerio';
import { config } from '../config';
import {
  DetailedProduct,
  MedicineForm,
  ProductDetail,
  ProductMetadata,
  ProductSummary,
  RelatedProduct,
} from '../types';
import { errorMessage, throwIfInterrupted } from '../utils/errors';
import { parserLogger as logger } from '../utils/logger';
import { canonicalUrl } from '../utils/url';
import { sleep } from '../utils/time';
import { PageSource } from './fetcher';
import {
  BRAND_PATTERNS,
  CURRENT_PRICE_SELECTORS,
  DELIVERY_PATTERNS,
  DETAIL_DESCRIPTION_SELECTORS,
  DETAIL_NAME_SELECTORS,
  DETAIL_OUT_OF_STOCK,
  DETAIL_PRESCRIPTION,
  DOSAGE_PATTERNS,
  FORM_KEYWORDS,
  FORM_LABEL_PATTERNS,
  IMAGE_PATH_MARKERS,
  INGREDIENT_PATTERNS,
  MANUFACTURER_PATTERNS,
  MIN_NAME_LENGTH,
  PRODUCT_PATH,
  RATING_SELECTORS,
  RATING_VALUE,
  RELATED_SECTION_CLASS,
  REVIEW_COUNT_PATTERNS,
  SKU_PATTERNS,
  STOCK_QUANTITY_PATTERNS,
} from './patterns';
import {
  cleanText,
  containsKeyword,
  imageSource,
  labelInteger,
  labelValue,
  normalisePricePair,
  priceTokens,
  resolvePrices,
  textNodes,
  visibleText,
} from './selectors';

export interface DetailExtractorOptions {
  delayMs?: number;
  assetMarker?: string;
}

export interface BatchOptions {
  batchSize?: number;
  signal?: AbortSignal;
  onDetail?: (detail: ProductDetail) => Promise<void>;
}

const escapeRegExp = (value: string): string => value.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

export function inferForm(text: string): MedicineForm | undefined {
  const lower = text.toLowerCase();
  for (const [form, keywords] of FORM_KEYWORDS) {
    if (keywords.some(keyword => new RegExp(`\\b${escapeRegExp(keyword)}s?\\b`).test(lower))) {
      return form;
    }
  }
  return undefined;
}

/** Detail values win over listing values wherever the detail page produced one. */
export function mergeDetail(summary: ProductSummary, detail: ProductDetail): DetailedProduct {
  const detailPriced = detail.priceCurrent !== undefined;

  return {
    ...summary,
    name: detail.name ?? summary.name,
    sku: detail.sku,
    description: detail.description,
    priceCurrent: detailPriced ? detail.priceCurrent : summary.priceCurrent,
    priceOriginal: detailPriced ? detail.priceOriginal : summary.priceOriginal,
    discountPercentage: detailPriced ? detail.discountPercentage : summary.discountPercentage,
    currency: detail.currency,
    manufacturer: detail.manufacturer,
    brand: detail.brand ?? summary.brand,
    ingredients: detail.ingredients,
    dosage: detail.dosage,
    form: detail.form,
    prescriptionRequired: detail.prescriptionRequired || summary.prescriptionRequired,
    images: detail.images,
    imageUrl: summary.imageUrl ?? detail.images[0],
    inStock: detail.inStock,
    stockQuantity: detail.stockQuantity,
    deliveryInfo: detail.deliveryInfo,
    rating: detail.rating,
    reviewCount: detail.reviewCount,
    relatedProducts: detail.relatedProducts,
    metadata: detail.metadata,
    scrapedAt: detail.scrapedAt,
  };
}

export class DetailExtractor {
  private delayMs: number;
  private imageMarkers: string[];

  constructor(
    private source: PageSource,
    options: DetailExtractorOptions = {}
  ) {
    this.delayMs = options.delayMs ?? config.crawler.delayMs;
    this.imageMarkers = [...IMAGE_PATH_MARKERS, options.assetMarker ?? config.site.assetMarker];
  }

  /** Evaluates one field; a failure is logged and leaves the field unset. */
  private field<T>(url: string, name: string, extract: () => T | undefined): T | undefined {
    try {
      return extract();
    } catch (error) {
      logger.warn(`Could not extract ${name} from ${url}: ${errorMessage(error)}`);
      return undefined;
    }
  }

  async extractDetail(url: string): Promise<ProductDetail | null> {
    logger.info(`Extracting detailed medicine info from: ${url}`);
    const $ = await this.source.fetch(url, 'rendered');
    if (!$) return null;
    return this.parseDetail($, url);
  }

  parseDetail($: cheerio.CheerioAPI, url: string): ProductDetail {
    const text = visibleText($.root().toArray());
    const field = <T>(name: string, extract: () => T | undefined) => this.field(url, name, extract);

    const name = field('name', () => this.firstText($, DETAIL_NAME_SELECTORS));
    const description = field('description', () => this.firstText($, DETAIL_DESCRIPTION_SELECTORS));
    const price = field('price', () => this.extractPricing($)) ?? {};

    return {
      url,
      name,
      sku: field('sku', () => labelValue(text, SKU_PATTERNS)),
      description,
      priceCurrent: price.current,
      priceOriginal: price.original,
      discountPercentage: price.discountPercentage,
      currency: 'PKR',
      manufacturer: field('manufacturer', () => labelValue(text, MANUFACTURER_PATTERNS)),
      brand: field('brand', () => labelValue(text, BRAND_PATTERNS)),
      ingredients: field('ingredients', () => labelValue(text, INGREDIENT_PATTERNS)),
      dosage: field('dosage', () => labelValue(text, DOSAGE_PATTERNS)),
      form: field('form', () => this.extractForm(text, name, description)),
      prescriptionRequired: field('prescription', () => containsKeyword(text, DETAIL_PRESCRIPTION)) ?? false,
      images: field('images', () => this.extractImages($, url)) ?? [],
      inStock: field('stock', () => !containsKeyword(text, DETAIL_OUT_OF_STOCK)) ?? true,
      stockQuantity: field('stock quantity', () => labelInteger(text, STOCK_QUANTITY_PATTERNS)),
      deliveryInfo: field('delivery', () => labelValue(text, DELIVERY_PATTERNS)),
      rating: field('rating', () => this.extractRating($)),
      reviewCount: field('reviews', () => labelInteger(text, REVIEW_COUNT_PATTERNS)) ?? 0,
      relatedProducts: field('related products', () => this.extractRelated($, url)) ?? [],
      metadata: field('metadata', () => this.extractMetadata($)) ?? {},
      scrapedAt: new Date(),
    };
  }

  private firstText($: cheerio.CheerioAPI, selectors: readonly string[]): string | undefined {
    for (const selector of selectors) {
      const value = cleanText($(selector).first().text());
      if (value) return value;
    }
    return undefined;
  }

  private extractPricing($: cheerio.CheerioAPI) {
    const resolved = resolvePrices(priceTokens(textNodes($.root().toArray())));

    for (const selector of CURRENT_PRICE_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;
      const [explicit] = priceTokens(textNodes(element.toArray()));
      if (explicit !== undefined) return normalisePricePair(explicit, resolved.original);
    }

    return resolved;
  }

  private extractForm(text: string, name?: string, description?: string): MedicineForm | undefined {
    const label = labelValue(text, FORM_LABEL_PATTERNS);
    return (label && inferForm(label)) || inferForm(`${name ?? ''} ${description ?? ''}`);
  }

  private extractImages($: cheerio.CheerioAPI, pageUrl: string): string[] {
    const images = new Set<string>();

    $('img').each((_, img) => {
      const src = imageSource($(img));
      if (!src) return;
      const lower = src.toLowerCase();
      if (!this.imageMarkers.some(marker => lower.includes(marker.toLowerCase()))) return;
      const resolved = canonicalUrl(src, pageUrl);
      if (resolved) images.add(resolved);
    });

    return [...images];
  }

  private extractRating($: cheerio.CheerioAPI): number | undefined {
    for (const selector of RATING_SELECTORS) {
      const element = $(selector).first();
      if (element.length === 0) continue;
      const match = RATING_VALUE.exec(element.text());
      return match ? parseFloat(match[1]) : undefined;
    }
    return undefined;
  }

  private extractRelated($: cheerio.CheerioAPI, pageUrl: string): RelatedProduct[] {
    const related = new Map<string, RelatedProduct>();

    $('div, section')
      .filter((_, el) => RELATED_SECTION_CLASS.test($(el).attr('class') || ''))
      .find(`a[href*="${PRODUCT_PATH}"]`)
      .each((_, link) => {
        const name = cleanText($(link).text());
        const url = canonicalUrl($(link).attr('href') || '', pageUrl);
        if (url && name.length >= MIN_NAME_LENGTH && !related.has(url)) {
          related.set(url, { name, url });
        }
      });

    return [...related.values()];
  }

  private extractMetadata($: cheerio.CheerioAPI): ProductMetadata {
    const metadata: ProductMetadata = {};

    $('meta').each((_, meta) => {
      const key = ($(meta).attr('name') || $(meta).attr('property') || '').toLowerCase();
      const content = $(meta).attr('content');
      if (!content) return;

      if (key.includes('description')) metadata.metaDescription ??= content;
      else if (key.includes('keywords')) metadata.metaKeywords ??= content;
      else if (key.includes('title')) metadata.metaTitle ??= content;
    });

    const pageTitle = cleanText($('title').first().text());
    if (pageTitle) metadata.pageTitle = pageTitle;

    for (const script of $('script[type="application/ld+json"]').toArray()) {
      try {
        metadata.structuredData = JSON.parse($(script).text());
        break;
      } catch (error) {
        logger.debug(`Ignoring malformed JSON-LD block: ${errorMessage(error)}`);
      }
    }

    return metadata;
  }

  /** Extracts details sequentially in batches; failed pages are logged and skipped. */
  async extractBatch(urls: string[], options: BatchOptions = {}): Promise<ProductDetail[]> {
    const batchSize = Math.max(options.batchSize ?? config.crawler.detailBatchSize, 1);
    const details: ProductDetail[] = [];

    for (let start = 0; start < urls.length; start += batchSize) {
      const batch = urls.slice(start, start + batchSize);
      logger.info(`Processing detail batch ${Math.floor(start / batchSize) + 1}: ${batch.length} products`);

      for (const [index, url] of batch.entries()) {
        throwIfInterrupted(options.signal);
        try {
          const detail = await this.extractDetail(url);
          if (detail) {
            details.push(detail);
            if (options.onDetail) await options.onDetail(detail);
          } else {
            logger.error(`No detail page content for ${url}`);
          }
        } catch (error) {
          logger.error(`Failed to extract details from ${url}: ${errorMessage(error)}`);
        }
        if (index < batch.length - 1) await sleep(this.delayMs);
      }

      if (start + batchSize < urls.length) await sleep(this.delayMs * 2);
    }

    logger.info(`Extracted details for ${details.length}/${urls.length} products`);
    return details;
  }
}
