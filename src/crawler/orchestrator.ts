import fs from 'fs';
import path from 'path';
import { config } from '../config';
import {
  CatalogStore,
  Category,
  CrawlerOptions,
  ExportResults,
  ProductDetail,
  ProductRow,
  ProductSummary,
} from '../types';
import { InterruptedError, errorMessage, throwIfInterrupted } from '../utils/errors';
import { crawlerLogger as logger } from '../utils/logger';
import { formatDuration, sleep } from '../utils/time';
import { DataExporter } from '../export/exporter';
import { CategoryDiscoverer, deduplicateCategories } from './category-discoverer';
import { DetailExtractor, mergeDetail } from './detail-extractor';
import { PageSource } from './fetcher';
import { MEDICINE_CATEGORY_KEYWORDS, MEDICINE_NAME_KEYWORDS } from './patterns';
import { ProductExtractor } from './product-extractor';
import { ProgressTracker } from './progress';
import { containsKeyword } from './selectors';

export const FINAL_REPORT_FILE = 'final_scraping_report.json';
export const DETAILED_MEDICINES_FILE = 'detailed_medicines.json';

export interface OrchestratorDeps {
  source: PageSource;
  store: CatalogStore;
  exporter?: DataExporter;
}

export interface RunSummary {
  categories: number;
  products: number;
  detailed: number;
  persistFailures: number;
  durationMs: number;
  exports?: ExportResults;
}

export function isMedicineProduct(product: ProductSummary, categoryName?: string): boolean {
  return (
    containsKeyword(product.name, MEDICINE_NAME_KEYWORDS) ||
    (categoryName !== undefined && containsKeyword(categoryName, MEDICINE_CATEGORY_KEYWORDS))
  );
}

function summaryFromRow(row: ProductRow, categoryUrl: string): ProductSummary {
  return {
    name: row.name,
    url: row.url,
    slug: row.slug ?? undefined,
    priceCurrent: row.price_current ?? undefined,
    priceOriginal: row.price_original ?? undefined,
    discountPercentage: row.discount_percentage ?? undefined,
    imageUrl: row.image_url ?? undefined,
    brand: row.brand ?? undefined,
    inStock: row.in_stock,
    prescriptionRequired: row.prescription_required,
    categoryUrl,
  };
}

export class CatalogOrchestrator {
  private discoverer: CategoryDiscoverer;
  private productExtractor: ProductExtractor;
  private detailExtractor: DetailExtractor;
  private controller = new AbortController();
  private outputDir: string;
  private persistFailures = 0;
  private delayMs: number;

  constructor(
    private deps: OrchestratorDeps,
    private options: CrawlerOptions = {},
    baseUrl: string = config.site.baseUrl
  ) {
    const delayMs = options.delayMs ?? config.crawler.delayMs;
    this.delayMs = delayMs;
    this.outputDir = options.outputDir ?? config.export.outputDir;
    this.discoverer = new CategoryDiscoverer(deps.source, baseUrl);
    this.productExtractor = new ProductExtractor(deps.source, { delayMs });
    this.detailExtractor = new DetailExtractor(deps.source, { delayMs });
  }

  /** Stops the run at the next unit of work. */
  abort(reason = 'SIGINT'): void {
    this.controller.abort(reason);
  }

  async run(): Promise<RunSummary> {
    const started = Date.now();
    const progress = new ProgressTracker(this.outputDir, this.options);
    if (this.options.resume) progress.restore();

    logger.info(`Starting catalog scrape into ${this.outputDir}`);

    try {
      progress.update({ stage: 'category-discovery' });
      const categories = await this.discoverCategories(progress);

      progress.update({ stage: 'product-extraction' });
      const products = await this.extractProducts(categories, progress);

      let details: ProductDetail[] = [];
      if (!this.options.skipDetails) {
        progress.update({ stage: 'detail-extraction' });
        details = await this.extractDetails(products, categories, progress);
      }

      progress.update({ stage: 'export', persistFailures: this.persistFailures });
      throwIfInterrupted(this.controller.signal);
      const exports = await this.exportAll();

      progress.update({ stage: 'completed', persistFailures: this.persistFailures });

      const summary: RunSummary = {
        categories: categories.length,
        products: products.length,
        detailed: details.length,
        persistFailures: this.persistFailures,
        durationMs: Date.now() - started,
        exports,
      };
      this.writeFinalReport(summary, progress);
      this.logSummary(summary);
      return summary;
    } catch (error) {
      if (error instanceof InterruptedError) {
        logger.warn(`Scraping interrupted: ${error.message}`);
        progress.update({ stage: 'interrupted', error: error.message, persistFailures: this.persistFailures });
      } else {
        logger.error(`Scraping failed: ${errorMessage(error)}`);
        progress.update({ stage: 'error', error: errorMessage(error), persistFailures: this.persistFailures });
      }
      throw error;
    }
  }

  private async exportAll(): Promise<ExportResults | undefined> {
    if (!this.deps.exporter) return undefined;
    try {
      return await this.deps.exporter.exportAll();
    } catch (error) {
      logger.error(`Export failed: ${errorMessage(error)}`);
      return undefined;
    }
  }

  private async persisted(write: Promise<number | null>): Promise<number | null> {
    const id = await write;
    if (id === null) this.persistFailures++;
    return id;
  }

  private async storedCategories(): Promise<Category[]> {
    const rows = await this.deps.store.query('categories');
    const urlById = new Map(rows.map(row => [row.id, row.url]));

    return rows.map(row => ({
      name: row.name,
      url: row.url,
      slug: row.slug ?? undefined,
      imageUrl: row.image_url ?? undefined,
      parentUrl: row.parent_id !== null ? urlById.get(row.parent_id) : undefined,
      source: row.source,
    }));
  }

  private async discoverCategories(progress: ProgressTracker): Promise<Category[]> {
    if (this.options.resume) {
      try {
        const stored = await this.storedCategories();
        if (stored.length > 0) {
          logger.info(`Resuming with ${stored.length} stored categories`);
          progress.update({ categoriesDiscovered: stored.length });
          return stored;
        }
      } catch (error) {
        this.persistFailures++;
        logger.warn(`Could not load stored categories, rediscovering: ${errorMessage(error)}`);
      }
    }

    const { categories: main } = await this.discoverer.discoverAll();

    const subcategories: Category[] = [];
    for (const [index, category] of main.entries()) {
      throwIfInterrupted(this.controller.signal);
      if (index > 0) await sleep(this.delayMs);
      subcategories.push(...(await this.discoverer.discoverSubcategories(category)));
    }

    const categories = deduplicateCategories([...main, ...subcategories]);
    for (const category of categories) {
      await this.persisted(this.deps.store.upsertCategory(category));
    }

    logger.info(`Category discovery complete: ${categories.length} categories (${subcategories.length} subcategory links)`);
    progress.update({ categoriesDiscovered: categories.length });
    return categories;
  }

  private async productsFromStore(categoryUrl: string): Promise<ProductSummary[]> {
    const [category] = await this.deps.store.query('categories', { url: categoryUrl });
    if (!category) return [];
    const rows = await this.deps.store.query('products', { category_id: category.id });
    return rows.map(row => summaryFromRow(row, categoryUrl));
  }

  private async categoryProducts(
    category: Category,
    index: number,
    total: number,
    progress: ProgressTracker
  ): Promise<ProductSummary[]> {
    if (progress.isCategoryDone(category.url)) {
      const stored = await this.productsFromStore(category.url);
      logger.info(`Skipping completed category ${category.name} (${stored.length} stored products)`);
      return stored;
    }

    logger.info(`Processing category ${index + 1}/${total}: ${category.name}`);
    const found = await this.productExtractor.extractPaginated(
      category.url,
      this.options.maxPages,
      this.controller.signal
    );
    const cap = this.options.maxProductsPerCategory;
    const products = (cap !== undefined ? found.slice(0, cap) : found).map(product => ({
      ...product,
      categoryUrl: category.url,
    }));

    for (const product of products) {
      await this.persisted(this.deps.store.upsertProduct(product));
    }
    progress.markCategoryDone(category.url, products.length);
    return products;
  }

  private async extractProducts(categories: Category[], progress: ProgressTracker): Promise<ProductSummary[]> {
    const byUrl = new Map<string, ProductSummary>();

    for (const [index, category] of categories.entries()) {
      throwIfInterrupted(this.controller.signal);

      let products: ProductSummary[];
      try {
        products = await this.categoryProducts(category, index, categories.length, progress);
      } catch (error) {
        if (error instanceof InterruptedError) throw error;
        this.persistFailures++;
        logger.error(`Category ${category.name} failed, continuing: ${errorMessage(error)}`);
        continue;
      }

      for (const product of products) {
        if (!byUrl.has(product.url)) byUrl.set(product.url, product);
      }
    }

    logger.info(`Product extraction complete: ${byUrl.size} unique products`);
    return [...byUrl.values()];
  }

  private async extractDetails(
    products: ProductSummary[],
    categories: Category[],
    progress: ProgressTracker
  ): Promise<ProductDetail[]> {
    const categoryNames = new Map(categories.map(c => [c.url, c.name]));
    const candidates = products.filter(product =>
      isMedicineProduct(product, product.categoryUrl ? categoryNames.get(product.categoryUrl) : undefined)
    );
    const byUrl = new Map(candidates.map(product => [product.url, product]));
    logger.info(`Extracting details for ${candidates.length} medicine products`);

    let detailed = 0;
    const details = await this.detailExtractor.extractBatch(
      candidates.map(product => product.url),
      {
        signal: this.controller.signal,
        onDetail: async (detail) => {
          const summary = byUrl.get(detail.url);
          if (!summary) return;
          await this.persisted(this.deps.store.upsertProduct(mergeDetail(summary, detail)));
          detailed++;
          progress.update({ productsDetailed: detailed });
        },
      }
    );

    fs.mkdirSync(this.outputDir, { recursive: true });
    fs.writeFileSync(path.join(this.outputDir, DETAILED_MEDICINES_FILE), JSON.stringify(details, null, 2), 'utf-8');
    return details;
  }

  private writeFinalReport(summary: RunSummary, progress: ProgressTracker): void {
    const state = progress.snapshot;
    const report = {
      scrapingSummary: {
        startTime: state.startTime,
        endTime: new Date().toISOString(),
        duration: formatDuration(summary.durationMs),
        totalCategories: summary.categories,
        totalProducts: summary.products,
        detailedMedicines: summary.detailed,
        persistFailures: summary.persistFailures,
      },
      exportResults: summary.exports ?? null,
      options: this.options,
    };

    const file = path.join(this.outputDir, FINAL_REPORT_FILE);
    fs.writeFileSync(file, JSON.stringify(report, null, 2), 'utf-8');
    logger.info(`Final report saved: ${file}`);
  }

  private logSummary(summary: RunSummary): void {
    logger.info('='.repeat(60));
    logger.info('SCRAPING COMPLETED');
    logger.info(`Duration: ${formatDuration(summary.durationMs)}`);
    logger.info(`Categories: ${summary.categories}`);
    logger.info(`Products: ${summary.products}`);
    logger.info(`Detailed medicines: ${summary.detailed}`);
    logger.info(`Persistence failures: ${summary.persistFailures}`);
    if (summary.exports?.report) logger.info(`Report: ${summary.exports.report}`);
    logger.info('='.repeat(60));
  }
}
