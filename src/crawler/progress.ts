import fs from 'fs';
import path from 'path';
import { CrawlerOptions, ScrapeProgress, ScrapeStage } from '../types';
import { errorMessage } from '../utils/errors';
import { crawlerLogger as logger } from '../utils/logger';

export const PROGRESS_FILE = 'scraping_progress.json';

const STAGES: readonly ScrapeStage[] = [
  'initializing',
  'category-discovery',
  'product-extraction',
  'detail-extraction',
  'export',
  'completed',
  'interrupted',
  'error',
];

function isProgress(value: unknown): value is ScrapeProgress {
  if (typeof value !== 'object' || value === null) return false;
  const stage: unknown = Reflect.get(value, 'stage');
  const completed: unknown = Reflect.get(value, 'completedCategoryUrls');
  const counters = ['categoriesDiscovered', 'productsFound', 'productsDetailed', 'persistFailures'];
  return (
    counters.every(key => typeof Reflect.get(value, key) === 'number') &&
    typeof Reflect.get(value, 'startTime') === 'string' &&
    typeof stage === 'string' &&
    STAGES.some(s => s === stage) &&
    Array.isArray(completed) &&
    completed.every(url => typeof url === 'string')
  );
}

/** Checkpoint file kept in the output directory and rewritten on every change. */
export class ProgressTracker {
  readonly file: string;
  private state: ScrapeProgress;

  constructor(outputDir: string, options: CrawlerOptions = {}) {
    this.file = path.join(outputDir, PROGRESS_FILE);
    const now = new Date().toISOString();
    this.state = {
      stage: 'initializing',
      categoriesDiscovered: 0,
      productsFound: 0,
      productsDetailed: 0,
      persistFailures: 0,
      completedCategoryUrls: [],
      options,
      startTime: now,
      timestamp: now,
    };
  }

  get snapshot(): ScrapeProgress {
    return { ...this.state, completedCategoryUrls: [...this.state.completedCategoryUrls] };
  }

  /** Loads a previous checkpoint; returns false when none is readable. */
  restore(): boolean {
    if (!fs.existsSync(this.file)) return false;

    try {
      const parsed: unknown = JSON.parse(fs.readFileSync(this.file, 'utf-8'));
      if (!isProgress(parsed)) {
        logger.warn(`Ignoring malformed checkpoint ${this.file}`);
        return false;
      }
      this.state = { ...parsed, options: this.state.options };
      logger.info(
        `Resuming from checkpoint: stage ${parsed.stage}, ${parsed.completedCategoryUrls.length} categories done`
      );
      return true;
    } catch (error) {
      logger.warn(`Could not read checkpoint ${this.file}: ${errorMessage(error)}`);
      return false;
    }
  }

  isCategoryDone(url: string): boolean {
    return this.state.completedCategoryUrls.includes(url);
  }

  update(changes: Partial<Omit<ScrapeProgress, 'completedCategoryUrls' | 'startTime' | 'timestamp'>>): void {
    this.state = { ...this.state, ...changes };
    this.save();
  }

  markCategoryDone(url: string, productsFound: number): void {
    if (!this.isCategoryDone(url)) {
      this.state.completedCategoryUrls.push(url);
    }
    this.state.productsFound += productsFound;
    this.save();
  }

  save(): void {
    this.state.timestamp = new Date().toISOString();
    fs.mkdirSync(path.dirname(this.file), { recursive: true });
    fs.writeFileSync(this.file, JSON.stringify(this.state, null, 2), 'utf-8');
  }
}
