#!/usr/bin/env node
import { CatalogOrchestrator } from './crawler/orchestrator';
import { Fetcher } from './crawler/fetcher';
import { HttpClient } from './crawler/http-client';
import { RateLimiter } from './crawler/rate-limiter';
import { CatalogRepository } from './database/repository';
import { closeDatabase } from './database/connection';
import { runMigration } from './database/migrate';
import { DataExporter } from './export/exporter';
import { CrawlerOptions } from './types';
import { InterruptedError, errorMessage } from './utils/errors';
import { logger } from './utils/logger';
import { config } from './config';

export { CatalogOrchestrator } from './crawler/orchestrator';
export { CategoryDiscoverer } from './crawler/category-discoverer';
export { ProductExtractor } from './crawler/product-extractor';
export { DetailExtractor } from './crawler/detail-extractor';
export { Fetcher } from './crawler/fetcher';
export type { PageSource } from './crawler/fetcher';
export { CatalogRepository } from './database/repository';
export { DataExporter } from './export/exporter';
export * from './types';

export const USAGE = `Usage: pharmacy-catalog-extract [options]

Options:
  --output-dir DIR     Directory for exports and checkpoints (default: ${config.export.outputDir})
  --delay SECONDS      Delay between requests (default: ${config.crawler.delayMs / 1000})
  --max-products N     Maximum products kept per category
  --max-pages N        Maximum listing pages per category
  --no-detailed        Skip detail page extraction
  --resume             Resume from the last checkpoint
  --help               Show this message`;

export interface CliArgs {
  options: CrawlerOptions;
  help: boolean;
}

function positiveInteger(flag: string, value: string | undefined): number {
  const parsed = Number(value);
  if (value === undefined || !Number.isInteger(parsed) || parsed < 1) {
    throw new Error(`${flag} expects a positive integer, got ${value ?? 'nothing'}`);
  }
  return parsed;
}

export function parseArgs(argv: string[]): CliArgs {
  const options: CrawlerOptions = {};
  let help = false;

  for (let i = 0; i < argv.length; i++) {
    const flag = argv[i];

    switch (flag) {
      case '--output-dir': {
        const value = argv[++i];
        if (!value) throw new Error('--output-dir expects a directory');
        options.outputDir = value;
        break;
      }
      case '--delay': {
        const value = argv[++i];
        const seconds = Number(value);
        if (value === undefined || !Number.isFinite(seconds) || seconds < 0) {
          throw new Error(`--delay expects a number of seconds, got ${value ?? 'nothing'}`);
        }
        options.delayMs = Math.round(seconds * 1000);
        break;
      }
      case '--max-products':
        options.maxProductsPerCategory = positiveInteger(flag, argv[++i]);
        break;
      case '--max-pages':
        options.maxPages = positiveInteger(flag, argv[++i]);
        break;
      case '--no-detailed':
        options.skipDetails = true;
        break;
      case '--resume':
        options.resume = true;
        break;
      case '--help':
      case '-h':
        help = true;
        break;
      default:
        logger.warn(`Unknown flag: ${flag}`);
    }
  }

  return { options, help };
}

/** Plain requests are spaced by the run's delay, not only the configured default. */
export function createFetcher(options: CrawlerOptions): Fetcher {
  const delayMs = options.delayMs ?? config.crawler.delayMs;
  return new Fetcher(new HttpClient({ limiter: new RateLimiter(delayMs) }));
}

async function main(): Promise<number> {
  let args: CliArgs;
  try {
    args = parseArgs(process.argv.slice(2));
  } catch (error) {
    logger.error(errorMessage(error));
    console.error(USAGE);
    return 1;
  }

  if (args.help) {
    console.log(USAGE);
    return 0;
  }

  logger.info(`Pharmacy catalog extractor starting - version: 1.0.0, environment: ${config.env}`);

  const fetcher = createFetcher(args.options);
  const outputDir = args.options.outputDir ?? config.export.outputDir;

  try {
    await runMigration();
    const store = new CatalogRepository();
    const orchestrator = new CatalogOrchestrator(
      { source: fetcher, store, exporter: new DataExporter(store, outputDir) },
      { ...args.options, outputDir }
    );

    const stop = (signal: NodeJS.Signals) => {
      logger.warn(`Received ${signal}, stopping after the current step`);
      orchestrator.abort(signal);
    };
    process.once('SIGINT', stop);
    process.once('SIGTERM', stop);

    await orchestrator.run();
    logger.info('Scrape completed successfully');
    return 0;
  } catch (error) {
    if (error instanceof InterruptedError) {
      logger.warn('Scrape interrupted; rerun with --resume to continue');
    } else {
      logger.error(`Scrape failed with error: ${errorMessage(error)}`);
    }
    return 1;
  } finally {
    await fetcher.close();
    await closeDatabase();
  }
}

if (require.main === module) {
  main()
    .then(code => process.exit(code))
    .catch(error => {
      logger.error(`Fatal error: ${errorMessage(error)}`);
      process.exit(1);
    });
}
