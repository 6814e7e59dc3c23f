import dotenv from 'dotenv';
import path from 'path';

dotenv.config();

const isTestRun = process.env.NODE_ENV === 'test' || process.env.VITEST !== undefined;

export const config = {
  database: {
    url: process.env.DATABASE_URL || 'postgresql://localhost:5432/catalog_db',
    maxConnections: 10,
    idleTimeoutMillis: 30000,
    connectionTimeoutMillis: 2000,
  },

  site: {
    baseUrl: (process.env.CATALOG_BASE_URL || 'https://www.dvago.pk').replace(/\/+$/, ''),
    assetMarker: process.env.CATALOG_ASSET_MARKER || 'dvago-assets',
  },

  crawler: {
    delayMs: parseInt(process.env.CRAWLER_DELAY_MS || '2000'),
    maxAttempts: parseInt(process.env.CRAWLER_MAX_ATTEMPTS || '3'),
    retryBaseMs: parseInt(process.env.CRAWLER_RETRY_BASE_MS || '1000'),
    timeoutMs: parseInt(process.env.CRAWLER_TIMEOUT_MS || '30000'),
    renderSettleMs: parseInt(process.env.CRAWLER_RENDER_SETTLE_MS || '2000'),
    headless: process.env.CRAWLER_HEADLESS !== 'false',
    detailBatchSize: parseInt(process.env.CRAWLER_DETAIL_BATCH_SIZE || '10'),
  },

  export: {
    outputDir: process.env.OUTPUT_DIR || 'catalog_data',
  },

  logging: {
    level: process.env.LOG_LEVEL || (isTestRun ? 'silent' : 'info'),
    file: process.env.LOG_FILE || path.join(process.cwd(), 'logs', 'crawler.log'),
  },

  env: process.env.NODE_ENV || 'development',
  isTest: isTestRun,
  isDevelopment: process.env.NODE_ENV !== 'production',
  isProduction: process.env.NODE_ENV === 'production',
};
