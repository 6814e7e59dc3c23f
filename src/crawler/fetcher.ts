import * as cheerio from 'cheerio';
import { config } from '../config';
import { FetchMode } from '../types';
import { errorMessage } from '../utils/errors';
import { crawlerLogger as logger } from '../utils/logger';
import { RetryPolicy, withRetry } from '../utils/retry';
import { BrowserSession } from './browser';
import { HttpClient } from './http-client';

export interface PageSource {
  fetch(url: string, mode?: FetchMode): Promise<cheerio.CheerioAPI | null>;
}

export function isXmlDocument(url: string, contentType: string): boolean {
  const type = contentType.toLowerCase();
  return url.toLowerCase().includes('xml') || type.startsWith('application/xml') || type.startsWith('text/xml');
}

export function parseDocument(url: string, body: string, contentType = ''): cheerio.CheerioAPI {
  return isXmlDocument(url, contentType) ? cheerio.load(body, { xml: true }) : cheerio.load(body);
}

export class Fetcher implements PageSource {
  private retry: RetryPolicy;

  constructor(
    private http: HttpClient = new HttpClient(),
    private browser: BrowserSession = new BrowserSession(),
    retry?: RetryPolicy
  ) {
    this.retry = retry ?? {
      maxAttempts: config.crawler.maxAttempts,
      baseDelayMs: config.crawler.retryBaseMs,
    };
  }

  async fetch(url: string, mode: FetchMode = 'plain'): Promise<cheerio.CheerioAPI | null> {
    try {
      if (mode === 'rendered' && !this.browser.isUnavailable) {
        const html = await withRetry(`Render ${url}`, this.retry, () => this.browser.render(url));
        if (html !== null) return cheerio.load(html);
        logger.debug(`Rendering skipped for ${url}, using plain HTTP`);
      }

      const page = await this.http.get(url);
      return parseDocument(url, page.body, page.contentType);
    } catch (error) {
      logger.error(`Giving up on ${url}: ${errorMessage(error)}`);
      return null;
    }
  }

  async close(): Promise<void> {
    await this.browser.close();
    await this.http.close();
  }
}
