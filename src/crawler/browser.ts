import { Browser, chromium } from 'playwright-core';
import { config } from '../config';
import { errorMessage } from '../utils/errors';
import { crawlerLogger as logger } from '../utils/logger';
import { sleep } from '../utils/time';
import { randomUserAgent } from './http-client';

export interface BrowserSessionOptions {
  headless?: boolean;
  settleMs?: number;
  timeoutMs?: number;
  executablePath?: string;
}

type BrowserState =
  | { status: 'idle' }
  | { status: 'launching'; launch: Promise<Browser | null> }
  | { status: 'ready'; browser: Browser }
  | { status: 'unavailable' };

/** Lazily launched Chromium shared by every rendered fetch of a run. */
export class BrowserSession {
  private state: BrowserState = { status: 'idle' };
  private options: Required<Omit<BrowserSessionOptions, 'executablePath'>> & { executablePath?: string };

  constructor(options: BrowserSessionOptions = {}) {
    this.options = {
      headless: options.headless ?? config.crawler.headless,
      settleMs: options.settleMs ?? config.crawler.renderSettleMs,
      timeoutMs: options.timeoutMs ?? config.crawler.timeoutMs,
      executablePath: options.executablePath ?? process.env.CHROMIUM_PATH,
    };
  }

  get isUnavailable(): boolean {
    return this.state.status === 'unavailable';
  }

  private async browser(): Promise<Browser | null> {
    switch (this.state.status) {
      case 'ready':
        return this.state.browser;
      case 'unavailable':
        return null;
      case 'launching':
        return this.state.launch;
      case 'idle': {
        const launch = this.launch();
        this.state = { status: 'launching', launch };
        return launch;
      }
    }
  }

  private async launch(): Promise<Browser | null> {
    try {
      const browser = await chromium.launch({
        headless: this.options.headless,
        executablePath: this.options.executablePath,
        args: ['--disable-dev-shm-usage', '--no-sandbox'],
      });
      this.state = { status: 'ready', browser };
      logger.info('Browser session started');
      return browser;
    } catch (error) {
      this.state = { status: 'unavailable' };
      logger.warn(`Browser unavailable, rendered fetches fall back to plain HTTP: ${errorMessage(error)}`);
      return null;
    }
  }

  /** Returns the rendered markup, or null when no browser can be started. */
  async render(url: string): Promise<string | null> {
    const browser = await this.browser();
    if (!browser) return null;

    const context = await browser.newContext({ userAgent: randomUserAgent() });
    try {
      const page = await context.newPage();
      await page.goto(url, { waitUntil: 'domcontentloaded', timeout: this.options.timeoutMs });
      await sleep(this.options.settleMs);
      return await page.content();
    } finally {
      await context.close();
    }
  }

  async close(): Promise<void> {
    if (this.state.status === 'launching') {
      await this.state.launch;
    }
    if (this.state.status === 'ready') {
      await this.state.browser.close();
      logger.info('Browser session closed');
    }
    this.state = { status: 'idle' };
  }
}
