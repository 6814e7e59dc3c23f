import { describe, it, expect, vi, beforeEach } from 'vitest';

vi.mock('../crawler/rate-limiter', () => ({ RateLimiter: vi.fn() }));

import { RateLimiter } from '../crawler/rate-limiter';
import { config } from '../config';
import { createFetcher, parseArgs } from '../index';

describe('parseArgs', () => {
  it('maps every flag onto crawler options', () => {
    const args = parseArgs([
      '--output-dir', 'exports',
      '--delay', '1.5',
      '--max-products', '10',
      '--max-pages', '3',
      '--no-detailed',
      '--resume',
    ]);

    expect(args).toEqual({
      help: false,
      options: {
        outputDir: 'exports',
        delayMs: 1500,
        maxProductsPerCategory: 10,
        maxPages: 3,
        skipDetails: true,
        resume: true,
      },
    });
  });

  it('recognises help', () => {
    expect(parseArgs(['--help']).help).toBe(true);
  });

  it('ignores unknown flags', () => {
    expect(parseArgs(['--verbose'])).toEqual({ help: false, options: {} });
  });

  it('rejects invalid numbers', () => {
    expect(() => parseArgs(['--max-pages', '0'])).toThrow('--max-pages expects a positive integer, got 0');
    expect(() => parseArgs(['--delay', 'soon'])).toThrow('--delay expects a number of seconds, got soon');
    expect(() => parseArgs(['--max-products'])).toThrow('--max-products expects a positive integer, got nothing');
  });
});

describe('createFetcher', () => {
  beforeEach(() => {
    vi.mocked(RateLimiter).mockClear();
  });

  it('spaces plain requests by the requested delay', () => {
    createFetcher(parseArgs(['--delay', '5']).options);
    expect(RateLimiter).toHaveBeenCalledTimes(1);
    expect(RateLimiter).toHaveBeenCalledWith(5000);
  });

  it('falls back to the configured delay', () => {
    createFetcher({});
    expect(RateLimiter).toHaveBeenCalledWith(config.crawler.delayMs);
  });
});
