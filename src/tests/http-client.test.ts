import { describe, it, expect, beforeAll, afterAll, afterEach } from 'vitest';
import nock from 'nock';
import { HttpClient, randomUserAgent } from '../crawler/http-client';
import { BrowserSession } from '../crawler/browser';
import { Fetcher, isXmlDocument, parseDocument } from '../crawler/fetcher';
import { RateLimiter } from '../crawler/rate-limiter';
import { FetchError } from '../utils/errors';
import { mockSitemapXML } from './mock-data';

const HOST = 'https://shop.test';

const client = (maxAttempts = 3) =>
  new HttpClient({ retry: { maxAttempts, baseDelayMs: 1 }, limiter: new RateLimiter(0), timeoutMs: 2000 });

class StubBrowser extends BrowserSession {
  readonly rendered: string[] = [];

  constructor(private markup: string | null) {
    super({ settleMs: 0 });
  }

  async render(url: string): Promise<string | null> {
    this.rendered.push(url);
    return this.markup;
  }
}

beforeAll(() => {
  nock.disableNetConnect();
});

afterEach(() => {
  nock.cleanAll();
});

afterAll(() => {
  nock.enableNetConnect();
});

describe('HttpClient', () => {
  it('retries transient failures', async () => {
    nock(HOST).get('/page').reply(500).get('/page').reply(200, '<html><body>ok</body></html>', {
      'Content-Type': 'text/html; charset=utf-8',
    });

    const page = await client().get(`${HOST}/page`);
    expect(page.status).toBe(200);
    expect(page.body).toBe('<html><body>ok</body></html>');
    expect(page.contentType).toBe('text/html; charset=utf-8');
  });

  it('throws a FetchError after the last attempt', async () => {
    nock(HOST).get('/down').times(3).reply(503);

    const error = await client().get(`${HOST}/down`).catch((e: unknown) => e);
    expect(error).toBeInstanceOf(FetchError);
    expect(error).toMatchObject({ url: `${HOST}/down`, attempts: 3, status: 503 });
    expect(nock.isDone()).toBe(true);
  });

  it('sends a desktop browser user agent', async () => {
    nock(HOST).matchHeader('user-agent', /^Mozilla\//).get('/ua').reply(200, 'ok');
    const page = await client().get(`${HOST}/ua`);
    expect(page.body).toBe('ok');
  });

  it('counts requests', async () => {
    nock(HOST).get('/a').reply(200, 'a').get('/b').reply(200, 'b');
    const http = client();
    await http.get(`${HOST}/a`);
    await http.get(`${HOST}/b`);
    expect(http.getStats().totalRequests).toBe(2);
  });

  it('generates user agent strings', () => {
    expect(randomUserAgent()).toMatch(/^Mozilla\//);
  });
});

describe('Fetcher', () => {
  it('parses plain fetches through the HTTP client', async () => {
    nock(HOST).get('/cat/vitamins').reply(200, '<html><body><h1>Vitamins</h1></body></html>');
    const fetcher = new Fetcher(client(), new StubBrowser(null));

    const $ = await fetcher.fetch(`${HOST}/cat/vitamins`);
    expect($?.('h1').text()).toBe('Vitamins');
  });

  it('uses the browser for rendered fetches', async () => {
    const browser = new StubBrowser('<html><body><h1>Rendered</h1></body></html>');
    const fetcher = new Fetcher(client(), browser, { maxAttempts: 1, baseDelayMs: 1 });

    const $ = await fetcher.fetch(`${HOST}/cat/vitamins`, 'rendered');
    expect($?.('h1').text()).toBe('Rendered');
    expect(browser.rendered).toEqual([`${HOST}/cat/vitamins`]);
  });

  it('falls back to plain HTTP when no browser is available', async () => {
    nock(HOST).get('/cat/vitamins').reply(200, '<html><body><h1>Plain</h1></body></html>');
    const fetcher = new Fetcher(client(), new StubBrowser(null), { maxAttempts: 1, baseDelayMs: 1 });

    const $ = await fetcher.fetch(`${HOST}/cat/vitamins`, 'rendered');
    expect($?.('h1').text()).toBe('Plain');
  });

  it('returns null once retries are exhausted', async () => {
    nock(HOST).get('/missing').reply(404);
    const fetcher = new Fetcher(client(1), new StubBrowser(null));
    expect(await fetcher.fetch(`${HOST}/missing`)).toBeNull();
  });

  it('parses XML documents in XML mode', async () => {
    nock(HOST).get('/sitemap.xml').reply(200, mockSitemapXML, { 'Content-Type': 'application/xml' });
    const fetcher = new Fetcher(client(), new StubBrowser(null));

    const $ = await fetcher.fetch(`${HOST}/sitemap.xml`);
    expect($?.('url > loc').first().text()).toBe('https://shop.test/cat/vitamins');
  });
});

describe('document sniffing', () => {
  it('detects XML by URL or content type', () => {
    expect(isXmlDocument('https://shop.test/sitemap.xml', '')).toBe(true);
    expect(isXmlDocument('https://shop.test/feed', 'text/xml; charset=utf-8')).toBe(true);
    expect(isXmlDocument('https://shop.test/cat/vitamins', 'text/html')).toBe(false);
  });

  it('keeps XML element names intact', () => {
    const $ = parseDocument('https://shop.test/sitemap.xml', mockSitemapXML);
    expect($('loc')).toHaveLength(3);
  });
});
