import axios, { AxiosInstance } from 'axios';
import UserAgent from 'user-agents';
import { config } from '../config';
import { FetchError, errorMessage } from '../utils/errors';
import { crawlerLogger as logger } from '../utils/logger';
import { RetryPolicy, withRetry } from '../utils/retry';
import { RateLimiter } from './rate-limiter';

export interface HttpClientOptions {
  timeoutMs?: number;
  retry?: RetryPolicy;
  limiter?: RateLimiter;
}

export interface HttpPage {
  url: string;
  status: number;
  contentType: string;
  body: string;
}

export class HttpClient {
  private axiosInstance: AxiosInstance;
  private limiter: RateLimiter;
  private retry: RetryPolicy;
  private requestCount = 0;

  constructor(options: HttpClientOptions = {}) {
    this.limiter = options.limiter ?? new RateLimiter();
    this.retry = options.retry ?? {
      maxAttempts: config.crawler.maxAttempts,
      baseDelayMs: config.crawler.retryBaseMs,
    };

    this.axiosInstance = axios.create({
      timeout: options.timeoutMs ?? config.crawler.timeoutMs,
      responseType: 'text',
      headers: {
        'Accept': 'text/html,application/xhtml+xml,application/xml;q=0.9,image/webp,*/*;q=0.8',
        'Accept-Language': 'en-US,en;q=0.5',
        'Accept-Encoding': 'gzip, deflate',
        'Connection': 'keep-alive',
        'Upgrade-Insecure-Requests': '1',
      },
    });

    this.axiosInstance.interceptors.request.use((requestConfig) => {
      requestConfig.headers.set('User-Agent', randomUserAgent());
      logger.debug(`Making request to: ${requestConfig.url}`);
      return requestConfig;
    });

    this.axiosInstance.interceptors.response.use(
      (response) => {
        logger.debug(`Response received: ${response.status} from ${response.config.url}`);
        return response;
      },
      (error: unknown) => {
        if (axios.isAxiosError(error) && error.response) {
          logger.warn(`HTTP Error: ${error.response.status} from ${error.config?.url}`);
        } else {
          logger.warn(`Network Error: ${errorMessage(error)}`);
        }
        return Promise.reject(error);
      }
    );
  }

  async get(url: string): Promise<HttpPage> {
    try {
      return await withRetry(`GET ${url}`, this.retry, () =>
        this.limiter.schedule(async () => {
          this.requestCount++;
          const response = await this.axiosInstance.get<string>(url);
          const contentType = response.headers['content-type'];
          return {
            url,
            status: response.status,
            contentType: typeof contentType === 'string' ? contentType : '',
            body: response.data,
          };
        })
      );
    } catch (error) {
      const status = axios.isAxiosError(error) ? error.response?.status : undefined;
      throw new FetchError(url, this.retry.maxAttempts, errorMessage(error), status);
    }
  }

  getStats() {
    return {
      totalRequests: this.requestCount,
      ...this.limiter.getStats(),
    };
  }

  async close(): Promise<void> {
    await this.limiter.drain();
  }
}

export function randomUserAgent(): string {
  return new UserAgent({ deviceCategory: 'desktop' }).toString();
}
