import Bottleneck from 'bottleneck';
import { config } from '../config';
import { crawlerLogger as logger } from '../utils/logger';

export class RateLimiter {
  private limiter: Bottleneck;

  constructor(minTimeMs: number = config.crawler.delayMs) {
    // One plain request in flight, spaced by the configured delay
    this.limiter = new Bottleneck({
      maxConcurrent: 1,
      minTime: minTimeMs,
    });

    this.limiter.on('executing', () => {
      logger.debug(`Executing request - queue size: ${this.limiter.queued()}`);
    });
  }

  async schedule<T>(fn: () => Promise<T>): Promise<T> {
    return this.limiter.schedule(fn);
  }

  getStats() {
    return {
      running: this.limiter.running(),
      queued: this.limiter.queued(),
      done: this.limiter.done(),
    };
  }

  async drain(): Promise<void> {
    await this.limiter.stop({ dropWaitingJobs: false });
  }
}
