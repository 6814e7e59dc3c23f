import pRetry from 'p-retry';
import { crawlerLogger as logger } from './logger';

export interface RetryPolicy {
  maxAttempts: number;
  baseDelayMs: number;
}

export function withRetry<T>(label: string, policy: RetryPolicy, fn: (attempt: number) => Promise<T>): Promise<T> {
  return pRetry(fn, {
    retries: Math.max(policy.maxAttempts - 1, 0),
    minTimeout: policy.baseDelayMs,
    maxTimeout: policy.baseDelayMs * 8,
    factor: 2,
    randomize: false,
    onFailedAttempt: (error) => {
      logger.warn(`${label} failed (attempt ${error.attemptNumber}/${policy.maxAttempts}): ${error.message}`);
    },
  });
}
