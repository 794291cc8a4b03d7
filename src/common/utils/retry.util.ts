/**
 * Retry helpers for collaborator calls
 * Only errors marked retryable (rate limiting) are retried; everything
 * else propagates on the first failure.
 */

import { Logger } from '@nestjs/common';
import { CollaboratorError, throwIfCancelled } from '../errors';

const logger = new Logger('RetryUtil');

export interface RetryOptions {
  retries: number;
  backoffMs: number;
  signal?: AbortSignal;
  label?: string;
  /** Injected for tests; defaults to Math.random */
  jitter?: () => number;
  /** Injected for tests; defaults to a timer */
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
}

export function isRetryable(error: unknown): boolean {
  return error instanceof CollaboratorError && error.retryable;
}

/**
 * Delay before attempt `attempt + 1`: backoff * 2^attempt plus up to one
 * backoff unit of jitter.
 */
export function backoffDelay(attempt: number, backoffMs: number, jitter: () => number = Math.random): number {
  return backoffMs * 2 ** attempt + Math.round(jitter() * backoffMs);
}

export async function withRetry<T>(operation: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;
  let attempt = 0;

  while (true) {
    throwIfCancelled(options.signal);
    try {
      return await operation();
    } catch (error) {
      if (!isRetryable(error) || attempt >= options.retries) {
        throw error;
      }
      const delay = backoffDelay(attempt, options.backoffMs, options.jitter);
      attempt++;
      logger.warn(`${options.label ?? 'operation'}: retry ${attempt}/${options.retries} after ${(delay / 1000).toFixed(1)}s`);
      await wait(delay, options.signal);
    }
  }
}

export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}
