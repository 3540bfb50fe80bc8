/**
 * @fileoverview Async Utilities
 *
 * Deadlines for index and reasoning calls, and retry with backoff for
 * provider requests.
 *
 * @packageDocumentation
 */

import { isRetryableError } from '../core/errors.js';
import { logWarning } from '../telemetry/logger.js';
import { getErrorMessage } from './errors.js';

/**
 * Raised when a bounded call misses its deadline.
 */
export class TimeoutError extends Error {
  readonly timeoutMs: number;

  constructor(timeoutMs: number, context: string) {
    super(`${context} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
    this.timeoutMs = timeoutMs;
  }
}

/**
 * Race `promise` against a deadline.
 *
 * A missing or non-positive `timeoutMs` means no deadline. The raced promise
 * keeps running after a timeout; its eventual result is discarded.
 *
 * @example
 * ```typescript
 * const hits = await withTimeout(index.search(query, 5), 2000, 'keyword search');
 * ```
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number | undefined, context: string): Promise<T> {
  if (timeoutMs === undefined || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return promise;
  }

  let timer: ReturnType<typeof setTimeout> | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(timeoutMs, context)), timeoutMs);
  });
  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

export interface RetryOptions {
  /** What is being retried, for the warning logged before each retry. */
  label: string;
  /** Retries after the first attempt. */
  maxRetries: number;
  /** Delay before the first retry; doubles after each one. */
  delayMs: number;
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Run `fn`, retrying while it fails with a retryable error.
 * Non-retryable errors and the last failure are rethrown unchanged.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  let delay = options.delayMs;
  for (let attempt = 0; ; attempt++) {
    try {
      return await fn();
    } catch (error: unknown) {
      if (attempt >= options.maxRetries || !isRetryableError(error)) {
        throw error;
      }
      logWarning('Retrying provider request', {
        label: options.label,
        attempt: attempt + 1,
        delayMs: delay,
        error: getErrorMessage(error),
      });
      await sleep(delay);
      delay *= 2;
    }
  }
}
