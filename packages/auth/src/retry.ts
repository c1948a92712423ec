/**
 * @file retry logic with exponential backoff and abort signal support
 *
 * used for token endpoint calls whose grant may be replayed safely; the
 * authorization code grant is never passed through here
 */

import { setTimeout as sleep } from 'node:timers/promises';

import { jsonifyError } from '@forcelink/core';

import type { Log } from '@forcelink/core';

/** configuration for retry operations */
export type RetryConfig = {
  /** name of the retry operation */
  name: string;
  /** maximum number of retry attempts */
  maxRetries: number;
  /** timeout in milliseconds for each individual attempt */
  timeout: number;
};

/** metadata for retry operations including attempt count and error context */
export type RetryMeta = RetryConfig & {
  /** attempt number (starting from 0) */
  attempt: number;
  /** error that triggered the retry attempt */
  error: unknown;
};

/** options for configuring retry behavior */
export interface RetryOptions extends Partial<RetryConfig> {
  /** optional logging function */
  log?: Log;
  /** signal to abort the retry process */
  abortSignal?: AbortSignal;
  /** delay in milliseconds between retries or a function to calculate the delay */
  retryDelay?: number | ((meta: RetryMeta) => number);
  /** callback function invoked before each retry */
  onRetry?: (meta: RetryMeta) => void;
  /** decides whether a failed attempt is retried, defaults to any error but NonRetryableError */
  shouldRetry?: (meta: RetryMeta) => boolean;
}

/** default maximum number of retry attempts before giving up */
export const DEFAULT_MAX_RETRIES = 2;

/** initial delay in milliseconds for exponential backoff retry strategy */
export const INITIAL_RETRY_DELAY = 50;

/** maximum delay in milliseconds for exponential backoff to prevent excessive waits */
export const MAX_RETRY_DELAY = 1000;

/** error class to indicate operation should not be retried */
export class NonRetryableError extends Error {
  /**
   * @param message description of the failure
   * @param options standard error options carrying the cause
   */
  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'NonRetryableError';
  }
}

/**
 * computes the default exponential backoff delay
 * @param meta metadata of the failed attempt
 * @returns delay in milliseconds
 */
export function exponentialBackoff(meta: RetryMeta): number {
  return Math.min(INITIAL_RETRY_DELAY * 2 ** meta.attempt, MAX_RETRY_DELAY);
}

/**
 * executes function with retry capability on failure
 * @param fn the function to execute, receiving the attempt number and a signal
 * @param options configuration options for retry behavior
 * @returns promise resolving with function result
 * @throws the last error once retries are exhausted or retrying is refused
 * @example
 * ```typescript
 * const response = await retry(
 *   async ({ abortSignal }) => fetch(url, { signal: abortSignal }),
 *   { name: 'token refresh', maxRetries: 2 },
 * );
 * ```
 */
export async function retry<R>(
  fn: (params: { attempt: number; abortSignal: AbortSignal }) => Promise<R>,
  options?: RetryOptions,
): Promise<R> {
  const {
    name = 'retryable task',
    abortSignal,
    log,
    maxRetries = DEFAULT_MAX_RETRIES,
    onRetry,
    retryDelay = exponentialBackoff,
    shouldRetry = (meta: RetryMeta) =>
      !(meta.error instanceof NonRetryableError),
    timeout = Infinity,
  } = { ...options };

  const config: RetryConfig = { name, maxRetries, timeout };

  for (let attempt = 0; ; attempt++) {
    if (abortSignal?.aborted) {
      throw new NonRetryableError(`${name} aborted`, {
        cause: abortSignal.reason,
      });
    }

    try {
      log?.('debug', `${name} attempt #${attempt}`);

      return await fn({
        attempt,
        abortSignal: createAttemptSignal(timeout, abortSignal),
      });
    } catch (error) {
      const meta: RetryMeta = { ...config, attempt, error };

      if (
        attempt >= maxRetries ||
        abortSignal?.aborted ||
        !shouldRetry(meta)
      ) {
        log?.(
          'debug',
          `${name} stopped retrying after ${attempt + 1} attempts`,
          jsonifyError(error),
        );

        throw error;
      }

      const delay =
        typeof retryDelay === 'function' ? retryDelay(meta) : retryDelay;

      log?.('debug', `${name} retrying in ${delay}ms`);
      onRetry?.(meta);

      await sleep(delay, undefined, { signal: abortSignal });
    }
  }
}

/**
 * combines the caller's signal with a per-attempt timeout
 * @param timeout attempt timeout in milliseconds, Infinity for none
 * @param abortSignal caller's signal
 * @returns signal aborting on whichever fires first
 */
function createAttemptSignal(
  timeout: number,
  abortSignal?: AbortSignal,
): AbortSignal {
  const signals = [
    abortSignal,
    timeout > 0 && timeout < Infinity ? AbortSignal.timeout(timeout) : null,
  ].filter((signal): signal is AbortSignal => !!signal);

  return AbortSignal.any(signals);
}
