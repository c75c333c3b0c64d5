/**
 * Retry with exponential backoff for a single logical operation.
 *
 * Attempt n (0-based) that fails waits `baseDelayMs * 2^n` before the next
 * one. Non-final failures are logged as warnings, the final one as an error,
 * and the last error is rethrown unchanged.
 */

import { createLogger, type Logger } from '../utils/logger.js';
import { errorMessage } from '../utils/errors.js';

const defaultLog = createLogger('retry');

/** Retry options */
export interface RetryOptions {
  /** Total attempts, including the first. Default: 3 */
  maxAttempts?: number;
  /** Delay after the first failure in ms. Default: 2000 */
  baseDelayMs?: number;
  /** Backoff multiplier. Default: 2 */
  backoffFactor?: number;
  /** Errors to retry on. Default: all errors */
  retryOn?: (error: unknown) => boolean;
  /** Sleep implementation, replaceable in tests */
  sleep?: (ms: number) => Promise<void>;
  logger?: Logger;
}

/**
 * Calculate exponential backoff delay.
 */
export function calculateBackoff(attempt: number, baseDelayMs: number, backoffFactor = 2): number {
  return baseDelayMs * Math.pow(backoffFactor, attempt);
}

/**
 * Sleep for a duration.
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Worst-case time spent waiting between attempts; together with the
 * request latencies this is the effective timeout of `withRetry`.
 */
export function totalBackoffMs(options: RetryOptions = {}): number {
  const { maxAttempts = 3, baseDelayMs = 2000, backoffFactor = 2 } = options;
  let total = 0;
  for (let attempt = 0; attempt < maxAttempts - 1; attempt++) {
    total += calculateBackoff(attempt, baseDelayMs, backoffFactor);
  }
  return total;
}

/**
 * Execute a function with retry logic.
 */
export async function withRetry<T>(
  operation: string,
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {},
): Promise<T> {
  const {
    maxAttempts = 3,
    baseDelayMs = 2000,
    backoffFactor = 2,
    retryOn = () => true,
    sleep: wait = sleep,
    logger = defaultLog,
  } = options;

  const attempts = Math.max(1, maxAttempts);
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error;
      const isFinal = attempt === attempts - 1;

      if (!retryOn(error)) {
        logger.error(`${operation} failed with a non-retryable error`, {
          attempt: attempt + 1,
          error: errorMessage(error),
        });
        throw error;
      }

      if (isFinal) {
        logger.error(`${operation} failed after ${attempts} attempts`, {
          error: errorMessage(error),
        });
        break;
      }

      const delay = calculateBackoff(attempt, baseDelayMs, backoffFactor);
      logger.warn(`${operation} attempt ${attempt + 1} failed, retrying in ${delay}ms`, {
        error: errorMessage(error),
      });
      await wait(delay);
    }
  }

  throw lastError;
}
