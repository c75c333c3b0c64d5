/**
 * Tests for retry with exponential backoff.
 */

import { describe, it, expect, vi } from 'vitest';
import { withRetry, calculateBackoff, totalBackoffMs } from '../../src/llm/retry.js';
import type { Logger } from '../../src/utils/logger.js';
import { EmptyDocumentsError, isPreconditionError } from '../../src/utils/errors.js';

function recordingSleep() {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

function recordingLogger() {
  return {
    debug: vi.fn<Logger['debug']>(),
    info: vi.fn<Logger['info']>(),
    warn: vi.fn<Logger['warn']>(),
    error: vi.fn<Logger['error']>(),
  } satisfies Logger;
}

describe('calculateBackoff', () => {
  it('doubles per attempt', () => {
    expect(calculateBackoff(0, 2000)).toBe(2000);
    expect(calculateBackoff(1, 2000)).toBe(4000);
    expect(calculateBackoff(2, 2000)).toBe(8000);
  });

  it('takes a custom factor', () => {
    expect(calculateBackoff(2, 100, 3)).toBe(900);
  });
});

describe('totalBackoffMs', () => {
  it('sums the waits between attempts', () => {
    expect(totalBackoffMs()).toBe(6000);
    expect(totalBackoffMs({ maxAttempts: 1 })).toBe(0);
    expect(totalBackoffMs({ maxAttempts: 4, baseDelayMs: 10 })).toBe(70);
  });
});

describe('withRetry', () => {
  it('returns the first success without waiting', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn().mockResolvedValue('ok');

    await expect(withRetry('op', fn, { sleep })).resolves.toBe('ok');
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('waits 2s then 4s and rethrows the last error', async () => {
    const { delays, sleep } = recordingSleep();
    let calls = 0;
    const fn = async () => {
      calls++;
      throw new Error(`failure ${calls}`);
    };

    await expect(withRetry('op', fn, { sleep })).rejects.toThrow('failure 3');
    expect(calls).toBe(3);
    expect(delays).toEqual([2000, 4000]);
  });

  it('passes the 0-based attempt number', async () => {
    const { sleep } = recordingSleep();
    const seen: number[] = [];

    const result = await withRetry(
      'op',
      async (attempt) => {
        seen.push(attempt);
        if (attempt < 2) throw new Error('not yet');
        return attempt;
      },
      { sleep },
    );

    expect(result).toBe(2);
    expect(seen).toEqual([0, 1, 2]);
  });

  it('stops at once when retryOn rejects the error', async () => {
    const { delays, sleep } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(new EmptyDocumentsError());

    await expect(
      withRetry('op', fn, { sleep, retryOn: (error) => !isPreconditionError(error) }),
    ).rejects.toBeInstanceOf(EmptyDocumentsError);
    expect(fn).toHaveBeenCalledTimes(1);
    expect(delays).toEqual([]);
  });

  it('treats maxAttempts below 1 as a single attempt', async () => {
    const { sleep } = recordingSleep();
    const fn = vi.fn().mockRejectedValue(new Error('boom'));

    await expect(withRetry('op', fn, { sleep, maxAttempts: 0 })).rejects.toThrow('boom');
    expect(fn).toHaveBeenCalledTimes(1);
  });
  it('warns on each failed attempt before the last and logs the last as an error', async () => {
    const { sleep } = recordingSleep();
    const logger = recordingLogger();
    const fn = vi.fn().mockRejectedValue(new Error('down'));

    await expect(withRetry('answer question', fn, { sleep, logger })).rejects.toThrow('down');

    expect(logger.warn).toHaveBeenCalledTimes(2);
    expect(logger.warn).toHaveBeenNthCalledWith(1, 'answer question attempt 1 failed, retrying in 2000ms', {
      error: 'down',
    });
    expect(logger.warn).toHaveBeenNthCalledWith(2, 'answer question attempt 2 failed, retrying in 4000ms', {
      error: 'down',
    });
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('answer question failed after 3 attempts', { error: 'down' });
  });

  it('logs a non-retryable failure as an error without warnings', async () => {
    const { sleep } = recordingSleep();
    const logger = recordingLogger();
    const fn = vi.fn().mockRejectedValue(new Error('fatal'));

    await expect(withRetry('op', fn, { sleep, logger, retryOn: () => false })).rejects.toThrow('fatal');

    expect(logger.warn).not.toHaveBeenCalled();
    expect(logger.error).toHaveBeenCalledTimes(1);
    expect(logger.error).toHaveBeenCalledWith('op failed with a non-retryable error', {
      attempt: 1,
      error: 'fatal',
    });
  });
});
