/**
 * Unit Tests: Retry with exponential backoff
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import {
  ApiRequestError,
  calculateDelay,
  DEFAULT_RETRY_CONFIG,
  isAbortError,
  isNotFoundError,
  isRetryableError,
  parseRetryAfter,
  withRetry,
} from '../../src/api/retry.js';
import { ApiLogger } from '../../src/api/logger.js';

const quiet = new ApiLogger({ level: 'error' });
const noJitter = { ...DEFAULT_RETRY_CONFIG, jitterFactor: 0 };

describe('calculateDelay', () => {
  it('doubles the delay per attempt', () => {
    expect(calculateDelay(1, noJitter)).toBe(1000);
    expect(calculateDelay(2, noJitter)).toBe(2000);
    expect(calculateDelay(3, noJitter)).toBe(4000);
  });

  it('clamps to the maximum delay', () => {
    expect(calculateDelay(10, noJitter)).toBe(30000);
  });

  it('honours Retry-After', () => {
    expect(calculateDelay(1, noJitter, 5)).toBe(5000);
  });
});

describe('isRetryableError', () => {
  it('retries configured statuses only', () => {
    expect(isRetryableError(new ApiRequestError('busy', 503), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new ApiRequestError('slow down', 429), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new ApiRequestError('bad', 400), DEFAULT_RETRY_CONFIG)).toBe(false);
    expect(isRetryableError(new ApiRequestError('missing', 404), DEFAULT_RETRY_CONFIG)).toBe(false);
  });

  it('retries network failures and timeouts', () => {
    const fetchFailure = new TypeError('fetch failed');
    const timeout = new Error('Request timed out after 10ms');
    timeout.name = 'TimeoutError';

    expect(isRetryableError(fetchFailure, DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(timeout, DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new Error('read ECONNRESET'), DEFAULT_RETRY_CONFIG)).toBe(true);
    expect(isRetryableError(new Error('validation failed'), DEFAULT_RETRY_CONFIG)).toBe(false);
  });
});

describe('error classification', () => {
  it('recognizes not-found errors', () => {
    expect(isNotFoundError(new ApiRequestError('gone', 404))).toBe(true);
    expect(isNotFoundError(new Error('gone'))).toBe(false);
  });

  it('recognizes caller aborts only', () => {
    const abort = new Error('aborted');
    abort.name = 'AbortError';
    expect(isAbortError(abort)).toBe(true);
    const timeout = new Error('timed out');
    timeout.name = 'TimeoutError';
    expect(isAbortError(timeout)).toBe(false);
    expect(isAbortError(new Error('other'))).toBe(false);
    expect(isAbortError('AbortError')).toBe(false);
  });
});

describe('parseRetryAfter', () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it('parses seconds', () => {
    expect(parseRetryAfter('30')).toBe(30);
    expect(parseRetryAfter(null)).toBeUndefined();
    expect(parseRetryAfter('soon')).toBeUndefined();
  });

  it('parses an HTTP date', () => {
    vi.useFakeTimers();
    vi.setSystemTime(new Date('2026-01-01T00:00:00Z'));

    expect(parseRetryAfter('Thu, 01 Jan 2026 00:00:10 GMT')).toBe(10);
  });
});

describe('withRetry', () => {
  it('returns the first success', async () => {
    const fn = vi.fn(async () => 'done');

    const result = await withRetry(fn, { logger: quiet });

    expect(result).toMatchObject({ success: true, data: 'done', attempts: 1 });
  });

  it('retries retryable failures until success', async () => {
    const fn = vi
      .fn<() => Promise<string>>()
      .mockRejectedValueOnce(new ApiRequestError('busy', 503))
      .mockResolvedValueOnce('done');
    const onRetry = vi.fn();

    const result = await withRetry(fn, { baseDelayMs: 1, logger: quiet, onRetry });

    expect(result).toMatchObject({ success: true, data: 'done', attempts: 2 });
    expect(onRetry).toHaveBeenCalledTimes(1);
  });

  it('gives up after maxRetries', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new ApiRequestError('busy', 503);
    });

    const result = await withRetry(fn, { maxRetries: 2, baseDelayMs: 1, logger: quiet });

    expect(result.success).toBe(false);
    expect(result.attempts).toBe(3);
    expect(fn).toHaveBeenCalledTimes(3);
  });

  it('does not retry non-retryable failures', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new ApiRequestError('bad', 400);
    });

    const result = await withRetry(fn, { baseDelayMs: 1, logger: quiet });

    expect(result.success).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });

  it('uses a custom retry predicate', async () => {
    const fn = vi.fn(async (): Promise<string> => {
      throw new ApiRequestError('busy', 503);
    });

    const result = await withRetry(fn, {
      baseDelayMs: 1,
      logger: quiet,
      isRetryable: (error) => error instanceof ApiRequestError && error.status === 429,
    });

    expect(result.attempts).toBe(1);
  });

  it('stops when the signal is aborted', async () => {
    const controller = new AbortController();
    const fn = vi.fn(async (): Promise<string> => {
      controller.abort();
      throw new ApiRequestError('busy', 503);
    });

    const result = await withRetry(fn, { baseDelayMs: 1, logger: quiet, signal: controller.signal });

    expect(result.success).toBe(false);
    expect(fn).toHaveBeenCalledTimes(1);
  });
});
