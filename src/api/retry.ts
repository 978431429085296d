/**
 * Retry logic with exponential backoff for the FMC client
 *
 * Features:
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Rate limit handling (HTTP 429, FMC allows 120 requests per minute)
 * - Caller cancellation stops retrying immediately
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

/**
 * HTTP status codes with special handling
 */
export const RATE_LIMIT_STATUS = 429;
export const NOT_FOUND_STATUS = 404;
export const UNAUTHORIZED_STATUS = 401;

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions<T> extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Caller cancellation; an aborted signal is never retried */
  signal?: AbortSignal;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
}

/**
 * Error class for API errors with HTTP status
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly details?: Record<string, unknown>;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options?: {
      code?: string;
      details?: Record<string, unknown>;
      retryAfter?: number;
      cause?: Error;
    }
  ) {
    super(message, options?.cause ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options?.code;
    this.details = options?.details;
    this.retryAfter = options?.retryAfter;
  }

  /**
   * Check if the addressed object does not exist
   */
  isNotFound(): boolean {
    return this.status === NOT_FOUND_STATUS;
  }
}

/**
 * Check whether an error reports a missing remote object
 */
export function isNotFoundError(error: unknown): boolean {
  return error instanceof ApiRequestError && error.isNotFound();
}

/**
 * Check whether an error comes from a caller abort. A request timeout is
 * a transport failure and does not count.
 */
export function isAbortError(error: unknown): boolean {
  return error instanceof Error && error.name === 'AbortError';
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Optional Retry-After header value (seconds)
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  // If rate-limited with Retry-After header, use that (converted to ms)
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // Exponential backoff: baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  const delayWithJitter = exponentialDelay + jitter;

  // Clamp to max delay
  return Math.min(Math.max(delayWithJitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration, waking early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    const timer = setTimeout(done, ms);
    function done(): void {
      clearTimeout(timer);
      signal?.removeEventListener('abort', done);
      resolve();
    }
    signal?.addEventListener('abort', done, { once: true });
  });
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(
  error: Error,
  config: Required<RetryConfig>
): boolean {
  // Network errors are retryable
  if (error.name === 'TypeError' && error.message.includes('fetch')) {
    return true;
  }

  // Per-request timeout
  if (error.name === 'TimeoutError') {
    return true;
  }

  if (error instanceof ApiRequestError) {
    return config.retryableStatuses.includes(error.status);
  }

  // Check for common network error messages
  const networkErrorPatterns = [
    'ECONNRESET',
    'ECONNREFUSED',
    'ETIMEDOUT',
    'ENOTFOUND',
    'EAI_AGAIN',
    'socket hang up',
  ];

  const message = error.message.toLowerCase();
  return networkErrorPatterns.some((pattern) =>
    message.includes(pattern.toLowerCase())
  );
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0) {
    return seconds;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

/**
 * Execute a function with retry logic
 *
 * @returns RetryResult with success/failure and metadata
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions<T> = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
    retryableStatuses: options.retryableStatuses ?? DEFAULT_RETRY_CONFIG.retryableStatuses,
  };

  const log = options.logger ?? logger;
  const startTime = Date.now();
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn();

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return {
        success: true,
        data: result,
        attempts: attempt,
        totalTimeMs,
      };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const cancelled = options.signal?.aborted === true;
      const isRetryable =
        !cancelled &&
        (options.isRetryable
          ? options.isRetryable(lastError)
          : isRetryableError(lastError, config));

      const isLastAttempt = attempt > config.maxRetries;

      if (!isRetryable || isLastAttempt) {
        const totalTimeMs = Date.now() - startTime;

        if (isRetryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
            totalTimeMs,
          });
        } else {
          log.debug('Error is not retryable', {
            error: lastError.message,
            attempts: attempt,
            cancelled,
          });
        }

        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs,
        };
      }

      const retryAfter =
        lastError instanceof ApiRequestError ? lastError.retryAfter : undefined;

      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(
        `Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`,
        {
          error: lastError.message,
          status: lastError instanceof ApiRequestError ? lastError.status : undefined,
          delayMs: Math.round(delayMs),
        }
      );

      options.onRetry?.(attempt, lastError, delayMs);

      await sleep(delayMs, options.signal);

      const reason: unknown = options.signal?.reason;
      if (options.signal?.aborted) {
        return {
          success: false,
          error: reason instanceof Error ? reason : lastError,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
