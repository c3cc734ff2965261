/**
 * Retry with exponential backoff for repository host requests
 *
 * Transient statuses (429, 5xx) and network failures are retried inside a
 * single request; once attempts are exhausted the error propagates and the
 * sync run fails.
 */

import type { RetryConfig, RetryResult } from './types.js';
import { logger, type ApiLogger } from './logger.js';
import { TransportError } from '../errors.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 2,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
  retryableStatuses: [429, 500, 502, 503, 504],
};

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetryConfig {
  /** Custom logger instance */
  logger?: ApiLogger;
  /** Called before each retry attempt */
  onRetry?: (attempt: number, error: Error, delayMs: number) => void;
  /** Custom function to determine if an error is retryable */
  isRetryable?: (error: Error) => boolean;
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Calculate delay for a retry attempt using exponential backoff
 *
 * @param attempt - The current attempt number (1-indexed)
 * @param retryAfter - Retry-After header value in seconds
 * @returns Delay in milliseconds
 */
export function calculateDelay(
  attempt: number,
  config: Required<RetryConfig>,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    const jitter = Math.random() * config.baseDelayMs * config.jitterFactor;
    return Math.min(retryAfter * 1000 + jitter, config.maxDelayMs);
  }

  // baseDelay * 2^(attempt-1), +/- jitter
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);
  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

const NETWORK_ERROR_PATTERNS = [
  'econnreset',
  'econnrefused',
  'etimedout',
  'enotfound',
  'eai_again',
  'fetch failed',
  'socket hang up',
];

/**
 * Check if an error is retryable based on configuration
 */
export function isRetryableError(
  error: Error,
  config: Required<RetryConfig>
): boolean {
  if (error.name === 'AbortError') {
    return true;
  }

  if (error instanceof TransportError) {
    return error.status !== undefined && config.retryableStatuses.includes(error.status);
  }

  const message = error.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern));
}

/**
 * Parse Retry-After header value
 *
 * @param value - Header value (seconds or HTTP-date)
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
  options: RetryOptions = {}
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
  let lastError: Error = new Error('No attempts made');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const data = await fn();
      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }
      return { success: true, data, attempts: attempt, totalTimeMs };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const retryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isRetryableError(lastError, config);
      const isLastAttempt = attempt > config.maxRetries;

      if (!retryable || isLastAttempt) {
        if (isLastAttempt && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
          });
        }
        return {
          success: false,
          error: lastError,
          attempts: attempt,
          totalTimeMs: Date.now() - startTime,
        };
      }

      const retryAfter = lastError instanceof TransportError ? lastError.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: lastError.message,
        status: lastError instanceof TransportError ? lastError.status : undefined,
      });
      options.onRetry?.(attempt, lastError, delayMs);

      await sleep(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
