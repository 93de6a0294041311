/**
 * Retry logic with exponential backoff for control-plane calls
 *
 * - Exponential backoff with configurable base delay
 * - Jitter to prevent thundering herd
 * - Honors Retry-After on throttled responses
 * - Retries only what the transport marks transient
 */

import type { RetryConfig, RetryResult, RetrySettings } from './types.js';
import { logger, type ApiLogger } from './logger.js';
import { TransportError } from './transport.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * Default retry configuration
 */
export const DEFAULT_RETRY_CONFIG: Required<RetryConfig> = {
  maxRetries: 4,
  baseDelayMs: 250,
  maxDelayMs: 8000,
  jitterFactor: 0.1,
};

// =============================================================================
// Types
// =============================================================================

/**
 * Options for a retry operation
 */
export interface RetryOptions extends RetrySettings {
  /** Custom logger instance */
  logger?: ApiLogger;
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
 * @param retryAfter - Optional Retry-After value (seconds)
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

  // baseDelay * 2^(attempt-1)
  const exponentialDelay = config.baseDelayMs * Math.pow(2, attempt - 1);

  const jitter =
    Math.random() * exponentialDelay * config.jitterFactor * 2 -
    exponentialDelay * config.jitterFactor;

  return Math.min(Math.max(exponentialDelay + jitter, 0), config.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Retry Logic
// =============================================================================

const NETWORK_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EAI_AGAIN',
  'socket hang up',
  'network',
];

/**
 * Check if an error is worth another attempt.
 * Transport errors carry their own classification; anything else is
 * judged by the usual network failure signatures.
 */
export function isRetryableError(error: Error): boolean {
  if (error instanceof TransportError) {
    return error.transient;
  }

  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return true;
  }

  const message = error.message.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => message.includes(pattern.toLowerCase()));
}

/**
 * Parse a Retry-After header value
 *
 * @param value - Header value (seconds or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null | undefined, now = Date.now()): number | undefined {
  if (!value) return undefined;

  const seconds = parseInt(value, 10);
  if (!isNaN(seconds) && seconds > 0 && String(seconds) === value.trim()) {
    return seconds;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - now;
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
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const config: Required<RetryConfig> = {
    maxRetries: options.maxRetries ?? DEFAULT_RETRY_CONFIG.maxRetries,
    baseDelayMs: options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs,
    maxDelayMs: options.maxDelayMs ?? DEFAULT_RETRY_CONFIG.maxDelayMs,
    jitterFactor: options.jitterFactor ?? DEFAULT_RETRY_CONFIG.jitterFactor,
  };

  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const startTime = Date.now();
  let lastError: Error = new Error('Operation was not attempted');

  for (let attempt = 1; attempt <= config.maxRetries + 1; attempt++) {
    try {
      const result = await fn(attempt);

      const totalTimeMs = Date.now() - startTime;
      if (attempt > 1) {
        log.info(`Request succeeded after ${attempt} attempts`, {
          attempts: attempt,
          totalTimeMs,
        });
      }

      return { success: true, data: result, attempts: attempt, totalTimeMs };
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      const retryable = options.isRetryable
        ? options.isRetryable(lastError)
        : isRetryableError(lastError);

      const isLastAttempt = attempt > config.maxRetries;

      if (!retryable || isLastAttempt) {
        const totalTimeMs = Date.now() - startTime;

        if (retryable && config.maxRetries > 0) {
          log.warn(`All ${config.maxRetries} retry attempts exhausted`, {
            error: lastError.message,
            attempts: attempt,
            totalTimeMs,
          });
        } else if (!retryable) {
          log.debug('Error is not retryable', {
            error: lastError.message,
            attempts: attempt,
          });
        }

        return { success: false, error: lastError, attempts: attempt, totalTimeMs };
      }

      const retryAfter = lastError instanceof TransportError ? lastError.retryAfter : undefined;
      const delayMs = calculateDelay(attempt, config, retryAfter);

      log.info(`Retry attempt ${attempt}/${config.maxRetries} in ${Math.round(delayMs)}ms`, {
        error: lastError.message,
        reason: lastError instanceof TransportError ? lastError.reason : undefined,
        delayMs: Math.round(delayMs),
      });

      await wait(delayMs);
    }
  }

  return {
    success: false,
    error: lastError,
    attempts: config.maxRetries + 1,
    totalTimeMs: Date.now() - startTime,
  };
}
