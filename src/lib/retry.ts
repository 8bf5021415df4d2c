/**
 * @module retry
 * Retry with exponential backoff and full jitter
 *
 * Applied at the two provider call sites of a sweep: page fetches during
 * discovery and single deletions. Only {@link ProviderThrottledError} is
 * retried by default; every other failure surfaces on the first attempt.
 *
 * @public
 */

import { isThrottledError, OperationCancelledError } from "./sweep-errors.js";

/**
 * Retry configuration options
 *
 * @public
 */
export interface RetryConfig {
  /**
   * Maximum number of attempts, the first call included (default: 5)
   */
  maxAttempts?: number;

  /**
   * Base delay in milliseconds, doubled after every attempt (default: 200)
   */
  baseDelayMs?: number;

  /**
   * Maximum delay in milliseconds between attempts (default: 5000)
   */
  maxDelayMs?: number;

  /**
   * Decide whether an error is worth another attempt
   */
  shouldRetry?: (error: unknown, attempt: number) => boolean;

  /**
   * Callback invoked before each retry attempt
   */
  onRetry?: (error: unknown, attempt: number, delayMs: number) => void;

  /**
   * Abort signal; no further attempt starts once it fires
   */
  signal?: AbortSignal;

  /**
   * Delay implementation, replaced in tests
   */
  sleep?: (ms: number) => Promise<void>;
}

/**
 * Default retry configuration
 * @internal
 */
const DEFAULT_CONFIG = {
  maxAttempts: 5,
  baseDelayMs: 200,
  maxDelayMs: 5000,
  shouldRetry: (error: unknown) => isThrottledError(error),
} satisfies Required<Pick<RetryConfig, "maxAttempts" | "baseDelayMs" | "maxDelayMs" | "shouldRetry">>;

/**
 * Calculate delay with exponential backoff and full jitter
 *
 * delay = random_between(0, min(maxDelay, baseDelay * 2^attempt))
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param baseDelayMs - Base delay in milliseconds
 * @param maxDelayMs - Maximum delay in milliseconds
 * @returns Delay in milliseconds
 *
 * @public
 */
export function calculateDelayWithJitter(
  attempt: number,
  baseDelayMs: number,
  maxDelayMs: number,
): number {
  const cappedDelay = Math.min(baseDelayMs * Math.pow(2, attempt), maxDelayMs);
  return Math.floor(Math.random() * cappedDelay);
}

/**
 * Sleep for the specified duration
 *
 * @internal
 */
function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Execute a function with automatic retry on failure
 *
 * @param function_ - Async function to execute
 * @param config - Retry configuration options
 * @returns Promise resolving to the function's return value
 * @throws The last error once attempts are exhausted or the error is not retryable
 * @throws {@link OperationCancelledError} when the signal aborts between attempts
 *
 * @public
 *
 * @example
 * ```typescript
 * const page = await retryWithBackoff(() => adapter.listPage(request), {
 *   maxAttempts: 5,
 *   onRetry: (error, attempt, delay) => logger.debug(`retry ${attempt} in ${delay}ms`),
 * });
 * ```
 */
export async function retryWithBackoff<T>(
  function_: () => Promise<T>,
  config: RetryConfig = {},
): Promise<T> {
  const maxAttempts = config.maxAttempts ?? DEFAULT_CONFIG.maxAttempts;
  const baseDelayMs = config.baseDelayMs ?? DEFAULT_CONFIG.baseDelayMs;
  const maxDelayMs = config.maxDelayMs ?? DEFAULT_CONFIG.maxDelayMs;
  const shouldRetry = config.shouldRetry ?? DEFAULT_CONFIG.shouldRetry;
  const wait = config.sleep ?? sleep;

  let lastError: unknown;

  for (let attempt = 0; attempt < maxAttempts; attempt++) {
    if (config.signal?.aborted) {
      throw new OperationCancelledError("retry aborted");
    }

    try {
      return await function_();
    } catch (error) {
      lastError = error;

      if (!shouldRetry(error, attempt + 1)) {
        throw error;
      }

      // Don't delay after the last attempt
      if (attempt < maxAttempts - 1) {
        const delayMs = calculateDelayWithJitter(attempt, baseDelayMs, maxDelayMs);
        config.onRetry?.(error, attempt + 1, delayMs);
        await wait(delayMs);
      }
    }
  }

  throw lastError;
}
