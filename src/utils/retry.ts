import { isAxiosError } from 'axios';
import logger from './logger.js';
import { sleep as defaultSleep, type SleepFn } from './nominatimRateLimiter.js';

/**
 * Retry configuration options
 */
export interface RetryConfig {
  /** Maximum number of retry attempts (default: 2) */
  maxRetries?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelayMs?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelayMs?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Minimum delay for 429 errors in milliseconds (default: 30000) */
  rateLimitDelayMs?: number;
  /** Timer used between attempts; injectable for tests */
  sleep?: SleepFn;
}

/**
 * HTTP status of an axios error, if the server answered at all.
 */
function statusOf(error: unknown): number | undefined {
  return isAxiosError(error) ? error.response?.status : undefined;
}

/**
 * Determines if an error is worth another attempt: server errors, rate
 * limiting and connection failures. Timeouts are not retried.
 */
export function isRetryableError(error: unknown): boolean {
  if (!isAxiosError(error)) {
    return false;
  }

  const status = error.response?.status;
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  return error.code !== 'ECONNABORTED' && error.code !== 'ETIMEDOUT';
}

/**
 * Calculate delay for next retry attempt using exponential backoff
 *
 * @param attempt - Current attempt number (0-indexed)
 * @param is429 - Whether this is a rate limit (429) error
 */
export function calculateDelay(
  attempt: number,
  config: Required<Omit<RetryConfig, 'sleep'>>,
  is429: boolean
): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);

  if (is429) {
    return Math.max(config.rateLimitDelayMs, delay);
  }

  return Math.min(delay, config.maxDelayMs);
}

/**
 * Wraps an async function with retry logic.
 *
 * Retry behavior:
 * - 5xx errors: Exponential backoff starting at 1s
 * - 429 rate limit: Minimum 30s delay
 * - Network errors: Exponential backoff
 * - Other errors (4xx, timeouts, parse errors): No retry
 *
 * @param fn - The async function to execute with retry
 * @param config - Retry configuration options
 * @param context - Context string for logging (e.g., "reverse geocode 45.5,-122.6")
 * @returns Promise resolving to the function result
 * @throws The last error if all retries exhausted
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  config: RetryConfig = {},
  context: string = 'operation'
): Promise<T> {
  const finalConfig: Required<Omit<RetryConfig, 'sleep'>> = {
    maxRetries: config.maxRetries ?? 2,
    initialDelayMs: config.initialDelayMs ?? 1000,
    maxDelayMs: config.maxDelayMs ?? 30000,
    backoffMultiplier: config.backoffMultiplier ?? 2,
    rateLimitDelayMs: config.rateLimitDelayMs ?? 30000,
  };
  const wait = config.sleep ?? defaultSleep;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await fn();

      if (attempt > 0) {
        logger.info(`${context} succeeded after ${attempt} ${attempt === 1 ? 'retry' : 'retries'}`);
      }

      return result;
    } catch (error) {
      if (!isRetryableError(error)) {
        logger.debug(`${context} failed with non-retryable error`);
        throw error;
      }

      if (attempt >= finalConfig.maxRetries) {
        logger.error(`${context} failed after ${finalConfig.maxRetries} retries`);
        throw error;
      }

      const statusCode = statusOf(error);
      const delayMs = calculateDelay(attempt, finalConfig, statusCode === 429);
      const errorMessage = error instanceof Error ? error.message : String(error);

      logger.warn(
        `${context} failed (attempt ${attempt + 1}/${finalConfig.maxRetries + 1})${
          statusCode ? ` with status ${statusCode}` : ''
        }. Retrying in ${delayMs}ms...`,
        { error: errorMessage }
      );

      await wait(delayMs);
    }
  }
}
