/**
 * Retry utility with exponential backoff for rate limits and transient
 * network failures on the synthesis service.
 */

import { createLogger } from './logger.js';

const log = createLogger('retry');

export interface RetryConfig {
  maxRetries: number;
  initialDelayMs: number;
  maxDelayMs: number;
  backoffMultiplier: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  initialDelayMs: 1000,      // Start with 1 second
  maxDelayMs: 10000,         // Cap at 10 seconds
  backoffMultiplier: 2,      // 1s, 2s, 4s
};

const RETRYABLE_STATUS = new Set([429, 500, 503]);
const RETRYABLE_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ENOTFOUND', 'EAI_AGAIN']);

function readField(error: unknown, key: string): unknown {
  if (typeof error !== 'object' || error === null) return undefined;
  return Object.prototype.hasOwnProperty.call(error, key)
    ? Reflect.get(error, key)
    : undefined;
}

/**
 * Checks if an error is worth retrying (429/5xx from the API, network errors).
 */
export function isRetryableError(error: unknown): boolean {
  const status = readField(error, 'status');
  if (typeof status === 'number' && RETRYABLE_STATUS.has(status)) {
    return true;
  }

  const code = readField(error, 'code');
  if (typeof code === 'string' && RETRYABLE_CODES.has(code)) {
    return true;
  }

  return false;
}

/**
 * Delay before retry number `attempt` (0-indexed).
 */
export function calculateDelay(attempt: number, config: RetryConfig): number {
  const delay = config.initialDelayMs * Math.pow(config.backoffMultiplier, attempt);
  return Math.min(delay, config.maxDelayMs);
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/**
 * Retry a function with exponential backoff.
 *
 * Non-retryable errors are rethrown immediately; after the last retry the
 * last error is rethrown.
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  wait: (ms: number) => Promise<void> = sleep
): Promise<T> {
  let lastError: unknown;

  for (let attempt = 0; attempt <= config.maxRetries; attempt++) {
    try {
      const result = await fn();
      if (attempt > 0) {
        log.info(`✓ Retry succeeded on attempt ${attempt + 1}`);
      }
      return result;
    } catch (error) {
      lastError = error;

      if (!isRetryableError(error)) {
        throw error;
      }

      if (attempt < config.maxRetries) {
        const delay = calculateDelay(attempt, config);
        log.warn(`⚠️  Service overloaded. Retrying in ${delay / 1000}s... (attempt ${attempt + 1}/${config.maxRetries})`);
        await wait(delay);
      } else {
        log.error(`❌ All ${config.maxRetries} retry attempts failed`);
      }
    }
  }

  throw lastError;
}
