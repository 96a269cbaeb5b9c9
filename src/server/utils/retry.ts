/**
 * Retry Utility with Backoff
 *
 * Retries transient failures of network calls made by retrievers and LLM stages.
 * Supports exponential backoff or a fixed wait with random jitter.
 */

import { logger } from './logger.js';

/**
 * Configuration for retry behavior
 */
export interface RetryConfig {
  /** Total number of attempts, including the first one (default: 3) */
  maxAttempts?: number;
  /** Initial delay in milliseconds (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in milliseconds (default: 30000) */
  maxDelay?: number;
  /** Exponential backoff multiplier (default: 2) */
  multiplier?: number;
  /** Function to determine if an error is retryable (default: retries on transient errors) */
  isRetryable?: (error: unknown) => boolean;
  /** Custom delay function (overrides exponential backoff if provided) */
  getDelay?: (attempt: number, error: unknown) => number;
}

const DEFAULT_RETRY_CONFIG: Required<Omit<RetryConfig, 'isRetryable' | 'getDelay'>> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  multiplier: 2,
};

const TRANSIENT_CODES = new Set(['ECONNRESET', 'ETIMEDOUT', 'ECONNREFUSED', 'ECONNABORTED', 'EAI_AGAIN', 'ENOTFOUND']);

function statusOf(error: unknown): number | undefined {
  if (error && typeof error === 'object' && 'response' in error) {
    const response = error.response;
    if (response && typeof response === 'object' && 'status' in response && typeof response.status === 'number') {
      return response.status;
    }
  }
  return undefined;
}

/**
 * Default retryable error detection
 * Retries on 429, 5xx, connection resets and timeouts
 */
function defaultIsRetryable(error: unknown): boolean {
  const status = statusOf(error);
  if (status !== undefined) {
    return status === 429 || (status >= 500 && status < 600);
  }

  if (error && typeof error === 'object' && 'code' in error && typeof error.code === 'string') {
    if (TRANSIENT_CODES.has(error.code)) {
      return true;
    }
  }

  if (error instanceof Error) {
    const message = error.message.toLowerCase();
    return (
      message.includes('timeout') ||
      message.includes('socket hang up') ||
      message.includes('network') ||
      message.includes('econnreset')
    );
  }

  return false;
}

/**
 * Calculate exponential backoff delay
 *
 * @param attempt - Current attempt number (0-indexed)
 */
function calculateExponentialBackoff(
  attempt: number,
  initialDelay: number,
  multiplier: number,
  maxDelay: number
): number {
  return Math.min(initialDelay * Math.pow(multiplier, attempt), maxDelay);
}

/**
 * Delay function for a fixed wait plus random jitter in [0, 2 * fixed]
 */
export function fixedDelayWithJitter(fixedDelayMs: number, random: () => number = Math.random): () => number {
  return () => fixedDelayMs + Math.floor(random() * fixedDelayMs * 2);
}

/**
 * Retry an operation with backoff
 *
 * @param operation - The operation to retry (async function)
 * @param config - Retry configuration
 * @param context - Optional context for logging (e.g., operation name, URL)
 * @returns Result of the operation
 * @throws The last error if all attempts are exhausted, or the first non-retryable error
 */
export async function retryWithBackoff<T>(
  operation: () => Promise<T>,
  config: RetryConfig = {},
  context?: string
): Promise<T> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    initialDelay = DEFAULT_RETRY_CONFIG.initialDelay,
    maxDelay = DEFAULT_RETRY_CONFIG.maxDelay,
    multiplier = DEFAULT_RETRY_CONFIG.multiplier,
    isRetryable = defaultIsRetryable,
    getDelay,
  } = config;

  const attempts = Math.max(1, maxAttempts);
  const contextStr = context ? ` (${context})` : '';
  let lastError: unknown;

  for (let attempt = 0; attempt < attempts; attempt++) {
    try {
      const result = await operation();
      if (attempt > 0) {
        logger.info({ attempt: attempt + 1, maxAttempts: attempts, context }, `Operation succeeded after ${attempt} retries${contextStr}`);
      }
      return result;
    } catch (error) {
      lastError = error;
      const message = error instanceof Error ? error.message : String(error);

      if (!isRetryable(error)) {
        logger.debug({ attempt: attempt + 1, error: message, context }, `Non-retryable error encountered${contextStr}`);
        throw error;
      }

      if (attempt + 1 >= attempts) {
        logger.error({ attempt: attempt + 1, maxAttempts: attempts, error: message, context }, `Operation failed after ${attempts} attempts${contextStr}`);
        throw error;
      }

      const delay = Math.min(
        getDelay ? getDelay(attempt, error) : calculateExponentialBackoff(attempt, initialDelay, multiplier, maxDelay),
        maxDelay
      );

      logger.warn(
        { attempt: attempt + 1, maxAttempts: attempts, delay, error: message, context },
        `Retrying operation${contextStr} (attempt ${attempt + 1}/${attempts})`
      );
      await new Promise((resolve) => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

/**
 * Check if an error is retryable using default logic
 */
export function isRetryableError(error: unknown): boolean {
  return defaultIsRetryable(error);
}
