/**
 * Retry Strategy with Exponential Backoff
 *
 * Handles transient upstream failures (rate limits, 5xx, timeouts).
 * Gives up on permanent failures (bad input, missing credentials) immediately.
 */

import { AppError, ErrorCode, toAppError } from './error-handling';

export interface RetryOptions {
  maxRetries?: number;
  initialDelayMs?: number;
  maxDelayMs?: number;
  backoffMultiplier?: number;
  jitter?: boolean; // Add randomness to prevent thundering herd
  onRetry?: (attempt: number, delay: number, error: Error) => void;
  /** Once aborted, the current failure is final. */
  signal?: AbortSignal;
}

const DEFAULT_OPTIONS: Required<Omit<RetryOptions, 'signal'>> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  maxDelayMs: 30000,
  backoffMultiplier: 2,
  jitter: true,
  onRetry: () => {},
};

/**
 * Retry a function with exponential backoff
 */
export async function retryWithBackoff<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const opts = { ...DEFAULT_OPTIONS, ...options };
  let lastError: Error = new Error('Unknown error');

  for (let attempt = 0; attempt <= opts.maxRetries; attempt++) {
    try {
      return await fn();
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));
      const appError = toAppError(error);

      // Rethrow the original so callers can still match on its class
      if (!appError.isRetryable() || attempt === opts.maxRetries || opts.signal?.aborted) {
        throw error instanceof AppError ? error : appError;
      }

      let delay = opts.initialDelayMs * Math.pow(opts.backoffMultiplier, attempt);
      delay = Math.min(delay, opts.maxDelayMs);

      // ±10%
      if (opts.jitter) {
        const jitterAmount = delay * 0.1;
        delay += (Math.random() - 0.5) * 2 * jitterAmount;
      }

      opts.onRetry(attempt + 1, delay, lastError);

      await new Promise(resolve => setTimeout(resolve, Math.round(delay)));
    }
  }

  throw lastError;
}

/**
 * Retry wrapper for API calls with logging
 */
export async function callWithRetry<T>(
  name: string, // For logging: "eBay API", "Jina", etc.
  fn: () => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  return retryWithBackoff(fn, {
    ...options,
    onRetry: (attempt, delay, error) => {
      console.warn(
        `[${name}] Retry ${attempt} after ${Math.round(delay)}ms. Error: ${error.message}`
      );
      options.onRetry?.(attempt, delay, error);
    },
  });
}

/**
 * Rejects with an AppError after timeoutMs. The timer is cleared as soon as
 * the wrapped promise settles.
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorCode: ErrorCode = ErrorCode.UPSTREAM_TIMEOUT
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(
      () => reject(new AppError(errorCode, new Error(`Operation timed out after ${timeoutMs}ms`))),
      timeoutMs
    );
  });

  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

const API_CONFIGS = {
  ebay: {
    maxRetries: 2,
    initialDelayMs: 500,
    maxDelayMs: 4000,
    backoffMultiplier: 2,
    jitter: true,
  },
  jina: {
    maxRetries: 1,
    initialDelayMs: 500,
    maxDelayMs: 2000,
    backoffMultiplier: 2,
    jitter: true,
  },
} satisfies Record<string, RetryOptions>;

export async function callEbayWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  return callWithRetry('eBay API', fn, { ...API_CONFIGS.ebay, ...options });
}

export async function callJinaWithRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  return callWithRetry('Jina', fn, { ...API_CONFIGS.jina, ...options });
}
