/**
 * Exponential backoff with jitter for calls to the remote service
 */

export interface RetryConfig {
  /** Retries after the first attempt; total attempts = maxRetries + 1 */
  maxRetries: number;
  baseDelayMs: number;
  maxDelayMs: number;
  /** Fraction of the delay applied as symmetric jitter */
  jitter: number;
}

export const DEFAULT_RETRY_CONFIG: RetryConfig = {
  maxRetries: 3,
  baseDelayMs: 500,
  maxDelayMs: 8000,
  jitter: 0.25,
};

export interface RetryLog {
  timestamp: Date;
  attempt: number;
  success: boolean;
  error?: string;
  nextRetryInMs?: number;
}

export interface RetryOptions {
  shouldRetry?: (error: unknown) => boolean;
  onLog?: (log: RetryLog) => void;
  random?: () => number;
}

/**
 * Delay before the retry that follows 0-based `attempt`:
 * min(base * 2^attempt, max), then ±jitter, floored at 0
 */
export function computeBackoffDelay(
  attempt: number,
  config: RetryConfig,
  random: () => number = Math.random
): number {
  const delay = Math.min(config.baseDelayMs * 2 ** attempt, config.maxDelayMs);
  const jitter = delay * config.jitter * (2 * random() - 1);
  return Math.max(0, delay + jitter);
}

/**
 * Executes a function with exponential backoff retry logic.
 * The last error is rethrown unchanged once the budget is spent or
 * `shouldRetry` rejects it.
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = DEFAULT_RETRY_CONFIG,
  options: RetryOptions = {}
): Promise<T> {
  const shouldRetry = options.shouldRetry ?? isRetryableError;

  for (let attempt = 0; ; attempt++) {
    try {
      const result = await fn(attempt);
      options.onLog?.({ timestamp: new Date(), attempt, success: true });
      return result;
    } catch (error) {
      const canRetry = attempt < config.maxRetries && shouldRetry(error);
      const nextRetryInMs = canRetry
        ? computeBackoffDelay(attempt, config, options.random)
        : undefined;

      options.onLog?.({
        timestamp: new Date(),
        attempt,
        success: false,
        error: error instanceof Error ? error.message : String(error),
        nextRetryInMs,
      });

      if (nextRetryInMs === undefined) {
        throw error;
      }

      await sleep(nextRetryInMs);
    }
  }
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Check if an error is a transient network fault
 */
export function isRetryableError(error: unknown): boolean {
  if (!(error instanceof Error)) {
    return false;
  }

  const errorMessage = error.message.toLowerCase();

  const retryablePatterns = [
    'timeout',
    'timed out',
    'econnrefused',
    'econnreset',
    'etimedout',
    'eai_again',
    'service unavailable',
    'temporarily unavailable',
    'connection refused',
    'getaddrinfo enotfound',
    'socket hang up',
  ];

  return retryablePatterns.some((pattern) => errorMessage.includes(pattern));
}

export function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status < 600);
}
