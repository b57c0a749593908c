/**
 * Generic retry utility with exponential backoff
 *
 * Provides configurable retry logic for operations that may fail transiently.
 * Distinguishes between permanent errors (don't retry) and transient errors.
 * Sleeping goes through an injectable function so callers can test the
 * policy without waiting.
 */

/**
 * Error categories for retry logic
 */
export class PermanentError extends Error {
  cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'PermanentError';
    this.cause = cause;
  }
}

export class TransientError extends Error {
  cause?: Error;

  constructor(message: string, cause?: Error) {
    super(message);
    this.name = 'TransientError';
    this.cause = cause;
  }
}

/**
 * Raised when every attempt failed with a retryable error
 */
export class RetryExhaustedError extends PermanentError {
  readonly attempts: number;

  constructor(attempts: number, lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`, lastError);
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
  }
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = ms => new Promise(resolve => setTimeout(resolve, ms));

/**
 * Retry configuration
 */
export interface RetryOptions {
  /** Maximum number of attempts, first try included (default: 3) */
  maxAttempts?: number;
  /** Initial delay in ms (default: 1000) */
  initialDelay?: number;
  /** Maximum delay in ms (default: 30000) */
  maxDelay?: number;
  /** Multiplier for exponential backoff (default: 2) */
  backoffMultiplier?: number;
  /** Custom function to determine if error is retryable */
  shouldRetry?: (error: Error) => boolean;
  /** Callback called before each retry attempt */
  onRetry?: (error: Error, attempt: number, delay: number) => void;
  /** Wait implementation (default: setTimeout) */
  sleep?: Sleep;
}

/**
 * Default retry configuration
 */
const DEFAULT_OPTIONS: Required<RetryOptions> = {
  maxAttempts: 3,
  initialDelay: 1000,
  maxDelay: 30000,
  backoffMultiplier: 2,
  shouldRetry: (error: Error): boolean => {
    if (error instanceof PermanentError) return false;
    return error instanceof TransientError;
  },
  onRetry: () => {},
  sleep
};

/**
 * Delay before the retry that follows a failed attempt
 *
 * @param attempt - 1-based number of the attempt that just failed
 */
export function backoffDelay(attempt: number, options: RetryOptions = {}): number {
  const config = { ...DEFAULT_OPTIONS, ...options };
  return Math.min(
    config.initialDelay * Math.pow(config.backoffMultiplier, attempt - 1),
    config.maxDelay
  );
}

/**
 * Execute a function with retry logic
 *
 * @param fn - Async function to execute, receives the 1-based attempt number
 * @param options - Retry configuration
 * @returns Result of the function
 * @throws The first non-retryable error, or RetryExhaustedError once
 *   `maxAttempts` retryable failures have happened
 *
 * @example
 * const page = await retry(() => fetchPage(token), {
 *   maxAttempts: 4,
 *   shouldRetry: error => error instanceof RateLimitError,
 *   onRetry: (error, attempt, delay) => console.warn(`Retry ${attempt} in ${delay}ms`)
 * });
 */
export async function retry<T>(
  fn: (attempt: number) => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const config = { ...DEFAULT_OPTIONS, ...options };
  if (!Number.isInteger(config.maxAttempts) || config.maxAttempts < 1) {
    throw new RangeError(`maxAttempts must be a positive integer, got ${config.maxAttempts}`);
  }

  let lastError: Error | undefined;

  for (let attempt = 1; attempt <= config.maxAttempts; attempt++) {
    try {
      return await fn(attempt);
    } catch (error) {
      lastError = error instanceof Error ? error : new Error(String(error));

      // Don't retry if it's not retryable
      if (!config.shouldRetry(lastError)) {
        throw lastError;
      }

      // Don't retry if this was the last attempt
      if (attempt === config.maxAttempts) {
        break;
      }

      const delay = backoffDelay(attempt, config);
      config.onRetry(lastError, attempt, delay);

      await config.sleep(delay);
    }
  }

  throw new RetryExhaustedError(config.maxAttempts, lastError ?? new Error('Unknown error'));
}
