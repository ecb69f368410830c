import { PlatformError, StorageError, errorMessage } from '../errors.js';

export interface RetryOptions {
  attempts: number;
  baseDelayMs: number;
  maxDelayMs: number;
  sleep?: (ms: number) => Promise<void>;
  onRetry?: (error: PlatformError, attempt: number, delayMs: number) => void;
}

export const sleep = (ms: number): Promise<void> => new Promise((resolve) => setTimeout(resolve, ms));

export function asPlatformError(error: unknown): PlatformError {
  if (error instanceof PlatformError) {
    return error;
  }
  return new PlatformError('transient', errorMessage(error), { cause: error });
}

/**
 * Delay before retry number `attempt` (1-based): exponential from
 * `baseDelayMs`, capped at `maxDelayMs`, never shorter than a server-requested
 * wait.
 */
export function backoffDelay(attempt: number, baseDelayMs: number, maxDelayMs: number, retryAfterMs: number | null = null): number {
  const exponential = Math.min(maxDelayMs, baseDelayMs * 2 ** (attempt - 1));
  return Math.max(exponential, retryAfterMs ?? 0);
}

/**
 * Run `fn` until it succeeds, a permanent error occurs, or the attempts run
 * out. A rate limit asking for a longer wait than `maxDelayMs` is not waited
 * out.
 */
export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions): Promise<T> {
  const wait = options.sleep ?? sleep;

  for (let attempt = 1; ; attempt++) {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof StorageError) {
        throw error;
      }
      const failure = asPlatformError(error);
      if (!failure.retryable || attempt >= options.attempts) {
        throw failure;
      }
      if (failure.retryAfterMs !== null && failure.retryAfterMs > options.maxDelayMs) {
        throw failure;
      }
      const delay = backoffDelay(attempt, options.baseDelayMs, options.maxDelayMs, failure.retryAfterMs);
      options.onRetry?.(failure, attempt, delay);
      await wait(delay);
    }
  }
}

/** Reject with a transient PlatformError when `promise` is not settled in time. */
export async function withTimeout<T>(promise: Promise<T>, ms: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new PlatformError('transient', `${label} timed out after ${ms}ms`)), ms);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}
