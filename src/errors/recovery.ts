/**
 * Recovery Strategies
 * @module errors/recovery
 *
 * Retry with exponential backoff and bounded-concurrency helpers used by the
 * loader, observer, executor and scheduler.
 */

import { isRetryableError } from './codes.js';
import { isBaseError } from './base.js';

// ============================================================================
// Retry Strategy
// ============================================================================

/**
 * Retry configuration options
 */
export interface RetryOptions {
  /** Maximum number of attempts, including the first */
  maxAttempts: number;
  /** Initial delay in milliseconds */
  delayMs: number;
  /** Multiplier for exponential backoff */
  backoffMultiplier?: number;
  /** Maximum delay cap in milliseconds */
  maxDelayMs?: number;
  /** Optional jitter factor (0-1) to add randomness */
  jitterFactor?: number;
  /** Custom function to determine if error is retryable */
  retryIf?: (error: Error, attempt: number) => boolean;
  /** Callback invoked before each retry */
  onRetry?: (error: Error, attempt: number, delayMs: number) => void;
  /** Callback invoked on final failure */
  onFinalFailure?: (error: Error, totalAttempts: number) => void;
  /** Aborts the wait between attempts */
  signal?: AbortSignal;
}

/**
 * Default retry options
 */
export const DEFAULT_RETRY_OPTIONS: Required<
  Omit<RetryOptions, 'onRetry' | 'onFinalFailure' | 'retryIf' | 'signal'>
> = {
  maxAttempts: 3,
  delayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 30000,
  jitterFactor: 0.1,
};

/**
 * Execute an operation with retry logic
 *
 * @example
 * ```typescript
 * const snapshot = await withRetry(
 *   () => fetcher.fetch(locator),
 *   { maxAttempts: 3, delayMs: 1000, backoffMultiplier: 2 }
 * );
 * ```
 */
export async function withRetry<T>(
  operation: (attempt: number) => Promise<T>,
  options: Partial<RetryOptions> = {}
): Promise<T> {
  const opts = { ...DEFAULT_RETRY_OPTIONS, ...options };
  const {
    maxAttempts,
    delayMs,
    backoffMultiplier,
    maxDelayMs,
    jitterFactor,
    retryIf = defaultRetryIf,
    onRetry,
    onFinalFailure,
    signal,
  } = opts;

  let currentDelay = delayMs;

  for (let attempt = 1; ; attempt++) {
    try {
      return await operation(attempt);
    } catch (caught) {
      const error = toError(caught);

      if (attempt >= maxAttempts || signal?.aborted || !retryIf(error, attempt)) {
        onFinalFailure?.(error, attempt);
        throw error;
      }

      const jitter = jitterFactor
        ? currentDelay * jitterFactor * (Math.random() * 2 - 1)
        : 0;
      const actualDelay = Math.max(0, Math.min(currentDelay + jitter, maxDelayMs));

      onRetry?.(error, attempt, actualDelay);

      await sleep(actualDelay, signal);

      currentDelay = Math.min(currentDelay * backoffMultiplier, maxDelayMs);
    }
  }
}

/**
 * Default retry condition: BaseErrors with a retryable code, and
 * network-like failures from libraries that do not raise BaseErrors
 */
function defaultRetryIf(error: Error, _attempt: number): boolean {
  if (isBaseError(error)) {
    return isRetryableError(error.code);
  }

  const retryableMessages = [
    'ECONNREFUSED',
    'ECONNRESET',
    'ETIMEDOUT',
    'ENOTFOUND',
    'ENETUNREACH',
    'socket hang up',
  ];

  return retryableMessages.some(msg =>
    error.message.toLowerCase().includes(msg.toLowerCase())
  );
}

function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value));
}

/**
 * Delay for attempt n (1-based) under exponential backoff, capped
 */
export function computeBackoffDelay(
  attempt: number,
  baseDelayMs: number,
  multiplier: number,
  maxDelayMs: number
): number {
  const exponent = Math.max(0, attempt - 1);
  return Math.min(baseDelayMs * Math.pow(multiplier, exponent), maxDelayMs);
}

/**
 * Resolve after ms, or early when the signal aborts
 */
export function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise(resolve => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const onAbort = (): void => {
      clearTimeout(timer);
      resolve();
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================================
// Parallel Execution with Concurrency Control
// ============================================================================

/**
 * Execute async operations with controlled concurrency.
 * Results keep the index of their input; failed indices are reported in errors.
 */
export async function parallelWithLimit<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  concurrency: number = 10
): Promise<{ results: Array<R | undefined>; errors: Array<{ index: number; error: unknown }> }> {
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const errors: Array<{ index: number; error: unknown }> = [];
  let currentIndex = 0;

  const workers = Array.from({ length: Math.max(1, Math.min(concurrency, items.length)) }, async () => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      const item = items[index];

      if (item === undefined) continue;

      try {
        results[index] = await operation(item, index);
      } catch (error) {
        errors.push({ index, error });
      }
    }
  });

  await Promise.all(workers);

  return { results, errors };
}
