/**
 * Robust Utility Functions
 *
 * Provides:
 * - Timeout protection for async operations
 * - Retry with exponential backoff and jitter, driven by an explicit policy
 * - AbortSignal helpers for cooperative cancellation
 *
 * @module robustUtils
 */

import { CancelledError, TimeoutError, toError } from '../errors';
import { createLogger } from '../logger';

const retryLogger = createLogger('Retry');

// ============================================================
// TIMEOUT UTILITIES
// ============================================================

/**
 * Wraps a promise with a timeout.
 * Rejects with a TimeoutError if the promise doesn't resolve within the specified time.
 *
 * @example
 * const text = await withTimeout(simplifier.simplify(request), 60000, 'LLM call timed out');
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  ms: number,
  message = 'Operation timed out'
): Promise<T> {
  let timeoutId: ReturnType<typeof setTimeout> | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      reject(new TimeoutError(`${message} after ${ms}ms`, ms));
    }, ms);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutId);
  }
}

// ============================================================
// CANCELLATION UTILITIES
// ============================================================

export function throwIfCancelled(signal: AbortSignal | undefined, message?: string): void {
  if (signal?.aborted) {
    throw new CancelledError(message);
  }
}

/**
 * Sleep that rejects with CancelledError as soon as the signal aborts.
 */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new CancelledError('Operation was cancelled during retry delay'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timeoutId);
      reject(new CancelledError('Operation was cancelled during retry delay'));
    };

    const timeoutId = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    signal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ============================================================
// RETRY UTILITIES
// ============================================================

/**
 * Retry policy shared by the synthesis pipeline and the escalation gateway.
 */
export interface RetryPolicy {
  /** Retries after the first attempt */
  maxRetries: number;
  /** Delay before the first retry in ms */
  baseDelayMs: number;
  /** Ceiling for any single delay in ms, jitter included */
  maxDelayMs: number;
  /** Backoff multiplier (2 for exponential) */
  backoffFactor: number;
  /** Jitter source, returns a value in [0, 1) */
  random: () => number;
}

export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  maxRetries: 3,
  baseDelayMs: 1000,
  maxDelayMs: 30000,
  backoffFactor: 2,
  random: Math.random,
};

export function createRetryPolicy(overrides: Partial<RetryPolicy> = {}): RetryPolicy {
  return { ...DEFAULT_RETRY_POLICY, ...overrides };
}

/**
 * Delay before retry number `attempt + 1`.
 * Exponential growth, 10-20% jitter, never above `maxDelayMs`.
 */
export function computeBackoffDelay(policy: RetryPolicy, attempt: number): number {
  const delay = Math.min(
    policy.baseDelayMs * Math.pow(policy.backoffFactor, attempt),
    policy.maxDelayMs
  );
  const jitter = delay * (0.1 + policy.random() * 0.1);
  return Math.min(Math.round(delay + jitter), policy.maxDelayMs);
}

/**
 * Default function to determine if an error is retryable.
 * Cancellation and validation problems are final; everything else is treated
 * as transient (network, rate limit, engine hiccup).
 */
export function isDefaultRetryable(error: Error): boolean {
  if (error instanceof CancelledError) return false;
  const name = error.name.toLowerCase();
  if (name === 'aborterror' || name === 'validationerror') return false;
  return true;
}

export interface RetryHooks {
  /** Called before each delay with the 1-based retry number */
  onRetry?: (retry: number, error: Error, nextDelayMs: number) => void;
  isRetryable?: (error: Error) => boolean;
  signal?: AbortSignal;
  /** Label used in retry log lines */
  label?: string;
}

const attemptCounts = new WeakMap<Error, number>();

/**
 * Retries an async function with exponential backoff.
 *
 * The callback receives the 0-based attempt number. When retries are
 * exhausted the last error is rethrown; `attemptsOf` recovers how many
 * attempts were made.
 */
export async function withRetryBackoff<T>(
  fn: (attempt: number) => Promise<T>,
  policy: RetryPolicy,
  hooks: RetryHooks = {}
): Promise<T> {
  const { onRetry, isRetryable = isDefaultRetryable, signal, label = 'operation' } = hooks;

  let attempt = 0;
  for (;;) {
    throwIfCancelled(signal);

    try {
      return await fn(attempt);
    } catch (thrown) {
      const error = toError(thrown);

      if (!isRetryable(error) || attempt >= policy.maxRetries) {
        attemptCounts.set(error, attempt + 1);
        throw error;
      }

      const delay = computeBackoffDelay(policy, attempt);
      onRetry?.(attempt + 1, error, delay);
      retryLogger.warn(
        `${label}: attempt ${attempt + 1}/${policy.maxRetries + 1} failed: ${error.message}. ` +
        `Retrying in ${delay}ms...`
      );

      await abortableSleep(delay, signal);
      attempt++;
    }
  }
}

/** Number of attempts made before `withRetryBackoff` gave up with this error. */
export function attemptsOf(error: Error): number {
  return attemptCounts.get(error) ?? 1;
}
