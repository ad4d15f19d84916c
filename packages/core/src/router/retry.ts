/**
 * Retry utility with linear backoff.
 *
 * Used by the model client for transport-level retries. Errors are classified
 * so that rate limits, other transient failures and permanent failures can be
 * told apart once the attempts run out.
 */

import { APICallError } from 'ai';

// ---------------------------------------------------------------------------
// Error classification
// ---------------------------------------------------------------------------

/** Classifies an error for retry decision-making. */
export type ErrorCategory =
  | 'rate_limit'       // 429: back off and retry
  | 'server_error'     // 5xx: back off and retry
  | 'timeout'          // request timed out
  | 'network'          // connection reset/refused
  | 'auth_error'       // 401/403: do not retry
  | 'not_found'        // 404 (unknown model): do not retry
  | 'aborted'          // run cancelled: do not retry
  | 'unknown';

export const TRANSIENT_CATEGORIES: readonly ErrorCategory[] = [
  'rate_limit',
  'server_error',
  'timeout',
  'network',
  'unknown',
];

export function classifyError(error: unknown): ErrorCategory {
  if (error instanceof AbortError) return 'aborted';
  if (error instanceof Error && error.name === 'AbortError') return 'aborted';

  if (APICallError.isInstance(error) && error.statusCode !== undefined) {
    const status = error.statusCode;
    if (status === 429) return 'rate_limit';
    if (status === 401 || status === 403) return 'auth_error';
    if (status === 404) return 'not_found';
    if (status >= 500) return 'server_error';
  }

  const message = error instanceof Error ? error.message : String(error);
  const lowerMsg = message.toLowerCase();

  if (/\b429\b/.test(message) || lowerMsg.includes('rate limit') || lowerMsg.includes('too many requests') || lowerMsg.includes('resource exhausted')) {
    return 'rate_limit';
  }
  if (/\b(500|502|503|504)\b/.test(message) || lowerMsg.includes('internal server error') || lowerMsg.includes('bad gateway') || lowerMsg.includes('service unavailable') || lowerMsg.includes('overloaded')) {
    return 'server_error';
  }
  if (/\b(401|403)\b/.test(message) || lowerMsg.includes('unauthorized') || lowerMsg.includes('forbidden') || lowerMsg.includes('api key')) {
    return 'auth_error';
  }
  if (/\b404\b/.test(message) || lowerMsg.includes('not found')) {
    return 'not_found';
  }
  if (lowerMsg.includes('timeout') || lowerMsg.includes('timed out')) {
    return 'timeout';
  }
  if (lowerMsg.includes('econnreset') || lowerMsg.includes('econnrefused') || lowerMsg.includes('fetch failed') || lowerMsg.includes('socket hang up')) {
    return 'network';
  }

  return 'unknown';
}

export function isTransient(category: ErrorCategory): boolean {
  return TRANSIENT_CATEGORIES.includes(category);
}

// ---------------------------------------------------------------------------
// Retry configuration
// ---------------------------------------------------------------------------

export interface RetryConfig {
  /** Total attempts for one logical call, first one included (default: 3). */
  maxAttempts?: number;
  /** Delay unit; the wait before retry n is `baseDelayMs * n` (default: 5000). */
  baseDelayMs?: number;
  /** Error categories that should be retried. */
  retryOn?: readonly ErrorCategory[];
  /** Abort signal for cancellation. */
  abortSignal?: AbortSignal;
  /** Replaceable for accelerated time in tests. */
  sleep?: (ms: number, abortSignal?: AbortSignal) => Promise<void>;
  /** Called after every failed attempt, before any wait. */
  onAttemptFailed?: (failure: AttemptFailure) => void;
}

export interface AttemptFailure {
  attempt: number;
  error: Error;
  category: ErrorCategory;
  /** Delay before the next attempt, or undefined when none follows. */
  delayMs?: number;
}

export const DEFAULT_RETRY_CONFIG = {
  maxAttempts: 3,
  baseDelayMs: 5000,
  retryOn: TRANSIENT_CATEGORIES,
} as const;

/** Linear backoff: 1x, 2x, 3x the base delay. */
export function backoffDelay(baseDelayMs: number, attempt: number): number {
  return baseDelayMs * attempt;
}

// ---------------------------------------------------------------------------
// Retry result
// ---------------------------------------------------------------------------

export interface RetryResult<T> {
  result: T;
  attempts: number;
  totalDelayMs: number;
}

/** Thrown once attempts are exhausted or a non-retryable error occurs. */
export class RetryExhaustedError extends Error {
  readonly attempts: number;
  readonly category: ErrorCategory;
  readonly lastError: Error;

  constructor(attempts: number, category: ErrorCategory, lastError: Error) {
    super(`Gave up after ${attempts} attempt(s): ${lastError.message}`, { cause: lastError });
    this.name = 'RetryExhaustedError';
    this.attempts = attempts;
    this.category = category;
    this.lastError = lastError;
  }
}

// ---------------------------------------------------------------------------
// Core retry function
// ---------------------------------------------------------------------------

/**
 * Execute a function with retry logic and linear backoff.
 *
 * @param fn - receives the 1-based attempt number
 * @throws RetryExhaustedError carrying the last error and its category
 * @throws AbortError if the signal fires before or between attempts
 */
export async function withRetry<T>(
  fn: (attempt: number) => Promise<T>,
  config: RetryConfig = {},
): Promise<RetryResult<T>> {
  const {
    maxAttempts = DEFAULT_RETRY_CONFIG.maxAttempts,
    baseDelayMs = DEFAULT_RETRY_CONFIG.baseDelayMs,
    retryOn = DEFAULT_RETRY_CONFIG.retryOn,
    abortSignal,
    sleep: wait = sleep,
    onAttemptFailed,
  } = config;

  let totalDelayMs = 0;

  for (let attempt = 1; ; attempt++) {
    if (abortSignal?.aborted) {
      throw new AbortError('Operation aborted');
    }

    try {
      const result = await fn(attempt);
      return { result, attempts: attempt, totalDelayMs };
    } catch (err) {
      const error = err instanceof Error ? err : new Error(String(err));
      const category = classifyError(err);

      if (category === 'aborted') {
        onAttemptFailed?.({ attempt, error, category });
        throw error;
      }

      const retryable = retryOn.includes(category) && attempt < maxAttempts;
      const delayMs = retryable ? backoffDelay(baseDelayMs, attempt) : undefined;
      onAttemptFailed?.({ attempt, error, category, delayMs });

      if (delayMs === undefined) {
        throw new RetryExhaustedError(attempt, category, error);
      }

      await wait(delayMs, abortSignal);
      totalDelayMs += delayMs;
    }
  }
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Wrap a promise with a timeout. */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  abortSignal?: AbortSignal,
): Promise<T> {
  if (timeoutMs <= 0 || timeoutMs === Infinity) return promise;

  return new Promise<T>((resolve, reject) => {
    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      reject(new TimeoutError(`Operation timed out after ${timeoutMs}ms`));
    }, timeoutMs);

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted'));
    };
    abortSignal?.addEventListener('abort', onAbort, { once: true });

    promise.then(
      (value) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        resolve(value);
      },
      (error: unknown) => {
        clearTimeout(timer);
        abortSignal?.removeEventListener('abort', onAbort);
        reject(error);
      },
    );
  });
}

/** Sleep for the given milliseconds, respecting abort signal. */
export function sleep(ms: number, abortSignal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (abortSignal?.aborted) {
      reject(new AbortError('Operation aborted'));
      return;
    }

    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortError('Operation aborted during retry delay'));
    };

    const timer = setTimeout(() => {
      abortSignal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);

    abortSignal?.addEventListener('abort', onAbort, { once: true });
  });
}

// ---------------------------------------------------------------------------
// Error classes
// ---------------------------------------------------------------------------

export class TimeoutError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TimeoutError';
  }
}

export class AbortError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'AbortError';
  }
}
