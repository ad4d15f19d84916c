import { ModelUnavailableError, RateLimitedError } from '../errors.js';
import { getLogger } from '../logger.js';
import type { TraceSink } from '../run/context.js';
import type { ModelBackend } from './llm.js';
import {
  DEFAULT_RETRY_CONFIG,
  RetryExhaustedError,
  withRetry,
  type ErrorCategory,
  type RetryConfig,
} from './retry.js';

const log = getLogger('model-client');

const MAX_TRACE_ERROR_LENGTH = 200;

export interface ModelCall {
  /** Run trace that receives one entry per transport attempt. */
  trace?: TraceSink;
  /** Step label used in the trace and the retry counters. */
  step?: string;
  abortSignal?: AbortSignal;
}

export interface BackendRetryEvent {
  backend: string;
  step: string;
  attempt: number;
  category: ErrorCategory;
  delayMs: number;
}

export interface ResilientModelClientOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  sleep?: RetryConfig['sleep'];
  onRetry?: (event: BackendRetryEvent) => void;
}

/**
 * Single prompt-completion call with linear backoff over whichever backend
 * it was built with. Callers never learn which backend that is.
 *
 * Exhausted rate limits surface as RateLimitedError; every other failure
 * that escapes the retry loop surfaces as ModelUnavailableError. Aborts
 * pass through untouched.
 */
export class ResilientModelClient {
  private readonly maxAttempts: number;
  private readonly baseDelayMs: number;

  constructor(
    private readonly backend: ModelBackend,
    private readonly options: ResilientModelClientOptions = {},
  ) {
    this.maxAttempts = options.maxAttempts ?? DEFAULT_RETRY_CONFIG.maxAttempts;
    this.baseDelayMs = options.baseDelayMs ?? DEFAULT_RETRY_CONFIG.baseDelayMs;
  }

  get backendId(): string {
    return this.backend.id;
  }

  async complete(prompt: string, stop?: readonly string[], call: ModelCall = {}): Promise<string> {
    const step = call.step ?? 'complete';
    const backend = this.backend.id;
    let startedAt = Date.now();

    try {
      const { result } = await withRetry(
        async (attempt) => {
          startedAt = Date.now();
          const text = await this.backend.complete(prompt, { stop, abortSignal: call.abortSignal });
          call.trace?.record({
            type: 'model',
            step,
            backend,
            attempt,
            outcome: 'ok',
            durationMs: Date.now() - startedAt,
          });
          return text;
        },
        {
          maxAttempts: this.maxAttempts,
          baseDelayMs: this.baseDelayMs,
          sleep: this.options.sleep,
          abortSignal: call.abortSignal,
          onAttemptFailed: ({ attempt, error, category, delayMs }) => {
            call.trace?.record({
              type: 'model',
              step,
              backend,
              attempt,
              outcome: 'error',
              durationMs: Date.now() - startedAt,
              category,
              error: error.message.slice(0, MAX_TRACE_ERROR_LENGTH),
              delayMs,
            });
            if (delayMs === undefined) return;

            call.trace?.countRetry(step);
            log.warn({ backend, step, attempt, category, delayMs }, 'model call failed, backing off');
            this.options.onRetry?.({ backend, step, attempt, category, delayMs });
          },
        },
      );
      return result;
    } catch (err) {
      if (err instanceof RetryExhaustedError) {
        log.error({ backend, step, attempts: err.attempts, category: err.category }, 'model call gave up');
        if (err.category === 'rate_limit') {
          throw new RateLimitedError(err.attempts, err.lastError);
        }
        throw new ModelUnavailableError(err.attempts, describeCategory(err.category), err.lastError);
      }
      throw err;
    }
  }
}

function describeCategory(category: ErrorCategory): string {
  switch (category) {
    case 'server_error': return 'backend returned a server error';
    case 'timeout': return 'request timed out';
    case 'network': return 'network failure';
    case 'auth_error': return 'backend rejected the credentials';
    case 'not_found': return 'model not found';
    default: return 'unclassified backend failure';
  }
}
