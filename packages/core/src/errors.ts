/**
 * Error taxonomy for forecast runs.
 *
 * Every failure that leaves a run is one of these kinds. `ExtractionGap` is the
 * only recoverable kind: the coordinator records it as evidence and carries on.
 */

import type { ZodIssue } from 'zod';
import type { RunState } from './run/states.js';

export type ErrorKind =
  | 'RateLimited'
  | 'ModelUnavailable'
  | 'ExtractionGap'
  | 'SynthesisFailed'
  | 'ValidationFailed'
  | 'TimeoutExceeded'
  | 'InputInvalid';

export interface ErrorBody {
  error: {
    kind: ErrorKind;
    message: string;
    state?: RunState;
    attempts?: number;
    details?: Record<string, unknown>;
  };
}

export class ForecastError extends Error {
  public readonly kind: ErrorKind;
  public readonly retryable: boolean;
  /** State the run was in when the error surfaced. */
  public state?: RunState;
  public readonly attempts?: number;
  public readonly details?: Record<string, unknown>;

  constructor(
    kind: ErrorKind,
    message: string,
    options?: {
      cause?: unknown;
      state?: RunState;
      attempts?: number;
      retryable?: boolean;
      details?: Record<string, unknown>;
    },
  ) {
    super(message, options?.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ForecastError';
    this.kind = kind;
    this.state = options?.state;
    this.attempts = options?.attempts;
    this.retryable = options?.retryable ?? false;
    this.details = options?.details;
  }

  /** Structured error body for the request surface. Never includes prompts. */
  toErrorBody(): ErrorBody {
    return {
      error: {
        kind: this.kind,
        message: this.message,
        ...(this.state !== undefined ? { state: this.state } : {}),
        ...(this.attempts !== undefined ? { attempts: this.attempts } : {}),
        ...(this.details !== undefined ? { details: this.details } : {}),
      },
    };
  }

  toJSON(): Record<string, unknown> {
    return { name: this.name, ...this.toErrorBody().error, retryable: this.retryable };
  }
}

export class RateLimitedError extends ForecastError {
  constructor(attempts: number, cause?: unknown) {
    super('RateLimited', `Model backend rate limited the request after ${attempts} attempt(s)`, {
      cause,
      attempts,
      retryable: true,
    });
    this.name = 'RateLimitedError';
  }
}

export class ModelUnavailableError extends ForecastError {
  constructor(attempts: number, reason: string, cause?: unknown) {
    super('ModelUnavailable', `Model backend unavailable after ${attempts} attempt(s): ${reason}`, {
      cause,
      attempts,
      retryable: true,
    });
    this.name = 'ModelUnavailableError';
  }
}

export class SynthesisFailedError extends ForecastError {
  constructor(attempts: number, reason: string) {
    super('SynthesisFailed', `Model output did not become a valid forecast draft after ${attempts} attempt(s): ${reason}`, {
      attempts,
      state: 'synthesizing',
    });
    this.name = 'SynthesisFailedError';
  }
}

export class ValidationFailedError extends ForecastError {
  public readonly issues: string[];

  constructor(issues: string[], attempts: number) {
    super('ValidationFailed', `Forecast failed validation: ${issues.slice(0, 5).join('; ')}`, {
      attempts,
      state: 'validating',
      details: { issues },
    });
    this.name = 'ValidationFailedError';
    this.issues = issues;
  }
}

export class TimeoutExceededError extends ForecastError {
  constructor(budgetMs: number, state?: RunState) {
    super('TimeoutExceeded', `Run exceeded its ${Math.round(budgetMs / 1000)}s budget`, {
      state,
      details: { budgetMs },
    });
    this.name = 'TimeoutExceededError';
  }
}

export class InputInvalidError extends ForecastError {
  public readonly issues: string[];

  constructor(issues: string[]) {
    super('InputInvalid', `Invalid run request: ${issues.join(', ')}`, {
      state: 'idle',
      details: { issues },
    });
    this.name = 'InputInvalidError';
    this.issues = issues;
  }
}

export function isForecastError(error: unknown): error is ForecastError {
  return error instanceof ForecastError;
}

/** `path: message` lines for a list of zod issues. */
export function formatZodIssues(issues: readonly ZodIssue[]): string[] {
  return issues.map(i => {
    const path = i.path.join('.');
    return path ? `${path}: ${i.message}` : i.message;
  });
}
