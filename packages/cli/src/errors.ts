import { ForecastError, type ErrorBody, type ErrorKind } from '@forecastr/core';

export interface InternalErrorBody {
  error: { kind: 'Internal'; message: string };
}

export type ResponseBody = ErrorBody | InternalErrorBody;

const STATUS_BY_KIND: Record<ErrorKind, number> = {
  InputInvalid: 400,
  RateLimited: 502,
  ModelUnavailable: 502,
  SynthesisFailed: 502,
  ValidationFailed: 502,
  TimeoutExceeded: 504,
  ExtractionGap: 500,
};

/** HTTP status and structured body for an error that ended a request. */
export function toErrorResponse(error: unknown): { status: number; body: ResponseBody } {
  if (error instanceof ForecastError) {
    return { status: STATUS_BY_KIND[error.kind], body: error.toErrorBody() };
  }
  const message = error instanceof Error ? error.message : String(error);
  return { status: 500, body: { error: { kind: 'Internal', message } } };
}
