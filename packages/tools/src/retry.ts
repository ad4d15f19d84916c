/**
 * HTTP fetch with retry for document downloads.
 *
 * Retries 429 and 5xx responses and network failures with exponential
 * backoff, honouring Retry-After. Other 4xx responses fail at once.
 */

export interface FetchRetryConfig {
  /** Retries after the first request (default: 3). */
  maxRetries?: number;
  /** Delay before the first retry in ms (default: 1000). */
  initialDelayMs?: number;
  /** Backoff multiplier (default: 2). */
  backoffMultiplier?: number;
  /** Delay cap in ms (default: 15000). */
  maxDelayMs?: number;
}

const DEFAULT_CONFIG: Required<FetchRetryConfig> = {
  maxRetries: 3,
  initialDelayMs: 1000,
  backoffMultiplier: 2,
  maxDelayMs: 15000,
};

export class HttpStatusError extends Error {
  constructor(
    readonly status: number,
    readonly url: string,
    statusText: string,
  ) {
    super(`HTTP ${status} ${statusText}${status === 429 ? ' (rate limited)' : ''} for ${url}`);
    this.name = 'HttpStatusError';
  }
}

function isRetryableStatus(status: number): boolean {
  return status === 429 || (status >= 500 && status <= 599);
}

function isNetworkError(error: Error): boolean {
  const message = error.message;
  return message.includes('fetch failed') ||
    message.includes('ECONNRESET') ||
    message.includes('ETIMEDOUT') ||
    message.includes('timeout');
}

/**
 * Fetch with automatic retry on rate limits, server errors and network
 * failures. Returns the first successful Response.
 */
export async function fetchWithRetry(
  url: string,
  init: RequestInit = {},
  config: FetchRetryConfig = {},
): Promise<Response> {
  const { maxRetries, initialDelayMs, backoffMultiplier, maxDelayMs } = { ...DEFAULT_CONFIG, ...config };
  const signal = init.signal ?? undefined;

  const delayFor = (attempt: number): number => {
    const base = initialDelayMs * Math.pow(backoffMultiplier, attempt);
    return Math.min(base + base * 0.1 * Math.random(), maxDelayMs);
  };

  for (let attempt = 0; ; attempt++) {
    let response: Response;
    try {
      response = await fetch(url, init);
    } catch (err) {
      if (err instanceof Error && err.name === 'AbortError') throw err;
      const error = err instanceof Error ? err : new Error(String(err));
      if (!isNetworkError(error) || attempt >= maxRetries) throw error;
      await sleep(delayFor(attempt), signal);
      continue;
    }

    if (response.ok) return response;

    if (!isRetryableStatus(response.status) || attempt >= maxRetries) {
      throw new HttpStatusError(response.status, url, response.statusText);
    }

    let delay = delayFor(attempt);
    const retryAfter = response.headers.get('Retry-After');
    if (retryAfter) {
      const seconds = parseInt(retryAfter, 10);
      if (!isNaN(seconds)) delay = Math.max(delay, seconds * 1000);
    }
    await sleep(delay, signal);
  }
}

function sleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal?.aborted) {
      reject(new DOMException('Aborted', 'AbortError'));
      return;
    }

    const onAbort = (): void => {
      clearTimeout(timer);
      reject(new DOMException('Aborted', 'AbortError'));
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener('abort', onAbort);
      resolve();
    }, ms);
    signal?.addEventListener('abort', onAbort, { once: true });
  });
}
