import { AbortError } from '../router/retry.js';

/**
 * Counting semaphore with a FIFO wait queue. A freed slot is handed straight
 * to the oldest waiter.
 */
export class Semaphore {
  private available: number;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error('Semaphore limit must be a positive integer');
    }
    this.available = limit;
  }

  async run<T>(fn: () => Promise<T>, abortSignal?: AbortSignal): Promise<T> {
    await this.acquire();
    try {
      if (abortSignal?.aborted) throw new AbortError('Operation aborted');
      return await fn();
    } finally {
      this.release();
    }
  }

  private acquire(): Promise<void> {
    if (this.available > 0) {
      this.available--;
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push(resolve);
    });
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
    } else {
      this.available++;
    }
  }
}

/**
 * Map `items` through `fn` with at most `limit` calls in flight.
 * Results keep input order. The first rejection rejects the whole batch
 * once every started call has settled.
 */
export async function mapLimited<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  abortSignal?: AbortSignal,
): Promise<R[]> {
  const semaphore = new Semaphore(limit);
  const settled = await Promise.allSettled(
    items.map((item, index) => semaphore.run(() => fn(item, index), abortSignal)),
  );

  const results: R[] = [];
  for (const outcome of settled) {
    if (outcome.status === 'rejected') throw outcome.reason;
    results.push(outcome.value);
  }
  return results;
}
