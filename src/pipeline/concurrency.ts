/**
 * Concurrency control for collaborator calls.
 *
 * @module pipeline/concurrency
 */

/**
 * ConcurrencyLimiter bounds the number of operations in flight.
 *
 * Semaphore with a FIFO queue of waiting callers. The assembler creates one
 * per query for waypoint searches; the batch runner creates one per batch.
 *
 * @example
 * ```typescript
 * const limiter = new ConcurrencyLimiter(3);
 * const places = await Promise.all(
 *   queries.map((q) => limiter.run(() => resolver.search(q, at, 10)))
 * );
 * ```
 */
export class ConcurrencyLimiter {
  private readonly limit: number;
  private running = 0;
  private queue: Array<() => void> = [];

  /**
   * @param limit - Maximum number of concurrent operations (default: 3)
   * @throws Error if limit is not a positive integer
   */
  constructor(limit: number = 3) {
    if (limit < 1) {
      throw new Error('Concurrency limit must be at least 1');
    }
    if (!Number.isInteger(limit)) {
      throw new Error('Concurrency limit must be an integer');
    }
    this.limit = limit;
  }

  /**
   * Acquire a slot, waiting in FIFO order when none is free.
   */
  async acquire(): Promise<void> {
    if (this.running < this.limit) {
      this.running++;
      return;
    }

    return new Promise<void>((resolve) => {
      this.queue.push(resolve);
    });
  }

  /**
   * Release a slot, handing it straight to the next waiter if any.
   *
   * @throws Error when called without a matching acquire()
   */
  release(): void {
    if (this.running <= 0) {
      throw new Error('ConcurrencyLimiter: release() called without matching acquire()');
    }

    this.running--;

    const next = this.queue.shift();
    if (next) {
      this.running++;
      next();
    }
  }

  /**
   * Run a function inside a slot; the slot is released even if it throws.
   */
  async run<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}
