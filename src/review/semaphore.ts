// Copyright 2026 Layne Penney
// SPDX-License-Identifier: AGPL-3.0-or-later

/**
 * Semaphore for limiting concurrent producer calls. Waiters can give up
 * their place in the queue when their signal aborts.
 */
export class Semaphore {
  private permits: number;
  private readonly maxPermits: number;
  private waitQueue: Array<() => void> = [];

  constructor(maxPermits: number) {
    if (!Number.isInteger(maxPermits) || maxPermits < 1) {
      throw new Error(`Semaphore needs at least one permit, got ${maxPermits}`);
    }
    this.maxPermits = maxPermits;
    this.permits = maxPermits;
  }

  /**
   * Acquire a permit, waiting if necessary.
   */
  acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.permits > 0) {
      this.permits--;
      return Promise.resolve();
    }

    return new Promise<void>((resolve, reject) => {
      const onAbort = (): void => {
        this.waitQueue = this.waitQueue.filter((w) => w !== waiter);
        reject(signal?.reason);
      };
      const waiter = (): void => {
        signal?.removeEventListener('abort', onAbort);
        resolve();
      };
      this.waitQueue.push(waiter);
      signal?.addEventListener('abort', onAbort, { once: true });
    });
  }

  /**
   * Release a permit, allowing a waiting operation to proceed.
   */
  release(): void {
    const next = this.waitQueue.shift();
    if (next) {
      // Hand the permit straight to the next waiter
      next();
    } else if (this.permits < this.maxPermits) {
      this.permits++;
    }
  }

  /**
   * Execute a function with semaphore-limited concurrency.
   */
  async run<T>(fn: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    await this.acquire(signal);
    try {
      return await fn();
    } finally {
      this.release();
    }
  }

  get available(): number {
    return this.permits;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }
}
