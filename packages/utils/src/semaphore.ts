/**
 * Counting Semaphore
 *
 * Bounds the number of concurrently running async tasks. Waiters are served
 * in arrival order; closing the semaphore rejects every queued waiter and any
 * later acquire.
 */

export class SemaphoreClosedError extends Error {
  constructor() {
    super('Semaphore closed');
    this.name = 'SemaphoreClosedError';
  }
}

interface Waiter {
  resolve: () => void;
  reject: (error: Error) => void;
}

export class Semaphore {
  private active = 0;
  private closed = false;
  private readonly waiters: Waiter[] = [];

  constructor(private readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Semaphore limit must be a positive integer, got ${limit}`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  acquire(): Promise<void> {
    if (this.closed) {
      return Promise.reject(new SemaphoreClosedError());
    }
    if (this.active < this.limit) {
      this.active += 1;
      return Promise.resolve();
    }
    return new Promise<void>((resolve, reject) => {
      this.waiters.push({ resolve, reject });
    });
  }

  release(): void {
    const next = this.waiters.shift();
    if (next) {
      // slot passes straight to the next waiter
      next.resolve();
      return;
    }
    this.active = Math.max(0, this.active - 1);
  }

  /**
   * Run a task once a slot is free, releasing the slot when it settles
   */
  async run<T>(task: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    const error = new SemaphoreClosedError();
    for (const waiter of this.waiters.splice(0)) {
      waiter.reject(error);
    }
  }
}
