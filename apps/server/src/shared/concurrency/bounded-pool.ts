type Waiter = {
  resolve: (release: () => void) => void;
  reject: (error: unknown) => void;
  cleanup: () => void;
};

export type BoundedPoolOptions = {
  concurrency: number;
  maxQueued: number;
  /** Builds the error thrown when the wait queue is full. */
  onSaturated: (queued: number) => Error;
};

/**
 * Semaphore with a bounded wait queue. `acquire` resolves with a release
 * callback once a slot is free; waiters are served in FIFO order.
 */
export class BoundedPool {
  private readonly concurrency: number;

  private readonly maxQueued: number;

  private readonly onSaturated: (queued: number) => Error;

  private active = 0;

  private readonly waiters: Waiter[] = [];

  constructor(options: BoundedPoolOptions) {
    this.concurrency = Math.max(1, Math.floor(options.concurrency));
    this.maxQueued = Math.max(0, Math.floor(options.maxQueued));
    this.onSaturated = options.onSaturated;
  }

  get inFlight(): number {
    return this.active;
  }

  get queued(): number {
    return this.waiters.length;
  }

  acquire(signal?: AbortSignal): Promise<() => void> {
    if (signal?.aborted) {
      return Promise.reject(signal.reason);
    }

    if (this.active < this.concurrency) {
      this.active += 1;
      return Promise.resolve(this.createRelease());
    }

    if (this.waiters.length >= this.maxQueued) {
      return Promise.reject(this.onSaturated(this.waiters.length));
    }

    return new Promise<() => void>((resolve, reject) => {
      const onAbort = () => {
        const index = this.waiters.indexOf(waiter);
        if (index >= 0) {
          this.waiters.splice(index, 1);
        }
        reject(signal?.reason);
      };
      const waiter: Waiter = {
        resolve,
        reject,
        cleanup: () => signal?.removeEventListener("abort", onAbort),
      };
      signal?.addEventListener("abort", onAbort, { once: true });
      this.waiters.push(waiter);
    });
  }

  async run<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    const release = await this.acquire(signal);
    try {
      return await task();
    } finally {
      release();
    }
  }

  private createRelease(): () => void {
    let released = false;
    return () => {
      if (released) {
        return;
      }
      released = true;
      const next = this.waiters.shift();
      if (next) {
        next.cleanup();
        next.resolve(this.createRelease());
        return;
      }
      this.active -= 1;
    };
  }
}
