/**
 * Runs remote calls away from the record-handling path. The sink awaits
 * every store call through this interface; each `run` is a suspension
 * point.
 */
export interface BlockingExecutor {
  run<T>(task: () => Promise<T>): Promise<T>;
}

/**
 * Caps the number of tasks in flight. Callers beyond the cap wait in FIFO
 * order; a finishing task hands its slot straight to the next waiter.
 */
export class BoundedExecutor implements BlockingExecutor {
  private readonly maxConcurrency: number;
  private active: number = 0;
  private waiting: Array<() => void> = [];

  constructor(maxConcurrency: number) {
    if (!Number.isInteger(maxConcurrency) || maxConcurrency < 1) {
      throw new RangeError(
        `maxConcurrency must be a positive integer, got ${maxConcurrency}`,
      );
    }
    this.maxConcurrency = maxConcurrency;
  }

  get activeCount(): number {
    return this.active;
  }

  get pendingCount(): number {
    return this.waiting.length;
  }

  async run<T>(task: () => Promise<T>): Promise<T> {
    if (this.active < this.maxConcurrency) {
      this.active++;
    } else {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }

    try {
      return await task();
    } finally {
      const next = this.waiting.shift();
      if (next) {
        next();
      } else {
        this.active--;
      }
    }
  }
}
