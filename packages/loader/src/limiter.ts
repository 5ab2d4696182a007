/**
 * FIFO concurrency limiter for filesystem-bound work.
 */
export class ConcurrencyLimiter {
  private readonly waiting: (() => void)[] = [];
  private running = 0;
  readonly maxConcurrent: number;

  constructor(maxConcurrent: number) {
    if (!Number.isInteger(maxConcurrent) || maxConcurrent < 1) {
      throw new RangeError(`Concurrency limit must be a positive integer, got ${maxConcurrent}`);
    }
    this.maxConcurrent = maxConcurrent;
  }

  /** Tasks currently executing. */
  get active(): number {
    return this.running;
  }

  /** Tasks waiting for a slot. */
  get pending(): number {
    return this.waiting.length;
  }

  /**
   * Run `task` once a slot is free. Settles with the task's outcome.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      this.waiting.push(() => {
        this.running++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.running--;
            this.drain();
          });
      });
      this.drain();
    });
  }

  private drain(): void {
    while (this.running < this.maxConcurrent) {
      const start = this.waiting.shift();
      if (!start) return;
      start();
    }
  }
}
