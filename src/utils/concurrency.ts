/**
 * Semaphore-style limiter for running async tasks with bounded parallelism
 */

export interface ConcurrencyLimiterOptions {
  /** Maximum number of tasks running at once (>= 1) */
  maxConcurrency: number;
}

interface QueuedTask {
  start: () => void;
}

export class ConcurrencyLimiter {
  private readonly maxConcurrency: number;
  private activeCount = 0;
  private readonly queue: QueuedTask[] = [];

  constructor(options: ConcurrencyLimiterOptions) {
    if (!Number.isInteger(options.maxConcurrency) || options.maxConcurrency < 1) {
      throw new RangeError('maxConcurrency must be an integer of at least 1');
    }
    this.maxConcurrency = options.maxConcurrency;
  }

  /**
   * Run a task once a slot is free. Tasks start in submission order.
   */
  run<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        this.activeCount++;
        task()
          .then(resolve, reject)
          .finally(() => {
            this.activeCount--;
            this.processQueue();
          });
      };

      if (this.activeCount < this.maxConcurrency) {
        start();
      } else {
        this.queue.push({ start });
      }
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeCount < this.maxConcurrency) {
      const item = this.queue.shift();
      item?.start();
    }
  }

  getStats(): { active: number; queued: number } {
    return {
      active: this.activeCount,
      queued: this.queue.length,
    };
  }
}
