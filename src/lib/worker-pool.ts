/**
 * Bounded pool for classification and move tasks.
 *
 * At most `maxWorkers` tasks run at once; the rest wait in FIFO order.
 * `clear()` drops queued tasks that have not started (their promises reject),
 * `waitForIdle()` resolves once nothing is running or queued.
 */
export class WorkerPool {
  private maxWorkers: number;
  private activeWorkers: number = 0;
  private queue: Array<{ start: () => void; cancel: (reason: Error) => void }> = [];
  private idleWaiters: Array<() => void> = [];

  constructor(maxWorkers: number) {
    if (!Number.isInteger(maxWorkers) || maxWorkers < 1) {
      throw new RangeError(`maxWorkers must be a positive integer, got: ${maxWorkers}`);
    }
    this.maxWorkers = maxWorkers;
  }

  execute<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = (): void => {
        // Increment before starting so concurrent submissions respect the cap
        this.activeWorkers++;
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.activeWorkers--;
            this.processQueue();
          });
      };

      if (this.activeWorkers < this.maxWorkers) {
        start();
      } else {
        this.queue.push({ start, cancel: reject });
      }
    });
  }

  private processQueue(): void {
    while (this.queue.length > 0 && this.activeWorkers < this.maxWorkers) {
      const next = this.queue.shift();
      next?.start();
    }

    if (this.activeWorkers === 0 && this.queue.length === 0) {
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      waiters.forEach(resolve => resolve());
    }
  }

  /**
   * Reject every queued task that has not started yet
   * @returns Number of dropped tasks
   */
  clear(reason: Error = new Error('Worker pool cleared')): number {
    const dropped = this.queue;
    this.queue = [];
    dropped.forEach(entry => entry.cancel(reason));
    this.processQueue();
    return dropped.length;
  }

  getStats(): { active: number; queued: number; max: number } {
    return {
      active: this.activeWorkers,
      queued: this.queue.length,
      max: this.maxWorkers,
    };
  }

  waitForIdle(): Promise<void> {
    if (this.activeWorkers === 0 && this.queue.length === 0) {
      return Promise.resolve();
    }
    return new Promise(resolve => {
      this.idleWaiters.push(resolve);
    });
  }
}
