/**
 * Bounded worker pool for async tasks.
 *
 * At most `degree` tasks run at once; the rest wait in FIFO order. Tasks are
 * expected to spend their time in subprocess or network I/O, so the caller's
 * dispatch code never blocks on them — it only holds promises.
 */

export const DEFAULT_POOL_DEGREE = 8;

export class WorkerPool {
  private active = 0;
  private readonly queue: Array<() => void> = [];

  constructor(readonly degree: number = DEFAULT_POOL_DEGREE) {
    if (!Number.isInteger(degree) || degree < 1) {
      throw new RangeError(`Worker pool degree must be a positive integer, got ${degree}`);
    }
  }

  /** Tasks currently running. */
  get inFlight(): number {
    return this.active;
  }

  /** Tasks waiting for a free slot. */
  get pending(): number {
    return this.queue.length;
  }

  submit<T>(task: () => Promise<T>): Promise<T> {
    return new Promise<T>((resolve, reject) => {
      const start = () => {
        this.active++;
        // Promise.resolve().then() turns a synchronous throw into a rejection
        void Promise.resolve()
          .then(task)
          .then(resolve, reject)
          .finally(() => {
            this.active--;
            this.queue.shift()?.();
          });
      };

      if (this.active < this.degree) {
        start();
      } else {
        this.queue.push(start);
      }
    });
  }
}
