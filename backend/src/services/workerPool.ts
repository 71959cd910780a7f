import { logger } from "../utils/logger";

export class PoolCancelledError extends Error {
  constructor(reason?: string) {
    super(reason || "Task cancelled before it started");
    this.name = "PoolCancelledError";
  }
}

interface QueuedTask<T, R> {
  item: T;
  resolve: (value: R) => void;
  reject: (err: unknown) => void;
}

/**
 * Fixed-size pool: at most `limit` workers run at once, and each finished task
 * immediately starts the next queued one.
 */
export class WorkerPool<T, R> {
  private readonly queue: QueuedTask<T, R>[] = [];
  private active = 0;

  constructor(
    private readonly limit: number,
    private readonly worker: (item: T) => Promise<R>,
    private readonly label = "pool"
  ) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new RangeError(`Worker limit must be a positive integer, got ${limit}`);
    }
  }

  get activeCount(): number {
    return this.active;
  }

  get queuedCount(): number {
    return this.queue.length;
  }

  submit(item: T): Promise<R> {
    return new Promise<R>((resolve, reject) => {
      this.queue.push({ item, resolve, reject });
      this.tryStartNext();
    });
  }

  /** Removes a queued item that has not started yet. */
  remove(predicate: (item: T) => boolean, reason?: string): boolean {
    const index = this.queue.findIndex((task) => predicate(task.item));
    if (index === -1) return false;
    const [task] = this.queue.splice(index, 1);
    task.reject(new PoolCancelledError(reason));
    return true;
  }

  /** Rejects every task that has not started; running tasks are left alone. */
  cancelQueued(reason?: string): number {
    const dropped = this.queue.splice(0, this.queue.length);
    for (const task of dropped) {
      task.reject(new PoolCancelledError(reason));
    }
    return dropped.length;
  }

  private tryStartNext(): void {
    while (this.active < this.limit && this.queue.length > 0) {
      const task = this.queue.shift();
      if (!task) return;
      this.active++;
      logger.debug(`${this.label}: starting task (${this.active}/${this.limit} active, ${this.queue.length} queued)`);
      void this.worker(task.item)
        .then(task.resolve, task.reject)
        .finally(() => {
          this.active--;
          this.tryStartNext();
        });
    }
  }
}
