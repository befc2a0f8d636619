import { QueueSaturatedError } from "./errors.js";

type QueueTask<T> = () => Promise<T>;

type QueueItem = {
  run: () => void;
};

export type QueueRunResult<T> = {
  value: T;
  queueWaitMs: number;
  queueDepthOnEnqueue: number;
};

export interface QueueStats {
  maxConcurrent: number;
  maxQueue: number;
  running: number;
  queued: number;
}

/**
 * Caps how many statements run at once against one warehouse. Callers past the
 * cap wait in FIFO order; past `maxQueue` waiting callers, new ones are refused.
 */
export class StatementQueue {
  private running = 0;
  private readonly queue: QueueItem[] = [];

  constructor(
    private readonly maxConcurrent: number,
    private readonly maxQueue: number,
  ) {}

  private pump(): void {
    while (this.running < this.maxConcurrent && this.queue.length > 0) {
      const item = this.queue.shift();
      if (!item) break;
      this.running += 1;
      item.run();
    }
  }

  async run<T>(task: QueueTask<T>): Promise<QueueRunResult<T>> {
    if (this.running < this.maxConcurrent) {
      this.running += 1;
      try {
        const value = await task();
        return { value, queueWaitMs: 0, queueDepthOnEnqueue: 0 };
      } finally {
        // Keep this in finally so the queue drains even if the task throws.
        this.running -= 1;
        this.pump();
      }
    }

    if (this.queue.length >= this.maxQueue) {
      throw new QueueSaturatedError(
        `warehouse is busy (queue full: ${this.queue.length}/${this.maxQueue}); retry shortly`,
      );
    }

    const queueDepthOnEnqueue = this.queue.length;
    const enqueuedAtMs = Date.now();
    return new Promise<QueueRunResult<T>>((resolve, reject) => {
      this.queue.push({
        run: () => {
          const queueWaitMs = Math.max(0, Date.now() - enqueuedAtMs);
          void task()
            .then((value) => resolve({ value, queueWaitMs, queueDepthOnEnqueue }))
            .catch(reject)
            .finally(() => {
              this.running -= 1;
              this.pump();
            });
        },
      });
    });
  }

  stats(): QueueStats {
    return {
      maxConcurrent: this.maxConcurrent,
      maxQueue: this.maxQueue,
      running: this.running,
      queued: this.queue.length,
    };
  }
}
