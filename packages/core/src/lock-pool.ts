import PQueue from 'p-queue';

/** Runs `task` on `queue` and settles with the task's own result. */
export function enqueue<T>(queue: PQueue, task: () => Promise<T>): Promise<T> {
  return new Promise<T>((resolve, reject) => {
    queue
      .add(async () => {
        try {
          resolve(await task());
        } catch (err) {
          reject(err);
        }
      })
      .catch(reject);
  });
}

/**
 * One FIFO queue per plugin name with concurrency 1: at most one lifecycle
 * operation per plugin runs at a time, later callers wait in arrival order.
 * Queues for different plugins are independent.
 */
export class PluginLockPool {
  private queues = new Map<string, PQueue>();

  run<T>(name: string, task: () => Promise<T>): Promise<T> {
    return enqueue(this.queueFor(name), task);
  }

  /** Operations running or waiting for `name` */
  pending(name: string): number {
    const queue = this.queues.get(name);
    return queue ? queue.size + queue.pending : 0;
  }

  isLocked(name: string): boolean {
    return (this.queues.get(name)?.pending ?? 0) > 0;
  }

  /** Resolves once nothing is running or waiting for any plugin. */
  async drain(): Promise<void> {
    await Promise.all(Array.from(this.queues.values()).map(queue => queue.onIdle()));
  }

  private queueFor(name: string): PQueue {
    const existing = this.queues.get(name);
    if (existing) return existing;

    const queue = new PQueue({ concurrency: 1 });
    queue.on('idle', () => {
      if (this.queues.get(name) === queue && queue.size === 0 && queue.pending === 0) {
        this.queues.delete(name);
      }
    });
    this.queues.set(name, queue);
    return queue;
  }
}
