export class TaskCancelledError extends Error {
  constructor(message = "Task cancelled before it started") {
    super(message);
    this.name = "TaskCancelledError";
  }
}

interface QueueItem<T> {
  task: () => Promise<T>;
  resolve: (value: T) => void;
  reject: (reason?: unknown) => void;
  signal?: AbortSignal;
  onAbort?: () => void;
}

export interface WorkerPoolOptions {
  concurrency: number;
}

/**
 * Runs at most `concurrency` tasks at once, in submission order. A task whose
 * signal aborts while still queued is dropped and rejects with
 * TaskCancelledError; running tasks are left to finish.
 */
export class WorkerPool {
  private readonly concurrency: number;
  private readonly queue: QueueItem<unknown>[] = [];
  private active = 0;

  constructor(options: WorkerPoolOptions) {
    this.concurrency = Math.max(1, options.concurrency);
  }

  schedule<T>(task: () => Promise<T>, signal?: AbortSignal): Promise<T> {
    if (signal?.aborted) {
      return Promise.reject(new TaskCancelledError());
    }

    return new Promise<T>((resolve, reject) => {
      const item: QueueItem<T> = { task, resolve, reject, signal };
      if (signal) {
        item.onAbort = () => {
          const index = this.queue.indexOf(item as QueueItem<unknown>);
          if (index !== -1) {
            this.queue.splice(index, 1);
            reject(new TaskCancelledError());
          }
        };
        signal.addEventListener("abort", item.onAbort, { once: true });
      }

      this.queue.push(item as QueueItem<unknown>);
      this.pump();
    });
  }

  get pendingCount(): number {
    return this.queue.length;
  }

  get activeCount(): number {
    return this.active;
  }

  private pump(): void {
    while (this.active < this.concurrency && this.queue.length > 0) {
      const next = this.queue.shift();
      if (!next) {
        continue;
      }

      if (next.onAbort) {
        next.signal?.removeEventListener("abort", next.onAbort);
      }

      this.active += 1;
      void this.run(next);
    }
  }

  private async run(item: QueueItem<unknown>): Promise<void> {
    try {
      item.resolve(await item.task());
    } catch (error) {
      item.reject(error);
    } finally {
      this.active -= 1;
      this.pump();
    }
  }
}
