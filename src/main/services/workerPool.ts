// Worker Pool - bounded concurrency with completion-order results

// ============================================================================
// Completion Queue
// ============================================================================

type Waiter<T> = {
  resolve: (result: IteratorResult<T>) => void;
  reject: (reason: unknown) => void;
};

/**
 * Async queue fed by the workers and drained by a single consumer with `for await`.
 * Items come out in the order they were pushed, which is completion order.
 */
export class CompletionQueue<T> implements AsyncIterable<T> {
  private items: T[] = [];
  private waiters: Waiter<T>[] = [];
  private closed = false;
  private failure: { reason: unknown } | null = null;

  push(item: T): void {
    const waiter = this.waiters.shift();
    if (waiter) {
      waiter.resolve({ value: item, done: false });
    } else {
      this.items.push(item);
    }
  }

  close(): void {
    this.closed = true;
    this.waiters.splice(0).forEach((waiter) => waiter.resolve({ value: undefined, done: true }));
  }

  fail(reason: unknown): void {
    this.failure = { reason };
    this.waiters.splice(0).forEach((waiter) => waiter.reject(reason));
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return {
      next: (): Promise<IteratorResult<T>> => {
        if (this.items.length > 0) {
          const [item] = this.items.splice(0, 1);
          return Promise.resolve<IteratorResult<T>>({ value: item, done: false });
        }
        if (this.failure) return Promise.reject(this.failure.reason);
        if (this.closed) return Promise.resolve<IteratorResult<T>>({ value: undefined, done: true });
        return new Promise<IteratorResult<T>>((resolve, reject) => {
          this.waiters.push({ resolve, reject });
        });
      },
    };
  }
}

// ============================================================================
// Pool
// ============================================================================

export interface PoolOptions<T, R> {
  concurrency: number;
  // Checked before each item is taken; false means the item is skipped instead of run
  shouldStart: () => boolean;
  run: (item: T) => Promise<R>;
  skip: (item: T) => R;
}

/**
 * Start `concurrency` workers over `items` (taken in submission order) and return the
 * queue their results arrive on. The queue closes once every item has produced a result.
 */
export const startPool = <T, R>(items: readonly T[], options: PoolOptions<T, R>): CompletionQueue<R> => {
  const queue = new CompletionQueue<R>();
  const workerCount = Math.max(1, Math.min(options.concurrency, items.length));
  let nextIndex = 0;

  const worker = async () => {
    while (nextIndex < items.length) {
      const item = items[nextIndex];
      nextIndex++;
      if (!options.shouldStart()) {
        queue.push(options.skip(item));
        continue;
      }
      queue.push(await options.run(item));
    }
  };

  const workers = Array.from({ length: workerCount }, () => worker());
  Promise.all(workers).then(
    () => queue.close(),
    (err: unknown) => queue.fail(err)
  );

  return queue;
};
