export class Semaphore {
  private readonly waiters: Array<() => void> = [];
  private available: number;

  constructor(capacity: number) {
    this.available = Math.max(0, Math.floor(capacity));
  }

  async acquire(): Promise<() => void> {
    if (this.available > 0) {
      this.available -= 1;
      return () => this.release();
    }

    return await new Promise<() => void>((resolve) => {
      this.waiters.push(() => {
        this.available -= 1;
        resolve(() => this.release());
      });
    });
  }

  private release() {
    this.available += 1;
    const next = this.waiters.shift();
    if (next) {
      next();
    }
  }
}

/**
 * Runs `task` for every item with at most `concurrency` tasks in flight and
 * resolves once all of them have settled. Results keep the input order.
 */
export const runSettledPool = async <T, R>(
  items: readonly T[],
  concurrency: number,
  task: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> => {
  const semaphore = new Semaphore(Math.max(1, Math.min(concurrency, items.length || 1)));
  return Promise.allSettled(
    items.map(async (item, index) => {
      const release = await semaphore.acquire();
      try {
        return await task(item, index);
      } finally {
        release();
      }
    }),
  );
};
