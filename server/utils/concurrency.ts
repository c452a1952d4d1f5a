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
 * Runs `worker` over every item with at most `limit` calls in flight.
 * Workers pull the next index from a shared cursor, so a slow item never
 * holds back the rest of the queue. A worker that throws rejects the pool;
 * callers that need isolation catch inside `worker`.
 */
export const runWithPool = async <T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> => {
  const workerCount = Math.min(items.length, Math.max(1, Math.floor(limit) || 1));
  let nextIndex = 0;

  const loops = new Array(workerCount).fill(null).map(async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex;
      nextIndex += 1;
      await worker(items[idx], idx);
    }
  });

  await Promise.all(loops);
};
