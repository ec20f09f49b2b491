/**
 * Bounded worker pool.
 * Purpose: admit at most `limit` tasks at once; extra tasks wait on the semaphore, not a poll loop.
 * Assumptions: in-flight tasks are never cancelled; the pool only stops admitting new ones.
 * Usage: const results = await runBounded(items, 8, (item) => doWork(item));
 */

// =============================================================================
// SEMAPHORE
// =============================================================================

export type Release = () => void;

export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(readonly limit: number) {
    if (!Number.isInteger(limit) || limit < 1) {
      throw new Error(`concurrency limit must be a positive integer (received ${limit})`);
    }
  }

  get inFlight(): number {
    return this.active;
  }

  get waiting(): number {
    return this.waiters.length;
  }

  async acquire(): Promise<Release> {
    if (this.active < this.limit) {
      this.active += 1;
    } else {
      // The releasing task hands its slot straight to us, so `active` is unchanged.
      await new Promise<void>((resolve) => {
        this.waiters.push(resolve);
      });
    }

    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release();
    };
  }

  private release(): void {
    const next = this.waiters.shift();
    if (next) {
      next();
      return;
    }
    this.active -= 1;
  }
}

// =============================================================================
// BOUNDED RUN
// =============================================================================

/**
 * Runs `worker` over every item with at most `limit` in flight and resolves once all have
 * settled. Results keep input order. If any worker rejects, the first rejection is rethrown
 * after the rest have finished.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>,
  semaphore: Semaphore = new Semaphore(limit),
): Promise<R[]> {
  const settled = await Promise.allSettled(
    items.map(async (item, index) => {
      const release = await semaphore.acquire();
      try {
        return await worker(item, index);
      } finally {
        release();
      }
    }),
  );

  const results: R[] = [];
  for (const entry of settled) {
    if (entry.status === "rejected") {
      throw entry.reason;
    }
    results.push(entry.value);
  }
  return results;
}
