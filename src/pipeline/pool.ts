import { debug } from './log';

/**
 * Counting semaphore limiting concurrent backend calls across all media items.
 * A limit of 0 (or less) disables it.
 */
export class Semaphore {
  private active = 0;
  private readonly waiters: Array<() => void> = [];

  constructor(private readonly limit: number, private readonly name = 'backend') {}

  get inUse(): number {
    return this.active;
  }

  async acquire(): Promise<void> {
    if (this.limit <= 0) return;
    if (this.active < this.limit) {
      this.active++;
      debug('semaphore.acquire', { name: this.name, active: this.active, limit: this.limit });
      return;
    }
    await new Promise<void>((resolve) => {
      this.waiters.push(() => {
        this.active++;
        debug('semaphore.acquire.waited', { name: this.name, active: this.active, limit: this.limit });
        resolve();
      });
    });
  }

  release(): void {
    if (this.limit <= 0) return;
    this.active = Math.max(0, this.active - 1);
    const next = this.waiters.shift();
    if (next) next();
  }

  async use<T>(fn: () => Promise<T>): Promise<T> {
    await this.acquire();
    try {
      return await fn();
    } finally {
      this.release();
    }
  }
}

/**
 * Run worker over items with at most `concurrency` in flight. No ordering guarantee
 * across items; results are returned in input order. The first rejection stops new
 * work from being scheduled and is rethrown once in-flight work settles.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency) || 1);
  const results: R[] = new Array(items.length);
  const active: Promise<void>[] = [];
  const failures: unknown[] = [];
  let idx = 0;

  const runOne = async (i: number) => {
    try {
      results[i] = await worker(items[i], i);
    } catch (e) {
      failures.push(e);
    }
  };

  while (idx < items.length && !failures.length) {
    while (active.length < limit && idx < items.length && !failures.length) {
      const p: Promise<void> = runOne(idx).finally(() => {
        const pos = active.indexOf(p);
        if (pos >= 0) active.splice(pos, 1);
      });
      active.push(p);
      idx++;
    }
    if (active.length) await Promise.race(active);
  }
  await Promise.all(active);
  if (failures.length) throw failures[0];
  return results;
}
