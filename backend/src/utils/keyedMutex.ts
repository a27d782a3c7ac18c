/**
 * Per-key async lock. Tasks sharing a key run one at a time in arrival order;
 * tasks under different keys do not wait on each other.
 */
export class KeyedMutex {
  private readonly waiters = new Map<string, Array<() => void>>();

  async acquire(key: string): Promise<void> {
    const queue = this.waiters.get(key);
    if (!queue) {
      this.waiters.set(key, []);
      return;
    }
    return new Promise<void>((resolve) => {
      queue.push(resolve);
    });
  }

  release(key: string): void {
    const queue = this.waiters.get(key);
    if (!queue) return;
    const next = queue.shift();
    if (next) {
      next();
      return;
    }
    this.waiters.delete(key);
  }

  isLocked(key: string): boolean {
    return this.waiters.has(key);
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    await this.acquire(key);
    try {
      return await task();
    } finally {
      this.release(key);
    }
  }
}
