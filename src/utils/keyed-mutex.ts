/**
 * Per-key mutual exclusion for async operations.
 * Callers holding different keys never wait on each other; callers for the
 * same key run one at a time in arrival order.
 */
export class KeyedMutex {
  private readonly queues = new Map<string, Array<() => void>>();

  /**
   * Acquire the lock for a key. Resolves with a release function.
   */
  async acquire(key: string): Promise<() => void> {
    const waiting = this.queues.get(key);
    if (!waiting) {
      this.queues.set(key, []);
      return () => this.release(key);
    }
    return new Promise((resolve) => {
      waiting.push(() => resolve(() => this.release(key)));
    });
  }

  /**
   * Run `fn` while holding the lock for `key`.
   */
  async runExclusive<T>(key: string, fn: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await fn();
    } finally {
      release();
    }
  }

  /**
   * Whether the lock for `key` is currently held.
   */
  isLocked(key: string): boolean {
    return this.queues.has(key);
  }

  private release(key: string): void {
    const waiting = this.queues.get(key);
    const next = waiting?.shift();
    if (next) {
      next();
    } else {
      this.queues.delete(key);
    }
  }
}
