/**
 * One-permit lock per key. Holders of different keys never wait on each other;
 * waiters on the same key are served in arrival order.
 */
export class KeyedMutex {
  private held = new Set<string>();
  private queues = new Map<string, Array<() => void>>();

  async acquire(key: string): Promise<() => void> {
    if (!this.held.has(key)) {
      this.held.add(key);
      return this.releaser(key);
    }

    return new Promise((resolve) => {
      const queue = this.queues.get(key) ?? [];
      queue.push(() => resolve(this.releaser(key)));
      this.queues.set(key, queue);
    });
  }

  async runExclusive<T>(key: string, task: () => Promise<T> | T): Promise<T> {
    const release = await this.acquire(key);
    try {
      return await task();
    } finally {
      release();
    }
  }

  isLocked(key: string): boolean {
    return this.held.has(key);
  }

  private releaser(key: string): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      this.release(key);
    };
  }

  private release(key: string): void {
    const queue = this.queues.get(key);
    const next = queue?.shift();
    if (queue && queue.length === 0) this.queues.delete(key);
    if (next) {
      next();
      return;
    }
    this.held.delete(key);
  }
}
