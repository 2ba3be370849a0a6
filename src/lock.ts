import pLimit from "p-limit";

type Limiter = ReturnType<typeof pLimit>;

/** Runs tasks one at a time per key; different keys run independently. */
export class KeyedLock {
  private readonly limiters = new Map<string, Limiter>();

  run<T>(key: string, task: () => Promise<T>): Promise<T> {
    let limiter = this.limiters.get(key);
    if (!limiter) {
      limiter = pLimit(1);
      this.limiters.set(key, limiter);
    }
    const current = limiter;
    return current(task).finally(() => {
      // Idle keys are forgotten so the map only holds classes with work
      if (current.activeCount === 0 && current.pendingCount === 0 && this.limiters.get(key) === current) {
        this.limiters.delete(key);
      }
    });
  }

  pending(key: string): number {
    const limiter = this.limiters.get(key);
    return limiter ? limiter.activeCount + limiter.pendingCount : 0;
  }

  /** Number of keys with running or queued tasks. */
  get size(): number {
    return this.limiters.size;
  }
}
