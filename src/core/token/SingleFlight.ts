// src/core/token/SingleFlight.ts

/**
 * Keyed promise coalescing: concurrent callers with the same key share one execution.
 * The entry is dropped as soon as the execution settles, so later callers start fresh.
 */
export class SingleFlight<T> {
  private inflight: Map<string, Promise<T>> = new Map();

  has(key: string): boolean {
    return this.inflight.has(key);
  }

  get size(): number {
    return this.inflight.size;
  }

  run(key: string, fn: () => Promise<T>): Promise<T> {
    const existing = this.inflight.get(key);
    if (existing) return existing;

    const promise = (async () => {
      try {
        return await fn();
      } finally {
        this.inflight.delete(key);
      }
    })();

    this.inflight.set(key, promise);
    return promise;
  }
}
