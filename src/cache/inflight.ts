/**
 * In-flight call deduplication.
 *
 * The first caller for a key starts the work; later callers for the same key
 * receive the same promise until it settles, success or failure. The entry is
 * dropped on settle so the next caller after that starts fresh.
 */
export class Inflight<V> {
  private readonly pending = new Map<string, Promise<V>>();

  run(key: string, work: () => Promise<V>): Promise<V> {
    const existing = this.pending.get(key);
    if (existing) return existing;

    const promise = work().finally(() => {
      if (this.pending.get(key) === promise) this.pending.delete(key);
    });
    this.pending.set(key, promise);
    return promise;
  }

  /** Register a promise produced elsewhere (e.g. one slot of a batch call). */
  track(key: string, promise: Promise<V>): Promise<V> {
    const tracked = promise.finally(() => {
      if (this.pending.get(key) === tracked) this.pending.delete(key);
    });
    this.pending.set(key, tracked);
    return tracked;
  }

  get(key: string): Promise<V> | undefined {
    return this.pending.get(key);
  }

  get size(): number {
    return this.pending.size;
  }
}
