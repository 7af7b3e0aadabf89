/**
 * Serializes async work per key. Calls for different keys run concurrently,
 * calls for the same key run one after another in arrival order.
 */
export class KeyedLock {
  private tails = new Map<string, Promise<void>>();

  /** Number of keys with queued or running work */
  get size(): number {
    return this.tails.size;
  }

  run<T>(key: string, fn: () => Promise<T>): Promise<T> {
    const prev = this.tails.get(key) ?? Promise.resolve();
    const result = prev.then(fn);
    const tail = result.then(
      () => undefined,
      () => undefined,
    );

    this.tails.set(key, tail);
    void tail.then(() => {
      if (this.tails.get(key) === tail) this.tails.delete(key);
    });

    return result;
  }
}
