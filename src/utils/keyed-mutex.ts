/**
 * Keyed Mutex - per-key mutual exclusion for async work inside one process
 *
 * Callers for the same key run strictly one after another, in arrival order.
 * Different keys never wait on each other. A key's entry is dropped once its
 * last holder finishes.
 */

export interface KeyedMutex<K> {
  /** Run `work` while holding the lock for `key`. */
  runExclusive<T>(key: K, work: () => Promise<T>): Promise<T>;

  /** Whether someone currently holds or waits for `key`. */
  isLocked(key: K): boolean;
}

export function createKeyedMutex<K>(): KeyedMutex<K> {
  const tails = new Map<K, Promise<void>>();

  return {
    async runExclusive<T>(key: K, work: () => Promise<T>): Promise<T> {
      const previous = tails.get(key) ?? Promise.resolve();

      let release: () => void = () => {};
      const held = new Promise<void>((resolve) => {
        release = resolve;
      });
      const tail = previous.then(() => held);
      tails.set(key, tail);

      await previous;
      try {
        return await work();
      } finally {
        release();
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },

    isLocked(key: K): boolean {
      return tails.has(key);
    },
  };
}
