export interface KeyedLock {
  run<T>(key: string, fn: () => Promise<T>): Promise<T>;
  isLocked(key: string): boolean;
}

/**
 * In-process mutex per key. Calls for the same key run one after another in
 * arrival order; different keys never wait on each other.
 */
export const createKeyedLock = (): KeyedLock => {
  const tails = new Map<string, Promise<void>>();

  return {
    run: async <T>(key: string, fn: () => Promise<T>): Promise<T> => {
      const previous = tails.get(key) ?? Promise.resolve();
      const current = previous.then(fn);
      const tail = current.then(
        () => undefined,
        () => undefined,
      );
      tails.set(key, tail);
      try {
        return await current;
      } finally {
        if (tails.get(key) === tail) {
          tails.delete(key);
        }
      }
    },
    isLocked: (key) => tails.has(key),
  };
};
