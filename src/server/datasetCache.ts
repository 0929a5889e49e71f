export interface MemoizedAccessor<T> {
  (): Promise<T>;
  /** Drops the cached value so the next call loads again. */
  reset(): void;
}

/**
 * Load-once accessor scoped to whoever holds it. A rejected load is not kept,
 * so the next call retries.
 */
export const createDatasetAccessor = <T>(load: () => Promise<T>): MemoizedAccessor<T> => {
  let cached: Promise<T> | null = null;

  const get = () => {
    if (!cached) {
      cached = load().catch((err: unknown) => {
        cached = null;
        throw err;
      });
    }
    return cached;
  };

  return Object.assign(get, {
    reset: () => {
      cached = null;
    },
  });
};
