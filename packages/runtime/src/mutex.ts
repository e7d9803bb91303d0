/**
 * Mutex built on closures; the lock is released even when the guarded function throws
 */
export type Mutex = {
  acquire(): Promise<() => void>;
  runExclusive<T>(fn: () => Promise<T> | T): Promise<T>;
  isLocked(): boolean;
};

export function createMutex(): Mutex {
  const waiters: Array<() => void> = [];
  let locked = false;

  const release = (): void => {
    const next = waiters.shift();
    if (next) {
      // Ownership passes straight to the next waiter
      next();
    } else {
      locked = false;
    }
  };

  const acquire = (): Promise<() => void> =>
    new Promise<() => void>((resolve) => {
      let released = false;
      const grant = () => {
        locked = true;
        resolve(() => {
          if (released) return;
          released = true;
          release();
        });
      };

      if (locked) {
        waiters.push(grant);
      } else {
        grant();
      }
    });

  const runExclusive = async <T>(fn: () => Promise<T> | T): Promise<T> => {
    const releaseLock = await acquire();
    try {
      return await fn();
    } finally {
      releaseLock();
    }
  };

  return { acquire, runExclusive, isLocked: () => locked };
}

/**
 * One independent lock per key. A key's lock is dropped from the table as soon as
 * nobody holds or waits for it, so short-lived keys do not accumulate.
 */
export type KeyedMutex<K = string> = {
  runExclusive<T>(key: K, fn: () => Promise<T> | T): Promise<T>;
  isLocked(key: K): boolean;
  readonly size: number;
};

export function createKeyedMutex<K = string>(): KeyedMutex<K> {
  const entries = new Map<K, { mutex: Mutex; users: number }>();

  const runExclusive = async <T>(key: K, fn: () => Promise<T> | T): Promise<T> => {
    let entry = entries.get(key);
    if (!entry) {
      entry = { mutex: createMutex(), users: 0 };
      entries.set(key, entry);
    }
    entry.users++;

    try {
      return await entry.mutex.runExclusive(fn);
    } finally {
      entry.users--;
      if (entry.users === 0) {
        entries.delete(key);
      }
    }
  };

  return {
    runExclusive,
    isLocked: (key) => entries.get(key)?.mutex.isLocked() ?? false,
    get size() {
      return entries.size;
    }
  };
}
