/**
 * Async utilities for foldback
 */

/**
 * Create a mutex. Waiters acquire the lock in request order.
 */
export function createMutex() {
  let locked = false;
  const queue: (() => void)[] = [];

  async function acquire(): Promise<void> {
    if (!locked) {
      locked = true;
      return;
    }

    return new Promise((resolve) => {
      queue.push(resolve);
    });
  }

  function release(): void {
    const next = queue.shift();
    if (next) {
      next();
    } else {
      locked = false;
    }
  }

  async function withLock<T>(fn: () => Promise<T>): Promise<T> {
    await acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  function isLocked(): boolean {
    return locked;
  }

  return { acquire, release, withLock, isLocked };
}

export type Mutex = ReturnType<typeof createMutex>;
