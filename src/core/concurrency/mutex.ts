// src/core/concurrency/mutex.ts
// Async mutual exclusion for stacks and registries

/**
 * Mutex: one holder at a time, waiters served in arrival order.
 * Release hands the lock straight to the next waiter.
 */
export class Mutex {
  private held = false;
  private readonly waitQueue: Array<() => void> = [];
  private acquisitionCount = 0;

  constructor(readonly name?: string) {}

  get locked(): boolean {
    return this.held;
  }

  get waiting(): number {
    return this.waitQueue.length;
  }

  get acquisitions(): number {
    return this.acquisitionCount;
  }

  /**
   * Acquire the lock. Resolves with the release function.
   */
  acquire(): Promise<() => void> {
    return new Promise((resolve) => {
      const grant = () => {
        this.held = true;
        this.acquisitionCount++;
        resolve(this.releaser());
      };
      if (!this.held) {
        grant();
      } else {
        this.waitQueue.push(grant);
      }
    });
  }

  async runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    const release = await this.acquire();
    try {
      return await fn();
    } finally {
      release();
    }
  }

  private releaser(): () => void {
    let released = false;
    return () => {
      if (released) return;
      released = true;
      const next = this.waitQueue.shift();
      if (next) {
        next();
      } else {
        this.held = false;
      }
    };
  }
}

/**
 * Run `fn` while holding every mutex in `locks`, acquired in the given order.
 * Duplicates are acquired once. Callers order the list consistently to avoid deadlock.
 */
export async function withLocks<T>(locks: Mutex[], fn: () => T | Promise<T>): Promise<T> {
  const unique = [...new Set(locks)];
  const releases: Array<() => void> = [];
  try {
    for (const lock of unique) {
      releases.push(await lock.acquire());
    }
    return await fn();
  } finally {
    for (const release of releases.reverse()) {
      release();
    }
  }
}

/**
 * Lock order for named resources: plain code-unit comparison, so every caller
 * agrees regardless of locale.
 */
export function compareLockNames(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/** Deduplicated names in lock order. */
export function inLockOrder(names: Iterable<string>): string[] {
  return [...new Set(names)].sort(compareLockNames);
}
