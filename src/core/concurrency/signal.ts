// src/core/concurrency/signal.ts
// Wake-up signal for control loops that wait on a condition

/**
 * Signal: condition-variable style wake-up.
 * Waiters re-check their condition after every wake; notify wakes all current waiters.
 */
export class Signal {
  private waiters: Array<() => void> = [];

  wait(): Promise<void> {
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  notify(): void {
    const woken = this.waiters;
    this.waiters = [];
    for (const resolve of woken) {
      resolve();
    }
  }

  get waiting(): number {
    return this.waiters.length;
  }
}
