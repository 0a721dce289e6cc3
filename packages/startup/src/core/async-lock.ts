/**
 * One-permit, FIFO lock for async code.
 *
 * Waiters suspend on a promise instead of blocking, and the permit is handed
 * directly to the next waiter on release so no late caller can overtake the
 * queue.
 */
export class AsyncLock {
  private locked = false;
  private waiting: Array<() => void> = [];

  get isLocked(): boolean {
    return this.locked;
  }

  /** Number of callers suspended in `acquire()`. */
  get queueLength(): number {
    return this.waiting.length;
  }

  async acquire(): Promise<void> {
    if (!this.locked) {
      this.locked = true;
      return;
    }

    return new Promise((resolve) => {
      this.waiting.push(resolve);
    });
  }

  release(): void {
    const next = this.waiting.shift();
    if (next) {
      // Permit passes straight to the next waiter; `locked` stays true.
      next();
    } else {
      this.locked = false;
    }
  }

  /**
   * Run `task` while holding the lock. The lock is released whether the task
   * resolves or rejects.
   */
  async runExclusive<T>(task: () => Promise<T> | T): Promise<T> {
    await this.acquire();
    try {
      return await task();
    } finally {
      this.release();
    }
  }
}
