/**
 * @file src/core/rw-lock.ts
 * @summary Promise-based reader/writer lock guarding the whole store. Readers share the lock,
 * a writer holds it alone. Waiters are served in arrival order, so a queued writer is never
 * overtaken by readers that arrive after it; consecutive queued readers are released
 * together.
 *
 * @exports
 *   - LockMode — "read" | "write"
 *   - ReadWriteLock — the lock, with `read(fn)` / `write(fn)` scoped helpers
 */

export type LockMode = "read" | "write";

type Waiter = {
  mode: LockMode;
  grant: () => void;
};

export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  /** Runs `fn` while holding shared access. */
  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("read");
    try {
      return await fn();
    } finally {
      this.release("read");
    }
  }

  /** Runs `fn` while holding exclusive access. Not re-entrant. */
  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire("write");
    try {
      return await fn();
    } finally {
      this.release("write");
    }
  }

  /** Current holders and queue length, for diagnostics and tests. */
  snapshot(): { readers: number; writing: boolean; waiting: number } {
    return { readers: this.readers, writing: this.writing, waiting: this.waiters.length };
  }

  private canGrant(mode: LockMode): boolean {
    if (this.writing) return false;
    return mode === "read" || this.readers === 0;
  }

  private take(mode: LockMode) {
    if (mode === "read") this.readers += 1;
    else this.writing = true;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({
        mode,
        grant: () => {
          this.take(mode);
          resolve();
        },
      });
    });
  }

  private release(mode: LockMode) {
    if (mode === "read") this.readers = Math.max(0, this.readers - 1);
    else this.writing = false;

    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!next || !this.canGrant(next.mode)) break;
      this.waiters.shift();
      next.grant();
    }
  }
}
