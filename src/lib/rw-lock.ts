/**
 * Read/Write Lock
 * Promise-based shared/exclusive lock for in-process state.
 *
 * - Any number of readers may hold the lock together
 * - A writer holds it alone
 * - Once a writer is queued, later readers wait behind it so writes are never starved
 */

type LockMode = 'read' | 'write';

interface Waiter {
  mode: LockMode;
  grant: () => void;
}

export class ReadWriteLock {
  private activeReaders = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  /**
   * Run task while holding the shared lock
   */
  async withRead<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await task();
    } finally {
      this.release('read');
    }
  }

  /**
   * Run task while holding the exclusive lock
   */
  async withWrite<T>(task: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await task();
    } finally {
      this.release('write');
    }
  }

  get readers(): number {
    return this.activeReaders;
  }

  get isWriteLocked(): boolean {
    return this.writing;
  }

  get pending(): number {
    return this.waiters.length;
  }

  private acquire(mode: LockMode): Promise<void> {
    if (this.waiters.length === 0 && this.canGrant(mode)) {
      this.take(mode);
      return Promise.resolve();
    }

    return new Promise<void>((resolve) => {
      this.waiters.push({ mode, grant: resolve });
    });
  }

  private release(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders--;
    } else {
      this.writing = false;
    }
    this.drain();
  }

  private drain(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canGrant(next.mode)) {
        return;
      }

      this.waiters.shift();
      this.take(next.mode);
      next.grant();

      if (next.mode === 'write') {
        return;
      }
    }
  }

  private canGrant(mode: LockMode): boolean {
    if (mode === 'read') {
      return !this.writing;
    }
    return !this.writing && this.activeReaders === 0;
  }

  private take(mode: LockMode): void {
    if (mode === 'read') {
      this.activeReaders++;
    } else {
      this.writing = true;
    }
  }
}
