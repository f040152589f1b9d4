type Mode = 'read' | 'write';

interface Waiter {
  mode: Mode;
  wake: () => void;
}

/**
 * Async reader/writer lock. Readers share the lock, a writer holds it alone.
 * Waiters are admitted in arrival order, so a queued writer holds back the
 * readers that arrive after it.
 */
export class ReadWriteLock {
  private readers = 0;
  private writing = false;
  private readonly waiters: Waiter[] = [];

  async read<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('read');
    try {
      return await fn();
    } finally {
      this.release('read');
    }
  }

  async write<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.acquire('write');
    try {
      return await fn();
    } finally {
      this.release('write');
    }
  }

  private acquire(mode: Mode): Promise<void> {
    if (this.waiters.length === 0 && this.canEnter(mode)) {
      this.enter(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.waiters.push({ mode, wake: resolve });
    });
  }

  private release(mode: Mode): void {
    if (mode === 'read') {
      this.readers -= 1;
    } else {
      this.writing = false;
    }
    this.admitWaiters();
  }

  private admitWaiters(): void {
    while (this.waiters.length > 0) {
      const next = this.waiters[0];
      if (!this.canEnter(next.mode)) {
        return;
      }
      this.waiters.shift();
      this.enter(next.mode);
      next.wake();
    }
  }

  private canEnter(mode: Mode): boolean {
    if (mode === 'read') {
      return !this.writing;
    }
    return !this.writing && this.readers === 0;
  }

  private enter(mode: Mode): void {
    if (mode === 'read') {
      this.readers += 1;
    } else {
      this.writing = true;
    }
  }
}

/**
 * Runs one critical section at a time.
 */
export class Mutex {
  private readonly lock = new ReadWriteLock();

  runExclusive<T>(fn: () => T | Promise<T>): Promise<T> {
    return this.lock.write(fn);
  }
}
