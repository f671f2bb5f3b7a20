type LockMode = "read" | "write";

interface Waiter {
  readonly mode: LockMode;
  readonly wake: () => void;
}

/**
 * Async readers/writer lock. Readers share the lock, writers hold it alone.
 * Waiters are granted strictly in arrival order, so a queued writer holds back
 * readers that arrive after it.
 */
export class ReadWriteLock {
  #readers = 0;
  #writing = false;
  #waiters: Waiter[] = [];

  get readers(): number {
    return this.#readers;
  }

  get writing(): boolean {
    return this.#writing;
  }

  get waiting(): number {
    return this.#waiters.length;
  }

  async withRead<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.#acquire("read");
    try {
      return await fn();
    } finally {
      this.#release("read");
    }
  }

  async withWrite<T>(fn: () => T | Promise<T>): Promise<T> {
    await this.#acquire("write");
    try {
      return await fn();
    } finally {
      this.#release("write");
    }
  }

  #acquire(mode: LockMode): Promise<void> {
    if (this.#waiters.length === 0 && this.#canGrant(mode)) {
      this.#grant(mode);
      return Promise.resolve();
    }
    return new Promise<void>((resolve) => {
      this.#waiters.push({ mode, wake: resolve });
    });
  }

  #canGrant(mode: LockMode): boolean {
    if (mode === "read") {
      return !this.#writing;
    }
    return !this.#writing && this.#readers === 0;
  }

  #grant(mode: LockMode): void {
    if (mode === "read") {
      this.#readers += 1;
    } else {
      this.#writing = true;
    }
  }

  #release(mode: LockMode): void {
    if (mode === "read") {
      this.#readers -= 1;
    } else {
      this.#writing = false;
    }

    for (let next = this.#waiters[0]; next && this.#canGrant(next.mode); next = this.#waiters[0]) {
      this.#waiters.shift();
      this.#grant(next.mode);
      next.wake();
    }
  }
}
